import { z } from "zod";

/** Any JSON object. FUGA owns the record schema, so fields are not checked. */
export const CatalogRecordSchema = z.record(z.string(), z.unknown());

export const CatalogRecordListSchema = z.array(CatalogRecordSchema);

/** Action endpoints (publish, barcode, ...) may answer 2xx with no body. */
export const OptionalCatalogRecordSchema = CatalogRecordSchema.optional();
