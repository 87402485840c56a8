import { ApiError } from "./errors";
import type { FugaClient } from "./client";
import { CatalogRecordListSchema, CatalogRecordSchema } from "./schemas";
import type { CatalogRecord, ListOptions } from "./types";

const DEFAULT_PAGE_SIZE = 10;

/**
 * Walks a FUGA list endpoint page by page, yielding one record at a time.
 *
 * FUGA pages are zero-based and answer `{ <collectionKey>: [...], total }`.
 * Iteration stops at an empty page, once `total` records have been seen, or
 * after `limit` records.
 */
export async function* paginate(
  client: FugaClient,
  path: string,
  collectionKey: string,
  options: ListOptions = {},
): AsyncGenerator<CatalogRecord, void, unknown> {
  let page = options.page ?? 0;
  const pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
  let fetched = 0;

  while (true) {
    const payload = await client.request("GET", path, {
      searchParams: { page, page_size: pageSize },
    });

    const envelope = CatalogRecordSchema.safeParse(payload ?? {});
    const items = envelope.success ? CatalogRecordListSchema.safeParse(envelope.data[collectionKey] ?? []) : undefined;
    if (!envelope.success || !items?.success) {
      throw new ApiError({
        code: "INVALID_RESPONSE",
        httpStatus: 200,
        message: `Unexpected page payload from ${path}: expected a "${collectionKey}" list`,
      });
    }

    for (const item of items.data) {
      yield item;
      fetched += 1;
      if (options.limit && fetched >= options.limit) {
        return;
      }
    }

    const total = typeof envelope.data.total === "number" ? envelope.data.total : 0;
    if (items.data.length === 0 || fetched >= total) {
      break;
    }
    page += 1;
  }
}

/** Drains {@link paginate} into an array. */
export async function collect(iterator: AsyncIterable<CatalogRecord>): Promise<CatalogRecord[]> {
  const records: CatalogRecord[] = [];
  for await (const record of iterator) {
    records.push(record);
  }
  return records;
}
