import type { FugaClient } from "../client";
import { paginate } from "../pagination";
import { pathSegment } from "../routes";
import { CatalogRecordSchema } from "../schemas";
import type { CatalogRecord, ListOptions } from "../types";

export function requireId(id: string, label: string, action: string): void {
  if (!id || id.trim() === "") {
    throw new TypeError(`${label} ID is required for ${action}.`);
  }
}

export interface ResourceDescriptor {
  /** Collection path, e.g. `/products`. */
  path: string;
  /** Key holding the records in list responses, e.g. `product`. */
  collectionKey: string;
  /** Human label used in error messages. */
  label: string;
}

/** CRUD over one FUGA collection. Subclasses add the endpoints specific to an entity. */
export class CatalogResource {
  constructor(
    protected readonly client: FugaClient,
    protected readonly descriptor: ResourceDescriptor,
  ) {}

  list(options: ListOptions = {}): AsyncGenerator<CatalogRecord, void, unknown> {
    return paginate(this.client, this.descriptor.path, this.descriptor.collectionKey, options);
  }

  async get(id: string): Promise<CatalogRecord> {
    requireId(id, this.descriptor.label, "retrieval");
    return this.client.requestAs("GET", this.itemPath(id), CatalogRecordSchema);
  }

  async create(data: CatalogRecord): Promise<CatalogRecord> {
    return this.client.requestAs("POST", this.descriptor.path, CatalogRecordSchema, { body: data });
  }

  async update(id: string, data: CatalogRecord): Promise<CatalogRecord> {
    requireId(id, this.descriptor.label, "updates");
    return this.client.requestAs("PUT", this.itemPath(id), CatalogRecordSchema, { body: data });
  }

  async delete(id: string): Promise<string> {
    requireId(id, this.descriptor.label, "deletion");
    return this.client.requestText("DELETE", this.itemPath(id));
  }

  protected itemPath(id: string): string {
    return `${this.descriptor.path}/${pathSegment(id)}`;
  }
}
