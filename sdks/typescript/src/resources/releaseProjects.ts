import type { FugaClient } from "../client";
import { paginate } from "../pagination";
import { RELEASE_PROJECT_ROUTES } from "../routes";
import { OptionalCatalogRecordSchema } from "../schemas";
import type { CatalogRecord, ListOptions } from "../types";
import { CatalogResource, requireId } from "./base";

export class ReleaseProjects extends CatalogResource {
  constructor(client: FugaClient) {
    super(client, { path: "/release_projects", collectionKey: "release_project", label: "Release project" });
  }

  listProducts(id: string, options: ListOptions = {}): AsyncGenerator<CatalogRecord, void, unknown> {
    requireId(id, "Release project", "retrieval");
    return paginate(this.client, RELEASE_PROJECT_ROUTES.products(id), "product", options);
  }

  async addProducts(id: string, productIds: string[]): Promise<CatalogRecord | undefined> {
    requireId(id, "Release project", "adding products");
    return this.client.requestAs("POST", RELEASE_PROJECT_ROUTES.products(id), OptionalCatalogRecordSchema, {
      body: { products_ids: productIds },
    });
  }

  async removeProducts(id: string, productIds: string[]): Promise<string> {
    requireId(id, "Release project", "removing products");
    return this.client.requestText("DELETE", RELEASE_PROJECT_ROUTES.products(id), {
      body: { products_ids: productIds },
    });
  }
}
