import type { FugaClient } from "../client";
import { CatalogResource } from "./base";

export class People extends CatalogResource {
  constructor(client: FugaClient) {
    super(client, { path: "/people", collectionKey: "person", label: "Person" });
  }
}
