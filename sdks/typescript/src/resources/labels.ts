import type { FugaClient } from "../client";
import { CatalogResource } from "./base";

export class Labels extends CatalogResource {
  constructor(client: FugaClient) {
    super(client, { path: "/labels", collectionKey: "label", label: "Label" });
  }
}
