import type { FugaClient } from "../client";
import { CatalogResource } from "./base";

export class PublishingHouses extends CatalogResource {
  constructor(client: FugaClient) {
    super(client, { path: "/publishing_houses", collectionKey: "publishing_house", label: "Publishing house" });
  }
}
