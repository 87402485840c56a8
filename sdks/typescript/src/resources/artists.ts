import type { FugaClient } from "../client";
import { ARTIST_ROUTES } from "../routes";
import { CatalogRecordSchema } from "../schemas";
import type { CatalogRecord } from "../types";
import { CatalogResource, requireId } from "./base";

/** Artists, plus the DSP identifiers (Spotify, Apple Music, ...) attached to them. */
export class Artists extends CatalogResource {
  constructor(client: FugaClient) {
    super(client, { path: "/artists", collectionKey: "artist", label: "Artist" });
  }

  async fetchIdentifiers(id: string): Promise<CatalogRecord> {
    requireId(id, "Artist", "retrieval");
    return this.client.requestAs("GET", ARTIST_ROUTES.identifiers(id), CatalogRecordSchema);
  }

  async fetchIdentifier(id: string, identifierId: string): Promise<CatalogRecord> {
    requireId(id, "Artist", "retrieval");
    return this.client.requestAs("GET", ARTIST_ROUTES.identifier(id, identifierId), CatalogRecordSchema);
  }

  async createIdentifier(id: string, data: CatalogRecord): Promise<CatalogRecord> {
    requireId(id, "Artist", "identifier creation");
    return this.client.requestAs("POST", ARTIST_ROUTES.identifiers(id), CatalogRecordSchema, { body: data });
  }

  async updateIdentifier(id: string, identifierId: string, data: CatalogRecord): Promise<CatalogRecord> {
    requireId(id, "Artist", "identifier updates");
    return this.client.requestAs("PUT", ARTIST_ROUTES.identifier(id, identifierId), CatalogRecordSchema, { body: data });
  }

  async deleteIdentifier(id: string, identifierId: string): Promise<string> {
    requireId(id, "Artist", "identifier deletion");
    return this.client.requestText("DELETE", ARTIST_ROUTES.identifier(id, identifierId));
  }
}
