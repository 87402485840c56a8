import type { FugaClient } from "../client";
import { paginate } from "../pagination";
import { MISCELLANEOUS_ROUTES } from "../routes";
import { CatalogRecordListSchema, CatalogRecordSchema } from "../schemas";
import type { CatalogRecord, ListOptions } from "../types";
import { requireId } from "./base";

/** Reference data FUGA uses to validate catalog records (genres, territories, ...). */
export class Miscellaneous {
  constructor(private readonly client: FugaClient) {}

  fetchGenres(): Promise<CatalogRecord[]> {
    return this.lookup(MISCELLANEOUS_ROUTES.genres);
  }

  listSubgenres(options: ListOptions = {}): AsyncGenerator<CatalogRecord, void, unknown> {
    return paginate(this.client, MISCELLANEOUS_ROUTES.subgenres, "subgenre", options);
  }

  async createSubgenre(data: CatalogRecord): Promise<CatalogRecord> {
    return this.client.requestAs("POST", MISCELLANEOUS_ROUTES.subgenres, CatalogRecordSchema, { body: data });
  }

  async deleteSubgenre(id: string): Promise<string> {
    requireId(id, "Subgenre", "deletion");
    return this.client.requestText("DELETE", MISCELLANEOUS_ROUTES.subgenre(id));
  }

  fetchLanguages(): Promise<CatalogRecord[]> {
    return this.lookup(MISCELLANEOUS_ROUTES.languages);
  }

  fetchAudioLocales(): Promise<CatalogRecord[]> {
    return this.lookup(MISCELLANEOUS_ROUTES.audioLocales);
  }

  fetchContributorRoles(): Promise<CatalogRecord[]> {
    return this.lookup(MISCELLANEOUS_ROUTES.contributorRoles);
  }

  fetchCatalogTiers(): Promise<CatalogRecord[]> {
    return this.lookup(MISCELLANEOUS_ROUTES.catalogTiers);
  }

  fetchInstruments(): Promise<CatalogRecord[]> {
    return this.lookup(MISCELLANEOUS_ROUTES.instruments);
  }

  fetchTerritories(): Promise<CatalogRecord[]> {
    return this.lookup(MISCELLANEOUS_ROUTES.territories);
  }

  fetchEncodings(): Promise<CatalogRecord[]> {
    return this.lookup(MISCELLANEOUS_ROUTES.encodings);
  }

  fetchLeadTimes(): Promise<CatalogRecord[]> {
    return this.lookup(MISCELLANEOUS_ROUTES.leadTimes);
  }

  private lookup(path: string): Promise<CatalogRecord[]> {
    return this.client.requestAs("GET", path, CatalogRecordListSchema);
  }
}
