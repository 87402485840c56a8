import { z } from "zod";
import type { FugaClient } from "../client";
import { ApiError } from "../errors";
import { PRODUCT_ROUTES } from "../routes";
import { CatalogRecordSchema, OptionalCatalogRecordSchema } from "../schemas";
import type { CatalogRecord, TrackPosition, TrackUpdateSummary } from "../types";
import { CatalogResource, requireId } from "./base";

const ProductAssetsSchema = z
  .object({
    asset: z.array(z.object({ id: z.union([z.string(), z.number()]) }).passthrough()).default([]),
  })
  .passthrough();

export class Products extends CatalogResource {
  constructor(client: FugaClient) {
    super(client, { path: "/products", collectionKey: "product", label: "Product" });
  }

  /** Marks the product ready for delivery. */
  async publish(id: string): Promise<CatalogRecord | undefined> {
    requireId(id, "Product", "publishing");
    return this.client.requestAs("POST", PRODUCT_ROUTES.publish(id), OptionalCatalogRecordSchema);
  }

  async assignBarcode(id: string): Promise<CatalogRecord | undefined> {
    requireId(id, "Product", "assigning a barcode");
    return this.client.requestAs("POST", PRODUCT_ROUTES.barcode(id), OptionalCatalogRecordSchema);
  }

  async fetchImage(id: string, size = "full_size"): Promise<CatalogRecord> {
    requireId(id, "Product", "retrieval");
    return this.client.requestAs("GET", PRODUCT_ROUTES.image(id, size), CatalogRecordSchema);
  }

  async fetchArtworks(id: string): Promise<CatalogRecord> {
    requireId(id, "Product", "retrieval");
    return this.client.requestAs("GET", PRODUCT_ROUTES.artworks(id), CatalogRecordSchema);
  }

  async fetchLiveLinks(id: string): Promise<CatalogRecord> {
    requireId(id, "Product", "retrieval");
    return this.client.requestAs("GET", PRODUCT_ROUTES.liveLinks(id), CatalogRecordSchema);
  }

  /** Replaces the product's territory list with the given ISO codes. */
  async updateTerritories(id: string, territories: string[]): Promise<CatalogRecord | undefined> {
    requireId(id, "Product", "updating territories");
    return this.client.requestAs("PUT", PRODUCT_ROUTES.territories(id), OptionalCatalogRecordSchema, {
      body: territories,
    });
  }

  async fetchAssets(id: string): Promise<CatalogRecord> {
    requireId(id, "Product", "retrieval");
    return this.client.requestAs("GET", PRODUCT_ROUTES.assets(id), CatalogRecordSchema);
  }

  async addAsset(id: string, assetId: string, sequence: number): Promise<CatalogRecord | undefined> {
    requireId(id, "Product", "adding an asset");
    return this.client.requestAs("POST", PRODUCT_ROUTES.assets(id), OptionalCatalogRecordSchema, {
      body: { id: assetId, sequence },
    });
  }

  async removeAsset(id: string, assetId: string): Promise<string> {
    requireId(id, "Product", "removing an asset");
    return this.client.requestText("DELETE", PRODUCT_ROUTES.asset(id, assetId));
  }

  async updateAssetSequence(id: string, assetId: string, sequence: number): Promise<CatalogRecord | undefined> {
    requireId(id, "Product", "updating asset sequence");
    return this.client.requestAs(
      "PUT",
      PRODUCT_ROUTES.assetPosition(id, assetId, sequence),
      OptionalCatalogRecordSchema,
      { body: {} },
    );
  }

  /**
   * Brings the product's track list in line with `tracks`: tracks not yet on the
   * product are added, tracks missing from `tracks` are removed, and the rest are
   * moved to their new sequence. Calls run one after another in that order.
   */
  async updateTracks(id: string, tracks: TrackPosition[]): Promise<TrackUpdateSummary> {
    requireId(id, "Product", "updating tracks");

    const current = ProductAssetsSchema.safeParse(await this.fetchAssets(id));
    if (!current.success) {
      throw new ApiError({
        code: "INVALID_RESPONSE",
        httpStatus: 200,
        message: `Unexpected asset list for product ${id}`,
      });
    }

    const currentIds = new Set(current.data.asset.map((asset) => String(asset.id)));
    const wantedIds = new Set(tracks.map((track) => track.id));
    const summary: TrackUpdateSummary = {
      added: tracks.filter((track) => !currentIds.has(track.id)),
      removed: [...currentIds].filter((assetId) => !wantedIds.has(assetId)),
      reordered: tracks.filter((track) => currentIds.has(track.id)),
    };

    for (const track of summary.added) {
      await this.addAsset(id, track.id, track.sequence);
      this.client.logger.info(`Added track ${track.id} with sequence ${track.sequence}.`);
    }
    for (const assetId of summary.removed) {
      await this.removeAsset(id, assetId);
      this.client.logger.info(`Removed track ${assetId}.`);
    }
    for (const track of summary.reordered) {
      await this.updateAssetSequence(id, track.id, track.sequence);
      this.client.logger.info(`Reordered track ${track.id} to sequence ${track.sequence}.`);
    }

    return summary;
  }

  /** Uploads artwork into the product's cover image entity. */
  async uploadCoverImage(id: string, coverImageId: string, imagePath: string): Promise<CatalogRecord> {
    requireId(id, "Product", "uploading an image");
    return this.client.uploadFile(imagePath, { id: coverImageId, type: "image" });
  }
}
