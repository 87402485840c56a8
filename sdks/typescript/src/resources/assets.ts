import { z } from "zod";
import type { FugaClient } from "../client";
import { ApiError } from "../errors";
import { ASSET_ROUTES } from "../routes";
import { CatalogRecordListSchema, CatalogRecordSchema } from "../schemas";
import type { CatalogRecord, UploadSession } from "../types";
import { CatalogResource, requireId } from "./base";

const LinkedEntitiesSchema = z.array(z.object({ id: z.union([z.string(), z.number()]) }).passthrough());

export interface UploadAudioOptions {
  /** Flags the master as Apple Digital Master encoded. */
  appleDigitalMaster?: boolean;
}

type LinkedCollection = "contributors" | "instrument performers" | "publishers";

export class Assets extends CatalogResource {
  constructor(client: FugaClient) {
    super(client, { path: "/assets", collectionKey: "asset", label: "Asset" });
  }

  async fetchContributors(id: string): Promise<CatalogRecord[]> {
    requireId(id, "Asset", "retrieval");
    return this.client.requestAs("GET", ASSET_ROUTES.contributors(id), CatalogRecordListSchema);
  }

  async addContributor(id: string, data: CatalogRecord): Promise<CatalogRecord> {
    requireId(id, "Asset", "adding contributors");
    return this.client.requestAs("POST", ASSET_ROUTES.contributors(id), CatalogRecordSchema, { body: data });
  }

  async removeContributor(id: string, contributorId: string): Promise<string> {
    requireId(id, "Asset", "removing contributors");
    return this.client.requestText("DELETE", ASSET_ROUTES.contributor(id, contributorId));
  }

  /** Removes every contributor and returns the removed ids. */
  async removeAllContributors(id: string): Promise<string[]> {
    requireId(id, "Asset", "removing contributors");
    const contributors = linkedIds("contributors", await this.fetchContributors(id));
    for (const contributorId of contributors) {
      await this.removeContributor(id, contributorId);
    }
    return contributors;
  }

  async fetchInstrumentPerformers(id: string): Promise<CatalogRecord[]> {
    requireId(id, "Asset", "retrieval");
    return this.client.requestAs("GET", ASSET_ROUTES.instrumentPerformers(id), CatalogRecordListSchema);
  }

  async addInstrumentPerformer(id: string, data: CatalogRecord): Promise<CatalogRecord> {
    requireId(id, "Asset", "adding instrument performers");
    return this.client.requestAs("POST", ASSET_ROUTES.instrumentPerformers(id), CatalogRecordSchema, { body: data });
  }

  async removeInstrumentPerformer(id: string, performerId: string): Promise<string> {
    requireId(id, "Asset", "removing instrument performers");
    return this.client.requestText("DELETE", ASSET_ROUTES.instrumentPerformer(id, performerId));
  }

  async removeAllInstrumentPerformers(id: string): Promise<string[]> {
    requireId(id, "Asset", "removing instrument performers");
    const performers = linkedIds("instrument performers", await this.fetchInstrumentPerformers(id));
    for (const performerId of performers) {
      await this.removeInstrumentPerformer(id, performerId);
    }
    return performers;
  }

  async fetchPublishers(id: string): Promise<CatalogRecord[]> {
    requireId(id, "Asset", "retrieval");
    return this.client.requestAs("GET", ASSET_ROUTES.publishers(id), CatalogRecordListSchema);
  }

  async addPublisher(id: string, data: CatalogRecord): Promise<CatalogRecord> {
    requireId(id, "Asset", "adding publishers");
    return this.client.requestAs("POST", ASSET_ROUTES.publishers(id), CatalogRecordSchema, { body: data });
  }

  async removePublisher(id: string, publisherId: string): Promise<string> {
    requireId(id, "Asset", "removing publishers");
    return this.client.requestText("DELETE", ASSET_ROUTES.publisher(id, publisherId));
  }

  async removeAllPublishers(id: string): Promise<string[]> {
    requireId(id, "Asset", "removing publishers");
    const publishers = linkedIds("publishers", await this.fetchPublishers(id));
    for (const publisherId of publishers) {
      await this.removePublisher(id, publisherId);
    }
    return publishers;
  }

  /** Downloads the asset's audio. `original: false` asks for the transcoded rendition. */
  async fetchAudio(id: string, original = true): Promise<Uint8Array> {
    requireId(id, "Asset", "retrieval");
    return this.client.requestBytes("GET", ASSET_ROUTES.audio(id), { searchParams: { original } });
  }

  async uploadAudio(id: string, audioPath: string, options: UploadAudioOptions = {}): Promise<CatalogRecord> {
    requireId(id, "Asset", "uploading an audio file");
    const session: UploadSession = {
      id,
      type: "audio",
      overwrite_all: true,
      clear_all_encodings: true,
    };
    if (options.appleDigitalMaster) {
      session.original_encoding = "ADM";
    }
    return this.client.uploadFile(audioPath, session);
  }

  async uploadVideo(id: string, videoPath: string): Promise<CatalogRecord> {
    requireId(id, "Asset", "uploading a video file");
    return this.client.uploadFile(videoPath, { id, type: "video" });
  }

  async uploadVideoPreviewImage(id: string, previewImageId: string, imagePath: string): Promise<CatalogRecord> {
    requireId(id, "Asset", "uploading a video preview image");
    return this.client.uploadFile(imagePath, { id: previewImageId, type: "image" });
  }
}

function linkedIds(collection: LinkedCollection, payload: unknown): string[] {
  const parsed = LinkedEntitiesSchema.safeParse(payload ?? []);
  if (!parsed.success) {
    throw new ApiError({
      code: "INVALID_RESPONSE",
      httpStatus: 200,
      message: `Unexpected ${collection} list: expected an array of records with ids`,
    });
  }
  return parsed.data.map((entry) => String(entry.id));
}
