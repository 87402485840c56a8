import type { Logger } from "./logger";

/** A catalog entity as FUGA returns it. Field names and types belong to FUGA's schema. */
export type CatalogRecord = Record<string, unknown>;

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

export interface ClientOptions {
  apiUrl: string;
  username?: string;
  password?: string;
  /** Reuse a session cookie (`name=value`) from an earlier login instead of credentials. */
  authCookie?: string;
  timeoutMs?: number;
  userAgentSuffix?: string;
  transport?: typeof fetch;
  logger?: Logger;
  /** Bytes per part for chunked uploads. */
  uploadChunkSize?: number;
}

export type SearchParams = Record<string, string | number | boolean | undefined>;

export interface RequestOptions {
  searchParams?: SearchParams;
  body?: CatalogRecord | unknown[];
}

export interface ListOptions {
  page?: number;
  pageSize?: number;
  limit?: number;
}

export interface TrackPosition {
  id: string;
  sequence: number;
}

export interface TrackUpdateSummary {
  added: TrackPosition[];
  removed: string[];
  reordered: TrackPosition[];
}

export interface UploadSession {
  id: string;
  type: "audio" | "video" | "image";
  overwrite_all?: boolean;
  clear_all_encodings?: boolean;
  original_encoding?: string;
}
