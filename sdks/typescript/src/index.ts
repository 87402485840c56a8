export { FugaClient } from "./client";
export { loadConfig, toClientOptions } from "./config";
export type { FugaConfig } from "./config";
export {
  ApiError,
  AuthenticationError,
  ConfigError,
  InvalidBodyError,
  NotFoundError,
  RateLimitedError,
  TransportError,
  UnauthorizedError,
  isApiError,
  isInvalidBody,
  isNotFound,
  isRateLimited,
  isUnauthorized,
} from "./errors";
export type { ApiErrorOptions } from "./errors";
export { createConsoleLogger, silentLogger } from "./logger";
export type { LogLevel, LogSink, Logger } from "./logger";
export { collect, paginate } from "./pagination";
export { CatalogRecordListSchema, CatalogRecordSchema, OptionalCatalogRecordSchema } from "./schemas";
export { CatalogResource, requireId } from "./resources/base";
export type { ResourceDescriptor } from "./resources/base";
export { Products } from "./resources/products";
export { Assets } from "./resources/assets";
export type { UploadAudioOptions } from "./resources/assets";
export { Artists } from "./resources/artists";
export { Labels } from "./resources/labels";
export { People } from "./resources/people";
export { PublishingHouses } from "./resources/publishingHouses";
export { ReleaseProjects } from "./resources/releaseProjects";
export { Miscellaneous } from "./resources/miscellaneous";
export type {
  CatalogRecord,
  ClientOptions,
  HttpMethod,
  ListOptions,
  RequestOptions,
  SearchParams,
  TrackPosition,
  TrackUpdateSummary,
  UploadSession,
} from "./types";
