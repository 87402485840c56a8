const segment = (value: string | number) => encodeURIComponent(String(value));

export const AUTH_ROUTES = {
  login: "/login",
} as const;

export const UPLOAD_ROUTES = {
  start: "/upload/start",
  chunk: "/upload",
  finish: "/upload/finish",
} as const;

export const PRODUCT_ROUTES = {
  publish: (id: string) => `/products/${segment(id)}/publish`,
  barcode: (id: string) => `/products/${segment(id)}/barcode`,
  image: (id: string, size: string) => `/products/${segment(id)}/image/${segment(size)}`,
  artworks: (id: string) => `/products/${segment(id)}/artworks`,
  liveLinks: (id: string) => `/products/${segment(id)}/live_links`,
  territories: (id: string) => `/products/${segment(id)}/territories`,
  assets: (id: string) => `/products/${segment(id)}/assets`,
  asset: (id: string, assetId: string) => `/products/${segment(id)}/assets/${segment(assetId)}`,
  assetPosition: (id: string, assetId: string, sequence: number) =>
    `/products/${segment(id)}/assets/${segment(assetId)}/position/${segment(sequence)}`,
} as const;

export const ASSET_ROUTES = {
  contributors: (id: string) => `/assets/${segment(id)}/contributors`,
  contributor: (id: string, contributorId: string) =>
    `/assets/${segment(id)}/contributors/${segment(contributorId)}`,
  instrumentPerformers: (id: string) => `/assets/${segment(id)}/instrument_performers`,
  instrumentPerformer: (id: string, performerId: string) =>
    `/assets/${segment(id)}/instrument_performers/${segment(performerId)}`,
  publishers: (id: string) => `/assets/${segment(id)}/publishers`,
  publisher: (id: string, publisherId: string) => `/assets/${segment(id)}/publishers/${segment(publisherId)}`,
  audio: (id: string) => `/assets/${segment(id)}/audio`,
} as const;

export const ARTIST_ROUTES = {
  identifiers: (id: string) => `/artists/${segment(id)}/identifier`,
  identifier: (id: string, identifierId: string) => `/artists/${segment(id)}/identifier/${segment(identifierId)}`,
} as const;

export const RELEASE_PROJECT_ROUTES = {
  products: (id: string) => `/release_projects/${segment(id)}/products`,
} as const;

export const MISCELLANEOUS_ROUTES = {
  genres: "/miscellaneous/genres",
  subgenres: "/miscellaneous/subgenres",
  subgenre: (id: string) => `/miscellaneous/subgenres/${segment(id)}`,
  languages: "/miscellaneous/languages",
  audioLocales: "/miscellaneous/audio_locales",
  contributorRoles: "/miscellaneous/contributor_roles",
  catalogTiers: "/miscellaneous/catalog-tiers",
  instruments: "/miscellaneous/instruments",
  territories: "/miscellaneous/territories",
  encodings: "/miscellaneous/encodings",
  leadTimes: "/miscellaneous/lead_times",
} as const;

export { segment as pathSegment };
