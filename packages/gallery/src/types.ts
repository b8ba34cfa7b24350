import type { Logger } from "./logger.js";
import type { GalleryRepository } from "./repository.js";
import type { SearchService } from "./search.js";
import type { StorageService } from "./storage.js";
import type { TargetPlatformName } from "./target-platform.js";
import type { UpstreamGallery } from "./upstream.js";

export type FileType =
  | "download"
  | "download-sig"
  | "manifest"
  | "icon"
  | "readme"
  | "license"
  | "changelog"
  | "vsixmanifest"
  | "resource";

export type StorageType = "local" | "google-cloud" | "azure-blob";

export interface Namespace {
  id: number;
  publicId: string;
  name: string;
  displayName?: string;
  verified: boolean;
}

export interface Extension {
  id: number;
  publicId: string;
  namespaceId: number;
  name: string;
  active: boolean;
  averageRating?: number;
  reviewCount: number;
  downloadCount: number;
  publishedDate: string;
  lastUpdatedDate: string;
}

export interface ExtensionVersion {
  id: number;
  extensionId: number;
  version: string;
  targetPlatform: TargetPlatformName;
  active: boolean;
  preRelease: boolean;
  preview: boolean;
  timestamp: string;
  displayName?: string;
  description?: string;
  engines: string[];
  categories: string[];
  tags: string[];
  extensionKind: string[];
  repository?: string;
  homepage?: string;
  license?: string;
  sponsorLink?: string;
  localizedLanguages: string[];
  dependencies: string[];
  bundledExtensions: string[];
  signatureKeyPairId?: number;
}

export interface FileResource {
  id: number;
  extensionVersionId: number;
  name: string;
  type: FileType;
  storageType: StorageType;
}

export interface SignatureKeyPair {
  id: number;
  publicId: string;
  publicKeyText: string;
  active: boolean;
}

/** One extension version joined with the records it belongs to. */
export interface ResolvedExtensionVersion {
  namespace: Namespace;
  extension: Extension;
  version: ExtensionVersion;
}

/** One file resource joined with the version that owns it. */
export interface ResolvedFileResource extends ResolvedExtensionVersion {
  file: FileResource;
}

// Catalog documents: one JSON file per extension under the catalog root.

export interface CatalogFileEntry {
  name: string;
  type: FileType;
  storageType?: StorageType;
}

export interface CatalogSignatureKeyPair {
  publicId: string;
  publicKeyText: string;
  active?: boolean;
}

export interface CatalogVersionEntry {
  version: string;
  targetPlatform?: TargetPlatformName;
  active?: boolean;
  preRelease?: boolean;
  preview?: boolean;
  timestamp: string;
  displayName?: string;
  description?: string;
  engines?: string[];
  categories?: string[];
  tags?: string[];
  extensionKind?: string[];
  repository?: string;
  homepage?: string;
  license?: string;
  sponsorLink?: string;
  localizedLanguages?: string[];
  dependencies?: string[];
  bundledExtensions?: string[];
  signatureKeyPair?: CatalogSignatureKeyPair;
  files?: CatalogFileEntry[];
}

export interface CatalogDocument {
  namespace: {
    publicId: string;
    name: string;
    displayName?: string;
    verified?: boolean;
  };
  extension: {
    publicId: string;
    name: string;
    averageRating?: number;
    reviewCount?: number;
    downloadCount?: number;
    publishedDate: string;
    lastUpdatedDate: string;
  };
  versions: CatalogVersionEntry[];
}

// Gallery protocol payloads.

export interface ExtensionQueryCriterion {
  filterType: number;
  value?: string;
}

export interface ExtensionQueryFilter {
  criteria: ExtensionQueryCriterion[];
  pageNumber?: number;
  pageSize?: number;
  sortBy?: number;
  sortOrder?: number;
}

export interface ExtensionQueryParam {
  filters: ExtensionQueryFilter[];
  flags: number;
  assetTypes?: string[];
}

export interface QueryPublisher {
  publisherId: string;
  publisherName: string;
  displayName: string;
  domain: string | null;
  isDomainVerified: boolean;
}

export interface QueryExtensionFile {
  assetType: string;
  source: string;
}

export interface QueryProperty {
  key: string;
  value: string;
}

export interface QueryStatistic {
  statisticName: string;
  value: number;
}

export interface QueryExtensionVersion {
  version: string;
  targetPlatform?: string;
  flags: string;
  lastUpdated: string;
  assetUri?: string;
  fallbackAssetUri?: string;
  files?: QueryExtensionFile[];
  properties?: QueryProperty[];
}

export interface QueryExtension {
  extensionId: string;
  extensionName: string;
  displayName: string;
  shortDescription: string;
  publisher: QueryPublisher;
  versions?: QueryExtensionVersion[];
  statistics?: QueryStatistic[];
  tags?: string[];
  categories?: string[];
  releaseDate: string;
  publishedDate: string;
  lastUpdated: string;
  flags: string;
  deploymentType?: number;
}

export interface QueryResultMetadataItem {
  name: string;
  count: number;
}

export interface QueryResultMetadata {
  metadataType: string;
  metadataItems: QueryResultMetadataItem[];
}

export interface QueryResult {
  extensions: QueryExtension[];
  pagingToken: string | null;
  resultMetadata: QueryResultMetadata[];
}

export interface ExtensionQueryResult {
  results: QueryResult[];
}

// Service wiring.

export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;

export interface RelevanceWeights {
  rating: number;
  downloads: number;
  timestamp: number;
}

export interface GallerySettings {
  builtInNamespace: string;
  maxPageSize: number;
  defaultPageSize: number;
  signing: boolean;
  webUiUrl: string;
}

export interface GalleryServerOptions {
  settings?: Partial<GallerySettings>;
  repository: GalleryRepository;
  search: SearchService;
  storage: StorageService;
  upstream?: UpstreamGallery;
  serverUrl?: string;
  logger?: Logger;
}
