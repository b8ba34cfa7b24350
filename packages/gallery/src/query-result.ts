import { ASSET_PUBLIC_KEY, QUERY_FILE_TYPES, assetTypeForFile } from "./asset-types.js";
import { isUniversal, WEB } from "./target-platform.js";
import type {
  Extension,
  ExtensionQueryResult,
  ExtensionVersion,
  FileResource,
  Namespace,
  QueryExtension,
  QueryExtensionFile,
  QueryExtensionVersion,
  QueryProperty,
  QueryStatistic,
  SignatureKeyPair,
} from "./types.js";

// Criterion filter types of the gallery protocol
export const FILTER_TAG = 1;
export const FILTER_EXTENSION_ID = 4;
export const FILTER_CATEGORY = 5;
export const FILTER_EXTENSION_NAME = 7;
export const FILTER_TARGET = 8;
export const FILTER_SEARCH_TEXT = 10;

// Query flags
export const FLAG_INCLUDE_VERSIONS = 0x1;
export const FLAG_INCLUDE_FILES = 0x2;
export const FLAG_INCLUDE_CATEGORY_AND_TAGS = 0x4;
export const FLAG_INCLUDE_VERSION_PROPERTIES = 0x10;
export const FLAG_INCLUDE_ASSET_URI = 0x80;
export const FLAG_INCLUDE_STATISTICS = 0x100;
export const FLAG_INCLUDE_LATEST_VERSION_ONLY = 0x200;

// Sort options
export const SORT_BY_INSTALL_COUNT = 4;
export const SORT_BY_PUBLISHED_DATE = 5;
export const SORT_BY_AVERAGE_RATING = 6;
export const SORT_ORDER_ASCENDING = 1;

export const PROPERTY_ENGINE = "Microsoft.VisualStudio.Code.Engine";
export const PROPERTY_DEPENDENCIES = "Microsoft.VisualStudio.Code.ExtensionDependencies";
export const PROPERTY_EXTENSION_PACK = "Microsoft.VisualStudio.Code.ExtensionPack";
export const PROPERTY_LOCALIZED_LANGUAGES = "Microsoft.VisualStudio.Code.LocalizedLanguages";
export const PROPERTY_EXTENSION_KIND = "Microsoft.VisualStudio.Code.ExtensionKind";
export const PROPERTY_PRE_RELEASE = "Microsoft.VisualStudio.Code.PreRelease";
export const PROPERTY_REPOSITORY = "Microsoft.VisualStudio.Services.Links.Source";
export const PROPERTY_SPONSOR_LINK = "Microsoft.VisualStudio.Code.SponsorLink";
export const PROPERTY_WEB_EXTENSION = "Microsoft.VisualStudio.Code.WebExtension";

export function hasFlag(flags: number, flag: number): boolean {
  return (flags & flag) !== 0;
}

export interface QueryExtensionInput {
  namespace: Namespace;
  extension: Extension;
  /** Already ordered newest first; the first entry supplies display fields */
  versions: readonly ExtensionVersion[];
  files: ReadonlyMap<number, readonly FileResource[]>;
  keyPairs: ReadonlyMap<number, SignatureKeyPair>;
  flags: number;
  serverUrl: string;
  signing: boolean;
}

export function createAssetUri(serverUrl: string, namespace: string, extension: string, version: string): string {
  const segments = [namespace, extension, version].map((segment) => encodeURIComponent(segment));
  return `${serverUrl}/vscode/asset/${segments.join("/")}`;
}

export function buildQueryResult(extensions: QueryExtension[], totalCount: number): ExtensionQueryResult {
  return {
    results: [
      {
        extensions,
        pagingToken: null,
        resultMetadata: [
          {
            metadataType: "ResultCount",
            metadataItems: [{ name: "TotalCount", count: totalCount }],
          },
        ],
      },
    ],
  };
}

export function buildQueryExtension(input: QueryExtensionInput): QueryExtension {
  const { namespace, extension, flags } = input;
  const latest = input.versions[0];

  const queryExtension: QueryExtension = {
    extensionId: extension.publicId,
    extensionName: extension.name,
    displayName: latest?.displayName ?? extension.name,
    shortDescription: latest?.description ?? "",
    publisher: {
      publisherId: namespace.publicId,
      publisherName: namespace.name,
      displayName: namespace.displayName ?? namespace.name,
      domain: null,
      isDomainVerified: false,
    },
    releaseDate: extension.publishedDate,
    publishedDate: extension.publishedDate,
    lastUpdated: extension.lastUpdatedDate,
    flags: latest?.preview === true ? "preview" : "",
    deploymentType: 0,
  };

  if (hasFlag(flags, FLAG_INCLUDE_VERSIONS) || hasFlag(flags, FLAG_INCLUDE_LATEST_VERSION_ONLY)) {
    queryExtension.versions = input.versions.map((version) => buildQueryVersion(input, version));
  }

  if (hasFlag(flags, FLAG_INCLUDE_CATEGORY_AND_TAGS)) {
    queryExtension.categories = [...(latest?.categories ?? [])];
    queryExtension.tags = [...(latest?.tags ?? [])];
  }

  if (hasFlag(flags, FLAG_INCLUDE_STATISTICS)) {
    queryExtension.statistics = buildStatistics(extension);
  }

  return queryExtension;
}

function buildQueryVersion(input: QueryExtensionInput, version: ExtensionVersion): QueryExtensionVersion {
  const assetUri = createAssetUri(input.serverUrl, input.namespace.name, input.extension.name, version.version);

  const queryVersion: QueryExtensionVersion = {
    version: version.version,
    flags: "validated",
    lastUpdated: version.timestamp,
  };

  if (!isUniversal(version.targetPlatform)) {
    queryVersion.targetPlatform = version.targetPlatform;
  }

  if (hasFlag(input.flags, FLAG_INCLUDE_ASSET_URI)) {
    queryVersion.assetUri = assetUri;
    queryVersion.fallbackAssetUri = assetUri;
  }

  if (hasFlag(input.flags, FLAG_INCLUDE_FILES)) {
    queryVersion.files = buildFiles(input, version, assetUri);
  }

  if (hasFlag(input.flags, FLAG_INCLUDE_VERSION_PROPERTIES)) {
    queryVersion.properties = buildProperties(version);
  }

  return queryVersion;
}

function buildFiles(input: QueryExtensionInput, version: ExtensionVersion, assetUri: string): QueryExtensionFile[] {
  const query = isUniversal(version.targetPlatform)
    ? ""
    : `?targetPlatform=${encodeURIComponent(version.targetPlatform)}`;
  const source = (assetType: string): string => `${assetUri}/${assetType}${query}`;

  const stored = input.files.get(version.id) ?? [];
  const files: QueryExtensionFile[] = [];

  for (const type of QUERY_FILE_TYPES) {
    if (type === "download-sig" && !input.signing) {
      continue;
    }

    const assetType = assetTypeForFile(type);
    if (assetType === null || !stored.some((file) => file.type === type)) {
      continue;
    }

    files.push({ assetType, source: source(assetType) });
  }

  if (input.signing && version.signatureKeyPairId !== undefined && input.keyPairs.has(version.signatureKeyPairId)) {
    files.push({ assetType: ASSET_PUBLIC_KEY, source: source(ASSET_PUBLIC_KEY) });
  }

  return files;
}

function buildProperties(version: ExtensionVersion): QueryProperty[] {
  const properties: QueryProperty[] = [];
  const add = (key: string, value: string | undefined): void => {
    if (value !== undefined && value.length > 0) {
      properties.push({ key, value });
    }
  };

  add(PROPERTY_ENGINE, findEngine(version.engines, "vscode"));
  add(PROPERTY_DEPENDENCIES, version.dependencies.join(","));
  add(PROPERTY_EXTENSION_PACK, version.bundledExtensions.join(","));
  add(PROPERTY_LOCALIZED_LANGUAGES, version.localizedLanguages.join(","));
  add(PROPERTY_EXTENSION_KIND, version.extensionKind.join(","));
  add(PROPERTY_PRE_RELEASE, version.preRelease ? "true" : undefined);
  add(PROPERTY_REPOSITORY, version.repository);
  add(PROPERTY_SPONSOR_LINK, version.sponsorLink);
  add(PROPERTY_WEB_EXTENSION, version.targetPlatform === WEB ? "true" : undefined);

  return properties;
}

/** `vscode@^1.31.0` → `^1.31.0` */
export function findEngine(engines: readonly string[], name: string): string | undefined {
  const prefix = `${name}@`;
  const engine = engines.find((entry) => entry.startsWith(prefix));
  return engine?.slice(prefix.length);
}

function buildStatistics(extension: Extension): QueryStatistic[] {
  const statistics: QueryStatistic[] = [{ statisticName: "install", value: extension.downloadCount }];

  if (extension.averageRating !== undefined) {
    statistics.push({ statisticName: "averagerating", value: extension.averageRating });
    statistics.push({ statisticName: "ratingcount", value: extension.reviewCount });
  }

  return statistics;
}
