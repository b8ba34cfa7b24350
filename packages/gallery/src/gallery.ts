import { ASSET_VSIX, parseAssetRequest, QUERY_FILE_TYPES, WEB_RESOURCE_ROOT } from "./asset-types.js";
import { BadRequestError, NotFoundError, builtInNamespaceError } from "./errors.js";
import type { Logger } from "./logger.js";
import {
  FILTER_CATEGORY,
  FILTER_EXTENSION_ID,
  FILTER_EXTENSION_NAME,
  FILTER_SEARCH_TEXT,
  FILTER_TAG,
  FILTER_TARGET,
  FLAG_INCLUDE_ASSET_URI,
  FLAG_INCLUDE_CATEGORY_AND_TAGS,
  FLAG_INCLUDE_FILES,
  FLAG_INCLUDE_LATEST_VERSION_ONLY,
  FLAG_INCLUDE_STATISTICS,
  FLAG_INCLUDE_VERSION_PROPERTIES,
  SORT_BY_AVERAGE_RATING,
  SORT_BY_INSTALL_COUNT,
  SORT_BY_PUBLISHED_DATE,
  SORT_ORDER_ASCENDING,
  buildQueryExtension,
  buildQueryResult,
  hasFlag,
} from "./query-result.js";
import type { GalleryRepository } from "./repository.js";
import type { SearchService, SearchSortBy } from "./search.js";
import type { StorageService, StoredFile } from "./storage.js";
import { isTargetPlatform, parseTargetPlatform, type TargetPlatformName } from "./target-platform.js";
import type {
  Extension,
  ExtensionQueryFilter,
  ExtensionQueryParam,
  ExtensionQueryResult,
  ExtensionVersion,
  FileResource,
  GallerySettings,
  QueryExtension,
  SignatureKeyPair,
} from "./types.js";
import { countExtensions, type UpstreamGallery } from "./upstream.js";
import { latestPerTargetPlatform } from "./versions.js";

export const DEFAULT_GALLERY_SETTINGS: Readonly<GallerySettings> = {
  builtInNamespace: "vscode",
  maxPageSize: 100,
  defaultPageSize: 50,
  signing: false,
  webUiUrl: "",
};

const LATEST_FLAGS =
  FLAG_INCLUDE_FILES |
  FLAG_INCLUDE_CATEGORY_AND_TAGS |
  FLAG_INCLUDE_VERSION_PROPERTIES |
  FLAG_INCLUDE_ASSET_URI |
  FLAG_INCLUDE_STATISTICS |
  FLAG_INCLUDE_LATEST_VERSION_ONLY;

export const ITEM_NAME_MESSAGE = "Expecting an item of the form `{publisher}.{name}`";

export type BrowseResult = { kind: "file"; file: StoredFile } | { kind: "listing"; urls: string[] };

export interface GalleryServiceOptions {
  repository: GalleryRepository;
  search: SearchService;
  storage: StorageService;
  upstream?: UpstreamGallery;
  settings?: Partial<GallerySettings>;
  logger?: Logger;
}

interface ExtensionPage {
  extensions: Extension[];
  /** Hits reported by search; `undefined` for id and name lookups */
  totalHits?: number;
}

/**
 * Answers the VS Code gallery protocol from the local catalog, falling back
 * to the upstream gallery when one is configured.
 */
export class GalleryService {
  readonly settings: Readonly<GallerySettings>;

  private readonly repository: GalleryRepository;

  private readonly search: SearchService;

  private readonly storage: StorageService;

  private readonly upstream?: UpstreamGallery;

  private readonly logger?: Logger;

  constructor(options: GalleryServiceOptions) {
    this.repository = options.repository;
    this.search = options.search;
    this.storage = options.storage;
    this.upstream = options.upstream;
    this.logger = options.logger;
    this.settings = { ...DEFAULT_GALLERY_SETTINGS, ...options.settings };
  }

  async extensionQuery(param: ExtensionQueryParam, serverUrl: string): Promise<ExtensionQueryResult> {
    const filter: ExtensionQueryFilter = param.filters[0] ?? { criteria: [] };
    const targetPlatform = criterionValues(filter, FILTER_TARGET).find(isTargetPlatform);

    const page = await this.findExtensions(filter, targetPlatform);
    const extensions = await this.toQueryExtensions(page.extensions, param.flags, targetPlatform, serverUrl);
    const result = buildQueryResult(extensions, page.totalHits ?? extensions.length);

    if (extensions.length === 0 && this.upstream !== undefined) {
      const upstreamResult = await this.upstream.extensionQuery(param);
      if (upstreamResult !== null) {
        this.logger?.debug("Extension query answered by upstream", {
          extensions: countExtensions(upstreamResult),
        });
        return upstreamResult;
      }
    }

    return result;
  }

  async getLatest(namespaceName: string, extensionName: string, serverUrl: string): Promise<QueryExtension> {
    this.assertNotBuiltIn(namespaceName);

    const extension = await this.repository.findActiveExtension(extensionName, namespaceName);
    if (extension === null) {
      throw new NotFoundError(`Extension not found: ${namespaceName}.${extensionName}`);
    }

    const [queryExtension] = await this.toQueryExtensions([extension], LATEST_FLAGS, undefined, serverUrl);
    if (queryExtension === undefined) {
      throw new NotFoundError(`Extension not found: ${namespaceName}.${extensionName}`);
    }

    return queryExtension;
  }

  async getItemUrl(itemName: string | null): Promise<string> {
    const parts = itemName?.split(".") ?? [];
    const [namespaceName, extensionName] = parts;
    if (parts.length !== 2 || namespaceName === undefined || extensionName === undefined) {
      throw new BadRequestError(ITEM_NAME_MESSAGE);
    }
    if (namespaceName.length === 0 || extensionName.length === 0) {
      throw new BadRequestError(ITEM_NAME_MESSAGE);
    }

    this.assertNotBuiltIn(namespaceName);

    const extension = await this.repository.findActiveExtension(extensionName, namespaceName);
    if (extension !== null) {
      const namespace = await this.repository.findNamespace(extension.namespaceId);
      const segments = [namespace?.name ?? namespaceName, extension.name].map((segment) =>
        encodeURIComponent(segment),
      );
      return `${this.settings.webUiUrl}/extension/${segments.join("/")}`;
    }

    const upstreamUrl = await this.upstream?.getItemUrl(namespaceName, extensionName);
    if (upstreamUrl !== undefined && upstreamUrl !== null) {
      return upstreamUrl;
    }

    throw new NotFoundError(`Extension not found: ${itemName}`);
  }

  async getDownloadUrl(
    namespaceName: string,
    extensionName: string,
    version: string,
    targetPlatformParam: string | null,
    serverUrl: string,
  ): Promise<string> {
    this.assertNotBuiltIn(namespaceName);

    const targetPlatform = parseTargetPlatform(targetPlatformParam);
    const resolved =
      targetPlatform === null
        ? null
        : await this.repository.findVersion(version, targetPlatform, extensionName, namespaceName);

    if (resolved !== null && resolved.extension.active && resolved.version.active) {
      const segments = [resolved.namespace.name, resolved.extension.name, resolved.version.version].map((segment) =>
        encodeURIComponent(segment),
      );
      let location = `${serverUrl}/vscode/asset/${segments.join("/")}/${ASSET_VSIX}`;
      if (targetPlatformParam !== null && targetPlatformParam.length > 0) {
        location += `?targetPlatform=${encodeURIComponent(resolved.version.targetPlatform)}`;
      }
      return location;
    }

    const upstreamUrl = await this.upstream?.getDownloadUrl(
      namespaceName,
      extensionName,
      version,
      targetPlatformParam ?? undefined,
    );
    if (upstreamUrl !== undefined && upstreamUrl !== null) {
      return upstreamUrl;
    }

    throw new NotFoundError(`Extension version not found: ${namespaceName}.${extensionName}@${version}`);
  }

  async getAsset(
    namespaceName: string,
    extensionName: string,
    version: string,
    assetPath: string,
    targetPlatformParam: string | null,
    countDownload = true,
  ): Promise<StoredFile> {
    this.assertNotBuiltIn(namespaceName);

    const notFound = new NotFoundError(`Asset not found: ${assetPath}`);
    const targetPlatform = parseTargetPlatform(targetPlatformParam);
    if (targetPlatform === null) {
      throw notFound;
    }

    const request = parseAssetRequest(assetPath);

    if (request.kind === "public-key") {
      const resolved = await this.repository.findVersion(version, targetPlatform, extensionName, namespaceName);
      const keyPairId = resolved?.version.signatureKeyPairId;
      if (!this.settings.signing || keyPairId === undefined || !resolved?.version.active) {
        throw notFound;
      }

      const keyPair = await this.repository.findSignatureKeyPair(keyPairId);
      if (keyPair === null) {
        throw notFound;
      }

      return { kind: "content", data: new TextEncoder().encode(keyPair.publicKeyText), contentType: "text/plain" };
    }

    if (request.kind === "unknown") {
      throw notFound;
    }

    if (request.kind === "web-resource" && !request.path.startsWith(WEB_RESOURCE_ROOT)) {
      throw notFound;
    }

    if (request.kind === "file" && request.fileType === "download-sig" && !this.settings.signing) {
      throw notFound;
    }

    const resource =
      request.kind === "web-resource"
        ? await this.repository.findFileByTypeAndName(
            namespaceName,
            extensionName,
            targetPlatform,
            version,
            "resource",
            request.path,
          )
        : await this.repository.findFileByType(namespaceName, extensionName, targetPlatform, version, request.fileType);

    if (resource === null || !resource.extension.active || !resource.version.active) {
      throw notFound;
    }

    const file = await this.storage.getFile(resource);
    if (file === null) {
      throw notFound;
    }

    if (countDownload && resource.file.type === "download") {
      await this.repository.increaseDownloadCount(resource.extension);
    }

    return file;
  }

  async browse(
    namespaceName: string,
    extensionName: string,
    version: string,
    path: string,
    serverUrl: string,
  ): Promise<BrowseResult> {
    this.assertNotBuiltIn(namespaceName);

    const notFound = new NotFoundError(`Not found: ${namespaceName}/${extensionName}/${version}/${path}`);
    const resolved = await this.repository.findActiveExtensionVersion(version, extensionName, namespaceName);
    if (resolved === null) {
      throw notFound;
    }

    const normalized = path.endsWith("/") ? path.slice(0, -1) : path;
    const resources = await this.repository.findResourceFileResources(resolved, normalized);

    const [single] = resources;
    if (resources.length === 1 && single !== undefined && single.file.name === normalized) {
      const file = await this.storage.getFile(single);
      if (file === null) {
        throw notFound;
      }
      return { kind: "file", file };
    }

    if (resources.length === 0) {
      throw notFound;
    }

    const base = [resolved.namespace.name, resolved.extension.name, resolved.version.version]
      .map((segment) => encodeURIComponent(segment))
      .join("/");
    const prefix = normalized.length > 0 ? `${normalized}/` : "";
    const entries: string[] = [];

    for (const resource of resources) {
      if (!resource.file.name.startsWith(prefix)) {
        continue;
      }

      const relative = resource.file.name.slice(prefix.length);
      const slash = relative.indexOf("/");
      const entry = prefix + (slash === -1 ? relative : relative.slice(0, slash + 1));
      if (!entries.includes(entry)) {
        entries.push(entry);
      }
    }

    return {
      kind: "listing",
      urls: entries.map((entry) => `${serverUrl}/vscode/unpkg/${base}/${encodePath(entry)}`),
    };
  }

  private assertNotBuiltIn(namespaceName: string): void {
    if (namespaceName.toLowerCase() === this.settings.builtInNamespace.toLowerCase()) {
      throw builtInNamespaceError(this.settings.builtInNamespace);
    }
  }

  private async findExtensions(
    filter: ExtensionQueryFilter,
    targetPlatform: TargetPlatformName | undefined,
  ): Promise<ExtensionPage> {
    const ids = unique(criterionValues(filter, FILTER_EXTENSION_ID));
    if (ids.length > 0) {
      return { extensions: await this.repository.findActiveExtensionsByPublicId(ids, this.settings.builtInNamespace) };
    }

    const names = unique(criterionValues(filter, FILTER_EXTENSION_NAME));
    if (names.length > 0) {
      return { extensions: await this.findByNames(names) };
    }

    if (!this.search.isEnabled()) {
      return { extensions: [], totalHits: 0 };
    }

    const pageSize = this.pageSize(filter.pageSize);
    const pageNumber = Math.max(1, filter.pageNumber ?? 1);

    const result = await this.search.search({
      queryString: criterionValues(filter, FILTER_SEARCH_TEXT)[0],
      category: criterionValues(filter, FILTER_CATEGORY)[0],
      tags: unique(criterionValues(filter, FILTER_TAG)),
      targetPlatform,
      requestedSize: pageSize,
      requestedOffset: (pageNumber - 1) * pageSize,
      sortOrder: filter.sortOrder === SORT_ORDER_ASCENDING ? "asc" : "desc",
      sortBy: toSortBy(filter.sortBy),
      includeAllVersions: false,
      namespacesToExclude: [this.settings.builtInNamespace],
    });

    const extensions = await this.repository.findActiveExtensionsById(result.hits.map((hit) => hit.id));
    return { extensions, totalHits: result.totalHits };
  }

  private async findByNames(names: readonly string[]): Promise<Extension[]> {
    const found: Extension[] = [];

    for (const name of names) {
      const parts = name.split(".");
      const [namespaceName, extensionName] = parts;
      if (parts.length !== 2 || namespaceName === undefined || extensionName === undefined) {
        continue;
      }
      if (namespaceName.toLowerCase() === this.settings.builtInNamespace.toLowerCase()) {
        continue;
      }

      const extension = await this.repository.findActiveExtension(extensionName, namespaceName);
      if (extension !== null && !found.some((entry) => entry.id === extension.id)) {
        found.push(extension);
      }
    }

    return found;
  }

  private pageSize(requested: number | undefined): number {
    if (requested === undefined || requested <= 0) {
      return this.settings.defaultPageSize;
    }

    return Math.min(requested, this.settings.maxPageSize);
  }

  private async toQueryExtensions(
    extensions: readonly Extension[],
    flags: number,
    targetPlatform: TargetPlatformName | undefined,
    serverUrl: string,
  ): Promise<QueryExtension[]> {
    if (extensions.length === 0) {
      return [];
    }

    const allVersions = await this.repository.findActiveExtensionVersions(
      extensions.map((extension) => extension.id),
      targetPlatform,
    );
    const versionsByExtension = groupBy(allVersions, (version) => version.extensionId);

    const selected = new Map<number, ExtensionVersion[]>();
    for (const [extensionId, versions] of versionsByExtension) {
      selected.set(
        extensionId,
        hasFlag(flags, FLAG_INCLUDE_LATEST_VERSION_ONLY) ? latestPerTargetPlatform(versions) : versions,
      );
    }

    const versionIds = [...selected.values()].flat().map((version) => version.id);
    const files = hasFlag(flags, FLAG_INCLUDE_FILES)
      ? groupBy(
          await this.repository.findFileResourcesByExtensionVersionIdAndType(versionIds, QUERY_FILE_TYPES),
          (file: FileResource) => file.extensionVersionId,
        )
      : new Map<number, FileResource[]>();
    const keyPairs = await this.loadKeyPairs([...selected.values()].flat());

    const results: QueryExtension[] = [];
    for (const extension of extensions) {
      const versions = selected.get(extension.id);
      const namespace = await this.repository.findNamespace(extension.namespaceId);
      if (versions === undefined || versions.length === 0 || namespace === null) {
        continue;
      }

      results.push(
        buildQueryExtension({
          namespace,
          extension,
          versions,
          files,
          keyPairs,
          flags,
          serverUrl,
          signing: this.settings.signing,
        }),
      );
    }

    return results;
  }

  private async loadKeyPairs(versions: readonly ExtensionVersion[]): Promise<Map<number, SignatureKeyPair>> {
    const keyPairs = new Map<number, SignatureKeyPair>();
    if (!this.settings.signing) {
      return keyPairs;
    }

    for (const version of versions) {
      const id = version.signatureKeyPairId;
      if (id === undefined || keyPairs.has(id)) {
        continue;
      }

      const keyPair = await this.repository.findSignatureKeyPair(id);
      if (keyPair !== null) {
        keyPairs.set(id, keyPair);
      }
    }

    return keyPairs;
  }
}

function criterionValues(filter: ExtensionQueryFilter, filterType: number): string[] {
  const values: string[] = [];
  for (const criterion of filter.criteria) {
    if (criterion.filterType === filterType && criterion.value !== undefined && criterion.value.length > 0) {
      values.push(criterion.value);
    }
  }
  return values;
}

function toSortBy(sortBy: number | undefined): SearchSortBy {
  switch (sortBy) {
    case SORT_BY_INSTALL_COUNT:
      return "downloadCount";
    case SORT_BY_PUBLISHED_DATE:
      return "timestamp";
    case SORT_BY_AVERAGE_RATING:
      return "rating";
    default:
      return "relevance";
  }
}

function unique(values: readonly string[]): string[] {
  return [...new Set(values)];
}

function groupBy<T>(items: readonly T[], key: (item: T) => number): Map<number, T[]> {
  const groups = new Map<number, T[]>();
  for (const item of items) {
    const group = groups.get(key(item));
    if (group === undefined) {
      groups.set(key(item), [item]);
    } else {
      group.push(item);
    }
  }
  return groups;
}

/** Encodes each segment, keeping separators and a trailing slash. */
function encodePath(value: string): string {
  return value
    .split("/")
    .map((segment) => encodeURIComponent(segment))
    .join("/");
}
