import { isTargetPlatform } from "./target-platform.js";
import type {
  CatalogDocument,
  CatalogFileEntry,
  CatalogSignatureKeyPair,
  CatalogVersionEntry,
  ExtensionQueryCriterion,
  ExtensionQueryFilter,
  ExtensionQueryParam,
  FileType,
  StorageType,
} from "./types.js";

const FILE_TYPES: readonly FileType[] = [
  "download",
  "download-sig",
  "manifest",
  "icon",
  "readme",
  "license",
  "changelog",
  "vsixmanifest",
  "resource",
];

const STORAGE_TYPES: readonly StorageType[] = ["local", "google-cloud", "azure-blob"];

export function isObjectRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isFileType(value: unknown): value is FileType {
  return typeof value === "string" && FILE_TYPES.some((type) => type === value);
}

export function isStorageType(value: unknown): value is StorageType {
  return typeof value === "string" && STORAGE_TYPES.some((type) => type === value);
}

export function parseString(value: unknown): string | null {
  return typeof value === "string" ? value : null;
}

export function parseStringArray(value: unknown): string[] | null {
  if (!Array.isArray(value)) {
    return null;
  }

  const parsed: string[] = [];
  for (const entry of value) {
    if (typeof entry !== "string") {
      return null;
    }

    parsed.push(entry);
  }

  return parsed;
}

function parseOptionalInteger(value: unknown): number | undefined | null {
  if (value === undefined || value === null) {
    return undefined;
  }

  if (typeof value !== "number" || !Number.isInteger(value)) {
    return null;
  }

  return value;
}

export function parseExtensionQueryParam(value: unknown): ExtensionQueryParam | null {
  if (!isObjectRecord(value)) {
    return null;
  }

  const flags = parseOptionalInteger(value.flags);
  if (flags === null) {
    return null;
  }

  const param: ExtensionQueryParam = {
    filters: [],
    flags: flags ?? 0,
  };

  if ("filters" in value && value.filters !== null) {
    if (!Array.isArray(value.filters)) {
      return null;
    }

    for (const entry of value.filters) {
      const filter = parseQueryFilter(entry);
      if (filter === null) {
        return null;
      }

      param.filters.push(filter);
    }
  }

  if ("assetTypes" in value && value.assetTypes !== null) {
    const assetTypes = parseStringArray(value.assetTypes);
    if (assetTypes === null) {
      return null;
    }

    param.assetTypes = assetTypes;
  }

  return param;
}

function parseQueryFilter(value: unknown): ExtensionQueryFilter | null {
  if (!isObjectRecord(value)) {
    return null;
  }

  const filter: ExtensionQueryFilter = { criteria: [] };

  if ("criteria" in value && value.criteria !== null) {
    if (!Array.isArray(value.criteria)) {
      return null;
    }

    for (const entry of value.criteria) {
      const criterion = parseQueryCriterion(entry);
      if (criterion === null) {
        return null;
      }

      filter.criteria.push(criterion);
    }
  }

  const pageNumber = parseOptionalInteger(value.pageNumber);
  const pageSize = parseOptionalInteger(value.pageSize);
  const sortBy = parseOptionalInteger(value.sortBy);
  const sortOrder = parseOptionalInteger(value.sortOrder);
  if (pageNumber === null || pageSize === null || sortBy === null || sortOrder === null) {
    return null;
  }

  filter.pageNumber = pageNumber;
  filter.pageSize = pageSize;
  filter.sortBy = sortBy;
  filter.sortOrder = sortOrder;

  return filter;
}

function parseQueryCriterion(value: unknown): ExtensionQueryCriterion | null {
  if (!isObjectRecord(value)) {
    return null;
  }

  const filterType = parseOptionalInteger(value.filterType);
  if (filterType === null || filterType === undefined) {
    return null;
  }

  if (value.value === undefined || value.value === null) {
    return { filterType };
  }

  const criterionValue = parseString(value.value);
  if (criterionValue === null) {
    return null;
  }

  return { filterType, value: criterionValue };
}

// Catalog documents

export interface CatalogIssue {
  field: string;
  message: string;
}

class IssueCollector {
  readonly issues: CatalogIssue[] = [];

  add(field: string, message: string): void {
    this.issues.push({ field, message });
  }

  requireString(record: Record<string, unknown>, key: string, path: string): string {
    const value = record[key];
    if (typeof value !== "string" || value.length === 0) {
      this.add(`${path}.${key}`, "must be a non-empty string");
      return "";
    }

    return value;
  }

  optionalString(record: Record<string, unknown>, key: string, path: string): string | undefined {
    const value = record[key];
    if (value === undefined) {
      return undefined;
    }

    if (typeof value !== "string") {
      this.add(`${path}.${key}`, "must be a string");
      return undefined;
    }

    return value;
  }

  optionalBoolean(record: Record<string, unknown>, key: string, path: string): boolean | undefined {
    const value = record[key];
    if (value === undefined) {
      return undefined;
    }

    if (typeof value !== "boolean") {
      this.add(`${path}.${key}`, "must be a boolean");
      return undefined;
    }

    return value;
  }

  optionalNumber(record: Record<string, unknown>, key: string, path: string): number | undefined {
    const value = record[key];
    if (value === undefined) {
      return undefined;
    }

    if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
      this.add(`${path}.${key}`, "must be a non-negative number");
      return undefined;
    }

    return value;
  }

  optionalStringArray(record: Record<string, unknown>, key: string, path: string): string[] | undefined {
    const value = record[key];
    if (value === undefined) {
      return undefined;
    }

    const parsed = parseStringArray(value);
    if (parsed === null) {
      this.add(`${path}.${key}`, "must be an array of strings");
      return undefined;
    }

    return parsed;
  }

  requireTimestamp(record: Record<string, unknown>, key: string, path: string): string {
    const value = this.requireString(record, key, path);
    if (value.length > 0 && Number.isNaN(Date.parse(value))) {
      this.add(`${path}.${key}`, "must be an ISO-8601 timestamp");
    }

    return value;
  }
}

/**
 * Lists every problem found in a catalog document; an empty list means
 * {@link parseCatalogDocument} accepts it.
 */
export function collectCatalogIssues(value: unknown): CatalogIssue[] {
  return readCatalogDocument(value).issues;
}

export function parseCatalogDocument(value: unknown): CatalogDocument | null {
  const { document, issues } = readCatalogDocument(value);
  return issues.length === 0 ? document : null;
}

function readCatalogDocument(value: unknown): { document: CatalogDocument | null; issues: CatalogIssue[] } {
  const collector = new IssueCollector();

  if (!isObjectRecord(value)) {
    collector.add("$", "must be an object");
    return { document: null, issues: collector.issues };
  }

  if (!isObjectRecord(value.namespace)) {
    collector.add("namespace", "must be an object");
  }

  if (!isObjectRecord(value.extension)) {
    collector.add("extension", "must be an object");
  }

  if (!Array.isArray(value.versions)) {
    collector.add("versions", "must be an array");
  }

  if (!isObjectRecord(value.namespace) || !isObjectRecord(value.extension) || !Array.isArray(value.versions)) {
    return { document: null, issues: collector.issues };
  }

  const namespace = value.namespace;
  const extension = value.extension;

  const document: CatalogDocument = {
    namespace: {
      publicId: collector.requireString(namespace, "publicId", "namespace"),
      name: collector.requireString(namespace, "name", "namespace"),
      displayName: collector.optionalString(namespace, "displayName", "namespace"),
      verified: collector.optionalBoolean(namespace, "verified", "namespace"),
    },
    extension: {
      publicId: collector.requireString(extension, "publicId", "extension"),
      name: collector.requireString(extension, "name", "extension"),
      averageRating: collector.optionalNumber(extension, "averageRating", "extension"),
      reviewCount: collector.optionalNumber(extension, "reviewCount", "extension"),
      downloadCount: collector.optionalNumber(extension, "downloadCount", "extension"),
      publishedDate: collector.requireTimestamp(extension, "publishedDate", "extension"),
      lastUpdatedDate: collector.requireTimestamp(extension, "lastUpdatedDate", "extension"),
    },
    versions: [],
  };

  const seenBuilds = new Set<string>();
  value.versions.forEach((entry, index) => {
    const version = readVersionEntry(entry, `versions[${index}]`, collector);
    if (version === null) {
      return;
    }

    const build = `${version.version}@${version.targetPlatform ?? "universal"}`;
    if (seenBuilds.has(build)) {
      collector.add(`versions[${index}]`, `duplicate build ${build}`);
      return;
    }

    seenBuilds.add(build);
    document.versions.push(version);
  });

  return { document, issues: collector.issues };
}

function readVersionEntry(value: unknown, path: string, collector: IssueCollector): CatalogVersionEntry | null {
  if (!isObjectRecord(value)) {
    collector.add(path, "must be an object");
    return null;
  }

  let targetPlatform: CatalogVersionEntry["targetPlatform"];
  if (value.targetPlatform !== undefined) {
    if (isTargetPlatform(value.targetPlatform)) {
      targetPlatform = value.targetPlatform;
    } else {
      collector.add(`${path}.targetPlatform`, "must be a known target platform");
    }
  }

  const entry: CatalogVersionEntry = {
    version: collector.requireString(value, "version", path),
    targetPlatform,
    active: collector.optionalBoolean(value, "active", path),
    preRelease: collector.optionalBoolean(value, "preRelease", path),
    preview: collector.optionalBoolean(value, "preview", path),
    timestamp: collector.requireTimestamp(value, "timestamp", path),
    displayName: collector.optionalString(value, "displayName", path),
    description: collector.optionalString(value, "description", path),
    engines: collector.optionalStringArray(value, "engines", path),
    categories: collector.optionalStringArray(value, "categories", path),
    tags: collector.optionalStringArray(value, "tags", path),
    extensionKind: collector.optionalStringArray(value, "extensionKind", path),
    repository: collector.optionalString(value, "repository", path),
    homepage: collector.optionalString(value, "homepage", path),
    license: collector.optionalString(value, "license", path),
    sponsorLink: collector.optionalString(value, "sponsorLink", path),
    localizedLanguages: collector.optionalStringArray(value, "localizedLanguages", path),
    dependencies: collector.optionalStringArray(value, "dependencies", path),
    bundledExtensions: collector.optionalStringArray(value, "bundledExtensions", path),
  };

  if (value.signatureKeyPair !== undefined) {
    const keyPair = readSignatureKeyPair(value.signatureKeyPair, `${path}.signatureKeyPair`, collector);
    if (keyPair !== null) {
      entry.signatureKeyPair = keyPair;
    }
  }

  if (value.files !== undefined) {
    if (!Array.isArray(value.files)) {
      collector.add(`${path}.files`, "must be an array");
    } else {
      entry.files = [];
      value.files.forEach((file, index) => {
        const parsed = readFileEntry(file, `${path}.files[${index}]`, collector);
        if (parsed !== null) {
          entry.files?.push(parsed);
        }
      });
    }
  }

  return entry;
}

function readSignatureKeyPair(value: unknown, path: string, collector: IssueCollector): CatalogSignatureKeyPair | null {
  if (!isObjectRecord(value)) {
    collector.add(path, "must be an object");
    return null;
  }

  return {
    publicId: collector.requireString(value, "publicId", path),
    publicKeyText: collector.requireString(value, "publicKeyText", path),
    active: collector.optionalBoolean(value, "active", path),
  };
}

function readFileEntry(value: unknown, path: string, collector: IssueCollector): CatalogFileEntry | null {
  if (!isObjectRecord(value)) {
    collector.add(path, "must be an object");
    return null;
  }

  const name = collector.requireString(value, "name", path);

  if (!isFileType(value.type)) {
    collector.add(`${path}.type`, `must be one of ${FILE_TYPES.join(", ")}`);
    return null;
  }

  const entry: CatalogFileEntry = { name, type: value.type };

  if (value.storageType !== undefined) {
    if (!isStorageType(value.storageType)) {
      collector.add(`${path}.storageType`, `must be one of ${STORAGE_TYPES.join(", ")}`);
      return null;
    }

    entry.storageType = value.storageType;
  }

  return entry;
}
