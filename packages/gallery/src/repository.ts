import { CatalogError } from "./errors.js";
import { UNIVERSAL, type TargetPlatformName } from "./target-platform.js";
import type {
  CatalogDocument,
  CatalogVersionEntry,
  Extension,
  ExtensionVersion,
  FileResource,
  FileType,
  Namespace,
  ResolvedExtensionVersion,
  ResolvedFileResource,
  SignatureKeyPair,
} from "./types.js";
import { compareExtensionVersions, sortExtensionVersions } from "./versions.js";

/**
 * Read access to the catalog, shaped after the lookups the gallery endpoints make.
 * Every `findActive*` query ignores inactive extensions and versions.
 */
export interface GalleryRepository {
  findNamespace(id: number): Promise<Namespace | null>;
  findExtension(id: number): Promise<Extension | null>;
  findActiveExtension(name: string, namespace: string): Promise<Extension | null>;
  /** Keeps the order of `ids`; unknown and inactive ids are dropped */
  findActiveExtensionsById(ids: readonly number[]): Promise<Extension[]>;
  findActiveExtensionsByPublicId(publicIds: readonly string[], excludeNamespace?: string): Promise<Extension[]>;
  listActiveExtensions(): Promise<Extension[]>;
  /** All active versions of the given extensions, newest first; filtered when a platform is given */
  findActiveExtensionVersions(extensionIds: readonly number[], targetPlatform?: TargetPlatformName): Promise<ExtensionVersion[]>;
  /** One build of `version`; the universal build wins over platform-specific ones */
  findActiveExtensionVersion(version: string, name: string, namespace: string): Promise<ResolvedExtensionVersion | null>;
  findVersion(
    version: string,
    targetPlatform: TargetPlatformName,
    name: string,
    namespace: string,
  ): Promise<ResolvedExtensionVersion | null>;
  findFileByType(
    namespace: string,
    name: string,
    targetPlatform: TargetPlatformName,
    version: string,
    type: FileType,
  ): Promise<ResolvedFileResource | null>;
  findFileByTypeAndName(
    namespace: string,
    name: string,
    targetPlatform: TargetPlatformName,
    version: string,
    type: FileType,
    fileName: string,
  ): Promise<ResolvedFileResource | null>;
  findFileResourcesByExtensionVersionIdAndType(
    versionIds: readonly number[],
    types: readonly FileType[],
  ): Promise<FileResource[]>;
  /** `resource` files named `prefix` or living below `prefix/`; an empty prefix matches all */
  findResourceFileResources(version: ResolvedExtensionVersion, prefix: string): Promise<ResolvedFileResource[]>;
  findSignatureKeyPair(id: number): Promise<SignatureKeyPair | null>;
  increaseDownloadCount(extension: Extension): Promise<void>;
}

/**
 * Catalog held in maps. The file-backed repository fills one of these at start-up;
 * tests build it directly from catalog documents.
 */
export class InMemoryGalleryRepository implements GalleryRepository {
  private readonly namespaces = new Map<number, Namespace>();

  private readonly extensions = new Map<number, Extension>();

  private readonly versions = new Map<number, ExtensionVersion>();

  private readonly files = new Map<number, FileResource>();

  private readonly keyPairs = new Map<number, SignatureKeyPair>();

  private nextId = 1;

  constructor(documents: readonly CatalogDocument[] = []) {
    for (const document of documents) {
      this.importDocument(document);
    }
  }

  /**
   * Adds one catalog document, reusing a namespace or key pair already known by name or public id.
   * Returns the extension record.
   */
  importDocument(document: CatalogDocument, source?: string): Extension {
    const namespace = this.upsertNamespace(document.namespace);

    if (this.findExtensionByName(document.extension.name, namespace.name) !== undefined) {
      throw new CatalogError(`Extension ${namespace.name}.${document.extension.name} is defined twice`, {
        source,
        field: "extension.name",
      });
    }

    const extension: Extension = {
      id: this.allocateId(),
      publicId: document.extension.publicId,
      namespaceId: namespace.id,
      name: document.extension.name,
      active: false,
      averageRating: document.extension.averageRating,
      reviewCount: document.extension.reviewCount ?? 0,
      downloadCount: document.extension.downloadCount ?? 0,
      publishedDate: document.extension.publishedDate,
      lastUpdatedDate: document.extension.lastUpdatedDate,
    };
    this.extensions.set(extension.id, extension);

    for (const entry of document.versions) {
      const version = this.addVersion(extension, entry);
      if (version.active) {
        extension.active = true;
      }
    }

    return extension;
  }

  /** Rebuilds the catalog document of one extension, e.g. to persist a changed download count. */
  exportDocument(extensionId: number): CatalogDocument | null {
    const extension = this.extensions.get(extensionId);
    if (extension === undefined) {
      return null;
    }

    const namespace = this.namespaces.get(extension.namespaceId);
    if (namespace === undefined) {
      return null;
    }

    const versions = sortExtensionVersions(
      [...this.versions.values()].filter((version) => version.extensionId === extension.id),
    );

    return {
      namespace: {
        publicId: namespace.publicId,
        name: namespace.name,
        displayName: namespace.displayName,
        verified: namespace.verified,
      },
      extension: {
        publicId: extension.publicId,
        name: extension.name,
        averageRating: extension.averageRating,
        reviewCount: extension.reviewCount,
        downloadCount: extension.downloadCount,
        publishedDate: extension.publishedDate,
        lastUpdatedDate: extension.lastUpdatedDate,
      },
      versions: versions.map((version) => this.exportVersion(version)),
    };
  }

  async findNamespace(id: number): Promise<Namespace | null> {
    return this.namespaces.get(id) ?? null;
  }

  async findExtension(id: number): Promise<Extension | null> {
    return this.extensions.get(id) ?? null;
  }

  async findActiveExtension(name: string, namespace: string): Promise<Extension | null> {
    const extension = this.findExtensionByName(name, namespace);
    return extension !== undefined && extension.active ? extension : null;
  }

  async findActiveExtensionsById(ids: readonly number[]): Promise<Extension[]> {
    const found: Extension[] = [];
    for (const id of ids) {
      const extension = this.extensions.get(id);
      if (extension !== undefined && extension.active) {
        found.push(extension);
      }
    }

    return found;
  }

  async findActiveExtensionsByPublicId(publicIds: readonly string[], excludeNamespace?: string): Promise<Extension[]> {
    const wanted = new Set(publicIds);
    const excluded = excludeNamespace?.toLowerCase();

    return [...this.extensions.values()].filter((extension) => {
      if (!extension.active || !wanted.has(extension.publicId)) {
        return false;
      }

      const namespace = this.namespaces.get(extension.namespaceId);
      return namespace !== undefined && namespace.name.toLowerCase() !== excluded;
    });
  }

  async listActiveExtensions(): Promise<Extension[]> {
    return [...this.extensions.values()].filter((extension) => extension.active);
  }

  async findActiveExtensionVersions(
    extensionIds: readonly number[],
    targetPlatform?: TargetPlatformName,
  ): Promise<ExtensionVersion[]> {
    const wanted = new Set(extensionIds);
    const matching = [...this.versions.values()].filter(
      (version) =>
        version.active &&
        wanted.has(version.extensionId) &&
        (targetPlatform === undefined || version.targetPlatform === targetPlatform),
    );

    return sortExtensionVersions(matching);
  }

  async findActiveExtensionVersion(
    version: string,
    name: string,
    namespace: string,
  ): Promise<ResolvedExtensionVersion | null> {
    const extension = this.findExtensionByName(name, namespace);
    if (extension === undefined || !extension.active) {
      return null;
    }

    const builds = [...this.versions.values()]
      .filter((entry) => entry.active && entry.extensionId === extension.id && entry.version === version)
      .sort(compareExtensionVersions);

    const build = builds[0];
    return build === undefined ? null : this.resolve(build);
  }

  async findVersion(
    version: string,
    targetPlatform: TargetPlatformName,
    name: string,
    namespace: string,
  ): Promise<ResolvedExtensionVersion | null> {
    const extension = this.findExtensionByName(name, namespace);
    if (extension === undefined) {
      return null;
    }

    for (const entry of this.versions.values()) {
      if (entry.extensionId === extension.id && entry.version === version && entry.targetPlatform === targetPlatform) {
        return this.resolve(entry);
      }
    }

    return null;
  }

  async findFileByType(
    namespace: string,
    name: string,
    targetPlatform: TargetPlatformName,
    version: string,
    type: FileType,
  ): Promise<ResolvedFileResource | null> {
    return this.findFile(namespace, name, targetPlatform, version, (file) => file.type === type);
  }

  async findFileByTypeAndName(
    namespace: string,
    name: string,
    targetPlatform: TargetPlatformName,
    version: string,
    type: FileType,
    fileName: string,
  ): Promise<ResolvedFileResource | null> {
    return this.findFile(
      namespace,
      name,
      targetPlatform,
      version,
      (file) => file.type === type && file.name === fileName,
    );
  }

  async findFileResourcesByExtensionVersionIdAndType(
    versionIds: readonly number[],
    types: readonly FileType[],
  ): Promise<FileResource[]> {
    const wantedVersions = new Set(versionIds);
    const wantedTypes = new Set(types);

    return [...this.files.values()].filter(
      (file) => wantedVersions.has(file.extensionVersionId) && wantedTypes.has(file.type),
    );
  }

  async findResourceFileResources(version: ResolvedExtensionVersion, prefix: string): Promise<ResolvedFileResource[]> {
    const resources: ResolvedFileResource[] = [];

    for (const file of this.files.values()) {
      if (file.extensionVersionId !== version.version.id || file.type !== "resource") {
        continue;
      }

      if (prefix.length === 0 || file.name === prefix || file.name.startsWith(`${prefix}/`)) {
        resources.push({ ...version, file });
      }
    }

    return resources;
  }

  async findSignatureKeyPair(id: number): Promise<SignatureKeyPair | null> {
    return this.keyPairs.get(id) ?? null;
  }

  async increaseDownloadCount(extension: Extension): Promise<void> {
    const stored = this.extensions.get(extension.id);
    if (stored === undefined) {
      return;
    }

    stored.downloadCount += 1;
  }

  private allocateId(): number {
    const id = this.nextId;
    this.nextId += 1;
    return id;
  }

  private upsertNamespace(input: CatalogDocument["namespace"]): Namespace {
    for (const namespace of this.namespaces.values()) {
      if (namespace.name.toLowerCase() === input.name.toLowerCase()) {
        return namespace;
      }
    }

    const namespace: Namespace = {
      id: this.allocateId(),
      publicId: input.publicId,
      name: input.name,
      displayName: input.displayName,
      verified: input.verified ?? false,
    };
    this.namespaces.set(namespace.id, namespace);
    return namespace;
  }

  private upsertKeyPair(input: NonNullable<CatalogVersionEntry["signatureKeyPair"]>): SignatureKeyPair {
    for (const keyPair of this.keyPairs.values()) {
      if (keyPair.publicId === input.publicId) {
        return keyPair;
      }
    }

    const keyPair: SignatureKeyPair = {
      id: this.allocateId(),
      publicId: input.publicId,
      publicKeyText: input.publicKeyText,
      active: input.active ?? true,
    };
    this.keyPairs.set(keyPair.id, keyPair);
    return keyPair;
  }

  private addVersion(extension: Extension, entry: CatalogVersionEntry): ExtensionVersion {
    const keyPair = entry.signatureKeyPair === undefined ? undefined : this.upsertKeyPair(entry.signatureKeyPair);

    const version: ExtensionVersion = {
      id: this.allocateId(),
      extensionId: extension.id,
      version: entry.version,
      targetPlatform: entry.targetPlatform ?? UNIVERSAL,
      active: entry.active ?? true,
      preRelease: entry.preRelease ?? false,
      preview: entry.preview ?? false,
      timestamp: entry.timestamp,
      displayName: entry.displayName,
      description: entry.description,
      engines: entry.engines ?? [],
      categories: entry.categories ?? [],
      tags: entry.tags ?? [],
      extensionKind: entry.extensionKind ?? [],
      repository: entry.repository,
      homepage: entry.homepage,
      license: entry.license,
      sponsorLink: entry.sponsorLink,
      localizedLanguages: entry.localizedLanguages ?? [],
      dependencies: entry.dependencies ?? [],
      bundledExtensions: entry.bundledExtensions ?? [],
      signatureKeyPairId: keyPair?.id,
    };
    this.versions.set(version.id, version);

    for (const file of entry.files ?? []) {
      const resource: FileResource = {
        id: this.allocateId(),
        extensionVersionId: version.id,
        name: file.name,
        type: file.type,
        storageType: file.storageType ?? "local",
      };
      this.files.set(resource.id, resource);
    }

    return version;
  }

  private exportVersion(version: ExtensionVersion): CatalogVersionEntry {
    const keyPair = version.signatureKeyPairId === undefined ? undefined : this.keyPairs.get(version.signatureKeyPairId);

    return {
      version: version.version,
      targetPlatform: version.targetPlatform,
      active: version.active,
      preRelease: version.preRelease,
      preview: version.preview,
      timestamp: version.timestamp,
      displayName: version.displayName,
      description: version.description,
      engines: version.engines,
      categories: version.categories,
      tags: version.tags,
      extensionKind: version.extensionKind,
      repository: version.repository,
      homepage: version.homepage,
      license: version.license,
      sponsorLink: version.sponsorLink,
      localizedLanguages: version.localizedLanguages,
      dependencies: version.dependencies,
      bundledExtensions: version.bundledExtensions,
      signatureKeyPair:
        keyPair === undefined
          ? undefined
          : { publicId: keyPair.publicId, publicKeyText: keyPair.publicKeyText, active: keyPair.active },
      files: [...this.files.values()]
        .filter((file) => file.extensionVersionId === version.id)
        .map((file) => ({ name: file.name, type: file.type, storageType: file.storageType })),
    };
  }

  private findExtensionByName(name: string, namespace: string): Extension | undefined {
    const wantedName = name.toLowerCase();
    const wantedNamespace = namespace.toLowerCase();

    for (const extension of this.extensions.values()) {
      if (extension.name.toLowerCase() !== wantedName) {
        continue;
      }

      const owner = this.namespaces.get(extension.namespaceId);
      if (owner !== undefined && owner.name.toLowerCase() === wantedNamespace) {
        return extension;
      }
    }

    return undefined;
  }

  private findFile(
    namespace: string,
    name: string,
    targetPlatform: TargetPlatformName,
    version: string,
    predicate: (file: FileResource) => boolean,
  ): ResolvedFileResource | null {
    const extension = this.findExtensionByName(name, namespace);
    if (extension === undefined) {
      return null;
    }

    for (const entry of this.versions.values()) {
      if (entry.extensionId !== extension.id || entry.version !== version || entry.targetPlatform !== targetPlatform) {
        continue;
      }

      for (const file of this.files.values()) {
        if (file.extensionVersionId === entry.id && predicate(file)) {
          const resolved = this.resolve(entry);
          return resolved === null ? null : { ...resolved, file };
        }
      }
    }

    return null;
  }

  private resolve(version: ExtensionVersion): ResolvedExtensionVersion | null {
    const extension = this.extensions.get(version.extensionId);
    if (extension === undefined) {
      return null;
    }

    const namespace = this.namespaces.get(extension.namespaceId);
    if (namespace === undefined) {
      return null;
    }

    return { namespace, extension, version };
  }
}
