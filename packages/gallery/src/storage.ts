import { readFile } from "node:fs/promises";
import path from "node:path";

import { isUniversal } from "./target-platform.js";
import type { ResolvedFileResource, StorageType } from "./types.js";

export type StoredFile =
  | { kind: "content"; data: Uint8Array; contentType: string }
  | { kind: "redirect"; location: string };

export interface StorageService {
  /** `null` when the bytes cannot be found for the resource */
  getFile(resource: ResolvedFileResource): Promise<StoredFile | null>;
}

export interface GalleryStorageOptions {
  /** Directory holding files with storage type `local` */
  root: string;
  /** Public base URL per external storage type */
  external?: Partial<Record<Exclude<StorageType, "local">, string>>;
}

const CONTENT_TYPES: Record<string, string> = {
  ".json": "application/json",
  ".md": "text/markdown",
  ".txt": "text/plain",
  ".png": "image/png",
  ".svg": "image/svg+xml",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".vsix": "application/zip",
  ".sigzip": "application/zip",
  ".vsixmanifest": "application/xml",
  ".xml": "application/xml",
};

export function getContentType(fileName: string): string {
  return CONTENT_TYPES[path.extname(fileName).toLowerCase()] ?? "application/octet-stream";
}

/**
 * `namespace/extension/[targetPlatform/]version/fileName`, the layout shared by
 * local and external storage.
 */
export function getStorageSegments(resource: ResolvedFileResource): string[] {
  const segments = [resource.namespace.name, resource.extension.name];
  if (!isUniversal(resource.version.targetPlatform)) {
    segments.push(resource.version.targetPlatform);
  }

  segments.push(resource.version.version, ...resource.file.name.split("/"));
  return segments;
}

export class GalleryStorageService implements StorageService {
  private readonly root: string;

  private readonly external: Partial<Record<StorageType, string>>;

  constructor(options: GalleryStorageOptions) {
    this.root = path.resolve(options.root);
    this.external = { ...options.external };
  }

  async getFile(resource: ResolvedFileResource): Promise<StoredFile | null> {
    if (resource.file.storageType === "local") {
      return this.readLocalFile(resource);
    }

    const location = this.getLocation(resource);
    return location === null ? null : { kind: "redirect", location };
  }

  getLocalPath(resource: ResolvedFileResource): string | null {
    const filePath = path.resolve(this.root, ...getStorageSegments(resource));
    if (!filePath.startsWith(this.root + path.sep)) {
      return null;
    }

    return filePath;
  }

  getLocation(resource: ResolvedFileResource): string | null {
    const baseUrl = this.external[resource.file.storageType];
    if (baseUrl === undefined || baseUrl.length === 0) {
      return null;
    }

    const encoded = getStorageSegments(resource).map((segment) => encodeURIComponent(segment));
    return `${trimTrailingSlash(baseUrl)}/${encoded.join("/")}`;
  }

  private async readLocalFile(resource: ResolvedFileResource): Promise<StoredFile | null> {
    const filePath = this.getLocalPath(resource);
    if (filePath === null) {
      return null;
    }

    try {
      const data = await readFile(filePath);
      return { kind: "content", data, contentType: getContentType(resource.file.name) };
    } catch (error) {
      if (isMissingFileError(error)) {
        return null;
      }

      throw error;
    }
  }
}

function isMissingFileError(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    (error.code === "ENOENT" || error.code === "ENOTDIR" || error.code === "EISDIR")
  );
}

export function trimTrailingSlash(value: string): string {
  return value.endsWith("/") ? value.slice(0, -1) : value;
}
