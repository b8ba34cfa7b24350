import { rm } from "node:fs/promises";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { GalleryStorageService, getContentType, getStorageSegments } from "../src/storage.js";
import type { FileResource, ResolvedFileResource, StorageType } from "../src/types.js";
import { createStorageRoot } from "./utils.js";

function resource(
  name: string,
  options: { targetPlatform?: ResolvedFileResource["version"]["targetPlatform"]; storageType?: StorageType } = {},
): ResolvedFileResource {
  const file: FileResource = {
    id: 4,
    extensionVersionId: 3,
    name,
    type: "resource",
    storageType: options.storageType ?? "local",
  };

  return {
    namespace: { id: 1, publicId: "ns-acme", name: "acme", verified: false },
    extension: {
      id: 2,
      publicId: "ext-tools",
      namespaceId: 1,
      name: "tools",
      active: true,
      reviewCount: 0,
      downloadCount: 0,
      publishedDate: "2024-01-01T00:00:00.000Z",
      lastUpdatedDate: "2024-01-01T00:00:00.000Z",
    },
    version: {
      id: 3,
      extensionId: 2,
      version: "1.0.0",
      targetPlatform: options.targetPlatform ?? "universal",
      active: true,
      preRelease: false,
      preview: false,
      timestamp: "2024-01-01T00:00:00.000Z",
      engines: [],
      categories: [],
      tags: [],
      extensionKind: [],
      localizedLanguages: [],
      dependencies: [],
      bundledExtensions: [],
    },
    file,
  };
}

describe("getStorageSegments", () => {
  it("omits the universal platform", () => {
    expect(getStorageSegments(resource("extension/package.json"))).toEqual([
      "acme",
      "tools",
      "1.0.0",
      "extension",
      "package.json",
    ]);
  });

  it("adds a specific platform before the version", () => {
    expect(getStorageSegments(resource("tools.vsix", { targetPlatform: "linux-arm64" }))).toEqual([
      "acme",
      "tools",
      "linux-arm64",
      "1.0.0",
      "tools.vsix",
    ]);
  });
});

describe("getContentType", () => {
  it("maps known extensions and falls back to octet-stream", () => {
    expect(getContentType("README.MD")).toBe("text/markdown");
    expect(getContentType("extension.vsixmanifest")).toBe("application/xml");
    expect(getContentType("LICENSE")).toBe("application/octet-stream");
  });
});

describe("GalleryStorageService", () => {
  let root: string;
  let storage: GalleryStorageService;

  beforeEach(async () => {
    root = await createStorageRoot({ "acme/tools/1.0.0/extension/package.json": "{}" });
    storage = new GalleryStorageService({
      root,
      external: { "google-cloud": "https://storage.test/bucket/" },
    });
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("reads local files", async () => {
    const file = await storage.getFile(resource("extension/package.json"));

    expect(file?.kind).toBe("content");
    if (file?.kind === "content") {
      expect(new TextDecoder().decode(file.data)).toBe("{}");
      expect(file.contentType).toBe("application/json");
    }
  });

  it("returns null for missing local files", async () => {
    expect(await storage.getFile(resource("extension/missing.js"))).toBeNull();
    expect(await storage.getFile(resource("extension"))).toBeNull();
  });

  it("refuses paths that leave the storage root", async () => {
    expect(storage.getLocalPath(resource("../../../../etc/passwd"))).toBeNull();
  });

  it("redirects external files to their public URL", async () => {
    expect(await storage.getFile(resource("my file.vsix", { storageType: "google-cloud" }))).toEqual({
      kind: "redirect",
      location: "https://storage.test/bucket/acme/tools/1.0.0/my%20file.vsix",
    });
  });

  it("returns null for an unconfigured storage type", async () => {
    expect(await storage.getFile(resource("tools.vsix", { storageType: "azure-blob" }))).toBeNull();
  });
});
