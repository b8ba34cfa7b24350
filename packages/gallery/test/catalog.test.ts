import { mkdir, mkdtemp, readdir, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { FileGalleryRepository, getCatalogDocumentPath, scanCatalog } from "../src/catalog.js";
import { CatalogError } from "../src/errors.js";
import { InMemoryGalleryRepository } from "../src/repository.js";
import type { CatalogDocument } from "../src/types.js";
import { createDocument, createFixtureDocuments, createVersion } from "./utils.js";

async function writeDocument(root: string, document: CatalogDocument): Promise<string> {
  const filePath = getCatalogDocumentPath(root, document.namespace.name, document.extension.name);
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, JSON.stringify(document), "utf8");
  return filePath;
}

describe("InMemoryGalleryRepository", () => {
  const repository = new InMemoryGalleryRepository(createFixtureDocuments());

  it("finds extensions by name case-insensitively", async () => {
    const extension = await repository.findActiveExtension("VSCode-YAML", "RedHat");

    expect(extension?.publicId).toBe("ext-yaml");
  });

  it("does not treat an extension without active versions as active", async () => {
    expect(await repository.findActiveExtension("retired", "acme")).toBeNull();
  });

  it("prefers the universal build of a version", async () => {
    const twin = new InMemoryGalleryRepository([
      createDocument({
        namespace: "acme",
        name: "tools",
        publicId: "ext-tools",
        versions: [createVersion("1.0.0", { targetPlatform: "win32-x64" }), createVersion("1.0.0")],
      }),
    ]);

    const resolved = await twin.findActiveExtensionVersion("1.0.0", "tools", "acme");
    expect(resolved?.version.targetPlatform).toBe("universal");
  });

  it("finds resources below a directory prefix", async () => {
    const resolved = await repository.findActiveExtensionVersion("1.2.0", "vscode-yaml", "redhat");
    if (resolved === null) {
      throw new Error("fixture version missing");
    }

    const resources = await repository.findResourceFileResources(resolved, "extension/images");
    expect(resources.map((resource) => resource.file.name)).toEqual(["extension/images/icon.png"]);
  });

  it("rejects an extension defined twice", () => {
    const document = createDocument({ namespace: "acme", name: "tools", publicId: "ext-tools", versions: [] });

    expect(() => new InMemoryGalleryRepository([document, { ...document }])).toThrow(
      "Extension acme.tools is defined twice",
    );
  });

  it("shares namespaces between documents", async () => {
    const shared = new InMemoryGalleryRepository([
      createDocument({ namespace: "acme", name: "one", publicId: "ext-one", versions: [createVersion("1.0.0")] }),
      createDocument({ namespace: "Acme", name: "two", publicId: "ext-two", versions: [createVersion("1.0.0")] }),
    ]);

    const one = await shared.findActiveExtension("one", "acme");
    const two = await shared.findActiveExtension("two", "acme");
    expect(one?.namespaceId).toBe(two?.namespaceId);
  });
});

describe("file catalog", () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), "vsx-gallery-catalog-"));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("returns no entries for a missing root", async () => {
    expect(await scanCatalog(path.join(root, "missing"))).toEqual([]);
  });

  it("reports documents whose names do not match their location", async () => {
    const document = createDocument({ namespace: "acme", name: "tools", publicId: "ext-tools", versions: [] });
    const filePath = path.join(root, "other", "tools.json");
    await mkdir(path.dirname(filePath), { recursive: true });
    await writeFile(filePath, JSON.stringify(document), "utf8");

    const [entry] = await scanCatalog(root);
    expect(entry?.document).toBeNull();
    expect(entry?.issues).toEqual([{ field: "namespace.name", message: "must match directory name 'other'" }]);
  });

  it("reports invalid JSON", async () => {
    const filePath = path.join(root, "acme", "broken.json");
    await mkdir(path.dirname(filePath), { recursive: true });
    await writeFile(filePath, "{", "utf8");

    const [entry] = await scanCatalog(root);
    expect(entry?.issues[0]?.field).toBe("$");
    expect(entry?.issues[0]?.message.startsWith("invalid JSON: ")).toBe(true);
  });

  it("loads every document", async () => {
    for (const document of createFixtureDocuments()) {
      await writeDocument(root, document);
    }

    const repository = new FileGalleryRepository(root);
    expect(await repository.initialize()).toBe(4);
    expect((await repository.listActiveExtensions()).map((extension) => extension.name).sort()).toEqual([
      "git",
      "python",
      "vscode-yaml",
    ]);
  });

  it("fails on the first invalid document", async () => {
    const filePath = path.join(root, "acme", "broken.json");
    await mkdir(path.dirname(filePath), { recursive: true });
    await writeFile(filePath, JSON.stringify({ namespace: {}, extension: {} }), "utf8");

    const repository = new FileGalleryRepository(root);
    await expect(repository.initialize()).rejects.toBeInstanceOf(CatalogError);
    await expect(new FileGalleryRepository(root).initialize()).rejects.toThrow(
      `Corrupted catalog document ${filePath}: versions must be an array`,
    );
  });

  it("writes download counts back to the document", async () => {
    const filePath = await writeDocument(
      root,
      createDocument({
        namespace: "acme",
        name: "tools",
        publicId: "ext-tools",
        downloadCount: 7,
        versions: [createVersion("1.0.0")],
      }),
    );

    const repository = new FileGalleryRepository(root);
    await repository.initialize();
    const extension = await repository.findActiveExtension("tools", "acme");
    if (extension === null) {
      throw new Error("catalog extension missing");
    }

    await Promise.all([repository.increaseDownloadCount(extension), repository.increaseDownloadCount(extension)]);

    const stored: unknown = JSON.parse(await readFile(filePath, "utf8"));
    expect(stored).toMatchObject({ extension: { downloadCount: 9 } });
    expect(await readdir(path.dirname(filePath))).toEqual(["tools.json"]);

    const reloaded = new FileGalleryRepository(root);
    await reloaded.initialize();
    expect((await reloaded.findActiveExtension("tools", "acme"))?.downloadCount).toBe(9);
  });
});
