import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { createSilentLogger } from "../src/logger.js";
import { InMemoryGalleryRepository } from "../src/repository.js";
import { CatalogSearchService } from "../src/search.js";
import { createGalleryNodeServer, createGalleryRequestHandler } from "../src/server.js";
import { GalleryStorageService, type GalleryStorageOptions } from "../src/storage.js";
import type {
  CatalogDocument,
  CatalogVersionEntry,
  ExtensionQueryCriterion,
  ExtensionQueryParam,
  GallerySettings,
} from "../src/types.js";
import type { UpstreamGallery } from "../src/upstream.js";

export const SERVER_URL = "http://gallery.test";

export interface DocumentOptions {
  namespace: string;
  name: string;
  publicId: string;
  namespacePublicId?: string;
  namespaceDisplayName?: string;
  downloadCount?: number;
  averageRating?: number;
  reviewCount?: number;
  versions: CatalogVersionEntry[];
}

export function createDocument(options: DocumentOptions): CatalogDocument {
  return {
    namespace: {
      publicId: options.namespacePublicId ?? `ns-${options.namespace}`,
      name: options.namespace,
      displayName: options.namespaceDisplayName,
    },
    extension: {
      publicId: options.publicId,
      name: options.name,
      averageRating: options.averageRating,
      reviewCount: options.reviewCount,
      downloadCount: options.downloadCount,
      publishedDate: "2023-06-01T00:00:00.000Z",
      lastUpdatedDate: "2024-03-01T00:00:00.000Z",
    },
    versions: options.versions,
  };
}

export function createVersion(version: string, overrides: Partial<CatalogVersionEntry> = {}): CatalogVersionEntry {
  return {
    version,
    timestamp: "2024-01-01T00:00:00.000Z",
    ...overrides,
  };
}

/**
 * Catalog shared by the HTTP tests: a universal extension with resources, a
 * platform-specific one, a built-in one and one without active versions.
 */
export function createFixtureDocuments(): CatalogDocument[] {
  return [
    createDocument({
      namespace: "redhat",
      name: "vscode-yaml",
      publicId: "ext-yaml",
      namespaceDisplayName: "Red Hat",
      downloadCount: 1000,
      averageRating: 4.5,
      reviewCount: 20,
      versions: [
        createVersion("1.2.0", {
          timestamp: "2024-03-01T00:00:00.000Z",
          displayName: "YAML",
          description: "YAML language support",
          engines: ["vscode@^1.80.0"],
          categories: ["Programming Languages"],
          tags: ["yaml", "kubernetes"],
          repository: "https://example.com/redhat/vscode-yaml",
          files: [
            { name: "redhat.vscode-yaml-1.2.0.vsix", type: "download" },
            { name: "package.json", type: "manifest" },
            { name: "README.md", type: "readme" },
            { name: "icon.png", type: "icon" },
            { name: "extension.vsixmanifest", type: "resource" },
            { name: "extension/package.json", type: "resource" },
            { name: "extension/README.md", type: "resource" },
            { name: "extension/images/icon.png", type: "resource" },
          ],
        }),
        createVersion("1.1.0", {
          displayName: "YAML",
          files: [{ name: "redhat.vscode-yaml-1.1.0.vsix", type: "download" }],
        }),
      ],
    }),
    createDocument({
      namespace: "ms-python",
      name: "python",
      publicId: "ext-python",
      downloadCount: 5000,
      versions: [
        createVersion("2.0.0", {
          targetPlatform: "linux-x64",
          timestamp: "2024-02-01T00:00:00.000Z",
          displayName: "Python",
          files: [{ name: "python-linux-x64.vsix", type: "download" }],
        }),
        createVersion("2.0.0", {
          targetPlatform: "darwin-arm64",
          timestamp: "2024-02-01T00:00:00.000Z",
          displayName: "Python",
          files: [{ name: "python-darwin-arm64.vsix", type: "download" }],
        }),
        createVersion("1.9.0", {
          targetPlatform: "linux-x64",
          displayName: "Python",
        }),
      ],
    }),
    createDocument({
      namespace: "vscode",
      name: "git",
      publicId: "ext-git",
      versions: [createVersion("1.0.0", { files: [{ name: "git.vsix", type: "download" }] })],
    }),
    createDocument({
      namespace: "acme",
      name: "retired",
      publicId: "ext-retired",
      versions: [createVersion("0.1.0", { active: false })],
    }),
  ];
}

/** Bytes stored for the fixture catalog, keyed by path below the storage root. */
export const FIXTURE_FILES: Readonly<Record<string, string>> = {
  "redhat/vscode-yaml/1.2.0/redhat.vscode-yaml-1.2.0.vsix": "yaml-vsix",
  "redhat/vscode-yaml/1.2.0/package.json": '{"name":"vscode-yaml"}',
  "redhat/vscode-yaml/1.2.0/README.md": "# YAML",
  "redhat/vscode-yaml/1.2.0/icon.png": "icon-bytes",
  "redhat/vscode-yaml/1.2.0/extension.vsixmanifest": "<PackageManifest/>",
  "redhat/vscode-yaml/1.2.0/extension/package.json": '{"main":"./out/extension.js"}',
  "redhat/vscode-yaml/1.2.0/extension/README.md": "# YAML extension",
  "redhat/vscode-yaml/1.2.0/extension/images/icon.png": "nested-icon",
  "ms-python/python/linux-x64/2.0.0/python-linux-x64.vsix": "python-linux",
  "ms-python/python/darwin-arm64/2.0.0/python-darwin-arm64.vsix": "python-darwin",
};

export async function createStorageRoot(files: Readonly<Record<string, string>>): Promise<string> {
  const root = await mkdtemp(path.join(tmpdir(), "vsx-gallery-storage-"));

  for (const [relativePath, content] of Object.entries(files)) {
    const filePath = path.join(root, ...relativePath.split("/"));
    await mkdir(path.dirname(filePath), { recursive: true });
    await writeFile(filePath, content, "utf8");
  }

  return root;
}

export interface TestGalleryOptions {
  documents?: CatalogDocument[];
  files?: Readonly<Record<string, string>>;
  settings?: Partial<GallerySettings>;
  external?: GalleryStorageOptions["external"];
  upstream?: UpstreamGallery;
  /** Leave the server URL unset so redirects use the request origin */
  useRequestOrigin?: boolean;
}

export interface TestGallery {
  repository: InMemoryGalleryRepository;
  storageRoot: string;
  handler: (request: Request) => Promise<Response>;
  get: (pathAndQuery: string) => Promise<Response>;
  query: (body: unknown) => Promise<Response>;
  cleanup: () => Promise<void>;
}

export async function createTestGallery(options: TestGalleryOptions = {}): Promise<TestGallery> {
  const repository = new InMemoryGalleryRepository(options.documents ?? createFixtureDocuments());
  const storageRoot = await createStorageRoot(options.files ?? FIXTURE_FILES);

  const handler = createGalleryRequestHandler({
    repository,
    search: new CatalogSearchService(repository),
    storage: new GalleryStorageService({ root: storageRoot, external: options.external }),
    upstream: options.upstream,
    settings: options.settings,
    serverUrl: options.useRequestOrigin === true ? undefined : SERVER_URL,
    logger: createSilentLogger(),
  });

  return {
    repository,
    storageRoot,
    handler,
    get: (pathAndQuery) => handler(new Request(`http://localhost${pathAndQuery}`)),
    query: (body) =>
      handler(
        new Request("http://localhost/vscode/gallery/extensionquery", {
          method: "POST",
          headers: { "content-type": "application/json" },
          body: typeof body === "string" ? body : JSON.stringify(body),
        }),
      ),
    cleanup: () => rm(storageRoot, { recursive: true, force: true }),
  };
}

export function createQuery(
  criteria: ExtensionQueryCriterion[],
  flags: number,
  paging: { pageNumber?: number; pageSize?: number; sortBy?: number; sortOrder?: number } = {},
): ExtensionQueryParam {
  return {
    filters: [{ criteria, ...paging }],
    flags,
  };
}

export interface TestGalleryServer {
  url: string;
  close: () => Promise<void>;
}

export async function startTestGalleryServer(): Promise<TestGalleryServer> {
  const repository = new InMemoryGalleryRepository(createFixtureDocuments());
  const storageRoot = await createStorageRoot(FIXTURE_FILES);
  const server = createGalleryNodeServer({
    repository,
    search: new CatalogSearchService(repository),
    storage: new GalleryStorageService({ root: storageRoot }),
    logger: createSilentLogger(),
  });

  await new Promise<void>((resolve) => {
    server.listen(0, "127.0.0.1", resolve);
  });

  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("Unable to resolve gallery server address");
  }

  return {
    url: `http://127.0.0.1:${address.port}`,
    close: async () => {
      await new Promise<void>((resolve, reject) => {
        server.close((error) => {
          if (error === undefined) {
            resolve();
            return;
          }

          reject(error);
        });
      });

      await rm(storageRoot, { recursive: true, force: true });
    },
  };
}
