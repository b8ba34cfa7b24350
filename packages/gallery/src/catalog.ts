import { readdir, readFile, rename, stat, writeFile } from "node:fs/promises";
import path from "node:path";

import { CatalogError } from "./errors.js";
import { InMemoryGalleryRepository } from "./repository.js";
import type { CatalogDocument, Extension } from "./types.js";
import { collectCatalogIssues, parseCatalogDocument, type CatalogIssue } from "./validators.js";

const DOCUMENT_EXTENSION = ".json";

export interface CatalogScanEntry {
  filePath: string;
  document: CatalogDocument | null;
  issues: CatalogIssue[];
}

/**
 * Reads every `{namespace}/{extension}.json` below `catalogRoot`. Problems are reported
 * per document instead of thrown, so callers can list them all.
 */
export async function scanCatalog(catalogRoot: string): Promise<CatalogScanEntry[]> {
  if (!(await isDirectory(catalogRoot))) {
    return [];
  }

  const entries: CatalogScanEntry[] = [];
  const namespaceDirectories = (await readdir(catalogRoot, { withFileTypes: true }))
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort();

  for (const namespaceName of namespaceDirectories) {
    const namespaceDirectory = path.join(catalogRoot, namespaceName);
    const fileNames = (await readdir(namespaceDirectory, { withFileTypes: true }))
      .filter((entry) => entry.isFile() && entry.name.endsWith(DOCUMENT_EXTENSION))
      .map((entry) => entry.name)
      .sort();

    for (const fileName of fileNames) {
      const filePath = path.join(namespaceDirectory, fileName);
      entries.push(await readCatalogEntry(filePath, namespaceName, fileName.slice(0, -DOCUMENT_EXTENSION.length)));
    }
  }

  return entries;
}

export function getCatalogDocumentPath(catalogRoot: string, namespace: string, extension: string): string {
  return path.join(catalogRoot, namespace, `${extension}${DOCUMENT_EXTENSION}`);
}

async function readCatalogEntry(
  filePath: string,
  namespaceName: string,
  extensionName: string,
): Promise<CatalogScanEntry> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await readFile(filePath, "utf8"));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { filePath, document: null, issues: [{ field: "$", message: `invalid JSON: ${message}` }] };
  }

  const issues = collectCatalogIssues(parsed);
  const document = issues.length === 0 ? parseCatalogDocument(parsed) : null;

  if (document !== null) {
    if (document.namespace.name !== namespaceName) {
      issues.push({ field: "namespace.name", message: `must match directory name '${namespaceName}'` });
    }

    if (document.extension.name !== extensionName) {
      issues.push({ field: "extension.name", message: `must match file name '${extensionName}'` });
    }
  }

  return { filePath, document: issues.length === 0 ? document : null, issues };
}

async function isDirectory(directory: string): Promise<boolean> {
  try {
    return (await stat(directory)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Catalog persisted as one JSON document per extension. Everything is loaded into memory
 * by {@link initialize}; download counts are written back to the owning document.
 */
export class FileGalleryRepository extends InMemoryGalleryRepository {
  private readonly catalogRoot: string;

  private readonly documentPaths = new Map<number, string>();

  private pendingWrite: Promise<void> = Promise.resolve();

  constructor(catalogRoot: string) {
    super();
    this.catalogRoot = catalogRoot;
  }

  /** Loads the catalog; fails on the first document that does not validate. */
  async initialize(): Promise<number> {
    const entries = await scanCatalog(this.catalogRoot);

    for (const entry of entries) {
      const firstIssue = entry.issues[0];
      if (firstIssue !== undefined || entry.document === null) {
        throw new CatalogError(
          `Corrupted catalog document ${entry.filePath}: ${firstIssue?.field ?? "$"} ${firstIssue?.message ?? "is invalid"}`,
          { source: entry.filePath, field: firstIssue?.field },
        );
      }

      const extension = this.importDocument(entry.document, entry.filePath);
      this.documentPaths.set(extension.id, entry.filePath);
    }

    return entries.length;
  }

  override async increaseDownloadCount(extension: Extension): Promise<void> {
    await super.increaseDownloadCount(extension);

    const filePath = this.documentPaths.get(extension.id);
    const document = this.exportDocument(extension.id);
    if (filePath === undefined || document === null) {
      return;
    }

    // writes run one at a time, in call order
    const write = this.pendingWrite.then(() => writeDocument(filePath, document));
    this.pendingWrite = write.catch(() => undefined);
    await write;
  }
}

async function writeDocument(filePath: string, document: CatalogDocument): Promise<void> {
  const tempPath = `${filePath}.tmp`;
  await writeFile(tempPath, JSON.stringify(document, null, 2) + "\n", "utf8");
  await rename(tempPath, filePath);
}
