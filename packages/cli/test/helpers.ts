import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import type { Server } from 'node:http';
import * as os from 'node:os';
import * as path from 'node:path';
import type { CatalogDocument, CatalogVersionEntry } from '@vsx-gallery/gallery';
import type { CliDependencies } from '../src/types.js';

export interface MockState {
  outs: string[];
  errs: string[];
}

export interface MockDepsOptions {
  cwd: string;
  env?: NodeJS.ProcessEnv;
  waitForShutdown?: (server: Server) => Promise<void>;
}

export function createMockDeps(options: MockDepsOptions): { deps: CliDependencies; state: MockState } {
  const state: MockState = { outs: [], errs: [] };

  const deps: CliDependencies = {
    io: {
      out: (line) => {
        state.outs.push(line);
      },
      err: (line) => {
        state.errs.push(line);
      },
    },
    cwd: options.cwd,
    env: options.env ?? { NO_COLOR: '1' },
    version: '0.1.0',
    interactive: false,
    waitForShutdown: options.waitForShutdown ?? (async () => undefined),
  };

  return { deps, state };
}

export function catalogDocument(
  namespace: string,
  name: string,
  downloadCount: number,
  versions: CatalogVersionEntry[],
): CatalogDocument {
  return {
    namespace: { publicId: `ns-${namespace}`, name: namespace },
    extension: {
      publicId: `ext-${name}`,
      name,
      downloadCount,
      publishedDate: '2024-01-01T00:00:00.000Z',
      lastUpdatedDate: '2024-01-01T00:00:00.000Z',
    },
    versions,
  };
}

/** Two extensions: `acme.tools` (universal) and `acme.linter` (linux-x64 only). */
export function sampleCatalog(): CatalogDocument[] {
  return [
    catalogDocument('acme', 'tools', 10, [
      { version: '1.0.0', timestamp: '2024-01-01T00:00:00.000Z', displayName: 'Tools', tags: ['utility'] },
    ]),
    catalogDocument('acme', 'linter', 50, [
      {
        version: '2.1.0',
        targetPlatform: 'linux-x64',
        timestamp: '2024-02-01T00:00:00.000Z',
        displayName: 'Linter',
        categories: ['Linters'],
      },
    ]),
  ];
}

export interface Workspace {
  dir: string;
  catalogRoot: string;
  writeDocument(relativePath: string, content: unknown): Promise<void>;
  cleanup(): Promise<void>;
}

/** Temp directory with a `catalog/` folder holding `documents`. */
export async function createWorkspace(documents: CatalogDocument[] = sampleCatalog()): Promise<Workspace> {
  const dir = await mkdtemp(path.join(os.tmpdir(), 'vsx-gallery-cli-'));
  const catalogRoot = path.join(dir, 'catalog');

  const writeDocument = async (relativePath: string, content: unknown): Promise<void> => {
    const filePath = path.join(catalogRoot, relativePath);
    await mkdir(path.dirname(filePath), { recursive: true });
    await writeFile(filePath, typeof content === 'string' ? content : JSON.stringify(content, null, 2), 'utf8');
  };

  await mkdir(catalogRoot, { recursive: true });
  for (const document of documents) {
    await writeDocument(`${document.namespace.name}/${document.extension.name}.json`, document);
  }

  return {
    dir,
    catalogRoot,
    writeDocument,
    cleanup: () => rm(dir, { recursive: true, force: true }),
  };
}
