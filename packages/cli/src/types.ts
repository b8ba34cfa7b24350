import type { Server } from 'node:http';
import type { FetchLike, LogSink } from '@vsx-gallery/gallery';

export type ExitCode = 0 | 1 | 2 | 3 | 4;

export type OutputFormat = 'text' | 'json';

export interface GlobalOptions {
  config?: string;
  verbose?: boolean;
  quiet?: boolean;
  /** `false` when `--no-color` is given */
  color?: boolean;
  json?: boolean;
}

export interface CliDependencies {
  io: LogSink;
  cwd: string;
  env: NodeJS.ProcessEnv;
  version: string;
  /** Whether stderr is a terminal that can show a spinner */
  interactive: boolean;
  /** Resolves once the running server should stop */
  waitForShutdown: (server: Server) => Promise<void>;
  fetchImpl?: FetchLike;
}
