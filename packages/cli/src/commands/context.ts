import type { Command } from 'commander';
import type { GalleryConfig, GalleryConfigInput, Logger } from '@vsx-gallery/gallery';
import type { CliDependencies, ExitCode } from '../types.js';

export interface RunState {
  exitCode: ExitCode;
}

export interface CommandContext {
  deps: CliDependencies;
  logger: Logger;
  state: RunState;
  /** Resolves configuration for `command`, applying its global options to the logger */
  loadConfig(command: Command, overrides?: GalleryConfigInput): Promise<GalleryConfig>;
}
