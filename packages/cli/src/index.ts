export { CLI_NAME, CLI_VERSION, EXIT_CODES, createDefaultDependencies, createProgram, runCli } from './cli.js';
export * from './commands/index.js';
export { CliError, isCliError, toCliError, usageError, validateError } from './errors.js';
export * from './formatter.js';
export { openGallery, type OpenedGallery } from './services/gallery.js';
export type { CliDependencies, ExitCode, GlobalOptions, OutputFormat } from './types.js';
