/**
 * Main CLI setup using Commander.js
 *
 * Creates the program with global options and registers every command.
 */
import { Command, CommanderError, Option } from 'commander';
import { createLogger, loadGalleryConfig, type GalleryConfigInput, type Logger } from '@vsx-gallery/gallery';
import { createSearchCommand, createServeCommand, createValidateCommand, waitForSignal } from './commands/index.js';
import type { CommandContext, RunState } from './commands/context.js';
import { toCliError } from './errors.js';
import { formatCliError } from './formatter.js';
import type { CliDependencies, GlobalOptions } from './types.js';

export const CLI_VERSION = '0.1.0';

export const CLI_NAME = 'vsx-gallery';

export const EXIT_CODES = {
  SUCCESS: 0,
  GENERAL_ERROR: 1,
  INVALID_ARGUMENT: 2,
  CONFIG_ERROR: 3,
  VALIDATION_ERROR: 4,
} as const;

export function createDefaultDependencies(): CliDependencies {
  return {
    io: {
      out: (line) => {
        process.stdout.write(`${line}\n`);
      },
      err: (line) => {
        process.stderr.write(`${line}\n`);
      },
    },
    cwd: process.cwd(),
    env: process.env,
    version: CLI_VERSION,
    interactive: process.stderr.isTTY === true,
    waitForShutdown: waitForSignal,
  };
}

function createCommandContext(deps: CliDependencies, logger: Logger, state: RunState): CommandContext {
  return {
    deps,
    logger,
    state,
    async loadConfig(command: Command, overrides?: GalleryConfigInput) {
      const opts = command.optsWithGlobals<GlobalOptions>();
      const config = await loadGalleryConfig({
        configPath: opts.config,
        cwd: deps.cwd,
        env: deps.env,
        overrides,
      });

      logger.configure({
        verbose: opts.verbose === true || config.logLevel === 'debug',
        quiet: opts.quiet === true || config.logLevel === 'error',
        noColor: opts.color === false || !config.color,
      });

      return config;
    },
  };
}

/**
 * Create the main CLI program
 */
export function createProgram(context: CommandContext): Command {
  const { deps, logger } = context;
  const program = new Command();

  program
    .name(CLI_NAME)
    .description('Self-hosted VS Code extension gallery')
    .version(deps.version, '-V, --version', 'Output the version number')
    .helpOption('-h, --help', 'Display help for command')
    .addHelpText(
      'after',
      `
Examples:
  $ vsx-gallery serve -p 8080        Serve the catalog on port 8080
  $ vsx-gallery validate ./catalog   Check catalog documents
  $ vsx-gallery search yaml          Search the catalog`,
    )
    .exitOverride()
    .configureOutput({
      writeOut: (text) => deps.io.out(text.trimEnd()),
      writeErr: (text) => deps.io.err(text.trimEnd()),
    });

  program
    .addOption(new Option('-c, --config <path>', 'Configuration file path'))
    .addOption(new Option('-v, --verbose', 'Enable verbose output').default(false))
    .addOption(new Option('-q, --quiet', 'Minimize output (only errors)').default(false))
    .addOption(new Option('--no-color', 'Disable color output'))
    .addOption(new Option('--json', 'Output in JSON format').default(false));

  program.hook('preAction', (_thisCommand, actionCommand) => {
    const opts = actionCommand.optsWithGlobals<GlobalOptions>();
    logger.configure({
      verbose: opts.verbose,
      quiet: opts.quiet,
      noColor: opts.color === false || (deps.env.NO_COLOR !== undefined && deps.env.NO_COLOR !== ''),
      json: opts.json,
    });
  });

  for (const command of [createServeCommand(context), createValidateCommand(context), createSearchCommand(context)]) {
    program.addCommand(command.copyInheritedSettings(program));
  }

  return program;
}

/**
 * Runs the CLI and returns the process exit code
 */
export async function runCli(argv: readonly string[], deps: CliDependencies = createDefaultDependencies()): Promise<number> {
  const logger = createLogger({}, deps.io);
  const state: RunState = { exitCode: EXIT_CODES.SUCCESS };
  const program = createProgram(createCommandContext(deps, logger, state));

  try {
    await program.parseAsync([...argv], { from: 'user' });
    return state.exitCode;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.INVALID_ARGUMENT;
    }

    const cliError = toCliError(error);
    deps.io.err(formatCliError(cliError, logger.getOptions().json === true));
    return cliError.exitCode;
  }
}
