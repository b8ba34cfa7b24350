/**
 * vsx-gallery validate
 *
 * Loads every catalog document below the catalog root and reports schema
 * problems, name mismatches and duplicate extensions.
 */
import { stat } from 'node:fs/promises';
import * as path from 'node:path';
import { Command, Option } from 'commander';
import ora from 'ora';
import { CatalogError, InMemoryGalleryRepository, scanCatalog } from '@vsx-gallery/gallery';
import { validateError } from '../errors.js';
import { formatValidationIssue, type ValidationIssue, type ValidationReport } from '../formatter.js';
import type { ExitCode, OutputFormat } from '../types.js';
import type { CommandContext } from './context.js';

export interface ValidateOptions {
  format: OutputFormat;
}

export async function buildValidationReport(catalogRoot: string): Promise<ValidationReport> {
  const entries = await scanCatalog(catalogRoot);
  const repository = new InMemoryGalleryRepository();
  const issues: ValidationIssue[] = [];

  for (const entry of entries) {
    const file = path.relative(catalogRoot, entry.filePath);

    for (const issue of entry.issues) {
      issues.push({ file, field: issue.field, message: issue.message });
    }

    if (entry.document === null) {
      continue;
    }

    try {
      repository.importDocument(entry.document, entry.filePath);
    } catch (error) {
      if (!(error instanceof CatalogError)) {
        throw error;
      }
      issues.push({ file, field: error.field ?? '$', message: error.message });
    }
  }

  return {
    valid: issues.length === 0,
    catalogRoot,
    documents: entries.length,
    issues,
  };
}

export async function handleValidate(
  context: CommandContext,
  command: Command,
  catalogRoot: string | undefined,
  options: ValidateOptions,
): Promise<ExitCode> {
  const config = await context.loadConfig(command);
  const root = catalogRoot === undefined ? config.catalog.root : path.resolve(context.deps.cwd, catalogRoot);

  if (!(await isDirectory(root))) {
    throw validateError(`Catalog root not found: ${root}`, 'Pass the catalog directory or set catalog.root.');
  }

  const { logger } = context;
  const json = options.format === 'json' || logger.getOptions().json === true;
  const spinner = ora({ isSilent: json || logger.getOptions().quiet === true || !context.deps.interactive });

  spinner.start('Validating catalog...');
  let report: ValidationReport;
  try {
    report = await buildValidationReport(root);
  } catch (error) {
    spinner.fail('Validation failed');
    throw error;
  }
  spinner.stop();

  if (json) {
    logger.json(report);
  } else {
    for (const issue of report.issues) {
      logger.error(formatValidationIssue(issue));
    }

    if (report.valid) {
      logger.success(`Catalog is valid (${report.documents} documents)`);
    } else {
      logger.error(`${report.issues.length} problem(s) found in ${root}`);
    }
  }

  return report.valid ? 0 : 4;
}

export function createValidateCommand(context: CommandContext): Command {
  return new Command('validate')
    .description('Check every catalog document')
    .argument('[catalogRoot]', 'Catalog directory (defaults to catalog.root)')
    .addOption(new Option('--format <format>', 'Output format').choices(['text', 'json']).default('text'))
    .action(async (catalogRoot: string | undefined, options: ValidateOptions, command: Command) => {
      context.state.exitCode = await handleValidate(context, command, catalogRoot, options);
    });
}

async function isDirectory(directory: string): Promise<boolean> {
  try {
    return (await stat(directory)).isDirectory();
  } catch {
    return false;
  }
}
