/**
 * vsx-gallery search
 *
 * Runs a catalog search the way the extension query does and prints the hits.
 */
import { Command, InvalidArgumentError, Option } from 'commander';
import {
  parseTargetPlatform,
  type GalleryRepository,
  type SearchResult,
  type SearchSortBy,
  type TargetPlatformName,
} from '@vsx-gallery/gallery';
import { usageError } from '../errors.js';
import { formatSearchReport, type SearchReport, type SearchResultRow } from '../formatter.js';
import { openGallery } from '../services/gallery.js';
import type { ExitCode } from '../types.js';
import type { CommandContext } from './context.js';

export interface SearchCommandOptions {
  category?: string;
  targetPlatform?: string;
  size: number;
  offset: number;
  sort: SearchSortBy;
  asc?: boolean;
}

export async function toSearchReport(repository: GalleryRepository, result: SearchResult): Promise<SearchReport> {
  const ids = result.hits.map((hit) => hit.id);
  const extensions = await repository.findActiveExtensionsById(ids);
  const results: SearchResultRow[] = [];

  for (const hit of result.hits) {
    const extension = extensions.find((entry) => entry.id === hit.id);
    if (extension === undefined) {
      continue;
    }

    const namespace = await repository.findNamespace(extension.namespaceId);
    const [latest] = await repository.findActiveExtensionVersions([extension.id]);
    if (namespace === null || latest === undefined) {
      continue;
    }

    results.push({
      id: `${namespace.name}.${extension.name}`,
      version: latest.version,
      displayName: latest.displayName ?? extension.name,
      downloads: extension.downloadCount,
      score: hit.score,
    });
  }

  return { totalHits: result.totalHits, results };
}

export async function handleSearch(
  context: CommandContext,
  command: Command,
  query: string | undefined,
  options: SearchCommandOptions,
): Promise<ExitCode> {
  let targetPlatform: TargetPlatformName | undefined;
  if (options.targetPlatform !== undefined) {
    const parsed = parseTargetPlatform(options.targetPlatform);
    if (parsed === null) {
      throw usageError(`Unknown target platform: ${options.targetPlatform}`, 'Use a name such as linux-x64 or universal.');
    }
    targetPlatform = parsed;
  }

  const config = await context.loadConfig(command);
  const { repository, search } = await openGallery(config, context.logger, context.deps.fetchImpl);

  const result = await search.search({
    queryString: query,
    category: options.category,
    targetPlatform,
    requestedSize: options.size,
    requestedOffset: options.offset,
    sortBy: options.sort,
    sortOrder: options.asc === true ? 'asc' : 'desc',
    includeAllVersions: false,
    namespacesToExclude: [config.gallery.builtInNamespace],
  });

  const report = await toSearchReport(repository, result);
  if (context.logger.getOptions().json === true) {
    context.logger.json(report);
    return 0;
  }

  for (const line of formatSearchReport(report)) {
    context.deps.io.out(line);
  }
  return 0;
}

export function parseCount(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return Number(value);
}

export function createSearchCommand(context: CommandContext): Command {
  return new Command('search')
    .description('Search the catalog')
    .argument('[query]', 'Text matched against names, descriptions and tags')
    .option('--category <category>', 'Only extensions in this category')
    .option('--target-platform <platform>', 'Only extensions with a build for this platform')
    .addOption(new Option('--size <n>', 'Number of results').argParser(parseCount).default(20))
    .addOption(new Option('--offset <n>', 'Results to skip').argParser(parseCount).default(0))
    .addOption(
      new Option('--sort <field>', 'Sort field')
        .choices(['relevance', 'downloadCount', 'timestamp', 'rating'])
        .default('relevance'),
    )
    .option('--asc', 'Sort ascending')
    .action(async (query: string | undefined, options: SearchCommandOptions, command: Command) => {
      context.state.exitCode = await handleSearch(context, command, query, options);
    });
}
