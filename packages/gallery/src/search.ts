import type { GalleryRepository } from "./repository.js";
import type { TargetPlatformName } from "./target-platform.js";
import type { Extension, ExtensionVersion, Namespace, RelevanceWeights } from "./types.js";

export type SearchSortBy = "relevance" | "timestamp" | "rating" | "downloadCount";

export type SearchSortOrder = "asc" | "desc";

export interface SearchOptions {
  queryString?: string;
  category?: string;
  /** Matches extensions carrying any of these tags */
  tags?: readonly string[];
  targetPlatform?: TargetPlatformName;
  requestedSize: number;
  requestedOffset: number;
  sortOrder: SearchSortOrder;
  sortBy: SearchSortBy;
  includeAllVersions: boolean;
  namespacesToExclude: readonly string[];
}

export interface SearchHit {
  /** Extension id */
  id: number;
  score: number;
}

export interface SearchResult {
  totalHits: number;
  hits: SearchHit[];
}

export interface SearchService {
  isEnabled(): boolean;
  search(options: SearchOptions): Promise<SearchResult>;
}

export interface CatalogSearchOptions {
  enabled?: boolean;
  relevance?: Partial<RelevanceWeights>;
}

export const DEFAULT_RELEVANCE: Readonly<RelevanceWeights> = {
  rating: 1,
  downloads: 1,
  timestamp: 1,
};

interface Candidate {
  extension: Extension;
  namespace: Namespace;
  latest: ExtensionVersion;
  score: number;
}

interface CandidateFilter {
  query: string;
  category: string;
  tags: ReadonlySet<string>;
}

/**
 * Search over the active catalog, computed in process from the repository.
 */
export class CatalogSearchService implements SearchService {
  private readonly repository: GalleryRepository;

  private readonly enabled: boolean;

  private readonly weights: RelevanceWeights;

  constructor(repository: GalleryRepository, options: CatalogSearchOptions = {}) {
    this.repository = repository;
    this.enabled = options.enabled ?? true;
    this.weights = { ...DEFAULT_RELEVANCE, ...options.relevance };
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  async search(options: SearchOptions): Promise<SearchResult> {
    if (!this.enabled) {
      return { totalHits: 0, hits: [] };
    }

    const candidates = await this.collectCandidates(options);
    this.score(candidates, options.queryString);

    const direction = options.sortOrder === "asc" ? 1 : -1;
    candidates.sort((left, right) => {
      const compared = sortValue(left, options.sortBy) - sortValue(right, options.sortBy);
      if (compared !== 0) {
        return compared * direction;
      }

      return left.extension.id - right.extension.id;
    });

    const offset = Math.max(0, options.requestedOffset);
    const size = Math.max(0, options.requestedSize);

    return {
      totalHits: candidates.length,
      hits: candidates.slice(offset, offset + size).map((candidate) => ({
        id: candidate.extension.id,
        score: candidate.score,
      })),
    };
  }

  private async collectCandidates(options: SearchOptions): Promise<Candidate[]> {
    const excluded = new Set(options.namespacesToExclude.map((name) => name.toLowerCase()));
    const filter: CandidateFilter = {
      query: options.queryString?.trim().toLowerCase() ?? "",
      category: options.category?.trim().toLowerCase() ?? "",
      tags: new Set((options.tags ?? []).map((tag) => tag.trim().toLowerCase()).filter((tag) => tag.length > 0)),
    };
    const candidates: Candidate[] = [];

    for (const extension of await this.repository.listActiveExtensions()) {
      const namespace = await this.repository.findNamespace(extension.namespaceId);
      if (namespace === null || excluded.has(namespace.name.toLowerCase())) {
        continue;
      }

      const versions = await this.repository.findActiveExtensionVersions([extension.id], options.targetPlatform);
      const latest = versions[0];
      if (latest === undefined) {
        continue;
      }

      const matched = options.includeAllVersions ? versions : [latest];
      if (!matched.some((version) => matchesFilter(extension, namespace, version, filter))) {
        continue;
      }

      candidates.push({ extension, namespace, latest, score: 0 });
    }

    return candidates;
  }

  private score(candidates: Candidate[], queryString: string | undefined): void {
    const query = queryString?.trim().toLowerCase() ?? "";
    const maxDownloads = Math.max(0, ...candidates.map((candidate) => candidate.extension.downloadCount));
    const timestamps = candidates.map((candidate) => Date.parse(candidate.latest.timestamp));
    const oldest = Math.min(...timestamps);
    const newest = Math.max(...timestamps);

    candidates.forEach((candidate, index) => {
      const rating = (candidate.extension.averageRating ?? 0) / 5;
      const downloads =
        maxDownloads === 0 ? 0 : Math.log1p(candidate.extension.downloadCount) / Math.log1p(maxDownloads);
      const timestamp = newest === oldest ? 1 : ((timestamps[index] ?? oldest) - oldest) / (newest - oldest);

      let score = this.weights.rating * rating + this.weights.downloads * downloads + this.weights.timestamp * timestamp;

      const name = candidate.extension.name.toLowerCase();
      if (query.length > 0 && (query === name || query === `${candidate.namespace.name.toLowerCase()}.${name}`)) {
        score *= 2;
      }

      candidate.score = score;
    });
  }
}

function matchesFilter(
  extension: Extension,
  namespace: Namespace,
  version: ExtensionVersion,
  filter: CandidateFilter,
): boolean {
  if (filter.query.length > 0 && !matchesQuery(extension, namespace, version, filter.query)) {
    return false;
  }

  if (filter.category.length > 0 && !version.categories.some((entry) => entry.toLowerCase() === filter.category)) {
    return false;
  }

  if (filter.tags.size > 0 && !version.tags.some((tag) => filter.tags.has(tag.toLowerCase()))) {
    return false;
  }

  return true;
}

function matchesQuery(extension: Extension, namespace: Namespace, latest: ExtensionVersion, query: string): boolean {
  const fields = [
    extension.name,
    namespace.name,
    latest.displayName ?? "",
    latest.description ?? "",
    ...latest.tags,
  ];

  return fields.some((field) => field.toLowerCase().includes(query));
}

function sortValue(candidate: Candidate, sortBy: SearchSortBy): number {
  switch (sortBy) {
    case "relevance":
      return candidate.score;
    case "timestamp":
      return Date.parse(candidate.latest.timestamp);
    case "rating":
      return candidate.extension.averageRating ?? 0;
    case "downloadCount":
      return candidate.extension.downloadCount;
  }
}
