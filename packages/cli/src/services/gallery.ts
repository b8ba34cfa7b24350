import {
  CatalogSearchService,
  FileGalleryRepository,
  GalleryStorageService,
  UpstreamGallery,
  type FetchLike,
  type GalleryConfig,
  type GalleryServerOptions,
  type Logger,
} from '@vsx-gallery/gallery';

export interface OpenedGallery {
  repository: FileGalleryRepository;
  search: CatalogSearchService;
  options: GalleryServerOptions;
  documents: number;
}

/**
 * Loads the catalog and wires the services the server needs from a resolved config.
 */
export async function openGallery(config: GalleryConfig, logger: Logger, fetchImpl?: FetchLike): Promise<OpenedGallery> {
  const repository = new FileGalleryRepository(config.catalog.root);
  const documents = await repository.initialize();
  logger.debug(`Loaded ${documents} catalog documents`, { catalogRoot: config.catalog.root });

  const search = new CatalogSearchService(repository, {
    enabled: config.search.enabled,
    relevance: config.search.relevance,
  });

  const storage = new GalleryStorageService({
    root: config.storage.root,
    external: config.storage.external,
  });

  const upstream =
    config.upstream.url === undefined || config.upstream.url.length === 0
      ? undefined
      : new UpstreamGallery({ url: config.upstream.url, fetchImpl, logger });

  return {
    repository,
    search,
    documents,
    options: {
      repository,
      search,
      storage,
      upstream,
      serverUrl: config.server.url,
      logger,
      settings: {
        ...config.gallery,
        webUiUrl: config.webUiUrl,
      },
    },
  };
}
