export interface StructuredGalleryError {
  code: string;
  message: string;
  status: number;
  suggestion?: string;
}

/**
 * Base class for every error the gallery turns into an HTTP status.
 */
export class GalleryError extends Error implements StructuredGalleryError {
  readonly code: string;

  readonly status: number;

  readonly suggestion?: string;

  constructor(error: StructuredGalleryError, options?: { cause?: unknown }) {
    super(error.message, options);
    this.name = "GalleryError";
    this.code = error.code;
    this.status = error.status;
    this.suggestion = error.suggestion;

    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class NotFoundError extends GalleryError {
  constructor(message = "Not found", code = "NOT_FOUND") {
    super({ code, message, status: 404 });
    this.name = "NotFoundError";
  }
}

export class BadRequestError extends GalleryError {
  constructor(message: string, code = "BAD_REQUEST") {
    super({ code, message, status: 400 });
    this.name = "BadRequestError";
  }
}

export interface CatalogErrorOptions {
  cause?: unknown;
  /** Catalog document the problem was found in */
  source?: string;
  /** Dotted path of the offending field */
  field?: string;
}

/**
 * A catalog document that cannot be loaded.
 */
export class CatalogError extends GalleryError {
  readonly source?: string;

  readonly field?: string;

  constructor(message: string, options: CatalogErrorOptions = {}) {
    super(
      {
        code: "CATALOG_ERROR",
        message,
        status: 500,
        suggestion: "Run `vsx-gallery validate` against the catalog root.",
      },
      { cause: options.cause },
    );
    this.name = "CatalogError";
    this.source = options.source;
    this.field = options.field;
  }
}

export class ConfigError extends GalleryError {
  readonly source?: string;

  constructor(message: string, options: { cause?: unknown; source?: string } = {}) {
    super({ code: "CONFIG_ERROR", message, status: 500 }, { cause: options.cause });
    this.name = "ConfigError";
    this.source = options.source;
  }
}

export function builtInNamespaceError(namespace: string): BadRequestError {
  return new BadRequestError(`Built-in extension namespace '${namespace}' not allowed`, "BUILT_IN_NAMESPACE");
}

export function isGalleryError(value: unknown): value is GalleryError {
  return value instanceof GalleryError;
}

export function toGalleryError(error: unknown): GalleryError {
  if (isGalleryError(error)) {
    return error;
  }

  return new GalleryError(
    {
      code: "INTERNAL_ERROR",
      message: "Internal server error",
      status: 500,
    },
    { cause: error },
  );
}
