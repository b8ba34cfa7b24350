/**
 * Gallery configuration
 *
 * Precedence: defaults < config file < environment < CLI flags.
 * The file is YAML (JSON parses too) and may reference `${NAME}` variables.
 */
import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { dirname, join, resolve } from "node:path";
import YAML from "yaml";

import { ConfigError } from "./errors.js";
import type { LogLevel } from "./logger.js";
import type { RelevanceWeights, StorageType } from "./types.js";
import { isObjectRecord } from "./validators.js";

export type ExternalStorageType = Exclude<StorageType, "local">;

export interface GalleryConfig {
  server: {
    port: number;
    host: string;
    /** Public base URL; the request origin is used when absent */
    url?: string;
  };
  webUiUrl: string;
  storage: {
    root: string;
    external: Partial<Record<ExternalStorageType, string>>;
  };
  catalog: {
    root: string;
  };
  search: {
    enabled: boolean;
    relevance: RelevanceWeights;
  };
  gallery: {
    builtInNamespace: string;
    maxPageSize: number;
    defaultPageSize: number;
    signing: boolean;
  };
  upstream: {
    url?: string;
  };
  logLevel: LogLevel;
  color: boolean;
}

export interface GalleryConfigInput {
  server?: Partial<GalleryConfig["server"]>;
  webUiUrl?: string;
  storage?: Partial<GalleryConfig["storage"]>;
  catalog?: Partial<GalleryConfig["catalog"]>;
  search?: {
    enabled?: boolean;
    relevance?: Partial<RelevanceWeights>;
  };
  gallery?: Partial<GalleryConfig["gallery"]>;
  upstream?: Partial<GalleryConfig["upstream"]>;
  logLevel?: LogLevel;
  color?: boolean;
}

export const DEFAULT_CONFIG: Readonly<GalleryConfig> = {
  server: { port: 8080, host: "0.0.0.0" },
  webUiUrl: "",
  storage: { root: "./storage", external: {} },
  catalog: { root: "./catalog" },
  search: { enabled: true, relevance: { rating: 1, downloads: 1, timestamp: 1 } },
  gallery: { builtInNamespace: "vscode", maxPageSize: 100, defaultPageSize: 50, signing: false },
  upstream: {},
  logLevel: "info",
  color: true,
};

export const CONFIG_FILE_NAME = "vsx-gallery.yaml";

const LOG_LEVELS: readonly string[] = ["debug", "info", "warn", "error"];

const EXTERNAL_STORAGE_TYPES: readonly ExternalStorageType[] = ["google-cloud", "azure-blob"];

export interface LoadConfigOptions {
  /** Explicit config file; a missing one is an error */
  configPath?: string;
  /** Directory searched for `vsx-gallery.yaml` when no path is given */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: GalleryConfigInput;
}

export async function loadGalleryConfig(options: LoadConfigOptions = {}): Promise<GalleryConfig> {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const configPath = options.configPath === undefined ? join(cwd, CONFIG_FILE_NAME) : resolve(cwd, options.configPath);

  const content = await readConfigFile(configPath, options.configPath !== undefined);
  const fileConfig = content === undefined ? {} : parseConfigContent(content, configPath, env);
  const baseDir = content === undefined ? cwd : dirname(configPath);

  const merged = mergeConfigs(DEFAULT_CONFIG, fileConfig, readEnvConfig(env), options.overrides);

  return {
    ...merged,
    storage: { ...merged.storage, root: resolvePath(merged.storage.root, baseDir) },
    catalog: { root: resolvePath(merged.catalog.root, baseDir) },
  };
}

async function readConfigFile(filePath: string, required: boolean): Promise<string | undefined> {
  try {
    return await readFile(filePath, "utf-8");
  } catch (error) {
    if (!required && error !== null && typeof error === "object" && "code" in error && error.code === "ENOENT") {
      return undefined;
    }

    throw new ConfigError(`Cannot read config file ${filePath}`, { cause: error, source: filePath });
  }
}

/**
 * Parse config file content (YAML or JSON)
 */
export function parseConfigContent(content: string, source: string, env: NodeJS.ProcessEnv = {}): GalleryConfigInput {
  let parsed: unknown;
  try {
    parsed = YAML.parse(content);
  } catch (error) {
    throw new ConfigError(`Invalid config file ${source}: ${describe(error)}`, { cause: error, source });
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }

  if (!isObjectRecord(parsed)) {
    throw new ConfigError(`Invalid config file ${source}: configuration must be an object`, { source });
  }

  return readConfigInput(substituteEnv(parsed, env, source), source);
}

/** Replaces `${NAME}` in every string value. */
export function substituteEnv(value: unknown, env: NodeJS.ProcessEnv, source: string): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g, (_match, name: string) => {
      const resolved = env[name];
      if (resolved === undefined) {
        throw new ConfigError(`Environment variable ${name} is not set`, { source });
      }
      return resolved;
    });
  }

  if (Array.isArray(value)) {
    return value.map((entry) => substituteEnv(entry, env, source));
  }

  if (isObjectRecord(value)) {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = substituteEnv(entry, env, source);
    }
    return result;
  }

  return value;
}

export function readEnvConfig(env: NodeJS.ProcessEnv): GalleryConfigInput {
  const config: GalleryConfigInput = {};
  const source = "environment";

  const port = env.VSX_GALLERY_PORT;
  const url = env.VSX_GALLERY_URL;
  const storageRoot = env.VSX_GALLERY_STORAGE_ROOT;
  const catalogRoot = env.VSX_GALLERY_CATALOG_ROOT;
  const upstreamUrl = env.VSX_GALLERY_UPSTREAM_URL;
  const logLevel = env.VSX_GALLERY_LOG_LEVEL;

  if (port !== undefined || url !== undefined) {
    config.server = {};
    if (port !== undefined) {
      config.server.port = readPort(port, "VSX_GALLERY_PORT", source);
    }
    if (url !== undefined) {
      config.server.url = url;
    }
  }

  if (storageRoot !== undefined) {
    config.storage = { root: storageRoot };
  }

  if (catalogRoot !== undefined) {
    config.catalog = { root: catalogRoot };
  }

  if (upstreamUrl !== undefined) {
    config.upstream = { url: upstreamUrl };
  }

  if (logLevel !== undefined) {
    config.logLevel = readLogLevel(logLevel, "VSX_GALLERY_LOG_LEVEL", source);
  }

  if (env.NO_COLOR !== undefined && env.NO_COLOR !== "") {
    config.color = false;
  }

  return config;
}

/**
 * Merge configs with priority (later inputs override earlier)
 */
export function mergeConfigs(base: GalleryConfig, ...inputs: (GalleryConfigInput | undefined)[]): GalleryConfig {
  let result: GalleryConfig = {
    ...base,
    server: { ...base.server },
    storage: { ...base.storage, external: { ...base.storage.external } },
    search: { ...base.search, relevance: { ...base.search.relevance } },
  };

  for (const raw of inputs) {
    if (raw === undefined) {
      continue;
    }

    const input = stripUndefined(structuredClone(raw));
    result = {
      server: { ...result.server, ...input.server },
      webUiUrl: input.webUiUrl ?? result.webUiUrl,
      storage: {
        root: input.storage?.root ?? result.storage.root,
        external: { ...result.storage.external, ...input.storage?.external },
      },
      catalog: { ...result.catalog, ...input.catalog },
      search: {
        enabled: input.search?.enabled ?? result.search.enabled,
        relevance: { ...result.search.relevance, ...input.search?.relevance },
      },
      gallery: { ...result.gallery, ...input.gallery },
      upstream: { ...result.upstream, ...input.upstream },
      logLevel: input.logLevel ?? result.logLevel,
      color: input.color ?? result.color,
    };
  }

  return result;
}

/**
 * Expand tilde (~) and resolve relative paths against `baseDir`
 */
export function resolvePath(inputPath: string, baseDir: string): string {
  if (inputPath === "~") {
    return homedir();
  }
  if (inputPath.startsWith("~/")) {
    return join(homedir(), inputPath.slice(2));
  }
  return resolve(baseDir, inputPath);
}

function readConfigInput(value: Record<string, unknown>, source: string): GalleryConfigInput {
  const config: GalleryConfigInput = {};
  const section = (key: string): Record<string, unknown> | undefined => {
    const entry = value[key];
    if (entry === undefined || entry === null) {
      return undefined;
    }
    if (!isObjectRecord(entry)) {
      throw new ConfigError(`Invalid config file ${source}: ${key} must be an object`, { source });
    }
    return entry;
  };

  const server = section("server");
  if (server !== undefined) {
    config.server = {
      port: server.port === undefined ? undefined : readPort(server.port, "server.port", source),
      host: optionalString(server.host, "server.host", source),
      url: optionalString(server.url, "server.url", source),
    };
  }

  config.webUiUrl = optionalString(value.webUiUrl, "webUiUrl", source);

  const storage = section("storage");
  if (storage !== undefined) {
    config.storage = {
      root: optionalString(storage.root, "storage.root", source),
      external: readExternalStorage(storage.external, source),
    };
  }

  const catalog = section("catalog");
  if (catalog !== undefined) {
    config.catalog = { root: optionalString(catalog.root, "catalog.root", source) };
  }

  const search = section("search");
  if (search !== undefined) {
    config.search = {
      enabled: optionalBoolean(search.enabled, "search.enabled", source),
      relevance: readRelevance(search.relevance, source),
    };
  }

  const gallery = section("gallery");
  if (gallery !== undefined) {
    config.gallery = {
      builtInNamespace: optionalString(gallery.builtInNamespace, "gallery.builtInNamespace", source),
      maxPageSize: optionalPositiveInteger(gallery.maxPageSize, "gallery.maxPageSize", source),
      defaultPageSize: optionalPositiveInteger(gallery.defaultPageSize, "gallery.defaultPageSize", source),
      signing: optionalBoolean(gallery.signing, "gallery.signing", source),
    };
  }

  const upstream = section("upstream");
  if (upstream !== undefined) {
    config.upstream = { url: optionalString(upstream.url, "upstream.url", source) };
  }

  if (value.logLevel !== undefined) {
    config.logLevel = readLogLevel(value.logLevel, "logLevel", source);
  }

  config.color = optionalBoolean(value.color, "color", source);

  return stripUndefined(config);
}

function readExternalStorage(
  value: unknown,
  source: string,
): Partial<Record<ExternalStorageType, string>> | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!isObjectRecord(value)) {
    throw new ConfigError(`Invalid config file ${source}: storage.external must be an object`, { source });
  }

  const external: Partial<Record<ExternalStorageType, string>> = {};
  for (const type of EXTERNAL_STORAGE_TYPES) {
    const url = optionalString(value[type], `storage.external.${type}`, source);
    if (url !== undefined) {
      external[type] = url;
    }
  }
  return external;
}

function readRelevance(value: unknown, source: string): Partial<RelevanceWeights> | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!isObjectRecord(value)) {
    throw new ConfigError(`Invalid config file ${source}: search.relevance must be an object`, { source });
  }

  const relevance: Partial<RelevanceWeights> = {};
  for (const key of ["rating", "downloads", "timestamp"] as const) {
    const weight = value[key];
    if (weight === undefined) {
      continue;
    }
    if (typeof weight !== "number" || !Number.isFinite(weight) || weight < 0) {
      throw new ConfigError(`Invalid config file ${source}: search.relevance.${key} must be a non-negative number`, {
        source,
      });
    }
    relevance[key] = weight;
  }
  return relevance;
}

function readPort(value: unknown, field: string, source: string): number {
  const port = typeof value === "string" && /^\d+$/.test(value) ? Number(value) : value;
  if (typeof port !== "number" || !Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigError(`Invalid ${field} in ${source}: expected a port number`, { source });
  }
  return port;
}

function readLogLevel(value: unknown, field: string, source: string): LogLevel {
  if (!isLogLevel(value)) {
    throw new ConfigError(`Invalid ${field} in ${source}: expected one of ${LOG_LEVELS.join(", ")}`, { source });
  }
  return value;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LOG_LEVELS.includes(value);
}

function optionalString(value: unknown, field: string, source: string): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new ConfigError(`Invalid config file ${source}: ${field} must be a string`, { source });
  }
  return value;
}

function optionalBoolean(value: unknown, field: string, source: string): boolean | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== "boolean") {
    throw new ConfigError(`Invalid config file ${source}: ${field} must be a boolean`, { source });
  }
  return value;
}

function optionalPositiveInteger(value: unknown, field: string, source: string): number | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== "number" || !Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`Invalid config file ${source}: ${field} must be a positive integer`, { source });
  }
  return value;
}

/** Drops keys whose value is `undefined` so spreads keep lower-priority values. */
function stripUndefined<T extends object>(value: T): T {
  for (const [key, entry] of Object.entries(value)) {
    if (entry === undefined) {
      Reflect.deleteProperty(value, key);
    } else if (isObjectRecord(entry)) {
      stripUndefined(entry);
    }
  }
  return value;
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
