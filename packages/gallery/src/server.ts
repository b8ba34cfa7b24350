import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";

import { BadRequestError, NotFoundError, toGalleryError } from "./errors.js";
import { GalleryService, type BrowseResult } from "./gallery.js";
import { logger as defaultLogger, type Logger } from "./logger.js";
import type { StoredFile } from "./storage.js";
import { trimTrailingSlash } from "./storage.js";
import type { GalleryServerOptions } from "./types.js";
import { parseExtensionQueryParam } from "./validators.js";

export const ASSET_CACHE_CONTROL = "public, max-age=2592000";

interface ExtensionQueryRoute {
  type: "extensionquery";
}

interface AssetRoute {
  type: "asset";
  namespace: string;
  extension: string;
  version: string;
  assetPath: string;
}

interface ItemRoute {
  type: "item";
}

interface DownloadRoute {
  type: "vspackage";
  namespace: string;
  extension: string;
  version: string;
}

interface BrowseRoute {
  type: "unpkg";
  namespace: string;
  extension: string;
  version: string;
  path: string;
}

interface LatestRoute {
  type: "latest";
  namespace: string;
  extension: string;
}

export type GalleryRoute = ExtensionQueryRoute | AssetRoute | ItemRoute | DownloadRoute | BrowseRoute | LatestRoute;

export function createGalleryRequestHandler(options: GalleryServerOptions): (request: Request) => Promise<Response> {
  const logger = options.logger ?? defaultLogger;
  const gallery = new GalleryService({
    repository: options.repository,
    search: options.search,
    storage: options.storage,
    upstream: options.upstream,
    settings: options.settings,
    logger,
  });

  return async (request: Request): Promise<Response> => {
    const startedAt = Date.now();
    const url = new URL(request.url);
    const serverUrl = trimTrailingSlash(options.serverUrl ?? url.origin);

    let response: Response;
    try {
      response = await dispatch(gallery, request, url, serverUrl);
    } catch (error) {
      const galleryError = toGalleryError(error);
      if (galleryError.status >= 500) {
        logger.error(`${request.method} ${url.pathname} failed: ${describeError(error)}`);
      }
      response = createTextResponse(galleryError.status, galleryError.message);
    }

    response.headers.set("access-control-allow-origin", "*");
    logger.debug(`${request.method} ${url.pathname} ${response.status}`, {
      durationMs: Date.now() - startedAt,
    });

    return response;
  };
}

export function createGalleryNodeServer(options: GalleryServerOptions): Server {
  const handler = createGalleryRequestHandler(options);
  const logger = options.logger ?? defaultLogger;

  return createServer((request, response) => {
    handleNodeRequest(handler, request, response).catch((error: unknown) => {
      logger.error(`${request.method ?? "GET"} ${request.url ?? "/"} failed: ${describeError(error)}`);
      if (response.headersSent) {
        response.destroy();
        return;
      }
      response.writeHead(500, { "content-type": "text/plain; charset=utf-8" });
      response.end("Internal server error");
    });
  });
}

async function handleNodeRequest(
  handler: (request: Request) => Promise<Response>,
  request: IncomingMessage,
  response: ServerResponse,
): Promise<void> {
  const url = toWebRequestUrl(request);
  if (url === null) {
    response.writeHead(400, { "content-type": "text/plain; charset=utf-8" });
    response.end("Bad request");
    return;
  }

  const webResponse = await handler(await toWebRequest(request, url));
  await sendWebResponse(response, webResponse);
}

async function dispatch(gallery: GalleryService, request: Request, url: URL, serverUrl: string): Promise<Response> {
  if (request.method === "OPTIONS") {
    return new Response(null, {
      status: 204,
      headers: {
        "access-control-allow-methods": "GET, POST, OPTIONS",
        "access-control-allow-headers": "content-type, accept, x-market-client-id, x-market-user-id",
      },
    });
  }

  const route = parseGalleryRoute(url.pathname);
  if (route === null) {
    return createTextResponse(404, "Not found");
  }

  if (route.type === "extensionquery") {
    if (request.method !== "POST") {
      return createMethodNotAllowedResponse();
    }

    const param = parseExtensionQueryParam(await readJsonBody(request));
    if (param === null) {
      throw new BadRequestError("Invalid extension query", "INVALID_QUERY");
    }

    return createJsonResponse(200, await gallery.extensionQuery(param, serverUrl));
  }

  if (request.method !== "GET" && request.method !== "HEAD") {
    return createMethodNotAllowedResponse();
  }

  const targetPlatform = url.searchParams.get("targetPlatform");

  switch (route.type) {
    case "asset": {
      const file = await gallery.getAsset(
        route.namespace,
        route.extension,
        route.version,
        route.assetPath,
        targetPlatform,
        request.method === "GET",
      );
      return createFileResponse(file);
    }

    case "item":
      return createRedirectResponse(await gallery.getItemUrl(url.searchParams.get("itemName")));

    case "vspackage":
      return createRedirectResponse(
        await gallery.getDownloadUrl(route.namespace, route.extension, route.version, targetPlatform, serverUrl),
      );

    case "unpkg":
      return createBrowseResponse(
        await gallery.browse(route.namespace, route.extension, route.version, route.path, serverUrl),
      );

    case "latest":
      return createJsonResponse(200, await gallery.getLatest(route.namespace, route.extension, serverUrl));
  }
}

export function parseGalleryRoute(pathname: string): GalleryRoute | null {
  const segments: string[] = [];

  for (const part of pathname.split("/")) {
    if (part.length === 0) {
      continue;
    }

    try {
      segments.push(decodeURIComponent(part));
    } catch {
      return null;
    }
  }

  if (segments[0] !== "vscode") {
    return null;
  }

  const [, area, ...rest] = segments;

  if (area === "item" && rest.length === 0) {
    return { type: "item" };
  }

  if (area === "asset") {
    const [namespace, extension, version, ...assetSegments] = rest;
    if (namespace === undefined || extension === undefined || version === undefined || assetSegments.length === 0) {
      return null;
    }

    return { type: "asset", namespace, extension, version, assetPath: assetSegments.join("/") };
  }

  if (area === "unpkg") {
    const [namespace, extension, version, ...pathSegments] = rest;
    if (namespace === undefined || extension === undefined || version === undefined) {
      return null;
    }

    return { type: "unpkg", namespace, extension, version, path: pathSegments.join("/") };
  }

  if (area !== "gallery") {
    return null;
  }

  if (rest.length === 1 && rest[0] === "extensionquery") {
    return { type: "extensionquery" };
  }

  if (rest.length === 3 && rest[2] === "latest") {
    const [namespace, extension] = rest;
    if (namespace === undefined || extension === undefined) {
      return null;
    }

    return { type: "latest", namespace, extension };
  }

  const [publishers, namespace, vsextensions, extension, version, vspackage] = rest;
  if (
    rest.length === 6 &&
    publishers === "publishers" &&
    vsextensions === "vsextensions" &&
    vspackage === "vspackage" &&
    namespace !== undefined &&
    extension !== undefined &&
    version !== undefined
  ) {
    return { type: "vspackage", namespace, extension, version };
  }

  return null;
}

async function readJsonBody(request: Request): Promise<unknown> {
  const raw = await request.text();

  try {
    return JSON.parse(raw);
  } catch {
    throw new BadRequestError("Request body must be valid JSON", "INVALID_JSON");
  }
}

function createFileResponse(file: StoredFile): Response {
  if (file.kind === "redirect") {
    return new Response(null, {
      status: 302,
      headers: {
        location: file.location,
        "cache-control": ASSET_CACHE_CONTROL,
      },
    });
  }

  return new Response(file.data, {
    status: 200,
    headers: {
      "content-type": file.contentType,
      "content-length": String(file.data.byteLength),
      "cache-control": ASSET_CACHE_CONTROL,
    },
  });
}

function createBrowseResponse(result: BrowseResult): Response {
  if (result.kind === "file") {
    return createFileResponse(result.file);
  }

  if (result.urls.length === 0) {
    throw new NotFoundError();
  }

  return createJsonResponse(200, result.urls);
}

function createRedirectResponse(location: string): Response {
  return new Response(null, {
    status: 302,
    headers: { location },
  });
}

function createJsonResponse(status: number, payload: unknown): Response {
  return new Response(JSON.stringify(payload), {
    status,
    headers: {
      "content-type": "application/json; charset=utf-8",
    },
  });
}

function createTextResponse(status: number, message: string): Response {
  return new Response(message, {
    status,
    headers: {
      "content-type": "text/plain; charset=utf-8",
    },
  });
}

function createMethodNotAllowedResponse(): Response {
  return createTextResponse(405, "Method not allowed");
}

function describeError(error: unknown): string {
  return error instanceof Error ? (error.stack ?? error.message) : String(error);
}

function toWebRequestUrl(request: IncomingMessage): URL | null {
  const host = request.headers.host ?? "localhost";
  try {
    return new URL(request.url ?? "/", `http://${host}`);
  } catch {
    return null;
  }
}

async function toWebRequest(request: IncomingMessage, url: URL): Promise<Request> {
  const method = request.method ?? "GET";

  const headers = new Headers();
  for (const [key, value] of Object.entries(request.headers)) {
    if (typeof value === "string") {
      headers.set(key, value);
      continue;
    }

    if (Array.isArray(value)) {
      for (const entry of value) {
        headers.append(key, entry);
      }
    }
  }

  if (method === "GET" || method === "HEAD" || method === "OPTIONS") {
    return new Request(url, { method, headers });
  }

  return new Request(url, {
    method,
    headers,
    body: await readIncomingBody(request),
  });
}

async function readIncomingBody(request: IncomingMessage): Promise<Buffer> {
  const chunks: Buffer[] = [];

  for await (const chunk of request) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
  }

  return Buffer.concat(chunks);
}

async function sendWebResponse(response: ServerResponse, webResponse: Response): Promise<void> {
  response.statusCode = webResponse.status;

  for (const [key, value] of webResponse.headers.entries()) {
    response.setHeader(key, value);
  }

  const body = Buffer.from(await webResponse.arrayBuffer());
  response.end(body);
}
