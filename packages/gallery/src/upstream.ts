import type { Logger } from "./logger.js";
import type { ExtensionQueryParam, ExtensionQueryResult, FetchLike } from "./types.js";
import { isObjectRecord } from "./validators.js";
import { trimTrailingSlash } from "./storage.js";

export interface UpstreamGalleryOptions {
  url: string;
  fetchImpl?: FetchLike;
  logger?: Logger;
}

/**
 * Another gallery consulted when the local catalog has no answer.
 * Failures are logged and reported as "not found".
 */
export class UpstreamGallery {
  private readonly url: string;

  private readonly fetchImpl: FetchLike;

  private readonly logger?: Logger;

  constructor(options: UpstreamGalleryOptions) {
    this.url = trimTrailingSlash(options.url);
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.logger = options.logger;
  }

  get baseUrl(): string {
    return this.url;
  }

  async extensionQuery(param: ExtensionQueryParam): Promise<ExtensionQueryResult | null> {
    try {
      const response = await this.fetchImpl(`${this.url}/vscode/gallery/extensionquery`, {
        method: "POST",
        headers: {
          accept: "application/json",
          "content-type": "application/json",
        },
        body: JSON.stringify(param),
      });

      if (!response.ok) {
        this.logger?.warn(`Upstream extension query failed with status ${response.status}`, { upstream: this.url });
        return null;
      }

      const body: unknown = await response.json();
      if (!isExtensionQueryResult(body)) {
        this.logger?.warn("Upstream extension query returned an unexpected payload", { upstream: this.url });
        return null;
      }

      return body;
    } catch (error) {
      this.logUnreachable("extension query", error);
      return null;
    }
  }

  /**
   * Resolves the upstream item page. A `3xx` answer is followed by the client, so
   * only the status is checked here.
   */
  async getItemUrl(namespace: string, extension: string): Promise<string | null> {
    const itemUrl = `${this.url}/vscode/item?itemName=${encodeURIComponent(`${namespace}.${extension}`)}`;
    return (await this.exists(itemUrl, "item")) ? itemUrl : null;
  }

  async getDownloadUrl(
    namespace: string,
    extension: string,
    version: string,
    targetPlatform?: string,
  ): Promise<string | null> {
    const segments = [namespace, "vsextensions", extension, version, "vspackage"].map((segment) =>
      encodeURIComponent(segment),
    );
    let downloadUrl = `${this.url}/vscode/gallery/publishers/${segments.join("/")}`;
    if (targetPlatform !== undefined) {
      downloadUrl += `?targetPlatform=${encodeURIComponent(targetPlatform)}`;
    }

    return (await this.exists(downloadUrl, "download")) ? downloadUrl : null;
  }

  private async exists(url: string, label: string): Promise<boolean> {
    try {
      const response = await this.fetchImpl(url, { method: "HEAD", redirect: "manual" });
      return response.status < 400;
    } catch (error) {
      this.logUnreachable(label, error);
      return false;
    }
  }

  private logUnreachable(label: string, error: unknown): void {
    const message = error instanceof Error ? error.message : String(error);
    this.logger?.warn(`Upstream ${label} request failed: ${message}`, { upstream: this.url });
  }
}

export function isExtensionQueryResult(value: unknown): value is ExtensionQueryResult {
  if (!isObjectRecord(value) || !Array.isArray(value.results)) {
    return false;
  }

  return value.results.every((result) => isObjectRecord(result) && Array.isArray(result.extensions));
}

/** Number of extensions across every result block. */
export function countExtensions(result: ExtensionQueryResult): number {
  return result.results.reduce((total, entry) => total + entry.extensions.length, 0);
}
