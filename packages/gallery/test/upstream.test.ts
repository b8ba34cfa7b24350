import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { createLogger, type LogSink } from "../src/logger.js";
import type { ExtensionQueryResult, FetchLike } from "../src/types.js";
import { countExtensions, UpstreamGallery } from "../src/upstream.js";
import { createQuery, createTestGallery, SERVER_URL, type TestGallery } from "./utils.js";

const UPSTREAM_URL = "https://upstream.test";

const UPSTREAM_RESULT: ExtensionQueryResult = {
  results: [
    {
      extensions: [
        {
          extensionId: "ext-remote",
          extensionName: "remote",
          displayName: "Remote",
          shortDescription: "",
          publisher: {
            publisherId: "ns-other",
            publisherName: "other",
            displayName: "other",
            domain: null,
            isDomainVerified: false,
          },
          releaseDate: "2024-01-01T00:00:00.000Z",
          publishedDate: "2024-01-01T00:00:00.000Z",
          lastUpdated: "2024-01-01T00:00:00.000Z",
          flags: "",
        },
      ],
      pagingToken: null,
      resultMetadata: [],
    },
  ],
};

function createSink(): LogSink & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    out: (line) => lines.push(line),
    err: (line) => lines.push(line),
  };
}

describe("UpstreamGallery", () => {
  it("forwards extension queries", async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => Response.json(UPSTREAM_RESULT));
    const upstream = new UpstreamGallery({ url: `${UPSTREAM_URL}/`, fetchImpl });

    const result = await upstream.extensionQuery(createQuery([{ filterType: 10, value: "remote" }], 0x1));

    expect(result).toEqual(UPSTREAM_RESULT);
    expect(result === null ? 0 : countExtensions(result)).toBe(1);
    expect(fetchImpl).toHaveBeenCalledWith(`${UPSTREAM_URL}/vscode/gallery/extensionquery`, {
      method: "POST",
      headers: { accept: "application/json", "content-type": "application/json" },
      body: JSON.stringify(createQuery([{ filterType: 10, value: "remote" }], 0x1)),
    });
  });

  it("logs and ignores failing upstreams", async () => {
    const sink = createSink();
    const upstream = new UpstreamGallery({
      url: UPSTREAM_URL,
      fetchImpl: async () => {
        throw new Error("connect ECONNREFUSED");
      },
      logger: createLogger({ noColor: true }, sink),
    });

    expect(await upstream.extensionQuery(createQuery([], 0))).toBeNull();
    expect(sink.lines).toEqual(["warning: Upstream extension query request failed: connect ECONNREFUSED"]);
  });

  it("ignores unexpected payloads and error statuses", async () => {
    const payload = new UpstreamGallery({ url: UPSTREAM_URL, fetchImpl: async () => Response.json({ ok: true }) });
    const status = new UpstreamGallery({
      url: UPSTREAM_URL,
      fetchImpl: async () => new Response("down", { status: 503 }),
    });

    expect(await payload.extensionQuery(createQuery([], 0))).toBeNull();
    expect(await status.extensionQuery(createQuery([], 0))).toBeNull();
  });

  it("checks item and download URLs without following redirects", async () => {
    const fetchImpl = vi.fn<FetchLike>(async () => new Response(null, { status: 302 }));
    const upstream = new UpstreamGallery({ url: UPSTREAM_URL, fetchImpl });

    expect(await upstream.getItemUrl("other", "remote")).toBe(`${UPSTREAM_URL}/vscode/item?itemName=other.remote`);
    expect(await upstream.getDownloadUrl("other", "remote", "1.0.0", "linux-x64")).toBe(
      `${UPSTREAM_URL}/vscode/gallery/publishers/other/vsextensions/remote/1.0.0/vspackage?targetPlatform=linux-x64`,
    );
    expect(fetchImpl).toHaveBeenCalledWith(`${UPSTREAM_URL}/vscode/item?itemName=other.remote`, {
      method: "HEAD",
      redirect: "manual",
    });
  });

  it("reports missing items", async () => {
    const upstream = new UpstreamGallery({
      url: UPSTREAM_URL,
      fetchImpl: async () => new Response(null, { status: 404 }),
    });

    expect(await upstream.getItemUrl("other", "remote")).toBeNull();
  });
});

describe("gallery with an upstream", () => {
  let gallery: TestGallery;

  beforeEach(async () => {
    gallery = await createTestGallery({
      upstream: new UpstreamGallery({
        url: UPSTREAM_URL,
        fetchImpl: async (input, init) => {
          if (init?.method === "POST") {
            return Response.json(UPSTREAM_RESULT);
          }

          return new Response(null, { status: String(input).includes("remote") ? 200 : 404 });
        },
      }),
    });
  });

  afterEach(async () => {
    await gallery.cleanup();
  });

  it("answers from the local catalog first", async () => {
    const response = await gallery.query(createQuery([{ filterType: 4, value: "ext-yaml" }], 0x80 | 0x1));

    const body: unknown = await response.json();
    expect(body).toMatchObject({
      results: [{ extensions: [{ extensionId: "ext-yaml", versions: [{ assetUri: `${SERVER_URL}/vscode/asset/redhat/vscode-yaml/1.2.0` }, {}] }] }],
    });
  });

  it("falls back to the upstream for empty results", async () => {
    const response = await gallery.query(createQuery([{ filterType: 7, value: "other.remote" }], 0x1));

    expect(await response.json()).toEqual(UPSTREAM_RESULT);
  });

  it("redirects items and downloads the catalog does not have", async () => {
    const item = await gallery.get("/vscode/item?itemName=other.remote");
    const download = await gallery.get("/vscode/gallery/publishers/other/vsextensions/remote/1.0.0/vspackage");

    expect(item.headers.get("location")).toBe(`${UPSTREAM_URL}/vscode/item?itemName=other.remote`);
    expect(download.headers.get("location")).toBe(
      `${UPSTREAM_URL}/vscode/gallery/publishers/other/vsextensions/remote/1.0.0/vspackage`,
    );
  });

  it("answers 404 when the upstream does not know the item either", async () => {
    const response = await gallery.get("/vscode/item?itemName=other.unknown");

    expect(response.status).toBe(404);
  });
});
