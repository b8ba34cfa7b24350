import { describe, expect, it } from "vitest";

import { createLogger, type LogSink } from "../src/logger.js";

interface CapturingSink extends LogSink {
  stdout: string[];
  stderr: string[];
}

function createSink(): CapturingSink {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    out: (line) => {
      stdout.push(line);
    },
    err: (line) => {
      stderr.push(line);
    },
  };
}

describe("createLogger", () => {
  it("writes info to stdout and problems to stderr", () => {
    const sink = createSink();
    const logger = createLogger({ noColor: true }, sink);

    logger.info("Loaded 3 documents");
    logger.success("Gallery listening");
    logger.warn("Upstream slow");
    logger.error("Catalog missing");
    logger.debug("hidden");

    expect(sink.stdout).toEqual(["Loaded 3 documents", "✓ Gallery listening"]);
    expect(sink.stderr).toEqual(["warning: Upstream slow", "error: Catalog missing"]);
  });

  it("shows debug output and data when verbose", () => {
    const sink = createSink();
    const logger = createLogger({ noColor: true, verbose: true }, sink);

    logger.debug("GET /vscode/item 302", { durationMs: 4 });

    expect(sink.stdout).toEqual(["[debug] GET /vscode/item 302", JSON.stringify({ durationMs: 4 }, null, 2)]);
  });

  it("keeps only errors when quiet", () => {
    const sink = createSink();
    const logger = createLogger({ noColor: true, quiet: true }, sink);

    logger.info("hidden");
    logger.warn("hidden");
    logger.error("shown");

    expect(sink.stdout).toEqual([]);
    expect(sink.stderr).toEqual(["error: shown"]);
  });

  it("writes one JSON object per line in json mode", () => {
    const sink = createSink();
    const logger = createLogger({ json: true }, sink);

    logger.warn("Upstream slow", { upstream: "https://upstream.test" });

    const [line] = sink.stdout;
    const entry: unknown = JSON.parse(line ?? "");
    expect(entry).toMatchObject({
      level: "warn",
      message: "Upstream slow",
      data: { upstream: "https://upstream.test" },
    });
  });

  it("applies configure to later calls", () => {
    const sink = createSink();
    const logger = createLogger({ noColor: true }, sink);

    logger.configure({ quiet: true });
    logger.info("hidden");

    expect(sink.stdout).toEqual([]);
    expect(logger.getOptions().quiet).toBe(true);
  });
});
