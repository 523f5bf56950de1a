import path from "node:path";
import { LIST_SPLIT_REGEX } from "./constants";
import type { CliOptions, CrawlConfig } from "./types";
import { normalizeUrl } from "./url";

export function parseExcludeList(values: string[]): string[] {
  return values
    .flatMap((value) => value.split(LIST_SPLIT_REGEX))
    .map((value) => value.trim())
    .filter((value) => value.length > 0);
}

/**
 * Turn parsed CLI options into the read-only configuration shared by every
 * worker.
 *
 * @throws InvalidUrlError when the seed is missing or unusable.
 */
export function buildCrawlConfig(options: CliOptions): CrawlConfig {
  const seed = normalizeUrl(options.url ?? "");

  return Object.freeze({
    seed,
    crawlExternal: options.crawlExternal,
    maxUrlLength: options.maxUrlLength,
    exclude: Object.freeze(parseExcludeList(options.exclude)),
    download: options.download,
    downloadDir: path.resolve(options.outDir),
    intervalMs: options.intervalMs,
    concurrency: Math.max(1, options.concurrency),
    requestTimeoutMs: options.requestTimeoutMs,
    userAgent: options.userAgent,
    exports: Object.freeze({
      all: options.exportAll,
      internal: options.exportInternal,
      external: options.exportExternal,
    }),
  });
}
