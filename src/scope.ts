import type { Classification, CrawlConfig, NormalizedUrl } from "./types";

export type ScopeConfig = Pick<
  CrawlConfig,
  "maxUrlLength" | "exclude" | "crawlExternal"
>;

/**
 * Decide where a URL sits relative to the crawl. Checks run in a fixed
 * order: length, exclusion prefix, host.
 */
export function classify(
  url: NormalizedUrl,
  seedHost: string,
  config: ScopeConfig
): Classification {
  if (url.href.length >= config.maxUrlLength) {
    return { kind: "excluded", reason: "length" };
  }

  const prefix = config.exclude.find(
    (candidate) => candidate.length > 0 && url.pathname.startsWith(candidate)
  );
  if (prefix !== undefined) {
    return { kind: "excluded", reason: "prefix", prefix };
  }

  return url.hostname === seedHost ? { kind: "internal" } : { kind: "external" };
}

export function isFetchEligible(
  classification: Classification,
  config: Pick<CrawlConfig, "crawlExternal">
): boolean {
  switch (classification.kind) {
    case "internal":
      return true;
    case "external":
      return config.crawlExternal;
    case "excluded":
      return false;
  }
}

export function describeClassification(classification: Classification): string {
  if (classification.kind !== "excluded") {
    return classification.kind;
  }
  return classification.reason === "length"
    ? "excluded: URL too long"
    : `excluded: path starts with ${classification.prefix}`;
}
