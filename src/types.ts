export interface CliOptions {
  url?: string;
  download: boolean;
  crawlExternal: boolean;
  maxUrlLength: number;
  exclude: string[];
  exportAll?: string;
  exportInternal?: string;
  exportExternal?: string;
  intervalMs: number;
  concurrency: number;
  requestTimeoutMs: number;
  userAgent: string;
  outDir: string;
  list: boolean;
  progress: boolean;
  verbose: boolean;
}

export interface ExportTargets {
  all?: string;
  internal?: string;
  external?: string;
}

export interface CrawlConfig {
  readonly seed: NormalizedUrl;
  readonly crawlExternal: boolean;
  readonly maxUrlLength: number;
  readonly exclude: readonly string[];
  readonly download: boolean;
  readonly downloadDir: string;
  readonly intervalMs: number;
  readonly concurrency: number;
  readonly requestTimeoutMs: number;
  readonly userAgent: string;
  readonly exports: Readonly<ExportTargets>;
}

export interface NormalizedUrl {
  readonly href: string;
  readonly protocol: string;
  readonly host: string;
  readonly hostname: string;
  readonly port: string;
  readonly pathname: string;
  readonly search: string;
}

export type Classification =
  | { kind: "internal" }
  | { kind: "external" }
  | { kind: "excluded"; reason: "length" }
  | { kind: "excluded"; reason: "prefix"; prefix: string };

export type FrontierStatus = "pending" | "in-flight" | "visited" | "rejected";

export interface FetchResponse {
  url: string;
  status: number;
  contentType: string | null;
  body: Uint8Array;
}

export interface Fetcher {
  fetch: (url: string, signal?: AbortSignal) => Promise<FetchResponse>;
}

export interface ExtractedReference {
  raw: string;
  base: NormalizedUrl;
  tag: string;
  attribute: string;
}

export interface FrontierEntry {
  url: NormalizedUrl;
  status: FrontierStatus;
}

export interface CrawlFailure {
  url: string;
  reason: string;
}

export interface CrawlReport {
  seed: NormalizedUrl;
  all: NormalizedUrl[];
  internal: NormalizedUrl[];
  external: NormalizedUrl[];
  frontier: FrontierEntry[];
  counts: Record<FrontierStatus, number>;
  excludedCount: number;
  failures: CrawlFailure[];
  downloadFailures: number;
  fetchCount: number;
  aborted: boolean;
  elapsedMs: number;
}
