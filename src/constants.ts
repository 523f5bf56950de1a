import { packageVersion } from "./package-info";
import type { CliOptions } from "./types";

export const DEFAULT_OPTIONS: CliOptions = {
  download: false,
  crawlExternal: false,
  maxUrlLength: 300,
  exclude: [],
  intervalMs: 100,
  concurrency: 4,
  requestTimeoutMs: 15_000,
  userAgent: `sitecrawl/${packageVersion}`,
  outDir: ".",
  list: true,
  progress: true,
  verbose: false,
};

export const SUPPORTED_PROTOCOLS = new Set(["http:", "https:"]);

export const NON_FETCHABLE_PREFIX_REGEX =
  /^\s*(javascript|mailto|tel|data|blob|about):/i;

export const MALFORMED_PERCENT_REGEX = /%(?![0-9a-f]{2})/i;

export const HTML_CONTENT_TYPES = new Set([
  "text/html",
  "application/xhtml+xml",
]);

export const HTML_EXTENSION_REGEX = /\.html?$/i;

export const INDEX_FILE_NAME = "index.html";

/**
 * Attributes scanned for references, per element. Elements are visited in
 * document order.
 */
export const RESOURCE_ATTRIBUTES: Readonly<
  Record<string, readonly ("href" | "src" | "srcset" | "poster")[]>
> = {
  a: ["href"],
  area: ["href"],
  link: ["href"],
  img: ["src", "srcset"],
  script: ["src"],
  iframe: ["src"],
  source: ["src", "srcset"],
  video: ["src", "poster"],
  audio: ["src"],
  embed: ["src"],
};

export const LIST_SPLIT_REGEX = /\s*,\s*/;
export const WHITESPACE_REGEX = /\s+/;
