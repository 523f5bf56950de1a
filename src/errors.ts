/**
 * Error types raised by the crawler.
 *
 * Every error carries a stable `code`; `hasErrorCode` tests it the same way
 * for these errors and for Node's system errors (`EEXIST` and friends).
 */
export type CrawlerErrorCode =
  | "INVALID_URL"
  | "FETCH_FAILED"
  | "IO_FAILED"
  | "FRONTIER_STATE";

export class CrawlerError extends Error {
  readonly code: CrawlerErrorCode;

  constructor(message: string, code: CrawlerErrorCode, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidUrlError extends CrawlerError {
  readonly input: string;

  constructor(input: string, reason: string) {
    super(`Invalid URL "${input}": ${reason}`, "INVALID_URL");
    this.input = input;
  }
}

export class FetchError extends CrawlerError {
  readonly url: string;
  readonly status?: number;

  constructor(
    url: string,
    message: string,
    status?: number,
    options?: ErrorOptions
  ) {
    super(message, "FETCH_FAILED", options);
    this.url = url;
    this.status = status;
  }
}

export class IoError extends CrawlerError {
  readonly path: string;

  constructor(path: string, message: string, options?: ErrorOptions) {
    super(message, "IO_FAILED", options);
    this.path = path;
  }
}

export class FrontierStateError extends CrawlerError {
  constructor(message: string) {
    super(message, "FRONTIER_STATE");
  }
}

export function hasErrorCode(error: unknown, code: string): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === code
  );
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function isAbortError(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.name === "AbortError" || error.name === "TimeoutError")
  );
}
