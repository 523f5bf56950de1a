import { FetchError, describeError, isAbortError } from "./errors";
import { logger } from "./logger";
import type { Fetcher, FetchResponse } from "./types";

export interface HttpFetcherOptions {
  timeoutMs: number;
  userAgent: string;
}

async function fetchResponseWithTimeout(
  targetUrl: string,
  timeoutMs: number,
  headers: Record<string, string>,
  signal?: AbortSignal
): Promise<Response> {
  const timeoutSignal = AbortSignal.timeout(timeoutMs);
  const combined = signal
    ? AbortSignal.any([signal, timeoutSignal])
    : timeoutSignal;

  return await fetch(targetUrl, {
    headers,
    redirect: "follow",
    signal: combined,
  });
}

/**
 * Default transport: Node's global fetch with a per-request timeout. Any
 * non-2xx status, timeout or network error surfaces as a FetchError.
 */
export function createHttpFetcher(options: HttpFetcherOptions): Fetcher {
  const fetchUrl = async (
    targetUrl: string,
    signal?: AbortSignal
  ): Promise<FetchResponse> => {
    logger.logFetch(targetUrl);
    let response: Response;
    try {
      response = await fetchResponseWithTimeout(
        targetUrl,
        options.timeoutMs,
        { "User-Agent": options.userAgent },
        signal
      );
    } catch (error) {
      const reason = isAbortError(error)
        ? signal?.aborted
          ? "aborted"
          : `timed out after ${options.timeoutMs}ms`
        : describeError(error);
      throw new FetchError(targetUrl, reason, undefined, { cause: error });
    }

    if (!response.ok) {
      await response.body?.cancel();
      throw new FetchError(
        targetUrl,
        `HTTP ${response.status} ${response.statusText}`.trim(),
        response.status
      );
    }

    let body: Uint8Array;
    try {
      body = new Uint8Array(await response.arrayBuffer());
    } catch (error) {
      throw new FetchError(
        targetUrl,
        `Cannot read response body: ${describeError(error)}`,
        response.status,
        { cause: error }
      );
    }

    return {
      url: response.url || targetUrl,
      status: response.status,
      contentType: response.headers.get("content-type"),
      body,
    };
  };

  return { fetch: fetchUrl };
}
