import { MALFORMED_PERCENT_REGEX, SUPPORTED_PROTOCOLS } from "./constants";
import { InvalidUrlError, hasErrorCode } from "./errors";
import type { NormalizedUrl } from "./types";

const toNormalizedUrl = (parsed: URL): NormalizedUrl =>
  Object.freeze({
    href: parsed.href,
    protocol: parsed.protocol,
    host: parsed.host,
    hostname: parsed.hostname,
    port: parsed.port,
    pathname: parsed.pathname,
    search: parsed.search,
  });

/**
 * Canonicalize an absolute URL, or a reference relative to `base`, into the
 * form used as the frontier's dedup key.
 *
 * Scheme and host come out lower-case, default ports and dot segments are
 * dropped by the WHATWG parser, and the fragment is removed. Path and query
 * keep their case.
 *
 * @throws InvalidUrlError when the input cannot name an http(s) resource.
 */
export function normalizeUrl(
  raw: string,
  base: NormalizedUrl | null = null
): NormalizedUrl {
  const input = raw.trim();
  if (input.length === 0) {
    throw new InvalidUrlError(raw, "empty reference");
  }
  // The fragment is dropped, so its contents are never validated.
  const hashIndex = input.indexOf("#");
  const target = hashIndex === -1 ? input : input.slice(0, hashIndex);
  if (MALFORMED_PERCENT_REGEX.test(target)) {
    throw new InvalidUrlError(raw, "malformed percent-encoding");
  }

  let parsed: URL;
  try {
    parsed = base ? new URL(target, base.href) : new URL(target);
  } catch {
    throw new InvalidUrlError(
      raw,
      base ? "cannot be resolved" : "relative reference without a base URL"
    );
  }

  if (!SUPPORTED_PROTOCOLS.has(parsed.protocol)) {
    throw new InvalidUrlError(raw, `unsupported scheme ${parsed.protocol}`);
  }
  if (parsed.hostname.length === 0) {
    throw new InvalidUrlError(raw, "empty host");
  }

  parsed.hash = "";
  return toNormalizedUrl(parsed);
}

export function tryNormalizeUrl(
  raw: string,
  base: NormalizedUrl | null = null
): NormalizedUrl | null {
  try {
    return normalizeUrl(raw, base);
  } catch (error) {
    if (hasErrorCode(error, "INVALID_URL")) {
      return null;
    }
    throw error;
  }
}
