import { JSDOM } from "jsdom";
import {
  HTML_CONTENT_TYPES,
  NON_FETCHABLE_PREFIX_REGEX,
  RESOURCE_ATTRIBUTES,
  WHITESPACE_REGEX,
} from "./constants";
import { describeError } from "./errors";
import { logger } from "./logger";
import type { ExtractedReference, NormalizedUrl } from "./types";
import { tryNormalizeUrl } from "./url";

const RESOURCE_SELECTOR = Object.keys(RESOURCE_ATTRIBUTES).join(", ");

export function isHtmlContentType(contentType: string | null): boolean {
  if (!contentType) {
    return false;
  }
  const mediaType = contentType.split(";", 1)[0]?.trim().toLowerCase() ?? "";
  return HTML_CONTENT_TYPES.has(mediaType);
}

export function resolveDocumentBase(
  document: Document,
  pageUrl: NormalizedUrl
): NormalizedUrl {
  const baseHref = document.querySelector("base[href]")?.getAttribute("href");
  if (!baseHref) {
    return pageUrl;
  }
  return tryNormalizeUrl(baseHref, pageUrl) ?? pageUrl;
}

export function splitSrcset(value: string): string[] {
  return value
    .split(",")
    .map((candidate) => candidate.trim().split(WHITESPACE_REGEX, 1)[0] ?? "")
    .filter((candidate) => candidate.length > 0);
}

const isCandidateReference = (value: string): boolean => {
  const trimmed = value.trim();
  if (trimmed.length === 0 || trimmed.startsWith("#")) {
    return false;
  }
  return !NON_FETCHABLE_PREFIX_REGEX.test(trimmed);
};

const parseDocument = (body: string, pageUrl: NormalizedUrl): Document | null => {
  try {
    return new JSDOM(body, { url: pageUrl.href }).window.document;
  } catch (error) {
    logger.debug(`Cannot parse ${pageUrl.href}: ${describeError(error)}`);
    return null;
  }
};

/**
 * Yield the literal link and resource references found in an HTML body, in
 * document order. Values are returned raw; each carries the base it must be
 * resolved against (the page itself, or its `<base href>`).
 */
export function* extractResources(
  body: string,
  pageUrl: NormalizedUrl
): Generator<ExtractedReference> {
  const document = parseDocument(body, pageUrl);
  if (!document) {
    return;
  }
  const base = resolveDocumentBase(document, pageUrl);

  for (const element of document.querySelectorAll(RESOURCE_SELECTOR)) {
    const tag = element.tagName.toLowerCase();
    const attributes = RESOURCE_ATTRIBUTES[tag] ?? [];
    for (const attribute of attributes) {
      const value = element.getAttribute(attribute);
      if (value === null) {
        continue;
      }
      const values = attribute === "srcset" ? splitSrcset(value) : [value];
      for (const raw of values) {
        if (isCandidateReference(raw)) {
          yield { raw, base, tag, attribute };
        }
      }
    }
  }
}
