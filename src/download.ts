import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { HTML_EXTENSION_REGEX, INDEX_FILE_NAME } from "./constants";
import { IoError, describeError, hasErrorCode } from "./errors";
import { isHtmlContentType } from "./extract";
import { logger } from "./logger";
import type { NormalizedUrl } from "./types";

export interface FileSink {
  createDirs: (dirPath: string) => Promise<void>;
  /** Must fail with an `EEXIST` code when the file is already there. */
  writeFile: (filePath: string, bytes: Uint8Array) => Promise<void>;
}

export type SaveOutcome =
  | { status: "saved"; path: string }
  | { status: "skipped"; path: string; reason: string };

export interface Downloader {
  save: (
    url: NormalizedUrl,
    bytes: Uint8Array,
    contentType: string | null
  ) => Promise<SaveOutcome>;
}

export const nodeFileSink: FileSink = {
  createDirs: async (dirPath) => {
    await mkdir(dirPath, { recursive: true });
  },
  writeFile: async (filePath, bytes) => {
    await writeFile(filePath, bytes, { flag: "wx" });
  },
};

const safeSegment = (segment: string): string =>
  segment === "." || segment === ".." ? "_" : segment;

/**
 * Map a URL onto `<root>/<host>/<path>`. Directory-like paths get an index
 * file; an HTML page without an .html extension becomes `<path>/index.html`
 * so that `/docs` and `/docs/intro` can both be stored. The query string is
 * not part of the path.
 */
export function buildDownloadPath(
  rootDir: string,
  url: NormalizedUrl,
  contentType: string | null
): string {
  const hostDir = url.host.replaceAll(":", "_");
  const segments = url.pathname.split("/").filter(Boolean).map(safeSegment);
  const directoryLike = segments.length === 0 || url.pathname.endsWith("/");
  const lastSegment = segments.at(-1) ?? "";

  if (
    directoryLike ||
    (isHtmlContentType(contentType) && !HTML_EXTENSION_REGEX.test(lastSegment))
  ) {
    segments.push(INDEX_FILE_NAME);
  }

  return path.join(rootDir, hostDir, ...segments);
}

export function createDownloader(
  rootDir: string,
  sink: FileSink = nodeFileSink
): Downloader {
  const save = async (
    url: NormalizedUrl,
    bytes: Uint8Array,
    contentType: string | null
  ): Promise<SaveOutcome> => {
    const filePath = buildDownloadPath(rootDir, url, contentType);
    const dir = path.dirname(filePath);

    try {
      await sink.createDirs(dir);
    } catch (error) {
      throw new IoError(
        dir,
        `Cannot create directory ${dir}: ${describeError(error)}`,
        { cause: error }
      );
    }

    try {
      await sink.writeFile(filePath, bytes);
    } catch (error) {
      if (hasErrorCode(error, "EEXIST")) {
        logger.logSkipped(`${filePath} already exists (${url.href})`);
        return { status: "skipped", path: filePath, reason: "exists" };
      }
      throw new IoError(
        filePath,
        `Cannot write ${filePath}: ${describeError(error)}`,
        { cause: error }
      );
    }

    logger.debug(`Saved ${url.href} to ${filePath}`);
    return { status: "saved", path: filePath };
  };

  return { save };
}
