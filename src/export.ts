import { writeFile } from "node:fs/promises";
import { IoError, describeError } from "./errors";
import { logger } from "./logger";
import type { CrawlReport, ExportTargets, NormalizedUrl } from "./types";

export type ExportKind = keyof ExportTargets;

export interface ExportSink {
  writeText: (filePath: string, content: string) => Promise<void>;
}

export interface ExportSummary {
  written: { kind: ExportKind; path: string; count: number }[];
  failed: { kind: ExportKind; path: string; error: IoError }[];
}

const EXPORT_KINDS: readonly ExportKind[] = ["all", "internal", "external"];

export const nodeExportSink: ExportSink = {
  writeText: async (filePath, content) => {
    await writeFile(filePath, content, "utf8");
  },
};

export function sortUrls(urls: Iterable<NormalizedUrl>): string[] {
  return Array.from(urls, (url) => url.href).sort((a, b) =>
    a < b ? -1 : a > b ? 1 : 0
  );
}

export function formatUrlList(urls: Iterable<NormalizedUrl>): string {
  const lines = sortUrls(urls);
  return lines.length > 0 ? `${lines.join("\n")}\n` : "";
}

/**
 * Write each requested URL set to its file. A failing export is logged and
 * reported; the remaining ones still run.
 */
export async function writeExports(
  report: Pick<CrawlReport, ExportKind>,
  targets: ExportTargets,
  sink: ExportSink = nodeExportSink
): Promise<ExportSummary> {
  const summary: ExportSummary = { written: [], failed: [] };

  for (const kind of EXPORT_KINDS) {
    const filePath = targets[kind];
    if (!filePath) {
      continue;
    }
    const urls = report[kind];
    try {
      await sink.writeText(filePath, formatUrlList(urls));
      summary.written.push({ kind, path: filePath, count: urls.length });
      logger.info(`Exported ${urls.length} ${kind} URL(s) to ${filePath}`);
    } catch (error) {
      const ioError = new IoError(
        filePath,
        `Cannot export ${kind} URLs to ${filePath}: ${describeError(error)}`,
        { cause: error }
      );
      summary.failed.push({ kind, path: filePath, error: ioError });
      logger.error(ioError.message);
    }
  }

  return summary;
}

export function printUrlListing(
  report: Pick<CrawlReport, "internal" | "external">
): void {
  logger.printListing("Internal urls:", "green", sortUrls(report.internal));
  logger.printListing("External urls:", "red", sortUrls(report.external));
}
