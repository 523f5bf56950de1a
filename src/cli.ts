#!/usr/bin/env tsx
import { parseArgs, printHelp } from "./args";
import { buildCrawlConfig } from "./config";
import { crawlSite } from "./crawler";
import { describeError } from "./errors";
import { printUrlListing, writeExports } from "./export";
import { logger } from "./logger";
import { packageVersion } from "./package-info";
import type { CrawlConfig } from "./types";
import { isMainModule } from "./utils";

const INTERRUPT_SIGNALS = [
  { signal: "SIGINT", exitCode: 130 },
  { signal: "SIGTERM", exitCode: 143 },
] as const;

/**
 * The first SIGINT/SIGTERM aborts the crawl so exports still run; a second
 * one exits immediately.
 */
function installInterruptHandlers(controller: AbortController): () => void {
  const handlers = INTERRUPT_SIGNALS.map(({ signal, exitCode }) => {
    const handler = (): void => {
      if (controller.signal.aborted) {
        logger.restoreTerminal();
        process.exit(exitCode);
      }
      controller.abort();
    };
    process.on(signal, handler);
    return { signal, handler };
  });

  return () => {
    for (const { signal, handler } of handlers) {
      process.off(signal, handler);
    }
  };
}

export async function main(argv: string[]): Promise<void> {
  let config: CrawlConfig;
  let list: boolean;
  try {
    const result = parseArgs(argv);

    if (result.showVersion) {
      console.log(packageVersion);
      return;
    }
    if (result.showHelp) {
      printHelp();
      return;
    }

    logger.configure({
      verbose: result.options.verbose,
      showProgress: result.options.progress,
    });
    config = buildCrawlConfig(result.options);
    list = result.options.list;
  } catch (error) {
    printHelp();
    logger.error(describeError(error));
    process.exitCode = 1;
    return;
  }

  const controller = new AbortController();
  const removeHandlers = installInterruptHandlers(controller);
  try {
    const report = await crawlSite(config, { signal: controller.signal });

    if (list) {
      printUrlListing(report);
    }
    await writeExports(report, config.exports);
    if (report.downloadFailures > 0) {
      logger.warn(`${report.downloadFailures} file(s) could not be saved`);
    }
  } finally {
    removeHandlers();
  }
}

if (isMainModule(import.meta.url)) {
  main(process.argv.slice(2)).catch((error: unknown) => {
    logger.error(describeError(error));
    process.exitCode = 1;
  });
}
