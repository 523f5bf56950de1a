/**
 * Levelled console output plus a one-line progress bar for the crawl.
 *
 * Log lines are written through `console`, the bar straight to stdout. The
 * bar is only drawn on a TTY and is cleared before every log line so the
 * two never interleave.
 */

import type { CrawlFailure } from "./types";
import { formatDuration } from "./utils";

const ANSI = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",

  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  cyan: "\x1b[36m",
  gray: "\x1b[90m",
  brightGreen: "\x1b[92m",

  clearLine: "\x1b[2K",
  cursorToStart: "\x1b[0G",
  hideCursor: "\x1b[?25l",
  showCursor: "\x1b[?25h",
} as const;

export type LogLevel = "debug" | "info" | "success" | "warn" | "error";

export type ListingColor = "green" | "red";

interface LoggerConfig {
  verbose: boolean;
  showProgress: boolean;
}

const LEVELS: Record<
  LogLevel,
  { color: string; tag: string; write: (line: string) => void }
> = {
  debug: { color: ANSI.gray, tag: "DEBUG", write: (line) => console.info(line) },
  info: { color: ANSI.blue, tag: "INFO", write: (line) => console.info(line) },
  success: {
    color: ANSI.green,
    tag: "OK",
    write: (line) => console.info(line),
  },
  warn: { color: ANSI.yellow, tag: "WARN", write: (line) => console.warn(line) },
  error: { color: ANSI.red, tag: "ERROR", write: (line) => console.error(line) },
};

const LISTING_COLORS: Record<ListingColor, string> = {
  green: ANSI.brightGreen,
  red: ANSI.red,
};

const BAR_WIDTH = 30;
const FALLBACK_COLUMNS = 80;
// Bar, percentage, counters and elapsed time.
const BAR_CHROME_WIDTH = 55;

/** Shorten a URL for the status line, keeping its host and the tail of its path. */
function ellipsize(url: string, width: number): string {
  if (url.length <= width) {
    return url;
  }
  const keep = Math.max(0, width - 3);
  const head = Math.ceil(keep / 2);
  return `${url.slice(0, head)}...${url.slice(url.length - (keep - head))}`;
}

class ProgressBar {
  visited = 0;
  discovered = 0;
  failures = 0;
  currentUrl = "";
  readonly startedAt = Date.now();
  private drawn = false;

  constructor(private readonly enabled: boolean) {
    if (enabled) {
      process.stdout.write(ANSI.hideCursor);
    }
  }

  get elapsed(): string {
    return formatDuration(Date.now() - this.startedAt);
  }

  draw(): void {
    if (!this.enabled) {
      return;
    }
    const ratio =
      this.discovered > 0 ? Math.min(1, this.visited / this.discovered) : 0;
    const filled = Math.round(ratio * BAR_WIDTH);
    const bar = `${ANSI.green}${"█".repeat(filled)}${ANSI.gray}${"░".repeat(BAR_WIDTH - filled)}${ANSI.reset}`;
    const failed =
      this.failures > 0
        ? ` ${ANSI.red}(${this.failures} failed)${ANSI.reset}`
        : "";
    const columns = process.stdout.columns ?? FALLBACK_COLUMNS;
    const url = ellipsize(
      this.currentUrl,
      Math.max(20, columns - BAR_CHROME_WIDTH)
    );

    process.stdout.write(
      `${ANSI.cursorToStart}${ANSI.clearLine}${bar} ${ANSI.bold}${Math.round(ratio * 100)}%${ANSI.reset} ` +
        `${ANSI.dim}(${this.visited}/${this.discovered})${ANSI.reset}${failed} ` +
        `${ANSI.dim}${this.elapsed}${ANSI.reset} ${ANSI.cyan}${url}${ANSI.reset}`
    );
    this.drawn = true;
  }

  erase(): void {
    if (this.drawn) {
      process.stdout.write(`${ANSI.cursorToStart}${ANSI.clearLine}`);
      this.drawn = false;
    }
  }

  close(): void {
    this.erase();
    if (this.enabled) {
      process.stdout.write(ANSI.showCursor);
    }
  }
}

class Logger {
  private config: LoggerConfig = { verbose: false, showProgress: true };
  private bar: ProgressBar | null = null;
  private readonly isTerminal = process.stdout.isTTY ?? false;

  configure(config: Partial<LoggerConfig>): void {
    this.config = { ...this.config, ...config };
  }

  private write(level: LogLevel, message: string): void {
    const { color, tag, write } = LEVELS[level];
    const stamp = this.config.verbose
      ? `${ANSI.dim}[${new Date().toISOString().slice(11, 23)}]${ANSI.reset} `
      : "";

    this.bar?.erase();
    write(`${stamp}${color}${ANSI.bold}[${tag}]${ANSI.reset} ${message}`);
    this.bar?.draw();
  }

  debug(message: string): void {
    if (this.config.verbose) {
      this.write("debug", message);
    }
  }

  info(message: string): void {
    this.write("info", message);
  }

  success(message: string): void {
    this.write("success", message);
  }

  warn(message: string): void {
    this.write("warn", message);
  }

  error(message: string): void {
    this.write("error", message);
  }

  startProgress(discovered: number): void {
    this.bar?.close();
    this.bar = new ProgressBar(this.isTerminal && this.config.showProgress);
    this.bar.discovered = discovered;
    this.bar.draw();
  }

  updateProgress(visited: number, discovered: number, url?: string): void {
    if (!this.bar) {
      return;
    }
    this.bar.visited = visited;
    this.bar.discovered = discovered;
    if (url) {
      this.bar.currentUrl = url;
    }
    this.bar.draw();
  }

  recordFailure(): void {
    if (!this.bar) {
      return;
    }
    this.bar.failures += 1;
    this.bar.draw();
  }

  /**
   * Close the bar and print the summary line for the run.
   */
  endProgress(aborted = false): void {
    const bar = this.bar;
    if (!bar) {
      return;
    }
    bar.close();
    this.bar = null;

    const label = aborted
      ? `${ANSI.yellow}${ANSI.bold}[ABORTED]${ANSI.reset}`
      : `${ANSI.cyan}${ANSI.bold}[DONE]${ANSI.reset}`;
    const failed =
      bar.failures > 0 ? `, ${ANSI.red}${bar.failures} failed${ANSI.reset}` : "";
    console.info(
      `${label} Finished in ${ANSI.bold}${bar.elapsed}${ANSI.reset} ` +
        `(${ANSI.green}${bar.visited} visited${ANSI.reset} of ${bar.discovered} discovered${failed})`
    );
  }

  /** Put the cursor back when the process exits mid-crawl. */
  restoreTerminal(): void {
    this.bar?.close();
    this.bar = null;
  }

  logFetch(url: string): void {
    this.debug(`Fetching ${url}`);
  }

  logVisited(url: string, newCount: number): void {
    this.success(
      `Visited ${ANSI.cyan}${url}${ANSI.reset} ${ANSI.dim}(${newCount} new)${ANSI.reset}`
    );
  }

  logFound(url: string, scope: string): void {
    this.debug(`Found ${url} ${ANSI.dim}(${scope})${ANSI.reset}`);
  }

  logBlocked(url: string, reason: string): void {
    this.debug(
      `${ANSI.yellow}Not crawling${ANSI.reset} ${url} ${ANSI.dim}(${reason})${ANSI.reset}`
    );
  }

  logSkipped(message: string): void {
    this.debug(`Skipped: ${message}`);
  }

  printFailureSummary(failures: CrawlFailure[]): void {
    if (failures.length === 0) {
      return;
    }
    console.warn(
      `\n${ANSI.yellow}${ANSI.bold}Failed URLs (${failures.length}):${ANSI.reset}`
    );
    for (const { url, reason } of failures) {
      console.warn(`  ${ANSI.dim}-${ANSI.reset} ${url}: ${reason}`);
    }
  }

  printListing(title: string, color: ListingColor, urls: string[]): void {
    console.info(`${LISTING_COLORS[color]}${title}${ANSI.reset}`);
    for (const url of urls) {
      console.info(url);
    }
  }

  /**
   * Print the effective settings. Verbose mode only.
   */
  logCrawlStart(seed: string, settings: Record<string, unknown>): void {
    if (!this.config.verbose) {
      return;
    }
    const rows = [["seed", seed], ...Object.entries(settings)];
    console.info(`\n${ANSI.cyan}${ANSI.bold}Crawl settings:${ANSI.reset}`);
    for (const [key, value] of rows) {
      console.info(`  ${ANSI.dim}${String(key)}:${ANSI.reset} ${String(value)}`);
    }
    console.info("");
  }
}

export const logger = new Logger();
