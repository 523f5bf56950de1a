import { DEFAULT_OPTIONS } from "./constants";
import { logger } from "./logger";
import type { CliOptions } from "./types";
import { parseNonNegativeInt, parsePositiveInt } from "./utils";

export interface ParseResult {
  options: CliOptions;
  showHelp: boolean;
  showVersion: boolean;
}

export function printHelp(): void {
  const lines = [
    "Usage:",
    "  sitecrawl <url> [options]",
    "",
    "Options:",
    "  -d, --download              Save every fetched file under --out-dir",
    "  -c, --crawl-external        Also crawl hosts other than the seed's",
    "  -m, --max-url-length <n>    Ignore URLs this long or longer (default 300)",
    "  -e, --exclude <prefixes>    Comma-separated path prefixes to skip",
    "      --export <path>         Write all found URLs to a file",
    "      --export-internal <path>  Write internal URLs to a file",
    "      --export-external <path>  Write external URLs to a file",
    "  -t, --timeout <ms>          Minimum delay between requests (default 100)",
    "  -j, --concurrency <n>       Parallel workers (default 4)",
    "      --request-timeout <ms>  Per-request timeout (default 15000)",
    "      --user-agent <string>   Custom User-Agent header",
    "  -o, --out-dir <path>        Download root (default .)",
    "      --no-list               Do not print the URL lists when done",
    "      --no-progress           Hide the progress bar",
    "  -v, --verbose               Verbose logging",
    "  -V, --version               Print the version",
    "  -h, --help                  Show this help",
    "",
    "Examples:",
    "  sitecrawl https://example.com",
    "  sitecrawl https://example.com -d -o ./mirror",
    "  sitecrawl https://example.com -e /blog,/tags --export urls.txt",
  ];
  console.info(lines.join("\n"));
}

const FLAG_ALIASES: Record<string, string> = {
  "-d": "--download",
  "-c": "--crawl-external",
  "-m": "--max-url-length",
  "-e": "--exclude",
  "-t": "--timeout",
  "-j": "--concurrency",
  "-o": "--out-dir",
  "-v": "--verbose",
  "-V": "--version",
  "-h": "--help",
};

export function parseArgs(args: string[]): ParseResult {
  const opts: CliOptions = { ...DEFAULT_OPTIONS, exclude: [] };

  const iterator = args[Symbol.iterator]();
  const positionalArgs: string[] = [];
  let showHelp = false;
  let showVersion = false;

  const consumeNext = (valueFromEq: string | undefined): string | undefined => {
    if (valueFromEq !== undefined) {
      return valueFromEq;
    }
    const next = iterator.next();
    return next.done ? undefined : next.value;
  };

  const requireValue = (
    flag: string,
    valueFromEq: string | undefined
  ): string => {
    const value = consumeNext(valueFromEq);
    if (value === undefined || value.length === 0) {
      throw new Error(`Missing value for ${flag}`);
    }
    return value;
  };

  const handlers: Record<string, (valueFromEq: string | undefined) => void> = {
    "--download": () => {
      opts.download = true;
    },
    "--crawl-external": () => {
      opts.crawlExternal = true;
    },
    "--max-url-length": (valueFromEq) => {
      const raw = consumeNext(valueFromEq);
      opts.maxUrlLength = parsePositiveInt(raw, DEFAULT_OPTIONS.maxUrlLength);
    },
    "--exclude": (valueFromEq) => {
      opts.exclude.push(requireValue("--exclude", valueFromEq));
    },
    "--export": (valueFromEq) => {
      opts.exportAll = requireValue("--export", valueFromEq);
    },
    "--export-internal": (valueFromEq) => {
      opts.exportInternal = requireValue("--export-internal", valueFromEq);
    },
    "--export-external": (valueFromEq) => {
      opts.exportExternal = requireValue("--export-external", valueFromEq);
    },
    "--timeout": (valueFromEq) => {
      const raw = consumeNext(valueFromEq);
      opts.intervalMs = parseNonNegativeInt(raw, DEFAULT_OPTIONS.intervalMs);
    },
    "--concurrency": (valueFromEq) => {
      const raw = consumeNext(valueFromEq);
      opts.concurrency = parsePositiveInt(raw, DEFAULT_OPTIONS.concurrency);
    },
    "--request-timeout": (valueFromEq) => {
      const raw = consumeNext(valueFromEq);
      opts.requestTimeoutMs = parsePositiveInt(
        raw,
        DEFAULT_OPTIONS.requestTimeoutMs
      );
    },
    "--user-agent": (valueFromEq) => {
      opts.userAgent = consumeNext(valueFromEq) ?? DEFAULT_OPTIONS.userAgent;
    },
    "--out-dir": (valueFromEq) => {
      opts.outDir = consumeNext(valueFromEq) ?? DEFAULT_OPTIONS.outDir;
    },
    "--no-list": () => {
      opts.list = false;
    },
    "--no-progress": () => {
      opts.progress = false;
    },
    "--verbose": () => {
      opts.verbose = true;
    },
    "--version": () => {
      showVersion = true;
    },
    "--help": () => {
      showHelp = true;
    },
  };

  for (const arg of iterator) {
    const eqIndex = arg.startsWith("-") ? arg.indexOf("=") : -1;
    const rawFlag = eqIndex === -1 ? arg : arg.slice(0, eqIndex);
    const valueFromEq = eqIndex === -1 ? undefined : arg.slice(eqIndex + 1);
    const flag = FLAG_ALIASES[rawFlag] ?? rawFlag;
    const handler = handlers[flag];
    if (handler) {
      handler(valueFromEq);
    } else if (arg.startsWith("-") && arg.length > 1) {
      throw new Error(`Unknown option: ${arg}`);
    } else {
      positionalArgs.push(arg);
    }
  }

  const [first, ...rest] = positionalArgs;
  if (first === undefined) {
    if (!showVersion) {
      showHelp = true;
    }
  } else {
    opts.url = first;
    if (rest.length > 0) {
      logger.warn(`Ignoring extra positional arguments: ${rest.join(", ")}`);
    }
  }

  return { options: opts, showHelp, showVersion };
}
