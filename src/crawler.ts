import { createDownloader, type Downloader } from "./download";
import { describeError } from "./errors";
import { extractResources, isHtmlContentType } from "./extract";
import { Frontier } from "./frontier";
import { logger } from "./logger";
import { createHttpFetcher } from "./network";
import { createRequestPacer, type RequestPacer } from "./pacer";
import { classify, describeClassification, isFetchEligible } from "./scope";
import type {
  Classification,
  CrawlConfig,
  CrawlFailure,
  CrawlReport,
  FetchResponse,
  Fetcher,
  NormalizedUrl,
} from "./types";
import { tryNormalizeUrl } from "./url";

export interface CrawlDependencies {
  fetcher?: Fetcher;
  downloader?: Downloader;
  pacer?: RequestPacer;
  signal?: AbortSignal;
}

/**
 * Wakes every waiting worker at once. Waiters re-check the frontier after
 * each wake-up, so spurious wake-ups are harmless.
 */
class WakeSignal {
  private waiters: (() => void)[] = [];

  wait(): Promise<void> {
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  notifyAll(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const wake of waiters) {
      wake();
    }
  }
}

const decoder = new TextDecoder("utf-8");

class CrawlRun {
  private readonly frontier = new Frontier();
  private readonly internal = new Map<string, NormalizedUrl>();
  private readonly external = new Map<string, NormalizedUrl>();
  private readonly failures: CrawlFailure[] = [];
  private readonly wake = new WakeSignal();
  private excludedCount = 0;
  private downloadFailures = 0;
  private activeWorkers = 0;

  constructor(
    private readonly config: CrawlConfig,
    private readonly fetcher: Fetcher,
    private readonly pacer: RequestPacer,
    private readonly downloader: Downloader | null,
    private readonly signal: AbortSignal | undefined
  ) {}

  private get seedHost(): string {
    return this.frontier.seedHost ?? this.config.seed.hostname;
  }

  private get aborted(): boolean {
    return this.signal?.aborted ?? false;
  }

  async run(): Promise<CrawlReport> {
    const startedAt = Date.now();
    this.seedFrontier();

    logger.startProgress(this.frontier.size);

    const onAbort = (): void => {
      logger.warn("Crawl aborted, finishing with the URLs gathered so far");
      this.wake.notifyAll();
    };
    this.signal?.addEventListener("abort", onAbort, { once: true });

    try {
      const workers: Promise<void>[] = [];
      for (let i = 0; i < this.config.concurrency; i += 1) {
        workers.push(this.worker());
      }
      await Promise.all(workers);
    } finally {
      this.signal?.removeEventListener("abort", onAbort);
    }

    logger.endProgress(this.aborted);
    logger.printFailureSummary(this.failures);

    return this.buildReport(Date.now() - startedAt);
  }

  private seedFrontier(): void {
    const seed = this.config.seed;
    const classification = classify(seed, seed.hostname, this.config);
    const eligible = classification.kind === "internal";
    this.frontier.trySeed(seed, eligible ? "pending" : "rejected");
    this.record(seed, classification);

    if (eligible) {
      return;
    }
    logger.warn(
      `Seed ${seed.href} is ${describeClassification(classification)}; nothing to crawl`
    );
  }

  private async worker(): Promise<void> {
    while (!this.aborted) {
      const url = this.frontier.tryClaim();
      if (!url) {
        if (this.activeWorkers === 0) {
          // Nothing pending and nobody producing: the crawl is quiescent.
          this.wake.notifyAll();
          return;
        }
        await this.wake.wait();
        continue;
      }

      this.activeWorkers += 1;
      try {
        await this.process(url);
      } finally {
        this.activeWorkers -= 1;
        this.wake.notifyAll();
      }
    }
  }

  private async process(url: NormalizedUrl): Promise<void> {
    let response: FetchResponse;
    try {
      await this.pacer.wait(this.signal);
      logger.updateProgress(
        this.frontier.visitedCount,
        this.frontier.size,
        url.href
      );
      response = await this.fetcher.fetch(url.href, this.signal);
    } catch (error) {
      this.frontier.markRejected(url);
      const reason = this.aborted ? "aborted" : describeError(error);
      this.failures.push({ url: url.href, reason });
      logger.recordFailure();
      if (!this.aborted) {
        logger.error(`Failed ${url.href}: ${reason}`);
      }
      return;
    }

    if (this.downloader) {
      await this.saveDownload(this.downloader, url, response);
    }

    let discovered = 0;
    if (isHtmlContentType(response.contentType)) {
      const pageUrl = tryNormalizeUrl(response.url) ?? url;
      discovered = this.discover(decoder.decode(response.body), pageUrl);
    } else {
      logger.logSkipped(
        `not scanning ${url.href} (${response.contentType ?? "no content-type"})`
      );
    }

    this.frontier.markVisited(url);
    logger.logVisited(url.href, discovered);
    logger.updateProgress(this.frontier.visitedCount, this.frontier.size);
  }

  private async saveDownload(
    downloader: Downloader,
    url: NormalizedUrl,
    response: FetchResponse
  ): Promise<void> {
    try {
      await downloader.save(url, response.body, response.contentType);
    } catch (error) {
      this.downloadFailures += 1;
      logger.warn(`Cannot save ${url.href}: ${describeError(error)}`);
    }
  }

  /**
   * Add a URL to the internal or external set. A URL excluded for its length
   * is still reported there; a prefix-excluded one is left out.
   */
  private record(url: NormalizedUrl, classification: Classification): void {
    if (classification.kind === "excluded") {
      this.excludedCount += 1;
      if (classification.reason === "prefix") {
        return;
      }
    }
    const found =
      url.hostname === this.seedHost ? this.internal : this.external;
    found.set(url.href, url);
  }

  /**
   * Resolve, classify and record every reference in a page. Returns how
   * many URLs were new to the frontier.
   */
  private discover(body: string, pageUrl: NormalizedUrl): number {
    let added = 0;
    for (const reference of extractResources(body, pageUrl)) {
      const url = tryNormalizeUrl(reference.raw, reference.base);
      if (!url) {
        logger.logSkipped(
          `invalid reference "${reference.raw}" on ${pageUrl.href}`
        );
        continue;
      }
      if (this.frontier.has(url)) {
        continue;
      }

      const classification = classify(url, this.seedHost, this.config);
      const eligible = isFetchEligible(classification, this.config);
      this.record(url, classification);

      if (this.frontier.offer(url, eligible ? "pending" : "rejected")) {
        added += 1;
        if (eligible) {
          logger.logFound(url.href, classification.kind);
        } else {
          logger.logBlocked(url.href, describeClassification(classification));
        }
      }
    }
    return added;
  }

  private buildReport(elapsedMs: number): CrawlReport {
    const internal = Array.from(this.internal.values());
    const external = Array.from(this.external.values());
    return {
      seed: this.config.seed,
      all: [...internal, ...external],
      internal,
      external,
      frontier: this.frontier.snapshot(),
      counts: this.frontier.counts(),
      excludedCount: this.excludedCount,
      failures: [...this.failures],
      downloadFailures: this.downloadFailures,
      fetchCount: this.pacer.initiations,
      aborted: this.aborted,
      elapsedMs,
    };
  }
}

/**
 * Crawl outward from `config.seed` until no URL is pending and none is in
 * flight, or until `deps.signal` aborts. Per-URL failures never end the run.
 */
export async function crawlSite(
  config: CrawlConfig,
  deps: CrawlDependencies = {}
): Promise<CrawlReport> {
  logger.logCrawlStart(config.seed.href, {
    crawlExternal: config.crawlExternal,
    maxUrlLength: config.maxUrlLength,
    exclude: config.exclude.length > 0 ? config.exclude.join(", ") : "(none)",
    interval: `${config.intervalMs}ms`,
    concurrency: config.concurrency,
    download: config.download ? config.downloadDir : "off",
  });

  const fetcher =
    deps.fetcher ??
    createHttpFetcher({
      timeoutMs: config.requestTimeoutMs,
      userAgent: config.userAgent,
    });
  const pacer = deps.pacer ?? createRequestPacer(config.intervalMs);
  const downloader = config.download
    ? (deps.downloader ?? createDownloader(config.downloadDir))
    : null;

  const run = new CrawlRun(config, fetcher, pacer, downloader, deps.signal);
  return await run.run();
}
