import { FrontierStateError } from "./errors";
import type { FrontierEntry, FrontierStatus, NormalizedUrl } from "./types";

type InitialStatus = Extract<FrontierStatus, "pending" | "rejected">;

/**
 * Every URL the crawl has seen, keyed by its normalized href, plus the FIFO
 * of entries still waiting to be fetched.
 *
 * Status only moves forward: pending -> in-flight -> visited | rejected.
 * Entries are never removed, so the map doubles as the record of the run.
 * None of the operations await, which makes each one atomic with respect
 * to the other workers on the event loop.
 */
export class Frontier {
  private readonly entries = new Map<string, FrontierEntry>();
  private readonly queue: NormalizedUrl[] = [];
  private queueIndex = 0;
  private readonly tally: Record<FrontierStatus, number> = {
    pending: 0,
    "in-flight": 0,
    visited: 0,
    rejected: 0,
  };
  private seed: NormalizedUrl | null = null;

  get seedHost(): string | null {
    return this.seed?.hostname ?? null;
  }

  get seedUrl(): NormalizedUrl | null {
    return this.seed;
  }

  get size(): number {
    return this.entries.size;
  }

  get pendingCount(): number {
    return this.queue.length - this.queueIndex;
  }

  get inFlightCount(): number {
    return this.tally["in-flight"];
  }

  get visitedCount(): number {
    return this.tally.visited;
  }

  get isQuiescent(): boolean {
    return this.pendingCount === 0 && this.inFlightCount === 0;
  }

  trySeed(url: NormalizedUrl, initial: InitialStatus = "pending"): boolean {
    if (this.seed) {
      return false;
    }
    this.seed = url;
    this.offer(url, initial);
    return true;
  }

  offer(url: NormalizedUrl, initial: InitialStatus = "pending"): boolean {
    if (this.entries.has(url.href)) {
      return false;
    }
    this.entries.set(url.href, { url, status: initial });
    this.tally[initial] += 1;
    if (initial === "pending") {
      this.queue.push(url);
    }
    return true;
  }

  tryClaim(): NormalizedUrl | null {
    const next = this.queue[this.queueIndex];
    if (!next) {
      return null;
    }
    this.queueIndex += 1;
    // Drop consumed slots once they outnumber the live ones.
    if (this.queueIndex > 1024 && this.queueIndex * 2 > this.queue.length) {
      this.queue.splice(0, this.queueIndex);
      this.queueIndex = 0;
    }
    this.transition(next, "pending", "in-flight");
    return next;
  }

  markVisited(url: NormalizedUrl): void {
    this.transition(url, "in-flight", "visited");
  }

  markRejected(url: NormalizedUrl): void {
    this.transition(url, "in-flight", "rejected");
  }

  has(url: NormalizedUrl): boolean {
    return this.entries.has(url.href);
  }

  statusOf(url: NormalizedUrl): FrontierStatus | undefined {
    return this.entries.get(url.href)?.status;
  }

  counts(): Record<FrontierStatus, number> {
    return { ...this.tally };
  }

  snapshot(): FrontierEntry[] {
    return Array.from(this.entries.values(), (entry) => ({ ...entry }));
  }

  private transition(
    url: NormalizedUrl,
    from: FrontierStatus,
    to: FrontierStatus
  ): void {
    const entry = this.entries.get(url.href);
    if (!entry) {
      throw new FrontierStateError(`Unknown frontier URL: ${url.href}`);
    }
    if (entry.status !== from) {
      throw new FrontierStateError(
        `Cannot move ${url.href} from ${entry.status} to ${to}`
      );
    }
    entry.status = to;
    this.tally[from] -= 1;
    this.tally[to] += 1;
  }
}
