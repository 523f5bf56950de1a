import { sleep } from "./utils";

export interface PacerClock {
  now: () => number;
  sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface RequestPacer {
  /** Resolves when the caller may start its request. */
  wait: (signal?: AbortSignal) => Promise<void>;
  readonly initiations: number;
}

const systemClock: PacerClock = {
  now: () => performance.now(),
  sleep,
};

/**
 * Shared gate for request initiations. Each caller reserves the next free
 * slot synchronously, so slots are handed out in call order and no two
 * start closer than `intervalMs`, no matter how many workers wait at once.
 */
export function createRequestPacer(
  intervalMs: number,
  clock: PacerClock = systemClock
): RequestPacer {
  let nextAllowed = Number.NEGATIVE_INFINITY;
  let initiations = 0;

  const wait = async (signal?: AbortSignal): Promise<void> => {
    signal?.throwIfAborted();
    const now = clock.now();
    const slot = Math.max(now, nextAllowed);
    nextAllowed = slot + intervalMs;

    let remaining = slot - now;
    while (remaining > 0) {
      await clock.sleep(remaining, signal);
      remaining = slot - clock.now();
    }
    initiations += 1;
  };

  return {
    wait,
    get initiations() {
      return initiations;
    },
  };
}
