/**
 * Human-like random delays for page loads, scrolling and retries.
 * The Fetcher takes a DelayPolicy instead of sleeping directly so tests can run with zero delay.
 */

export interface DelayRange {
  minMs: number;
  maxMs: number;
}

export interface DelayRanges {
  /** Think time before each page load. */
  beforePageLoad: DelayRange;
  /** Pause between scroll steps. */
  betweenScrolls: DelayRange;
  /** Backoff before the single retry of a transient fetch failure. */
  beforeRetry: DelayRange;
}

export interface DelayPolicy {
  beforePageLoad(signal?: AbortSignal): Promise<void>;
  betweenScrolls(signal?: AbortSignal): Promise<void>;
  beforeRetry(signal?: AbortSignal): Promise<void>;
  /** Number of scroll steps for one page, and the wheel distance of each. */
  scrollSteps(): number[];
}

export const DEFAULT_DELAY_RANGES: DelayRanges = {
  beforePageLoad: { minMs: 2000, maxMs: 8000 },
  betweenScrolls: { minMs: 500, maxMs: 1500 },
  beforeRetry: { minMs: 180_000, maxMs: 300_000 },
};

export function randomBetween(minMs: number, maxMs: number, random: () => number = Math.random): number {
  return minMs + Math.floor(random() * (maxMs - minMs + 1));
}

/**
 * Wait `ms` milliseconds. Resolves early (without error) when `signal` aborts;
 * the caller checks the signal afterwards.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0 || signal?.aborted) return Promise.resolve();
  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/** Randomized bounded delays; 3–7 scroll steps of 300–800 px. */
export function humanDelayPolicy(
  ranges: DelayRanges = DEFAULT_DELAY_RANGES,
  random: () => number = Math.random
): DelayPolicy {
  const wait = (r: DelayRange, signal?: AbortSignal) =>
    sleep(r.minMs <= r.maxMs ? randomBetween(r.minMs, r.maxMs, random) : r.minMs, signal);
  return {
    beforePageLoad: (signal) => wait(ranges.beforePageLoad, signal),
    betweenScrolls: (signal) => wait(ranges.betweenScrolls, signal),
    beforeRetry: (signal) => wait(ranges.beforeRetry, signal),
    scrollSteps: () => {
      const count = randomBetween(3, 7, random);
      return Array.from({ length: count }, () => randomBetween(300, 800, random));
    },
  };
}

/** No waiting at all; a fixed number of scroll steps. */
export function noDelayPolicy(scrollSteps: number[] = [600, 600, 600]): DelayPolicy {
  const none = () => Promise.resolve();
  return {
    beforePageLoad: none,
    betweenScrolls: none,
    beforeRetry: none,
    scrollSteps: () => [...scrollSteps],
  };
}
