/**
 * Minimum-interval rate limiter for the geocoder
 *
 * Nominatim's usage policy allows at most one request per second per client.
 * The limiter is a value object `{ lastRequestTime, minIntervalMs }` owned by
 * the worker and injected into the geocoder client; it is never global state.
 *
 * `schedule()` runs tasks strictly one after another: a task starts only after
 * the previous one settled AND at least `minIntervalMs` after the previous start.
 */

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms: number) => new Promise((resolve) => setTimeout(resolve, ms)),
};

export interface RateLimiterSnapshot {
  lastRequestTime: number | null;
  minIntervalMs: number;
  waitedMs: number;
  requests: number;
}

export class RateLimiter {
  readonly minIntervalMs: number;
  private readonly clock: Clock;
  private lastRequestTime: number | null = null;
  private tail: Promise<void> = Promise.resolve();
  private waitedMs = 0;
  private requests = 0;

  constructor(minIntervalMs: number, clock: Clock = systemClock) {
    if (!Number.isFinite(minIntervalMs) || minIntervalMs < 0) {
      throw new Error(`Invalid minimum request interval: ${minIntervalMs}`);
    }
    this.minIntervalMs = minIntervalMs;
    this.clock = clock;
  }

  /**
   * Run `task` in the next free slot
   */
  schedule<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(async () => {
      await this.waitForSlot();
      return task();
    });

    // Keep the chain alive whatever the task did; the caller still sees the rejection.
    this.tail = run.then(
      () => undefined,
      () => undefined
    );

    return run;
  }

  snapshot(): RateLimiterSnapshot {
    return {
      lastRequestTime: this.lastRequestTime,
      minIntervalMs: this.minIntervalMs,
      waitedMs: this.waitedMs,
      requests: this.requests,
    };
  }

  private async waitForSlot(): Promise<void> {
    if (this.lastRequestTime !== null) {
      const waitMs = this.lastRequestTime + this.minIntervalMs - this.clock.now();
      if (waitMs > 0) {
        this.waitedMs += waitMs;
        await this.clock.sleep(waitMs);
      }
    }
    this.lastRequestTime = this.clock.now();
    this.requests++;
  }
}
