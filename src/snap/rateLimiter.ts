import { setTimeout as delay } from "node:timers/promises";

export type Sleep = (ms: number) => Promise<void>;
export type Clock = () => number;

export const defaultSleep: Sleep = async (ms) => {
  await delay(ms);
};

export type RateLimiterOptions = {
  requestsPerMinute: number;
  now?: Clock;
  sleep?: Sleep;
};

// Fixed-interval throttle. One instance per pipeline run; never shared between runs.
export class RateLimiter {
  readonly intervalMs: number;
  private readonly now: Clock;
  private readonly sleep: Sleep;
  private nextAllowedAt = 0;
  private granted = 0;

  constructor(options: RateLimiterOptions) {
    if (!Number.isFinite(options.requestsPerMinute) || options.requestsPerMinute <= 0) {
      throw new RangeError(`requestsPerMinute must be > 0 (got ${options.requestsPerMinute})`);
    }
    this.intervalMs = 60_000 / options.requestsPerMinute;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  get requestCount(): number {
    return this.granted;
  }

  /** Resolves once the next request may be sent; returns the time waited in ms. */
  async acquire(): Promise<number> {
    const current = this.now();
    // Reserve the slot before sleeping; overlapping callers queue one interval apart.
    const slot = this.granted === 0 ? current : Math.max(current, this.nextAllowedAt);
    this.nextAllowedAt = slot + this.intervalMs;
    this.granted += 1;

    const waitMs = slot - current;
    if (waitMs > 0) {
      await this.sleep(waitMs);
    }
    return waitMs;
  }
}
