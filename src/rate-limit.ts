export type RateLimitConfig = {
  requestsPerSecond: number;
  burst: number;
};

export type Sleep = (ms: number) => Promise<void>;
export type Clock = () => number;

export const defaultSleep: Sleep = (ms) =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

/**
 * Reads a Retry-After header value, given either as delay-seconds or as an
 * HTTP date, and returns the wait in milliseconds.
 */
export function parseRetryAfterMs(
  value: string | null | undefined,
  now: Clock = Date.now,
): number | null {
  if (value == null) return null;
  const trimmed = value.trim();
  if (!trimmed) return null;

  const numeric = Number(trimmed);
  if (!Number.isNaN(numeric)) {
    return numeric >= 0 ? numeric * 1000 : null;
  }

  const parsed = Date.parse(trimmed);
  if (!Number.isNaN(parsed)) {
    const delta = parsed - now();
    return delta > 0 ? delta : 0;
  }

  return null;
}

/**
 * Token bucket shared by every attempt an executor makes. `burst` calls go
 * through at once, then tokens refill at `requestsPerSecond`. Callers are
 * served in arrival order.
 */
export class TokenBucketRateLimiter {
  private readonly rate: number;
  private readonly maxTokens: number;
  private readonly now: Clock;
  private readonly sleep: Sleep;
  private tokens: number;
  private lastRefill: number;
  private queue: Promise<void> = Promise.resolve();

  constructor(config: RateLimitConfig, deps: { now?: Clock; sleep?: Sleep } = {}) {
    if (config.requestsPerSecond <= 0) {
      throw new RangeError("requestsPerSecond must be positive");
    }
    this.rate = config.requestsPerSecond;
    this.maxTokens = Math.max(1, config.burst);
    this.now = deps.now ?? Date.now;
    this.sleep = deps.sleep ?? defaultSleep;
    this.tokens = this.maxTokens;
    this.lastRefill = this.now();
  }

  acquire(): Promise<void> {
    const next = this.queue.then(() => this.take());
    this.queue = next;
    return next;
  }

  private async take(): Promise<void> {
    const current = this.now();
    const elapsedSeconds = Math.max(0, current - this.lastRefill) / 1000;
    this.tokens = Math.min(this.maxTokens, this.tokens + elapsedSeconds * this.rate);
    this.lastRefill = current;

    if (this.tokens >= 1) {
      this.tokens -= 1;
      return;
    }

    const waitMs = ((1 - this.tokens) / this.rate) * 1000;
    await this.sleep(waitMs);
    this.tokens = 0;
    this.lastRefill = this.now();
  }
}
