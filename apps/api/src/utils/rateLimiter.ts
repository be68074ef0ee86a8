export type RateLimiterOptions = {
  windowMs: number;
  max: number;
};

const PRUNE_AT_KEYS = 1024;

export type RateDecision = { allowed: true } | { allowed: false; retryAfterMs: number };

/**
 * Per-key sliding window. A hit exactly `windowMs` old has left the window.
 * `now` is injectable for tests.
 */
export class SlidingWindowRateLimiter {
  private readonly hits = new Map<string, number[]>();

  constructor(private readonly options: RateLimiterOptions) {
    if (!Number.isInteger(options.max) || options.max <= 0) {
      throw new Error("max must be a positive integer");
    }
  }

  /** Records a hit when the key has room; otherwise reports the wait. */
  attempt(key: string, now = Date.now()): RateDecision {
    const { windowMs, max } = this.options;
    if (this.hits.size >= PRUNE_AT_KEYS) this.prune(now);
    const live = (this.hits.get(key) ?? []).filter((t) => now - t < windowMs);
    if (live.length >= max) {
      this.hits.set(key, live);
      return { allowed: false, retryAfterMs: live[live.length - max] + windowMs - now };
    }
    live.push(now);
    this.hits.set(key, live);
    return { allowed: true };
  }

  /** Drops keys with no hit inside the window. */
  prune(now = Date.now()): number {
    let dropped = 0;
    for (const [key, stamps] of this.hits) {
      if (stamps.every((t) => now - t >= this.options.windowMs)) {
        this.hits.delete(key);
        dropped += 1;
      }
    }
    return dropped;
  }

  get size(): number {
    return this.hits.size;
  }
}
