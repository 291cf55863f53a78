/**
 * @fileoverview Per-key sliding-window rate limiter.
 *
 * Tracks request timestamps per key and rejects once a key reaches `max`
 * requests inside the window. Stale keys are pruned lazily.
 */

export interface RateLimiterOptions {
  windowMs: number;
  max: number;
}

export class SlidingWindowRateLimiter {
  private readonly hits = new Map<string, number[]>();
  private lastPrune = 0;

  constructor(private readonly options: RateLimiterOptions) {}

  /**
   * Record a request. Returns true if it is allowed, false if rate-limited.
   */
  check(key: string, now: number = Date.now()): boolean {
    this.pruneIfDue(now);
    const fresh = (this.hits.get(key) ?? []).filter((t) => now - t < this.options.windowMs);

    if (fresh.length >= this.options.max) {
      this.hits.set(key, fresh);
      return false;
    }

    fresh.push(now);
    this.hits.set(key, fresh);
    return true;
  }

  get size(): number {
    return this.hits.size;
  }

  private pruneIfDue(now: number): void {
    if (now - this.lastPrune < this.options.windowMs) return;
    this.lastPrune = now;
    for (const [key, timestamps] of this.hits) {
      const fresh = timestamps.filter((t) => now - t < this.options.windowMs);
      if (fresh.length === 0) {
        this.hits.delete(key);
      } else {
        this.hits.set(key, fresh);
      }
    }
  }
}
