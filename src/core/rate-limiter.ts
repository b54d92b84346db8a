/**
 * Token bucket rate limiter
 *
 * One bucket per key, created full on first access. Buckets refill at
 * `requestsPerWindow / windowSeconds` tokens per second and never hold more
 * than `burstSize` tokens.
 *
 * @module core/rate-limiter
 */

import { logger } from '../utils/logger';

export interface TokenBucket {
  tokens: number;
  /** Last refill, ms since epoch. */
  lastRefill: number;
}

export interface RateLimiterOptions {
  requestsPerWindow: number;
  windowSeconds: number;
  /** Maximum tokens per bucket (default: requestsPerWindow) */
  burstSize?: number;
  now?: () => number;
}

export interface RateLimitDecision {
  allowed: boolean;
  limit: number;
  remaining: number;
  /** Unix time (seconds) when the limit resets. */
  reset: number;
  /** Seconds until the next token on a denial; 0 when allowed. */
  retryAfterSeconds: number;
}

export class TokenBucketRateLimiter {
  readonly requestsPerWindow: number;
  readonly windowSeconds: number;
  readonly burstSize: number;
  private readonly refillRate: number; // tokens per second
  private readonly now: () => number;
  private readonly buckets = new Map<string, TokenBucket>();

  constructor(options: RateLimiterOptions) {
    if (options.requestsPerWindow <= 0 || options.windowSeconds <= 0) {
      throw new RangeError('requestsPerWindow and windowSeconds must be positive');
    }

    this.requestsPerWindow = options.requestsPerWindow;
    this.windowSeconds = options.windowSeconds;
    this.burstSize = options.burstSize && options.burstSize > 0 ? options.burstSize : options.requestsPerWindow;
    this.refillRate = this.requestsPerWindow / this.windowSeconds;
    this.now = options.now ?? Date.now;
  }

  /**
   * Refill the key's bucket, then consume one token if at least one is there.
   */
  isAllowed(key: string): RateLimitDecision {
    const nowMs = this.now();
    const nowSeconds = nowMs / 1000;
    const tokens = this.refill(key, nowMs);

    const allowed = tokens >= 1;
    const after = allowed ? tokens - 1 : tokens;
    this.buckets.set(key, { tokens: after, lastRefill: nowMs });

    const reset = after < 0
      ? nowSeconds + Math.abs(after) / this.refillRate
      : nowSeconds + this.windowSeconds;

    return {
      allowed,
      limit: this.requestsPerWindow,
      remaining: Math.floor(Math.max(0, after)),
      reset: Math.trunc(reset),
      retryAfterSeconds: allowed ? 0 : Math.max(1, Math.ceil((1 - after) / this.refillRate))
    };
  }

  /**
   * Drop buckets whose last refill is older than `maxAgeSeconds`.
   * @returns number of buckets removed
   */
  cleanupStaleBuckets(maxAgeSeconds = 3600): number {
    const nowMs = this.now();
    let removed = 0;

    for (const [key, bucket] of this.buckets.entries()) {
      if (nowMs - bucket.lastRefill > maxAgeSeconds * 1000) {
        this.buckets.delete(key);
        removed++;
      }
    }

    if (removed > 0) {
      logger.debug('rate limiter swept stale buckets', { removed, remaining: this.buckets.size });
    }

    return removed;
  }

  /**
   * Run {@link cleanupStaleBuckets} periodically. The timer does not keep the
   * process alive. Returns a function that stops the sweep.
   */
  startSweeper(intervalSeconds: number, maxAgeSeconds: number): () => void {
    const timer = setInterval(() => {
      this.cleanupStaleBuckets(maxAgeSeconds);
    }, intervalSeconds * 1000);
    timer.unref();
    return () => clearInterval(timer);
  }

  getBucket(key: string): Readonly<TokenBucket> | undefined {
    return this.buckets.get(key);
  }

  get size(): number {
    return this.buckets.size;
  }

  private refill(key: string, nowMs: number): number {
    const bucket = this.buckets.get(key);
    if (!bucket) {
      return this.burstSize;
    }

    const elapsedSeconds = Math.max(0, nowMs - bucket.lastRefill) / 1000;
    return Math.min(this.burstSize, bucket.tokens + elapsedSeconds * this.refillRate);
  }
}
