import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { TokenBucketRateLimiter } from '../core/rate-limiter';

vi.mock('../utils/logger', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

describe('TokenBucketRateLimiter', () => {
  let now: number;
  let limiter: TokenBucketRateLimiter;

  beforeEach(() => {
    now = 1_000_000;
    // 1 token per second, at most 3 in the bucket
    limiter = new TokenBucketRateLimiter({ requestsPerWindow: 10, windowSeconds: 10, burstSize: 3, now: () => now });
  });

  it('starts every key with a full bucket', () => {
    expect(limiter.isAllowed('ip:1.1.1.1')).toEqual({
      allowed: true,
      limit: 10,
      remaining: 2,
      reset: 1010,
      retryAfterSeconds: 0,
    });
  });

  it('denies once the burst is spent', () => {
    expect(limiter.isAllowed('k').remaining).toBe(2);
    expect(limiter.isAllowed('k').remaining).toBe(1);
    expect(limiter.isAllowed('k').remaining).toBe(0);

    const denied = limiter.isAllowed('k');
    expect(denied.allowed).toBe(false);
    expect(denied.remaining).toBe(0);
    expect(denied.retryAfterSeconds).toBe(1);
  });

  it('refills with elapsed time', () => {
    for (let i = 0; i < 3; i++) limiter.isAllowed('k');
    expect(limiter.isAllowed('k').allowed).toBe(false);

    now += 2500;
    const decision = limiter.isAllowed('k');
    expect(decision.allowed).toBe(true);
    expect(decision.remaining).toBe(1);
    expect(limiter.getBucket('k')?.tokens).toBeCloseTo(1.5);
  });

  it('never refills past the burst size', () => {
    limiter.isAllowed('k');
    now += 60_000;
    expect(limiter.isAllowed('k').remaining).toBe(2);
  });

  it('keeps keys independent', () => {
    for (let i = 0; i < 3; i++) limiter.isAllowed('a');
    expect(limiter.isAllowed('a').allowed).toBe(false);
    expect(limiter.isAllowed('b').allowed).toBe(true);
    expect(limiter.size).toBe(2);
  });

  it('defaults the burst to the window size', () => {
    const plain = new TokenBucketRateLimiter({ requestsPerWindow: 5, windowSeconds: 60, now: () => now });
    expect(plain.burstSize).toBe(5);
    expect(plain.isAllowed('k').remaining).toBe(4);
  });

  it('rejects non-positive limits', () => {
    expect(() => new TokenBucketRateLimiter({ requestsPerWindow: 0, windowSeconds: 60 })).toThrow(RangeError);
    expect(() => new TokenBucketRateLimiter({ requestsPerWindow: 5, windowSeconds: 0 })).toThrow(RangeError);
  });

  it('admits three requests a minute with a burst of three', () => {
    // 0.05 tokens per second
    const perMinute = new TokenBucketRateLimiter({
      requestsPerWindow: 3,
      windowSeconds: 60,
      burstSize: 3,
      now: () => now,
    });

    expect(perMinute.isAllowed('k')).toEqual({ allowed: true, limit: 3, remaining: 2, reset: 1060, retryAfterSeconds: 0 });
    expect(perMinute.isAllowed('k').remaining).toBe(1);
    expect(perMinute.isAllowed('k').remaining).toBe(0);
    expect(perMinute.isAllowed('k')).toEqual({ allowed: false, limit: 3, remaining: 0, reset: 1060, retryAfterSeconds: 20 });

    now += 10_000;
    const halfway = perMinute.isAllowed('k');
    expect(halfway.allowed).toBe(false);
    expect(halfway.retryAfterSeconds).toBe(10);

    now += 10_000;
    expect(perMinute.isAllowed('k')).toMatchObject({ allowed: true, remaining: 0 });
    expect(perMinute.isAllowed('k').allowed).toBe(false);
  });

  describe('stale buckets', () => {
    afterEach(() => {
      vi.useRealTimers();
    });

    it('drops buckets idle longer than the max age', () => {
      limiter.isAllowed('old');
      now += 30_000;
      limiter.isAllowed('fresh');
      now += 40_000;

      expect(limiter.cleanupStaleBuckets(60)).toBe(1);
      expect(limiter.getBucket('old')).toBeUndefined();
      expect(limiter.getBucket('fresh')).toBeDefined();
    });

    it('sweeps on an interval until stopped', () => {
      vi.useFakeTimers();
      const sweep = vi.spyOn(limiter, 'cleanupStaleBuckets');

      const stop = limiter.startSweeper(10, 60);
      vi.advanceTimersByTime(25_000);
      expect(sweep).toHaveBeenCalledTimes(2);
      expect(sweep).toHaveBeenCalledWith(60);

      stop();
      vi.advanceTimersByTime(30_000);
      expect(sweep).toHaveBeenCalledTimes(2);
    });
  });
});
