import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { Request, Response } from 'express';
import { TokenBucketRateLimiter } from '../core/rate-limiter';
import { hashApiKey } from '../middleware/auth';
import { createRateLimitMiddleware, rateLimitKey } from '../middleware/rate-limit';
import { IngestionMetrics } from '../services/metrics';

vi.mock('../utils/logger', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../utils/logger')>();
  return {
    ...actual,
    logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
  };
});

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function createMockReq(options: { path?: string; headers?: Record<string, string>; ip?: string } = {}): Request {
  const headers = options.headers ?? {};
  return {
    path: options.path ?? '/v1/ingest',
    headers,
    ip: options.ip ?? '192.168.1.1',
    get: (name: string) => headers[name.toLowerCase()],
  } as unknown as Request;
}

function createMockRes(): Response & { headers: Record<string, string> } {
  const headers: Record<string, string> = {};
  const res = {
    headers,
    status: vi.fn().mockReturnThis(),
    json: vi.fn().mockReturnThis(),
    setHeader: vi.fn((name: string, value: string) => {
      headers[name] = value;
      return res;
    }),
  };
  return res as unknown as Response & { headers: Record<string, string> };
}

// ---------------------------------------------------------------------------
// rateLimitKey
// ---------------------------------------------------------------------------

describe('rateLimitKey', () => {
  it('uses the first x-forwarded-for hop', () => {
    const req = createMockReq({ headers: { 'x-forwarded-for': '10.0.0.1, 10.0.0.2' } });
    expect(rateLimitKey(req, 'ip')).toBe('ip:10.0.0.1');
  });

  it('falls back to req.ip', () => {
    expect(rateLimitKey(createMockReq({ ip: '127.0.0.1' }), 'ip')).toBe('ip:127.0.0.1');
  });

  it('hashes the API key', () => {
    const req = createMockReq({ headers: { 'x-api-key': 'test-secret' } });
    expect(rateLimitKey(req, 'api_key')).toBe(`api_key:${hashApiKey('test-secret')}`);
  });

  it('uses the IP when no API key is sent', () => {
    expect(rateLimitKey(createMockReq({ ip: '127.0.0.1' }), 'api_key')).toBe('ip:127.0.0.1');
  });

  it('keys by path for the endpoint strategy', () => {
    expect(rateLimitKey(createMockReq({ path: '/v1/ingest/jobs' }), 'endpoint')).toBe('endpoint:/v1/ingest/jobs');
  });
});

// ---------------------------------------------------------------------------
// createRateLimitMiddleware
// ---------------------------------------------------------------------------

describe('createRateLimitMiddleware', () => {
  const now = 1_000_000;
  let limiter: TokenBucketRateLimiter;
  let metrics: IngestionMetrics;

  beforeEach(() => {
    limiter = new TokenBucketRateLimiter({ requestsPerWindow: 2, windowSeconds: 2, now: () => now });
    metrics = new IngestionMetrics();
  });

  it('sets rate limit headers and calls next when allowed', () => {
    const middleware = createRateLimitMiddleware({ limiter, limitBy: 'ip' });
    const res = createMockRes();
    const next = vi.fn();

    middleware(createMockReq(), res, next);

    expect(next).toHaveBeenCalledOnce();
    expect(res.headers).toEqual({
      'X-RateLimit-Limit': '2',
      'X-RateLimit-Remaining': '1',
      'X-RateLimit-Reset': '1002',
    });
  });

  it('returns 429 with Retry-After once the bucket is empty', () => {
    const middleware = createRateLimitMiddleware({ limiter, limitBy: 'ip', metrics });
    const next = vi.fn();

    middleware(createMockReq(), createMockRes(), next);
    middleware(createMockReq(), createMockRes(), next);

    const res = createMockRes();
    middleware(createMockReq(), res, next);

    expect(next).toHaveBeenCalledTimes(2);
    expect(res.status).toHaveBeenCalledWith(429);
    expect(res.json).toHaveBeenCalledWith({
      error: 'rate_limit_exceeded',
      message: 'Too many requests, please try again later',
      retryAfter: 1,
    });
    expect(res.headers['Retry-After']).toBe('1');
    expect(metrics.snapshot().rateLimited).toBe(1);
  });

  it('skips exempt path prefixes', () => {
    const middleware = createRateLimitMiddleware({ limiter, limitBy: 'ip', exemptPaths: ['/health'] });
    const next = vi.fn();

    for (let i = 0; i < 5; i++) {
      middleware(createMockReq({ path: '/health' }), createMockRes(), next);
    }

    expect(next).toHaveBeenCalledTimes(5);
    expect(limiter.size).toBe(0);
  });
});
