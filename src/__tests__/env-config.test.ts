/**
 * Tests for src/config/env.ts
 *
 * loadConfig takes the environment as an argument, so every case passes its
 * own map instead of touching process.env.
 */

import { describe, it, expect } from 'vitest';
import { booleanFromEnv, floatFromEnv, listFromEnv, loadConfig, numberFromEnv } from '../config/env';

describe('parsing helpers', () => {
  it('numberFromEnv falls back on empty or non-numeric input', () => {
    expect(numberFromEnv(undefined, 7)).toBe(7);
    expect(numberFromEnv('', 7)).toBe(7);
    expect(numberFromEnv('abc', 7)).toBe(7);
    expect(numberFromEnv('42', 7)).toBe(42);
    expect(numberFromEnv('42.9', 7)).toBe(42);
  });

  it('floatFromEnv keeps fractions', () => {
    expect(floatFromEnv('0.5', 1)).toBe(0.5);
    expect(floatFromEnv('Infinity', 1)).toBe(1);
  });

  it('booleanFromEnv only accepts true and false', () => {
    expect(booleanFromEnv('TRUE', false)).toBe(true);
    expect(booleanFromEnv('false', true)).toBe(false);
    expect(booleanFromEnv('yes', false)).toBe(false);
    expect(booleanFromEnv(undefined, true)).toBe(true);
  });

  it('listFromEnv trims and drops blanks, and an empty string is an empty list', () => {
    expect(listFromEnv(' a, b ,,c ', [])).toEqual(['a', 'b', 'c']);
    expect(listFromEnv('', ['x'])).toEqual([]);
    expect(listFromEnv(undefined, ['x'])).toEqual(['x']);
  });
});

describe('loadConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      port: 5380,
      requestTimeoutMs: 30_000,
      redis: { enabled: false, url: 'redis://localhost:6379' },
      rateLimit: {
        enabled: true,
        requestsPerWindow: 100,
        windowSeconds: 60,
        burstSize: 100,
        limitBy: 'ip',
        exemptPaths: ['/health', '/ready', '/metrics'],
        staleAfterSeconds: 3600,
        sweepIntervalSeconds: 600,
      },
      circuitBreaker: { failureThreshold: 5, failureWindowSeconds: 300, resetCooldownSeconds: 600 },
      retry: {
        enabled: true,
        maxAttempts: 3,
        backoffSeconds: 30,
        maxBackoffSeconds: 300,
        retryableErrorKinds: ['collection'],
      },
      queue: { concurrency: 4, pollIntervalMs: 250 },
      workerPool: { size: 4, parseThreads: 2 },
      auth: { enabled: false, apiKeys: [] },
      audit: { enabled: true, logRequestBody: false, maxBodySize: 1000 },
      events: { enabled: true, stream: 'sluice.ingestion.complete', maxLength: 10_000 },
      processingMode: 'local',
    });
  });

  it('enables Redis by default in production', () => {
    expect(loadConfig({ NODE_ENV: 'production' }).redis.enabled).toBe(true);
    expect(loadConfig({ NODE_ENV: 'production', REDIS_ENABLED: 'false' }).redis.enabled).toBe(false);
  });

  it('derives the burst from the request budget unless set', () => {
    expect(loadConfig({ RATE_LIMIT_REQUESTS: '20' }).rateLimit.burstSize).toBe(20);
    expect(loadConfig({ RATE_LIMIT_REQUESTS: '20', RATE_LIMIT_BURST: '5' }).rateLimit.burstSize).toBe(5);
  });

  it('reads overrides for every section', () => {
    const config = loadConfig({
      PORT: '8080',
      RATE_LIMIT_BY: 'API_KEY',
      RATE_LIMIT_EXEMPT_PATHS: '/health,/status',
      CIRCUIT_FAILURE_THRESHOLD: '2',
      RETRY_BACKOFF_SECONDS: '1.5',
      RETRY_ERROR_KINDS: 'collection, transformation',
      QUEUE_CONCURRENCY: '8',
      WORKER_POOL_SIZE: '2',
      PARSE_WORKER_THREADS: '0',
      SLUICE_AUTH_ENABLED: 'true',
      SLUICE_API_KEYS: 'key-one, key-two',
      EVENTS_STREAM: 'custom.stream',
      PROCESSING_MODE: 'cloud',
    });

    expect(config.port).toBe(8080);
    expect(config.rateLimit.limitBy).toBe('api_key');
    expect(config.rateLimit.exemptPaths).toEqual(['/health', '/status']);
    expect(config.circuitBreaker.failureThreshold).toBe(2);
    expect(config.retry.backoffSeconds).toBe(1.5);
    expect(config.retry.retryableErrorKinds).toEqual(['collection', 'transformation']);
    expect(config.queue.concurrency).toBe(8);
    expect(config.workerPool).toEqual({ size: 2, parseThreads: 0 });
    expect(config.auth).toEqual({ enabled: true, apiKeys: ['key-one', 'key-two'] });
    expect(config.events.stream).toBe('custom.stream');
    expect(config.processingMode).toBe('cloud');
  });

  it('ignores unknown strategies and processing modes', () => {
    const config = loadConfig({ RATE_LIMIT_BY: 'tenant', PROCESSING_MODE: 'gpu' });
    expect(config.rateLimit.limitBy).toBe('ip');
    expect(config.processingMode).toBe('local');
  });
});
