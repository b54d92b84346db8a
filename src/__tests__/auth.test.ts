import { describe, it, expect, vi } from 'vitest';
import type { Request, Response, NextFunction } from 'express';
import { createAuthMiddleware, extractApiKey, hashApiKey } from '../middleware/auth';
import { AppError, ErrorCode } from '../middleware/error-handler';

vi.mock('../utils/logger', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../utils/logger')>();
  return {
    ...actual,
    logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
  };
});

function createMockReq(headers: Record<string, string> = {}): Request {
  const lower = Object.fromEntries(Object.entries(headers).map(([key, value]) => [key.toLowerCase(), value]));
  const req = {
    headers: lower,
    get: (name: string) => lower[name.toLowerCase()],
  } as unknown as Request;
  return req;
}

const res = {} as Response;

function run(config: { enabled: boolean; apiKeys: string[] }, headers: Record<string, string> = {}) {
  const req = createMockReq(headers);
  const next = vi.fn() as NextFunction;
  createAuthMiddleware(config)(req, res, next);
  return { req, next, error: vi.mocked(next).mock.calls[0]?.[0] };
}

describe('hashApiKey', () => {
  it('returns the sha256 hex digest', () => {
    expect(hashApiKey('test-key')).toMatch(/^[0-9a-f]{64}$/);
    expect(hashApiKey('test-key')).toBe(hashApiKey('test-key'));
    expect(hashApiKey('test-key')).not.toBe(hashApiKey('other-key'));
  });
});

describe('extractApiKey', () => {
  it('prefers a bearer token', () => {
    expect(extractApiKey(createMockReq({ Authorization: 'Bearer abc', 'x-api-key': 'xyz' }))).toBe('abc');
  });

  it('falls back to x-api-key', () => {
    expect(extractApiKey(createMockReq({ Authorization: 'Basic Zm9v', 'x-api-key': ' xyz ' }))).toBe('xyz');
  });

  it('returns undefined when neither is usable', () => {
    expect(extractApiKey(createMockReq({ Authorization: 'Bearer  ', 'x-api-key': '  ' }))).toBeUndefined();
  });
});

describe('createAuthMiddleware', () => {
  it('passes through when auth is disabled', () => {
    const { next } = run({ enabled: false, apiKeys: [] });
    expect(next).toHaveBeenCalledWith();
  });

  it('rejects a missing key with 401', () => {
    const { error } = run({ enabled: true, apiKeys: ['test-key'] });

    expect(error).toBeInstanceOf(AppError);
    expect(error).toMatchObject({
      code: ErrorCode.UNAUTHORIZED,
      statusCode: 401,
      message: 'Missing API key. Provide via Authorization: Bearer <key> or x-api-key header.',
    });
  });

  it('rejects every key when none are configured', () => {
    const { error } = run({ enabled: true, apiKeys: [] }, { 'x-api-key': 'test-key' });
    expect(error).toMatchObject({ statusCode: 401, message: 'API key authentication is not configured.' });
  });

  it('rejects an unknown key with 403', () => {
    const { error } = run({ enabled: true, apiKeys: ['test-key'] }, { 'x-api-key': 'wrong-key' });
    expect(error).toMatchObject({ code: ErrorCode.FORBIDDEN, statusCode: 403, message: 'Invalid API key.' });
  });

  it('accepts a configured key and records its hash', () => {
    const { req, next } = run({ enabled: true, apiKeys: ['first-key', 'test-key'] }, { Authorization: 'Bearer test-key' });

    expect(next).toHaveBeenCalledWith();
    expect(req.apiKeyHash).toBe(hashApiKey('test-key'));
  });
});
