/**
 * In-adapter HTTP retry with exponential backoff and jitter.
 *
 * This covers transient transport failures inside a single `collect` call.
 * Task-level retries are redeliveries decided by the orchestrator.
 *
 * @module utils/retry
 */

import { z } from 'zod';
import { errorMessage, logger } from './logger';

export const httpRetrySchema = z
  .object({
    enabled: z.boolean().default(false),
    max_attempts: z.number().int().min(1).default(3),
    backoff_factor: z.number().positive().default(0.5),
    max_backoff: z.number().positive().default(10),
    jitter: z.number().min(0).default(0),
    status_forcelist: z.array(z.number().int()).default([429, 500, 502, 503, 504]),
    retry_on_methods: z.array(z.string()).default(['GET', 'HEAD', 'OPTIONS']),
    respect_retry_after: z.boolean().default(true)
  })
  .strict();

export type HttpRetryConfig = z.output<typeof httpRetrySchema>;

/**
 * Thrown by a request function to signal a response whose status is listed in
 * `status_forcelist`.
 */
export class RetryableStatusError extends Error {
  readonly status: number;
  readonly retryAfterSeconds: number | null;

  constructor(status: number, retryAfterSeconds: number | null = null) {
    super(`Retryable HTTP status ${status}`);
    this.name = 'RetryableStatusError';
    this.status = status;
    this.retryAfterSeconds = retryAfterSeconds;
  }
}

/**
 * Network errors surfaced by fetch (undici) and Node sockets.
 */
export function isTransientError(error: unknown): boolean {
  if (error instanceof RetryableStatusError) {
    return true;
  }
  if (!(error instanceof Error)) {
    return false;
  }
  if (error.name === 'AbortError' || error.name === 'TimeoutError') {
    return true;
  }

  const networkErrorPatterns = ['econnrefused', 'econnreset', 'enotfound', 'etimedout', 'eai_again', 'und_err', 'fetch failed'];
  const msg = error.message.toLowerCase();
  return networkErrorPatterns.some(p => msg.includes(p));
}

/**
 * Parse a `Retry-After` header given either as seconds or as an HTTP date.
 */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | null {
  if (!value) {
    return null;
  }

  const trimmed = value.trim();
  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return Number(trimmed);
  }

  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) {
    return null;
  }
  return Math.max(0, (date - now) / 1000);
}

/**
 * Delay in seconds before retry number `attempt` (zero-based):
 * min(backoff_factor * 2^attempt + random jitter, max_backoff).
 */
export function computeDelay(attempt: number, config: HttpRetryConfig, random: () => number = Math.random): number {
  const exponential = config.backoff_factor * Math.pow(2, attempt);
  const jitter = config.jitter > 0 ? random() * config.jitter : 0;
  return Math.min(exponential + jitter, config.max_backoff);
}

export interface WithRetryOptions {
  method: string;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

const defaultSleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Run `fn`, retrying transient failures when the config is enabled and the
 * method is listed in `retry_on_methods`. The last error is rethrown once the
 * attempts are exhausted.
 */
export async function withRetry<T>(fn: () => Promise<T>, config: HttpRetryConfig, options: WithRetryOptions): Promise<T> {
  const methods = new Set(config.retry_on_methods.map(method => method.toUpperCase()));
  const retryable = config.enabled && methods.has(options.method.toUpperCase());
  const attempts = retryable ? config.max_attempts : 1;
  const sleep = options.sleep ?? defaultSleep;

  let lastError: unknown;
  for (let attempt = 0; attempt < attempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (attempt + 1 >= attempts || !isTransientError(error)) {
        break;
      }

      let delaySeconds = computeDelay(attempt, config, options.random);
      if (config.respect_retry_after && error instanceof RetryableStatusError && error.retryAfterSeconds !== null) {
        delaySeconds = Math.min(Math.max(delaySeconds, error.retryAfterSeconds), config.max_backoff);
      }

      logger.warn('retrying HTTP request after transient error', {
        attempt: attempt + 1,
        maxAttempts: attempts,
        delayMs: Math.round(delaySeconds * 1000),
        error: errorMessage(error)
      });

      await sleep(delaySeconds * 1000);
    }
  }

  throw lastError;
}
