/**
 * Exponential-backoff retry policy for task redelivery.
 *
 * Retries are not run in-process. The orchestrator asks the policy whether a
 * failed attempt may be redelivered and how long the queue should wait.
 *
 * @module core/retry-policy
 */

import { z } from 'zod';
import { ConfigurationError, ErrorKind, isErrorKind } from './errors';

export interface RetryPolicyOptions {
  enabled: boolean;
  maxAttempts: number;
  backoffSeconds: number;
  maxBackoffSeconds: number;
  retryableErrorKinds: Iterable<string>;
}

export interface RetryPolicyMetadata {
  enabled: boolean;
  maxAttempts: number;
  backoffSeconds: number;
  maxBackoffSeconds: number;
  retryableErrorKinds: ErrorKind[];
}

export const DEFAULT_RETRYABLE_ERROR_KINDS: readonly ErrorKind[] = [ErrorKind.COLLECTION];

export class RetryPolicy {
  readonly enabled: boolean;
  readonly maxAttempts: number;
  readonly backoffSeconds: number;
  readonly maxBackoffSeconds: number;
  readonly retryableErrorKinds: ReadonlySet<ErrorKind>;

  constructor(options: RetryPolicyOptions) {
    if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 0) {
      throw new ConfigurationError('max_attempts must be a non-negative integer', {
        maxAttempts: options.maxAttempts
      });
    }
    if (!Number.isFinite(options.backoffSeconds) || options.backoffSeconds <= 0) {
      throw new ConfigurationError('backoff_seconds must be greater than zero', {
        backoffSeconds: options.backoffSeconds
      });
    }
    if (!Number.isFinite(options.maxBackoffSeconds) || options.maxBackoffSeconds < options.backoffSeconds) {
      throw new ConfigurationError('max_backoff_seconds must be >= backoff_seconds', {
        backoffSeconds: options.backoffSeconds,
        maxBackoffSeconds: options.maxBackoffSeconds
      });
    }

    const kinds = new Set<ErrorKind>();
    for (const name of options.retryableErrorKinds) {
      if (!isErrorKind(name)) {
        throw new ConfigurationError(`Unknown retryable error kind '${name}'`, {
          allowed: Object.values(ErrorKind)
        });
      }
      if (name === ErrorKind.CIRCUIT_OPEN) {
        throw new ConfigurationError('circuit_open failures are never retried');
      }
      kinds.add(name);
    }

    this.enabled = options.enabled;
    this.maxAttempts = options.maxAttempts;
    this.backoffSeconds = options.backoffSeconds;
    this.maxBackoffSeconds = options.maxBackoffSeconds;
    this.retryableErrorKinds = kinds;
    Object.freeze(this);
  }

  shouldRetry(error: { kind: ErrorKind }): boolean {
    return this.enabled && this.retryableErrorKinds.has(error.kind);
  }

  /**
   * Whole seconds to wait before the next attempt. `retriesSoFar` is the
   * zero-based count of retries already performed, so the first retry waits
   * `backoffSeconds`.
   */
  nextCountdown(retriesSoFar: number): number {
    const exponent = Math.max(retriesSoFar, 0);
    const delay = this.backoffSeconds * 2 ** exponent;
    return Math.trunc(Math.min(delay, this.maxBackoffSeconds));
  }

  toJSON(): RetryPolicyMetadata {
    return {
      enabled: this.enabled,
      maxAttempts: this.maxAttempts,
      backoffSeconds: this.backoffSeconds,
      maxBackoffSeconds: this.maxBackoffSeconds,
      retryableErrorKinds: Array.from(this.retryableErrorKinds)
    };
  }
}

// ---------------------------------------------------------------------------
// Per-source overrides
// ---------------------------------------------------------------------------

const numeric = z.union([
  z.number(),
  z
    .string()
    .trim()
    .min(1)
    .transform(value => Number(value))
    .pipe(z.number({ invalid_type_error: 'must be numeric' }).finite())
]);

const retryOverrideSchema = z
  .object({
    enabled: z.boolean().optional(),
    max_attempts: numeric.pipe(z.number().int().nonnegative()).optional(),
    backoff_seconds: numeric.pipe(z.number().positive()).optional(),
    max_backoff_seconds: numeric.pipe(z.number().positive()).optional(),
    retryable_errors: z.array(z.string()).optional()
  })
  .strict();

export type RetryPolicyOverride = z.input<typeof retryOverrideSchema>;

/**
 * Resolve the policy for one attempt: fields of a per-source `retry_policy`
 * block win over `defaults`. An invalid block throws {@link ConfigurationError}
 * immediately instead of falling back.
 */
export function resolveRetryPolicy(override: unknown, defaults: RetryPolicy): RetryPolicy {
  if (override === undefined || override === null) {
    return defaults;
  }

  const parsed = retryOverrideSchema.safeParse(override);
  if (!parsed.success) {
    throw new ConfigurationError('Invalid retry_policy override', {
      issues: parsed.error.issues.map(issue => ({
        path: issue.path.join('.'),
        message: issue.message
      }))
    });
  }

  const block = parsed.data;
  return new RetryPolicy({
    enabled: block.enabled ?? defaults.enabled,
    maxAttempts: block.max_attempts ?? defaults.maxAttempts,
    backoffSeconds: block.backoff_seconds ?? defaults.backoffSeconds,
    maxBackoffSeconds: block.max_backoff_seconds ?? defaults.maxBackoffSeconds,
    // An empty list keeps the default kinds
    retryableErrorKinds: block.retryable_errors && block.retryable_errors.length > 0
      ? block.retryable_errors
      : defaults.retryableErrorKinds
  });
}
