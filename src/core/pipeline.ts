/**
 * Adapter pipeline contract and the function that drives it.
 *
 * An adapter implements four stages. {@link processAdapter} is the only place
 * they are sequenced: collect → validate → transform, with cleanup guaranteed
 * once collect has returned, and one duration measurement per attempt.
 *
 * @module core/pipeline
 */

import type { ProcessingMode } from '../config/env';
import { errorMessage, logger } from '../utils/logger';
import type { AdapterSettings } from './adapter-settings';

export interface ValidationResult {
  readonly isValid: boolean;
  readonly errors: readonly string[];
  readonly warnings: readonly string[];
  readonly metrics: Readonly<Record<string, unknown>>;
}

export interface IngestionMetadata {
  sourceId: string;
  adapterType: string;
  timestamp: string;
  processingDurationMs: number;
  processingMode: ProcessingMode;
  correlationId?: string;
}

export interface IngestionPayload<T = unknown> {
  readonly data: T;
  readonly metadata: Readonly<IngestionMetadata>;
  readonly validation: ValidationResult;
}

/**
 * A format adapter. `validate` reports data-quality problems in its result and
 * only throws for malformed validation rules. `cleanup` must not throw; if it
 * does, the failure is logged and dropped.
 */
export interface SourceAdapter<Raw = unknown, Out = unknown> {
  collect(): Promise<Raw>;
  validate(raw: Raw): Promise<ValidationResult>;
  transform(raw: Raw): Promise<Out>;
  cleanup(raw: Raw): Promise<void>;
}

export type AttemptOutcomeStatus = 'success' | 'error';

export interface ProcessHooks {
  /** Called exactly once per attempt, after cleanup, with the elapsed time. */
  onDuration?: (durationMs: number, outcome: AttemptOutcomeStatus) => void;
  now?: () => number;
}

export function createValidationResult(input: Partial<ValidationResult> = {}): ValidationResult {
  const errors = Object.freeze([...(input.errors ?? [])]);
  return Object.freeze({
    isValid: input.isValid ?? errors.length === 0,
    errors,
    warnings: Object.freeze([...(input.warnings ?? [])]),
    metrics: Object.freeze({ ...(input.metrics ?? {}) })
  });
}

async function runCleanup<Raw>(adapter: SourceAdapter<Raw, unknown>, raw: Raw, settings: AdapterSettings): Promise<void> {
  try {
    await adapter.cleanup(raw);
  } catch (error) {
    logger.warn('adapter cleanup failed', {
      adapterType: settings.adapterType,
      sourceId: settings.sourceId,
      error: errorMessage(error)
    });
  }
}

async function runStages<Raw, Out>(
  adapter: SourceAdapter<Raw, Out>,
  settings: AdapterSettings
): Promise<{ data: Out; validation: ValidationResult }> {
  const raw = await adapter.collect();
  try {
    const validation = await adapter.validate(raw);
    const data = await adapter.transform(raw);
    return { data, validation };
  } finally {
    await runCleanup(adapter, raw, settings);
  }
}

/**
 * Run one attempt of `adapter` and build its {@link IngestionPayload}.
 * Stage errors propagate unchanged after cleanup has run.
 */
export async function processAdapter<Raw, Out>(
  adapter: SourceAdapter<Raw, Out>,
  settings: AdapterSettings,
  hooks: ProcessHooks = {}
): Promise<IngestionPayload<Out>> {
  const now = hooks.now ?? Date.now;
  const startedAt = now();

  const settled = await runStages(adapter, settings).then(
    value => ({ ok: true as const, value }),
    (error: unknown) => ({ ok: false as const, error })
  );

  const durationMs = Math.max(0, Math.round(now() - startedAt));
  hooks.onDuration?.(durationMs, settled.ok ? 'success' : 'error');

  if (!settled.ok) {
    throw settled.error;
  }

  const metadata: IngestionMetadata = {
    sourceId: settings.sourceId,
    adapterType: settings.adapterType,
    timestamp: new Date(startedAt).toISOString(),
    processingDurationMs: durationMs,
    processingMode: settings.processingMode
  };
  if (settings.correlationId !== undefined) {
    metadata.correlationId = settings.correlationId;
  }

  return Object.freeze({
    data: settled.value.data,
    metadata: Object.freeze(metadata),
    validation: settled.value.validation
  });
}
