/**
 * Per-attempt adapter settings.
 *
 * The caller's source config is copied and validated once when an attempt
 * starts. Adapters only ever see the frozen result.
 *
 * @module core/adapter-settings
 */

import { z } from 'zod';
import type { ProcessingMode } from '../config/env';
import { ConfigurationError } from './errors';

export type AdapterConfig = Record<string, unknown>;

export interface AdapterSettings {
  readonly adapterType: string;
  readonly sourceId: string;
  readonly correlationId?: string;
  readonly processingMode: ProcessingMode;
  /** Source options minus the keys consumed here. */
  readonly options: Readonly<Record<string, unknown>>;
}

export interface PreparedAttempt {
  settings: AdapterSettings;
  /** Raw `retry_policy` block, resolved separately. */
  retryOverride: unknown;
}

const reservedKeysSchema = z
  .object({
    source_id: z.string().trim().min(1, 'source_id must be a non-empty string').optional(),
    correlation_id: z.string().trim().min(1).optional(),
    use_cloud_processing: z.boolean().optional()
  })
  .passthrough();

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export function defaultSourceId(adapterType: string): string {
  return `${adapterType}-source`;
}

/**
 * Build frozen {@link AdapterSettings} from a task's source config.
 *
 * `correlation_id` in the config wins over the one on the submission.
 */
export function prepareAttempt(
  adapterType: string,
  sourceConfig: unknown,
  submission: { correlationId?: string; processingMode?: ProcessingMode } = {}
): PreparedAttempt {
  if (!isRecord(sourceConfig)) {
    throw new ConfigurationError('source_config must be an object', { adapterType });
  }

  const parsed = reservedKeysSchema.safeParse(sourceConfig);
  if (!parsed.success) {
    throw new ConfigurationError(parsed.error.issues[0]?.message ?? 'Invalid source_config', {
      adapterType,
      issues: parsed.error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message }))
    });
  }

  const {
    source_id: sourceId,
    correlation_id: configCorrelationId,
    use_cloud_processing: useCloud,
    retry_policy: retryOverride,
    ...rest
  } = parsed.data;

  const correlationId = configCorrelationId ?? submission.correlationId;
  const processingMode: ProcessingMode =
    useCloud === undefined ? submission.processingMode ?? 'local' : useCloud ? 'cloud' : 'local';

  const settings: AdapterSettings = Object.freeze({
    adapterType,
    sourceId: sourceId ?? defaultSourceId(adapterType),
    processingMode,
    options: Object.freeze({ ...rest }),
    ...(correlationId !== undefined ? { correlationId } : {})
  });

  return { settings, retryOverride };
}

// ---------------------------------------------------------------------------
// Option readers used by adapters
// ---------------------------------------------------------------------------

/**
 * Parse a slice of the adapter options with `schema`, turning failures into
 * {@link ConfigurationError}.
 */
export function readOptions<T extends z.ZodTypeAny>(
  settings: AdapterSettings,
  schema: T
): z.output<T> {
  const parsed = schema.safeParse(settings.options);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new ConfigurationError(`Invalid ${settings.adapterType} adapter config: ${where}${issue?.message ?? 'invalid'}`, {
      adapterType: settings.adapterType,
      sourceId: settings.sourceId
    });
  }
  return parsed.data;
}
