/**
 * Failure classification and structured error reports.
 *
 * The classifier only labels. Whether a failed attempt is retried is decided
 * by {@link RetryPolicy.shouldRetry}, except `circuit_open` which never is.
 *
 * @module core/error-classifier
 */

import { ErrorKind, IngestionError } from './errors';
import type { RetryPolicy } from './retry-policy';

export interface TaskErrorReport {
  adapterType: string;
  sourceId: string;
  correlationId?: string;
  /** Name of the raised error type, e.g. `CollectionError`. */
  errorType: string;
  message: string;
  classification: ErrorKind;
  retryable: boolean;
  timestamp: string;
  details: Record<string, unknown>;
}

export interface ValidationSummary {
  isValid: boolean;
  errorCount: number;
  warningCount: number;
  metrics: Record<string, unknown>;
  errors: string[];
  warnings: string[];
}

export interface ErrorReportContext {
  adapterType: string;
  sourceId: string;
  correlationId?: string;
  policy: RetryPolicy;
  extraDetails?: Record<string, unknown>;
  now?: () => Date;
}

export function classifyError(error: unknown): ErrorKind {
  return error instanceof IngestionError ? error.kind : ErrorKind.UNEXPECTED;
}

export function isRetryable(error: unknown, policy: RetryPolicy): boolean {
  const kind = classifyError(error);
  if (kind === ErrorKind.CIRCUIT_OPEN) {
    return false;
  }
  return policy.shouldRetry({ kind });
}

export function buildErrorReport(error: unknown, context: ErrorReportContext): TaskErrorReport {
  const classification = classifyError(error);
  const errorType = error instanceof Error ? error.name : typeof error;
  const rawMessage = error instanceof Error ? error.message : String(error);

  const details: Record<string, unknown> = {};
  if (error instanceof IngestionError) {
    Object.assign(details, error.details);
  }
  if (context.extraDetails) {
    Object.assign(details, context.extraDetails);
  }

  const report: TaskErrorReport = {
    adapterType: context.adapterType,
    sourceId: context.sourceId,
    errorType,
    message: rawMessage || errorType,
    classification,
    retryable: isRetryable(error, context.policy),
    timestamp: (context.now ?? (() => new Date()))().toISOString(),
    details
  };
  if (context.correlationId !== undefined) {
    report.correlationId = context.correlationId;
  }
  return report;
}

/** Validation summary stored alongside an error record. */
export function buildFailureSummary(report: TaskErrorReport): ValidationSummary {
  return {
    isValid: false,
    errorCount: 1,
    warningCount: 0,
    metrics: {},
    errors: [report.message],
    warnings: []
  };
}

/**
 * HTTP status surfaced to a synchronous caller for each kind.
 */
export function statusForErrorKind(kind: ErrorKind): number {
  switch (kind) {
    case ErrorKind.CONFIGURATION:
      return 400;
    case ErrorKind.AUTHENTICATION:
      return 401;
    case ErrorKind.COLLECTION:
    case ErrorKind.VALIDATION:
      return 422;
    case ErrorKind.CIRCUIT_OPEN:
      return 503;
    case ErrorKind.TRANSFORMATION:
    case ErrorKind.UNEXPECTED:
      return 500;
  }
}
