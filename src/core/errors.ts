/**
 * Ingestion error taxonomy.
 *
 * Every failure raised inside an attempt is an {@link IngestionError} tagged
 * with exactly one {@link ErrorKind}. Anything else that escapes an adapter is
 * treated as `unexpected` by the classifier.
 *
 * @module core/errors
 */

export enum ErrorKind {
  CONFIGURATION = 'configuration',
  COLLECTION = 'collection',
  VALIDATION = 'validation',
  TRANSFORMATION = 'transformation',
  CIRCUIT_OPEN = 'circuit_open',
  AUTHENTICATION = 'authentication',
  UNEXPECTED = 'unexpected'
}

const ERROR_KINDS: ReadonlySet<string> = new Set(Object.values(ErrorKind));

export function isErrorKind(value: string): value is ErrorKind {
  return ERROR_KINDS.has(value);
}

export type ErrorDetails = Record<string, unknown>;

export class IngestionError extends Error {
  readonly kind: ErrorKind;
  readonly details: ErrorDetails;

  constructor(kind: ErrorKind, message: string, details: ErrorDetails = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'IngestionError';
    this.kind = kind;
    this.details = details;
  }
}

/** Source fetch/read failure: I/O, network or source configuration. */
export class CollectionError extends IngestionError {
  constructor(message: string, details?: ErrorDetails, options?: { cause?: unknown }) {
    super(ErrorKind.COLLECTION, message, details, options);
    this.name = 'CollectionError';
  }
}

/** Malformed validation rules. Data-quality problems are never raised. */
export class ValidationError extends IngestionError {
  constructor(message: string, details?: ErrorDetails) {
    super(ErrorKind.VALIDATION, message, details);
    this.name = 'ValidationError';
  }
}

export class TransformationError extends IngestionError {
  constructor(message: string, details?: ErrorDetails, options?: { cause?: unknown }) {
    super(ErrorKind.TRANSFORMATION, message, details, options);
    this.name = 'TransformationError';
  }
}

export class ConfigurationError extends IngestionError {
  constructor(message: string, details?: ErrorDetails) {
    super(ErrorKind.CONFIGURATION, message, details);
    this.name = 'ConfigurationError';
  }
}

export class AdapterNotFoundError extends IngestionError {
  readonly adapterType: string;

  constructor(adapterType: string, available: string[]) {
    const availableDisplay = available.length > 0 ? [...available].sort().join(', ') : 'none';
    super(
      ErrorKind.CONFIGURATION,
      `Adapter '${adapterType}' is not registered. Available adapters: ${availableDisplay}.`,
      { adapterType, available }
    );
    this.name = 'AdapterNotFoundError';
    this.adapterType = adapterType;
  }
}

export class AuthenticationError extends IngestionError {
  constructor(message: string) {
    super(ErrorKind.AUTHENTICATION, message);
    this.name = 'AuthenticationError';
  }
}

export class CircuitBreakerOpenError extends IngestionError {
  readonly adapterType: string;
  readonly reopenAt: Date;

  constructor(adapterType: string, reopenAt: Date) {
    super(
      ErrorKind.CIRCUIT_OPEN,
      `Circuit breaker open for adapter '${adapterType}' until ${reopenAt.toISOString()}`,
      { adapterType, reopenAt: reopenAt.toISOString() }
    );
    this.name = 'CircuitBreakerOpenError';
    this.adapterType = adapterType;
    this.reopenAt = reopenAt;
  }
}
