// Error classes

export type HealthEngineErrorCode =
  | 'UNSUPPORTED_FORMAT'
  | 'SCHEMA_MISMATCH'
  | 'UNIT_CONVERSION'
  | 'INSUFFICIENT_DATA'
  | 'TIMEOUT'
  | 'CANCELLED'
  | 'STORAGE'
  | 'INVALID_JOB_TRANSITION';

export class HealthEngineError extends Error {
  readonly code: HealthEngineErrorCode;
  readonly retryable: boolean;

  constructor(code: HealthEngineErrorCode, message: string, retryable: boolean) {
    super(message);
    this.name = "HealthEngineError";
    this.code = code;
    this.retryable = retryable;
  }
}

/**
 * File-level: the structural envelope is not one the provider exports, or the
 * file could not be read at all. Never retried.
 */
export class UnsupportedFormatError extends HealthEngineError {
  constructor(message: string) {
    super('UNSUPPORTED_FORMAT', message, false);
    this.name = "UnsupportedFormatError";
  }
}

/** Record-level: value or timestamp does not fit the mapping's expectations. */
export class SchemaMismatchError extends HealthEngineError {
  constructor(message: string) {
    super('SCHEMA_MISMATCH', message, false);
    this.name = "SchemaMismatchError";
  }
}

export class UnitConversionError extends HealthEngineError {
  constructor(fromUnit: string, toUnit: string, metricName: string) {
    super('UNIT_CONVERSION', `Cannot convert ${fromUnit} to ${toUnit} for ${metricName}`, false);
    this.name = "UnitConversionError";
  }
}

/** Correlation-level: not enough paired samples, or a series with no variance. */
export class InsufficientDataError extends HealthEngineError {
  readonly sampleCount: number;

  constructor(message: string, sampleCount: number) {
    super('INSUFFICIENT_DATA', message, false);
    this.name = "InsufficientDataError";
    this.sampleCount = sampleCount;
  }
}

export class TimeoutError extends HealthEngineError {
  constructor(budgetMs: number) {
    super('TIMEOUT', `Evaluation budget of ${budgetMs}ms exhausted`, true);
    this.name = "TimeoutError";
  }
}

export class CancellationError extends HealthEngineError {
  constructor(reason: string) {
    super('CANCELLED', reason, false);
    this.name = "CancellationError";
  }
}

export class StorageError extends HealthEngineError {
  constructor(message: string, cause?: unknown) {
    super('STORAGE', message, true);
    this.name = "StorageError";
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

export class InvalidJobTransitionError extends HealthEngineError {
  constructor(from: string, to: string) {
    super('INVALID_JOB_TRANSITION', `Ingestion job cannot move from ${from} to ${to}`, false);
    this.name = "InvalidJobTransitionError";
  }
}

/**
 * Informational: a row or element was skipped while parsing. Attached to the
 * job result rather than thrown.
 */
export interface PartialIngestionWarning {
  kind: 'malformed_row' | 'schema_mismatch' | 'unit_conversion';
  location: string;
  message: string;
}

export function toPartialIngestionWarning(
  error: SchemaMismatchError | UnitConversionError,
  location: string
): PartialIngestionWarning {
  return {
    kind: error instanceof UnitConversionError ? 'unit_conversion' : 'schema_mismatch',
    location,
    message: error.message,
  };
}
