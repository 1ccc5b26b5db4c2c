/**
 * @fileoverview Error taxonomy for the pivot suite.
 *
 * Every error carries a machine-readable code, structured data and an ISO
 * timestamp. Integrity and degenerate-bucket errors are recorded and counted
 * by the pipeline; fetch, cache and insufficient-data errors reach the caller
 * as typed results.
 *
 * @module @pivot-suite/contracts/errors
 */

/**
 * Base class for all suite errors.
 *
 * @example
 * ```typescript
 * throw new PivotSuiteError('CUSTOM_ERROR', 'Something went wrong', { ticker: 'BTCUSDT' });
 * ```
 */
export class PivotSuiteError extends Error {
  /** Machine-readable error code, e.g. 'FETCH_FAILED' */
  readonly code: string;

  readonly data?: Record<string, unknown>;

  /** ISO 8601 creation time */
  readonly timestamp: string;

  constructor(code: string, message: string, data?: Record<string, unknown>) {
    super(message);
    this.name = 'PivotSuiteError';
    this.code = code;
    this.data = data;
    this.timestamp = new Date().toISOString();
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      data: this.data,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

/**
 * Why an exchange fetch failed.
 */
export type FetchFailureReason =
  | 'timeout'
  | 'network'
  | 'rate-limit'
  | 'upstream'
  | 'http'
  | 'parse'
  | 'cancelled';

/**
 * Upstream fetch failure. `retryable` tells the fetcher's retry loop whether
 * another attempt can succeed.
 *
 * @example
 * ```typescript
 * throw new FetchError('Bybit request timed out after 10000ms', {
 *   reason: 'timeout',
 *   retryable: true,
 *   ticker: 'ETHUSDT',
 * });
 * ```
 */
export class FetchError extends PivotSuiteError {
  readonly reason: FetchFailureReason;
  readonly retryable: boolean;

  constructor(
    message: string,
    data: { reason: FetchFailureReason; retryable: boolean; [key: string]: unknown }
  ) {
    super('FETCH_FAILED', message, data);
    this.name = 'FetchError';
    this.reason = data.reason;
    this.retryable = data.retryable;
  }
}

/**
 * A candle row that violates the OHLCV invariants. The row is rejected,
 * the rest of its batch is kept.
 */
export class DataIntegrityError extends PivotSuiteError {
  constructor(
    message: string,
    data: { ticker: string; timestamp: number; rule: string; [key: string]: unknown }
  ) {
    super('DATA_INTEGRITY', message, data);
    this.name = 'DataIntegrityError';
  }
}

/**
 * A bucket with too few candles to yield two distinct pivots.
 */
export class DegenerateBucketError extends PivotSuiteError {
  constructor(message: string, data: { bucketStart: number; candleCount: number; [key: string]: unknown }) {
    super('DEGENERATE_BUCKET', message, data);
    this.name = 'DegenerateBucketError';
  }
}

/**
 * The requested range holds no usable candles at all.
 */
export class InsufficientDataError extends PivotSuiteError {
  constructor(message: string, data: { ticker: string; [key: string]: unknown }) {
    super('INSUFFICIENT_DATA', message, data);
    this.name = 'InsufficientDataError';
  }
}

/**
 * A persistent store could not be reached. Callers degrade to recomputing.
 */
export class CacheUnavailableError extends PivotSuiteError {
  constructor(message: string, data: { store: string; operation: string; [key: string]: unknown }) {
    super('CACHE_UNAVAILABLE', message, data);
    this.name = 'CacheUnavailableError';
  }
}

/**
 * Input rejected at the boundary before any work was done.
 */
export class InvalidRequestError extends PivotSuiteError {
  constructor(message: string, data: { issues: string[]; [key: string]: unknown }) {
    super('INVALID_REQUEST', message, data);
    this.name = 'InvalidRequestError';
  }
}

export function isPivotSuiteError(error: unknown): error is PivotSuiteError {
  return error instanceof PivotSuiteError;
}

export function isFetchError(error: unknown): error is FetchError {
  return error instanceof FetchError;
}

export function isDataIntegrityError(error: unknown): error is DataIntegrityError {
  return error instanceof DataIntegrityError;
}

export function isDegenerateBucketError(error: unknown): error is DegenerateBucketError {
  return error instanceof DegenerateBucketError;
}

export function isInsufficientDataError(error: unknown): error is InsufficientDataError {
  return error instanceof InsufficientDataError;
}

export function isCacheUnavailableError(error: unknown): error is CacheUnavailableError {
  return error instanceof CacheUnavailableError;
}

export function isInvalidRequestError(error: unknown): error is InvalidRequestError {
  return error instanceof InvalidRequestError;
}

/**
 * Message of an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
