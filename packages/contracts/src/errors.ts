/**
 * @fileoverview Error taxonomy for the dataset acquisition layer.
 *
 * Every error carries a machine-readable code, a structured data payload,
 * an ISO timestamp and a `retryable` flag. The retry policy only looks at
 * that flag: anything not explicitly marked non-retryable is treated as a
 * transient failure.
 *
 * @module @brrealty/contracts/errors
 */

/**
 * Base error class for all acquisition errors.
 *
 * @invariant code is non-empty string
 * @invariant timestamp is valid ISO 8601 string
 *
 * @example
 * ```typescript
 * throw new BrRealtyError('CUSTOM_ERROR', 'Something went wrong', { dataset: 'bcb_series' });
 * ```
 */
export class BrRealtyError extends Error {
  /** Machine-readable error code (e.g. 'CACHE_MISS'). */
  readonly code: string;

  /** Structured context for debugging and reporting. */
  readonly data?: Record<string, unknown>;

  /** ISO 8601 timestamp when the error was created. */
  readonly timestamp: string;

  /** Whether retrying the same operation may succeed. */
  readonly retryable: boolean;

  constructor(
    code: string,
    message: string,
    data?: Record<string, unknown>,
    options: { retryable?: boolean; cause?: unknown } = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.data = data;
    this.timestamp = new Date().toISOString();
    this.retryable = options.retryable ?? false;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      data: this.data,
      retryable: this.retryable,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}

/**
 * Thrown when a request is malformed. Raised before any I/O happens.
 *
 * @example
 * ```typescript
 * throw new ValidationError('start must be on or before end', {
 *   field: 'end',
 *   start: '2024-01-01',
 *   end: '2023-01-01',
 * });
 * ```
 */
export class ValidationError extends BrRealtyError {
  constructor(message: string, data: { field?: string; issues?: string[]; [key: string]: unknown } = {}) {
    super('VALIDATION_ERROR', message, data);
  }
}

/**
 * Thrown by a cache store when an entry is absent or cannot be read.
 *
 * Always recovered by the orchestrator, which falls back to a live fetch.
 */
export class CacheMissError extends BrRealtyError {
  constructor(
    message: string,
    data: { name: string; location?: string; reason?: string; [key: string]: unknown },
    cause?: unknown
  ) {
    super('CACHE_MISS', message, data, { cause });
  }
}

/**
 * Thrown by a source adapter for failures that may succeed on retry
 * (network errors, timeouts, 5xx and 429 responses).
 */
export class TransientFetchError extends BrRealtyError {
  constructor(
    message: string,
    data: { source: string; itemId?: string; status?: number; [key: string]: unknown },
    cause?: unknown
  ) {
    super('TRANSIENT_FETCH', message, data, { retryable: true, cause });
  }
}

/**
 * Thrown by a source adapter when the upstream answered with something that
 * will not change on retry (4xx other than 429, malformed payloads).
 */
export class UpstreamResponseError extends BrRealtyError {
  constructor(
    message: string,
    data: { source: string; itemId?: string; status?: number; [key: string]: unknown },
    cause?: unknown
  ) {
    super('UPSTREAM_RESPONSE', message, data, { cause });
  }
}

/**
 * Describes an item whose fetch succeeded but produced no usable data.
 *
 * Never retried; used to report `empty` and `all_invalid` outcomes.
 */
export class PermanentSeriesError extends BrRealtyError {
  constructor(message: string, data: { itemId: string; reason: 'empty' | 'all_invalid'; [key: string]: unknown }) {
    super('PERMANENT_SERIES', message, data);
  }
}

/**
 * Thrown when every item of a live fetch failed.
 *
 * @example
 * ```typescript
 * throw new AggregateFailure('No series were successfully downloaded', {
 *   dataset: 'bcb_series',
 *   attempted: 3,
 *   failed: 3,
 *   failedItems: ['433', '189', '11'],
 * });
 * ```
 */
export class AggregateFailure extends BrRealtyError {
  readonly attempted: number;
  readonly failed: number;

  constructor(
    message: string,
    data: { dataset: string; attempted: number; failed: number; failedItems: string[]; [key: string]: unknown }
  ) {
    super('AGGREGATE_FAILURE', message, data);
    this.attempted = data.attempted;
    this.failed = data.failed;
  }
}

/**
 * Thrown when environment configuration does not satisfy the schema.
 */
export class ConfigurationError extends BrRealtyError {
  constructor(message: string, data: { issues: string[]; [key: string]: unknown }) {
    super('CONFIGURATION_ERROR', message, data);
  }
}

export function isBrRealtyError(error: unknown): error is BrRealtyError {
  return error instanceof BrRealtyError;
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

export function isCacheMissError(error: unknown): error is CacheMissError {
  return error instanceof CacheMissError;
}

export function isTransientFetchError(error: unknown): error is TransientFetchError {
  return error instanceof TransientFetchError;
}

export function isUpstreamResponseError(error: unknown): error is UpstreamResponseError {
  return error instanceof UpstreamResponseError;
}

export function isAggregateFailure(error: unknown): error is AggregateFailure {
  return error instanceof AggregateFailure;
}

/**
 * Whether an arbitrary thrown value should be retried.
 *
 * Typed errors answer through their `retryable` flag; anything else
 * (plain Error, TypeError from fetch, strings) is assumed transient.
 */
export function isRetryable(error: unknown): boolean {
  if (isBrRealtyError(error)) {
    return error.retryable;
  }
  return true;
}

/**
 * Extracts a human-readable message from any thrown value.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
