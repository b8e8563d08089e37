/**
 * @fileoverview Main entry point for @brrealty/contracts package.
 *
 * Exports the shared types and error classes of the acquisition layer.
 *
 * @module @brrealty/contracts
 */

// Tabular data
export type { CellValue, DataRow, DataTable, DateRange } from './table.js';

export { isIsoDate, isWithinRange, hasValue, columnsOf } from './table.js';

// Requests, outcomes and provenance
export type {
  DatasetRequest,
  ResolvedRequest,
  ItemMetadata,
  SourceItem,
  SeriesStatus,
  SeriesOutcome,
  DataOrigin,
  CacheProvenance,
  Provenance,
  FetchResult,
} from './dataset.js';

export { failedOutcomes } from './dataset.js';

// Cache entries
export type { CacheFormat, CacheEntry, UpdateSchedule } from './cache.js';

export { CACHE_FORMATS, isCacheFormat } from './cache.js';

// Error classes and guards
export {
  BrRealtyError,
  ValidationError,
  CacheMissError,
  TransientFetchError,
  UpstreamResponseError,
  PermanentSeriesError,
  AggregateFailure,
  ConfigurationError,
  isBrRealtyError,
  isValidationError,
  isCacheMissError,
  isTransientFetchError,
  isUpstreamResponseError,
  isAggregateFailure,
  isRetryable,
  errorMessage,
} from './errors.js';
