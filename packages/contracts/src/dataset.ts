/**
 * @fileoverview Request, outcome and provenance types for dataset fetches.
 *
 * All types are pure data structures with no I/O.
 *
 * @module @brrealty/contracts/dataset
 */

import type { CacheFormat } from './cache.js';
import type { DataTable, DateRange } from './table.js';

/**
 * Caller-facing request. Only `dataset` is required.
 *
 * @example
 * ```typescript
 * const request: DatasetRequest = {
 *   dataset: 'bcb_series',
 *   category: 'price',
 *   start: '2020-01-01',
 *   useCache: true,
 * };
 * ```
 */
export interface DatasetRequest {
  /** Registry dataset name */
  dataset: string;

  /** Item category filter; `'all'` keeps every item (default `'all'`) */
  category?: string;

  /** First date, `YYYY-MM-DD` (default: the dataset's default start) */
  start?: string;

  /** Last date, `YYYY-MM-DD` (default: open ended) */
  end?: string;

  /** Try the cache before fetching live (default false) */
  useCache?: boolean;

  /** Demote progress messages to debug level (default false) */
  quiet?: boolean;

  /** Attempts per item, including the first (default 3) */
  maxRetries?: number;
}

/** A request with every default applied and validated. */
export interface ResolvedRequest {
  dataset: string;
  category: string;
  range: DateRange;
  useCache: boolean;
  quiet: boolean;
  maxRetries: number;
}

/** Descriptive columns joined onto every row of an item. */
export type ItemMetadata = Record<string, string | number | boolean | null>;

/**
 * One independently fetchable unit of a dataset (a series code, a ticker).
 */
export interface SourceItem {
  id: string;
  category: string;
  metadata: ItemMetadata;
}

export type SeriesStatus = 'success' | 'empty' | 'all_invalid' | 'error';

/**
 * Result of fetching one item during a live pass.
 *
 * @invariant status === 'success' implies rows > 0
 * @invariant attempts >= 1
 */
export interface SeriesOutcome {
  itemId: string;
  status: SeriesStatus;
  /** Rows contributed to the combined table (0 unless success) */
  rows: number;
  /** Number of calls made to the adapter */
  attempts: number;
  /** Failure description for non-success outcomes */
  error?: string;
}

export type DataOrigin = 'cache' | 'live';

/** Cache entry details recorded when a result is served from cache. */
export interface CacheProvenance {
  name: string;
  format: CacheFormat;
  location: string;
  cachedAt?: string;
  stale: boolean;
}

/**
 * Describes where a result came from. Returned next to the table,
 * never merged into its columns.
 */
export interface Provenance {
  requestId: string;
  dataset: string;
  category: string;
  origin: DataOrigin;
  /** ISO 8601 timestamp of retrieval */
  retrievedAt: string;
  dateRange: DateRange;
  /** One entry per attempted item; empty for cache hits */
  outcomes: SeriesOutcome[];
  cache?: CacheProvenance;
}

export interface FetchResult {
  table: DataTable;
  provenance: Provenance;
}

/** Items that did not produce a success. */
export function failedOutcomes(provenance: Provenance): SeriesOutcome[] {
  return provenance.outcomes.filter((outcome) => outcome.status !== 'success');
}
