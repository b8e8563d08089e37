/**
 * @fileoverview Cache entry types.
 *
 * @module @brrealty/contracts/cache
 */

/**
 * Storage format of a cache entry.
 *
 * - `csv.gz` / `csv`: delimited text, typed on read by a column-type table
 * - `msgpack`: pre-typed binary rows
 */
export type CacheFormat = 'csv.gz' | 'csv' | 'msgpack';

export const CACHE_FORMATS = ['csv.gz', 'csv', 'msgpack'] as const satisfies readonly CacheFormat[];

export function isCacheFormat(value: string): value is CacheFormat {
  return CACHE_FORMATS.some((format) => format === value);
}

/** A resolved cache entry. */
export interface CacheEntry {
  name: string;
  format: CacheFormat;
  /** File path or URL */
  location: string;
}

/** How often a dataset is refreshed upstream; drives staleness. */
export type UpdateSchedule = 'daily' | 'weekly' | 'monthly' | 'manual';
