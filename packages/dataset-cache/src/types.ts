/**
 * Type definitions for the dataset cache.
 */

import type { CacheEntry, CacheFormat, DataTable, UpdateSchedule } from '@brrealty/contracts'

/**
 * Declared type of a delimited-text column. Columns without a declaration
 * are inferred from their cells.
 */
export type ColumnType = 'date' | 'number' | 'string' | 'boolean'

export type ColumnTypes = Record<string, ColumnType>

/**
 * Per-name cache settings.
 *
 * Example:
 * ```typescript
 * const catalog: CacheCatalog = {
 *   bcb_series: { format: 'csv.gz', columns: { code_bcb: 'string' }, updateSchedule: 'weekly' },
 *   b3_stocks: { format: 'msgpack' },
 * }
 * ```
 */
export interface CatalogEntry {
  /** Storage format (default 'csv.gz') */
  format?: CacheFormat

  /** Column declarations for text formats; merged over the defaults */
  columns?: ColumnTypes

  /** Drives staleness; see freshness.ts */
  updateSchedule?: UpdateSchedule

  /** Overrides the schedule-based staleness threshold */
  warnAfterDays?: number
}

export type CacheCatalog = Record<string, CatalogEntry>

/**
 * A table read from a cache store.
 */
export interface CachedTable {
  entry: CacheEntry

  table: DataTable

  /** ISO 8601 time the entry was written, when known */
  cachedAt?: string
}

/**
 * Read side of a cache. `load` rejects with CacheMissError for absent
 * or unreadable entries; no other error escapes it.
 */
export interface CacheStore {
  /** Short label used in logs ('file', 'remote', 'memory', 'tiered') */
  readonly kind: string

  load(name: string): Promise<CachedTable>
}

export interface SaveOptions {
  /** Defaults to now */
  cachedAt?: string

  /** Recorded in metadata, e.g. 'live' or 'remote' */
  source?: string
}

/**
 * A cache that can also be written. Only explicit save commands and
 * tiered backfill call `save`; dataset fetches never do.
 */
export interface WritableCacheStore extends CacheStore {
  save(name: string, table: DataTable, options?: SaveOptions): Promise<CacheEntry>
}

/**
 * Summary of one stored entry, for status listings.
 */
export interface CacheFileStatus {
  name: string
  format: CacheFormat
  location: string
  sizeBytes: number
  cachedAt?: string
  rows?: number
  source?: string
  ageDays?: number
  stale: boolean
}

export function isWritable(store: CacheStore): store is WritableCacheStore {
  return 'save' in store && typeof store.save === 'function'
}
