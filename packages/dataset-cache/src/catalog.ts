/**
 * Per-name format and column lookup.
 */

import type { CacheFormat } from '@brrealty/contracts'
import { CACHE_FORMATS } from '@brrealty/contracts'
import type { CacheCatalog, ColumnTypes } from './types.js'

export const DEFAULT_CACHE_FORMAT: CacheFormat = 'csv.gz'

export function formatFor(catalog: CacheCatalog, name: string): CacheFormat {
  return catalog[name]?.format ?? DEFAULT_CACHE_FORMAT
}

export function columnsFor(catalog: CacheCatalog, name: string): ColumnTypes {
  return catalog[name]?.columns ?? {}
}

/**
 * Formats to try on disk: the catalogued one first, then the rest
 * in preference order.
 */
export function formatCandidates(catalog: CacheCatalog, name: string): CacheFormat[] {
  const preferred = formatFor(catalog, name)
  return [preferred, ...CACHE_FORMATS.filter((format) => format !== preferred)]
}
