/**
 * @brrealty/dataset-cache
 *
 * Cache stores for acquired datasets. Every store answers `load(name)` with
 * a typed table or rejects with CacheMissError.
 *
 * Layers:
 * - MemoryCacheStore: LRU of decoded tables
 * - FileCacheStore: local directory, the only layer the CLI writes explicitly
 * - RemoteCacheStore: read-only HTTP assets
 * - TieredCacheStore: read-through over the above, backfilling the memory layer
 *
 * Storage format per name comes from a catalog:
 * - 'csv.gz' / 'csv': delimited text, typed on read by a column-type table
 * - 'msgpack': pre-typed binary rows
 *
 * Example usage:
 * ```typescript
 * import { FileCacheStore, RemoteCacheStore, TieredCacheStore } from '@brrealty/dataset-cache'
 *
 * const catalog = { bcb_series: { format: 'csv.gz', columns: { code_bcb: 'string' } } }
 * const cache = new TieredCacheStore([
 *   new FileCacheStore({ dir: '~/.cache/brrealty', catalog }),
 *   new RemoteCacheStore({ baseUrl: 'https://example.test/cache-latest', catalog }),
 * ])
 *
 * const { table, cachedAt } = await cache.load('bcb_series')
 * ```
 */

export * from './types.js'
export { MemoryCacheStore } from './memoryStore.js'
export type { MemoryCacheStoreOptions } from './memoryStore.js'
export { FileCacheStore } from './fileStore.js'
export type { FileCacheStoreOptions } from './fileStore.js'
export { RemoteCacheStore } from './remoteStore.js'
export type { RemoteCacheStoreOptions, FetchLike } from './remoteStore.js'
export { TieredCacheStore, DEFAULT_BACKFILL_KINDS } from './tieredStore.js'
export type { TieredCacheStoreOptions } from './tieredStore.js'
export { DEFAULT_CACHE_FORMAT, formatFor, columnsFor, formatCandidates } from './catalog.js'
export { FORMAT_EXTENSIONS, TableDecodeError, DEFAULT_COLUMN_TYPES, decodeTable, encodeTable } from './codecs/index.js'
export { decodeText, encodeText } from './codecs/text.js'
export { decodeBinary, encodeBinary } from './codecs/binary.js'
export {
  STALE_AFTER_DAYS,
  DEFAULT_STALE_AFTER_DAYS,
  staleAfterDays,
  cacheAgeDays,
  isStale,
} from './freshness.js'
export type { FreshnessOptions } from './freshness.js'
