/**
 * In-memory LRU layer for decoded tables.
 *
 * Implements a simple Least Recently Used (LRU) eviction policy:
 * - New entries are added to the end
 * - Loaded entries are moved to the end
 * - When full, the oldest (first) entry is evicted
 *
 * Rows are copied on save and on load; callers never share row objects.
 *
 * Example:
 * ```typescript
 * const memory = new MemoryCacheStore({ maxSize: 8 })
 * await memory.save('bcb_series', table)
 * const { table: cached } = await memory.load('bcb_series')
 * ```
 */

import type { CacheEntry, DataTable } from '@brrealty/contracts'
import { CacheMissError } from '@brrealty/contracts'
import { formatFor } from './catalog.js'
import type { CacheCatalog, CachedTable, SaveOptions, WritableCacheStore } from './types.js'

const DEFAULT_MAX_SIZE = 16

function copyRows(table: DataTable): DataTable {
  return table.map((row) => ({ ...row }))
}

export interface MemoryCacheStoreOptions {
  /** Maximum number of tables kept (default: 16) */
  maxSize?: number
  catalog?: CacheCatalog
}

export class MemoryCacheStore implements WritableCacheStore {
  readonly kind = 'memory'

  private readonly tables = new Map<string, CachedTable>()
  private readonly maxSize: number
  private readonly catalog: CacheCatalog

  constructor(options: MemoryCacheStoreOptions = {}) {
    this.maxSize = Math.max(1, options.maxSize ?? DEFAULT_MAX_SIZE)
    this.catalog = options.catalog ?? {}
  }

  async load(name: string): Promise<CachedTable> {
    const hit = this.tables.get(name)
    if (hit === undefined) {
      throw new CacheMissError(`"${name}" is not held in memory`, { name, reason: 'not_in_memory' })
    }

    // Move to end (most recently used)
    this.tables.delete(name)
    this.tables.set(name, hit)
    return { ...hit, table: copyRows(hit.table) }
  }

  async save(name: string, table: DataTable, options: SaveOptions = {}): Promise<CacheEntry> {
    const entry: CacheEntry = { name, format: formatFor(this.catalog, name), location: `memory:${name}` }

    this.tables.delete(name)
    if (this.tables.size >= this.maxSize) {
      const oldest = this.tables.keys().next().value
      if (oldest !== undefined) {
        this.tables.delete(oldest)
      }
    }

    this.tables.set(name, { entry, table: copyRows(table), cachedAt: options.cachedAt ?? new Date().toISOString() })
    return entry
  }

  has(name: string): boolean {
    return this.tables.has(name)
  }

  /** Drop the named tables, or every table when no names are given. */
  clear(names?: readonly string[]): void {
    if (names === undefined) {
      this.tables.clear()
      return
    }
    for (const name of names) {
      this.tables.delete(name)
    }
  }

  size(): number {
    return this.tables.size
  }
}
