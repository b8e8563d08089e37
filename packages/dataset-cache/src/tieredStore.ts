/**
 * Read-through cache over an ordered list of layers.
 *
 * Read flow:
 * 1. Ask each layer in order (e.g. memory, local directory, remote)
 * 2. On the first hit, backfill the earlier writable layers whose kind is
 *    listed in `backfill` (default: memory only)
 * 3. Return the hit as the layer that held it reported it
 *
 * Reads never write the local directory unless 'file' is listed. A failed
 * backfill is logged and does not fail the read.
 *
 * Example:
 * ```typescript
 * const cache = new TieredCacheStore(
 *   [new MemoryCacheStore(), new FileCacheStore({ dir }), new RemoteCacheStore({ baseUrl })],
 *   { logger }
 * )
 * const { table, entry } = await cache.load('bcb_series')
 * ```
 */

import { CacheMissError, errorMessage, isCacheMissError } from '@brrealty/contracts'
import type { Logger } from '@brrealty/logger'
import type { CachedTable, CacheStore } from './types.js'
import { isWritable } from './types.js'

export const DEFAULT_BACKFILL_KINDS: readonly string[] = ['memory']

export interface TieredCacheStoreOptions {
  /** Layer kinds refilled from a slower hit (default: ['memory']) */
  backfill?: readonly string[]
  logger?: Logger
}

export class TieredCacheStore implements CacheStore {
  readonly kind = 'tiered'

  private readonly layers: readonly CacheStore[]
  private readonly backfillKinds: ReadonlySet<string>
  private readonly logger?: Logger

  /**
   * @param layers - Fastest first
   */
  constructor(layers: readonly CacheStore[], options: TieredCacheStoreOptions = {}) {
    this.layers = layers
    this.backfillKinds = new Set(options.backfill ?? DEFAULT_BACKFILL_KINDS)
    this.logger = options.logger
  }

  async load(name: string): Promise<CachedTable> {
    const misses: string[] = []

    for (const [index, layer] of this.layers.entries()) {
      let hit: CachedTable
      try {
        hit = await layer.load(name)
      } catch (error) {
        // Layers promise CacheMissError only; anything else still means "not here"
        const reason = isCacheMissError(error) ? String(error.data?.['reason'] ?? error.message) : errorMessage(error)
        misses.push(`${layer.kind}: ${reason}`)
        continue
      }

      await this.backfill(name, hit, this.layers.slice(0, index))
      return hit
    }

    throw new CacheMissError(`No cache layer holds "${name}"`, {
      name,
      reason: misses.join('; ') || 'no layers configured',
      layers: this.layers.map((layer) => layer.kind),
    })
  }

  private async backfill(name: string, hit: CachedTable, earlier: readonly CacheStore[]): Promise<void> {
    for (const layer of earlier) {
      if (!isWritable(layer) || !this.backfillKinds.has(layer.kind)) {
        continue
      }
      try {
        await layer.save(name, hit.table, { cachedAt: hit.cachedAt, source: hit.entry.location })
      } catch (error) {
        this.logger?.warn('Cache backfill failed', { cache: name, layer: layer.kind, error: errorMessage(error) })
      }
    }
  }
}
