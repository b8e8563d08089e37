/**
 * @fileoverview Dataset fetch orchestration.
 *
 * Flow for one request:
 * 1. Validate against the schema and the registry (no I/O before this)
 * 2. `useCache`: load the dataset's cache entry, filter it by category and
 *    date. A usable, non-empty result is returned with origin `cache`.
 *    Any miss falls through to step 3 with a warning.
 * 3. Live: every item through the retry policy and aggregator, descriptive
 *    metadata joined on, origin `live`. No successful item is fatal.
 *
 * The orchestrator only reads the cache. Writing is an explicit CLI action.
 *
 * @module @brrealty/acquisition/orchestrator
 */

import type {
  CacheProvenance,
  DataRow,
  DataTable,
  DatasetRequest,
  FetchResult,
  ItemMetadata,
  ResolvedRequest,
  SeriesOutcome,
} from '@brrealty/contracts';
import {
  AggregateFailure,
  ConfigurationError,
  columnsOf,
  errorMessage,
  isCacheMissError,
  isWithinRange,
} from '@brrealty/contracts';
import type { CacheStore, CachedTable } from '@brrealty/dataset-cache';
import { cacheAgeDays, isStale } from '@brrealty/dataset-cache';
import type { Logger } from '@brrealty/logger';
import { createChildLogger, generateRequestId, startTimer, withRequestContext } from '@brrealty/logger';
import type { SourceAdapter } from '@brrealty/source-adapters';
import { aggregate } from './aggregator.js';
import type { DatasetDefinition, SourceRegistry } from './registry.js';
import { ALL_CATEGORIES } from './registry.js';
import { resolveRequest } from './request.js';
import { RetryPolicy } from './retry-policy.js';

export interface OrchestratorOptions {
  registry: SourceRegistry;

  /** Adapters keyed by registry source id */
  adapters: ReadonlyMap<string, SourceAdapter>;

  /** Read-only cache; without one, `useCache` requests go live with a warning */
  cache?: CacheStore;

  /** Defaults to a policy with the standard delays */
  policy?: RetryPolicy;

  /** Items fetched in parallel during a live pass (default 1) */
  concurrency?: number;

  logger: Logger;

  /** Clock for retrievedAt and staleness */
  now?: () => Date;
}

type Progress = (message: string, meta?: Record<string, unknown>) => void;

/**
 * Joins an item's descriptive columns onto one of its rows, in the order
 * date, value, item column, metadata, then anything else the source returned.
 */
export function joinMetadata(row: DataRow, itemColumn: string, itemId: string, metadata: ItemMetadata): DataRow {
  const joined: DataRow = { date: row.date, value: row.value };
  joined[itemColumn] = itemId;
  for (const [column, cell] of Object.entries(metadata)) {
    joined[column] = cell;
  }
  for (const [column, cell] of Object.entries(row)) {
    if (!(column in joined)) {
      joined[column] = cell;
    }
  }
  return joined;
}

/**
 * @example
 * ```typescript
 * const orchestrator = new Orchestrator({
 *   registry: loadRegistry(),
 *   adapters: createDefaultAdapters(),
 *   cache: new FileCacheStore({ dir: cacheDir, catalog }),
 *   logger,
 * });
 *
 * const { table, provenance } = await orchestrator.fetch({
 *   dataset: 'bcb_series',
 *   category: 'price',
 *   useCache: true,
 * });
 * ```
 */
export class Orchestrator {
  private readonly registry: SourceRegistry;
  private readonly adapters: ReadonlyMap<string, SourceAdapter>;
  private readonly cache?: CacheStore;
  private readonly policy: RetryPolicy;
  private readonly concurrency: number;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: OrchestratorOptions) {
    this.registry = options.registry;
    this.adapters = options.adapters;
    this.cache = options.cache;
    this.logger = createChildLogger(options.logger, { component: 'orchestrator' });
    this.policy =
      options.policy ?? new RetryPolicy({ logger: createChildLogger(options.logger, { component: 'retry-policy' }) });
    this.concurrency = options.concurrency ?? 1;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * @throws ValidationError before any I/O for a malformed request
   * @throws AggregateFailure when the live pass produced no data at all
   * @throws ConfigurationError when no adapter serves the dataset's source
   */
  async fetch(request: DatasetRequest): Promise<FetchResult> {
    const resolved = resolveRequest(request, this.registry);
    const dataset = this.registry.getDataset(resolved.dataset);
    const requestId = generateRequestId();

    return withRequestContext(
      async () => {
        const timer = startTimer();
        const progress: Progress = (message, meta = {}) => {
          this.logger.log(resolved.quiet ? 'debug' : 'info', message, { dataset: dataset.name, ...meta });
        };

        if (resolved.useCache) {
          const cached = await this.fromCache(resolved, dataset, requestId, progress);
          if (cached !== undefined) {
            progress('Fetch complete', { origin: 'cache', rows: cached.table.length, duration_ms: timer.stop() });
            return cached;
          }
        }

        const live = await this.fromLive(resolved, dataset, requestId, progress);
        progress('Fetch complete', {
          origin: 'live',
          rows: live.table.length,
          failed: live.provenance.outcomes.filter((outcome) => outcome.status !== 'success').length,
          duration_ms: timer.stop(),
        });
        return live;
      },
      requestId,
      { dataset: dataset.name }
    );
  }

  /**
   * Cache path. Returns undefined, after a warning, whenever the cache cannot
   * answer the request. Never retried.
   */
  private async fromCache(
    request: ResolvedRequest,
    dataset: DatasetDefinition,
    requestId: string,
    progress: Progress
  ): Promise<FetchResult | undefined> {
    if (this.cache === undefined) {
      this.logger.warn('No cache configured, falling back to fresh download', { dataset: dataset.name });
      return undefined;
    }

    progress('Loading cached data', { cache: dataset.cacheName });

    let cached: CachedTable;
    try {
      cached = await this.cache.load(dataset.cacheName);
    } catch (error) {
      this.logger.warn('Failed to load cached data, falling back to fresh download', {
        dataset: dataset.name,
        cache: dataset.cacheName,
        reason: isCacheMissError(error) ? error.data?.['reason'] : undefined,
        error: errorMessage(error),
      });
      return undefined;
    }

    if (!columnsOf(cached.table).includes(dataset.itemColumn)) {
      this.logger.warn('Cached data has no item column, falling back to fresh download', {
        dataset: dataset.name,
        column: dataset.itemColumn,
        location: cached.entry.location,
      });
      return undefined;
    }

    const table = this.filterCached(cached.table, request, dataset);
    if (table.length === 0) {
      this.logger.warn('Cached data has no rows for this request, falling back to fresh download', {
        dataset: dataset.name,
        category: request.category,
        start: request.range.start,
        end: request.range.end,
        cachedRows: cached.table.length,
      });
      return undefined;
    }

    const now = this.now();
    const stale = isStale(cached.cachedAt, dataset, now);
    if (stale && cached.cachedAt !== undefined) {
      this.logger.warn('Cached data is stale; run `cache save` to refresh it', {
        dataset: dataset.name,
        cachedAt: cached.cachedAt,
        ageDays: cacheAgeDays(cached.cachedAt, now),
      });
    }

    const cache: CacheProvenance = {
      name: cached.entry.name,
      format: cached.entry.format,
      location: cached.entry.location,
      stale,
    };
    if (cached.cachedAt !== undefined) {
      cache.cachedAt = cached.cachedAt;
    }

    return {
      table,
      provenance: {
        requestId,
        dataset: dataset.name,
        category: request.category,
        origin: 'cache',
        retrievedAt: now.toISOString(),
        dateRange: request.range,
        outcomes: [],
        cache,
      },
    };
  }

  /**
   * Category narrows by item id, using the registry's item list for the
   * category; dates by the inclusive request range. Returns fresh rows.
   */
  private filterCached(table: DataTable, request: ResolvedRequest, dataset: DatasetDefinition): DataTable {
    const ids =
      request.category === ALL_CATEGORIES
        ? undefined
        : new Set(this.registry.resolveItems(dataset.name, request.category).map((item) => item.id));

    return table
      .filter((row) => {
        if (!isWithinRange(row.date, request.range)) {
          return false;
        }
        if (ids === undefined) {
          return true;
        }
        const id = row[dataset.itemColumn];
        return id !== null && id !== undefined && ids.has(String(id));
      })
      .map((row) => ({ ...row }));
  }

  private async fromLive(
    request: ResolvedRequest,
    dataset: DatasetDefinition,
    requestId: string,
    progress: Progress
  ): Promise<FetchResult> {
    const adapter = this.adapters.get(dataset.source);
    if (adapter === undefined) {
      throw new ConfigurationError(`No adapter registered for source "${dataset.source}"`, {
        issues: [`adapters: missing "${dataset.source}"`],
        dataset: dataset.name,
      });
    }

    const items = this.registry.resolveItems(dataset.name, request.category);
    progress(`Downloading ${items.length} series from ${adapter.id}`, {
      category: request.category,
      start: request.range.start,
      end: request.range.end,
    });

    const result = await aggregate(items, (item) => adapter.fetchItem(item.id, request.range), this.policy, {
      itemColumn: dataset.itemColumn,
      maxAttempts: request.maxRetries,
      concurrency: this.concurrency,
      onOutcome: (outcome, position, total) => {
        progress(`Series ${outcome.itemId}: ${outcome.status} (${position}/${total})`, {
          item: outcome.itemId,
          status: outcome.status,
          rows: outcome.rows,
          attempts: outcome.attempts,
          error: outcome.error,
        });
      },
    });

    const failed = result.outcomes.filter((outcome) => outcome.status !== 'success');

    if (!result.ok) {
      throw new AggregateFailure('No series were successfully downloaded', {
        dataset: dataset.name,
        attempted: items.length,
        failed: failed.length,
        failedItems: failed.map((outcome) => outcome.itemId),
        outcomes: result.outcomes,
      });
    }

    if (failed.length > 0) {
      this.logger.warn(`${failed.length} series failed: ${failed.map((outcome) => outcome.itemId).join(', ')}`, {
        dataset: dataset.name,
        failures: summarize(failed),
      });
    }

    const metadata = new Map(items.map((item) => [item.id, this.registry.metadataFor(dataset.name, item.id)]));
    const table = result.table.map((row) => {
      const itemId = String(row[dataset.itemColumn]);
      return joinMetadata(row, dataset.itemColumn, itemId, metadata.get(itemId) ?? {});
    });

    return {
      table,
      provenance: {
        requestId,
        dataset: dataset.name,
        category: request.category,
        origin: 'live',
        retrievedAt: this.now().toISOString(),
        dateRange: request.range,
        outcomes: result.outcomes,
      },
    };
  }
}

function summarize(outcomes: SeriesOutcome[]): Record<string, string> {
  return Object.fromEntries(outcomes.map((outcome) => [outcome.itemId, outcome.error ?? outcome.status]));
}
