/**
 * Service wiring.
 *
 * Builds every collaborator of the CLI from a validated config. Tests pass
 * overrides for the clock, the network and the sleep function instead of
 * patching globals.
 */

import type { CacheStore, FetchLike } from '@brrealty/dataset-cache';
import { FileCacheStore, MemoryCacheStore, RemoteCacheStore, TieredCacheStore } from '@brrealty/dataset-cache';
import type { Logger } from '@brrealty/logger';
import { createChildLogger, createLogger } from '@brrealty/logger';
import type { SourceAdapter } from '@brrealty/source-adapters';
import { createDefaultAdapters } from '@brrealty/source-adapters';
import type { Sleep, SourceRegistry } from '@brrealty/acquisition';
import { Orchestrator, RetryPolicy, loadRegistry } from '@brrealty/acquisition';
import type { Config } from '../config/index.js';

export interface Services {
  config: Config;
  logger: Logger;
  registry: SourceRegistry;
  /** The layer `cache save` writes and `cache status` lists */
  localCache: FileCacheStore;
  /** Absent when the memory layer is disabled */
  memoryCache?: MemoryCacheStore;
  /** Read path used by the orchestrator: memory, local, then remote */
  cache: CacheStore;
  adapters: ReadonlyMap<string, SourceAdapter>;
  policy: RetryPolicy;
  orchestrator: Orchestrator;
}

export interface ServiceOverrides {
  logger?: Logger;
  registry?: SourceRegistry;
  adapters?: ReadonlyMap<string, SourceAdapter>;
  /** Used by the adapters and the remote cache */
  fetchImpl?: FetchLike;
  sleep?: Sleep;
  now?: () => Date;
}

/**
 * Create the root logger described by the config.
 */
export function createAppLogger(config: Config): Logger {
  return createLogger({
    level: config.logging.level,
    json: config.logging.format === 'json',
    filePath: config.logging.filePath,
  });
}

/**
 * Wire all services.
 *
 * @example
 * ```typescript
 * const services = createServices(loadConfig());
 * const { table } = await services.orchestrator.fetch({ dataset: 'bcb_series', useCache: true });
 * ```
 */
export function createServices(config: Config, overrides: ServiceOverrides = {}): Services {
  const logger = overrides.logger ?? createAppLogger(config);
  const registry = overrides.registry ?? loadRegistry();
  const catalog = registry.cacheCatalog();
  const cacheLogger = createChildLogger(logger, { component: 'dataset-cache' });

  const localCache = new FileCacheStore({ dir: config.cache.dir, catalog, logger: cacheLogger, now: overrides.now });

  const memoryCache =
    config.cache.memorySize > 0 ? new MemoryCacheStore({ maxSize: config.cache.memorySize, catalog }) : undefined;

  const layers: CacheStore[] = [];
  if (memoryCache !== undefined) {
    layers.push(memoryCache);
  }
  layers.push(localCache);
  if (config.cache.remoteUrl) {
    layers.push(
      new RemoteCacheStore({
        baseUrl: config.cache.remoteUrl,
        catalog,
        timeoutMs: config.http.timeoutMs,
        fetchImpl: overrides.fetchImpl,
        logger: cacheLogger,
      })
    );
  }
  const cache = new TieredCacheStore(layers, { logger: cacheLogger });

  const adapters =
    overrides.adapters ??
    createDefaultAdapters({
      timeoutMs: config.http.timeoutMs,
      fetchImpl: overrides.fetchImpl,
      now: overrides.now,
      logger: createChildLogger(logger, { component: 'source-adapters' }),
    });

  const policy = new RetryPolicy({
    retryDelayMs: config.retry.retryDelayMs,
    backoffMultiplier: config.retry.backoffMultiplier,
    interItemDelayMs: config.retry.interItemDelayMs,
    sleep: overrides.sleep,
    logger: createChildLogger(logger, { component: 'retry-policy' }),
  });

  const orchestrator = new Orchestrator({
    registry,
    adapters,
    cache,
    policy,
    concurrency: config.retry.concurrency,
    logger,
    now: overrides.now,
  });

  return { config, logger, registry, localCache, memoryCache, cache, adapters, policy, orchestrator };
}
