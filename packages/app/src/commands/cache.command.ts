/**
 * `cache status`, `cache save <dataset>` and `cache clear [datasets...]`
 *
 * `cache save` is the only writer of the local cache: it fetches live and
 * replaces the dataset's cache file. `cache clear` deletes cache files and
 * their metadata. `cache status` is read-only and exits with 1 when any
 * entry is stale.
 */

import type { Command, CommandConfig, CommandOutput } from './types.js';
import { outputOptionsSchema, parseOptions, rangeOptionsSchema } from './options.js';
import { failureWarnings, toRequest } from './fetch.command.js';
import { ALL_CATEGORIES } from '@brrealty/acquisition';
import { EXIT_CODES, createResult } from '../utils/cli-utils.js';
import type { Services } from '../container/index.js';

const saveOptionsSchema = outputOptionsSchema.merge(rangeOptionsSchema);

export class CacheStatusCommand implements Command {
  name = 'cache status';
  description = 'List local cache files with their age and staleness';

  private services: Services;
  private now: () => Date;

  constructor(config: CommandConfig) {
    this.services = config.services;
    this.now = config.now ?? (() => new Date());
  }

  async execute(_args: string[], options: unknown): Promise<CommandOutput> {
    parseOptions(outputOptionsSchema, options);
    const { localCache, registry } = this.services;

    const entries = await localCache.list();
    const cached = new Set(entries.map((entry) => entry.name));
    const missing = registry
      .listDatasets()
      .filter((dataset) => !cached.has(dataset.cacheName))
      .map((dataset) => dataset.name);

    const warnings = entries
      .filter((entry) => entry.stale)
      .map((entry) => `${entry.name} is stale (${entry.ageDays ?? '?'} days old)`);

    return {
      result: createResult(
        this.name,
        true,
        { dir: localCache.dir, entries, missing },
        {
          warnings: warnings.length > 0 ? warnings : undefined,
          exitCode: warnings.length > 0 ? EXIT_CODES.partial : EXIT_CODES.success,
          now: this.now(),
        }
      ),
    };
  }
}

export class CacheSaveCommand implements Command {
  name = 'cache save';
  description = 'Fetch a dataset live and store it in the local cache';

  private services: Services;
  private now: () => Date;

  constructor(config: CommandConfig) {
    this.services = config.services;
    this.now = config.now ?? (() => new Date());
  }

  async execute(args: string[], rawOptions: unknown): Promise<CommandOutput> {
    const options = parseOptions(saveOptionsSchema, rawOptions);
    const dataset = args[0] ?? '';
    const { orchestrator, registry, localCache } = this.services;

    const result = await orchestrator.fetch(toRequest(dataset, options, false));
    const definition = registry.getDataset(result.provenance.dataset);
    const entry = await localCache.save(definition.cacheName, result.table, {
      source: `live:${result.provenance.requestId}`,
      cachedAt: result.provenance.retrievedAt,
    });

    const warnings = failureWarnings(result);
    if (result.provenance.category !== ALL_CATEGORIES) {
      warnings.push(
        `Saved only category "${result.provenance.category}"; cached requests for other categories will go live`
      );
    }

    return {
      result: createResult(
        this.name,
        true,
        { dataset: definition.name, cache: entry, rows: result.table.length, requestId: result.provenance.requestId },
        { warnings: warnings.length > 0 ? warnings : undefined, now: this.now() }
      ),
    };
  }
}

export class CacheClearCommand implements Command {
  name = 'cache clear';
  description = 'Delete local cache files, for the named datasets or all of them';

  private services: Services;
  private now: () => Date;

  constructor(config: CommandConfig) {
    this.services = config.services;
    this.now = config.now ?? (() => new Date());
  }

  async execute(args: string[], options: unknown): Promise<CommandOutput> {
    parseOptions(outputOptionsSchema, options);
    const { localCache, memoryCache, registry } = this.services;

    // Unknown names throw before anything is deleted
    const names = args.length > 0 ? args.map((dataset) => registry.getDataset(dataset).cacheName) : undefined;

    const removed = await localCache.clear(names);
    memoryCache?.clear(names);

    return {
      result: createResult(this.name, true, { dir: localCache.dir, removed }, { now: this.now() }),
    };
  }
}
