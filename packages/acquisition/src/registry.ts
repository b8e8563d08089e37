/**
 * @fileoverview Static source registry: which datasets exist, which source
 * serves them, and the ordered items each one is assembled from.
 *
 * The registry is read from `data/registry.json` once, validated, frozen and
 * then handed around by reference. Nothing mutates it at run time.
 *
 * @module @brrealty/acquisition/registry
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { ItemMetadata, SourceItem } from '@brrealty/contracts';
import { CACHE_FORMATS, ValidationError, isIsoDate } from '@brrealty/contracts';
import type { CacheCatalog, ColumnTypes } from '@brrealty/dataset-cache';

/** Category value that keeps every item of a dataset. */
export const ALL_CATEGORIES = 'all';

const REGISTRY_URL = new URL('../data/registry.json', import.meta.url);

const metadataValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const itemSchema = z.object({
  id: z.string().min(1),
  category: z.string().min(1),
  metadata: z.record(metadataValueSchema).default({}),
});

const datasetSchema = z
  .object({
    name: z.string().min(1),
    title: z.string(),
    source: z.string().min(1),
    itemColumn: z.string().min(1),
    categoryColumn: z.string().min(1),
    metadataColumns: z.array(z.string()).default([]),
    cacheName: z.string().min(1),
    cacheFormat: z.enum(CACHE_FORMATS),
    defaultStart: z.string().refine(isIsoDate, 'must be a YYYY-MM-DD date'),
    updateSchedule: z.enum(['daily', 'weekly', 'monthly', 'manual']),
    warnAfterDays: z.number().int().positive().optional(),
    items: z.array(itemSchema).min(1),
  })
  .superRefine((dataset, ctx) => {
    const seen = new Set<string>();
    for (const item of dataset.items) {
      if (seen.has(item.id)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `duplicate item id "${item.id}"`, path: ['items'] });
      }
      seen.add(item.id);
    }
    if (dataset.categoryColumn === dataset.itemColumn) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'categoryColumn and itemColumn must differ',
        path: ['categoryColumn'],
      });
    }
  });

const registrySchema = z.object({
  datasets: z.array(datasetSchema).min(1),
});

export type DatasetDefinition = z.infer<typeof datasetSchema>;

/** One line of `listDatasets()`. */
export interface DatasetSummary {
  name: string;
  title: string;
  source: string;
  categories: string[];
  items: number;
  cacheName: string;
  updateSchedule: DatasetDefinition['updateSchedule'];
}

/** Narrows `listDatasets`; absent fields match everything. */
export interface DatasetFilter {
  category?: string;
  source?: string;
}

/**
 * Validated, read-only view over the registry document.
 *
 * @example
 * ```typescript
 * const registry = loadRegistry();
 * registry.categories('bcb_series');
 * // ['price', 'interest-rate', 'exchange', 'production', 'credit']
 * registry.resolveItems('bcb_series', 'exchange').map((item) => item.id);
 * // ['1', '21619']
 * ```
 */
export class SourceRegistry {
  private readonly datasets: ReadonlyMap<string, DatasetDefinition>;

  private constructor(datasets: DatasetDefinition[]) {
    const byName = new Map<string, DatasetDefinition>();
    for (const dataset of datasets) {
      if (byName.has(dataset.name)) {
        throw new ValidationError(`Duplicate dataset "${dataset.name}" in registry`, { field: 'datasets' });
      }
      byName.set(dataset.name, deepFreeze(dataset));
    }
    this.datasets = byName;
    Object.freeze(this);
  }

  /**
   * Builds a registry from an already-parsed document.
   *
   * @throws ValidationError listing every schema issue
   */
  static fromJSON(document: unknown): SourceRegistry {
    const parsed = registrySchema.safeParse(document);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
      throw new ValidationError('Invalid source registry', { field: 'registry', issues });
    }
    return new SourceRegistry(parsed.data.datasets);
  }

  names(): string[] {
    return [...this.datasets.keys()];
  }

  has(name: string): boolean {
    return this.datasets.has(name);
  }

  /**
   * @throws ValidationError for an unknown dataset
   */
  getDataset(name: string): DatasetDefinition {
    const dataset = this.datasets.get(name);
    if (dataset === undefined) {
      throw new ValidationError(`Unknown dataset "${name}". Available: ${this.names().join(', ')}`, {
        field: 'dataset',
        value: name,
      });
    }
    return dataset;
  }

  /** Distinct item categories in first-seen order. */
  categories(name: string): string[] {
    return [...new Set(this.getDataset(name).items.map((item) => item.category))];
  }

  /**
   * Items to fetch for a category, in registry order. `'all'` keeps every item.
   *
   * @throws ValidationError for an unknown dataset or category
   */
  resolveItems(name: string, category: string = ALL_CATEGORIES): SourceItem[] {
    const dataset = this.getDataset(name);
    if (category === ALL_CATEGORIES) {
      return [...dataset.items];
    }

    const items = dataset.items.filter((item) => item.category === category);
    if (items.length === 0) {
      throw new ValidationError(
        `Unknown category "${category}" for ${name}. Available: ${[ALL_CATEGORIES, ...this.categories(name)].join(', ')}`,
        { field: 'category', value: category }
      );
    }
    return items;
  }

  /**
   * Descriptive columns for one item: the category column first, then every
   * declared metadata column (null when the item does not define it).
   */
  metadataFor(name: string, itemId: string): ItemMetadata {
    const dataset = this.getDataset(name);
    const item = dataset.items.find((candidate) => candidate.id === itemId);
    if (item === undefined) {
      throw new ValidationError(`Unknown item "${itemId}" for ${name}`, { field: 'item', value: itemId });
    }

    const metadata: ItemMetadata = { [dataset.categoryColumn]: item.category };
    for (const column of dataset.metadataColumns) {
      metadata[column] = item.metadata[column] ?? null;
    }
    return metadata;
  }

  /**
   * Summaries in registry order. A filter keeps datasets served by `source`
   * and datasets that have at least one item in `category`.
   */
  listDatasets(filter: DatasetFilter = {}): DatasetSummary[] {
    const { category, source } = filter;
    return [...this.datasets.values()]
      .filter((dataset) => source === undefined || dataset.source === source)
      .filter((dataset) => category === undefined || dataset.items.some((item) => item.category === category))
      .map((dataset) => ({
        name: dataset.name,
        title: dataset.title,
        source: dataset.source,
        categories: this.categories(dataset.name),
        items: dataset.items.length,
        cacheName: dataset.cacheName,
        updateSchedule: dataset.updateSchedule,
      }));
  }

  /**
   * Cache settings for every dataset, keyed by cache name. Id and category
   * columns are declared as strings so numeric-looking codes such as `433`
   * keep their type when read back from text caches.
   */
  cacheCatalog(): CacheCatalog {
    const catalog: CacheCatalog = {};
    for (const dataset of this.datasets.values()) {
      const columns: ColumnTypes = {
        [dataset.itemColumn]: 'string',
        [dataset.categoryColumn]: 'string',
      };
      catalog[dataset.cacheName] = {
        format: dataset.cacheFormat,
        columns,
        updateSchedule: dataset.updateSchedule,
        warnAfterDays: dataset.warnAfterDays,
      };
    }
    return catalog;
  }
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

let cachedRegistry: SourceRegistry | null = null;

/**
 * Loads the bundled registry once per process.
 *
 * @throws ValidationError when the bundled document is malformed
 */
export function loadRegistry(): SourceRegistry {
  if (cachedRegistry) {
    return cachedRegistry;
  }
  const raw: unknown = JSON.parse(readFileSync(fileURLToPath(REGISTRY_URL), 'utf8'));
  cachedRegistry = SourceRegistry.fromJSON(raw);
  return cachedRegistry;
}
