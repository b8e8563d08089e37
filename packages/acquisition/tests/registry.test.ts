import { describe, it, expect } from 'vitest';
import { ValidationError } from '@brrealty/contracts';
import { SourceRegistry, loadRegistry } from '../src/registry.js';
import { TEST_REGISTRY_DOCUMENT, testRegistry } from './helpers.js';

describe('bundled registry', () => {
  it('loads once and lists both datasets', () => {
    const registry = loadRegistry();
    expect(loadRegistry()).toBe(registry);
    expect(registry.names()).toEqual(['bcb_series', 'b3_stocks']);
  });

  it('keeps BCB categories in first-seen order', () => {
    expect(loadRegistry().categories('bcb_series')).toEqual([
      'price',
      'interest-rate',
      'exchange',
      'production',
      'credit',
    ]);
  });

  it('resolves a category to its items in registry order', () => {
    const ids = loadRegistry()
      .resolveItems('bcb_series', 'exchange')
      .map((item) => item.id);
    expect(ids).toEqual(['1', '21619']);
  });

  it('returns descriptive metadata with the category column first', () => {
    const metadata = loadRegistry().metadataFor('bcb_series', '433');
    expect(Object.keys(metadata)).toEqual(['bcb_category', 'name_simplified', 'name', 'unit', 'frequency']);
    expect(metadata).toEqual({
      bcb_category: 'price',
      name_simplified: 'ipca',
      name: 'IPCA - monthly change',
      unit: '%',
      frequency: 'monthly',
    });
  });

  it('derives the cache catalog from the datasets', () => {
    const catalog = loadRegistry().cacheCatalog();
    expect(catalog['bcb_series']).toEqual({
      format: 'csv.gz',
      columns: { code_bcb: 'string', bcb_category: 'string' },
      updateSchedule: 'weekly',
    });
    expect(catalog['b3_stocks']?.format).toBe('msgpack');
  });

  it('freezes dataset definitions', () => {
    const dataset = loadRegistry().getDataset('b3_stocks');
    expect(Object.isFrozen(dataset)).toBe(true);
    expect(Object.isFrozen(dataset.items)).toBe(true);
    expect(Object.isFrozen(dataset.items[0])).toBe(true);
  });
});

describe('SourceRegistry', () => {
  const registry = testRegistry();

  it('keeps every item for the "all" category', () => {
    expect(registry.resolveItems('macro', 'all').map((item) => item.id)).toEqual(['1', '2', '3']);
    expect(registry.resolveItems('macro').map((item) => item.id)).toEqual(['1', '2', '3']);
  });

  it('rejects unknown datasets and categories', () => {
    expect(() => registry.getDataset('missing')).toThrow(ValidationError);
    expect(() => registry.resolveItems('macro', 'stocks')).toThrow(
      'Unknown category "stocks" for macro. Available: all, price, rates'
    );
  });

  it('summarizes datasets', () => {
    expect(registry.listDatasets()).toEqual([
      {
        name: 'macro',
        title: 'Test macro series',
        source: 'fake',
        categories: ['price', 'rates'],
        items: 3,
        cacheName: 'macro',
        updateSchedule: 'weekly',
      },
    ]);
  });

  it('filters datasets by category and source', () => {
    const document = {
      datasets: [
        ...TEST_REGISTRY_DOCUMENT.datasets,
        {
          ...TEST_REGISTRY_DOCUMENT.datasets[0],
          name: 'stocks',
          source: 'quotes',
          cacheName: 'stocks',
          items: [{ id: 'AAA3', category: 'equity' }],
        },
      ],
    };
    const registry = SourceRegistry.fromJSON(document);
    const names = (filter: { category?: string; source?: string }) =>
      registry.listDatasets(filter).map((dataset) => dataset.name);

    expect(names({})).toEqual(['macro', 'stocks']);
    expect(names({ category: 'rates' })).toEqual(['macro']);
    expect(names({ source: 'quotes' })).toEqual(['stocks']);
    expect(names({ category: 'rates', source: 'quotes' })).toEqual([]);
    expect(names({ category: 'missing' })).toEqual([]);
  });

  it('fills undeclared metadata columns with null', () => {
    const document = {
      datasets: [
        {
          ...TEST_REGISTRY_DOCUMENT.datasets[0],
          metadataColumns: ['label', 'unit'],
        },
      ],
    };
    expect(SourceRegistry.fromJSON(document).metadataFor('macro', '2')).toEqual({
      group: 'price',
      label: 'two',
      unit: null,
    });
  });

  it('rejects duplicate item ids', () => {
    const [dataset] = TEST_REGISTRY_DOCUMENT.datasets;
    const document = {
      datasets: [{ ...dataset, items: [{ id: '1', category: 'price' }, { id: '1', category: 'rates' }] }],
    };

    try {
      SourceRegistry.fromJSON(document);
      expect.unreachable('fromJSON should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      expect(error instanceof ValidationError ? error.data?.['issues'] : undefined).toEqual([
        'datasets.0.items: duplicate item id "1"',
      ]);
    }
  });

  it('rejects malformed dates and formats', () => {
    const [dataset] = TEST_REGISTRY_DOCUMENT.datasets;
    expect(() =>
      SourceRegistry.fromJSON({ datasets: [{ ...dataset, defaultStart: '2010-13-01' }] })
    ).toThrow(ValidationError);
    expect(() => SourceRegistry.fromJSON({ datasets: [{ ...dataset, cacheFormat: 'parquet' }] })).toThrow(
      ValidationError
    );
  });
});
