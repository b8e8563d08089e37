/**
 * Test services: a temp cache directory, a scripted adapter and a logger
 * that writes nowhere visible.
 */

import { mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { Writable } from 'node:stream';
import winston from 'winston';
import type { DataTable, DateRange } from '@brrealty/contracts';
import type { FetchLike } from '@brrealty/dataset-cache';
import type { Logger } from '@brrealty/logger';
import { createLogger } from '@brrealty/logger';
import type { SourceAdapter } from '@brrealty/source-adapters';
import { SourceRegistry } from '@brrealty/acquisition';
import { loadConfig } from '../src/config/index.js';
import { createServices, type Services } from '../src/container/index.js';

export const NOW = new Date('2024-03-01T12:00:00.000Z');

export const TEST_REGISTRY_DOCUMENT = {
  datasets: [
    {
      name: 'macro',
      title: 'Test macro series',
      source: 'fake',
      itemColumn: 'code',
      categoryColumn: 'group',
      metadataColumns: ['label'],
      cacheName: 'macro',
      cacheFormat: 'csv.gz',
      defaultStart: '2010-01-01',
      updateSchedule: 'weekly',
      items: [
        { id: '1', category: 'price', metadata: { label: 'one' } },
        { id: '2', category: 'price', metadata: { label: 'two' } },
        { id: '3', category: 'rates', metadata: { label: 'three' } },
      ],
    },
  ],
};

export const SERIES: Record<string, DataTable> = {
  '1': [
    { date: '2024-01-01', value: 1 },
    { date: '2024-02-01', value: 2 },
  ],
  '2': [{ date: '2024-01-01', value: 3 }],
  '3': [{ date: '2024-01-01', value: 4.5 }],
};

/**
 * Serves tables by item id; an Error entry is thrown on every call.
 */
export class TableAdapter implements SourceAdapter {
  readonly id = 'fake';
  readonly calls: Array<{ itemId: string; range: DateRange }> = [];

  constructor(private readonly tables: Record<string, DataTable | Error>) {}

  async fetchItem(itemId: string, range: DateRange): Promise<DataTable> {
    this.calls.push({ itemId, range });
    const entry = this.tables[itemId];
    if (entry === undefined) {
      return [];
    }
    if (entry instanceof Error) {
      throw entry;
    }
    return entry.map((row) => ({ ...row }));
  }
}

/** JSON logger into an in-memory sink. */
export function silentLogger(): { logger: Logger; entries: () => Array<Record<string, unknown>> } {
  const lines: string[] = [];
  const sink = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      lines.push(chunk.toString());
      callback();
    },
  });
  const logger = createLogger({ level: 'debug', json: true, console: false });
  logger.add(new winston.transports.Stream({ stream: sink }));

  const entries = (): Array<Record<string, unknown>> =>
    lines
      .join('')
      .split('\n')
      .filter((line) => line.trim() !== '')
      .map((line): Record<string, unknown> => JSON.parse(line));

  return { logger, entries };
}

export interface TestContext {
  services: Services;
  adapter: TableAdapter;
  dir: string;
  entries: () => Array<Record<string, unknown>>;
  cleanup: () => Promise<void>;
}

export interface TestContextOptions {
  tables?: Record<string, DataTable | Error>;
  env?: Record<string, string>;
  now?: Date;
  /** Answers the remote cache layer when BRREALTY_CACHE_REMOTE_URL is set */
  fetchImpl?: FetchLike;
}

export async function createTestContext(options: TestContextOptions = {}): Promise<TestContext> {
  const now = options.now ?? NOW;
  const dir = await mkdtemp(path.join(os.tmpdir(), 'brrealty-app-'));
  const config = loadConfig({
    BRREALTY_CACHE_DIR: dir,
    BRREALTY_CACHE_MEMORY_SIZE: '0',
    BRREALTY_RETRY_DELAY_MS: '0',
    BRREALTY_ITEM_DELAY_MS: '0',
    ...options.env,
  });
  const adapter = new TableAdapter(options.tables ?? SERIES);
  const { logger, entries } = silentLogger();

  const services = createServices(config, {
    logger,
    registry: SourceRegistry.fromJSON(TEST_REGISTRY_DOCUMENT),
    adapters: new Map([[adapter.id, adapter]]),
    fetchImpl: options.fetchImpl,
    sleep: async () => undefined,
    now: () => now,
  });

  return {
    services,
    adapter,
    dir,
    entries,
    cleanup: () => rm(dir, { recursive: true, force: true }),
  };
}

/** Let winston drain its streams. */
export function flush(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 20));
}
