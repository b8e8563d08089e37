/**
 * @fileoverview In-memory stand-ins for the orchestrator's collaborators.
 */

import { Writable } from 'node:stream';
import winston from 'winston';
import type { DataTable, DateRange } from '@brrealty/contracts';
import type { CachedTable, CacheStore } from '@brrealty/dataset-cache';
import type { Logger } from '@brrealty/logger';
import { createLogger } from '@brrealty/logger';
import type { SourceAdapter } from '@brrealty/source-adapters';
import { SourceRegistry } from '../src/registry.js';

/** Three items over two categories; source 'fake'. */
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

export function testRegistry(): SourceRegistry {
  return SourceRegistry.fromJSON(TEST_REGISTRY_DOCUMENT);
}

/** One scripted answer per call; the last one repeats. */
export type Step = DataTable | Error;

export class ScriptedAdapter implements SourceAdapter {
  readonly id = 'fake';
  readonly calls: Array<{ itemId: string; range: DateRange }> = [];

  private readonly scripts: Record<string, Step[]>;

  constructor(scripts: Record<string, Step[]>) {
    this.scripts = scripts;
  }

  callsFor(itemId: string): number {
    return this.calls.filter((call) => call.itemId === itemId).length;
  }

  async fetchItem(itemId: string, range: DateRange): Promise<DataTable> {
    this.calls.push({ itemId, range });
    const script = this.scripts[itemId] ?? [];
    const step = script[Math.min(this.callsFor(itemId), script.length) - 1];
    if (step === undefined) {
      throw new Error(`No script for item ${itemId}`);
    }
    if (step instanceof Error) {
      throw step;
    }
    return step;
  }
}

export class FakeCache implements CacheStore {
  readonly kind = 'fake';
  loads = 0;

  private readonly answer: CachedTable | Error;

  constructor(answer: CachedTable | Error) {
    this.answer = answer;
  }

  async load(_name: string): Promise<CachedTable> {
    this.loads += 1;
    if (this.answer instanceof Error) {
      throw this.answer;
    }
    return this.answer;
  }
}

export interface CapturedLogger {
  logger: Logger;
  /** Parsed JSON entries written so far */
  entries(): Record<string, unknown>[];
}

/** JSON logger writing only to memory. */
export function capturingLogger(): CapturedLogger {
  const lines: string[] = [];
  const logger = createLogger({ level: 'debug', json: true, console: false });
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      lines.push(chunk.toString().trim());
      callback();
    },
  });
  logger.add(new winston.transports.Stream({ stream }));

  return {
    logger,
    entries: () =>
      lines.map((line) => {
        const parsed: unknown = JSON.parse(line);
        return typeof parsed === 'object' && parsed !== null ? Object.fromEntries(Object.entries(parsed)) : {};
      }),
  };
}

/** Lets the stream transport drain. */
export function flush(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 20));
}

export const noSleep = async (_ms: number): Promise<void> => {};
