/**
 * Tests for the command-line program wiring
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { buildProgram } from '../src/program.js';
import type { ExitCode } from '../src/utils/cli-utils.js';
import { createTestContext, flush, type TestContext } from './helpers.js';

describe('buildProgram', () => {
  let context: TestContext;
  let lines: string[];
  let codes: ExitCode[];

  async function run(...args: string[]): Promise<void> {
    const program = buildProgram({
      services: context.services,
      out: (line) => lines.push(line),
      onExit: (code) => codes.push(code),
    });
    await program.parseAsync(args, { from: 'user' });
  }

  function parsed(index = 0): Record<string, unknown> {
    const line = lines[index];
    if (line === undefined) {
      throw new Error(`no output line ${index}`);
    }
    return JSON.parse(line);
  }

  beforeEach(async () => {
    context = await createTestContext();
    lines = [];
    codes = [];
  });

  afterEach(async () => {
    await context.cleanup();
  });

  it('should print datasets as one JSON line', async () => {
    await run('datasets');

    expect(lines).toHaveLength(1);
    expect(parsed()).toMatchObject({ success: true, command: 'datasets', exitCode: 0 });
    expect(codes).toEqual([0]);
  });

  it('should pass dataset filters through', async () => {
    await run('datasets', '--category', 'price');
    await run('datasets', '--source', 'elsewhere');

    expect(parsed(0)).toMatchObject({ data: { datasets: [{ name: 'macro' }] } });
    expect(parsed(1)).toMatchObject({ data: { datasets: [] } });
    expect(codes).toEqual([0, 0]);
  });

  it('should map flags onto the fetch request', async () => {
    await run('fetch', 'macro', '--category', 'price', '--start', '2024-01-15', '--max-retries', '2');

    expect(context.adapter.calls.map((call) => call.itemId)).toEqual(['1', '2']);
    expect(context.adapter.calls[0]?.range).toEqual({ start: '2024-01-15' });
    expect(parsed()).toMatchObject({ command: 'fetch', exitCode: 0 });
    expect(codes).toEqual([0]);
  });

  it('should print CSV without the result wrapper', async () => {
    await run('fetch', 'macro', '--format', 'csv', '--category', 'rates');

    expect(lines).toEqual(['date,value,code,group,label\n2024-01-01,4.5,3,rates,three']);
    expect(codes).toEqual([0]);
  });

  it('should print an error result and exit 2 when every series fails', async () => {
    const failing = await createTestContext({ tables: { '1': new Error('down'), '2': new Error('down'), '3': new Error('down') } });
    await context.cleanup();
    context = failing;

    await run('fetch', 'macro', '--max-retries', '1');
    await flush();

    expect(parsed()).toMatchObject({
      success: false,
      exitCode: 2,
      data: { code: 'AGGREGATE_FAILURE', dataset: 'macro', attempted: 3, failed: 3, failedItems: ['1', '2', '3'] },
      errors: ['No series were successfully downloaded', '3 of 3 series failed'],
    });
    expect(codes).toEqual([2]);
    expect(context.entries().some((entry) => entry['message'] === 'Command failed' && entry['level'] === 'error')).toBe(true);
  });

  it('should exit 2 for an invalid date before any download', async () => {
    await run('fetch', 'macro', '--start', '2024-13-01');

    expect(parsed()).toMatchObject({ success: false, data: { code: 'VALIDATION_ERROR' } });
    expect(codes).toEqual([2]);
    expect(context.adapter.calls).toHaveLength(0);
  });

  it('should run nested cache commands', async () => {
    await run('cache', 'save', 'macro', '--quiet');
    await run('cache', 'status');

    expect(parsed(0)).toMatchObject({ command: 'cache save', exitCode: 0, data: { rows: 4 } });
    expect(parsed(1)).toMatchObject({ command: 'cache status', exitCode: 0, data: { missing: [] } });
    expect(codes).toEqual([0, 0]);
  });

  it('should clear the cache by dataset name', async () => {
    await run('cache', 'save', 'macro', '--quiet');
    await run('cache', 'clear', 'macro');
    await run('cache', 'status');

    expect(parsed(1)).toMatchObject({ command: 'cache clear', exitCode: 0, data: { removed: [{ name: 'macro' }] } });
    expect(parsed(2)).toMatchObject({ data: { entries: [], missing: ['macro'] } });
    expect(codes).toEqual([0, 0, 0]);
  });
});
