/**
 * Tests for CLI result handling
 */

import { describe, it, expect } from 'vitest';
import { AggregateFailure, ValidationError } from '@brrealty/contracts';
import { EXIT_CODES, createResult, errorResult, outputResult } from '../src/utils/cli-utils.js';

const NOW = new Date('2024-03-01T12:00:00.000Z');

describe('createResult', () => {
  it('should exit 0 for a clean success', () => {
    const result = createResult('fetch', true, { rows: 3 }, { now: NOW });

    expect(result).toEqual({
      success: true,
      command: 'fetch',
      timestamp: '2024-03-01T12:00:00.000Z',
      exitCode: 0,
      data: { rows: 3 },
    });
  });

  it('should exit 1 when a success carries warnings', () => {
    expect(createResult('fetch', true, {}, { warnings: ['1 series failed: 189'] }).exitCode).toBe(EXIT_CODES.partial);
  });

  it('should exit 2 for a failure', () => {
    expect(createResult('fetch', false, {}).exitCode).toBe(EXIT_CODES.fatal);
  });

  it('should keep an explicit exit code', () => {
    expect(createResult('cache status', true, {}, { exitCode: EXIT_CODES.success, warnings: ['x'] }).exitCode).toBe(0);
  });
});

describe('errorResult', () => {
  it('should carry the code and data of a typed error', () => {
    const result = errorResult('fetch', new ValidationError('Invalid request: dataset: is required', { field: 'dataset' }), NOW);

    expect(result.success).toBe(false);
    expect(result.exitCode).toBe(2);
    expect(result.data).toEqual({ code: 'VALIDATION_ERROR', field: 'dataset' });
    expect(result.errors).toEqual(['Invalid request: dataset: is required']);
  });

  it('should count failed series for an aggregate failure', () => {
    const failure = new AggregateFailure('No series were successfully downloaded', {
      dataset: 'macro',
      attempted: 3,
      failed: 3,
      failedItems: ['1', '2', '3'],
    });

    expect(errorResult('fetch', failure, NOW).errors).toEqual([
      'No series were successfully downloaded',
      '3 of 3 series failed',
    ]);
  });

  it('should mark untyped errors as internal', () => {
    const result = errorResult('fetch', new Error('boom'), NOW);

    expect(result.data).toEqual({ code: 'INTERNAL_ERROR' });
    expect(result.errors).toEqual(['boom']);
  });
});

describe('outputResult', () => {
  it('should print one JSON line by default', () => {
    const lines: string[] = [];
    const result = createResult('datasets', true, { datasets: [] }, { now: NOW });

    outputResult(result, false, (line) => lines.push(line));

    expect(lines).toEqual([JSON.stringify(result)]);
  });

  it('should frame pretty output and list warnings', () => {
    const lines: string[] = [];
    const result = createResult('fetch', true, { rows: 1 }, { warnings: ['1 series failed: 3'], now: NOW });

    outputResult(result, true, (line) => lines.push(line));

    expect(lines[0]).toBe('='.repeat(60));
    expect(lines[2]).toContain('PARTIAL');
    expect(lines[4]).toBe('='.repeat(60));
    expect(lines[6]).toBe(JSON.stringify({ rows: 1 }, null, 2));
    expect(lines[lines.length - 1]).toContain('  - 1 series failed: 3');
  });
});
