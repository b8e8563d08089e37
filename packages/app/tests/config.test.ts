/**
 * Tests for environment configuration
 */

import os from 'node:os';
import path from 'node:path';
import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '@brrealty/contracts';
import { DEFAULT_CACHE_DIR, getConfigSummary, loadConfig } from '../src/config/index.js';

describe('loadConfig', () => {
  it('should fill every section with defaults', () => {
    const config = loadConfig({});

    expect(config.app.env).toBe('development');
    expect(config.logging).toEqual({ level: 'info', format: 'pretty' });
    expect(config.cache).toEqual({ dir: DEFAULT_CACHE_DIR, memorySize: 16 });
    expect(config.http.timeoutMs).toBe(30000);
    expect(config.retry).toEqual({
      retryDelayMs: 500,
      backoffMultiplier: 1,
      interItemDelayMs: 100,
      concurrency: 1,
    });
  });

  it('should map and coerce environment variables', () => {
    const config = loadConfig({
      LOG_FORMAT: 'json',
      BRREALTY_RETRY_DELAY_MS: '250',
      BRREALTY_RETRY_BACKOFF: '2',
      BRREALTY_CONCURRENCY: '4',
      BRREALTY_CACHE_REMOTE_URL: 'https://cache.example.test/latest',
    });

    expect(config.logging.format).toBe('json');
    expect(config.retry.retryDelayMs).toBe(250);
    expect(config.retry.backoffMultiplier).toBe(2);
    expect(config.retry.concurrency).toBe(4);
    expect(config.cache.remoteUrl).toBe('https://cache.example.test/latest');
  });

  it('should keep numeric-looking paths and names as strings', () => {
    const config = loadConfig({ LOG_FILE: '2024', BRREALTY_CACHE_DIR: '2024', NODE_ENV: 'production' });

    expect(config.logging.filePath).toBe('2024');
    expect(config.cache.dir).toBe('2024');
  });

  it('should report a non-numeric value for a numeric variable', () => {
    expect(() => loadConfig({ BRREALTY_HTTP_TIMEOUT_MS: 'soon' })).toThrow(
      /BRREALTY_HTTP_TIMEOUT_MS \(http\.timeoutMs\)/
    );
  });

  it('should ignore empty variables', () => {
    expect(loadConfig({ LOG_LEVEL: '' }).logging.level).toBe('info');
  });

  it('should expand ~ in the cache directory', () => {
    expect(loadConfig({ BRREALTY_CACHE_DIR: '~/datasets' }).cache.dir).toBe(path.join(os.homedir(), 'datasets'));
  });

  it('should name the variable behind each invalid value', () => {
    let caught: unknown;
    try {
      loadConfig({ BRREALTY_CONCURRENCY: '99', LOG_LEVEL: 'verbose' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigurationError);
    if (!(caught instanceof ConfigurationError)) return;
    expect(caught.message).toMatch(/^Configuration validation failed:\n/);
    expect(caught.data?.['issues']).toHaveLength(2);
    expect(caught.message).toContain('LOG_LEVEL (logging.level)');
    expect(caught.message).toContain('BRREALTY_CONCURRENCY (retry.concurrency)');
  });

  it('should reject a remote cache that is not a URL', () => {
    expect(() => loadConfig({ BRREALTY_CACHE_REMOTE_URL: 'not a url' })).toThrow(ConfigurationError);
  });
});

describe('getConfigSummary', () => {
  it('should report the remote layer as a switch', () => {
    const summary = getConfigSummary(loadConfig({ BRREALTY_CACHE_DIR: '/tmp/cache' }));

    expect(summary['cache']).toEqual({ dir: '/tmp/cache', remote: 'disabled', memorySize: 16 });
    expect(summary['logging']).toEqual({ level: 'info', format: 'pretty', file: null });
  });
});
