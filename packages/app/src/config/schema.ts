/**
 * Configuration schema using Zod
 */

import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';

export const DEFAULT_CACHE_DIR = path.join(os.homedir(), '.cache', 'brrealty');

/**
 * Application configuration schema
 */
export const configSchema = z.object({
  app: z
    .object({
      env: z.enum(['development', 'test', 'production']).default('development'),
    })
    .default({}),

  logging: z
    .object({
      level: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
      format: z.enum(['json', 'pretty']).default('pretty'),
      filePath: z.string().min(1).optional(),
    })
    .default({}),

  cache: z
    .object({
      dir: z.string().min(1).default(DEFAULT_CACHE_DIR),
      // Remote layer is off unless a URL is given
      remoteUrl: z.string().url().optional(),
      memorySize: z.number().int().min(0).default(16),
    })
    .default({}),

  http: z
    .object({
      timeoutMs: z.number().int().positive().default(30000),
    })
    .default({}),

  retry: z
    .object({
      retryDelayMs: z.number().int().min(0).default(500),
      backoffMultiplier: z.number().min(1).default(1),
      interItemDelayMs: z.number().int().min(0).default(100),
      concurrency: z.number().int().min(1).max(16).default(1),
    })
    .default({}),
});

/**
 * Inferred configuration type
 */
export type Config = z.infer<typeof configSchema>;

/**
 * Environment variable mapping
 */
export const envMapping: Record<string, string> = {
  NODE_ENV: 'app.env',
  LOG_LEVEL: 'logging.level',
  LOG_FORMAT: 'logging.format',
  LOG_FILE: 'logging.filePath',
  BRREALTY_CACHE_DIR: 'cache.dir',
  BRREALTY_CACHE_REMOTE_URL: 'cache.remoteUrl',
  BRREALTY_CACHE_MEMORY_SIZE: 'cache.memorySize',
  BRREALTY_HTTP_TIMEOUT_MS: 'http.timeoutMs',
  BRREALTY_RETRY_DELAY_MS: 'retry.retryDelayMs',
  BRREALTY_RETRY_BACKOFF: 'retry.backoffMultiplier',
  BRREALTY_ITEM_DELAY_MS: 'retry.interItemDelayMs',
  BRREALTY_CONCURRENCY: 'retry.concurrency',
};

/** Config paths whose environment values are read as numbers; the rest stay strings. */
export const numericPaths: ReadonlySet<string> = new Set([
  'cache.memorySize',
  'http.timeoutMs',
  'retry.retryDelayMs',
  'retry.backoffMultiplier',
  'retry.interItemDelayMs',
  'retry.concurrency',
]);
