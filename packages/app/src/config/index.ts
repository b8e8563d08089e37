/**
 * Configuration loading and management
 */

import os from 'node:os';
import path from 'node:path';
import { ConfigurationError } from '@brrealty/contracts';
import type { Logger } from '@brrealty/logger';
import { configSchema, envMapping, numericPaths, type Config } from './schema.js';

type Environment = Record<string, string | undefined>;

type RawConfig = Record<string, Record<string, unknown>>;

/**
 * Load configuration from environment variables and defaults.
 *
 * @throws ConfigurationError listing every invalid variable
 *
 * @example
 * ```typescript
 * const config = loadConfig({ BRREALTY_RETRY_DELAY_MS: '250', LOG_FORMAT: 'json' });
 * config.retry.retryDelayMs; // 250
 * ```
 */
export function loadConfig(env: Environment = process.env, logger?: Logger): Config {
  const rawConfig: RawConfig = {};

  for (const [envKey, configPath] of Object.entries(envMapping)) {
    const value = env[envKey];
    if (value !== undefined && value !== '') {
      setNestedProperty(rawConfig, configPath, parseEnvValue(configPath, value));
    }
  }

  const result = configSchema.safeParse(rawConfig);

  if (!result.success) {
    const issues = result.error.errors.map((issue) => {
      const configPath = issue.path.join('.');
      const envKey = envKeyFor(configPath);
      return `${envKey ? `${envKey} (${configPath})` : configPath}: ${issue.message}`;
    });
    throw new ConfigurationError(`Configuration validation failed:\n${issues.join('\n')}`, { issues });
  }

  const config = { ...result.data, cache: { ...result.data.cache, dir: expandHome(result.data.cache.dir) } };

  if (logger) {
    logger.debug('Configuration loaded', getConfigSummary(config));
  }

  return config;
}

function envKeyFor(configPath: string): string | undefined {
  return Object.entries(envMapping).find(([, mapped]) => mapped === configPath)?.[0];
}

/**
 * Set a `section.key` property
 */
function setNestedProperty(obj: RawConfig, configPath: string, value: unknown): void {
  const [section, key] = configPath.split('.');
  if (!section || !key) {
    return;
  }
  obj[section] = { ...obj[section], [key]: value };
}

/**
 * Numbers for numeric paths only, so a path or name such as `2024` stays a
 * string. Unparseable numbers pass through for the schema to reject.
 */
function parseEnvValue(configPath: string, value: string): unknown {
  if (!numericPaths.has(configPath)) {
    return value;
  }
  const num = Number(value);
  return isNaN(num) || value.trim() === '' ? value : num;
}

function expandHome(dir: string): string {
  if (dir === '~') {
    return os.homedir();
  }
  if (dir.startsWith('~/')) {
    return path.join(os.homedir(), dir.slice(2));
  }
  return dir;
}

/**
 * Get configuration summary for logging
 */
export function getConfigSummary(config: Config): Record<string, unknown> {
  return {
    environment: config.app.env,
    cache: {
      dir: config.cache.dir,
      remote: config.cache.remoteUrl ? 'enabled' : 'disabled',
      memorySize: config.cache.memorySize,
    },
    http: { timeoutMs: config.http.timeoutMs },
    retry: config.retry,
    logging: {
      level: config.logging.level,
      format: config.logging.format,
      file: config.logging.filePath ?? null,
    },
  };
}

// Re-export types
export type { Config } from './schema.js';
export { configSchema, envMapping, numericPaths, DEFAULT_CACHE_DIR } from './schema.js';
