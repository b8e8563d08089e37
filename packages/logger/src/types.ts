/**
 * @fileoverview Type definitions for the acquisition logger.
 */

import type { Logger as WinstonLogger } from 'winston';

/**
 * Minimum severity written by a logger.
 * - 'error': a request failed
 * - 'warn': degraded but recovered (cache fallback, partial failure)
 * - 'info': progress messages
 * - 'debug': per-attempt detail, quiet-mode progress
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Options for {@link createLogger}.
 *
 * @example
 * ```typescript
 * const config: LoggerConfig = {
 *   level: 'info',
 *   json: process.env.NODE_ENV === 'production',
 *   filePath: './logs/brrealty.log'
 * };
 * ```
 */
export interface LoggerConfig {
  /** @default 'info' */
  level: LogLevel;

  /**
   * Emit one JSON object per line instead of the colorized text format.
   * @default true when NODE_ENV is 'production'
   */
  json?: boolean;

  /** Also append log entries to this file. */
  filePath?: string;

  /**
   * Write to stderr/stdout. Disable for file-only logging or silent tests.
   * @default true
   */
  console?: boolean;
}

/**
 * Context attached to every entry of a child logger.
 *
 * @example
 * ```typescript
 * const cacheLogger = logger.child({ component: 'dataset-cache' });
 * ```
 */
export interface ChildLoggerContext {
  component?: string;
  dataset?: string;
  source?: string;
  [key: string]: unknown;
}

export type Logger = WinstonLogger;
