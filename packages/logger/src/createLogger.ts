/**
 * @fileoverview Logger factory.
 */

import winston, { format } from 'winston';
import type { ChildLoggerContext, Logger, LoggerConfig } from './types.js';
import { prettyPrint, redactPII, standardFields } from './formats.js';

/**
 * Creates a winston logger with redaction, standard fields and either JSON
 * or pretty console output.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'info', json: false });
 * logger.info('Fetching dataset', { dataset: 'bcb_series', items: 12 });
 * ```
 *
 * @example
 * ```typescript
 * // Console silenced, everything to a file
 * const logger = createLogger({ level: 'debug', console: false, filePath: './logs/fetch.log' });
 * ```
 */
export function createLogger(config: LoggerConfig): Logger {
  const { level, json = process.env['NODE_ENV'] === 'production', filePath, console: useConsole = true } = config;

  // Redaction before anything else sees the metadata
  const logFormat = format.combine(redactPII(), standardFields, json ? format.json() : prettyPrint);

  const transports: winston.transport[] = [];

  if (useConsole) {
    // stderr keeps stdout free for CLI output
    transports.push(
      new winston.transports.Console({
        level,
        stderrLevels: ['error', 'warn', 'info', 'debug'],
      })
    );
  }

  if (filePath) {
    transports.push(new winston.transports.File({ filename: filePath, level }));
  }

  return winston.createLogger({
    level,
    format: logFormat,
    transports,
    // Process-level failures are handled by attachGlobalHandlers
    exitOnError: false,
  });
}

/**
 * Child logger that adds `context` to every entry.
 *
 * @example
 * ```typescript
 * const log = createChildLogger(logger, { component: 'retry-policy' });
 * log.debug('Attempt failed', { item: '433', attempt: 1 });
 * ```
 */
export function createChildLogger(logger: Logger, context: ChildLoggerContext): Logger {
  return logger.child(context);
}
