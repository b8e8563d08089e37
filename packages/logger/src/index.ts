/**
 * @fileoverview Public API of @brrealty/logger.
 */

// Core logger creation
export { createLogger, createChildLogger } from './createLogger.js';

// Formats (exposed for custom transports)
export { redactPII, redactSensitiveFields, isSensitiveField, standardFields, prettyPrint } from './formats.js';

// Process-level error handlers
export { attachGlobalHandlers, globalHandlersAttached } from './errorHandler.js';

// Request context
export {
  generateRequestId,
  getRequestContext,
  getRequestId,
  withRequestContext,
  setRequestContext,
} from './request-context.js';

// Timing
export { startTimer, measureAsync } from './perf-timer.js';

// Types
export type { Logger, LoggerConfig, LogLevel, ChildLoggerContext } from './types.js';
export type { RequestContext } from './request-context.js';
export type { PerfTimer } from './perf-timer.js';
