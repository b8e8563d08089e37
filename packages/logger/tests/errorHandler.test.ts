/**
 * @fileoverview Tests for process-level error handlers.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLogger } from '../src/createLogger.js';
import { attachGlobalHandlers, globalHandlersAttached } from '../src/errorHandler.js';

describe('attachGlobalHandlers', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should register handlers once per process', () => {
    const on = vi.spyOn(process, 'on').mockImplementation(() => process);
    const logger = createLogger({ level: 'debug', console: false });

    attachGlobalHandlers(logger);
    attachGlobalHandlers(logger);

    expect(globalHandlersAttached()).toBe(true);
    expect(on.mock.calls.map((call) => call[0])).toEqual(['uncaughtException', 'unhandledRejection']);
  });
});
