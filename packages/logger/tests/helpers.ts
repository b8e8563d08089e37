/**
 * @fileoverview Test helper: captures formatted log lines in memory.
 */

import { Writable } from 'node:stream';
import winston from 'winston';
import type { Logger } from '../src/types.js';

export interface CapturedLines {
  lines: string[];
  /** Parsed JSON entries (only meaningful for json loggers) */
  entries(): Record<string, unknown>[];
}

export function captureLogs(logger: Logger): CapturedLines {
  const lines: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      lines.push(chunk.toString().trim());
      callback();
    },
  });
  logger.add(new winston.transports.Stream({ stream }));

  return {
    lines,
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
