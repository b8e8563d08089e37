/**
 * @fileoverview Winston formats: secret redaction, standard fields and
 * the human-readable console layout.
 */

import { format } from 'winston';
import { getRequestId } from './request-context.js';

/**
 * Field names whose values never reach a transport. Matched case-insensitively,
 * so `apiKey`, `API_KEY` and `x-api-key` are all caught.
 */
const SENSITIVE_FIELD_PATTERNS: readonly RegExp[] = [
  /password/i,
  /passwd/i,
  /secret/i,
  /api[_-]?key/i,
  /token/i,
  /authorization/i,
  /cookie/i,
  /private[_-]?key/i,
];

const REDACTED = '[REDACTED]';

/** Winston's own fields, never redacted. */
const CORE_FIELDS = new Set(['level', 'message', 'timestamp', 'label', 'stack']);

export function isSensitiveField(name: string): boolean {
  return SENSITIVE_FIELD_PATTERNS.some((pattern) => pattern.test(name));
}

/**
 * Returns a copy of `value` with sensitive keys replaced, at any depth.
 * Errors are passed through untouched so `format.errors` can still read them.
 *
 * @example
 * ```typescript
 * redactSensitiveFields({ url: 'https://example.test', headers: { authorization: 'test-secret' } });
 * // { url: 'https://example.test', headers: { authorization: '[REDACTED]' } }
 * ```
 */
export function redactSensitiveFields(value: unknown): unknown {
  if (value === null || typeof value !== 'object' || value instanceof Error) {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((item) => redactSensitiveFields(item));
  }

  const copy: Record<string, unknown> = {};
  for (const [key, nested] of Object.entries(value)) {
    copy[key] = isSensitiveField(key) ? REDACTED : redactSensitiveFields(nested);
  }
  return copy;
}

/**
 * Redacts sensitive metadata. Must run first in the format chain.
 */
export const redactPII = format((info) => {
  const redacted = { ...info };

  for (const key of Object.keys(redacted)) {
    if (CORE_FIELDS.has(key)) {
      continue;
    }
    redacted[key] = isSensitiveField(key) ? REDACTED : redactSensitiveFields(redacted[key]);
  }

  return redacted;
});

/**
 * ISO timestamp, error stacks, and `request_id` from the active request
 * context unless the entry already carries one.
 */
export const standardFields = format.combine(
  format.timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }),
  format.errors({ stack: true }),
  format((info) => {
    const requestId = getRequestId();
    if (requestId !== undefined && info['request_id'] === undefined) {
      info['request_id'] = requestId;
    }
    return info;
  })()
);

/** Context keys printed first, in this order. */
const LEADING_KEYS = ['component', 'dataset', 'item', 'request_id'] as const;

const SKIPPED_KEYS = new Set(['level', 'message', 'timestamp', 'stack', 'splat', ...LEADING_KEYS]);

/**
 * Colorized single-line layout for terminals:
 *
 * ```
 * [2025-03-01T12:00:00.000Z] warn: Cache read failed component=orchestrator dataset=bcb_series request_id=... reason="not found"
 * ```
 */
export const prettyPrint = format.combine(
  format.colorize(),
  format.printf((info) => {
    const parts: string[] = [];

    for (const key of LEADING_KEYS) {
      const value = info[key];
      if (value !== undefined && value !== null && value !== '') {
        parts.push(`${key}=${String(value)}`);
      }
    }

    for (const [key, value] of Object.entries(info)) {
      if (!SKIPPED_KEYS.has(key)) {
        parts.push(`${key}=${JSON.stringify(value)}`);
      }
    }

    const line = `[${String(info['timestamp'])}] ${info.level}: ${String(info.message)}${parts.length > 0 ? ` ${parts.join(' ')}` : ''}`;
    const stack = info['stack'];
    return typeof stack === 'string' ? `${line}\n${stack}` : line;
  })
);
