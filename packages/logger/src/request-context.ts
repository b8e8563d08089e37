/**
 * @fileoverview Request-scoped context carried through async calls with
 * AsyncLocalStorage. The logger reads `request_id` from here.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';

export interface RequestContext {
  /** UUID v4 unless supplied by the caller */
  request_id: string;

  [key: string]: unknown;
}

const storage = new AsyncLocalStorage<RequestContext>();

export function generateRequestId(): string {
  return randomUUID();
}

export function getRequestContext(): RequestContext | undefined {
  return storage.getStore();
}

/**
 * Request id of the active context, or undefined outside one.
 */
export function getRequestId(): string | undefined {
  return storage.getStore()?.request_id;
}

/**
 * Runs `fn` inside a fresh request context.
 *
 * @example
 * ```typescript
 * const result = await withRequestContext(
 *   () => orchestrator.fetch({ dataset: 'bcb_series' }),
 *   undefined,
 *   { dataset: 'bcb_series' }
 * );
 * ```
 */
export async function withRequestContext<T>(
  fn: () => Promise<T> | T,
  requestId?: string,
  additionalContext?: Record<string, unknown>
): Promise<T> {
  const context: RequestContext = {
    ...additionalContext,
    request_id: requestId ?? generateRequestId(),
  };
  return storage.run(context, fn);
}

/**
 * Merges fields into the active context. Returns false outside a context.
 */
export function setRequestContext(fields: Record<string, unknown>): boolean {
  const context = storage.getStore();
  if (context === undefined) {
    return false;
  }
  Object.assign(context, fields, { request_id: context.request_id });
  return true;
}
