/**
 * @fileoverview JSON over HTTP with a timeout and retry-aware error mapping.
 *
 * | Failure                         | Error                 | Retried |
 * |---------------------------------|-----------------------|---------|
 * | network error, timeout          | TransientFetchError   | yes     |
 * | HTTP 408, 429, 5xx              | TransientFetchError   | yes     |
 * | other HTTP 4xx                  | UpstreamResponseError | no      |
 * | body is not JSON                | UpstreamResponseError | no      |
 *
 * @module @brrealty/source-adapters/http
 */

import { TransientFetchError, UpstreamResponseError, errorMessage } from '@brrealty/contracts';
import type { FetchLike } from './types.js';

export const DEFAULT_TIMEOUT_MS = 30000;

export interface RequestContext {
  /** Adapter id, recorded on errors */
  source: string;
  itemId: string;
  timeoutMs: number;
  fetchImpl: FetchLike;
  headers?: Record<string, string>;
}

export function isTransientStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

/**
 * GET `url` and parse the body as JSON.
 *
 * @throws {TransientFetchError} For failures worth retrying
 * @throws {UpstreamResponseError} For answers that will not change
 */
export async function fetchJson(url: string, context: RequestContext): Promise<unknown> {
  const { source, itemId, timeoutMs, fetchImpl } = context;
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  let response: Response;
  let text: string;
  try {
    response = await fetchImpl(url, {
      signal: controller.signal,
      headers: { accept: 'application/json', ...context.headers },
    });
    text = await response.text();
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      throw new TransientFetchError(`${source} request timed out after ${timeoutMs}ms`, { source, itemId, url }, error);
    }
    throw new TransientFetchError(`${source} request failed: ${errorMessage(error)}`, { source, itemId, url }, error);
  } finally {
    clearTimeout(timeoutId);
  }

  if (!response.ok) {
    const data = { source, itemId, url, status: response.status, body: text.slice(0, 200) };
    const message = `${source} returned HTTP ${response.status} for ${itemId}`;
    if (isTransientStatus(response.status)) {
      throw new TransientFetchError(message, data);
    }
    throw new UpstreamResponseError(message, data);
  }

  try {
    return JSON.parse(text);
  } catch (error) {
    throw new UpstreamResponseError(
      `${source} returned a non-JSON body for ${itemId}`,
      { source, itemId, url, body: text.slice(0, 200) },
      error
    );
  }
}
