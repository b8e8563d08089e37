/**
 * @fileoverview Source adapter contract and shared adapter options.
 *
 * @module @brrealty/source-adapters/types
 */

import type { DataTable, DateRange } from '@brrealty/contracts';
import type { Logger } from '@brrealty/logger';

/**
 * Fetches one item (a series code, a ticker) from an upstream source.
 *
 * Implementations return the rows they received, possibly zero, and leave
 * classification (empty, all invalid) to the retry policy. Failures are
 * thrown as TransientFetchError when a retry may help and as
 * UpstreamResponseError when it will not.
 *
 * @example
 * ```typescript
 * const adapter: SourceAdapter = new BcbSgsAdapter();
 * const rows = await adapter.fetchItem('433', { start: '2020-01-01' });
 * // [{ date: '2020-01-01', value: 0.21 }, ...]
 * ```
 */
export interface SourceAdapter {
  /** Registry source id, e.g. 'bcb_sgs' */
  readonly id: string;

  fetchItem(itemId: string, range: DateRange): Promise<DataTable>;
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

/**
 * Options shared by HTTP adapters.
 */
export interface HttpAdapterOptions {
  /** Override the API root (tests, mirrors) */
  baseUrl?: string;

  /** Request timeout in milliseconds (default: 30000) */
  timeoutMs?: number;

  /** Defaults to the global fetch */
  fetchImpl?: FetchLike;

  /** Clock used for open-ended ranges */
  now?: () => Date;

  logger?: Logger;
}
