/**
 * @fileoverview Brazilian Central Bank SGS time-series adapter.
 *
 * One item is one SGS series code (e.g. 433 for the IPCA monthly change).
 *
 * @module @brrealty/source-adapters/bcb-sgs
 */

import { format } from 'date-fns';
import { UpstreamResponseError, isUpstreamResponseError } from '@brrealty/contracts';
import type { DataTable, DateRange } from '@brrealty/contracts';
import type { Logger } from '@brrealty/logger';
import { SGS_DATE_FORMAT, parseSgsSeries } from './bcb-parser.js';
import { DEFAULT_TIMEOUT_MS, fetchJson } from './http.js';
import type { FetchLike, HttpAdapterOptions, SourceAdapter } from './types.js';

const DEFAULT_BASE_URL = 'https://api.bcb.gov.br/dados/serie';

/**
 * Converts an ISO calendar date to the SGS `dd/MM/yyyy` query format.
 */
function toSgsDate(isoDate: string): string {
  const [year, month, day] = isoDate.split('-').map(Number);
  return format(new Date(year ?? 1970, (month ?? 1) - 1, day ?? 1), SGS_DATE_FORMAT);
}

/**
 * Adapter for `api.bcb.gov.br/dados/serie/bcdata.sgs.{code}/dados`.
 *
 * SGS answers 404 when a series has no observations in the requested
 * window; that is reported as zero rows, not as an error.
 *
 * @example
 * ```typescript
 * const adapter = new BcbSgsAdapter({ timeoutMs: 10000 });
 * const rows = await adapter.fetchItem('433', { start: '2020-01-01', end: '2020-12-31' });
 * ```
 */
export class BcbSgsAdapter implements SourceAdapter {
  readonly id = 'bcb_sgs';

  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly now: () => Date;
  private readonly logger?: Logger;

  constructor(options: HttpAdapterOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger;
  }

  buildUrl(code: string, range: DateRange): string {
    const params = new URLSearchParams({
      formato: 'json',
      dataInicial: toSgsDate(range.start),
      dataFinal: range.end === undefined ? format(this.now(), SGS_DATE_FORMAT) : toSgsDate(range.end),
    });
    return `${this.baseUrl}/bcdata.sgs.${encodeURIComponent(code)}/dados?${params.toString()}`;
  }

  async fetchItem(itemId: string, range: DateRange): Promise<DataTable> {
    if (!/^\d+$/.test(itemId)) {
      throw new UpstreamResponseError(`Invalid SGS series code: ${itemId}`, { source: this.id, itemId });
    }

    let payload: unknown;
    try {
      payload = await fetchJson(this.buildUrl(itemId, range), {
        source: this.id,
        itemId,
        timeoutMs: this.timeoutMs,
        fetchImpl: this.fetchImpl,
      });
    } catch (error) {
      if (isUpstreamResponseError(error) && error.data?.['status'] === 404) {
        return [];
      }
      throw error;
    }

    let parsed: ReturnType<typeof parseSgsSeries>;
    try {
      parsed = parseSgsSeries(payload);
    } catch (error) {
      throw new UpstreamResponseError(
        `Unexpected SGS payload for series ${itemId}`,
        { source: this.id, itemId },
        error
      );
    }

    if (parsed.errors.length > 0) {
      this.logger?.debug('Dropped unreadable SGS observations', {
        source: this.id,
        item: itemId,
        dropped: parsed.errors.length,
      });
    }
    return parsed.table;
  }
}
