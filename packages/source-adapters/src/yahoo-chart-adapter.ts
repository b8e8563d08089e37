/**
 * @fileoverview Daily stock and index quotes from the Yahoo Finance chart API.
 *
 * One item is one ticker: B3 equities with the `.SA` suffix (PETR4.SA),
 * indices with a caret (^BVSP) and US-listed ETFs (EWZ).
 *
 * @module @brrealty/source-adapters/yahoo-chart
 */

import { UpstreamResponseError } from '@brrealty/contracts';
import type { DataTable, DateRange } from '@brrealty/contracts';
import { DEFAULT_TIMEOUT_MS, fetchJson } from './http.js';
import { ChartApiError, parseChart } from './yahoo-parser.js';
import type { FetchLike, HttpAdapterOptions, SourceAdapter } from './types.js';

const DEFAULT_BASE_URL = 'https://query1.finance.yahoo.com/v8/finance/chart';

const DAY_SECONDS = 24 * 60 * 60;

function toEpochSeconds(isoDate: string): number {
  return Math.floor(Date.parse(`${isoDate}T00:00:00.000Z`) / 1000);
}

/**
 * Adapter for `query1.finance.yahoo.com/v8/finance/chart/{symbol}`.
 *
 * @example
 * ```typescript
 * const adapter = new YahooChartAdapter();
 * const rows = await adapter.fetchItem('^BVSP', { start: '2024-01-01' });
 * ```
 */
export class YahooChartAdapter implements SourceAdapter {
  readonly id = 'yahoo_chart';

  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly now: () => Date;

  constructor(options: HttpAdapterOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.now = options.now ?? (() => new Date());
  }

  /**
   * `period2` is exclusive, so a closed range ends one day after `end`.
   */
  buildUrl(symbol: string, range: DateRange): string {
    const period2 =
      range.end === undefined ? Math.floor(this.now().getTime() / 1000) : toEpochSeconds(range.end) + DAY_SECONDS;
    const params = new URLSearchParams({
      period1: String(toEpochSeconds(range.start)),
      period2: String(period2),
      interval: '1d',
      events: 'history',
      includeAdjustedClose: 'true',
    });
    return `${this.baseUrl}/${encodeURIComponent(symbol)}?${params.toString()}`;
  }

  async fetchItem(itemId: string, range: DateRange): Promise<DataTable> {
    const payload = await fetchJson(this.buildUrl(itemId, range), {
      source: this.id,
      itemId,
      timeoutMs: this.timeoutMs,
      fetchImpl: this.fetchImpl,
      headers: { 'user-agent': 'Mozilla/5.0 (compatible; brrealty-data)' },
    });

    try {
      return parseChart(payload);
    } catch (error) {
      const reason = error instanceof ChartApiError ? error.message : 'unexpected chart payload';
      throw new UpstreamResponseError(`Yahoo chart error for ${itemId}: ${reason}`, { source: this.id, itemId }, error);
    }
  }
}
