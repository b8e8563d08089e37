/**
 * @fileoverview Public API of @brrealty/source-adapters.
 *
 * @module @brrealty/source-adapters
 */

import { BcbSgsAdapter } from './bcb-sgs-adapter.js';
import type { HttpAdapterOptions, SourceAdapter } from './types.js';
import { YahooChartAdapter } from './yahoo-chart-adapter.js';

export type { SourceAdapter, HttpAdapterOptions, FetchLike } from './types.js';
export { BcbSgsAdapter } from './bcb-sgs-adapter.js';
export { YahooChartAdapter } from './yahoo-chart-adapter.js';
export { fetchJson, isTransientStatus, DEFAULT_TIMEOUT_MS } from './http.js';
export { parseSgsSeries, parseSgsDate, parseSgsValue, SGS_DATE_FORMAT } from './bcb-parser.js';
export type { SgsParseResult, SgsObservation } from './bcb-parser.js';
export { parseChart, ChartApiError } from './yahoo-parser.js';
export type { ChartResponse } from './yahoo-parser.js';

/**
 * Every built-in adapter keyed by id, sharing one set of HTTP options.
 */
export function createDefaultAdapters(options: HttpAdapterOptions = {}): Map<string, SourceAdapter> {
  const adapters: SourceAdapter[] = [new BcbSgsAdapter(options), new YahooChartAdapter(options)];
  return new Map(adapters.map((adapter) => [adapter.id, adapter]));
}
