/**
 * @fileoverview Parser for the Yahoo Finance v8 chart API.
 *
 * The chart API returns parallel arrays: one timestamp array and one
 * array per OHLCV field, with `null` for sessions without a print.
 *
 * @module @brrealty/source-adapters/yahoo-parser
 */

import { z } from 'zod';
import type { DataRow, DataTable } from '@brrealty/contracts';

const numberArray = z.array(z.number().nullable());

const chartResultSchema = z.object({
  meta: z
    .object({
      symbol: z.string().optional(),
      currency: z.string().nullable().optional(),
      gmtoffset: z.number().optional(),
    })
    .passthrough(),
  timestamp: z.array(z.number()).optional(),
  indicators: z.object({
    quote: z
      .array(
        z.object({
          open: numberArray.optional(),
          high: numberArray.optional(),
          low: numberArray.optional(),
          close: numberArray.optional(),
          volume: numberArray.optional(),
        })
      )
      .default([]),
    adjclose: z.array(z.object({ adjclose: numberArray.optional() })).optional(),
  }),
});

export const chartResponseSchema = z.object({
  chart: z.object({
    result: z.array(chartResultSchema).nullable(),
    error: z.object({ code: z.string(), description: z.string().nullable().optional() }).nullable().optional(),
  }),
});

export type ChartResponse = z.infer<typeof chartResponseSchema>;

/**
 * Thrown for chart payloads that carry an API-level error.
 */
export class ChartApiError extends Error {
  constructor(
    message: string,
    public readonly code: string
  ) {
    super(message);
    this.name = 'ChartApiError';
    Object.setPrototypeOf(this, ChartApiError.prototype);
  }
}

function at(values: (number | null)[] | undefined, index: number): number | null {
  return values?.[index] ?? null;
}

/**
 * Converts a chart payload into daily rows.
 *
 * Dates are taken in the exchange's local time (`meta.gmtoffset`), so a
 * São Paulo session stamped 13:00 UTC maps to its own calendar day.
 * `value` is the close.
 *
 * @throws {z.ZodError} For payloads that are not chart responses
 * @throws {ChartApiError} When the payload reports an error
 *
 * @example
 * ```typescript
 * parseChart(payload);
 * // [{ date: '2024-01-02', value: 37.9, open: 37.5, high: 38.1, low: 37.2, close: 37.9, adjusted: 35.1, volume: 41000000 }]
 * ```
 */
export function parseChart(payload: unknown): DataTable {
  const { chart } = chartResponseSchema.parse(payload);

  if (chart.error) {
    throw new ChartApiError(chart.error.description ?? chart.error.code, chart.error.code);
  }

  const result = chart.result?.[0];
  if (!result || !result.timestamp) {
    return [];
  }

  const offsetSeconds = result.meta.gmtoffset ?? 0;
  const quote = result.indicators.quote[0];
  const adjusted = result.indicators.adjclose?.[0]?.adjclose;

  return result.timestamp.map((seconds, index): DataRow => {
    const close = at(quote?.close, index);
    return {
      date: new Date((seconds + offsetSeconds) * 1000).toISOString().slice(0, 10),
      value: close,
      open: at(quote?.open, index),
      high: at(quote?.high, index),
      low: at(quote?.low, index),
      close,
      adjusted: at(adjusted, index),
      volume: at(quote?.volume, index),
    };
  });
}
