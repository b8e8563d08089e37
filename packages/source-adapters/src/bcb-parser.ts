/**
 * @fileoverview Parser for the BCB SGS (Sistema Gerenciador de Séries
 * Temporais) JSON format.
 *
 * SGS answers with day-first dates and decimal strings:
 *
 * ```json
 * [{ "data": "01/01/2010", "valor": "0.75" }]
 * ```
 *
 * @module @brrealty/source-adapters/bcb-parser
 */

import { format, isValid, parse } from 'date-fns';
import { z } from 'zod';
import type { DataTable } from '@brrealty/contracts';

const sgsObservationSchema = z.object({
  data: z.string(),
  valor: z.union([z.string(), z.number(), z.null()]),
});

export const sgsResponseSchema = z.array(sgsObservationSchema);

export type SgsObservation = z.infer<typeof sgsObservationSchema>;

/** `dd/MM/yyyy`, the SGS date format, in both directions. */
export const SGS_DATE_FORMAT = 'dd/MM/yyyy';

const REFERENCE_DATE = new Date(2000, 0, 1);

/**
 * Converts an SGS date to `YYYY-MM-DD`, or undefined when unreadable.
 */
export function parseSgsDate(value: string): string | undefined {
  const parsed = parse(value, SGS_DATE_FORMAT, REFERENCE_DATE);
  return isValid(parsed) ? format(parsed, 'yyyy-MM-dd') : undefined;
}

/**
 * Converts an SGS value to a number. Blank and non-numeric values are null.
 * SGS uses a dot decimal separator; a comma is accepted too.
 */
export function parseSgsValue(value: string | number | null): number | null {
  if (value === null) {
    return null;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  const trimmed = value.trim().replace(',', '.');
  if (trimmed === '') {
    return null;
  }
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

export interface SgsParseResult {
  table: DataTable;
  /** Observations dropped for an unreadable date */
  errors: string[];
}

/**
 * Parses an SGS payload into `{ date, value }` rows.
 *
 * Rows with an unreadable date are dropped and reported; rows with an
 * unreadable value are kept with `value: null`.
 *
 * @throws {z.ZodError} When the payload is not an array of observations
 */
export function parseSgsSeries(payload: unknown): SgsParseResult {
  const observations = sgsResponseSchema.parse(payload);
  const table: DataTable = [];
  const errors: string[] = [];

  for (const [index, observation] of observations.entries()) {
    const date = parseSgsDate(observation.data);
    if (date === undefined) {
      errors.push(`Observation ${index}: unreadable date "${observation.data}"`);
      continue;
    }
    table.push({ date, value: parseSgsValue(observation.valor) });
  }

  return { table, errors };
}
