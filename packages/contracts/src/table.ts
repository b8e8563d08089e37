/**
 * @fileoverview Tabular data shapes shared by adapters, caches and the orchestrator.
 *
 * Tables are plain arrays of row objects. Every row carries an ISO `date`
 * and a numeric `value`; everything else is a loosely typed column.
 *
 * @module @brrealty/contracts/table
 */

/** A single cell. Missing values are `null`. */
export type CellValue = string | number | boolean | null;

/**
 * One observation.
 *
 * @invariant date is an ISO 8601 calendar date (YYYY-MM-DD)
 *
 * @example
 * ```typescript
 * const row: DataRow = { date: '2024-01-01', value: 0.42, code_bcb: '433' };
 * ```
 */
export interface DataRow {
  /** Observation date, `YYYY-MM-DD` */
  date: string;

  /** Observed value; `null` when the source reported no number */
  value: number | null;

  /** Item id column, descriptive metadata and source-specific extras */
  [column: string]: CellValue;
}

export type DataTable = DataRow[];

/** Inclusive date range. `end` absent means "up to the latest observation". */
export interface DateRange {
  /** `YYYY-MM-DD` */
  start: string;
  /** `YYYY-MM-DD` */
  end?: string;
}

/** Matches `YYYY-MM-DD` with a real calendar date. */
export function isIsoDate(value: string): boolean {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) {
    return false;
  }
  const parsed = new Date(`${value}T00:00:00.000Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

/**
 * Whether a date falls inside the range. ISO calendar dates order
 * lexicographically, so plain string comparison is enough.
 */
export function isWithinRange(date: string, range: DateRange): boolean {
  if (date < range.start) {
    return false;
  }
  return range.end === undefined || date <= range.end;
}

/** True when the value cell holds a usable number. */
export function hasValue(row: DataRow): boolean {
  return typeof row.value === 'number' && !Number.isNaN(row.value);
}

/** Column names in first-seen order across all rows. */
export function columnsOf(table: DataTable): string[] {
  const seen = new Set<string>();
  for (const row of table) {
    for (const key of Object.keys(row)) {
      seen.add(key);
    }
  }
  return [...seen];
}
