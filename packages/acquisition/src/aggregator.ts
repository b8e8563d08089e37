/**
 * @fileoverview Series aggregator: runs every item of a dataset through the
 * retry policy and folds the results into one table plus one outcome per item.
 *
 * The fold is a pure function of (state, item, result); the only side effects
 * live in `aggregate`, which drives the fetches and pauses.
 *
 * @module @brrealty/acquisition/aggregator
 */

import type { DataRow, DataTable, SeriesOutcome, SourceItem } from '@brrealty/contracts';
import type { AttemptResult, RetryPolicy } from './retry-policy.js';

export type FetchOne = (item: SourceItem) => Promise<DataTable>;

export interface AggregateOptions {
  /** Column stamped on every row with the item id */
  itemColumn: string;

  /** Attempts per item (default: the policy's maxAttempts) */
  maxAttempts?: number;

  /** Items in flight at once (default 1) */
  concurrency?: number;

  /** Called once per item, in item order, after it is folded */
  onOutcome?: (outcome: SeriesOutcome, position: number, total: number) => void;
}

export interface AggregateState {
  readonly rows: readonly DataRow[];
  readonly outcomes: readonly SeriesOutcome[];
}

export type AggregateResult =
  | { ok: true; table: DataTable; outcomes: SeriesOutcome[] }
  | { ok: false; outcomes: SeriesOutcome[] };

export const EMPTY_STATE: AggregateState = Object.freeze({ rows: [], outcomes: [] });

/**
 * Outcome record for one item's terminal result.
 */
export function toOutcome(itemId: string, result: AttemptResult): SeriesOutcome {
  if (result.status === 'success') {
    return { itemId, status: 'success', rows: result.table.length, attempts: result.attempts };
  }
  return { itemId, status: result.status, rows: 0, attempts: result.attempts, error: result.error.message };
}

function stamp(row: DataRow, itemColumn: string, itemId: string): DataRow {
  const stamped: DataRow = { ...row };
  stamped[itemColumn] = itemId;
  return stamped;
}

/**
 * Pure fold step. Returns a new frozen state; `state` is left untouched.
 */
export function foldResult(
  state: AggregateState,
  item: SourceItem,
  result: AttemptResult,
  itemColumn: string
): AggregateState {
  const outcome = toOutcome(item.id, result);
  const rows =
    result.status === 'success'
      ? [...state.rows, ...result.table.map((row) => stamp(row, itemColumn, item.id))]
      : state.rows;

  return Object.freeze({ rows, outcomes: [...state.outcomes, outcome] });
}

/**
 * Runs every item through the policy with at most `concurrency` in flight.
 * Each worker pauses before every item but its first; with concurrency 1
 * that is a pause between successive items.
 */
async function runItems(
  items: readonly SourceItem[],
  fetchOne: FetchOne,
  policy: RetryPolicy,
  maxAttempts: number,
  concurrency: number,
  onResult: (index: number, result: AttemptResult) => void
): Promise<void> {
  let next = 0;

  const worker = async (): Promise<void> => {
    let first = true;
    while (next < items.length) {
      const index = next++;
      const item = items[index];
      if (item === undefined) {
        return;
      }
      if (!first) {
        await policy.pause();
      }
      first = false;
      onResult(index, await policy.attempt(() => fetchOne(item), maxAttempts, item.id));
    }
  };

  const workers = Math.max(1, Math.min(Math.floor(concurrency), items.length));
  await Promise.all(Array.from({ length: workers }, () => worker()));
}

/**
 * Fetches every item and folds the results in item order, never arrival
 * order: a result that finishes early waits until every item before it has
 * been folded.
 *
 * @example
 * ```typescript
 * const result = await aggregate(items, (item) => adapter.fetchItem(item.id, range), policy, {
 *   itemColumn: 'code_bcb',
 * });
 * if (!result.ok) {
 *   // every item failed; result.outcomes says why
 * }
 * ```
 */
export async function aggregate(
  items: readonly SourceItem[],
  fetchOne: FetchOne,
  policy: RetryPolicy,
  options: AggregateOptions
): Promise<AggregateResult> {
  const { itemColumn, maxAttempts = policy.maxAttempts, concurrency = 1, onOutcome } = options;

  let state = EMPTY_STATE;
  const pending = new Map<number, AttemptResult>();

  const foldReady = (): void => {
    for (;;) {
      const position = state.outcomes.length;
      const item = items[position];
      const result = pending.get(position);
      if (item === undefined || result === undefined) {
        return;
      }
      pending.delete(position);
      state = foldResult(state, item, result, itemColumn);
      const outcome = state.outcomes[position];
      if (outcome !== undefined) {
        onOutcome?.(outcome, position + 1, items.length);
      }
    }
  };

  await runItems(items, fetchOne, policy, maxAttempts, concurrency, (index, result) => {
    pending.set(index, result);
    foldReady();
  });

  const outcomes = [...state.outcomes];
  if (!outcomes.some((outcome) => outcome.status === 'success')) {
    return { ok: false, outcomes };
  }
  return { ok: true, table: [...state.rows], outcomes };
}
