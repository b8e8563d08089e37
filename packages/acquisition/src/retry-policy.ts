/**
 * @fileoverview Per-item retry policy.
 *
 * Thrown errors are transient unless flagged otherwise and are retried after
 * a delay; a successful call is classified by its rows. Nothing is thrown out
 * of `attempt`: every terminal state is an `AttemptResult`.
 *
 * @module @brrealty/acquisition/retry-policy
 */

import type { DataTable } from '@brrealty/contracts';
import { PermanentSeriesError, errorMessage, hasValue, isRetryable } from '@brrealty/contracts';
import type { Logger } from '@brrealty/logger';

export type Sleep = (ms: number) => Promise<void>;

export interface RetryPolicyOptions {
  /** Attempts per item when `attempt` is called without a limit (default 3) */
  maxAttempts?: number;

  /** Delay before the first retry in milliseconds (default 500) */
  retryDelayMs?: number;

  /** Delay growth per retry; 1 keeps it fixed (default 1) */
  backoffMultiplier?: number;

  /** Upper bound for a single retry delay (default 30000) */
  maxDelayMs?: number;

  /** Pause between successive items (default 100) */
  interItemDelayMs?: number;

  /** Replaced in tests to skip real waiting */
  sleep?: Sleep;

  logger?: Logger;
}

interface AttemptStats {
  /** Calls made to the operation */
  attempts: number;
  /** Sum of retry delays waited */
  totalDelayMs: number;
}

export type AttemptResult =
  | ({ status: 'success'; table: DataTable } & AttemptStats)
  | ({ status: 'empty'; error: PermanentSeriesError } & AttemptStats)
  | ({ status: 'all_invalid'; rows: number; error: PermanentSeriesError } & AttemptStats)
  | ({ status: 'error'; error: Error; retryable: boolean } & AttemptStats);

export const DEFAULT_RETRY_OPTIONS = {
  maxAttempts: 3,
  retryDelayMs: 500,
  backoffMultiplier: 1,
  maxDelayMs: 30000,
  interItemDelayMs: 100,
} as const;

const realSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Classifies the rows of a successful call.
 */
export function classifyRows(table: DataTable): 'success' | 'empty' | 'all_invalid' {
  if (table.length === 0) {
    return 'empty';
  }
  return table.some(hasValue) ? 'success' : 'all_invalid';
}

/**
 * @example
 * ```typescript
 * const policy = new RetryPolicy({ retryDelayMs: 500 });
 * const result = await policy.attempt(() => adapter.fetchItem('433', range), 3, '433');
 * if (result.status === 'success') {
 *   console.log(result.table.length, 'rows after', result.attempts, 'attempts');
 * }
 * ```
 */
export class RetryPolicy {
  readonly maxAttempts: number;
  readonly retryDelayMs: number;
  readonly backoffMultiplier: number;
  readonly maxDelayMs: number;
  readonly interItemDelayMs: number;

  private readonly sleep: Sleep;
  private readonly logger?: Logger;

  constructor(options: RetryPolicyOptions = {}) {
    this.maxAttempts = options.maxAttempts ?? DEFAULT_RETRY_OPTIONS.maxAttempts;
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_OPTIONS.retryDelayMs;
    this.backoffMultiplier = options.backoffMultiplier ?? DEFAULT_RETRY_OPTIONS.backoffMultiplier;
    this.maxDelayMs = options.maxDelayMs ?? DEFAULT_RETRY_OPTIONS.maxDelayMs;
    this.interItemDelayMs = options.interItemDelayMs ?? DEFAULT_RETRY_OPTIONS.interItemDelayMs;
    this.sleep = options.sleep ?? realSleep;
    this.logger = options.logger;
  }

  /**
   * Delay before retry number `retry` (1-based).
   */
  delayFor(retry: number): number {
    const delay = this.retryDelayMs * Math.pow(this.backoffMultiplier, retry - 1);
    return Math.floor(Math.min(delay, this.maxDelayMs));
  }

  /**
   * Runs `operation` up to `limit` times.
   *
   * @param limit - Total attempts including the first; values below 1 count as 1
   * @param label - Item id used in log entries
   */
  async attempt(
    operation: () => Promise<DataTable>,
    limit: number = this.maxAttempts,
    label = 'operation'
  ): Promise<AttemptResult> {
    const maxAttempts = Math.max(1, Math.floor(limit));
    let totalDelayMs = 0;

    for (let attempt = 1; ; attempt++) {
      let table: DataTable;
      try {
        table = await operation();
      } catch (caught) {
        const error = toError(caught);
        const retryable = isRetryable(caught);

        if (attempt >= maxAttempts || !retryable) {
          this.logger?.debug('Giving up on item', {
            item: label,
            attempts: attempt,
            retryable,
            error: error.message,
          });
          return { status: 'error', error, retryable, attempts: attempt, totalDelayMs };
        }

        const delay = this.delayFor(attempt);
        totalDelayMs += delay;
        this.logger?.warn(`Attempt ${attempt} failed, retrying in ${delay}ms`, {
          item: label,
          attempt,
          maxAttempts,
          error: errorMessage(caught),
        });
        if (delay > 0) {
          await this.sleep(delay);
        }
        continue;
      }

      // Empty and all-invalid are answers from the source, not failures to reach it
      const status = classifyRows(table);
      switch (status) {
        case 'success':
          return { status, table, attempts: attempt, totalDelayMs };
        case 'empty':
          return {
            status,
            error: new PermanentSeriesError('returned no data', { itemId: label, reason: status }),
            attempts: attempt,
            totalDelayMs,
          };
        case 'all_invalid':
          return {
            status,
            rows: table.length,
            error: new PermanentSeriesError(`only missing values (${table.length} rows)`, {
              itemId: label,
              reason: status,
            }),
            attempts: attempt,
            totalDelayMs,
          };
      }
    }
  }

  /** Inter-item delay. */
  async pause(): Promise<void> {
    if (this.interItemDelayMs > 0) {
      await this.sleep(this.interItemDelayMs);
    }
  }
}
