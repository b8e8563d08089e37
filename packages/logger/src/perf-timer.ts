/**
 * @fileoverview Millisecond timers for request and attempt durations.
 */

export interface PerfTimer {
  readonly startTime: number;
  /** Milliseconds since start, rounded; frozen once stopped */
  elapsed(): number;
  /** Stops the timer (idempotent) and returns the final duration */
  stop(): number;
  isRunning(): boolean;
}

/**
 * @example
 * ```typescript
 * const timer = startTimer();
 * const result = await orchestrator.fetch(request);
 * logger.info('Request complete', { duration_ms: timer.stop() });
 * ```
 */
export function startTimer(): PerfTimer {
  const startTime = performance.now();
  let endTime: number | null = null;

  return {
    startTime,
    elapsed: () => Math.round((endTime ?? performance.now()) - startTime),
    stop: () => {
      endTime ??= performance.now();
      return Math.round(endTime - startTime);
    },
    isRunning: () => endTime === null,
  };
}

/**
 * Awaits `fn` and reports how long it took. A rejection propagates unchanged.
 */
export async function measureAsync<T>(fn: () => Promise<T>): Promise<{ result: T; duration_ms: number }> {
  const timer = startTimer();
  const result = await fn();
  return { result, duration_ms: timer.stop() };
}
