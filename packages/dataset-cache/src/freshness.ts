/**
 * Staleness policy for cached datasets.
 *
 * Datasets refreshed weekly upstream are considered stale after two weeks,
 * monthly ones after sixty days. Manually curated datasets never go stale.
 * Stale entries are still served; callers only warn.
 */

import type { UpdateSchedule } from '@brrealty/contracts'

const DAY_MS = 24 * 60 * 60 * 1000

/**
 * Days after which an entry with the given schedule is stale.
 * `null` means never.
 */
export const STALE_AFTER_DAYS: Record<UpdateSchedule, number | null> = {
  daily: 3,
  weekly: 14,
  monthly: 60,
  manual: null,
}

/**
 * Fallback threshold when neither a schedule nor an override is given.
 */
export const DEFAULT_STALE_AFTER_DAYS = 14

export interface FreshnessOptions {
  updateSchedule?: UpdateSchedule
  /** Explicit threshold, wins over the schedule */
  warnAfterDays?: number
}

/**
 * Resolve the staleness threshold in days (`null` = never stale).
 */
export function staleAfterDays(options: FreshnessOptions = {}): number | null {
  if (options.warnAfterDays !== undefined) {
    return options.warnAfterDays
  }
  if (options.updateSchedule !== undefined) {
    return STALE_AFTER_DAYS[options.updateSchedule]
  }
  return DEFAULT_STALE_AFTER_DAYS
}

/**
 * Whole days between `cachedAt` and `now`, or undefined for an unreadable timestamp.
 */
export function cacheAgeDays(cachedAt: string, now: Date = new Date()): number | undefined {
  const written = Date.parse(cachedAt)
  if (Number.isNaN(written)) {
    return undefined
  }
  return Math.floor((now.getTime() - written) / DAY_MS)
}

/**
 * Check whether a cache entry written at `cachedAt` is stale.
 *
 * Entries without a known write time are never reported stale: there is
 * nothing to compare against.
 *
 * Example:
 * ```typescript
 * isStale('2024-01-01T00:00:00Z', { updateSchedule: 'weekly' }, new Date('2024-01-20'))
 * // true (19 days > 14)
 * ```
 */
export function isStale(cachedAt: string | undefined, options: FreshnessOptions = {}, now: Date = new Date()): boolean {
  if (cachedAt === undefined) {
    return false
  }
  const threshold = staleAfterDays(options)
  const age = cacheAgeDays(cachedAt, now)
  if (threshold === null || age === undefined) {
    return false
  }
  return age > threshold
}
