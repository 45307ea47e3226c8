/**
 * Date helpers
 */

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Whole days elapsed from `from` to `to`, floored (same convention as a timedelta's days).
 */
export function daysBetween(from: Date, to: Date): number {
  return Math.floor((to.getTime() - from.getTime()) / MS_PER_DAY);
}

export function getCurrentYear(now: Date): number {
  return now.getFullYear();
}
