/**
 * Fund catalog data structures
 */

export interface FundCategory {
  assetClass: string;
  name: string;
}

export interface Fund {
  ticker: string;
  name?: string;
  category?: FundCategory;
  preference?: number; // 1-256, lower is preferred; 1-10 means "recommended"
}

/** Stand-in rank for funds without a preference. Sorts after every real rank. */
export const NO_PREFERENCE = 256;

export const RECOMMENDED_MAX_PREFERENCE = 10;

export function preferenceRank(preference: number | undefined): number {
  return preference ?? NO_PREFERENCE;
}

export function isRecommended(fund: Fund): boolean {
  return (
    fund.preference !== undefined &&
    fund.preference >= 1 &&
    fund.preference <= RECOMMENDED_MAX_PREFERENCE
  );
}

/**
 * Comparator for preference ranks. "asc" puts the best-ranked first (buy lists),
 * "desc" puts the worst and unranked first (sell lists).
 * Ties fall back to ticker order.
 */
export function comparePreference(
  order: "asc" | "desc"
): (a: { ticker: string; preference?: number }, b: { ticker: string; preference?: number }) => number {
  return (a, b) => {
    const diff = preferenceRank(a.preference) - preferenceRank(b.preference);
    if (diff !== 0) {
      return order === "asc" ? diff : -diff;
    }
    return a.ticker.localeCompare(b.ticker);
  };
}
