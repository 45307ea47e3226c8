/**
 * Asset class taxonomy and return assumptions
 */

export const ASSET_CLASSES = ["Stocks", "Bonds", "Crypto", "Other"] as const;

export type AssetClassName = (typeof ASSET_CLASSES)[number];

export function isAssetClassName(name: string): name is AssetClassName {
  return (ASSET_CLASSES as readonly string[]).includes(name);
}

/**
 * Identifies an allocation bucket.
 * Categories from different classes may share a name, so the class is part of the key.
 * Uncategorized funds land in "other"; tickers with no fund record land in "unknown".
 */
export type CategoryKey =
  | { kind: "category"; assetClass: string; category: string }
  | { kind: "other" }
  | { kind: "unknown" };

export const OTHER_KEY: CategoryKey = { kind: "other" };
export const UNKNOWN_KEY: CategoryKey = { kind: "unknown" };

export function categoryKey(assetClass: string, category: string): CategoryKey {
  return { kind: "category", assetClass, category };
}

/**
 * Stable identity for use as a Map key. JSON encoding keeps
 * names containing ":" from colliding.
 */
export function categoryKeyId(key: CategoryKey): string {
  if (key.kind === "category") {
    return JSON.stringify([key.assetClass, key.category]);
  }
  return key.kind;
}

/**
 * Display label: "Stocks:Large Cap", "Other" or "Unknown"
 */
export function categoryKeyLabel(key: CategoryKey): string {
  switch (key.kind) {
    case "category":
      return `${key.assetClass}:${key.category}`;
    case "other":
      return "Other";
    case "unknown":
      return "Unknown";
  }
}

export function isSpecialKey(key: CategoryKey): boolean {
  return key.kind !== "category";
}

/**
 * Annual return model for one asset class or category, as fractions (0.10 = 10%)
 */
export interface ReturnAssumption {
  meanReturn: number;
  stdDev: number;
}

export type AssetClassAssumptions = Record<string, ReturnAssumption>;

/**
 * Long-run defaults used when no category-specific market assumption is mapped.
 */
export const DEFAULT_ASSET_CLASS_ASSUMPTIONS: AssetClassAssumptions = {
  Stocks: { meanReturn: 0.1, stdDev: 0.18 },
  Bonds: { meanReturn: 0.04, stdDev: 0.06 },
  Crypto: { meanReturn: 0.15, stdDev: 0.6 },
  Other: { meanReturn: 0.03, stdDev: 0.05 },
};

export const HORIZONS = ["5yr", "7yr", "10yr", "15yr", "20yr", "25yr", "30yr"] as const;

export type Horizon = (typeof HORIZONS)[number];

export interface HorizonAssumption {
  expectedReturnPct?: number;
  volatilityPct?: number;
}

/**
 * Uploaded capital-market assumptions, one slice per time horizon
 */
export interface AssumptionData {
  id: string;
  name: string;
  horizons: Partial<Record<Horizon, HorizonAssumption>>;
}

/**
 * Points a category at one horizon of an assumption upload.
 * A missing assumptionDataId means "use the class default".
 */
export interface CategoryAssumptionMapping {
  assetClass: string;
  category: string;
  horizon: Horizon;
  assumptionDataId?: string;
}

/**
 * Get the return assumption for a mapped horizon, or null when the slice is incomplete
 */
export function getHorizonAssumption(
  data: AssumptionData,
  horizon: Horizon
): ReturnAssumption | null {
  const slice = data.horizons[horizon];
  if (!slice || slice.expectedReturnPct == null || slice.volatilityPct == null) {
    return null;
  }
  return {
    meanReturn: slice.expectedReturnPct / 100,
    stdDev: slice.volatilityPct / 100,
  };
}
