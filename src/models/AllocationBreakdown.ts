import { CategoryKey } from "./AssetClass";
import { RetirementStatus } from "./Portfolio";

/**
 * Allocation analysis data structures.
 * Display fields are rounded to cents / hundredths of a percent; raw* fields keep full precision
 * for the rebalancer and the projector.
 */

export interface PositionTotal {
  accountNumber: string;
  symbol: string;
  value: number;
  quantity: number;
}

export interface Holding extends PositionTotal {
  preference?: number;
}

export interface SymbolValue {
  ticker: string;
  value: number;
}

export interface CategoryDetail {
  key: CategoryKey;
  label: string;
  assetClass: string;
  category: string;
  subtotal: number;
  currentPct: number;
  targetPct?: number;
  targetValue?: number;
  difference?: number; // target - current, in dollars; positive = underweight
  rawSubtotal: number;
  rawCurrentPct: number;
  rawTargetPct?: number;
  symbols: SymbolValue[];
  holdings: Holding[];
}

export interface AllocationBreakdown {
  totalValue: number;
  positions: PositionTotal[];
  categoryDetails: CategoryDetail[];
  classBreakdown: Record<string, number>;
  categoryBreakdown: Record<string, number>;
  tickerBreakdown: Record<string, number>;
  classTargets?: Record<string, number>;
  hasTarget: boolean;
  retirement: RetirementStatus | null;
}

export function emptyBreakdown(retirement: RetirementStatus | null = null): AllocationBreakdown {
  return {
    totalValue: 0,
    positions: [],
    categoryDetails: [],
    classBreakdown: {},
    categoryBreakdown: {},
    tickerBreakdown: {},
    hasTarget: false,
    retirement,
  };
}
