import { CategoryKey } from "./AssetClass";

/**
 * Rebalancing plan data structures
 */

export type RebalanceActionKind = "Buy" | "Sell";

export interface AccountAllocation {
  accountNumber: string;
  amount: number;
}

export interface FundRecommendation {
  ticker: string;
  preference?: number;
  value?: number; // current holding, sells only
}

export interface RebalanceAction {
  action: RebalanceActionKind;
  amount: number;
  key: CategoryKey;
  label: string;
  assetClass: string;
  category: string;
  tagged: boolean; // false when added only to balance buys against sells
  pctDiff: number;
  accounts: AccountAllocation[];
  funds: FundRecommendation[];
}

export interface RebalancePlan {
  actions: RebalanceAction[];
  totalBuys: number;
  totalSells: number;
  netBalanced: boolean;
  tolerancePct: number;
  message?: string;
}
