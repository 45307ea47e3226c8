import { CategoryKey } from "../models/AssetClass";
import { AllocationBreakdown, CategoryDetail } from "../models/AllocationBreakdown";
import { Fund, comparePreference, isRecommended } from "../models/Fund";
import {
  AccountAllocation,
  FundRecommendation,
  RebalanceAction,
  RebalancePlan,
} from "../models/RebalancePlan";
import { BALANCE_TOLERANCE, OTHER_MIN_REBALANCE_VALUE } from "../utils/constants";
import { roundHalfUp } from "../utils/math";

/** Amounts below this are float residue, not money. */
const EPSILON = 1e-6;

export interface AccountBalance {
  accountNumber: string;
  balance: number;
}

/**
 * A category's distance from target.
 * pctDiff is in percentage points and dollarDiff in dollars, both target minus actual.
 */
export interface CategoryGap {
  detail: CategoryDetail;
  pctDiff: number;
  dollarDiff: number;
}

interface SellOrder {
  gap: CategoryGap;
  tagged: boolean;
  allocations: AccountAllocation[];
}

interface BuyOrder {
  gap: CategoryGap;
  tagged: boolean;
  remaining: number;
  allocations: Map<string, number>;
}

function compareAccounts(a: AccountBalance, b: AccountBalance): number {
  return a.accountNumber < b.accountNumber ? -1 : a.accountNumber > b.accountNumber ? 1 : 0;
}

/**
 * Spread a sell over the accounts holding a category, largest balance first.
 * Each account is emptied before the next is touched, so disposals land in as few
 * accounts as possible; the last account used may be sold partially.
 *
 * @returns One entry per account in the order used, zero for accounts not needed
 *
 * @example
 * ```ts
 * allocateSellAcrossAccounts(650, [
 *   { accountNumber: "A", balance: 500 },
 *   { accountNumber: "B", balance: 300 },
 *   { accountNumber: "C", balance: 100 },
 * ]) // A: 500, B: 150, C: 0
 * ```
 */
export function allocateSellAcrossAccounts(
  amount: number,
  balances: AccountBalance[]
): AccountAllocation[] {
  const ordered = [...balances].sort((a, b) => b.balance - a.balance || compareAccounts(a, b));
  let remaining = amount;

  return ordered.map((account) => {
    const sold = remaining > EPSILON ? Math.min(account.balance, remaining) : 0;
    remaining -= sold;
    return { accountNumber: account.accountNumber, amount: sold };
  });
}

/**
 * Fund buys from per-account cash. Accounts are drained smallest cash first; within an
 * account the cash goes to buys in the order given (callers pass largest deficit first).
 * Mutates both the cash map and the orders.
 */
function fundBuys(cash: Map<string, number>, orders: BuyOrder[]): void {
  const accounts = [...cash.entries()]
    .map(([accountNumber, balance]) => ({ accountNumber, balance }))
    .filter((account) => account.balance > EPSILON)
    .sort((a, b) => a.balance - b.balance || compareAccounts(a, b));

  for (const account of accounts) {
    let available = account.balance;
    for (const order of orders) {
      if (available <= EPSILON) break;
      if (order.remaining <= EPSILON) continue;

      const amount = Math.min(available, order.remaining);
      order.allocations.set(
        account.accountNumber,
        (order.allocations.get(account.accountNumber) ?? 0) + amount
      );
      order.remaining -= amount;
      available -= amount;
    }
    cash.set(account.accountNumber, available);
  }
}

function accountBalances(detail: CategoryDetail): AccountBalance[] {
  const byAccount = new Map<string, number>();
  for (const holding of detail.holdings) {
    byAccount.set(holding.accountNumber, (byAccount.get(holding.accountNumber) ?? 0) + holding.value);
  }
  return [...byAccount.entries()].map(([accountNumber, balance]) => ({ accountNumber, balance }));
}

function sell(gap: CategoryGap, amount: number, tagged: boolean, cash: Map<string, number>): SellOrder {
  const allocations = allocateSellAcrossAccounts(amount, accountBalances(gap.detail)).filter(
    (a) => a.amount > EPSILON
  );
  for (const allocation of allocations) {
    cash.set(allocation.accountNumber, (cash.get(allocation.accountNumber) ?? 0) + allocation.amount);
  }
  return { gap, tagged, allocations };
}

function buyOrder(gap: CategoryGap, tagged: boolean): BuyOrder {
  return { gap, tagged, remaining: gap.dollarDiff, allocations: new Map() };
}

function byOverweight(a: CategoryGap, b: CategoryGap): number {
  return a.dollarDiff - b.dollarDiff;
}

function byUnderweight(a: CategoryGap, b: CategoryGap): number {
  return b.dollarDiff - a.dollarDiff;
}

/**
 * Holdings of a category ranked for disposal: worst and unranked preference first.
 */
function sellRecommendations(detail: CategoryDetail): FundRecommendation[] {
  const byTicker = new Map<string, FundRecommendation>();
  for (const holding of detail.holdings) {
    const existing = byTicker.get(holding.symbol);
    if (existing) {
      existing.value = (existing.value ?? 0) + holding.value;
    } else {
      byTicker.set(holding.symbol, {
        ticker: holding.symbol,
        preference: holding.preference,
        value: holding.value,
      });
    }
  }
  return [...byTicker.values()]
    .sort(comparePreference("desc"))
    .map((fund) => ({ ...fund, value: roundHalfUp(fund.value ?? 0) }));
}

/**
 * Recommended catalog funds (preference 1-10) for a category, best first.
 */
function buyRecommendations(funds: Fund[]): FundRecommendation[] {
  return funds
    .filter(isRecommended)
    .sort(comparePreference("asc"))
    .map((fund) => ({ ticker: fund.ticker, preference: fund.preference }));
}

function toAction(
  kind: "Buy" | "Sell",
  gap: CategoryGap,
  tagged: boolean,
  allocations: AccountAllocation[],
  funds: FundRecommendation[]
): RebalanceAction {
  const { detail } = gap;
  return {
    action: kind,
    amount: roundHalfUp(allocations.reduce((total, a) => total + a.amount, 0)),
    key: detail.key,
    label: detail.label,
    assetClass: detail.assetClass,
    category: detail.category,
    tagged,
    pctDiff: roundHalfUp(gap.pctDiff),
    accounts: allocations.map((a) => ({ accountNumber: a.accountNumber, amount: roundHalfUp(a.amount) })),
    funds,
  };
}

function emptyPlan(tolerancePct: number, message: string): RebalancePlan {
  return { actions: [], totalBuys: 0, totalSells: 0, netBalanced: true, tolerancePct, message };
}

/**
 * Decide which categories are far enough from target to trade.
 * Regular and Unknown categories qualify on their own tolerance breach. Other qualifies only
 * when some other category breached tolerance and it holds more than a dollar.
 */
export function selectTaggedCategories(gaps: CategoryGap[], tolerancePct: number): Set<CategoryGap> {
  const tagged = new Set<CategoryGap>();
  for (const gap of gaps) {
    if (gap.detail.key.kind !== "other" && Math.abs(gap.pctDiff) > tolerancePct) {
      tagged.add(gap);
    }
  }
  if (tagged.size > 0) {
    for (const gap of gaps) {
      if (gap.detail.key.kind === "other" && gap.detail.rawSubtotal > OTHER_MIN_REBALANCE_VALUE) {
        tagged.add(gap);
      }
    }
  }
  return tagged;
}

/**
 * Build a buy/sell plan that moves the portfolio toward its glidepath targets.
 *
 * Sells come first and leave cash in the accounts they were made in; buys are funded only
 * from that cash, so the plan is zero-sum. When tagged buys and sells do not match, untagged
 * regular categories absorb the residual, each capped at its own gap. Other and Unknown never
 * absorb residuals.
 *
 * @param breakdown - Output of analyzeAllocation
 * @param tolerancePct - Band in percentage points either side of target (2 = ±2 points)
 * @param findCategoryFunds - Catalog funds belonging to a category
 */
export function planRebalance(
  breakdown: AllocationBreakdown,
  tolerancePct: number,
  findCategoryFunds: (key: CategoryKey) => Fund[]
): RebalancePlan {
  if (!breakdown.hasTarget) {
    return emptyPlan(
      tolerancePct,
      "No glidepath target for this portfolio. Assign a rule set, birth year and retirement age to get rebalancing recommendations."
    );
  }

  const totalValue = breakdown.categoryDetails.reduce((total, d) => total + d.rawSubtotal, 0);
  if (totalValue <= 0) {
    return emptyPlan(tolerancePct, "Portfolio has no value to rebalance.");
  }

  const gaps: CategoryGap[] = breakdown.categoryDetails.map((detail) => {
    const targetPct = detail.rawTargetPct ?? 0;
    return {
      detail,
      pctDiff: targetPct - detail.rawCurrentPct,
      dollarDiff: (totalValue * targetPct) / 100 - detail.rawSubtotal,
    };
  });

  const tagged = selectTaggedCategories(gaps, tolerancePct);
  if (tagged.size === 0) {
    return emptyPlan(tolerancePct, `All categories are within ±${tolerancePct}% of target.`);
  }

  const cash = new Map<string, number>();

  const sells: SellOrder[] = [...tagged]
    .filter((gap) => gap.dollarDiff < -EPSILON)
    .sort(byOverweight)
    .map((gap) => sell(gap, -gap.dollarDiff, true, cash));

  const buys: BuyOrder[] = [...tagged]
    .filter((gap) => gap.dollarDiff > EPSILON)
    .sort(byUnderweight)
    .map((gap) => buyOrder(gap, true));

  fundBuys(cash, buys);

  const untagged = gaps.filter((gap) => !tagged.has(gap) && gap.detail.key.kind === "category");
  const leftoverCash = [...cash.values()].reduce((total, v) => total + v, 0);
  const unfunded = buys.reduce((total, order) => total + order.remaining, 0);

  if (leftoverCash >= BALANCE_TOLERANCE) {
    const extraBuys = untagged
      .filter((gap) => gap.dollarDiff > EPSILON)
      .sort(byUnderweight)
      .map((gap) => buyOrder(gap, false));
    fundBuys(cash, extraBuys);
    buys.push(...extraBuys);
  } else if (unfunded >= BALANCE_TOLERANCE) {
    let needed = unfunded;
    for (const gap of untagged.filter((g) => g.dollarDiff < -EPSILON).sort(byOverweight)) {
      if (needed <= EPSILON) break;
      const amount = Math.min(-gap.dollarDiff, needed);
      sells.push(sell(gap, amount, false, cash));
      needed -= amount;
    }
    fundBuys(cash, buys);
  }

  const actions: RebalanceAction[] = [];
  let rawSells = 0;
  let rawBuys = 0;

  for (const order of sells) {
    rawSells += order.allocations.reduce((total, a) => total + a.amount, 0);
    actions.push(toAction("Sell", order.gap, order.tagged, order.allocations, sellRecommendations(order.gap.detail)));
  }

  for (const order of buys) {
    const allocations = [...order.allocations.entries()]
      .map(([accountNumber, amount]) => ({ accountNumber, amount }))
      .filter((a) => a.amount > EPSILON);
    if (allocations.length === 0) continue;
    rawBuys += allocations.reduce((total, a) => total + a.amount, 0);
    actions.push(
      toAction("Buy", order.gap, order.tagged, allocations, buyRecommendations(findCategoryFunds(order.gap.detail.key)))
    );
  }

  const netBalanced = Math.abs(rawSells - rawBuys) < BALANCE_TOLERANCE;
  const plan: RebalancePlan = {
    actions,
    totalBuys: roundHalfUp(rawBuys),
    totalSells: roundHalfUp(rawSells),
    netBalanced,
    tolerancePct,
  };

  if (actions.length === 0) {
    plan.message = "Categories outside tolerance could not be traded against each other.";
  } else if (!netBalanced) {
    plan.message = `Buys and sells differ by $${roundHalfUp(Math.abs(rawSells - rawBuys)).toFixed(2)}; untagged categories could not absorb the difference.`;
  }

  return plan;
}
