import {
  CategoryKey,
  OTHER_KEY,
  UNKNOWN_KEY,
  categoryKey,
  categoryKeyId,
  categoryKeyLabel,
} from "../models/AssetClass";
import {
  AllocationBreakdown,
  CategoryDetail,
  Holding,
  PositionTotal,
  emptyBreakdown,
} from "../models/AllocationBreakdown";
import { Fund } from "../models/Fund";
import { GlidepathRule } from "../models/Glidepath";
import { Portfolio, RetirementStatus } from "../models/Portfolio";
import { AccountUpload } from "../models/Position";
import { currencyOrZero, normalizeSymbol } from "../utils/currency";
import { roundHalfUp } from "../utils/math";

/**
 * Everything the aggregator reads, already fetched from the stores.
 *
 * @property uploadsByAccount - Latest upload per account number; accounts without one are skipped
 * @property findFund - Fund lookup by normalized ticker
 * @property band - Glidepath band for the portfolio's current age, or null
 */
export interface AllocationInput {
  portfolio: Portfolio;
  uploadsByAccount: Map<string, AccountUpload>;
  findFund: (ticker: string) => Fund | undefined;
  band: GlidepathRule | null;
  retirement: RetirementStatus | null;
}

interface CategoryAccumulator {
  key: CategoryKey;
  assetClass: string;
  category: string;
  total: number;
  symbols: Map<string, number>;
  holdings: Holding[];
  targetPct?: number;
}

/**
 * Classify a ticker: its fund's category, "Other" for a fund without a category,
 * "Unknown" when there is no fund record.
 */
export function classifyFund(fund: Fund | undefined): {
  key: CategoryKey;
  assetClass: string;
  category: string;
} {
  if (!fund) {
    return { key: UNKNOWN_KEY, assetClass: "Unknown", category: "Unknown" };
  }
  if (!fund.category) {
    return { key: OTHER_KEY, assetClass: "Other", category: "Other" };
  }
  return {
    key: categoryKey(fund.category.assetClass, fund.category.name),
    assetClass: fund.category.assetClass,
    category: fund.category.name,
  };
}

/**
 * Sum the latest uploaded positions for each (account, symbol) pair the portfolio selects.
 * Rows are matched on normalized symbols; several rows for one pair are added together.
 */
export function aggregatePositions(
  portfolio: Portfolio,
  uploadsByAccount: Map<string, AccountUpload>
): PositionTotal[] {
  const totals: PositionTotal[] = [];
  const seen = new Set<string>();

  for (const item of portfolio.items) {
    const symbol = normalizeSymbol(item.symbol);
    const pairId = JSON.stringify([item.accountNumber, symbol]);
    if (seen.has(pairId)) continue;
    seen.add(pairId);

    const upload = uploadsByAccount.get(item.accountNumber);
    if (!upload) continue;

    const rows = upload.positions.filter(
      (p) => p.accountNumber === item.accountNumber && normalizeSymbol(p.symbol) === symbol
    );
    if (rows.length === 0) continue;

    totals.push({
      accountNumber: item.accountNumber,
      symbol,
      value: rows.reduce((total, p) => total + currencyOrZero(p.currentValue), 0),
      quantity: rows.reduce((total, p) => total + currencyOrZero(p.quantity), 0),
    });
  }

  return totals;
}

function addTo(record: Record<string, number>, key: string, amount: number): void {
  record[key] = (record[key] ?? 0) + amount;
}

function roundValues(record: Record<string, number>): Record<string, number> {
  const rounded: Record<string, number> = {};
  for (const [key, value] of Object.entries(record)) {
    rounded[key] = roundHalfUp(value);
  }
  return rounded;
}

function compareLabels(a: { label: string }, b: { label: string }): number {
  if (a.label < b.label) return -1;
  if (a.label > b.label) return 1;
  return 0;
}

/**
 * Analyze a portfolio against its glidepath band.
 *
 * Produces per-category subtotals with current and (when a band with category targets matched)
 * target percentages. Categories the band targets appear even with no holdings, and held
 * categories the band does not mention get a 0% target.
 */
export function analyzeAllocation(input: AllocationInput): AllocationBreakdown {
  const { portfolio, uploadsByAccount, findFund, band, retirement } = input;

  if (portfolio.items.length === 0) {
    return emptyBreakdown(retirement);
  }

  const positions = aggregatePositions(portfolio, uploadsByAccount);
  const categories = new Map<string, CategoryAccumulator>();
  const classTotals: Record<string, number> = {};
  const categoryTotals: Record<string, number> = {};
  const tickerTotals: Record<string, number> = {};

  const getCategory = (key: CategoryKey, assetClass: string, category: string): CategoryAccumulator => {
    const id = categoryKeyId(key);
    let entry = categories.get(id);
    if (!entry) {
      entry = { key, assetClass, category, total: 0, symbols: new Map(), holdings: [] };
      categories.set(id, entry);
    }
    return entry;
  };

  for (const position of positions) {
    const fund = findFund(position.symbol);
    const { key, assetClass, category } = classifyFund(fund);
    const entry = getCategory(key, assetClass, category);

    entry.total += position.value;
    entry.symbols.set(position.symbol, (entry.symbols.get(position.symbol) ?? 0) + position.value);
    entry.holdings.push({ ...position, preference: fund?.preference });

    addTo(classTotals, assetClass, position.value);
    addTo(categoryTotals, categoryKeyLabel(key), position.value);
    addTo(tickerTotals, position.symbol, position.value);
  }

  const hasTarget = band !== null && band.categoryAllocations.length > 0;
  let classTargets: Record<string, number> | undefined;

  if (band) {
    classTargets = {};
    for (const alloc of band.classAllocations) {
      addTo(classTargets, alloc.assetClass, alloc.percentage);
    }
    for (const alloc of band.categoryAllocations) {
      const entry = getCategory(
        categoryKey(alloc.assetClass, alloc.category),
        alloc.assetClass,
        alloc.category
      );
      entry.targetPct = (entry.targetPct ?? 0) + alloc.percentage;
    }
  }

  const totalValue = positions.reduce((total, p) => total + p.value, 0);

  const categoryDetails: CategoryDetail[] = [...categories.values()].map((entry) => {
    const rawCurrentPct = totalValue > 0 ? (entry.total / totalValue) * 100 : 0;
    const detail: CategoryDetail = {
      key: entry.key,
      label: categoryKeyLabel(entry.key),
      assetClass: entry.assetClass,
      category: entry.category,
      subtotal: roundHalfUp(entry.total),
      currentPct: roundHalfUp(rawCurrentPct),
      rawSubtotal: entry.total,
      rawCurrentPct,
      symbols: [...entry.symbols.entries()]
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([ticker, value]) => ({ ticker, value: roundHalfUp(value) })),
      holdings: entry.holdings,
    };

    if (hasTarget) {
      const targetPct = entry.targetPct ?? 0;
      const targetValue = (totalValue * targetPct) / 100;
      detail.rawTargetPct = targetPct;
      detail.targetPct = roundHalfUp(targetPct);
      detail.targetValue = roundHalfUp(targetValue);
      detail.difference = roundHalfUp(targetValue - entry.total);
    }

    return detail;
  });

  categoryDetails.sort(compareLabels);

  return {
    totalValue: roundHalfUp(totalValue),
    positions: positions.map((p) => ({ ...p, value: roundHalfUp(p.value) })),
    categoryDetails,
    classBreakdown: roundValues(classTotals),
    categoryBreakdown: roundValues(categoryTotals),
    tickerBreakdown: roundValues(tickerTotals),
    classTargets,
    hasTarget,
    retirement,
  };
}
