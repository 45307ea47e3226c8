import { ASSET_CLASSES, isAssetClassName } from "../models/AssetClass";
import {
  CategoryAllocation,
  ClassAllocation,
  GlidepathRule,
  MAX_RETIRE_AGE,
  MIN_RETIRE_AGE,
  RuleSet,
  describeRule,
} from "../models/Glidepath";
import { GlidepathImportError } from "../utils/errors";
import { roundHalfUp } from "../utils/math";

const GT_COLUMN = "gt-retire-age";
const LT_COLUMN = "lt-retire-age";
const PERCENT_EPSILON = 0.005;

/**
 * Weight of one allocation bucket in a band, as a fraction (0.6 = 60%).
 * `category` is absent for class-level bands.
 */
export interface AllocationWeight {
  assetClass: string;
  category?: string;
  weight: number;
}

/**
 * Find the band covering an age relative to retirement (gtRetireAge <= age < ltRetireAge).
 * Returns null when no band matches.
 */
export function findBand(rules: GlidepathRule[], yearsToRetirement: number): GlidepathRule | null {
  return (
    rules.find(
      (rule) => rule.gtRetireAge <= yearsToRetirement && yearsToRetirement < rule.ltRetireAge
    ) ?? null
  );
}

/**
 * Weights the projector samples for a band: category rows when the band has them,
 * otherwise the class rows.
 */
export function getAllocationWeights(rule: GlidepathRule): AllocationWeight[] {
  if (rule.categoryAllocations.length > 0) {
    return rule.categoryAllocations
      .filter((alloc) => alloc.percentage > 0)
      .map((alloc) => ({
        assetClass: alloc.assetClass,
        category: alloc.category,
        weight: alloc.percentage / 100,
      }));
  }
  return rule.classAllocations
    .filter((alloc) => alloc.percentage > 0)
    .map((alloc) => ({ assetClass: alloc.assetClass, weight: alloc.percentage / 100 }));
}

function differs(a: number, b: number): boolean {
  return Math.abs(a - b) > PERCENT_EPSILON;
}

function sumPercent(allocations: Array<{ percentage: number }>): number {
  return roundHalfUp(allocations.reduce((total, a) => total + a.percentage, 0));
}

/**
 * Check the invariants every stored rule set must satisfy:
 * bands tile [-100, 100) with no gaps or overlaps, class percentages total 100,
 * and each class's category percentages add up to that class's percentage.
 *
 * @returns Problems found; empty when the rule set is valid
 */
export function validateRuleSet(rules: GlidepathRule[]): string[] {
  if (rules.length === 0) {
    return ["Rule set has no bands"];
  }

  const problems: string[] = [];
  const sorted = [...rules].sort((a, b) => a.gtRetireAge - b.gtRetireAge);

  if (sorted[0].gtRetireAge !== MIN_RETIRE_AGE) {
    problems.push(`Bands must start at ${MIN_RETIRE_AGE} (first band starts at ${sorted[0].gtRetireAge})`);
  }
  const last = sorted[sorted.length - 1];
  if (last.ltRetireAge !== MAX_RETIRE_AGE) {
    problems.push(`Bands must end at ${MAX_RETIRE_AGE} (last band ends at ${last.ltRetireAge})`);
  }

  sorted.forEach((rule, index) => {
    const label = describeRule(rule);
    if (rule.gtRetireAge >= rule.ltRetireAge) {
      problems.push(`Band ${label} is empty`);
    }

    if (index > 0) {
      const previous = sorted[index - 1];
      if (rule.gtRetireAge > previous.ltRetireAge) {
        problems.push(`Gap between ${previous.ltRetireAge} and ${rule.gtRetireAge}`);
      } else if (rule.gtRetireAge < previous.ltRetireAge) {
        problems.push(`Band ${label} overlaps ${describeRule(previous)}`);
      }
    }

    const classTotal = sumPercent(rule.classAllocations);
    if (differs(classTotal, 100)) {
      problems.push(`Band ${label}: class allocations total ${classTotal}%`);
    }

    if (rule.categoryAllocations.length > 0) {
      const classNames = new Set<string>([
        ...rule.classAllocations.map((a) => a.assetClass),
        ...rule.categoryAllocations.map((a) => a.assetClass),
      ]);
      for (const className of classNames) {
        const classPct = sumPercent(rule.classAllocations.filter((a) => a.assetClass === className));
        const categoryPct = sumPercent(
          rule.categoryAllocations.filter((a) => a.assetClass === className)
        );
        if (differs(classPct, categoryPct)) {
          problems.push(
            `Band ${label}: category allocations for ${className} (${categoryPct}%) do not match class allocation (${classPct}%)`
          );
        }
      }
    }
  });

  return problems;
}

function parsePercent(value: string | undefined, column: string): number {
  if (value === undefined) {
    return 0;
  }
  let text = value.trim();
  if (text === "") {
    return 0;
  }
  if (text.endsWith("%")) {
    text = text.slice(0, -1).trim();
  }
  const parsed = Number(text);
  if (text === "" || !Number.isFinite(parsed)) {
    throw new GlidepathImportError(`Invalid percentage '${value}' in column '${column}'`);
  }
  return roundHalfUp(parsed);
}

function parseAge(value: string | undefined, column: string): number {
  const text = (value ?? "").trim();
  if (!/^[+-]?\d+$/.test(text)) {
    throw new GlidepathImportError(`Invalid age '${value ?? ""}' in column '${column}'`);
  }
  return Number(text);
}

/**
 * Build a rule set from tabular rows, e.g.
 * `{ "gt-retire-age": "-100", "lt-retire-age": "-20", "Stocks": "90%", "Stocks:US Large Cap": "90%", ... }`.
 *
 * Ages are clamped to [-100, 100]. A missing "Other" column absorbs whatever the named
 * classes leave short of 100%. The resulting bands must tile the full age range.
 */
export function importRuleSetRows(
  id: string,
  name: string,
  rows: Array<Record<string, string>>
): RuleSet {
  if (rows.length === 0) {
    throw new GlidepathImportError("No glidepath rows provided");
  }

  const columns: string[] = [];
  for (const row of rows) {
    for (const column of Object.keys(row)) {
      if (!columns.includes(column)) columns.push(column);
    }
  }

  if (!columns.includes(GT_COLUMN) || !columns.includes(LT_COLUMN)) {
    throw new GlidepathImportError(`Missing required columns: ${GT_COLUMN} and ${LT_COLUMN}`);
  }
  const classColumns = columns.filter((c) => isAssetClassName(c));
  const categoryColumns = columns.filter((c) => c.includes(":"));

  const rules: GlidepathRule[] = rows.map((row) => {
    const gt = Math.max(MIN_RETIRE_AGE, parseAge(row[GT_COLUMN], GT_COLUMN));
    const lt = Math.min(MAX_RETIRE_AGE, parseAge(row[LT_COLUMN], LT_COLUMN));
    if (gt >= lt) {
      throw new GlidepathImportError(`${GT_COLUMN} must be less than ${LT_COLUMN} (${gt} to ${lt})`);
    }

    const classPcts = new Map<string, number>();
    let classTotal = 0;
    for (const column of classColumns) {
      const pct = parsePercent(row[column], column);
      if (pct !== 0) {
        classPcts.set(column, pct);
        classTotal = roundHalfUp(classTotal + pct);
      }
    }
    if (classTotal > 100) {
      throw new GlidepathImportError(`Class allocations exceed 100% (${gt} to ${lt})`);
    }
    if (!classPcts.has("Other") && classTotal < 100) {
      classPcts.set("Other", roundHalfUp(100 - classTotal));
      classTotal = 100;
    }
    if (differs(classTotal, 100)) {
      throw new GlidepathImportError(`Class allocations must total 100% (${gt} to ${lt})`);
    }

    const categoryAllocations: CategoryAllocation[] = [];
    let categoryTotal = 0;
    for (const column of categoryColumns) {
      const separator = column.indexOf(":");
      const assetClass = column.slice(0, separator);
      const category = column.slice(separator + 1);
      if (!isAssetClassName(assetClass)) {
        throw new GlidepathImportError(`Invalid asset class '${assetClass}' in column '${column}'`);
      }
      const pct = parsePercent(row[column], column);
      if (pct !== 0) {
        categoryAllocations.push({ assetClass, category, percentage: pct });
        categoryTotal = roundHalfUp(categoryTotal + pct);
      }
    }
    if (differs(categoryTotal, 100)) {
      throw new GlidepathImportError(`Category allocations must total 100% (${gt} to ${lt})`);
    }

    const classesWithCategories = new Set(categoryAllocations.map((a) => a.assetClass));
    for (const assetClass of classesWithCategories) {
      const categorySum = sumPercent(categoryAllocations.filter((a) => a.assetClass === assetClass));
      const classPct = classPcts.get(assetClass) ?? 0;
      if (differs(categorySum, classPct)) {
        throw new GlidepathImportError(
          `Category allocations for ${assetClass} (${categorySum}%) do not match class allocation (${classPct}%)`
        );
      }
    }

    const classAllocations: ClassAllocation[] = [...classPcts.entries()].map(
      ([assetClass, percentage]) => ({ assetClass, percentage })
    );

    return { gtRetireAge: gt, ltRetireAge: lt, classAllocations, categoryAllocations };
  });

  const problems = validateRuleSet(rules);
  if (problems.length > 0) {
    throw new GlidepathImportError(problems.join("; "));
  }

  return {
    id,
    name,
    rules: [...rules].sort((a, b) => a.gtRetireAge - b.gtRetireAge),
  };
}

function formatPercent(value: number): string {
  return `${roundHalfUp(value).toFixed(2)}%`;
}

/**
 * Tabular form of a rule set, one row per band, every class and category column present.
 */
export function exportRuleSetRows(ruleSet: RuleSet): {
  columns: string[];
  rows: Array<Record<string, string>>;
} {
  const classNames = new Set<string>(ASSET_CLASSES);
  const categoryColumns = new Set<string>();
  for (const rule of ruleSet.rules) {
    rule.classAllocations.forEach((a) => classNames.add(a.assetClass));
    rule.categoryAllocations.forEach((a) => {
      classNames.add(a.assetClass);
      categoryColumns.add(`${a.assetClass}:${a.category}`);
    });
  }

  const sortedClasses = [...classNames].sort();
  const sortedCategories = [...categoryColumns].sort();
  const columns = [GT_COLUMN, LT_COLUMN, ...sortedClasses, ...sortedCategories];

  const rows = [...ruleSet.rules]
    .sort((a, b) => a.gtRetireAge - b.gtRetireAge)
    .map((rule) => {
      const row: Record<string, string> = {
        [GT_COLUMN]: String(rule.gtRetireAge),
        [LT_COLUMN]: String(rule.ltRetireAge),
      };
      for (const className of sortedClasses) {
        const pct = rule.classAllocations
          .filter((a) => a.assetClass === className)
          .reduce((total, a) => total + a.percentage, 0);
        row[className] = formatPercent(pct);
      }
      for (const column of sortedCategories) {
        const pct = rule.categoryAllocations
          .filter((a) => `${a.assetClass}:${a.category}` === column)
          .reduce((total, a) => total + a.percentage, 0);
        row[column] = formatPercent(pct);
      }
      return row;
    });

  return { columns, rows };
}
