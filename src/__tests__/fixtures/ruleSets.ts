import { CategoryAllocation, ClassAllocation, GlidepathRule, RuleSet } from '../../models/Glidepath';

/**
 * One band covering the whole age range, class totals derived from the categories.
 */
export function singleBand(categoryAllocations: CategoryAllocation[]): GlidepathRule {
  const byClass = new Map<string, number>();
  for (const alloc of categoryAllocations) {
    byClass.set(alloc.assetClass, (byClass.get(alloc.assetClass) ?? 0) + alloc.percentage);
  }
  const classAllocations: ClassAllocation[] = [...byClass.entries()].map(([assetClass, percentage]) => ({
    assetClass,
    percentage,
  }));
  return { gtRetireAge: -100, ltRetireAge: 100, classAllocations, categoryAllocations };
}

/** Large Cap 60 / Treasury 40 at every age */
export const sixtyForty: GlidepathRule = singleBand([
  { assetClass: 'Stocks', category: 'Large Cap', percentage: 60 },
  { assetClass: 'Bonds', category: 'Treasury', percentage: 40 },
]);

export const categoryRules: GlidepathRule[] = [
  {
    gtRetireAge: -100,
    ltRetireAge: -10,
    classAllocations: [
      { assetClass: 'Stocks', percentage: 70 },
      { assetClass: 'Bonds', percentage: 30 },
    ],
    categoryAllocations: [
      { assetClass: 'Stocks', category: 'Large Cap', percentage: 50 },
      { assetClass: 'Stocks', category: 'International', percentage: 20 },
      { assetClass: 'Bonds', category: 'Treasury', percentage: 30 },
    ],
  },
  {
    gtRetireAge: -10,
    ltRetireAge: 0,
    classAllocations: [
      { assetClass: 'Stocks', percentage: 60 },
      { assetClass: 'Bonds', percentage: 40 },
    ],
    categoryAllocations: [
      { assetClass: 'Stocks', category: 'Large Cap', percentage: 40 },
      { assetClass: 'Stocks', category: 'International', percentage: 20 },
      { assetClass: 'Bonds', category: 'Treasury', percentage: 40 },
    ],
  },
  {
    gtRetireAge: 0,
    ltRetireAge: 100,
    classAllocations: [
      { assetClass: 'Stocks', percentage: 40 },
      { assetClass: 'Bonds', percentage: 60 },
    ],
    categoryAllocations: [
      { assetClass: 'Stocks', category: 'Large Cap', percentage: 30 },
      { assetClass: 'Stocks', category: 'International', percentage: 10 },
      { assetClass: 'Bonds', category: 'Treasury', percentage: 60 },
    ],
  },
];

export const classOnlyRules: GlidepathRule[] = [
  {
    gtRetireAge: -100,
    ltRetireAge: 0,
    classAllocations: [
      { assetClass: 'Stocks', percentage: 80 },
      { assetClass: 'Bonds', percentage: 20 },
    ],
    categoryAllocations: [],
  },
  {
    gtRetireAge: 0,
    ltRetireAge: 100,
    classAllocations: [
      { assetClass: 'Stocks', percentage: 40 },
      { assetClass: 'Bonds', percentage: 60 },
    ],
    categoryAllocations: [],
  },
];

export const sixtyFortyRuleSet: RuleSet = {
  id: 'rs-60-40',
  name: '60/40',
  rules: [sixtyForty],
};
