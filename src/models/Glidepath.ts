/**
 * Glidepath rule set data structures.
 * Ages are relative to retirement: -10 means ten years before retirement.
 */

export const MIN_RETIRE_AGE = -100;
export const MAX_RETIRE_AGE = 100;

export interface ClassAllocation {
  assetClass: string;
  percentage: number;
}

export interface CategoryAllocation {
  assetClass: string;
  category: string;
  percentage: number;
}

/**
 * One age band, covering gtRetireAge <= age < ltRetireAge
 */
export interface GlidepathRule {
  gtRetireAge: number;
  ltRetireAge: number;
  classAllocations: ClassAllocation[];
  categoryAllocations: CategoryAllocation[];
}

export interface RuleSet {
  id: string;
  name: string;
  rules: GlidepathRule[];
}

export function describeRule(rule: GlidepathRule): string {
  return `${rule.gtRetireAge} to ${rule.ltRetireAge}`;
}
