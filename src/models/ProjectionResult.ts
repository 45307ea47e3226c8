/**
 * Retirement projection data structures
 */

export type WithdrawalMode = "percent" | "dollar";

export interface AgeBalance {
  age: number;
  balance: number;
}

export interface ProjectionResult {
  pessimistic: AgeBalance[];
  median: AgeBalance[];
  optimistic: AgeBalance[];
  percentiles: {
    pessimistic: number;
    median: number;
    optimistic: number;
  };
  probabilityOfSuccess: number; // percent of trials that never reached $0
  medianAtRetirement: number;
  medianAtEnd: number;
  totalContributions: number;
  withdrawalAtRetirement: number;
  startingBalance: number;
  currentAge: number;
  retirementAge: number;
  endAge: number;
  trials: number;
  pathNote: string;
  uploadDate: string | null;
  daysSinceUpload: number | null;
}

export const PERCENTILE_PATH_NOTE =
  "Each line is the percentile of all trial balances at that age, taken age by age. " +
  "A line is not the path of any single trial.";
