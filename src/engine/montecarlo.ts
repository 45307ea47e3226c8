import {
  AssetClassAssumptions,
  AssumptionData,
  CategoryAssumptionMapping,
  ReturnAssumption,
  categoryKey,
  categoryKeyId,
  getHorizonAssumption,
} from "../models/AssetClass";
import { GlidepathRule } from "../models/Glidepath";
import {
  AgeBalance,
  PERCENTILE_PATH_NOTE,
  ProjectionResult,
  WithdrawalMode,
} from "../models/ProjectionResult";
import { SimulationCancelledError } from "../utils/errors";
import { inflate, median, percentileOfSorted } from "../utils/math";
import { AllocationWeight, findBand, getAllocationWeights } from "./glidepath";
import { RandomSource, createRandomSource, offsetSeed, sampleNormal } from "./random";

/**
 * Monte Carlo simulation parameters
 */
export const TRIAL_BATCH_SIZE = 250;

/**
 * One weighted return draw for a simulated year
 */
export interface WeightedAssumption extends ReturnAssumption {
  weight: number;
}

/**
 * Return assumptions by category, resolved once before any trial runs.
 */
export interface AssumptionTable {
  resolve(weight: Pick<AllocationWeight, "assetClass" | "category">): ReturnAssumption | null;
}

/**
 * Build the assumption lookup: a category mapped to a complete horizon slice of uploaded
 * assumption data uses that slice; everything else falls back to its class default.
 * Buckets whose class has no default resolve to null and contribute no return.
 */
export function createAssumptionTable(
  classDefaults: AssetClassAssumptions,
  mappings: CategoryAssumptionMapping[] = [],
  assumptionData: AssumptionData[] = []
): AssumptionTable {
  const dataById = new Map(assumptionData.map((data) => [data.id, data]));
  const overrides = new Map<string, ReturnAssumption>();

  for (const mapping of mappings) {
    if (!mapping.assumptionDataId) continue;
    const data = dataById.get(mapping.assumptionDataId);
    if (!data) continue;
    const assumption = getHorizonAssumption(data, mapping.horizon);
    if (assumption) {
      overrides.set(categoryKeyId(categoryKey(mapping.assetClass, mapping.category)), assumption);
    }
  }

  return {
    resolve({ assetClass, category }) {
      if (category !== undefined) {
        const override = overrides.get(categoryKeyId(categoryKey(assetClass, category)));
        if (override) return override;
      }
      return classDefaults[assetClass] ?? null;
    },
  };
}

/**
 * Per-year draws from current age + 1 through end age, indexed by year offset (0 = first simulated year).
 * Each band is resolved once and shared by every age it covers.
 */
export function buildAllocationSchedule(
  rules: GlidepathRule[],
  currentAge: number,
  retirementAge: number,
  endAge: number,
  assumptions: AssumptionTable
): WeightedAssumption[][] {
  const byBand = new Map<GlidepathRule, WeightedAssumption[]>();
  const schedule: WeightedAssumption[][] = [];

  for (let age = currentAge + 1; age <= endAge; age++) {
    const band = findBand(rules, age - retirementAge);
    if (!band) {
      schedule.push([]);
      continue;
    }
    let draws = byBand.get(band);
    if (!draws) {
      draws = [];
      for (const weight of getAllocationWeights(band)) {
        const assumption = assumptions.resolve(weight);
        if (assumption) {
          draws.push({ weight: weight.weight, ...assumption });
        }
      }
      byBand.set(band, draws);
    }
    schedule.push(draws);
  }

  return schedule;
}

/**
 * Cash-flow and horizon settings shared by every trial
 */
export interface TrialSettings {
  startingBalance: number;
  currentAge: number;
  retirementAge: number;
  annualContribution: number;
  withdrawalMode: WithdrawalMode;
  withdrawalAmount: number; // percent of balance (4 = 4%) or dollars in today's money
  inflationRate: number;
}

export interface TrialOutcome {
  balances: number[]; // index 0 = current age
  success: boolean;
  firstWithdrawal: number | null;
}

/**
 * Sample one year's portfolio return: Σ weight × N(mean, stdDev)
 */
export function samplePortfolioReturn(draws: WeightedAssumption[], random: RandomSource): number {
  let portfolioReturn = 0;
  for (const draw of draws) {
    portfolioReturn += draw.weight * sampleNormal(random, draw.meanReturn, draw.stdDev);
  }
  return portfolioReturn;
}

/**
 * Run a single annual-step path.
 *
 * Before retirement the year's contribution (the base amount grown by inflation each year)
 * is added after returns. From the retirement year on a withdrawal is taken: percent mode fixes
 * it from the balance in the first retirement year and then indexes it to inflation; dollar mode
 * grows today's amount by inflation up to each year. A depleted balance stays at zero.
 */
export function simulateTrial(
  settings: TrialSettings,
  schedule: WeightedAssumption[][],
  random: RandomSource
): TrialOutcome {
  const { currentAge, retirementAge, inflationRate } = settings;
  let balance = settings.startingBalance;
  let depleted = false;
  let withdrawal: number | null = null;
  let firstWithdrawal: number | null = null;
  let success = balance > 0;
  const balances: number[] = [balance];

  schedule.forEach((draws, yearIndex) => {
    const age = currentAge + 1 + yearIndex;

    if (depleted) {
      balances.push(0);
      return;
    }

    balance *= 1 + samplePortfolioReturn(draws, random);

    if (age < retirementAge) {
      balance += inflate(settings.annualContribution, inflationRate, yearIndex);
    } else {
      if (settings.withdrawalMode === "percent") {
        withdrawal =
          withdrawal === null
            ? Math.max(0, balance) * (settings.withdrawalAmount / 100)
            : withdrawal * (1 + inflationRate);
      } else {
        withdrawal = inflate(settings.withdrawalAmount, inflationRate, age - currentAge);
      }
      if (firstWithdrawal === null) {
        firstWithdrawal = withdrawal;
      }
      balance -= withdrawal;
    }

    if (balance <= 0) {
      balance = 0;
      depleted = true;
      success = false;
    }
    balances.push(balance);
  });

  return { balances, success, firstWithdrawal };
}

/**
 * Run `count` independent trials from one random stream.
 * Batches with different seeds can run anywhere and be concatenated before summarizing.
 *
 * @param checkpoint - Called before each trial with the number already finished; throws to stop
 */
export function simulateTrials(
  settings: TrialSettings,
  schedule: WeightedAssumption[][],
  count: number,
  seed?: number,
  checkpoint?: (completed: number) => void
): TrialOutcome[] {
  const random = createRandomSource(seed);
  const outcomes: TrialOutcome[] = [];
  for (let i = 0; i < count; i++) {
    checkpoint?.(i);
    outcomes.push(simulateTrial(settings, schedule, random));
  }
  return outcomes;
}

/**
 * Percentile of the trial balances at each age, computed column by column.
 * The resulting lines are not paths any single trial followed.
 */
export function percentilePaths(
  outcomes: TrialOutcome[],
  currentAge: number,
  percentiles: number[]
): AgeBalance[][] {
  const steps = outcomes[0]?.balances.length ?? 0;
  const paths: AgeBalance[][] = percentiles.map(() => []);

  for (let step = 0; step < steps; step++) {
    const column = outcomes.map((o) => o.balances[step]).sort((a, b) => a - b);
    percentiles.forEach((p, index) => {
      paths[index].push({ age: currentAge + step, balance: percentileOfSorted(column, p) });
    });
  }

  return paths;
}

export interface ProjectionInput extends TrialSettings {
  rules: GlidepathRule[];
  endAge: number;
  trials: number;
  pessimisticPercentile: number;
  optimisticPercentile: number;
  assumptions: AssumptionTable;
  seed?: number;
  signal?: AbortSignal;
  deadline?: number; // epoch milliseconds
}

export type ProjectionSummary = Omit<ProjectionResult, "uploadDate" | "daysSinceUpload">;

/**
 * Total contributions over the pre-retirement years, inflation growth included
 */
export function totalContributions(settings: TrialSettings, endAge: number): number {
  let total = 0;
  const lastContributionAge = Math.min(endAge, settings.retirementAge - 1);
  for (let age = settings.currentAge + 1; age <= lastContributionAge; age++) {
    total += inflate(settings.annualContribution, settings.inflationRate, age - settings.currentAge - 1);
  }
  return total;
}

/**
 * Run the full projection: build the allocation schedule once, run all trials in seeded batches,
 * then extract per-age percentiles and summary figures.
 *
 * @throws SimulationCancelledError when the signal aborts or the deadline passes mid-run
 */
export function runProjection(input: ProjectionInput): ProjectionSummary {
  const schedule = buildAllocationSchedule(
    input.rules,
    input.currentAge,
    input.retirementAge,
    input.endAge,
    input.assumptions
  );

  const checkpoint = (completedInBatch: number, batchStart: number) => {
    const completed = batchStart + completedInBatch;
    if (input.signal?.aborted) {
      throw new SimulationCancelledError(`Projection cancelled after ${completed} trials`, completed);
    }
    if (input.deadline !== undefined && Date.now() > input.deadline) {
      throw new SimulationCancelledError(`Projection timed out after ${completed} trials`, completed);
    }
  };

  const outcomes: TrialOutcome[] = [];
  for (let batchStart = 0, batch = 0; batchStart < input.trials; batchStart += TRIAL_BATCH_SIZE, batch++) {
    const count = Math.min(TRIAL_BATCH_SIZE, input.trials - batchStart);
    outcomes.push(
      ...simulateTrials(input, schedule, count, offsetSeed(input.seed, batch), (done) =>
        checkpoint(done, batchStart)
      )
    );
  }

  const percentiles = {
    pessimistic: input.pessimisticPercentile,
    median: 50,
    optimistic: input.optimisticPercentile,
  };
  const [pessimistic, medianPath, optimistic] = percentilePaths(outcomes, input.currentAge, [
    percentiles.pessimistic,
    percentiles.median,
    percentiles.optimistic,
  ]);

  const lastIndex = input.endAge - input.currentAge;
  const retirementIndex = Math.min(Math.max(input.retirementAge - input.currentAge, 0), lastIndex);
  const successful = outcomes.filter((o) => o.success).length;

  return {
    pessimistic,
    median: medianPath,
    optimistic,
    percentiles,
    probabilityOfSuccess: (successful / outcomes.length) * 100,
    medianAtRetirement: median(outcomes.map((o) => o.balances[retirementIndex])),
    medianAtEnd: median(outcomes.map((o) => o.balances[lastIndex])),
    totalContributions: totalContributions(input, input.endAge),
    withdrawalAtRetirement: median(outcomes.map((o) => o.firstWithdrawal ?? 0)),
    startingBalance: input.startingBalance,
    currentAge: input.currentAge,
    retirementAge: input.retirementAge,
    endAge: input.endAge,
    trials: outcomes.length,
    pathNote: PERCENTILE_PATH_NOTE,
  };
}
