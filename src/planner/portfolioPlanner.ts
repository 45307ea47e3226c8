import { AllocationBreakdown } from "../models/AllocationBreakdown";
import { GlidepathRule } from "../models/Glidepath";
import {
  Portfolio,
  RetirementStatus,
  getPortfolioAccounts,
  getRetirementStatus,
} from "../models/Portfolio";
import { AccountUpload } from "../models/Position";
import { ProjectionResult } from "../models/ProjectionResult";
import { RebalancePlan } from "../models/RebalancePlan";
import { findBand } from "../engine/glidepath";
import { createAssumptionTable, runProjection } from "../engine/montecarlo";
import { analyzeAllocation } from "../engine/portfolio";
import { planRebalance } from "../engine/rebalancer";
import { PlannerStore } from "../store/types";
import { AppConfig } from "../utils/config";
import { NotFoundError, ValidationError } from "../utils/errors";
import { daysBetween, getCurrentYear } from "../utils/time";
import { TolerancePctSchema, createProjectionParamsSchema } from "../utils/validation";

/**
 * Planner dependencies.
 *
 * @property now - Clock for ages and upload freshness; defaults to the wall clock
 */
interface PlannerContext {
  store: PlannerStore;
  config: AppConfig;
  now?: () => Date;
}

export interface ProjectionOptions {
  signal?: AbortSignal;
}

/**
 * Joins the stores to the three engines: allocation analysis, rebalancing and
 * retirement projection, all keyed by portfolio id.
 */
export class PortfolioPlanner {
  private context: PlannerContext;

  constructor(context: PlannerContext) {
    this.context = context;
  }

  private now(): Date {
    return this.context.now ? this.context.now() : new Date();
  }

  private requirePortfolio(portfolioId: string): Portfolio {
    const portfolio = this.context.store.getPortfolio(portfolioId);
    if (!portfolio) {
      throw new NotFoundError(`Portfolio '${portfolioId}' not found`);
    }
    return portfolio;
  }

  private latestUploads(portfolio: Portfolio): Map<string, AccountUpload> {
    const uploads = new Map<string, AccountUpload>();
    for (const accountNumber of getPortfolioAccounts(portfolio)) {
      const upload = this.context.store.latestUpload(portfolio.userId, accountNumber);
      if (upload) {
        uploads.set(accountNumber, upload);
      }
    }
    return uploads;
  }

  private rulesFor(portfolio: Portfolio): GlidepathRule[] | null {
    if (!portfolio.ruleSetId) {
      return null;
    }
    return this.context.store.getRuleSet(portfolio.ruleSetId)?.rules ?? null;
  }

  private bandFor(portfolio: Portfolio, retirement: RetirementStatus | null): GlidepathRule | null {
    const rules = this.rulesFor(portfolio);
    if (!rules || !retirement) {
      return null;
    }
    return findBand(rules, retirement.yearsToRetirement);
  }

  private analyze(portfolio: Portfolio, uploadsByAccount: Map<string, AccountUpload>): AllocationBreakdown {
    const retirement = getRetirementStatus(portfolio, getCurrentYear(this.now()));
    return analyzeAllocation({
      portfolio,
      uploadsByAccount,
      findFund: (ticker) => this.context.store.findFund(ticker),
      band: this.bandFor(portfolio, retirement),
      retirement,
    });
  }

  /**
   * Current allocation of a portfolio against its glidepath band.
   * Missing rule set, birth year or retirement age simply leave the target fields out.
   */
  analyzePortfolio(portfolioId: string): AllocationBreakdown {
    const portfolio = this.requirePortfolio(portfolioId);
    return this.analyze(portfolio, this.latestUploads(portfolio));
  }

  planRebalance(portfolioId: string, tolerancePct: number = this.context.config.defaultTolerancePct): RebalancePlan {
    const parsed = TolerancePctSchema.safeParse(tolerancePct);
    if (!parsed.success) {
      throw ValidationError.fromZod("Invalid tolerance", parsed.error);
    }
    const breakdown = this.analyzePortfolio(portfolioId);
    return planRebalance(breakdown, parsed.data, (key) => this.context.store.fundsInCategory(key));
  }

  /**
   * Monte Carlo projection from the portfolio's current value.
   *
   * @throws ValidationError for bad parameters or a portfolio missing its rule set, birth year or retirement age
   * @throws SimulationCancelledError when the signal aborts or the configured timeout passes
   */
  runProjection(portfolioId: string, params: unknown, options: ProjectionOptions = {}): ProjectionResult {
    const { config, store } = this.context;
    const parsed = createProjectionParamsSchema(config).safeParse(params);
    if (!parsed.success) {
      throw ValidationError.fromZod("Invalid projection parameters", parsed.error);
    }
    const values = parsed.data;

    const portfolio = this.requirePortfolio(portfolioId);
    const rules = this.rulesFor(portfolio);
    if (!rules || portfolio.yearBorn === undefined || portfolio.retirementAge === undefined) {
      throw new ValidationError(
        "Projection needs a glidepath rule set, birth year and retirement age on the portfolio"
      );
    }

    const now = this.now();
    const currentAge = getCurrentYear(now) - portfolio.yearBorn;
    if (values.endAge <= currentAge) {
      throw new ValidationError(`End age must be greater than current age (${currentAge})`, [
        { path: "endAge", message: `must be greater than ${currentAge}` },
      ]);
    }

    const uploadsByAccount = this.latestUploads(portfolio);
    const breakdown = this.analyze(portfolio, uploadsByAccount);

    const freshest = [...uploadsByAccount.values()].reduce<AccountUpload | null>(
      (latest, upload) =>
        !latest || upload.uploadedAt.getTime() > latest.uploadedAt.getTime() ? upload : latest,
      null
    );

    const summary = runProjection({
      startingBalance: breakdown.totalValue,
      currentAge,
      retirementAge: portfolio.retirementAge,
      annualContribution: values.contribution,
      withdrawalMode: values.withdrawalMode,
      withdrawalAmount: values.withdrawalAmount,
      inflationRate: values.inflationRate,
      rules,
      endAge: values.endAge,
      trials: values.trials,
      pessimisticPercentile: values.pessimisticPercentile,
      optimisticPercentile: values.optimisticPercentile,
      assumptions: createAssumptionTable(
        config.assetClassAssumptions,
        store.getCategoryMappings(),
        store.getAssumptionData()
      ),
      seed: values.seed,
      signal: options.signal,
      deadline: config.simulationTimeoutMs > 0 ? Date.now() + config.simulationTimeoutMs : undefined,
    });

    return {
      ...summary,
      uploadDate: freshest ? freshest.uploadedAt.toISOString() : null,
      daysSinceUpload: freshest ? daysBetween(freshest.uploadedAt, now) : null,
    };
  }
}
