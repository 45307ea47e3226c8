import { AssumptionData, CategoryAssumptionMapping, CategoryKey } from "../models/AssetClass";
import { Fund } from "../models/Fund";
import { RuleSet } from "../models/Glidepath";
import { Portfolio } from "../models/Portfolio";
import { AccountUpload } from "../models/Position";

/**
 * Lookups the planner needs from the outside world. Every method is synchronous;
 * implementations backed by a database load what they need up front.
 */

export interface PositionStore {
  /**
   * Most recent upload of the user's that contains the account, or undefined.
   */
  latestUpload(userId: string, accountNumber: string): AccountUpload | undefined;
  saveUpload(upload: AccountUpload): void;
}

export interface FundCatalog {
  /** Lookup by ticker; the ticker is normalized before matching. */
  findFund(ticker: string): Fund | undefined;
  fundsInCategory(key: CategoryKey): Fund[];
}

export interface GlidepathStore {
  getRuleSet(id: string): RuleSet | undefined;
  saveRuleSet(ruleSet: RuleSet): RuleSet;
}

export interface AssumptionStore {
  getAssumptionData(): AssumptionData[];
  getCategoryMappings(): CategoryAssumptionMapping[];
}

export interface PortfolioStore {
  getPortfolio(id: string): Portfolio | undefined;
}

export type PlannerStore = PositionStore & FundCatalog & GlidepathStore & AssumptionStore & PortfolioStore;
