import {
  AssumptionData,
  CategoryAssumptionMapping,
  CategoryKey,
  categoryKey,
  categoryKeyId,
} from "../models/AssetClass";
import { Fund } from "../models/Fund";
import { RuleSet } from "../models/Glidepath";
import { Portfolio } from "../models/Portfolio";
import { AccountUpload } from "../models/Position";
import { normalizeSymbol } from "../utils/currency";
import { ValidationError } from "../utils/errors";
import { WorkspaceSchema } from "../utils/validation";
import { PlannerStore } from "./types";

function fundKey(fund: Fund): CategoryKey | null {
  return fund.category ? categoryKey(fund.category.assetClass, fund.category.name) : null;
}

/**
 * Map-backed implementation of every store contract.
 * Used by the HTTP layer and the CLI, which both receive the whole workspace as JSON.
 */
export class InMemoryStore implements PlannerStore {
  private uploads: AccountUpload[] = [];
  private funds = new Map<string, Fund>();
  private ruleSets = new Map<string, RuleSet>();
  private portfolios = new Map<string, Portfolio>();
  private assumptionData: AssumptionData[] = [];
  private categoryMappings: CategoryAssumptionMapping[] = [];

  /**
   * A re-upload of the same file by the same user replaces the earlier snapshot.
   */
  saveUpload(upload: AccountUpload): void {
    this.uploads = this.uploads.filter(
      (existing) => !(existing.userId === upload.userId && existing.filename === upload.filename)
    );
    this.uploads.push(upload);
  }

  /**
   * Greatest uploadedAt wins; on a tie the upload saved last wins.
   */
  latestUpload(userId: string, accountNumber: string): AccountUpload | undefined {
    let latest: AccountUpload | undefined;
    for (const upload of this.uploads) {
      if (upload.userId !== userId) continue;
      if (!upload.positions.some((p) => p.accountNumber === accountNumber)) continue;
      if (!latest || upload.uploadedAt.getTime() >= latest.uploadedAt.getTime()) {
        latest = upload;
      }
    }
    return latest;
  }

  saveFund(fund: Fund): void {
    this.funds.set(normalizeSymbol(fund.ticker), fund);
  }

  findFund(ticker: string): Fund | undefined {
    return this.funds.get(normalizeSymbol(ticker));
  }

  fundsInCategory(key: CategoryKey): Fund[] {
    const id = categoryKeyId(key);
    return [...this.funds.values()].filter((fund) => {
      const own = fundKey(fund);
      return own !== null && categoryKeyId(own) === id;
    });
  }

  getRuleSet(id: string): RuleSet | undefined {
    return this.ruleSets.get(id);
  }

  /**
   * A rule set with the same name as a stored one replaces it and takes over its id.
   */
  saveRuleSet(ruleSet: RuleSet): RuleSet {
    const existing = [...this.ruleSets.values()].find((stored) => stored.name === ruleSet.name);
    const saved = existing ? { ...ruleSet, id: existing.id } : ruleSet;
    this.ruleSets.set(saved.id, saved);
    return saved;
  }

  savePortfolio(portfolio: Portfolio): void {
    this.portfolios.set(portfolio.id, portfolio);
  }

  getPortfolio(id: string): Portfolio | undefined {
    return this.portfolios.get(id);
  }

  saveAssumptionData(data: AssumptionData): void {
    this.assumptionData = [...this.assumptionData.filter((d) => d.id !== data.id), data];
  }

  getAssumptionData(): AssumptionData[] {
    return this.assumptionData;
  }

  saveCategoryMapping(mapping: CategoryAssumptionMapping): void {
    const id = categoryKeyId(categoryKey(mapping.assetClass, mapping.category));
    this.categoryMappings = [
      ...this.categoryMappings.filter(
        (m) => categoryKeyId(categoryKey(m.assetClass, m.category)) !== id
      ),
      mapping,
    ];
  }

  getCategoryMappings(): CategoryAssumptionMapping[] {
    return this.categoryMappings;
  }
}

/**
 * Build a store from a workspace document (parsed JSON).
 *
 * @throws ValidationError when the document does not match the workspace schema
 */
export function loadWorkspace(document: unknown): InMemoryStore {
  const parsed = WorkspaceSchema.safeParse(document);
  if (!parsed.success) {
    throw ValidationError.fromZod("Invalid workspace", parsed.error);
  }

  const workspace = parsed.data;
  const store = new InMemoryStore();
  workspace.uploads.forEach((upload) => store.saveUpload(upload));
  workspace.funds.forEach((fund) => store.saveFund(fund));
  workspace.ruleSets.forEach((ruleSet) => store.saveRuleSet(ruleSet));
  workspace.portfolios.forEach((portfolio) => store.savePortfolio(portfolio));
  workspace.assumptionData.forEach((data) => store.saveAssumptionData(data));
  workspace.categoryMappings.forEach((mapping) => store.saveCategoryMapping(mapping));
  return store;
}
