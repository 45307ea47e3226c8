import * as fs from "fs";
import * as path from "path";
import dotenv from "dotenv";
import { PortfolioPlanner } from "./src/planner/portfolioPlanner";
import { loadWorkspace } from "./src/store/inMemoryStore";
import { loadConfig } from "./src/utils/config";
import { ValidationError, errorMessage } from "./src/utils/errors";
import { roundHalfUp } from "./src/utils/math";

/**
 * Analyze, rebalance and project one portfolio of a workspace file, and write the full
 * results to projection-output.json (generated in project root).
 * Usage: npx ts-node run-projection.ts [workspace-file] [portfolio-id] [params-file]
 * Default workspace: example-workspace.json; default portfolio: the first in the file.
 */
dotenv.config();

function readJson(filePath: string): unknown {
  try {
    return JSON.parse(fs.readFileSync(path.resolve(filePath), "utf-8"));
  } catch (err) {
    console.error(`Failed to read or parse input file "${filePath}": ${errorMessage(err)}`);
    process.exit(1);
  }
}

function firstPortfolioId(document: unknown): string | undefined {
  if (!document || typeof document !== "object" || !("portfolios" in document)) {
    return undefined;
  }
  const { portfolios } = document;
  if (!Array.isArray(portfolios)) {
    return undefined;
  }
  const first: unknown = portfolios[0];
  if (first && typeof first === "object" && "id" in first && typeof first.id === "string") {
    return first.id;
  }
  return undefined;
}

const workspacePath = process.argv[2] ?? "example-workspace.json";
const document = readJson(workspacePath);
const portfolioId = process.argv[3] ?? firstPortfolioId(document);
const params: unknown = process.argv[4]
  ? readJson(process.argv[4])
  : { contribution: 20000, withdrawalMode: "percent", withdrawalAmount: 4, seed: 42 };

if (!portfolioId) {
  console.error("Workspace has no portfolios; pass a portfolio id.");
  process.exit(1);
}

try {
  const planner = new PortfolioPlanner({ store: loadWorkspace(document), config: loadConfig() });

  console.log(`Analyzing portfolio ${portfolioId}...`);
  const analysis = planner.analyzePortfolio(portfolioId);
  console.log(`Total value: $${analysis.totalValue.toFixed(2)}`);
  if (analysis.retirement) {
    console.log(`Status: ${analysis.retirement.status}`);
  }
  for (const detail of analysis.categoryDetails) {
    const target = detail.targetPct === undefined ? "" : ` (target ${detail.targetPct}%)`;
    console.log(`  ${detail.label}: $${detail.subtotal.toFixed(2)} = ${detail.currentPct}%${target}`);
  }

  console.log("\nPlanning rebalance...");
  const plan = planner.planRebalance(portfolioId);
  if (plan.message) {
    console.log(plan.message);
  }
  for (const action of plan.actions) {
    const accounts = action.accounts.map((a) => `${a.accountNumber} $${a.amount.toFixed(2)}`).join(", ");
    console.log(`  ${action.action} ${action.label} $${action.amount.toFixed(2)} [${accounts}]`);
  }

  console.log("\nRunning projection...");
  const projection = planner.runProjection(portfolioId, params);
  console.log(`Probability of success: ${roundHalfUp(projection.probabilityOfSuccess, 1)}%`);
  console.log(`Median at retirement (age ${projection.retirementAge}): $${roundHalfUp(projection.medianAtRetirement).toFixed(2)}`);
  console.log(`Median at age ${projection.endAge}: $${roundHalfUp(projection.medianAtEnd).toFixed(2)}`);

  fs.writeFileSync(
    "projection-output.json",
    JSON.stringify({ analysis, plan, projection }, null, 2)
  );
  console.log("\nFull output saved to projection-output.json");
} catch (err) {
  if (err instanceof ValidationError) {
    console.error(err.message);
    err.issues.forEach((issue) => console.error(`  ${issue.path}: ${issue.message}`));
  } else {
    console.error(`Projection failed: ${errorMessage(err)}`);
  }
  process.exit(1);
}
