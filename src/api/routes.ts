import { Router, Request, Response } from "express";
import { z } from "zod";
import { exportRuleSetRows, importRuleSetRows } from "../engine/glidepath";
import { PortfolioPlanner } from "../planner/portfolioPlanner";
import { loadWorkspace } from "../store/inMemoryStore";
import { AppConfig } from "../utils/config";
import {
  GlidepathImportError,
  NotFoundError,
  SimulationCancelledError,
  ValidationError,
  errorMessage,
} from "../utils/errors";
import { GlidepathRowsSchema } from "../utils/validation";

/**
 * Every planning request carries the whole workspace document plus the portfolio to work on.
 */
const PortfolioRequestSchema = z.object({
  workspace: z.unknown(),
  portfolioId: z.string().min(1),
});

const RebalanceRequestSchema = PortfolioRequestSchema.extend({
  tolerancePct: z.number().optional(),
});

function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.output<T> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw ValidationError.fromZod("Invalid request body", parsed.error);
  }
  return parsed.data;
}

/**
 * Map an error to its HTTP status and JSON body. Unexpected errors are logged.
 */
export function sendError(res: Response, context: string, error: unknown): void {
  if (error instanceof ValidationError) {
    res.status(400).json({ error: error.message, issues: error.issues });
  } else if (error instanceof GlidepathImportError) {
    res.status(400).json({ error: error.message });
  } else if (error instanceof NotFoundError) {
    res.status(404).json({ error: error.message });
  } else if (error instanceof SimulationCancelledError) {
    res.status(503).json({ error: error.message, completedTrials: error.completedTrials });
  } else {
    console.error(`Error in ${context}:`, error);
    res.status(500).json({
      error: "Internal server error",
      message: errorMessage(error),
    });
  }
}

export function createRoutes(config: AppConfig): Router {
  const router = Router();

  const plannerFor = (workspace: unknown) =>
    new PortfolioPlanner({ store: loadWorkspace(workspace), config });

  /**
   * GET /api/analyze
   * Get information about the analyze endpoint
   */
  router.get("/analyze", (req: Request, res: Response) => {
    res.json({
      method: "POST",
      description: "Current allocation of a portfolio against its glidepath band",
      endpoint: "/api/analyze",
      requiredFields: ["workspace", "portfolioId"],
      example: "See example-workspace.json in the project root",
    });
  });

  /**
   * POST /api/analyze
   * Allocation breakdown by category, class and ticker
   */
  router.post("/analyze", (req: Request, res: Response) => {
    try {
      const { workspace, portfolioId } = parseBody(PortfolioRequestSchema, req.body);
      res.json(plannerFor(workspace).analyzePortfolio(portfolioId));
    } catch (error) {
      sendError(res, "allocation analysis", error);
    }
  });

  /**
   * GET /api/rebalance
   * Get information about the rebalance endpoint
   */
  router.get("/rebalance", (req: Request, res: Response) => {
    res.json({
      method: "POST",
      description: "Buy/sell plan moving a portfolio toward its glidepath targets",
      endpoint: "/api/rebalance",
      requiredFields: ["workspace", "portfolioId", `tolerancePct (optional, default ${config.defaultTolerancePct})`],
      example: "See example-workspace.json in the project root",
    });
  });

  /**
   * POST /api/rebalance
   * Rebalance plan for categories outside the tolerance band
   */
  router.post("/rebalance", (req: Request, res: Response) => {
    try {
      const { workspace, portfolioId, tolerancePct } = parseBody(RebalanceRequestSchema, req.body);
      res.json(plannerFor(workspace).planRebalance(portfolioId, tolerancePct));
    } catch (error) {
      sendError(res, "rebalance planning", error);
    }
  });

  /**
   * GET /api/projection
   * Get information about the projection endpoint
   */
  router.get("/projection", (req: Request, res: Response) => {
    res.json({
      method: "POST",
      description: "Monte Carlo retirement projection along the portfolio's glidepath",
      endpoint: "/api/projection",
      requiredFields: [
        "workspace",
        "portfolioId",
        "contribution",
        "withdrawalMode (percent | dollar)",
        "withdrawalAmount",
        `inflationRate (optional, default ${config.defaultInflationRate})`,
        `trials (optional, default ${config.defaultTrials}, max ${config.maxTrials})`,
        `endAge (optional, default ${config.defaultEndAge})`,
        "pessimisticPercentile (optional, default 10)",
        "optimisticPercentile (optional, default 90)",
        "seed (optional)",
      ],
      note: "The portfolio needs a rule set, birth year and retirement age.",
    });
  });

  /**
   * POST /api/projection
   * Percentile balance paths and probability of success
   */
  router.post("/projection", (req: Request, res: Response) => {
    try {
      const { workspace, portfolioId, ...params } = parseBody(
        PortfolioRequestSchema.passthrough(),
        req.body
      );
      res.json(plannerFor(workspace).runProjection(portfolioId, params));
    } catch (error) {
      sendError(res, "projection", error);
    }
  });

  /**
   * GET /api/glidepath/validate
   * Get information about the glidepath import check
   */
  router.get("/glidepath/validate", (req: Request, res: Response) => {
    res.json({
      method: "POST",
      description: "Import glidepath rows and report the rule set or the first problem found",
      endpoint: "/api/glidepath/validate",
      requiredFields: ["name", "rows (gt-retire-age, lt-retire-age, class and Class:Category columns)"],
    });
  });

  /**
   * POST /api/glidepath/validate
   * Parse tabular glidepath rows into a rule set
   */
  router.post("/glidepath/validate", (req: Request, res: Response) => {
    try {
      const { name, rows } = parseBody(GlidepathRowsSchema, req.body);
      const ruleSet = importRuleSetRows(name, name, rows);
      res.json({ ruleSet, table: exportRuleSetRows(ruleSet) });
    } catch (error) {
      sendError(res, "glidepath import", error);
    }
  });

  /**
   * GET /api
   * API information endpoint
   */
  router.get("/", (req: Request, res: Response) => {
    res.json({
      message: "Glidepath Portfolio Planner API",
      version: "1.0.0",
      endpoints: {
        analyze: "POST /api/analyze - Allocation breakdown against the glidepath",
        rebalance: "POST /api/rebalance - Buy/sell plan within a tolerance band",
        projection: "POST /api/projection - Monte Carlo retirement projection",
        glidepath: "POST /api/glidepath/validate - Import and check glidepath rows",
        health: "GET /api/health - Health check",
      },
    });
  });

  /**
   * GET /api/health
   * Health check endpoint
   */
  router.get("/health", (req: Request, res: Response) => {
    res.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  return router;
}
