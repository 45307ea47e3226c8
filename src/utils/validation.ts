import { z } from "zod";
import { HORIZONS } from "../models/AssetClass";
import { AppConfig } from "./config";
import {
  DEFAULT_OPTIMISTIC_PERCENTILE,
  DEFAULT_PESSIMISTIC_PERCENTILE,
  MAX_END_AGE,
  MAX_INFLATION_RATE,
} from "./constants";

/**
 * Zod validation schemas for input data validation.
 * Workspace schemas describe the stored data the engines read; the projection schema guards
 * the user-supplied simulation knobs.
 */

/**
 * Raw position row. Numbers are accepted and kept as strings so parsing stays in one place.
 */
export const PositionSchema = z.object({
  accountNumber: z.string().min(1),
  accountName: z.string().optional(),
  symbol: z.string().min(1),
  description: z.string().optional(),
  currentValue: z.union([z.string(), z.number()]).transform(String),
  quantity: z.union([z.string(), z.number()]).transform(String).default(""),
});

export const AccountUploadSchema = z.object({
  id: z.string().min(1),
  userId: z.string().min(1),
  filename: z.string().min(1),
  uploadedAt: z.coerce.date(),
  fileDatetime: z.string().optional(),
  positions: z.array(PositionSchema),
});

export const FundSchema = z.object({
  ticker: z.string().min(1),
  name: z.string().optional(),
  category: z
    .object({
      assetClass: z.string().min(1),
      name: z.string().min(1),
    })
    .optional(),
  preference: z.number().int().min(1).max(256).optional(),
});

export const ClassAllocationSchema = z.object({
  assetClass: z.string().min(1),
  percentage: z.number().min(0).max(100),
});

export const CategoryAllocationSchema = z.object({
  assetClass: z.string().min(1),
  category: z.string().min(1),
  percentage: z.number().min(0).max(100),
});

export const GlidepathRuleSchema = z.object({
  gtRetireAge: z.number().int(),
  ltRetireAge: z.number().int(),
  classAllocations: z.array(ClassAllocationSchema),
  categoryAllocations: z.array(CategoryAllocationSchema).default([]),
});

export const RuleSetSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  rules: z.array(GlidepathRuleSchema),
});

export const PortfolioSchema = z.object({
  id: z.string().min(1),
  userId: z.string().min(1),
  name: z.string().min(1),
  ruleSetId: z.string().optional(),
  yearBorn: z.number().int().min(1900).optional(),
  retirementAge: z.number().int().min(1).max(MAX_END_AGE).optional(),
  items: z.array(
    z.object({
      accountNumber: z.string().min(1),
      symbol: z.string().min(1),
    })
  ),
});

export const HorizonSchema = z.enum(HORIZONS);

export const AssumptionDataSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  horizons: z.record(
    HorizonSchema,
    z.object({
      expectedReturnPct: z.number().optional(),
      volatilityPct: z.number().min(0).optional(),
    })
  ),
});

export const CategoryAssumptionMappingSchema = z.object({
  assetClass: z.string().min(1),
  category: z.string().min(1),
  horizon: HorizonSchema.default("10yr"),
  assumptionDataId: z.string().optional(),
});

/**
 * Complete data set the planner works over.
 */
export const WorkspaceSchema = z.object({
  uploads: z.array(AccountUploadSchema).default([]),
  funds: z.array(FundSchema).default([]),
  ruleSets: z.array(RuleSetSchema).default([]),
  portfolios: z.array(PortfolioSchema).default([]),
  assumptionData: z.array(AssumptionDataSchema).default([]),
  categoryMappings: z.array(CategoryAssumptionMappingSchema).default([]),
});

export type WorkspaceInput = z.input<typeof WorkspaceSchema>;
export type Workspace = z.output<typeof WorkspaceSchema>;

/**
 * Schema for projection parameters. Defaults come from configuration.
 */
export function createProjectionParamsSchema(config: AppConfig) {
  return z
    .object({
      contribution: z.number().min(0, "Contribution cannot be negative"),
      withdrawalMode: z.enum(["percent", "dollar"]),
      withdrawalAmount: z.number().positive("Withdrawal amount must be positive"),
      inflationRate: z.number().min(0).max(MAX_INFLATION_RATE).default(config.defaultInflationRate),
      trials: z.number().int().min(1).max(config.maxTrials).default(config.defaultTrials),
      endAge: z.number().int().min(1).max(MAX_END_AGE).default(config.defaultEndAge),
      pessimisticPercentile: z.number().min(1).max(49).default(DEFAULT_PESSIMISTIC_PERCENTILE),
      optimisticPercentile: z.number().min(51).max(99).default(DEFAULT_OPTIMISTIC_PERCENTILE),
      seed: z.number().int().optional(),
    })
    .refine((params) => params.withdrawalMode !== "percent" || params.withdrawalAmount <= 100, {
      message: "Percentage withdrawal cannot exceed 100",
      path: ["withdrawalAmount"],
    });
}

export type ProjectionParamsInput = z.input<ReturnType<typeof createProjectionParamsSchema>>;
export type ProjectionParams = z.output<ReturnType<typeof createProjectionParamsSchema>>;

export const TolerancePctSchema = z.number().min(0).max(100);

/**
 * Tabular glidepath rows: column name to cell text.
 */
export const GlidepathRowsSchema = z.object({
  name: z.string().min(1),
  rows: z.array(z.record(z.string(), z.union([z.string(), z.number()]).transform(String))).min(1),
});
