import { z } from "zod";
import {
  AssetClassAssumptions,
  DEFAULT_ASSET_CLASS_ASSUMPTIONS,
} from "../models/AssetClass";
import {
  DEFAULT_END_AGE,
  DEFAULT_INFLATION_RATE,
  DEFAULT_TOLERANCE_PCT,
  DEFAULT_TRIALS,
  MAX_END_AGE,
  MAX_INFLATION_RATE,
} from "./constants";

/**
 * Runtime configuration, read from the environment (and .env via dotenv at start-up).
 */
export interface AppConfig {
  port: number;
  defaultTrials: number;
  maxTrials: number;
  defaultEndAge: number;
  defaultInflationRate: number;
  defaultTolerancePct: number;
  simulationTimeoutMs: number;
  assetClassAssumptions: AssetClassAssumptions;
}

const EnvSchema = z
  .object({
    PORT: z.coerce.number().int().min(1).max(65535).default(3000),
    DEFAULT_TRIALS: z.coerce.number().int().min(1).default(DEFAULT_TRIALS),
    MAX_TRIALS: z.coerce.number().int().min(1).default(20000),
    DEFAULT_END_AGE: z.coerce.number().int().min(1).max(MAX_END_AGE).default(DEFAULT_END_AGE),
    DEFAULT_INFLATION_RATE: z.coerce
      .number()
      .min(0)
      .max(MAX_INFLATION_RATE)
      .default(DEFAULT_INFLATION_RATE),
    DEFAULT_TOLERANCE_PCT: z.coerce.number().min(0).max(100).default(DEFAULT_TOLERANCE_PCT),
    SIMULATION_TIMEOUT_MS: z.coerce.number().int().min(0).default(30000),
  })
  .refine((env) => env.DEFAULT_TRIALS <= env.MAX_TRIALS, {
    message: "DEFAULT_TRIALS must not exceed MAX_TRIALS",
    path: ["DEFAULT_TRIALS"],
  });

/**
 * Parse configuration from an environment map.
 * Throws with every offending variable listed when the environment is invalid.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${details}`);
  }

  const values = parsed.data;
  return {
    port: values.PORT,
    defaultTrials: values.DEFAULT_TRIALS,
    maxTrials: values.MAX_TRIALS,
    defaultEndAge: values.DEFAULT_END_AGE,
    defaultInflationRate: values.DEFAULT_INFLATION_RATE,
    defaultTolerancePct: values.DEFAULT_TOLERANCE_PCT,
    simulationTimeoutMs: values.SIMULATION_TIMEOUT_MS,
    assetClassAssumptions: DEFAULT_ASSET_CLASS_ASSUMPTIONS,
  };
}
