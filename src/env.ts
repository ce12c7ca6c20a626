import dotenv from "dotenv";
import { z } from "zod";
import type { TrendPolicy } from "./domain/types";

dotenv.config();

// `KEY=` in .env arrives as "", which counts as unset rather than 0.
const blankAsUnset = (value: unknown) => (typeof value === "string" && value.trim() === "" ? undefined : value);

const optionalNumber = z.preprocess(blankAsUnset, z.coerce.number().optional());

/**
 * Environment variable schema. Everything has a default so a bare
 * `nutri-journal` run works without a .env file.
 */
const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),

  // Storage
  JOURNAL_DATA_FILE: z.string().min(1).default("journal_data.json"),

  // Logging
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  LOG_FILE: z.string().min(1).default("journal.log"),

  // Open Food Facts
  FOOD_API_SEARCH_URL: z.string().url().default("https://world.openfoodfacts.org/cgi/search.pl"),
  FOOD_API_PRODUCT_URL: z.string().url().default("https://world.openfoodfacts.org/api/v2/product"),
  FOOD_API_TIMEOUT_MS: z.preprocess(blankAsUnset, z.coerce.number().int().positive().default(10000)),
  FOOD_API_PAGE_SIZE: z.preprocess(blankAsUnset, z.coerce.number().int().min(1).max(50).default(10)),

  // Tracking defaults
  DEFAULT_FAST_HOURS: z.preprocess(blankAsUnset, z.coerce.number().positive().default(16)),
  STREAK_CALORIE_TOLERANCE: z.preprocess(blankAsUnset, z.coerce.number().nonnegative().default(100)),

  // Trend advice overrides
  TREND_SLOW_LOSS_KG: optionalNumber,
  TREND_FAST_LOSS_KG: optionalNumber,
  TREND_SLOW_GAIN_KG: optionalNumber,
  TREND_CUT_ADJUST_KCAL: optionalNumber,
  TREND_FAST_LOSS_ADJUST_KCAL: optionalNumber,
  TREND_BULK_ADJUST_KCAL: optionalNumber,
});

export type Env = z.infer<typeof envSchema>;

let validatedEnv: Env | null = null;

/**
 * Parses a set of environment variables without caching.
 * Throws when a variable is set to something unusable.
 */
export function parseEnvironment(source: NodeJS.ProcessEnv): Env {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const issues = result.error.errors.map((e) => `  - ${e.path.join(".")}: ${e.message}`);
    throw new Error(`Invalid environment configuration:\n${issues.join("\n")}`);
  }
  return result.data;
}

// Validates process.env once and caches the result.
export function validateEnvironment(source: NodeJS.ProcessEnv = process.env): Env {
  if (!validatedEnv) validatedEnv = parseEnvironment(source);
  return validatedEnv;
}

export function getEnv(): Env {
  return validatedEnv ?? validateEnvironment();
}

/**
 * Trend thresholds from the environment; unset values keep the
 * built-in policy.
 */
export function trendPolicyOverrides(env: Env): Partial<TrendPolicy> {
  const overrides: Partial<TrendPolicy> = {};
  if (env.TREND_SLOW_LOSS_KG !== undefined) overrides.slowLossThresholdKg = env.TREND_SLOW_LOSS_KG;
  if (env.TREND_FAST_LOSS_KG !== undefined) overrides.fastLossThresholdKg = env.TREND_FAST_LOSS_KG;
  if (env.TREND_SLOW_GAIN_KG !== undefined) overrides.slowGainThresholdKg = env.TREND_SLOW_GAIN_KG;
  if (env.TREND_CUT_ADJUST_KCAL !== undefined) overrides.cutAdjustmentKcal = env.TREND_CUT_ADJUST_KCAL;
  if (env.TREND_FAST_LOSS_ADJUST_KCAL !== undefined) {
    overrides.fastLossAdjustmentKcal = env.TREND_FAST_LOSS_ADJUST_KCAL;
  }
  if (env.TREND_BULK_ADJUST_KCAL !== undefined) overrides.bulkAdjustmentKcal = env.TREND_BULK_ADJUST_KCAL;
  return overrides;
}
