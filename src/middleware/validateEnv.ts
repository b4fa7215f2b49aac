// src/middleware/validateEnv.ts
import { z } from "zod";
import { resolveSettings, type PlannerSettings } from "../domain/settings";

const numberFromEnv = (fallback: string) => z.string().default(fallback).pipe(z.coerce.number().finite());

/**
 * Environment variable validation schema.
 * Validates all environment variables at startup.
 */
const envSchema = z.object({
  // Server
  PORT: numberFromEnv("3000").pipe(z.number().int().min(0).max(65535)),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),

  // CORS (comma separated)
  ALLOWED_ORIGINS: z.string().optional(),

  // Ingredient catalog JSON; bundled catalog when unset
  CATALOG_PATH: z
    .string()
    .trim()
    .optional()
    .transform((value) => value || undefined),

  // Rate limiting (plan generation)
  RATE_LIMIT_WINDOW_MS: numberFromEnv("60000").pipe(z.number().int().positive()),
  RATE_LIMIT_MAX_REQUESTS: numberFromEnv("30").pipe(z.number().int().positive()),

  // Planner tolerances
  PLAN_KCAL_TOLERANCE: z.string().optional(),
  PLAN_CRITICAL_KCAL_TOLERANCE: z.string().optional(),
  PLAN_VEGETABLE_ENERGY_SHARE: z.string().optional(),
  PLAN_MAX_COMBINATIONS: z.string().optional(),
  PLAN_MACRO_TOLERANCE_PCT: z.string().optional(),
});

export type Env = z.infer<typeof envSchema>;

export interface AppConfig {
  port: number;
  nodeEnv: Env["NODE_ENV"];
  allowedOrigins: string[];
  catalogPath?: string;
  rateLimit: { windowMs: number; maxRequests: number };
  planner: PlannerSettings;
}

const optionalNumber = (name: string, raw: string | undefined): number | undefined => {
  if (raw === undefined || raw.trim() === "") return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`${name} must be a number (got "${raw}")`);
  }
  return value;
};

/**
 * Validates environment variables and turns them into app configuration.
 * Throws an error if variables are invalid.
 */
export function validateEnvironment(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    console.error("Environment validation failed:");
    for (const error of result.error.errors) {
      console.error(`  - ${error.path.join(".")}: ${error.message}`);
    }
    throw new Error("Invalid environment configuration. See errors above.");
  }

  const env = result.data;

  let planner: PlannerSettings;
  try {
    planner = resolveSettings({
      kcalTolerance: optionalNumber("PLAN_KCAL_TOLERANCE", env.PLAN_KCAL_TOLERANCE),
      criticalKcalTolerance: optionalNumber("PLAN_CRITICAL_KCAL_TOLERANCE", env.PLAN_CRITICAL_KCAL_TOLERANCE),
      vegetableEnergyShare: optionalNumber("PLAN_VEGETABLE_ENERGY_SHARE", env.PLAN_VEGETABLE_ENERGY_SHARE),
      maxCombinations: optionalNumber("PLAN_MAX_COMBINATIONS", env.PLAN_MAX_COMBINATIONS),
      macroTolerancePct: optionalNumber("PLAN_MACRO_TOLERANCE_PCT", env.PLAN_MACRO_TOLERANCE_PCT),
    });
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`Invalid planner configuration: ${reason}`, { cause: err });
  }

  const allowedOrigins = (env.ALLOWED_ORIGINS ?? "")
    .split(",")
    .map((origin) => origin.trim())
    .filter(Boolean);

  if (env.NODE_ENV === "production" && allowedOrigins.length === 0) {
    console.warn("ALLOWED_ORIGINS is not set - browser requests from other origins will be refused");
  }

  return {
    port: env.PORT,
    nodeEnv: env.NODE_ENV,
    allowedOrigins,
    ...(env.CATALOG_PATH ? { catalogPath: env.CATALOG_PATH } : {}),
    rateLimit: { windowMs: env.RATE_LIMIT_WINDOW_MS, maxRequests: env.RATE_LIMIT_MAX_REQUESTS },
    planner,
  };
}

export default validateEnvironment;
