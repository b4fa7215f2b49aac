// src/services/energyEstimator.ts
// Resting and maintenance energy from the dog's profile

import { InvalidProfileError } from "../domain/errors";
import {
  ACTIVITY_LEVELS,
  HEALTH_FLAGS,
  LIFE_STAGES,
  type ActivityLevel,
  type AnimalProfile,
  type EnergyTarget,
  type HealthFlag,
  type LifeStage,
} from "../types/nutrition";
import { roundTo } from "./nutrientMath";

export const RER_COEFFICIENT = 70;
export const RER_EXPONENT = 0.75;

export const STAGE_MULTIPLIERS: Record<Exclude<LifeStage, "puppy">, Record<ActivityLevel, number>> = {
  adult: { low: 1.4, moderate: 1.6, high: 1.8, working: 2.2 },
  senior: { low: 1.2, moderate: 1.3, high: 1.4, working: 1.4 },
  pregnant: { low: 1.8, moderate: 1.8, high: 1.8, working: 1.8 },
  lactating: { low: 4.0, moderate: 4.0, high: 4.0, working: 4.0 },
};

export const PUPPY_MULTIPLIERS = {
  underFourMonths: 3.0,
  fourMonthsAndOlder: 2.0,
  unknownAge: 2.5,
} as const;

export const INTACT_BONUS = 0.2;

const HEALTH_ENERGY_FACTORS: Partial<Record<HealthFlag, { factor: number; reason: string }>> = {
  weight_loss: { factor: 0.85, reason: "Weight loss goal: calories reduced by 15%." },
  pancreatitis: { factor: 0.95, reason: "Pancreatitis: slightly conservative energy target." },
  kidney: { factor: 0.95, reason: "Kidney support: slightly conservative energy target." },
};

const isOneOf = <T extends string>(values: readonly T[], value: unknown): value is T =>
  typeof value === "string" && values.some((v) => v === value);

function assertProfile(profile: AnimalProfile): void {
  if (typeof profile.weightKg !== "number" || !Number.isFinite(profile.weightKg) || profile.weightKg <= 0) {
    throw new InvalidProfileError("weightKg", "must be a positive number of kilograms");
  }
  if (!isOneOf(LIFE_STAGES, profile.lifeStage)) {
    throw new InvalidProfileError("lifeStage", `must be one of ${LIFE_STAGES.join(", ")}`);
  }
  if (!isOneOf(ACTIVITY_LEVELS, profile.activity)) {
    throw new InvalidProfileError("activity", `must be one of ${ACTIVITY_LEVELS.join(", ")}`);
  }
  for (const flag of profile.healthFlags) {
    if (!isOneOf(HEALTH_FLAGS, flag)) {
      throw new InvalidProfileError("healthFlags", `unknown flag "${String(flag)}"`);
    }
  }
  if (profile.ageMonths !== undefined && (!Number.isFinite(profile.ageMonths) || profile.ageMonths < 0)) {
    throw new InvalidProfileError("ageMonths", "must not be negative");
  }
}

function puppyMultiplier(ageMonths: number | undefined): { multiplier: number; reason: string } {
  if (ageMonths === undefined) {
    return { multiplier: PUPPY_MULTIPLIERS.unknownAge, reason: "Puppy of unknown age: midpoint growth factor 2.5." };
  }
  if (ageMonths < 4) {
    return { multiplier: PUPPY_MULTIPLIERS.underFourMonths, reason: "Puppy under 4 months: growth factor 3.0." };
  }
  return { multiplier: PUPPY_MULTIPLIERS.fourMonthsAndOlder, reason: "Puppy 4 months or older: growth factor 2.0." };
}

/**
 * RER = 70 × kg^0.75, then a life-stage/activity multiplier and any
 * health-flag adjustments. Deterministic for a given profile.
 */
export function estimateEnergy(profile: AnimalProfile): EnergyTarget {
  assertProfile(profile);

  const rer = RER_COEFFICIENT * Math.pow(profile.weightKg, RER_EXPONENT);
  const rationale = [`RER = 70 × ${profile.weightKg}^0.75 = ${roundTo(rer, 1)} kcal/day.`];

  let multiplier: number;
  if (profile.lifeStage === "puppy") {
    const band = puppyMultiplier(profile.ageMonths);
    multiplier = band.multiplier;
    rationale.push(band.reason);
  } else {
    multiplier = STAGE_MULTIPLIERS[profile.lifeStage][profile.activity];
    rationale.push(`${profile.lifeStage} with ${profile.activity} activity: multiplier ${multiplier}.`);

    const intactApplies = profile.lifeStage === "adult" || profile.lifeStage === "senior";
    if (intactApplies && profile.neutered === false) {
      multiplier += INTACT_BONUS;
      rationale.push(`Intact: multiplier raised by ${INTACT_BONUS}.`);
    }
  }

  const baseMer = rer * multiplier;

  let healthAdjustment = 1;
  for (const flag of new Set(profile.healthFlags)) {
    const entry = HEALTH_ENERGY_FACTORS[flag];
    if (entry) {
      healthAdjustment *= entry.factor;
      rationale.push(entry.reason);
    }
  }

  const mer = baseMer * healthAdjustment;
  rationale.push(`MER ≈ ${roundTo(mer, 1)} kcal/day.`);

  return { rer, multiplier, baseMer, healthAdjustment, mer, rationale };
}

export function lifeStageForAge(ageYears: number): Extract<LifeStage, "puppy" | "adult" | "senior"> {
  if (!Number.isFinite(ageYears) || ageYears < 0) {
    throw new InvalidProfileError("ageYears", "must be a non-negative number");
  }
  if (ageYears < 1) return "puppy";
  if (ageYears < 7) return "adult";
  return "senior";
}
