// src/domain/settings.ts
import type { CaPBounds } from "../types/mealPlan";

/**
 * Tunable defaults of the planning engine. None of these are veterinary
 * constants; deployments override them through the environment.
 */
export interface PlannerSettings {
  kcalTolerance: number;          // fraction of MER a day may deviate
  criticalKcalTolerance: number;  // beyond this the deviation is critical
  macroTolerancePct: number;      // default per-macro tolerance for ratio specs
  ratioSumTolerancePct: number;   // custom percentages must sum to 100 ± this
  vegetableEnergyShare: number;   // share of daily kcal held by the vegetable
  maxCombinations: number;        // per balancing call
  defaultCaPBounds: CaPBounds;
  absoluteCaPBounds: CaPBounds;   // outside these the validator is critical
  requiredWeeklyTags: string[];
  planDays: number;
}

export const DEFAULT_PLANNER_SETTINGS: Readonly<PlannerSettings> = Object.freeze({
  kcalTolerance: 0.05,
  criticalKcalTolerance: 0.15,
  macroTolerancePct: 5,
  ratioSumTolerancePct: 1,
  vegetableEnergyShare: 0.08,
  maxCombinations: 500,
  defaultCaPBounds: Object.freeze({ min: 1.0, max: 2.0 }),
  absoluteCaPBounds: Object.freeze({ min: 1.0, max: 2.0 }),
  requiredWeeklyTags: ["organ"],
  planDays: 7,
});

export function resolveSettings(overrides: Partial<PlannerSettings> = {}): PlannerSettings {
  const merged: PlannerSettings = {
    ...DEFAULT_PLANNER_SETTINGS,
    defaultCaPBounds: { ...DEFAULT_PLANNER_SETTINGS.defaultCaPBounds },
    absoluteCaPBounds: { ...DEFAULT_PLANNER_SETTINGS.absoluteCaPBounds },
    requiredWeeklyTags: [...DEFAULT_PLANNER_SETTINGS.requiredWeeklyTags],
  };

  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      Object.assign(merged, { [key]: value });
    }
  }

  if (!(merged.vegetableEnergyShare >= 0 && merged.vegetableEnergyShare < 1)) {
    throw new RangeError("vegetableEnergyShare must be in [0, 1)");
  }
  if (!(merged.kcalTolerance > 0 && merged.criticalKcalTolerance >= merged.kcalTolerance)) {
    throw new RangeError("kcal tolerances must be positive and critical >= warning");
  }
  if (!Number.isInteger(merged.maxCombinations) || merged.maxCombinations < 1) {
    throw new RangeError("maxCombinations must be a positive integer");
  }
  if (!Number.isInteger(merged.planDays) || merged.planDays < 1) {
    throw new RangeError("planDays must be a positive integer");
  }

  return merged;
}
