// src/services/mealPlanner.ts
// Single import surface for the planning engine: catalog, energy, weekly plan, validation.

import { DEFAULT_PLANNER_SETTINGS, type PlannerSettings } from "../domain/settings";
import type { Portion, RatioSpec, ValidationReport, WeeklyPlan } from "../types/mealPlan";
import type { AnimalProfile, Ingredient } from "../types/nutrition";
import { estimateEnergy } from "./energyEstimator";
import type { IngredientCatalog } from "./ingredientCatalog";
import { mergeReports, validatePlan } from "./planValidator";
import { ROLE_RULES } from "./ratioBalancer";
import { assertRatioSpec } from "./ratioSpecs";
import { buildEntry, plan } from "./rotationPlanner";

export { loadCatalog, loadCatalogFromFile, loadDefaultCatalog, IngredientCatalog } from "./ingredientCatalog";
export { estimateEnergy, lifeStageForAge } from "./energyEstimator";
export { validatePlan } from "./planValidator";
export { suggestSupplements } from "./supplementAdvisor";

export interface WeeklyPlanOptions {
  settings?: Readonly<PlannerSettings>;
  days?: number;
}

function resolvePantry(pantryIds: readonly string[], catalog: IngredientCatalog): Ingredient[] {
  return [...new Set(pantryIds)].map((id) => catalog.require(id));
}

/**
 * Profile + pantry + ratio spec → a validated week of balanced meals.
 * Identical inputs give identical gram quantities.
 */
export function computeWeeklyPlan(
  pantryIds: readonly string[],
  profile: AnimalProfile,
  spec: RatioSpec,
  catalog: IngredientCatalog,
  options: WeeklyPlanOptions = {}
): WeeklyPlan {
  const settings = options.settings ?? DEFAULT_PLANNER_SETTINGS;
  assertRatioSpec(spec, settings);

  const energy = estimateEnergy(profile);
  const pantry = resolvePantry(pantryIds, catalog);
  const planned = plan(pantry, energy, spec, { settings, days: options.days, profile });

  // planner messages carry the failing constraint, keep them over the generic ones
  const report = mergeReports(validatePlan(planned, { settings }), planned.report);
  return { ...planned, report };
}

export interface SubmittedPortion {
  ingredientId: string;
  grams: number;
}

export interface SubmittedPlan {
  profile: AnimalProfile;
  ratio: RatioSpec;
  days: readonly (readonly SubmittedPortion[])[];
}

/** Validates a plan edited outside the engine, e.g. portions adjusted by hand. */
export function validateSubmittedPlan(
  submitted: SubmittedPlan,
  catalog: IngredientCatalog,
  settings: Readonly<PlannerSettings> = DEFAULT_PLANNER_SETTINGS
): { plan: WeeklyPlan; report: ValidationReport } {
  assertRatioSpec(submitted.ratio, settings);
  const energy = estimateEnergy(submitted.profile);

  const days = submitted.days.map((portions, index) =>
    buildEntry(
      index + 1,
      portions.map((portion): Portion => {
        const ingredient = catalog.require(portion.ingredientId);
        return { ingredient, role: ROLE_RULES[ingredient.category].role, grams: portion.grams };
      })
    )
  );

  const weekly: WeeklyPlan = {
    profile: submitted.profile,
    energy,
    ratio: submitted.ratio,
    days,
    report: { issues: {}, highestSeverity: null },
  };
  const report = validatePlan(weekly, { settings });
  return { plan: { ...weekly, report }, report };
}
