// src/services/nutrientMath.ts
// Shared arithmetic over ingredient profiles and portions

import type { Ingredient, MacroKey } from "../types/nutrition";
import type { MacroRole, NutrientTotals, Portion } from "../types/mealPlan";

// Modified Atwater factors used for companion-animal diets (kcal per gram)
export const MACRO_KCAL_PER_GRAM: Record<MacroKey, number> = {
  protein: 3.5,
  fat: 8.5,
  carbohydrate: 3.5,
};

export const MACRO_KEY_BY_ROLE: Record<MacroRole, MacroKey> = {
  protein: "protein",
  fat: "fat",
  carb: "carbohydrate",
};

export const MACRO_ROLES: readonly MacroRole[] = ["protein", "fat", "carb"];

export const kcalPerGram = (ingredient: Ingredient): number => ingredient.per100g.kcal / 100;

/** Energy contributed by one gram of the ingredient through a single macro. */
export const macroKcalPerGram = (ingredient: Ingredient, macro: MacroKey): number =>
  (ingredient.per100g[macro] * MACRO_KCAL_PER_GRAM[macro]) / 100;

/** The macro with the largest mass in the ingredient, or null when it has none. */
export function dominantMacro(ingredient: Ingredient): MacroKey | null {
  const { protein, fat, carbohydrate } = ingredient.per100g;
  const ranked: [MacroKey, number][] = [
    ["protein", protein],
    ["fat", fat],
    ["carbohydrate", carbohydrate],
  ];
  ranked.sort((a, b) => b[1] - a[1]);

  if (ranked[0][1] <= 0 || ranked[0][1] === ranked[1][1]) {
    return null;
  }
  return ranked[0][0];
}

export const roundTo = (value: number, decimals: number): number => {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
};

export function computeTotals(portions: readonly Portion[]): NutrientTotals {
  const totals = portions.reduce(
    (acc, { ingredient, grams }) => {
      const factor = grams / 100;
      const p = ingredient.per100g;
      acc.grams += grams;
      acc.kcal += p.kcal * factor;
      acc.protein += p.protein * factor;
      acc.fat += p.fat * factor;
      acc.carbohydrate += p.carbohydrate * factor;
      acc.fiber += p.fiber * factor;
      acc.calcium += p.calcium * factor;
      acc.phosphorus += p.phosphorus * factor;
      return acc;
    },
    { grams: 0, kcal: 0, protein: 0, fat: 0, carbohydrate: 0, fiber: 0, calcium: 0, phosphorus: 0 }
  );

  const proteinKcal = totals.protein * MACRO_KCAL_PER_GRAM.protein;
  const fatKcal = totals.fat * MACRO_KCAL_PER_GRAM.fat;
  const carbKcal = totals.carbohydrate * MACRO_KCAL_PER_GRAM.carbohydrate;
  const macroKcal = proteinKcal + fatKcal + carbKcal;
  const share = (kcal: number) => (macroKcal > 0 ? (kcal / macroKcal) * 100 : 0);

  return {
    ...totals,
    proteinPct: share(proteinKcal),
    fatPct: share(fatKcal),
    carbPct: share(carbKcal),
    caPRatio: caPRatio(totals.calcium, totals.phosphorus),
  };
}

export function caPRatio(calcium: number, phosphorus: number): number {
  if (phosphorus > 0) return calcium / phosphorus;
  return calcium > 0 ? Number.POSITIVE_INFINITY : 0;
}

/** Signature of the ingredient combination, independent of portion order. */
export const combinationSignature = (ingredientIds: readonly string[]): string =>
  [...ingredientIds].sort().join("+");
