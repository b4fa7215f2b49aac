// tests/fixtures.ts
// Hand-made ingredients with round numbers so portions can be worked out on paper.

import { resolveSettings } from '../src/domain/settings';
import type { RatioSpec } from '../src/types/mealPlan';
import type { EnergyTarget, Ingredient, IngredientCategory, MacroProfile } from '../src/types/nutrition';

export function makeIngredient(
  id: string,
  category: IngredientCategory,
  per100g: Partial<MacroProfile>,
  extra: Partial<Omit<Ingredient, 'id' | 'category' | 'per100g'>> = {}
): Ingredient {
  return {
    id,
    name: extra.name ?? id,
    category,
    per100g: { kcal: 0, protein: 0, fat: 0, carbohydrate: 0, fiber: 0, calcium: 0, phosphorus: 0, ...per100g },
    cautionFlags: extra.cautionFlags ?? [],
    cautionNotes: extra.cautionNotes ?? [],
    tags: extra.tags ?? [],
    shelfLife: extra.shelfLife ?? 'refrigerated',
    benefits: extra.benefits ?? [],
  };
}

// 0.7 kcal/g, all of it protein
export const proteinA = makeIngredient('protein-a', 'protein', { kcal: 70, protein: 20, phosphorus: 0.1 });
// same energy, far too much phosphorus for any vegetable to offset
export const proteinB = makeIngredient('protein-b', 'protein', { kcal: 70, protein: 20, phosphorus: 2.0 });
// 1.05 kcal/g, closer to 1 kcal/g than protein-a
export const proteinDense = makeIngredient('protein-dense', 'protein', { kcal: 105, protein: 30, phosphorus: 0.15 });
export const carbC = makeIngredient('carb-c', 'carb', { kcal: 70, carbohydrate: 20 });
export const fatF = makeIngredient('fat-f', 'fat', { kcal: 850, fat: 100 });
export const vegPlain = makeIngredient('veg-a-plain', 'vegetable', { kcal: 35, carbohydrate: 10 });
export const vegCalcium = makeIngredient('veg-b-calcium', 'vegetable', { kcal: 35, carbohydrate: 10, calcium: 0.375 });
export const eggshell = makeIngredient('eggshell', 'supplement', { calcium: 38 });

export const testSettings = resolveSettings({ vegetableEnergyShare: 0.1 });

export const halfProteinSpec: RatioSpec = {
  kind: 'custom',
  key: 'custom',
  label: 'Half protein',
  proteinPct: 50,
  fatPct: 25,
  carbPct: 25,
  caPRatio: { min: 1, max: 2 },
  tolerancePct: 5,
};

export function energyTarget(mer: number): EnergyTarget {
  return { rer: mer, multiplier: 1, baseMer: mer, healthAdjustment: 1, mer, rationale: [] };
}

export const gramsOf = (portions: readonly { ingredient: Ingredient; grams: number }[]) =>
  portions.map((p) => [p.ingredient.id, p.grams]);
