// src/types/nutrition.ts
// Ingredient, animal profile and energy types shared by the planning engine

export const INGREDIENT_CATEGORIES = ["protein", "carb", "fat", "vegetable", "supplement"] as const;
export type IngredientCategory = (typeof INGREDIENT_CATEGORIES)[number];

export const SHELF_LIFE_CLASSES = ["fresh", "refrigerated", "frozen", "shelf_stable"] as const;
export type ShelfLifeClass = (typeof SHELF_LIFE_CLASSES)[number];

/**
 * Composition per 100 g of the ingredient as fed (cooked where applicable).
 * Everything except kcal is in grams.
 */
export interface MacroProfile {
  kcal: number;
  protein: number;
  fat: number;
  carbohydrate: number;
  fiber: number;
  calcium: number;
  phosphorus: number;
}

export type MacroKey = "protein" | "fat" | "carbohydrate";

export interface Ingredient {
  readonly id: string;
  readonly name: string;
  readonly category: IngredientCategory;
  readonly per100g: Readonly<MacroProfile>;
  readonly cautionFlags: readonly string[];
  readonly cautionNotes: readonly string[];
  readonly tags: readonly string[];
  readonly shelfLife: ShelfLifeClass;
  readonly microNote?: string;
  readonly benefits: readonly string[];
}

export const LIFE_STAGES = ["puppy", "adult", "senior", "pregnant", "lactating"] as const;
export type LifeStage = (typeof LIFE_STAGES)[number];

export const ACTIVITY_LEVELS = ["low", "moderate", "high", "working"] as const;
export type ActivityLevel = (typeof ACTIVITY_LEVELS)[number];

export const HEALTH_FLAGS = [
  "weight_loss",
  "sensitive_stomach",
  "pancreatitis",
  "skin_coat",
  "picky_eater",
  "kidney",
  "food_allergy",
  "joint_support",
] as const;
export type HealthFlag = (typeof HEALTH_FLAGS)[number];

export interface AnimalProfile {
  weightKg: number;
  lifeStage: LifeStage;
  activity: ActivityLevel;
  healthFlags: readonly HealthFlag[];
  neutered?: boolean;       // defaults to true
  ageMonths?: number;       // picks the puppy age band
  name?: string;
  breed?: string;
}

export interface EnergyTarget {
  rer: number;              // kcal/day
  multiplier: number;
  baseMer: number;          // rer × multiplier
  healthAdjustment: number; // product of health-flag factors
  mer: number;              // kcal/day the plan is balanced to
  rationale: string[];
}
