// src/types/mealPlan.ts
import type { AnimalProfile, EnergyTarget, Ingredient } from "./nutrition";

export type MacroRole = "protein" | "fat" | "carb";
export type IngredientRole = MacroRole | "vegetable" | "calcium";

export interface CaPBounds {
  min: number;
  max: number;
}

export interface RatioSpec {
  kind: "preset" | "custom";
  key: string;
  label: string;
  proteinPct: number; // share of calories
  fatPct: number;
  carbPct: number;
  caPRatio: CaPBounds;
  tolerancePct: number; // allowed deviation per macro share, percentage points
  note?: string;
}

export interface Portion {
  ingredient: Ingredient;
  role: IngredientRole;
  grams: number;
}

export interface NutrientTotals {
  grams: number;
  kcal: number;
  protein: number;
  fat: number;
  carbohydrate: number;
  fiber: number;
  calcium: number;
  phosphorus: number;
  proteinPct: number;
  fatPct: number;
  carbPct: number;
  caPRatio: number;
}

export interface CautionNote {
  ingredientId: string;
  text: string;
}

export interface MealPlanEntry {
  day: number;
  portions: readonly Portion[];
  totals: NutrientTotals;
  notes: readonly CautionNote[];
  signature: string;
  usedFallback: boolean;
}

export type Severity = "info" | "warning" | "critical";

export type ValidationCode =
  | "ENERGY_OFF_TARGET"
  | "CA_P_OUT_OF_RANGE"
  | "MACRO_OFF_TARGET"
  | "INVALID_QUANTITY"
  | "MISSING_MICRONUTRIENT_SOURCE"
  | "CAUTION_WITHOUT_NOTE"
  | "HEALTH_FLAG_CONFLICT"
  | "ROTATION_FALLBACK"
  | "ROTATION_REPEAT";

export interface ValidationIssue {
  code: ValidationCode;
  severity: Severity;
  message: string;
  day?: number;
  subject?: string;
}

export interface ValidationReport {
  issues: Record<string, ValidationIssue>;
  highestSeverity: Severity | null;
}

export interface WeeklyPlan {
  profile?: AnimalProfile;
  energy: EnergyTarget;
  ratio: RatioSpec;
  days: readonly MealPlanEntry[];
  report: ValidationReport;
}
