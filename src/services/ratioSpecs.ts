// src/services/ratioSpecs.ts
import { RATIO_PRESETS, type RatioPresetDefinition } from "../data/ratioPresets";
import { RatioSpecError } from "../domain/errors";
import { DEFAULT_PLANNER_SETTINGS, type PlannerSettings } from "../domain/settings";
import type { CaPBounds, RatioSpec } from "../types/mealPlan";
import type { EnergyTarget } from "../types/nutrition";
import { MACRO_KCAL_PER_GRAM, roundTo } from "./nutrientMath";

export interface CustomRatioInput {
  proteinPct: number;
  fatPct: number;
  carbPct: number;
  caPRatio?: Partial<CaPBounds>;
  tolerancePct?: number;
  label?: string;
}

const toSpec = (preset: RatioPresetDefinition, settings: Readonly<PlannerSettings>): RatioSpec => ({
  kind: "preset",
  key: preset.key,
  label: preset.label,
  proteinPct: preset.proteinPct,
  fatPct: preset.fatPct,
  carbPct: preset.carbPct,
  caPRatio: { ...(preset.caPRatio ?? settings.defaultCaPBounds) },
  tolerancePct: settings.macroTolerancePct,
  note: preset.note,
});

export function listRatioPresets(settings: Readonly<PlannerSettings> = DEFAULT_PLANNER_SETTINGS): RatioSpec[] {
  return RATIO_PRESETS.map((preset) => toSpec(preset, settings));
}

export function getRatioPreset(key: string, settings: Readonly<PlannerSettings> = DEFAULT_PLANNER_SETTINGS): RatioSpec {
  const preset = RATIO_PRESETS.find((p) => p.key === key);
  if (!preset) {
    const known = RATIO_PRESETS.map((p) => p.key).join(", ");
    throw new RatioSpecError(`Unknown ratio preset "${key}" (expected one of: ${known})`);
  }
  return toSpec(preset, settings);
}

/**
 * Checks a spec before any balancing happens: finite non-negative shares that
 * sum to 100 within the configured tolerance, and sane Ca:P bounds.
 */
export function assertRatioSpec(spec: RatioSpec, settings: Readonly<PlannerSettings> = DEFAULT_PLANNER_SETTINGS): void {
  const shares: [string, number][] = [
    ["proteinPct", spec.proteinPct],
    ["fatPct", spec.fatPct],
    ["carbPct", spec.carbPct],
  ];

  for (const [name, value] of shares) {
    if (!Number.isFinite(value) || value < 0 || value > 100) {
      throw new RatioSpecError(`${name} must be a number between 0 and 100 (got ${value})`);
    }
  }

  const sum = spec.proteinPct + spec.fatPct + spec.carbPct;
  if (Math.abs(sum - 100) > settings.ratioSumTolerancePct) {
    throw new RatioSpecError(
      `Macro percentages must sum to 100 ± ${settings.ratioSumTolerancePct} (got ${roundTo(sum, 2)})`
    );
  }

  const { min, max } = spec.caPRatio;
  if (!Number.isFinite(min) || !Number.isFinite(max) || min <= 0 || max < min) {
    throw new RatioSpecError(`Ca:P bounds must satisfy 0 < min <= max (got ${min}..${max})`);
  }

  if (!Number.isFinite(spec.tolerancePct) || spec.tolerancePct <= 0) {
    throw new RatioSpecError(`tolerancePct must be positive (got ${spec.tolerancePct})`);
  }
}

export function createCustomRatioSpec(
  input: CustomRatioInput,
  settings: Readonly<PlannerSettings> = DEFAULT_PLANNER_SETTINGS
): RatioSpec {
  const spec: RatioSpec = {
    kind: "custom",
    key: "custom",
    label: input.label ?? "Custom ratio",
    proteinPct: input.proteinPct,
    fatPct: input.fatPct,
    carbPct: input.carbPct,
    caPRatio: {
      min: input.caPRatio?.min ?? settings.defaultCaPBounds.min,
      max: input.caPRatio?.max ?? settings.defaultCaPBounds.max,
    },
    tolerancePct: input.tolerancePct ?? settings.macroTolerancePct,
  };

  assertRatioSpec(spec, settings);
  return spec;
}

export interface MacroTarget {
  kcal: number;
  grams: number;
}

/** Daily kcal and grams per macro for an energy target under a spec. */
export function macroTargets(energy: EnergyTarget, spec: RatioSpec): Record<"protein" | "fat" | "carbohydrate", MacroTarget> {
  const target = (pct: number, kcalPerGram: number): MacroTarget => {
    const kcal = (energy.mer * pct) / 100;
    return { kcal: roundTo(kcal, 1), grams: roundTo(kcal / kcalPerGram, 1) };
  };

  return {
    protein: target(spec.proteinPct, MACRO_KCAL_PER_GRAM.protein),
    fat: target(spec.fatPct, MACRO_KCAL_PER_GRAM.fat),
    carbohydrate: target(spec.carbPct, MACRO_KCAL_PER_GRAM.carbohydrate),
  };
}
