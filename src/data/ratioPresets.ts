// src/data/ratioPresets.ts
// Named macro-energy targets offered to owners. Percentages are shares of daily kcal.

export interface RatioPresetDefinition {
  key: string;
  label: string;
  proteinPct: number;
  fatPct: number;
  carbPct: number;
  caPRatio?: { min: number; max: number };
  note: string;
}

export const RATIO_PRESETS: readonly RatioPresetDefinition[] = [
  {
    key: "balanced",
    label: "Balanced cooked fresh",
    proteinPct: 40,
    fatPct: 35,
    carbPct: 25,
    note: "A practical cooked-fresh ratio emphasizing lean protein and diverse vegetables.",
  },
  {
    key: "weight",
    label: "Weight-aware and satiety",
    proteinPct: 45,
    fatPct: 25,
    carbPct: 30,
    note: "Lower fat energy with more volume from fiber-rich carbohydrates.",
  },
  {
    key: "active",
    label: "Active adult energy",
    proteinPct: 35,
    fatPct: 45,
    carbPct: 20,
    note: "More energy from fat for high activity while keeping vegetables present.",
  },
  {
    key: "senior",
    label: "Senior gentle balance",
    proteinPct: 38,
    fatPct: 32,
    carbPct: 30,
    note: "Fiber and micronutrient focus with moderate fat.",
  },
  {
    key: "puppy",
    label: "Puppy growth (cooked baseline)",
    proteinPct: 40,
    fatPct: 40,
    carbPct: 20,
    caPRatio: { min: 1.1, max: 1.8 },
    note: "Growth needs are complex; confirm calcium and vitamin balance with a veterinarian.",
  },
  {
    key: "gentle_gi",
    label: "Gentle GI rotation",
    proteinPct: 35,
    fatPct: 25,
    carbPct: 40,
    note: "A calmer profile leaning on easy proteins and soothing carbohydrates.",
  },
];
