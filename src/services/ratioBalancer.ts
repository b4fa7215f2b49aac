// src/services/ratioBalancer.ts
// Finds gram quantities for one day's meal: energy on MER, macro shares on the
// ratio spec, Ca:P inside its bounds.

import { BalanceError, InsufficientCandidatesError, type BalanceConstraint } from "../domain/errors";
import { DEFAULT_PLANNER_SETTINGS, type PlannerSettings } from "../domain/settings";
import type { IngredientRole, MacroRole, Portion, RatioSpec } from "../types/mealPlan";
import type { EnergyTarget, Ingredient, IngredientCategory } from "../types/nutrition";
import { solveLinearSystem } from "../utils/linearAlgebra";
import {
  MACRO_KEY_BY_ROLE,
  MACRO_ROLES,
  caPRatio,
  combinationSignature,
  computeTotals,
  dominantMacro,
  kcalPerGram,
  macroKcalPerGram,
  roundTo,
} from "./nutrientMath";

interface RoleRule {
  role: IngredientRole;
  accepts: (ingredient: Ingredient) => boolean;
}

/** How each catalog category takes part in balancing. */
export const ROLE_RULES: Record<IngredientCategory, RoleRule> = {
  protein: { role: "protein", accepts: (i) => dominantMacro(i) === "protein" },
  carb: { role: "carb", accepts: (i) => dominantMacro(i) === "carbohydrate" },
  fat: { role: "fat", accepts: (i) => dominantMacro(i) === "fat" },
  vegetable: { role: "vegetable", accepts: (i) => i.per100g.kcal > 0 },
  supplement: { role: "calcium", accepts: (i) => i.per100g.calcium > i.per100g.phosphorus },
};

export type RolePools = Record<IngredientRole, Ingredient[]>;

// closest to 1 kcal/g first: portions stay in a practical range
const byPortionPracticality = (a: Ingredient, b: Ingredient): number =>
  Math.abs(kcalPerGram(a) - 1) - Math.abs(kcalPerGram(b) - 1) || a.id.localeCompare(b.id);

export function groupByRole(candidates: readonly Ingredient[]): RolePools {
  const pools: RolePools = { protein: [], fat: [], carb: [], vegetable: [], calcium: [] };
  const seen = new Set<string>();

  for (const ingredient of candidates) {
    if (seen.has(ingredient.id)) continue;
    seen.add(ingredient.id);

    const rule = ROLE_RULES[ingredient.category];
    if (rule.accepts(ingredient)) {
      pools[rule.role].push(ingredient);
    }
  }

  for (const pool of Object.values(pools)) {
    pool.sort(byPortionPracticality);
  }
  return pools;
}

export const requiredRoles = (spec: RatioSpec): MacroRole[] =>
  MACRO_ROLES.filter((role) => macroPct(spec, role) > 0);

/** Throws when a required macro role has no candidate. */
export function assertRequiredRoles(pools: RolePools, spec: RatioSpec): void {
  for (const role of requiredRoles(spec)) {
    if (pools[role].length === 0) {
      throw new InsufficientCandidatesError(role);
    }
  }
}

function macroPct(spec: RatioSpec, role: MacroRole): number {
  switch (role) {
    case "protein":
      return spec.proteinPct;
    case "fat":
      return spec.fatPct;
    case "carb":
      return spec.carbPct;
  }
}

export interface BalanceOptions {
  settings?: Readonly<PlannerSettings>;
  /** Combinations to pass over unless nothing else balances. */
  avoidSignatures?: Iterable<string>;
}

interface Slot {
  role: IngredientRole;
  pool: readonly Ingredient[];
}

type Attempt =
  | { ok: true; portions: Portion[]; signature: string }
  | { ok: false; constraint: BalanceConstraint; reason: string };

const CONSTRAINT_RANK: Record<BalanceConstraint, number> = {
  macro_distribution: 1,
  energy: 2,
  calcium_phosphorus: 3,
};

function* combinations(slots: readonly Slot[]): Generator<Ingredient[]> {
  if (slots.some((slot) => slot.pool.length === 0)) return;

  const index = slots.map(() => 0);
  for (;;) {
    yield slots.map((slot, i) => slot.pool[index[i]]);

    let pos = slots.length - 1;
    while (pos >= 0) {
      index[pos] += 1;
      if (index[pos] < slots[pos].pool.length) break;
      index[pos] = 0;
      pos -= 1;
    }
    if (pos < 0) return;
  }
}

/**
 * Picks one ingredient per required macro role (plus a vegetable when any is
 * available) and solves for portions. Combinations are tried in candidate
 * order; the first that passes every check wins.
 */
export function balance(
  target: EnergyTarget,
  spec: RatioSpec,
  candidates: readonly Ingredient[],
  options: BalanceOptions = {}
): Portion[] {
  const settings = options.settings ?? DEFAULT_PLANNER_SETTINGS;
  const avoid = new Set(options.avoidSignatures ?? []);
  const pools = groupByRole(candidates);
  assertRequiredRoles(pools, spec);

  const slots: Slot[] = requiredRoles(spec).map((role) => ({ role, pool: pools[role] }));
  if (pools.vegetable.length > 0 && settings.vegetableEnergyShare > 0) {
    slots.push({ role: "vegetable", pool: pools.vegetable });
  }

  let avoided: Portion[] | undefined;
  let furthest: { constraint: BalanceConstraint; reason: string } | undefined;
  let tried = 0;

  for (const combo of combinations(slots)) {
    if (tried >= settings.maxCombinations) break;
    tried += 1;

    const attempt = evaluate(combo, slots, target, spec, pools.calcium, settings);
    if (attempt.ok) {
      if (!avoid.has(attempt.signature)) {
        return attempt.portions;
      }
      avoided ??= attempt.portions;
      continue;
    }

    if (!furthest || CONSTRAINT_RANK[attempt.constraint] > CONSTRAINT_RANK[furthest.constraint]) {
      furthest = { constraint: attempt.constraint, reason: attempt.reason };
    }
  }

  if (avoided) {
    return avoided;
  }

  const failure: { constraint: BalanceConstraint; reason: string } = furthest ?? {
    constraint: "macro_distribution",
    reason: "no combination was evaluated",
  };
  throw new BalanceError(
    failure.constraint,
    `No ingredient combination satisfies the ${failure.constraint.replace("_", " ")} constraint: ${failure.reason}`
  );
}

function evaluate(
  combo: readonly Ingredient[],
  slots: readonly Slot[],
  target: EnergyTarget,
  spec: RatioSpec,
  supplements: readonly Ingredient[],
  settings: Readonly<PlannerSettings>
): Attempt {
  const shares = solveEnergyShares(combo, slots, spec, settings.vegetableEnergyShare);
  if (!shares) {
    return { ok: false, constraint: "macro_distribution", reason: "macro targets cannot be reached with non-negative portions" };
  }

  const unitKcal = combo.reduce((sum, ingredient, i) => sum + shares[i] * kcalPerGram(ingredient), 0);
  if (!(unitKcal > 0) || !Number.isFinite(unitKcal)) {
    return { ok: false, constraint: "macro_distribution", reason: "combination provides no energy" };
  }

  const scale = target.mer / unitKcal;
  let grams = shares.map((x) => x * scale);

  const { min, max } = spec.caPRatio;
  const calcium = combo.reduce((sum, ing, i) => sum + (grams[i] * ing.per100g.calcium) / 100, 0);
  const phosphorus = combo.reduce((sum, ing, i) => sum + (grams[i] * ing.per100g.phosphorus) / 100, 0);
  const ratio = caPRatio(calcium, phosphorus);

  if (ratio > max) {
    return { ok: false, constraint: "calcium_phosphorus", reason: `Ca:P ${formatRatio(ratio)} is above ${max}` };
  }

  let supplement: { ingredient: Ingredient; grams: number } | undefined;
  if (ratio < min) {
    supplement = pickSupplement(supplements, calcium, phosphorus, (min + max) / 2);
    if (!supplement) {
      return {
        ok: false,
        constraint: "calcium_phosphorus",
        reason: `Ca:P ${formatRatio(ratio)} is below ${min} and no calcium source can raise it`,
      };
    }

    const supplementKcal = supplement.grams * kcalPerGram(supplement.ingredient);
    if (supplementKcal > 0) {
      const shrink = target.mer / (target.mer + supplementKcal);
      grams = grams.map((g) => g * shrink);
      supplement = { ...supplement, grams: supplement.grams * shrink };
    }
  }

  const portions: Portion[] = combo.map((ingredient, i) => ({
    ingredient,
    role: slots[i].role,
    grams: roundTo(grams[i], 1),
  }));
  if (supplement) {
    portions.push({ ingredient: supplement.ingredient, role: "calcium", grams: Math.ceil(supplement.grams * 10) / 10 });
  }

  const totals = computeTotals(portions);

  const kcalDeviation = Math.abs(totals.kcal - target.mer) / target.mer;
  if (kcalDeviation > settings.kcalTolerance) {
    return {
      ok: false,
      constraint: "energy",
      reason: `${roundTo(totals.kcal, 1)} kcal is ${roundTo(kcalDeviation * 100, 1)}% away from ${roundTo(target.mer, 1)}`,
    };
  }

  const pctSum = spec.proteinPct + spec.fatPct + spec.carbPct;
  const drift: [string, number, number][] = [
    ["protein", totals.proteinPct, (spec.proteinPct / pctSum) * 100],
    ["fat", totals.fatPct, (spec.fatPct / pctSum) * 100],
    ["carbohydrate", totals.carbPct, (spec.carbPct / pctSum) * 100],
  ];
  for (const [macro, actual, wanted] of drift) {
    if (Math.abs(actual - wanted) > spec.tolerancePct) {
      return {
        ok: false,
        constraint: "macro_distribution",
        reason: `${macro} share ${roundTo(actual, 1)}% misses ${roundTo(wanted, 1)}% by more than ${spec.tolerancePct} points`,
      };
    }
  }

  if (totals.caPRatio < min || totals.caPRatio > max) {
    return {
      ok: false,
      constraint: "calcium_phosphorus",
      reason: `Ca:P ${formatRatio(totals.caPRatio)} is outside ${min}..${max} after rounding`,
    };
  }

  return { ok: true, portions, signature: combinationSignature(portions.map((p) => p.ingredient.id)) };
}

/**
 * Grams per kcal of the final meal for each chosen ingredient. One row per
 * required macro fixes its share of macro energy; the vegetable row holds the
 * vegetable at its share of total energy.
 */
function solveEnergyShares(
  combo: readonly Ingredient[],
  slots: readonly Slot[],
  spec: RatioSpec,
  vegetableShare: number
): number[] | null {
  const macroSlots = slots.filter((slot): slot is Slot & { role: MacroRole } =>
    MACRO_ROLES.some((role) => role === slot.role)
  );
  const pctSum = macroSlots.reduce((sum, slot) => sum + macroPct(spec, slot.role), 0);
  if (!(pctSum > 0)) return null;

  const matrix: number[][] = [];
  const rhs: number[] = [];

  for (const slot of macroSlots) {
    const macro = MACRO_KEY_BY_ROLE[slot.role];
    matrix.push(combo.map((ingredient) => macroKcalPerGram(ingredient, macro)));
    rhs.push(macroPct(spec, slot.role) / pctSum);
  }

  const vegIndex = slots.findIndex((slot) => slot.role === "vegetable");
  if (vegIndex >= 0) {
    matrix.push(
      combo.map((ingredient, j) =>
        j === vegIndex ? (1 - vegetableShare) * kcalPerGram(ingredient) : -vegetableShare * kcalPerGram(ingredient)
      )
    );
    rhs.push(0);
  }

  const solution = solveLinearSystem(matrix, rhs);
  if (!solution || solution.some((x) => !Number.isFinite(x) || x < 0)) {
    return null;
  }
  return solution;
}

function pickSupplement(
  supplements: readonly Ingredient[],
  calcium: number,
  phosphorus: number,
  targetRatio: number
): { ingredient: Ingredient; grams: number } | undefined {
  for (const ingredient of supplements) {
    const caPerGram = ingredient.per100g.calcium / 100;
    const pPerGram = ingredient.per100g.phosphorus / 100;
    const denominator = caPerGram - targetRatio * pPerGram;
    if (!(denominator > 0)) continue;

    const grams = (targetRatio * phosphorus - calcium) / denominator;
    if (grams > 0 && Number.isFinite(grams)) {
      return { ingredient, grams };
    }
  }
  return undefined;
}

const formatRatio = (ratio: number): string => (Number.isFinite(ratio) ? roundTo(ratio, 2).toString() : "unbounded");
