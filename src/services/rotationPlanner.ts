// src/services/rotationPlanner.ts
// Sequences balanced meals over the week, rotating ingredients per role.

import { BalanceError, PlanningError } from "../domain/errors";
import { DEFAULT_PLANNER_SETTINGS, type PlannerSettings } from "../domain/settings";
import type {
  CautionNote,
  MealPlanEntry,
  Portion,
  RatioSpec,
  ValidationIssue,
  WeeklyPlan,
} from "../types/mealPlan";
import type { AnimalProfile, EnergyTarget, Ingredient } from "../types/nutrition";
import { combinationSignature, computeTotals } from "./nutrientMath";
import { assertRequiredRoles, balance, groupByRole, requiredRoles, type RolePools } from "./ratioBalancer";
import { buildReport } from "./planValidator";

export interface PlanOptions {
  settings?: Readonly<PlannerSettings>;
  days?: number;
  profile?: AnimalProfile;
}

const signatureOf = (portions: readonly Portion[]): string =>
  combinationSignature(portions.map((p) => p.ingredient.id));

export function cautionNotesFor(portions: readonly Portion[]): CautionNote[] {
  const notes: CautionNote[] = [];
  const seen = new Set<string>();

  for (const { ingredient } of portions) {
    if (seen.has(ingredient.id) || ingredient.cautionFlags.length === 0) continue;
    seen.add(ingredient.id);
    for (const text of ingredient.cautionNotes) {
      notes.push({ ingredientId: ingredient.id, text });
    }
  }
  return notes;
}

export function buildEntry(day: number, portions: readonly Portion[], usedFallback = false): MealPlanEntry {
  return Object.freeze({
    day,
    portions: Object.freeze(portions.map((portion) => Object.freeze({ ...portion }))),
    totals: computeTotals(portions),
    notes: cautionNotesFor(portions),
    signature: signatureOf(portions),
    usedFallback,
  });
}

/** The ingredients on offer for a day: one per role from its rotation slot, all calcium sources. */
function rotationSubset(pools: RolePools, spec: RatioSpec, dayIndex: number): Ingredient[] {
  const pick = (pool: readonly Ingredient[]): Ingredient[] =>
    pool.length > 0 ? [pool[dayIndex % pool.length]] : [];

  return [
    ...requiredRoles(spec).flatMap((role) => pick(pools[role])),
    ...pick(pools.vegetable),
    ...pools.calcium,
  ];
}

/**
 * Builds the week. A day whose rotation subset cannot be balanced, or can
 * only repeat the previous day, falls back to the whole pantry, steering away
 * from the previous day's combination.
 */
export function plan(
  pantry: readonly Ingredient[],
  target: EnergyTarget,
  spec: RatioSpec,
  options: PlanOptions = {}
): WeeklyPlan {
  const settings = options.settings ?? DEFAULT_PLANNER_SETTINGS;
  const dayCount = options.days ?? settings.planDays;
  if (!Number.isInteger(dayCount) || dayCount < 1) {
    throw new PlanningError(`A plan needs at least one day (got ${dayCount})`);
  }

  const pools = groupByRole(pantry);
  assertRequiredRoles(pools, spec);

  const days: MealPlanEntry[] = [];
  const issues: ValidationIssue[] = [];
  let previous: MealPlanEntry | undefined;

  for (let index = 0; index < dayCount; index++) {
    const day = index + 1;
    const avoidSignatures = previous ? [previous.signature] : [];
    let portions: Portion[] | undefined;
    let repeat: Portion[] | undefined;
    let fallbackReason = "";

    try {
      const picked = balance(target, spec, rotationSubset(pools, spec, index), { settings, avoidSignatures });
      if (previous && signatureOf(picked) === previous.signature) {
        repeat = picked;
        fallbackReason = `the rotation ingredients only repeat day ${previous.day}`;
      } else {
        portions = picked;
      }
    } catch (err) {
      if (!(err instanceof BalanceError)) throw err;
      fallbackReason = `the rotation ingredients failed the ${err.constraint.replace("_", " ")} check`;
    }

    let usedFallback = false;
    if (!portions) {
      try {
        const widened = balance(target, spec, pantry, { settings, avoidSignatures });
        if (repeat && signatureOf(widened) === signatureOf(repeat)) {
          portions = repeat;
        } else {
          portions = widened;
          usedFallback = true;
        }
      } catch (fallbackErr) {
        if (!(fallbackErr instanceof BalanceError)) throw fallbackErr;
        if (!repeat) {
          throw new PlanningError(`Day ${day} cannot be balanced from the pantry: ${fallbackErr.message}`, day, {
            cause: fallbackErr,
          });
        }
        portions = repeat;
      }

      if (usedFallback) {
        issues.push({
          code: "ROTATION_FALLBACK",
          severity: "warning",
          day,
          message: `Day ${day}: ${fallbackReason}; the full pantry was used.`,
        });
      }
    }

    const entry = buildEntry(day, portions, usedFallback);
    if (previous && previous.signature === entry.signature) {
      issues.push({
        code: "ROTATION_REPEAT",
        severity: "info",
        day,
        message: `Day ${day} repeats the combination of day ${previous.day}.`,
      });
    }

    days.push(entry);
    previous = entry;
  }

  return {
    ...(options.profile ? { profile: options.profile } : {}),
    energy: target,
    ratio: spec,
    days,
    report: buildReport(issues),
  };
}
