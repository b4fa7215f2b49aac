// src/services/planValidator.ts
// Read-only checks over a finished plan. Never mutates the plan.

import { DEFAULT_PLANNER_SETTINGS, type PlannerSettings } from "../domain/settings";
import type {
  MealPlanEntry,
  Severity,
  ValidationIssue,
  ValidationReport,
  WeeklyPlan,
} from "../types/mealPlan";
import type { HealthFlag } from "../types/nutrition";
import { roundTo } from "./nutrientMath";

const SEVERITY_RANK: Record<Severity, number> = { info: 1, warning: 2, critical: 3 };

// caution flags that work against a health goal
export const HEALTH_FLAG_CONFLICTS: Partial<Record<HealthFlag, readonly string[]>> = {
  pancreatitis: ["high_fat"],
  sensitive_stomach: ["gas", "rich"],
  weight_loss: ["starch", "sugar"],
  kidney: ["high_phosphorus"],
  food_allergy: ["common_allergen"],
};

export function issueKey(issue: ValidationIssue): string {
  if (issue.subject) return `${issue.code}:${issue.subject}`;
  if (issue.day !== undefined) return `${issue.code}:day-${issue.day}`;
  return issue.code;
}

export function highestSeverity(issues: Iterable<ValidationIssue>): Severity | null {
  let highest: Severity | null = null;
  for (const issue of issues) {
    if (!highest || SEVERITY_RANK[issue.severity] > SEVERITY_RANK[highest]) {
      highest = issue.severity;
    }
  }
  return highest;
}

export function buildReport(issues: readonly ValidationIssue[]): ValidationReport {
  const byKey: Record<string, ValidationIssue> = {};
  for (const issue of issues) {
    byKey[issueKey(issue)] = issue;
  }
  return { issues: byKey, highestSeverity: highestSeverity(Object.values(byKey)) };
}

/** Later reports win on key collisions. */
export function mergeReports(...reports: ValidationReport[]): ValidationReport {
  return buildReport(reports.flatMap((report) => Object.values(report.issues)));
}

export interface ValidateOptions {
  settings?: Readonly<PlannerSettings>;
}

function checkDay(entry: MealPlanEntry, plan: WeeklyPlan, settings: Readonly<PlannerSettings>): ValidationIssue[] {
  const { day, totals } = entry;

  const invalid = entry.portions.filter((p) => !Number.isFinite(p.grams) || p.grams < 0);
  if (invalid.length > 0) {
    return [
      {
        code: "INVALID_QUANTITY",
        severity: "critical",
        day,
        message: `Day ${day}: invalid quantity for ${invalid.map((p) => p.ingredient.id).join(", ")}.`,
      },
    ];
  }

  const issues: ValidationIssue[] = [];
  const mer = plan.energy.mer;

  const deviation = (totals.kcal - mer) / mer;
  if (Math.abs(deviation) > settings.kcalTolerance) {
    issues.push({
      code: "ENERGY_OFF_TARGET",
      severity: Math.abs(deviation) > settings.criticalKcalTolerance ? "critical" : "warning",
      day,
      message: `Day ${day}: ${roundTo(totals.kcal, 1)} kcal is ${roundTo(deviation * 100, 1)}% from the ${roundTo(mer, 1)} kcal target.`,
    });
  }

  const { min, max } = plan.ratio.caPRatio;
  const absolute = settings.absoluteCaPBounds;
  const ratio = totals.caPRatio;
  const ratioText = Number.isFinite(ratio) ? String(roundTo(ratio, 2)) : "unbounded";

  if (totals.phosphorus <= 0 || !(ratio >= absolute.min && ratio <= absolute.max)) {
    issues.push({
      code: "CA_P_OUT_OF_RANGE",
      severity: "critical",
      day,
      message: `Day ${day}: Ca:P ${ratioText} is outside the safe range ${absolute.min}-${absolute.max}.`,
    });
  } else if (ratio < min || ratio > max) {
    issues.push({
      code: "CA_P_OUT_OF_RANGE",
      severity: "warning",
      day,
      message: `Day ${day}: Ca:P ${ratioText} is outside the ${min}-${max} target.`,
    });
  }

  const spec = plan.ratio;
  const pctSum = spec.proteinPct + spec.fatPct + spec.carbPct;
  if (pctSum > 0) {
    const off = [
      ["protein", totals.proteinPct, spec.proteinPct] as const,
      ["fat", totals.fatPct, spec.fatPct] as const,
      ["carbohydrate", totals.carbPct, spec.carbPct] as const,
    ]
      .filter(([, actual, wanted]) => Math.abs(actual - (wanted / pctSum) * 100) > spec.tolerancePct)
      .map(([macro, actual]) => `${macro} ${roundTo(actual, 1)}%`);

    if (off.length > 0) {
      issues.push({
        code: "MACRO_OFF_TARGET",
        severity: "warning",
        day,
        message: `Day ${day}: ${off.join(", ")} outside ±${spec.tolerancePct} points of ${spec.label}.`,
      });
    }
  }

  if (entry.usedFallback) {
    issues.push({
      code: "ROTATION_FALLBACK",
      severity: "warning",
      day,
      message: `Day ${day}: balanced from the full pantry instead of its rotation slot.`,
    });
  }

  return issues;
}

function checkWeek(plan: WeeklyPlan, settings: Readonly<PlannerSettings>): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const ingredients = new Map(
    plan.days.flatMap((entry) => entry.portions.map((p) => [p.ingredient.id, p.ingredient] as const))
  );

  for (const tag of settings.requiredWeeklyTags) {
    const present = [...ingredients.values()].some((ingredient) => ingredient.tags.includes(tag));
    if (!present) {
      issues.push({
        code: "MISSING_MICRONUTRIENT_SOURCE",
        severity: "info",
        subject: tag,
        message: `No "${tag}" ingredient appears this week; consider adding one for micronutrients.`,
      });
    }
  }

  // flagged ingredient id -> days whose entry carries no note for it
  const unnoted = new Map<string, number[]>();
  for (const entry of plan.days) {
    const noted = new Set(entry.notes.map((note) => note.ingredientId));
    for (const { ingredient } of entry.portions) {
      if (ingredient.cautionFlags.length === 0 || noted.has(ingredient.id)) continue;
      const days = unnoted.get(ingredient.id) ?? [];
      if (!days.includes(entry.day)) days.push(entry.day);
      unnoted.set(ingredient.id, days);
    }
  }
  for (const [id, days] of unnoted) {
    const ingredient = ingredients.get(id);
    if (!ingredient) continue;
    issues.push({
      code: "CAUTION_WITHOUT_NOTE",
      severity: "warning",
      subject: id,
      message:
        `${ingredient.name} is flagged (${ingredient.cautionFlags.join(", ")}) ` +
        `but carries no caution note on day${days.length > 1 ? "s" : ""} ${days.join(", ")}.`,
    });
  }

  const healthFlags = plan.profile?.healthFlags ?? [];
  for (const ingredient of ingredients.values()) {
    const conflicts = healthFlags.flatMap((flag) =>
      (HEALTH_FLAG_CONFLICTS[flag] ?? [])
        .filter((caution) => ingredient.cautionFlags.includes(caution))
        .map((caution) => `${flag}/${caution}`)
    );
    if (conflicts.length > 0) {
      issues.push({
        code: "HEALTH_FLAG_CONFLICT",
        severity: "warning",
        subject: ingredient.id,
        message: `${ingredient.name} conflicts with the dog's health flags (${conflicts.join(", ")}).`,
      });
    }
  }

  plan.days.forEach((entry, i) => {
    const previous = i > 0 ? plan.days[i - 1] : undefined;
    if (previous && previous.signature === entry.signature) {
      issues.push({
        code: "ROTATION_REPEAT",
        severity: "info",
        day: entry.day,
        message: `Day ${entry.day} repeats the combination of day ${previous.day}.`,
      });
    }
  });

  return issues;
}

/**
 * Checks every day against the energy target, the ratio spec and the Ca:P
 * bounds, then the week as a whole. Pure: same plan, same report.
 */
export function validatePlan(plan: WeeklyPlan, options: ValidateOptions = {}): ValidationReport {
  const settings = options.settings ?? DEFAULT_PLANNER_SETTINGS;
  const issues = [...plan.days.flatMap((entry) => checkDay(entry, plan, settings)), ...checkWeek(plan, settings)];
  return buildReport(issues);
}
