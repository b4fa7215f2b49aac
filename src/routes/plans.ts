// src/routes/plans.ts
import { Router, Request, Response, RequestHandler } from "express";
import { v4 as uuidv4 } from "uuid";
import type { PlannerSettings } from "../domain/settings";
import { sendSuccess } from "../middleware/responseHelper";
import { PlanRequestSchema, ValidatePlanRequestSchema } from "../schema";
import type { IngredientCatalog } from "../services/ingredientCatalog";
import { computeWeeklyPlan, validateSubmittedPlan } from "../services/mealPlanner";
import { roundTo } from "../services/nutrientMath";
import type { MealPlanEntry, NutrientTotals, WeeklyPlan } from "../types/mealPlan";
import { resolveRatio } from "./ratios";

const presentTotals = (totals: NutrientTotals) => ({
  grams: roundTo(totals.grams, 1),
  kcal: roundTo(totals.kcal, 1),
  protein: roundTo(totals.protein, 1),
  fat: roundTo(totals.fat, 1),
  carbohydrate: roundTo(totals.carbohydrate, 1),
  fiber: roundTo(totals.fiber, 1),
  calcium: roundTo(totals.calcium, 3),
  phosphorus: roundTo(totals.phosphorus, 3),
  proteinPct: roundTo(totals.proteinPct, 1),
  fatPct: roundTo(totals.fatPct, 1),
  carbPct: roundTo(totals.carbPct, 1),
  caPRatio: Number.isFinite(totals.caPRatio) ? roundTo(totals.caPRatio, 2) : null,
});

const presentDay = (entry: MealPlanEntry) => ({
  day: entry.day,
  portions: entry.portions.map((p) => ({
    ingredientId: p.ingredient.id,
    name: p.ingredient.name,
    role: p.role,
    grams: p.grams,
  })),
  totals: presentTotals(entry.totals),
  notes: entry.notes,
  signature: entry.signature,
  usedFallback: entry.usedFallback,
});

// ingredient objects are replaced by ids; the catalog endpoint has the details
export const presentPlan = (plan: WeeklyPlan) => ({
  profile: plan.profile,
  energy: plan.energy,
  ratio: plan.ratio,
  days: plan.days.map(presentDay),
  report: plan.report,
});

export function createPlansRouter(
  catalog: IngredientCatalog,
  settings: Readonly<PlannerSettings>,
  limiter: RequestHandler
): Router {
  const router = Router();

  // POST /api/v1/plans
  // body: { profile, pantry: string[], ratio?: { preset } | { custom }, days? }
  router.post("/", limiter, (req: Request, res: Response) => {
    const body = PlanRequestSchema.parse(req.body);
    const ratio = resolveRatio(body.ratio, settings);
    const plan = computeWeeklyPlan(body.pantry, body.profile, ratio, catalog, { settings, days: body.days });
    const planId = uuidv4();

    console.log(
      `[plans] ${planId}: ${plan.days.length}-day plan at ${Math.round(plan.energy.mer)} kcal (${ratio.key}), ` +
        `${plan.days.filter((d) => d.usedFallback).length} fallback day(s)`
    );

    return sendSuccess(res, { planId, ...presentPlan(plan) }, 201);
  });

  // POST /api/v1/plans/validate
  // body: { profile, ratio?, days: [[{ ingredientId, grams }]] }
  router.post("/validate", (req: Request, res: Response) => {
    const body = ValidatePlanRequestSchema.parse(req.body);
    const ratio = resolveRatio(body.ratio, settings);
    const { plan, report } = validateSubmittedPlan(
      { profile: body.profile, ratio, days: body.days },
      catalog,
      settings
    );

    return sendSuccess(res, { report, days: plan.days.map(presentDay) });
  });

  return router;
}
