// src/routes/ratios.ts
import { Router, Request, Response } from "express";
import type { PlannerSettings } from "../domain/settings";
import { sendSuccess } from "../middleware/responseHelper";
import { MacroTargetsRequestSchema, type RatioSelection } from "../schema";
import { estimateEnergy } from "../services/energyEstimator";
import { createCustomRatioSpec, getRatioPreset, listRatioPresets, macroTargets } from "../services/ratioSpecs";
import type { RatioSpec } from "../types/mealPlan";

export function resolveRatio(selection: RatioSelection, settings: Readonly<PlannerSettings>): RatioSpec {
  return "preset" in selection
    ? getRatioPreset(selection.preset, settings)
    : createCustomRatioSpec(selection.custom, settings);
}

export function createRatiosRouter(settings: Readonly<PlannerSettings>): Router {
  const router = Router();

  // GET /api/v1/ratios/presets
  router.get("/presets", (_req: Request, res: Response) => {
    return sendSuccess(res, listRatioPresets(settings));
  });

  // POST /api/v1/ratios/targets
  // body: { profile, ratio: { preset } | { custom } }
  router.post("/targets", (req: Request, res: Response) => {
    const body = MacroTargetsRequestSchema.parse(req.body);
    const ratio = resolveRatio(body.ratio, settings);
    const energy = estimateEnergy(body.profile);
    return sendSuccess(res, { energy, ratio, targets: macroTargets(energy, ratio) });
  });

  return router;
}
