// src/routes/energy.ts
import { Router, Request, Response } from "express";
import { sendSuccess } from "../middleware/responseHelper";
import { AnimalProfileSchema } from "../schema";
import { estimateEnergy } from "../services/energyEstimator";

export const energyRouter = Router();

// POST /api/v1/energy
// body: AnimalProfile
energyRouter.post("/", (req: Request, res: Response) => {
  const profile = AnimalProfileSchema.parse(req.body);
  return sendSuccess(res, estimateEnergy(profile));
});
