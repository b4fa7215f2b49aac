// src/routes/supplements.ts
import { Router, Request, Response } from "express";
import { sendSuccess } from "../middleware/responseHelper";
import { SupplementQuerySchema } from "../schema";
import { listSupplements, suggestSupplements, SUPPLEMENT_DISCLAIMER } from "../services/supplementAdvisor";

export const supplementsRouter = Router();

// GET /api/v1/supplements?focus=gut,skin_coat
// Without a focus the whole guide is returned.
supplementsRouter.get("/", (req: Request, res: Response) => {
  const { focus } = SupplementQuerySchema.parse(req.query);
  const supplements = focus.length > 0 ? suggestSupplements(focus) : listSupplements();

  return sendSuccess(res, { focus, count: supplements.length, supplements, note: SUPPLEMENT_DISCLAIMER });
});
