// src/routes/ingredients.ts
import { Router, Request, Response } from "express";
import { sendSuccess } from "../middleware/responseHelper";
import { IngredientQuerySchema } from "../schema";
import type { IngredientCatalog } from "../services/ingredientCatalog";

/**
 * GET /api/v1/ingredients?category=protein&q=liver&sort=kcal
 * GET /api/v1/ingredients/:id
 */
export function createIngredientsRouter(catalog: IngredientCatalog): Router {
  const router = Router();

  router.get("/", (req: Request, res: Response) => {
    const query = IngredientQuerySchema.parse(req.query);
    const ingredients = catalog.search({ category: query.category, text: query.q, sortBy: query.sort });
    return sendSuccess(res, { count: ingredients.length, ingredients });
  });

  router.get("/:id", (req: Request, res: Response) => {
    return sendSuccess(res, catalog.require(req.params.id));
  });

  return router;
}
