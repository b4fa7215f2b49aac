import { z } from "zod";
import { SUPPLEMENT_FOCUSES } from "./data/supplements";
import { ACTIVITY_LEVELS, HEALTH_FLAGS, INGREDIENT_CATEGORIES, LIFE_STAGES } from "./types/nutrition";

/**
 * The dog the plan is for
 */
export const AnimalProfileSchema = z.object({
  weightKg: z.number().positive("weightKg must be positive").max(120, "weightKg looks unrealistic"),
  lifeStage: z.enum(LIFE_STAGES),
  activity: z.enum(ACTIVITY_LEVELS).default("moderate"),
  healthFlags: z.array(z.enum(HEALTH_FLAGS)).default([]),
  neutered: z.boolean().optional(),
  ageMonths: z.number().nonnegative().optional(), // only used for puppies
  name: z.string().trim().max(80).optional(),
  breed: z.string().trim().max(80).optional(),
});

export const CustomRatioSchema = z.object({
  proteinPct: z.number(),
  fatPct: z.number(),
  carbPct: z.number(),
  caPRatio: z.object({ min: z.number(), max: z.number() }).partial().optional(),
  tolerancePct: z.number().positive().optional(),
  label: z.string().trim().min(1).max(80).optional(),
});

// either a preset key or custom percentages (validated again by the engine)
export const RatioSelectionSchema = z.union([
  z.object({ preset: z.string().trim().min(1) }).strict(),
  z.object({ custom: CustomRatioSchema }).strict(),
]);

export type RatioSelection = z.infer<typeof RatioSelectionSchema>;

const DEFAULT_RATIO: RatioSelection = { preset: "balanced" };

export const IngredientQuerySchema = z.object({
  category: z.enum(INGREDIENT_CATEGORIES).optional(),
  q: z.string().trim().max(100).optional(),
  sort: z.enum(["name", "category", "kcal", "protein", "fat", "carbohydrate"]).optional(),
});

// ?focus=gut,skin_coat or ?focus=gut&focus=skin_coat
export const SupplementQuerySchema = z.object({
  focus: z
    .union([z.string(), z.array(z.string())])
    .optional()
    .transform((value) =>
      [value ?? []]
        .flat()
        .flatMap((entry) => entry.split(","))
        .map((entry) => entry.trim())
        .filter(Boolean)
    )
    .pipe(z.array(z.enum(SUPPLEMENT_FOCUSES))),
});

export const MacroTargetsRequestSchema = z.object({
  profile: AnimalProfileSchema,
  ratio: RatioSelectionSchema.default(DEFAULT_RATIO),
});

export const PlanRequestSchema = z.object({
  profile: AnimalProfileSchema,
  pantry: z.array(z.string().trim().min(1)).min(1, "At least one pantry ingredient is required"),
  ratio: RatioSelectionSchema.default(DEFAULT_RATIO),
  days: z.number().int().min(1).max(14).optional(),
});

export const ValidatePlanRequestSchema = z.object({
  profile: AnimalProfileSchema,
  ratio: RatioSelectionSchema.default(DEFAULT_RATIO),
  days: z
    .array(
      z
        .array(
          z.object({
            ingredientId: z.string().trim().min(1),
            grams: z.number(), // negative grams are reported by the validator, not rejected here
          })
        )
        .min(1, "Each day needs at least one portion")
    )
    .min(1, "At least one day is required")
    .max(14),
});
