// src/services/ingredientCatalog.ts
// In-memory ingredient table. Loaded once, read-only afterwards.

import fs from "fs";
import { z } from "zod";
import defaultCatalogData from "../data/ingredients.json";
import { CatalogLoadError, IngredientNotFoundError } from "../domain/errors";
import {
  INGREDIENT_CATEGORIES,
  SHELF_LIFE_CLASSES,
  type Ingredient,
  type IngredientCategory,
} from "../types/nutrition";

const amount = z.number({ required_error: "is required" }).finite().nonnegative("must not be negative");

const MacroProfileSchema = z.object({
  kcal: amount,
  protein: amount,
  fat: amount,
  carbohydrate: amount,
  fiber: amount,
  calcium: amount,
  phosphorus: amount,
});

export const IngredientEntrySchema = z.object({
  id: z.string().trim().min(1, "id is required"),
  name: z.string().trim().min(1, "name is required"),
  category: z.enum(INGREDIENT_CATEGORIES),
  shelfLife: z.enum(SHELF_LIFE_CLASSES).default("refrigerated"),
  per100g: MacroProfileSchema,
  cautionFlags: z.array(z.string().trim().min(1)).default([]),
  cautionNotes: z.array(z.string().trim().min(1)).default([]),
  tags: z.array(z.string().trim().min(1)).default([]),
  microNote: z.string().optional(),
  benefits: z.array(z.string()).default([]),
});

export type IngredientEntry = z.input<typeof IngredientEntrySchema>;

const CatalogDocumentSchema = z.union([
  z.array(z.unknown()),
  z.object({ ingredients: z.array(z.unknown()) }).passthrough(),
]);

export type IngredientSortKey = "name" | "category" | "kcal" | "protein" | "fat" | "carbohydrate";

export interface IngredientQuery {
  category?: IngredientCategory;
  text?: string;
  sortBy?: IngredientSortKey;
}

export class IngredientCatalog {
  private readonly items: readonly Ingredient[];
  private readonly byId: ReadonlyMap<string, Ingredient>;

  constructor(ingredients: readonly Ingredient[]) {
    this.items = Object.freeze([...ingredients]);
    this.byId = new Map(ingredients.map((ingredient) => [ingredient.id, ingredient]));
  }

  get size(): number {
    return this.items.length;
  }

  list(): readonly Ingredient[] {
    return this.items;
  }

  lookup(id: string): Ingredient | undefined {
    return this.byId.get(id);
  }

  require(id: string): Ingredient {
    const ingredient = this.byId.get(id);
    if (!ingredient) {
      throw new IngredientNotFoundError(id);
    }
    return ingredient;
  }

  filter(predicate: (ingredient: Ingredient) => boolean): Ingredient[] {
    return this.items.filter(predicate);
  }

  byCategory(category: IngredientCategory): Ingredient[] {
    return this.filter((ingredient) => ingredient.category === category);
  }

  search(query: IngredientQuery = {}): Ingredient[] {
    const needle = query.text?.trim().toLowerCase() ?? "";

    const matches = this.filter((ingredient) => {
      if (query.category && ingredient.category !== query.category) return false;
      if (!needle) return true;
      return [ingredient.name, ingredient.microNote ?? "", ...ingredient.benefits].some((field) =>
        field.toLowerCase().includes(needle)
      );
    });

    return matches.sort(comparatorFor(query.sortBy ?? "category"));
  }
}

function comparatorFor(sortBy: IngredientSortKey): (a: Ingredient, b: Ingredient) => number {
  const byName = (a: Ingredient, b: Ingredient) => a.name.localeCompare(b.name);

  switch (sortBy) {
    case "name":
      return byName;
    case "category":
      return (a, b) => a.category.localeCompare(b.category) || byName(a, b);
    default:
      return (a, b) => a.per100g[sortBy] - b.per100g[sortBy] || byName(a, b);
  }
}

const freezeIngredient = (entry: z.output<typeof IngredientEntrySchema>): Ingredient =>
  Object.freeze({
    id: entry.id,
    name: entry.name,
    category: entry.category,
    shelfLife: entry.shelfLife,
    per100g: Object.freeze({ ...entry.per100g }),
    cautionFlags: Object.freeze([...new Set(entry.cautionFlags)]),
    cautionNotes: Object.freeze([...entry.cautionNotes]),
    tags: Object.freeze([...new Set(entry.tags)]),
    ...(entry.microNote !== undefined ? { microNote: entry.microNote } : {}),
    benefits: Object.freeze([...entry.benefits]),
  });

/**
 * Builds a catalog from raw entries, either a bare array or `{ ingredients }`.
 * Any malformed entry rejects the whole source.
 */
export function loadCatalog(source: unknown): IngredientCatalog {
  const document = CatalogDocumentSchema.safeParse(source);
  if (!document.success) {
    throw new CatalogLoadError(["source must be an array of ingredients or { ingredients: [...] }"]);
  }

  const rawEntries = Array.isArray(document.data) ? document.data : document.data.ingredients;
  const issues: string[] = [];
  const ingredients: Ingredient[] = [];
  const seen = new Set<string>();

  rawEntries.forEach((raw, index) => {
    const parsed = IngredientEntrySchema.safeParse(raw);
    if (!parsed.success) {
      for (const issue of parsed.error.issues) {
        issues.push(`entry ${index} ${issue.path.join(".") || "(root)"} ${issue.message}`);
      }
      return;
    }

    if (seen.has(parsed.data.id)) {
      issues.push(`entry ${index} id "${parsed.data.id}" is duplicated`);
      return;
    }
    seen.add(parsed.data.id);
    ingredients.push(freezeIngredient(parsed.data));
  });

  if (issues.length) {
    throw new CatalogLoadError(issues);
  }

  return new IngredientCatalog(ingredients);
}

export function loadCatalogFromFile(filePath: string): IngredientCatalog {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new CatalogLoadError([`could not read ${filePath}: ${reason}`], { cause: err });
  }
  return loadCatalog(raw);
}

export function loadDefaultCatalog(): IngredientCatalog {
  return loadCatalog(defaultCatalogData);
}
