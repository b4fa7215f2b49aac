// src/domain/errors.ts
import type { IngredientRole } from "../types/mealPlan";

export type PlannerErrorCode =
  | "CATALOG_LOAD_FAILED"
  | "INGREDIENT_NOT_FOUND"
  | "INVALID_PROFILE"
  | "RATIO_SPEC_INVALID"
  | "INSUFFICIENT_CANDIDATES"
  | "BALANCE_INFEASIBLE"
  | "PLANNING_FAILED";

/**
 * Base class for every failure the planning engine reports.
 * `status` is the HTTP status the API answers with.
 */
export abstract class PlannerError extends Error {
  abstract readonly code: PlannerErrorCode;
  abstract readonly status: number;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  get details(): Record<string, unknown> {
    return {};
  }
}

export class CatalogLoadError extends PlannerError {
  readonly code = "CATALOG_LOAD_FAILED";
  readonly status = 500;

  constructor(readonly issues: string[], options?: { cause?: unknown }) {
    super(`Ingredient catalog could not be loaded: ${issues.join("; ")}`, options);
  }

  get details() {
    return { issues: this.issues };
  }
}

export class IngredientNotFoundError extends PlannerError {
  readonly code = "INGREDIENT_NOT_FOUND";
  readonly status = 404;

  constructor(readonly ingredientId: string) {
    super(`Ingredient "${ingredientId}" is not in the catalog`);
  }

  get details() {
    return { ingredientId: this.ingredientId };
  }
}

export class InvalidProfileError extends PlannerError {
  readonly code = "INVALID_PROFILE";
  readonly status = 400;

  constructor(readonly field: string, reason: string) {
    super(`Invalid animal profile (${field}): ${reason}`);
  }

  get details() {
    return { field: this.field };
  }
}

export class RatioSpecError extends PlannerError {
  readonly code = "RATIO_SPEC_INVALID";
  readonly status = 400;

  constructor(message: string) {
    super(message);
  }
}

export class InsufficientCandidatesError extends PlannerError {
  readonly code = "INSUFFICIENT_CANDIDATES";
  readonly status = 422;

  constructor(readonly role: IngredientRole) {
    super(`No eligible ${role} ingredient in the selection; add at least one ${role} source`);
  }

  get details() {
    return { role: this.role };
  }
}

export type BalanceConstraint = "macro_distribution" | "energy" | "calcium_phosphorus";

export class BalanceError extends PlannerError {
  readonly code = "BALANCE_INFEASIBLE";
  readonly status = 422;

  constructor(readonly constraint: BalanceConstraint, message: string) {
    super(message);
  }

  get details() {
    return { constraint: this.constraint };
  }
}

export class PlanningError extends PlannerError {
  readonly code = "PLANNING_FAILED";
  readonly status = 422;

  constructor(message: string, readonly day?: number, options?: { cause?: unknown }) {
    super(message, options);
  }

  get details() {
    const details: Record<string, unknown> = {};
    if (this.day !== undefined) details.day = this.day;
    if (this.cause instanceof BalanceError) details.constraint = this.cause.constraint;
    return details;
  }
}
