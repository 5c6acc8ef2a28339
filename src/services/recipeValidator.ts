// src/services/recipeValidator.ts
// Schema gate between generated recipe JSON and everything downstream.

import { z } from "zod";
import type { Recipe } from "../types/recipe";
import { SchemaViolationError } from "../utils/errors";

const text = z.string().trim().min(1, "must be a non-empty string");
const nonNegative = z.number().finite().nonnegative();

export const MIN_STEPS = 5;
export const MAX_STEPS = 10;

export const recipeSchema: z.ZodType<Recipe, z.ZodTypeDef, unknown> = z.object({
  title: text,
  description: text,
  ingredients: z
    .array(
      z.object({
        item: text,
        qty: z.union([text, nonNegative.transform((n) => String(n))]),
      })
    )
    .min(1, "must list at least one ingredient"),
  steps: z
    .array(text)
    .min(MIN_STEPS, `must have at least ${MIN_STEPS} steps`)
    .max(MAX_STEPS, `must have at most ${MAX_STEPS} steps`),
  calories_per_serving: nonNegative.transform((n) => Math.round(n)),
  macros: z.object({
    protein_g: nonNegative,
    fat_g: nonNegative,
    carbs_g: nonNegative,
  }),
  why_healthy: text,
  tags: z
    .array(text)
    .min(1, "must have at least one tag")
    .transform((tags) => Array.from(new Set(tags.map((t) => t.toLowerCase())))),
});

/**
 * Validates one candidate. Throws SchemaViolationError naming the first bad field.
 */
export function validateRecipe(raw: unknown): Recipe {
  const result = recipeSchema.safeParse(raw);
  if (result.success) return result.data;

  const issue = result.error.issues[0];
  const field = issue && issue.path.length > 0 ? issue.path.join(".") : "recipe";
  throw new SchemaViolationError(field, issue?.message ?? "invalid");
}

export interface BatchValidation {
  recipes: Recipe[];
  violations: SchemaViolationError[];
}

/**
 * Each candidate is checked on its own; a bad one never stops the rest.
 */
export function validateBatch(candidates: readonly unknown[]): BatchValidation {
  const recipes: Recipe[] = [];
  const violations: SchemaViolationError[] = [];

  for (const candidate of candidates) {
    try {
      recipes.push(validateRecipe(candidate));
    } catch (err) {
      if (!(err instanceof SchemaViolationError)) throw err;
      violations.push(err);
    }
  }

  return { recipes, violations };
}
