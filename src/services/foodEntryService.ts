// src/services/foodEntryService.ts
// Building, scaling and validating food entries.

import type { ZodError } from "zod";
import { CustomFoodSchema, FoodEntrySchema } from "../schema";
import type { CustomFood, FoodCandidate, FoodEntry, Micros } from "../domain/types";
import { InvalidEntryError } from "../domain/errors";

export const BASELINE_GRAMS = 100;

function issuesOf(error: ZodError): string[] {
  return error.errors.map((e) => (e.path.length ? `${e.path.join(".")}: ${e.message}` : e.message));
}

export function validateFoodEntry(input: unknown): FoodEntry {
  const parsed = FoodEntrySchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidEntryError("Invalid food entry", issuesOf(parsed.error));
  }
  return parsed.data;
}

export function validateCustomFood(input: unknown): CustomFood {
  const parsed = CustomFoodSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidEntryError("Invalid custom food", issuesOf(parsed.error));
  }
  return parsed.data;
}

function scaleMicros(micros: Micros, ratio: number): Micros {
  return {
    sodiumMg: micros.sodiumMg * ratio,
    sugarG: micros.sugarG * ratio,
    fiberG: micros.fiberG * ratio,
  };
}

/**
 * Returns a copy of `entry` at `grams`, with every nutrient scaled by the same
 * ratio. The original entry is left untouched.
 */
export function scaleFoodEntry(entry: FoodEntry, grams: number): FoodEntry {
  if (!(grams > 0)) {
    throw new InvalidEntryError(`Quantity must be greater than 0 g (got ${grams})`);
  }
  if (!(entry.grams > 0)) {
    throw new InvalidEntryError(`"${entry.name}" has no usable serving size`);
  }

  const ratio = grams / entry.grams;
  return {
    name: entry.name,
    grams,
    calories: entry.calories * ratio,
    proteinG: entry.proteinG * ratio,
    carbsG: entry.carbsG * ratio,
    fatsG: entry.fatsG * ratio,
    micros: scaleMicros(entry.micros, ratio),
  };
}

/**
 * Portion of a saved food or recipe. A zero serving size carries no
 * per-gram information, so nothing is produced.
 */
export function entryFromCustomFood(food: CustomFood, grams: number): FoodEntry | null {
  if (!(food.servingSizeG > 0)) return null;
  return scaleFoodEntry(
    {
      name: food.name,
      grams: food.servingSizeG,
      calories: food.calories,
      proteinG: food.proteinG,
      carbsG: food.carbsG,
      fatsG: food.fatsG,
      micros: food.micros,
    },
    grams
  );
}

export function entryFromCandidate(candidate: FoodCandidate, grams: number): FoodEntry {
  if (!(grams > 0)) {
    throw new InvalidEntryError(`Quantity must be greater than 0 g (got ${grams})`);
  }
  const scale = grams / BASELINE_GRAMS;
  return {
    name: candidate.name,
    grams,
    calories: candidate.caloriesPer100g * scale,
    proteinG: candidate.proteinPer100g * scale,
    carbsG: candidate.carbsPer100g * scale,
    fatsG: candidate.fatsPer100g * scale,
    micros: {
      sodiumMg: candidate.sodiumPer100g * scale,
      sugarG: candidate.sugarPer100g * scale,
      fiberG: candidate.fiberPer100g * scale,
    },
  };
}

/**
 * Collapses logged ingredients into one saved recipe whose serving is the
 * combined weight of everything that went in.
 */
export function buildRecipe(name: string, ingredients: readonly FoodEntry[]): CustomFood {
  if (ingredients.length === 0) {
    throw new InvalidEntryError(`Recipe "${name}" has no ingredients`);
  }

  const recipe: CustomFood = {
    name,
    servingSizeG: 0,
    calories: 0,
    proteinG: 0,
    carbsG: 0,
    fatsG: 0,
    micros: { sodiumMg: 0, sugarG: 0, fiberG: 0 },
  };

  for (const ing of ingredients) {
    recipe.servingSizeG += ing.grams;
    recipe.calories += ing.calories;
    recipe.proteinG += ing.proteinG;
    recipe.carbsG += ing.carbsG;
    recipe.fatsG += ing.fatsG;
    recipe.micros.sodiumMg += ing.micros.sodiumMg;
    recipe.micros.sugarG += ing.micros.sugarG;
    recipe.micros.fiberG += ing.micros.fiberG;
  }

  return validateCustomFood(recipe);
}
