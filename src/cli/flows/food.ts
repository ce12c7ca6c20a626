// src/cli/flows/food.ts
// Logging food: search, history, frequent foods, custom foods, barcode.

import { MEAL_TYPES } from "../../schema";
import type { FoodCandidate, FoodEntry, MealType } from "../../domain/types";
import { entryFromCandidate, entryFromCustomFood, scaleFoodEntry } from "../../services/foodEntryService";
import { addFoodEntry, frequentFoods, latestFoodByName, recordSearch } from "../../services/journalService";
import type { CliContext } from "../context";
import { askChoice, askIndex, askNumber, askText } from "../prompt";
import { num } from "../render";

type FoodSource = "search" | "history" | "frequent" | "custom" | "barcode";

const SOURCE_LABELS: Record<FoodSource, string> = {
  search: "Search the food database",
  history: "Repeat a recent search",
  frequent: "Frequent foods",
  custom: "My custom foods & recipes",
  barcode: "Scan / enter a barcode",
};

function describeCandidate(c: FoodCandidate): string {
  const brand = c.brand ? ` (${c.brand})` : "";
  return `${c.name}${brand}: ${num(c.caloriesPer100g)} kcal, P ${num(c.proteinPer100g)} C ${num(c.carbsPer100g)} F ${num(c.fatsPer100g)} per 100 g`;
}

async function askGrams(ctx: CliContext, defaultValue: number): Promise<number> {
  return askNumber(ctx.prompter, ctx.terminal, "Quantity in grams", { defaultValue, greaterThan: 0 });
}

async function pickCandidate(ctx: CliContext, candidates: readonly FoodCandidate[]): Promise<FoodCandidate | null> {
  ctx.terminal.write("Results:");
  candidates.forEach((c, i) => ctx.terminal.write(`  ${i + 1}. ${describeCandidate(c)}`));
  const idx = await askIndex(ctx.prompter, ctx.terminal, "Choose a food (0 to cancel)", candidates.length, {
    allowCancel: true,
  });
  return idx === null ? null : candidates[idx];
}

/**
 * Runs a text search and returns the chosen portion, or null. Also used by
 * the recipe builder, which collects entries without logging them.
 */
export async function searchForEntry(ctx: CliContext, presetQuery?: string): Promise<FoodEntry | null> {
  const query = presetQuery ?? (await askText(ctx.prompter, "Search for a food"));
  if (!query.trim()) return null;

  ctx.session.mutate("search-history", (doc) => recordSearch(doc, query));
  ctx.terminal.write(`Searching for "${query.trim()}"...`);
  const candidates = await ctx.foodLookup.search(query);
  if (candidates.length === 0) {
    ctx.notify("No foods found, or the food database could not be reached.");
    return null;
  }

  const chosen = await pickCandidate(ctx, candidates);
  if (!chosen) return null;
  return entryFromCandidate(chosen, await askGrams(ctx, 100));
}

async function fromHistory(ctx: CliContext): Promise<FoodEntry | null> {
  const history = ctx.session.document.searchHistory;
  if (history.length === 0) {
    ctx.notify("No recent searches yet.");
    return null;
  }
  history.forEach((term, i) => ctx.terminal.write(`  ${i + 1}. ${term}`));
  const idx = await askIndex(ctx.prompter, ctx.terminal, "Repeat which search (0 to cancel)", history.length, {
    allowCancel: true,
  });
  return idx === null ? null : searchForEntry(ctx, history[idx]);
}

async function fromFrequent(ctx: CliContext): Promise<FoodEntry | null> {
  const doc = ctx.session.document;
  const names = frequentFoods(doc);
  if (names.length === 0) {
    ctx.notify("No foods logged yet.");
    return null;
  }
  names.forEach((name, i) => ctx.terminal.write(`  ${i + 1}. ${name}`));
  const idx = await askIndex(ctx.prompter, ctx.terminal, "Choose a food (0 to cancel)", names.length, {
    allowCancel: true,
  });
  if (idx === null) return null;

  const template = latestFoodByName(doc, names[idx]);
  if (!template) return null;
  return scaleFoodEntry(template, await askGrams(ctx, template.grams));
}

async function fromCustom(ctx: CliContext): Promise<FoodEntry | null> {
  const foods = ctx.session.document.customFoods;
  if (foods.length === 0) {
    ctx.notify("No custom foods yet. Create one from the More menu.");
    return null;
  }
  foods.forEach((f, i) =>
    ctx.terminal.write(`  ${i + 1}. ${f.name}: ${num(f.calories)} kcal per ${num(f.servingSizeG)} g`)
  );
  const idx = await askIndex(ctx.prompter, ctx.terminal, "Choose a food (0 to cancel)", foods.length, {
    allowCancel: true,
  });
  if (idx === null) return null;

  const food = foods[idx];
  const entry = entryFromCustomFood(food, await askGrams(ctx, food.servingSizeG > 0 ? food.servingSizeG : 100));
  if (!entry) ctx.notify(`"${food.name}" has no serving size, so it cannot be portioned.`);
  return entry;
}

async function fromBarcode(ctx: CliContext): Promise<FoodEntry | null> {
  const code = await askText(ctx.prompter, "Barcode");
  if (!code) return null;

  const candidate = await ctx.foodLookup.lookupBarcode(code);
  if (!candidate) {
    ctx.notify(`No product found for barcode ${code}.`);
    return null;
  }
  ctx.terminal.write(describeCandidate(candidate));
  return entryFromCandidate(candidate, await askGrams(ctx, 100));
}

async function entryFrom(ctx: CliContext, source: FoodSource): Promise<FoodEntry | null> {
  switch (source) {
    case "search":
      return searchForEntry(ctx);
    case "history":
      return fromHistory(ctx);
    case "frequent":
      return fromFrequent(ctx);
    case "custom":
      return fromCustom(ctx);
    case "barcode":
      return fromBarcode(ctx);
  }
}

export async function logFoodFlow(ctx: CliContext): Promise<void> {
  const meal: MealType = await askChoice(ctx.prompter, ctx.terminal, "Which meal", MEAL_TYPES, "Snacks");

  const sources: FoodSource[] = ["search", "history", "frequent", "custom", "barcode"];
  sources.forEach((s, i) => ctx.terminal.write(`  ${i + 1}. ${SOURCE_LABELS[s]}`));
  const idx = await askIndex(ctx.prompter, ctx.terminal, "How do you want to add food (0 to cancel)", sources.length, {
    allowCancel: true,
    defaultValue: 1,
  });
  if (idx === null) return;

  const entry = await entryFrom(ctx, sources[idx]);
  if (!entry) return;

  const saved = ctx.session.mutate("log-food", (doc) => addFoodEntry(doc, ctx.viewDate, meal, entry));
  ctx.notify(`Logged ${saved.name} (${num(saved.grams)} g, ${num(saved.calories)} kcal) to ${meal}.`);
}
