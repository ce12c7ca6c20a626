// src/cli/flows/more.ts
// Everything behind the "More" menu.

import * as fs from "fs";
import { MEAL_TYPES } from "../../schema";
import type { FoodEntry, ReportPeriod } from "../../domain/types";
import { errMessage } from "../../domain/errors";
import { buildRecipe } from "../../services/foodEntryService";
import {
  addCustomFood,
  addPlanItem,
  listProgressPhotos,
  logProgressPhoto,
  removePlanItem,
} from "../../services/journalService";
import { buildProfile } from "../../services/profileService";
import { buildPeriodReport } from "../../services/reportService";
import { sortedWeights } from "../../services/trendService";
import { daysBetween, shiftDateOnly } from "../../utils/date";
import { logger } from "../../lib/logger";
import type { CliContext } from "../context";
import { askChoice, askConfirm, askIndex, askNumber, askText } from "../prompt";
import { num, renderReport, renderWeightHistory, signed } from "../render";
import { searchForEntry } from "./food";
import { askProfileAnswers } from "./profile";

async function pause(ctx: CliContext): Promise<void> {
  await ctx.prompter.ask("Press Enter to return", "");
}

function writeAll(ctx: CliContext, lines: readonly string[]): void {
  for (const line of lines) ctx.terminal.write(line);
}

export async function reportFlow(ctx: CliContext): Promise<void> {
  const period: ReportPeriod = await askChoice(
    ctx.prompter,
    ctx.terminal,
    "Report period",
    ["weekly", "monthly"] as const,
    "weekly"
  );
  const report = buildPeriodReport(ctx.session.document, ctx.session.today(), period, ctx.settings.trendPolicy);
  if (report.loggedDays === 0) {
    ctx.notify(`No data logged in the last ${report.days.length} days.`);
    return;
  }
  writeAll(ctx, renderReport(report));
  await pause(ctx);
}

export async function weightHistoryFlow(ctx: CliContext): Promise<void> {
  const doc = ctx.session.document;
  const points = sortedWeights(doc.weightLogs);
  if (points.length < 2) {
    ctx.notify("Log your weight on at least two days to see a history.");
    return;
  }
  writeAll(ctx, renderWeightHistory(doc, points));
  await pause(ctx);
}

export async function mealPlannerFlow(ctx: CliContext): Promise<void> {
  const { prompter: p, terminal: out, session } = ctx;
  const offset = await askNumber(p, out, "Plan for how many days from today", { defaultValue: 1, integer: true, min: 1 });
  const date = shiftDateOnly(session.today(), offset);

  for (;;) {
    const plan = session.document.mealPlans[date];
    out.write(`Meal plan for ${date}`);
    for (const meal of MEAL_TYPES) {
      const items = plan?.[meal] ?? [];
      out.write(`  ${meal}: ${items.length ? items.join(", ") : "-"}`);
    }

    const action = await askChoice(p, out, "[a]dd, [r]emove or [d]one", ["a", "r", "d"] as const, "d");
    if (action === "d") return;

    const meal = await askChoice(p, out, "Which meal", MEAL_TYPES);
    if (action === "a") {
      const item = await askText(p, "Food to plan");
      if (!session.mutate("plan-add", (doc) => addPlanItem(doc, date, meal, item))) {
        out.write("Nothing added.");
      }
      continue;
    }

    const items = plan?.[meal] ?? [];
    if (items.length === 0) {
      out.write(`Nothing planned for ${meal}.`);
      continue;
    }
    const item = await askChoice(p, out, "Remove which item", items);
    session.mutate("plan-remove", (doc) => removePlanItem(doc, date, meal, item));
  }
}

async function collectIngredients(ctx: CliContext): Promise<FoodEntry[]> {
  const ingredients: FoodEntry[] = [];
  do {
    const entry = await searchForEntry(ctx);
    if (entry) {
      ingredients.push(entry);
      ctx.terminal.write(`Added ${entry.name} (${num(entry.grams)} g).`);
    }
  } while (await askConfirm(ctx.prompter, ctx.terminal, "Add another ingredient?", true));
  return ingredients;
}

export async function customFoodFlow(ctx: CliContext): Promise<void> {
  const { prompter: p, terminal: out, session } = ctx;
  const kind = await askChoice(p, out, "Create a single food or a recipe", ["food", "recipe"] as const, "food");
  const name = await askText(p, kind === "food" ? "Food name" : "Recipe name");
  if (!name) return;

  if (kind === "food") {
    const servingSizeG = await askNumber(p, out, "Serving size (g)", { defaultValue: 100, greaterThan: 0 });
    const calories = await askNumber(p, out, "Calories per serving", { min: 0 });
    const proteinG = await askNumber(p, out, "Protein per serving (g)", { defaultValue: 0, min: 0 });
    const carbsG = await askNumber(p, out, "Carbs per serving (g)", { defaultValue: 0, min: 0 });
    const fatsG = await askNumber(p, out, "Fats per serving (g)", { defaultValue: 0, min: 0 });

    session.mutate("custom-food", (doc) =>
      addCustomFood(doc, {
        name,
        servingSizeG,
        calories,
        proteinG,
        carbsG,
        fatsG,
        micros: { sodiumMg: 0, sugarG: 0, fiberG: 0 },
      })
    );
    ctx.notify(`Saved custom food "${name}".`);
    return;
  }

  const ingredients = await collectIngredients(ctx);
  if (ingredients.length === 0) {
    ctx.notify("Recipe not saved: no ingredients were added.");
    return;
  }
  const recipe = buildRecipe(name, ingredients);
  session.mutate("recipe", (doc) => addCustomFood(doc, recipe));
  ctx.notify(`Saved recipe "${name}" (${num(recipe.servingSizeG)} g, ${num(recipe.calories)} kcal).`);
}

export async function progressPhotosFlow(ctx: CliContext): Promise<void> {
  const { prompter: p, terminal: out, session } = ctx;
  const action = await askChoice(p, out, "[l]og a photo or [c]ompare two", ["l", "c"] as const, "l");

  if (action === "l") {
    const photoPath = await askText(p, "Path to the photo");
    if (!photoPath) return;
    if (!fs.existsSync(photoPath)) {
      ctx.notify(`File not found: ${photoPath}`);
      return;
    }
    session.mutate("photo", (doc) => logProgressPhoto(doc, ctx.viewDate, photoPath));
    ctx.notify(`Photo saved for ${ctx.viewDate}.`);
    return;
  }

  const photos = listProgressPhotos(session.document);
  if (photos.length < 2) {
    ctx.notify("Log at least two progress photos to compare.");
    return;
  }
  photos.forEach((ph, i) => out.write(`  ${i + 1}. ${ph.date}  ${ph.path}`));
  const first = await askIndex(p, out, "First photo", photos.length);
  const second = await askIndex(p, out, "Second photo", photos.length);
  if (first === null || second === null) return;

  const [a, b] = [photos[first], photos[second]];
  const weights = session.document.weightLogs;
  out.write(`${a.date}: ${a.path}`);
  out.write(`${b.date}: ${b.path}`);
  out.write(`${Math.abs(daysBetween(a.date, b.date))} days apart`);
  const wa = weights[a.date];
  const wb = weights[b.date];
  if (wa !== undefined && wb !== undefined) {
    out.write(`Weight ${wa.toFixed(1)} kg -> ${wb.toFixed(1)} kg (${signed(wb - wa)} kg)`);
  }
  await pause(ctx);
}

export async function exportFlow(ctx: CliContext): Promise<void> {
  try {
    ctx.session.commit("export");
    const target = ctx.store.exportBackup(ctx.session.now());
    ctx.notify(`Backup written to ${target}`);
  } catch (err) {
    logger.warn({ err }, "[export] backup failed");
    ctx.notify(`Backup failed: ${errMessage(err)}`);
  }
}

export async function editProfileFlow(ctx: CliContext): Promise<void> {
  const doc = ctx.session.document;
  const answers = await askProfileAnswers(ctx.prompter, ctx.terminal, doc);
  const next = buildProfile(answers, doc.profile);
  ctx.session.mutate("profile", (d) => {
    d.profile = next.profile;
    d.micronutrientGoals = next.micronutrientGoals;
  });
  ctx.notify("Profile and goals updated.");
}
