// src/services/journalService.ts
// Daily log store: everything a user action writes into the document.
// Callers own the document and commit it after each mutation.

import { MEAL_TYPES, WorkoutEntrySchema } from "../schema";
import type {
  CustomFood,
  DailyLog,
  FoodEntry,
  JournalDocument,
  MealPlan,
  MealType,
  WorkoutEntry,
} from "../domain/types";
import { InvalidEntryError } from "../domain/errors";
import { validateCustomFood, validateFoodEntry } from "./foodEntryService";

export const SEARCH_HISTORY_LIMIT = 10;

export function emptyDailyLog(): DailyLog {
  return {
    meals: { Breakfast: [], Lunch: [], Dinner: [], Snacks: [] },
    workoutEntries: [],
    waterMl: 0,
    notes: "",
  };
}

export function emptyMealPlan(): MealPlan {
  return { Breakfast: [], Lunch: [], Dinner: [], Snacks: [] };
}

/**
 * Returns the log for `date`, creating an empty one on first access.
 */
export function getLogForDate(doc: JournalDocument, date: string): DailyLog {
  const existing = doc.dailyLogs[date];
  if (existing) return existing;
  const log = emptyDailyLog();
  doc.dailyLogs[date] = log;
  return log;
}

// Read-only lookup; never creates a log.
export function peekLog(doc: Pick<JournalDocument, "dailyLogs">, date: string): DailyLog | undefined {
  return doc.dailyLogs[date];
}

export function addFoodEntry(doc: JournalDocument, date: string, meal: MealType, entry: FoodEntry): FoodEntry {
  const valid = validateFoodEntry(entry);
  getLogForDate(doc, date).meals[meal].push(valid);
  return valid;
}

export function addWorkoutEntry(doc: JournalDocument, date: string, entry: WorkoutEntry): WorkoutEntry {
  const parsed = WorkoutEntrySchema.safeParse(entry);
  if (!parsed.success) {
    throw new InvalidEntryError(
      "Invalid workout entry",
      parsed.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`)
    );
  }
  getLogForDate(doc, date).workoutEntries.push(parsed.data);
  return parsed.data;
}

/**
 * Adds to the day's water total and returns the new total. Water only ever
 * goes up within a day.
 */
export function addWater(doc: JournalDocument, date: string, amountMl: number): number {
  if (!Number.isFinite(amountMl) || amountMl <= 0) {
    throw new InvalidEntryError(`Water amount must be positive (got ${amountMl})`);
  }
  const log = getLogForDate(doc, date);
  log.waterMl += amountMl;
  return log.waterMl;
}

export function setNotes(doc: JournalDocument, date: string, notes: string): void {
  getLogForDate(doc, date).notes = notes.trim();
}

/**
 * One weight per date; re-logging a date overwrites it. The profile's current
 * weight follows the most recent dated entry.
 */
export function logWeight(doc: JournalDocument, date: string, weightKg: number): void {
  if (!Number.isFinite(weightKg) || weightKg <= 0) {
    throw new InvalidEntryError(`Weight must be positive (got ${weightKg})`);
  }
  doc.weightLogs[date] = weightKg;

  const latest = Object.keys(doc.weightLogs).reduce((max, d) => (d > max ? d : max), date);
  if (latest === date) {
    doc.profile.weightKg = weightKg;
  }
}

/**
 * Most-recent-first, no duplicates, capped at SEARCH_HISTORY_LIMIT.
 */
export function recordSearch(doc: JournalDocument, query: string): void {
  const term = query.trim();
  if (!term) return;
  doc.searchHistory = [term, ...doc.searchHistory.filter((t) => t !== term)].slice(0, SEARCH_HISTORY_LIMIT);
}

function datesAscending(doc: Pick<JournalDocument, "dailyLogs">): string[] {
  return Object.keys(doc.dailyLogs).sort();
}

/**
 * Names of the most often logged foods. Ties keep the order in which the
 * foods were first logged.
 */
export function frequentFoods(doc: Pick<JournalDocument, "dailyLogs">, limit = 10): string[] {
  const counts = new Map<string, number>();
  for (const date of datesAscending(doc)) {
    const log = doc.dailyLogs[date];
    for (const meal of MEAL_TYPES) {
      for (const food of log.meals[meal]) {
        counts.set(food.name, (counts.get(food.name) ?? 0) + 1);
      }
    }
  }

  // Array.prototype.sort is stable, so insertion order breaks ties
  return Array.from(counts.entries())
    .sort((a, b) => b[1] - a[1])
    .slice(0, limit)
    .map(([name]) => name);
}

/**
 * The most recently logged entry with this name, as a template for logging it
 * again.
 */
export function latestFoodByName(doc: Pick<JournalDocument, "dailyLogs">, name: string): FoodEntry | null {
  const dates = datesAscending(doc).reverse();
  for (const date of dates) {
    const log = doc.dailyLogs[date];
    for (const meal of MEAL_TYPES) {
      const match = log.meals[meal].find((f) => f.name === name);
      if (match) return match;
    }
  }
  return null;
}

export function addCustomFood(doc: JournalDocument, food: CustomFood): CustomFood {
  const valid = validateCustomFood(food);
  doc.customFoods.push(valid);
  return valid;
}

export function ensureMealPlan(doc: JournalDocument, date: string): MealPlan {
  const existing = doc.mealPlans[date];
  if (existing) return existing;
  const plan = emptyMealPlan();
  doc.mealPlans[date] = plan;
  return plan;
}

export function addPlanItem(doc: JournalDocument, date: string, meal: MealType, item: string): boolean {
  const name = item.trim();
  if (!name) return false;
  ensureMealPlan(doc, date)[meal].push(name);
  return true;
}

// Removes the first item with exactly this name.
export function removePlanItem(doc: JournalDocument, date: string, meal: MealType, item: string): boolean {
  const plan = doc.mealPlans[date];
  if (!plan) return false;
  const idx = plan[meal].indexOf(item);
  if (idx < 0) return false;
  plan[meal].splice(idx, 1);
  return true;
}

export function logProgressPhoto(doc: JournalDocument, date: string, photoPath: string): void {
  doc.progressPhotos[date] = photoPath;
}

export function listProgressPhotos(doc: Pick<JournalDocument, "progressPhotos">): Array<{ date: string; path: string }> {
  return Object.entries(doc.progressPhotos)
    .map(([date, path]) => ({ date, path }))
    .sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
}
