// tests/helpers.ts
// Fixtures and in-process stand-ins shared by the specs.

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import type { DailyLog, FoodCandidate, FoodEntry, GoalProfile } from "../src/domain/types";
import type { FoodLookup } from "../src/services/openFoodFactsClient";
import { EndOfInputError, Prompter, Terminal } from "../src/cli/terminal";

export function food(
  name: string,
  grams: number,
  calories: number,
  macros: { proteinG?: number; carbsG?: number; fatsG?: number } = {},
  micros: { sodiumMg?: number; sugarG?: number; fiberG?: number } = {}
): FoodEntry {
  return {
    name,
    grams,
    calories,
    proteinG: macros.proteinG ?? 0,
    carbsG: macros.carbsG ?? 0,
    fatsG: macros.fatsG ?? 0,
    micros: { sodiumMg: micros.sodiumMg ?? 0, sugarG: micros.sugarG ?? 0, fiberG: micros.fiberG ?? 0 },
  };
}

export function dayLog(partial: Partial<DailyLog> & { breakfast?: FoodEntry[] } = {}): DailyLog {
  return {
    meals: {
      Breakfast: partial.breakfast ?? partial.meals?.Breakfast ?? [],
      Lunch: partial.meals?.Lunch ?? [],
      Dinner: partial.meals?.Dinner ?? [],
      Snacks: partial.meals?.Snacks ?? [],
    },
    workoutEntries: partial.workoutEntries ?? [],
    waterMl: partial.waterMl ?? 0,
    notes: partial.notes ?? "",
  };
}

// One food worth `calories` plus a water total.
export function simpleDay(calories: number, waterMl = 0): DailyLog {
  return dayLog({ breakfast: calories > 0 ? [food("Meal", 100, calories)] : [], waterMl });
}

export const GOALS: GoalProfile = {
  calorieGoal: 2000,
  proteinGoalG: 150,
  carbsGoalG: 200,
  fatsGoalG: 70,
  waterGoalMl: 2500,
  sodiumGoalMg: 2300,
  sugarGoalG: 30,
  currentWeightKg: 80,
  startWeightKg: 85,
  goalWeightKg: 75,
};

export const YOGURT: FoodCandidate = {
  name: "Greek Yogurt",
  brand: "Acme",
  caloriesPer100g: 97,
  proteinPer100g: 9,
  carbsPer100g: 3.6,
  fatsPer100g: 5,
  sodiumPer100g: 36,
  sugarPer100g: 3.6,
  fiberPer100g: 0,
};

export function tempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "nutri-journal-"));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/**
 * Answers questions from a fixed script. An empty answer takes the default;
 * running out of answers behaves like closed input.
 */
export class ScriptedPrompter implements Prompter {
  readonly questions: string[] = [];
  private readonly answers: string[];

  constructor(answers: readonly string[]) {
    this.answers = [...answers];
  }

  get remaining(): number {
    return this.answers.length;
  }

  async ask(question: string, defaultValue?: string): Promise<string> {
    this.questions.push(question);
    const next = this.answers.shift();
    if (next === undefined) throw new EndOfInputError();
    return next === "" && defaultValue !== undefined ? defaultValue : next;
  }

  close(): void {}
}

export class MemoryTerminal implements Terminal {
  readonly lines: string[] = [];
  clears = 0;
  readonly width = 100;

  write(line = ""): void {
    this.lines.push(line);
  }

  clear(): void {
    this.clears++;
  }
}

export class FakeFoodLookup implements FoodLookup {
  readonly queries: string[] = [];

  constructor(
    private readonly results: FoodCandidate[] = [YOGURT],
    private readonly barcodes: Record<string, FoodCandidate> = {}
  ) {}

  async search(query: string): Promise<FoodCandidate[]> {
    this.queries.push(query);
    return this.results;
  }

  async lookupBarcode(barcode: string): Promise<FoodCandidate | null> {
    return this.barcodes[barcode] ?? null;
  }
}
