// src/services/nutritionService.ts
// Daily and period aggregation over the journal's daily logs.

import { MEAL_TYPES } from "../schema";
import type {
  DailyLog,
  DateWindow,
  DatedTotals,
  DayTotals,
  FoodEntry,
  GoalProfile,
  WorkoutTotals,
} from "../domain/types";
import { datesInRange, shiftDateOnly } from "../utils/date";

export type TrackedMetric = Exclude<keyof DayTotals, "fiberG">;

export interface MetricDefinition {
  metric: TrackedMetric;
  label: string;
  unit: string;
  goal: (goals: GoalProfile) => number;
}

// Order here is the order the dashboard and reports print them in.
export const TRACKED_METRICS: readonly MetricDefinition[] = [
  { metric: "calories", label: "Calories", unit: "kcal", goal: (g) => g.calorieGoal },
  { metric: "proteinG", label: "Protein", unit: "g", goal: (g) => g.proteinGoalG },
  { metric: "carbsG", label: "Carbs", unit: "g", goal: (g) => g.carbsGoalG },
  { metric: "fatsG", label: "Fats", unit: "g", goal: (g) => g.fatsGoalG },
  { metric: "waterMl", label: "Water", unit: "ml", goal: (g) => g.waterGoalMl },
  { metric: "sodiumMg", label: "Sodium", unit: "mg", goal: (g) => g.sodiumGoalMg },
  { metric: "sugarG", label: "Sugar", unit: "g", goal: (g) => g.sugarGoalG },
];

const DAY_TOTAL_KEYS: ReadonlyArray<keyof DayTotals> = [
  "calories",
  "proteinG",
  "carbsG",
  "fatsG",
  "waterMl",
  "sodiumMg",
  "sugarG",
  "fiberG",
];

export function emptyTotals(): DayTotals {
  return {
    calories: 0,
    proteinG: 0,
    carbsG: 0,
    fatsG: 0,
    waterMl: 0,
    sodiumMg: 0,
    sugarG: 0,
    fiberG: 0,
  };
}

export function allFoodEntries(log: DailyLog): FoodEntry[] {
  return MEAL_TYPES.flatMap((meal) => log.meals[meal]);
}

/**
 * Sums every food entry across the four meal buckets. Water comes straight
 * from the log. A day with no log totals to zero.
 */
export function computeDayTotals(log: DailyLog | undefined): DayTotals {
  const totals = emptyTotals();
  if (!log) return totals;

  for (const item of allFoodEntries(log)) {
    totals.calories += item.calories;
    totals.proteinG += item.proteinG;
    totals.carbsG += item.carbsG;
    totals.fatsG += item.fatsG;
    totals.sodiumMg += item.micros.sodiumMg;
    totals.sugarG += item.micros.sugarG;
    totals.fiberG += item.micros.fiberG;
  }
  totals.waterMl = log.waterMl;

  return totals;
}

export function computeWorkoutTotals(log: DailyLog | undefined): WorkoutTotals {
  const entries = log?.workoutEntries ?? [];
  return {
    sessions: entries.length,
    durationMin: entries.reduce((sum, w) => sum + w.durationMin, 0),
    caloriesBurned: entries.reduce((sum, w) => sum + w.caloriesBurned, 0),
  };
}

/**
 * One entry per calendar date in [start, end]. Dates without a log get zero
 * totals; the logs themselves are only read.
 */
export function computePeriodTotals(
  logs: Readonly<Record<string, DailyLog>>,
  start: string,
  end: string
): DatedTotals[] {
  return datesInRange(start, end).map((date) => ({
    date,
    totals: computeDayTotals(logs[date]),
  }));
}

// The `days`-long window ending on (and including) `today`.
export function periodWindow(today: string, days: number): DateWindow {
  if (!Number.isInteger(days) || days < 1) {
    throw new RangeError(`window length must be a positive integer, got ${days}`);
  }
  return { start: shiftDateOnly(today, -(days - 1)), end: today };
}

/**
 * Mean of each metric across the whole window, unlogged days included.
 */
export function averageTotals(days: readonly DatedTotals[]): DayTotals {
  const avg = emptyTotals();
  if (days.length === 0) return avg;

  for (const { totals } of days) {
    for (const key of DAY_TOTAL_KEYS) avg[key] += totals[key];
  }
  for (const key of DAY_TOTAL_KEYS) avg[key] /= days.length;

  return avg;
}

export function countLoggedDays(
  logs: Readonly<Record<string, DailyLog>>,
  window: DateWindow
): number {
  return datesInRange(window.start, window.end).filter((d) => logs[d] !== undefined).length;
}

export function computeRemaining(goals: GoalProfile, consumed: DayTotals): Record<TrackedMetric, number> {
  const left = (metric: TrackedMetric, goal: number) => Math.max(goal - consumed[metric], 0);
  return {
    calories: left("calories", goals.calorieGoal),
    proteinG: left("proteinG", goals.proteinGoalG),
    carbsG: left("carbsG", goals.carbsGoalG),
    fatsG: left("fatsG", goals.fatsGoalG),
    waterMl: left("waterMl", goals.waterGoalMl),
    sodiumMg: left("sodiumMg", goals.sodiumGoalMg),
    sugarG: left("sugarG", goals.sugarGoalG),
  };
}

/**
 * Fraction of a goal reached, capped at 1. A zero goal has no meaningful
 * ratio and reports 0.
 */
export function goalProgress(current: number, goal: number): number {
  if (!(goal > 0)) return 0;
  return Math.min(current / goal, 1);
}
