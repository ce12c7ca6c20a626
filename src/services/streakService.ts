import type { DailyLog, GoalProfile, StreakState } from "../domain/types";
import { previousDateOnly } from "../utils/date";
import { computeDayTotals } from "./nutritionService";

export interface StreakPolicy {
  // max |calories - goal| that still counts as hitting the goal
  calorieToleranceKcal: number;
}

export const DEFAULT_STREAK_POLICY: StreakPolicy = {
  calorieToleranceKcal: 100,
};

export function initialStreakState(): StreakState {
  return { calorieStreakDays: 0, waterStreakDays: 0, lastEvaluatedDate: null };
}

/**
 * Advances the adherence streaks by judging yesterday's log.
 *
 * Runs at most once per calendar day: a state already evaluated for `today`
 * is returned as is. If the previous evaluation was not yesterday, some day
 * went unjudged and both counters restart from 0 before yesterday is scored.
 * Returns a new state; the input is not modified.
 */
export function evaluateStreaks(
  state: StreakState,
  logs: Readonly<Record<string, DailyLog>>,
  goals: Pick<GoalProfile, "calorieGoal" | "waterGoalMl">,
  today: string,
  policy: StreakPolicy = DEFAULT_STREAK_POLICY
): StreakState {
  if (state.lastEvaluatedDate === today) return state;

  const yesterday = previousDateOnly(today);
  const continuous = state.lastEvaluatedDate === yesterday;
  const calorieBase = continuous ? state.calorieStreakDays : 0;
  const waterBase = continuous ? state.waterStreakDays : 0;

  const log = logs[yesterday];
  if (!log) {
    return { calorieStreakDays: 0, waterStreakDays: 0, lastEvaluatedDate: today };
  }

  const totals = computeDayTotals(log);
  const hitCalories =
    totals.calories > 0 && Math.abs(totals.calories - goals.calorieGoal) <= policy.calorieToleranceKcal;
  const hitWater = totals.waterMl >= goals.waterGoalMl;

  return {
    calorieStreakDays: hitCalories ? calorieBase + 1 : 0,
    waterStreakDays: hitWater ? waterBase + 1 : 0,
    lastEvaluatedDate: today,
  };
}

export function streaksEqual(a: StreakState, b: StreakState): boolean {
  return (
    a.calorieStreakDays === b.calorieStreakDays &&
    a.waterStreakDays === b.waterStreakDays &&
    a.lastEvaluatedDate === b.lastEvaluatedDate
  );
}
