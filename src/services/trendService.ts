// src/services/trendService.ts
// Weight trend over a report window and the calorie advice derived from it.

import type {
  DateWindow,
  DatedTotals,
  GoalProfile,
  ReportPeriod,
  TrendAdvice,
  TrendPolicy,
  TrendReport,
  WeightPoint,
  WeightProgress,
  WeightRegression,
} from "../domain/types";
import { daysBetween, isWithin } from "../utils/date";

/**
 * Product policy for weekly coaching, not derived constants. Override through
 * `resolveTrendPolicy` (the TREND_* environment variables feed it).
 */
export const DEFAULT_TREND_POLICY: Readonly<TrendPolicy> = {
  slowLossThresholdKg: -0.2,
  fastLossThresholdKg: -1.0,
  slowGainThresholdKg: 0.2,
  cutAdjustmentKcal: 200,
  fastLossAdjustmentKcal: 150,
  bulkAdjustmentKcal: 250,
};

export function resolveTrendPolicy(overrides: Partial<TrendPolicy> = {}): TrendPolicy {
  return { ...DEFAULT_TREND_POLICY, ...overrides };
}

export function sortedWeights(weightLogs: Readonly<Record<string, number>>): WeightPoint[] {
  return Object.entries(weightLogs)
    .map(([date, weightKg]) => ({ date, weightKg }))
    .sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
}

export function weightsInWindow(weightLogs: Readonly<Record<string, number>>, window: DateWindow): WeightPoint[] {
  return sortedWeights(weightLogs).filter((w) => isWithin(w.date, window.start, window.end));
}

/**
 * Mean calories over days that have any calories at all. A zero-calorie day
 * is an unlogged day here, not a fast.
 */
export function averageLoggedCalories(days: readonly DatedTotals[]): number {
  const logged = days.map((d) => d.totals.calories).filter((c) => c > 0);
  if (logged.length === 0) return 0;
  return logged.reduce((sum, c) => sum + c, 0) / logged.length;
}

/**
 * Least-squares line through weight against calendar-day offset from the
 * first point.
 */
export function weightRegression(points: readonly WeightPoint[]): WeightRegression | null {
  if (points.length < 2) return null;

  const origin = points[0].date;
  const xs = points.map((p) => daysBetween(origin, p.date));
  const ys = points.map((p) => p.weightKg);
  const n = points.length;
  const meanX = xs.reduce((s, x) => s + x, 0) / n;
  const meanY = ys.reduce((s, y) => s + y, 0) / n;

  let sxx = 0;
  let sxy = 0;
  for (let i = 0; i < n; i++) {
    sxx += (xs[i] - meanX) ** 2;
    sxy += (xs[i] - meanX) * (ys[i] - meanY);
  }
  if (sxx === 0) return null;

  const slope = sxy / sxx;
  return {
    slopeKgPerDay: slope,
    slopeKgPerWeek: slope * 7,
    interceptKg: meanY - slope * meanX,
    points: n,
  };
}

function kcal(value: number): string {
  return value.toFixed(0);
}

/**
 * Weekly calorie advice. Cutting when the goal weight is below the current
 * weight; bulking or maintaining otherwise. On-target change gives no advice.
 */
export function trendAdvice(
  weightChangeKg: number,
  avgCalories: number,
  goals: Pick<GoalProfile, "goalWeightKg" | "currentWeightKg">,
  policy: TrendPolicy = DEFAULT_TREND_POLICY
): TrendAdvice | null {
  if (goals.goalWeightKg < goals.currentWeightKg) {
    if (weightChangeKg > policy.slowLossThresholdKg) {
      const to = avgCalories - policy.cutAdjustmentKcal;
      return {
        reason: "slow-loss",
        direction: "decrease",
        fromCalories: avgCalories,
        toCalories: to,
        message: `Weight loss is slow. Consider reducing calories from ~${kcal(avgCalories)} to ~${kcal(to)}.`,
      };
    }
    if (weightChangeKg < policy.fastLossThresholdKg) {
      const to = avgCalories + policy.fastLossAdjustmentKcal;
      return {
        reason: "fast-loss",
        direction: "increase",
        fromCalories: avgCalories,
        toCalories: to,
        message: `Losing weight quickly. If you feel low-energy, consider increasing calories to ~${kcal(to)}.`,
      };
    }
    return null;
  }

  if (weightChangeKg < policy.slowGainThresholdKg) {
    const to = avgCalories + policy.bulkAdjustmentKcal;
    return {
      reason: "slow-gain",
      direction: "increase",
      fromCalories: avgCalories,
      toCalories: to,
      message: `Weight gain is slow. Consider increasing calories from ~${kcal(avgCalories)} to ~${kcal(to)}.`,
    };
  }
  return null;
}

export interface TrendInput {
  weights: readonly WeightPoint[];
  days: readonly DatedTotals[];
  goals: Pick<GoalProfile, "goalWeightKg" | "currentWeightKg">;
  period: ReportPeriod;
  policy?: TrendPolicy;
}

/**
 * Needs two weigh-ins inside the window before it reports a change. Advice is
 * only given for weekly windows.
 */
export function analyzeTrend(input: TrendInput): TrendReport {
  const avgCalories = averageLoggedCalories(input.days);
  const weights = input.weights;

  if (weights.length < 2) {
    return { weightChangeKg: null, avgCalories, regression: null, advice: null };
  }

  const weightChangeKg = weights[weights.length - 1].weightKg - weights[0].weightKg;
  const advice =
    input.period === "weekly"
      ? trendAdvice(weightChangeKg, avgCalories, input.goals, input.policy ?? DEFAULT_TREND_POLICY)
      : null;

  return {
    weightChangeKg,
    avgCalories,
    regression: weightRegression(weights),
    advice,
  };
}

export function weightProgress(
  goals: Pick<GoalProfile, "startWeightKg" | "currentWeightKg" | "goalWeightKg">,
  weightLogs: Readonly<Record<string, number>>
): WeightProgress {
  const points = sortedWeights(weightLogs);
  const totalDelta = goals.goalWeightKg - goals.startWeightKg;
  const achievedDelta = goals.currentWeightKg - goals.startWeightKg;
  const percentToGoal = totalDelta === 0 ? 0 : Math.max(0, Math.min(1, achievedDelta / totalDelta));

  return {
    startWeightKg: goals.startWeightKg,
    currentWeightKg: goals.currentWeightKg,
    goalWeightKg: goals.goalWeightKg,
    lastLogDate: points.length ? points[points.length - 1].date : null,
    percentToGoal,
  };
}
