export type {
  ActivityLevel,
  CustomFood,
  DailyLog,
  FastingState,
  FoodEntry,
  JournalDocument,
  MealPlan,
  MealType,
  Micros,
  Sex,
  StreakState,
  WorkoutEntry,
} from "../schema";

/**
 * Flat view of every target the journal evaluates against.
 * Built from `profile` + `micronutrientGoals` by `goalProfileOf`.
 */
export interface GoalProfile {
  calorieGoal: number;
  proteinGoalG: number;
  carbsGoalG: number;
  fatsGoalG: number;
  waterGoalMl: number;
  sodiumGoalMg: number;
  sugarGoalG: number;
  currentWeightKg: number;
  startWeightKg: number;
  goalWeightKg: number;
}

export interface DayTotals {
  calories: number;
  proteinG: number;
  carbsG: number;
  fatsG: number;
  waterMl: number;
  sodiumMg: number;
  sugarG: number;
  fiberG: number;
}

export interface DatedTotals {
  date: string; // YYYY-MM-DD
  totals: DayTotals;
}

export interface WorkoutTotals {
  sessions: number;
  durationMin: number;
  caloriesBurned: number;
}

export type ReportPeriod = "weekly" | "monthly";

export const PERIOD_DAYS: Record<ReportPeriod, number> = {
  weekly: 7,
  monthly: 30,
};

export interface DateWindow {
  start: string;
  end: string;
}

export interface WeightPoint {
  date: string;
  weightKg: number;
}

// One candidate returned by the food lookup. Nutrients are per 100 g.
export interface FoodCandidate {
  name: string;
  brand: string | null;
  caloriesPer100g: number;
  proteinPer100g: number;
  carbsPer100g: number;
  fatsPer100g: number;
  sodiumPer100g: number; // mg
  sugarPer100g: number;
  fiberPer100g: number;
}

export type FastingStatus =
  | { kind: "idle"; defaultDurationHours: number }
  | {
      kind: "fasting";
      startTime: Date;
      durationHours: number;
      elapsedMs: number;
      remainingMs: number;
      progress: number;
    };

/**
 * Coaching thresholds for the weekly trend advice. Weight values are kg of
 * change across the window, adjustments are kcal/day.
 */
export interface TrendPolicy {
  slowLossThresholdKg: number;
  fastLossThresholdKg: number;
  slowGainThresholdKg: number;
  cutAdjustmentKcal: number;
  fastLossAdjustmentKcal: number;
  bulkAdjustmentKcal: number;
}

export type TrendAdviceReason = "slow-loss" | "fast-loss" | "slow-gain";

export interface TrendAdvice {
  reason: TrendAdviceReason;
  direction: "increase" | "decrease";
  fromCalories: number;
  toCalories: number;
  message: string;
}

export interface WeightRegression {
  slopeKgPerDay: number;
  slopeKgPerWeek: number;
  interceptKg: number;
  points: number;
}

export interface TrendReport {
  weightChangeKg: number | null;
  avgCalories: number;
  regression: WeightRegression | null;
  advice: TrendAdvice | null;
}

export interface PeriodReport {
  period: ReportPeriod;
  window: DateWindow;
  days: DatedTotals[];
  loggedDays: number;
  averages: DayTotals;
  goals: GoalProfile;
  trend: TrendReport;
}

export interface WeightProgress {
  startWeightKg: number;
  currentWeightKg: number;
  goalWeightKg: number;
  lastLogDate: string | null;
  percentToGoal: number;
}
