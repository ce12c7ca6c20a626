// src/services/profileService.ts
// Goal estimation (BMR/TDEE), the flat goal view and workout calorie estimates.

import type { ActivityLevel, Goals, MicronutrientGoals, Profile } from "../schema";
import type { GoalProfile, JournalDocument, Sex } from "../domain/types";

export const ACTIVITY_MULTIPLIERS: Record<ActivityLevel, number> = {
  sedentary: 1.2,
  light: 1.375,
  moderate: 1.55,
  active: 1.725,
  very_active: 1.9,
};

// MET values per activity
export const EXERCISES: ReadonlyArray<{ name: string; met: number }> = [
  { name: "Running (10 min/mile)", met: 10.0 },
  { name: "Cycling (moderate)", met: 8.0 },
  { name: "Weightlifting (vigorous)", met: 6.0 },
  { name: "Walking (brisk)", met: 4.3 },
  { name: "Swimming (freestyle)", met: 7.0 },
  { name: "Yoga", met: 2.5 },
];

const PROTEIN_G_PER_KG = 1.8;
const FAT_SHARE_OF_CALORIES = 0.25;

export interface BodyStats {
  sex: Sex;
  age: number;
  heightCm: number;
  weightKg: number;
  activityLevel: ActivityLevel;
}

export interface ProfileAnswers extends BodyStats {
  name: string;
  goalWeightKg: number;
  waterMl: number;
  sodiumMg: number;
  sugarG: number;
  macroOverrides?: Partial<Pick<Goals, "calories" | "proteinG" | "carbsG" | "fatsG">>;
}

/**
 * Revised Harris-Benedict basal metabolic rate, kcal/day.
 */
export function basalMetabolicRate(stats: Pick<BodyStats, "sex" | "age" | "heightCm" | "weightKg">): number {
  if (stats.sex === "male") {
    return 88.362 + 13.397 * stats.weightKg + 4.799 * stats.heightCm - 5.677 * stats.age;
  }
  return 447.593 + 9.247 * stats.weightKg + 3.098 * stats.heightCm - 4.33 * stats.age;
}

export function totalDailyEnergyExpenditure(stats: BodyStats): number {
  return basalMetabolicRate(stats) * ACTIVITY_MULTIPLIERS[stats.activityLevel];
}

/**
 * Macro split: protein by body weight, a quarter of energy from fat, the
 * rest from carbs. Whole numbers, truncated.
 */
export function estimateMacroGoals(stats: BodyStats): Pick<Goals, "calories" | "proteinG" | "carbsG" | "fatsG"> {
  const tdee = totalDailyEnergyExpenditure(stats);
  const proteinG = stats.weightKg * PROTEIN_G_PER_KG;
  const fatCalories = tdee * FAT_SHARE_OF_CALORIES;
  const carbsG = (tdee - proteinG * 4 - fatCalories) / 4;

  return {
    calories: Math.trunc(tdee),
    proteinG: Math.trunc(proteinG),
    carbsG: Math.max(0, Math.trunc(carbsG)),
    fatsG: Math.trunc(fatCalories / 9),
  };
}

export function defaultGoalWeight(currentWeightKg: number): number {
  return Math.round(currentWeightKg * 0.95 * 10) / 10;
}

/**
 * Builds a profile from setup answers. The start weight survives edits; only
 * the first setup sets it.
 */
export function buildProfile(
  answers: ProfileAnswers,
  existing?: Profile
): { profile: Profile; micronutrientGoals: MicronutrientGoals } {
  const estimated = estimateMacroGoals(answers);
  const goals: Goals = {
    ...estimated,
    ...answers.macroOverrides,
    waterMl: answers.waterMl,
  };

  return {
    profile: {
      name: answers.name,
      age: answers.age,
      sex: answers.sex,
      heightCm: answers.heightCm,
      weightKg: answers.weightKg,
      startWeightKg: existing?.startWeightKg ?? answers.weightKg,
      goalWeightKg: answers.goalWeightKg,
      activityLevel: answers.activityLevel,
      goals,
    },
    micronutrientGoals: { sodiumMg: answers.sodiumMg, sugarG: answers.sugarG },
  };
}

export function goalProfileOf(doc: Pick<JournalDocument, "profile" | "micronutrientGoals">): GoalProfile {
  const { profile, micronutrientGoals } = doc;
  return {
    calorieGoal: profile.goals.calories,
    proteinGoalG: profile.goals.proteinG,
    carbsGoalG: profile.goals.carbsG,
    fatsGoalG: profile.goals.fatsG,
    waterGoalMl: profile.goals.waterMl,
    sodiumGoalMg: micronutrientGoals.sodiumMg,
    sugarGoalG: micronutrientGoals.sugarG,
    currentWeightKg: profile.weightKg,
    startWeightKg: profile.startWeightKg,
    goalWeightKg: profile.goalWeightKg,
  };
}

// kcal = MET × kg × hours
export function estimateWorkoutCalories(met: number, weightKg: number, durationMin: number): number {
  if (met < 0 || weightKg < 0 || durationMin < 0) return 0;
  return met * weightKg * (durationMin / 60);
}
