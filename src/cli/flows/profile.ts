// src/cli/flows/profile.ts
// First-run setup and profile editing.

import { ACTIVITY_LEVELS, SEXES } from "../../schema";
import type { JournalDocument } from "../../domain/types";
import {
  ProfileAnswers,
  buildProfile,
  defaultGoalWeight,
  estimateMacroGoals,
} from "../../services/profileService";
import type { Prompter, Terminal } from "../terminal";
import { askChoice, askConfirm, askNumber, askText } from "../prompt";

/**
 * Asks for everything a profile needs. Defaults come from `existing` when
 * editing, otherwise from the built-in profile defaults.
 */
export async function askProfileAnswers(
  p: Prompter,
  out: Terminal,
  existing: Pick<JournalDocument, "profile" | "micronutrientGoals">
): Promise<ProfileAnswers> {
  const prev = existing.profile;

  const name = await askText(p, "Your name", prev.name);
  const age = await askNumber(p, out, "Age", { defaultValue: prev.age, integer: true, greaterThan: 0 });
  const sex = await askChoice(p, out, "Sex", SEXES, prev.sex);
  const heightCm = await askNumber(p, out, "Height (cm)", { defaultValue: prev.heightCm, greaterThan: 0 });
  const weightKg = await askNumber(p, out, "Current weight (kg)", { defaultValue: prev.weightKg, greaterThan: 0 });
  const activityLevel = await askChoice(p, out, "Activity level", ACTIVITY_LEVELS, prev.activityLevel);

  const goalDefault = prev.goalWeightKg !== prev.weightKg ? prev.goalWeightKg : defaultGoalWeight(weightKg);
  const goalWeightKg = await askNumber(p, out, "Goal weight (kg)", { defaultValue: goalDefault, greaterThan: 0 });

  const stats = { sex, age, heightCm, weightKg, activityLevel };
  const estimate = estimateMacroGoals(stats);
  out.write(
    `Estimated daily goals: ${estimate.calories} kcal, protein ${estimate.proteinG} g, ` +
      `carbs ${estimate.carbsG} g, fats ${estimate.fatsG} g`
  );

  let macroOverrides: ProfileAnswers["macroOverrides"];
  if (await askConfirm(p, out, "Set your own macro goals instead?", false)) {
    macroOverrides = {
      calories: await askNumber(p, out, "Calories (kcal)", { defaultValue: estimate.calories, min: 0 }),
      proteinG: await askNumber(p, out, "Protein (g)", { defaultValue: estimate.proteinG, min: 0 }),
      carbsG: await askNumber(p, out, "Carbs (g)", { defaultValue: estimate.carbsG, min: 0 }),
      fatsG: await askNumber(p, out, "Fats (g)", { defaultValue: estimate.fatsG, min: 0 }),
    };
  }

  const waterMl = await askNumber(p, out, "Daily water goal (ml)", { defaultValue: prev.goals.waterMl, min: 0 });
  const sodiumMg = await askNumber(p, out, "Daily sodium limit (mg)", {
    defaultValue: existing.micronutrientGoals.sodiumMg,
    min: 0,
  });
  const sugarG = await askNumber(p, out, "Daily sugar limit (g)", {
    defaultValue: existing.micronutrientGoals.sugarG,
    min: 0,
  });

  return { ...stats, name, goalWeightKg, waterMl, sodiumMg, sugarG, macroOverrides };
}

/**
 * Fills in a fresh document from setup answers. The fast length starts at
 * the configured default.
 */
export async function runFirstSetup(
  p: Prompter,
  out: Terminal,
  blank: JournalDocument,
  defaultFastHours: number
): Promise<JournalDocument> {
  out.write("Welcome! Let's set up your profile.");
  const answers = await askProfileAnswers(p, out, blank);
  const { profile, micronutrientGoals } = buildProfile(answers);
  return {
    ...blank,
    profile,
    micronutrientGoals,
    fasting: { active: false, startTime: null, durationHours: defaultFastHours },
  };
}
