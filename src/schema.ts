import { z } from "zod";

/**
 * Version written by this build. Documents with a lower (or missing) version
 * are upgraded by `migrateDocument` before they reach this schema.
 */
export const CURRENT_SCHEMA_VERSION = 1;

export const MEAL_TYPES = ["Breakfast", "Lunch", "Dinner", "Snacks"] as const;
export const MealTypeSchema = z.enum(MEAL_TYPES);
export type MealType = z.infer<typeof MealTypeSchema>;

export const SEXES = ["male", "female"] as const;
export const ACTIVITY_LEVELS = ["sedentary", "light", "moderate", "active", "very_active"] as const;
export type Sex = (typeof SEXES)[number];
export type ActivityLevel = (typeof ACTIVITY_LEVELS)[number];

// YYYY-MM-DD
export const IsoDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD");

const timestampSchema = z
  .string()
  .refine((s) => !Number.isNaN(Date.parse(s)), "expected an ISO timestamp");

/**
 * Micronutrients carried by a food entry. Older entries may omit any of them.
 */
export const MicrosSchema = z.object({
  sodiumMg: z.number().nonnegative().default(0),
  sugarG: z.number().nonnegative().default(0),
  fiberG: z.number().nonnegative().default(0),
});
export type Micros = z.infer<typeof MicrosSchema>;

export const FoodEntrySchema = z.object({
  name: z.string().min(1, "name is required"),
  grams: z.number().positive("grams must be greater than 0"),
  calories: z.number().nonnegative(),
  proteinG: z.number().nonnegative(),
  carbsG: z.number().nonnegative(),
  fatsG: z.number().nonnegative(),
  micros: MicrosSchema.default({}),
});
export type FoodEntry = z.infer<typeof FoodEntrySchema>;

/**
 * A saved food or a recipe. Nutrients are per `servingSizeG`.
 */
export const CustomFoodSchema = z.object({
  name: z.string().min(1, "name is required"),
  servingSizeG: z.number().nonnegative(),
  calories: z.number().nonnegative(),
  proteinG: z.number().nonnegative(),
  carbsG: z.number().nonnegative(),
  fatsG: z.number().nonnegative(),
  micros: MicrosSchema.default({}),
});
export type CustomFood = z.infer<typeof CustomFoodSchema>;

export const WorkoutEntrySchema = z.object({
  name: z.string().min(1, "name is required"),
  durationMin: z.number().nonnegative(),
  caloriesBurned: z.number().nonnegative(),
});
export type WorkoutEntry = z.infer<typeof WorkoutEntrySchema>;

export const MealBucketsSchema = z.object({
  Breakfast: z.array(FoodEntrySchema).default([]),
  Lunch: z.array(FoodEntrySchema).default([]),
  Dinner: z.array(FoodEntrySchema).default([]),
  Snacks: z.array(FoodEntrySchema).default([]),
});
export type MealBuckets = z.infer<typeof MealBucketsSchema>;

export const DailyLogSchema = z.object({
  meals: MealBucketsSchema.default({}),
  workoutEntries: z.array(WorkoutEntrySchema).default([]),
  waterMl: z.number().nonnegative().default(0),
  notes: z.string().default(""),
});
export type DailyLog = z.infer<typeof DailyLogSchema>;

export const GoalsSchema = z.object({
  calories: z.number().nonnegative().default(2000),
  proteinG: z.number().nonnegative().default(100),
  carbsG: z.number().nonnegative().default(200),
  fatsG: z.number().nonnegative().default(70),
  waterMl: z.number().nonnegative().default(2500),
});
export type Goals = z.infer<typeof GoalsSchema>;

export const ProfileSchema = z
  .object({
    name: z.string().default("Friend"),
    age: z.number().int().positive().default(30),
    sex: z.enum(SEXES).default("male"),
    heightCm: z.number().positive().default(175),
    weightKg: z.number().positive().default(70),
    startWeightKg: z.number().positive().nullable().default(null),
    goalWeightKg: z.number().positive().nullable().default(null),
    activityLevel: z.enum(ACTIVITY_LEVELS).default("moderate"),
    goals: GoalsSchema.default({}),
  })
  .transform((p) => ({
    ...p,
    startWeightKg: p.startWeightKg ?? p.weightKg,
    goalWeightKg: p.goalWeightKg ?? p.weightKg,
  }));
export type Profile = z.infer<typeof ProfileSchema>;

export const MicronutrientGoalsSchema = z.object({
  sodiumMg: z.number().nonnegative().default(2300),
  sugarG: z.number().nonnegative().default(30),
});
export type MicronutrientGoals = z.infer<typeof MicronutrientGoalsSchema>;

/**
 * `startTime` is kept only while a fast is active.
 */
export const FastingStateSchema = z
  .object({
    active: z.boolean().default(false),
    startTime: timestampSchema.nullable().default(null),
    durationHours: z.number().positive().default(16),
  })
  .transform((f): { active: boolean; startTime: string | null; durationHours: number } =>
    f.active && f.startTime !== null
      ? f
      : { active: false, startTime: null, durationHours: f.durationHours }
  );
export type FastingState = z.infer<typeof FastingStateSchema>;

export const StreakStateSchema = z.object({
  calorieStreakDays: z.number().int().nonnegative().default(0),
  waterStreakDays: z.number().int().nonnegative().default(0),
  lastEvaluatedDate: IsoDateSchema.nullable().default(null),
});
export type StreakState = z.infer<typeof StreakStateSchema>;

export const MealPlanSchema = z.object({
  Breakfast: z.array(z.string()).default([]),
  Lunch: z.array(z.string()).default([]),
  Dinner: z.array(z.string()).default([]),
  Snacks: z.array(z.string()).default([]),
});
export type MealPlan = z.infer<typeof MealPlanSchema>;

export const JournalDocumentSchema = z.object({
  schemaVersion: z.number().int().default(CURRENT_SCHEMA_VERSION),
  profile: ProfileSchema.default({}),
  micronutrientGoals: MicronutrientGoalsSchema.default({}),
  customFoods: z.array(CustomFoodSchema).default([]),
  dailyLogs: z.record(IsoDateSchema, DailyLogSchema).default({}),
  weightLogs: z.record(IsoDateSchema, z.number().positive()).default({}),
  searchHistory: z.array(z.string()).default([]),
  fasting: FastingStateSchema.default({}),
  streaks: StreakStateSchema.default({}),
  mealPlans: z.record(IsoDateSchema, MealPlanSchema).default({}),
  progressPhotos: z.record(IsoDateSchema, z.string()).default({}),
});
export type JournalDocument = z.infer<typeof JournalDocumentSchema>;
