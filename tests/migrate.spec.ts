// tests/migrate.spec.ts
// Upgrading stored documents to the current schema

import { CURRENT_SCHEMA_VERSION } from "../src/schema";
import { createEmptyDocument, migrateDocument } from "../src/db/migrate";

const legacy = {
  profile: {
    name: "Sam",
    age: 34,
    sex: "female",
    height_cm: 168,
    weight_kg: 72.5,
    start_weight_kg: 78,
    goal_weight_kg: 65,
    activity_level: "light",
    goals: { calories: 1800, protein_g: 120, carbs_g: 180, fats_g: 60, water_ml: 2000 },
  },
  micronutrient_goals: { sodium_mg: 2000, sugar_g: 25 },
  custom_foods: [
    {
      name: "Protein bar",
      serving_size_g: 60,
      calories: 220,
      protein_g: 20,
      carbs_g: 22,
      fats_g: 7,
      micros: { sodium_mg: 150, sugar_g: 3, fiber_g: 5 },
    },
  ],
  daily_logs: {
    "2026-10-18": {
      meals: {
        Breakfast: [
          {
            name: "Oats",
            grams: 50,
            calories: 190,
            protein_g: 6.5,
            carbs_g: 33.5,
            fats_g: 3.5,
            micros: { sodium_mg: 3, sugar_g: 0.5, fiber_g: 5 },
          },
        ],
        Lunch: [],
        Dinner: [],
        Snacks: [],
      },
      workout_entries: [{ name: "Yoga", duration_min: 30, calories_burned: 90 }],
      water_ml: 1500,
    },
  },
  weight_logs: { "2026-10-18": 72.5 },
  search_history: ["oats"],
  fasting: { active: true, start_time: "2026-10-19T06:30:00", duration_hours: 16 },
  streaks: { calorie_goal: 3, water_goal: 1, last_checked_date: "2026-10-19" },
  meal_plans: { "2026-10-20": { Breakfast: ["Oats"], Lunch: [], Dinner: [], Snacks: [] } },
  progress_photos: { "2026-10-18": "/photos/a.jpg" },
};

describe("migrateDocument", () => {
  it("upgrades a snake_case document", () => {
    const { document, fromVersion, applied } = migrateDocument(legacy);

    expect(fromVersion).toBe(0);
    expect(applied).toHaveLength(1);
    expect(document.schemaVersion).toBe(CURRENT_SCHEMA_VERSION);

    expect(document.profile).toMatchObject({ heightCm: 168, weightKg: 72.5, startWeightKg: 78, goalWeightKg: 65 });
    expect(document.profile.goals).toEqual({ calories: 1800, proteinG: 120, carbsG: 180, fatsG: 60, waterMl: 2000 });
    expect(document.micronutrientGoals).toEqual({ sodiumMg: 2000, sugarG: 25 });
    expect(document.customFoods[0]).toMatchObject({ servingSizeG: 60, micros: { sodiumMg: 150, sugarG: 3, fiberG: 5 } });

    const log = document.dailyLogs["2026-10-18"];
    expect(log.meals.Breakfast[0]).toMatchObject({ proteinG: 6.5, carbsG: 33.5, fatsG: 3.5 });
    expect(log.workoutEntries).toEqual([{ name: "Yoga", durationMin: 30, caloriesBurned: 90 }]);
    expect(log.waterMl).toBe(1500);
    expect(log.notes).toBe("");

    expect(document.streaks).toEqual({ calorieStreakDays: 3, waterStreakDays: 1, lastEvaluatedDate: "2026-10-19" });
    expect(document.mealPlans["2026-10-20"].Breakfast).toEqual(["Oats"]);
    expect(document.progressPhotos).toEqual({ "2026-10-18": "/photos/a.jpg" });
  });

  it("reads naive fasting start times as local time", () => {
    const { document } = migrateDocument(legacy);
    expect(document.fasting).toEqual({
      active: true,
      startTime: new Date(2026, 9, 19, 6, 30, 0).toISOString(),
      durationHours: 16,
    });
  });

  it("drops an unreadable fasting start", () => {
    const { document } = migrateDocument({ fasting: { active: true, start_time: "soon", duration_hours: 12 } });
    expect(document.fasting).toEqual({ active: false, startTime: null, durationHours: 12 });
  });

  it("falls back to the default name when the tracker stored none", () => {
    const { document, repairs } = migrateDocument({ profile: { name: null, weight_kg: 72.5 } });
    expect(document.profile).toMatchObject({ name: "Friend", weightKg: 72.5 });
    expect(repairs).toEqual(["profile.name was empty, using the default"]);
  });

  it("drops 0 g entries and keeps the rest of the day", () => {
    const { document, repairs } = migrateDocument({
      daily_logs: {
        "2026-10-18": {
          meals: {
            Lunch: [
              { name: "Rice", grams: 0, calories: 0, protein_g: 0, carbs_g: 0, fats_g: 0 },
              { name: "Apple", grams: 150, calories: 78, protein_g: 0.4, carbs_g: 21, fats_g: 0.3 },
            ],
          },
          water_ml: 500,
        },
      },
    });
    const log = document.dailyLogs["2026-10-18"];
    expect(log.meals.Lunch.map((e) => e.name)).toEqual(["Apple"]);
    expect(log.waterMl).toBe(500);
    expect(repairs).toEqual(['dropped 0 g entry "Rice" from 2026-10-18 Lunch']);
  });

  it("resets a fast duration of 0 hours to 16", () => {
    const { document, repairs } = migrateDocument({ fasting: { active: false, start_time: null, duration_hours: 0 } });
    expect(document.fasting).toEqual({ active: false, startTime: null, durationHours: 16 });
    expect(repairs).toEqual(["fasting.durationHours was 0, reset to 16"]);
  });

  it("reports no repairs for a clean legacy document", () => {
    expect(migrateDocument(legacy).repairs).toEqual([]);
  });

  it("prefers a camelCase key over its legacy twin", () => {
    const { document } = migrateDocument({ profile: { weight_kg: 90, weightKg: 80 } });
    expect(document.profile.weightKg).toBe(80);
  });

  it("fills defaults for an empty object", () => {
    const { document } = migrateDocument({});
    expect(document.profile).toMatchObject({ name: "Friend", weightKg: 70, startWeightKg: 70, goalWeightKg: 70 });
    expect(document.dailyLogs).toEqual({});
  });

  it("leaves a current document alone", () => {
    const current = createEmptyDocument();
    const outcome = migrateDocument(JSON.parse(JSON.stringify(current)));
    expect(outcome.fromVersion).toBe(CURRENT_SCHEMA_VERSION);
    expect(outcome.applied).toEqual([]);
    expect(outcome.document).toEqual(current);
  });

  it("refuses documents from a newer version", () => {
    expect(() => migrateDocument({ schemaVersion: CURRENT_SCHEMA_VERSION + 1 })).toThrow(RangeError);
  });

  it("refuses anything that is not an object", () => {
    expect(() => migrateDocument([])).toThrow(TypeError);
    expect(() => migrateDocument(null)).toThrow(TypeError);
  });

  it("rejects logs keyed by something other than a date", () => {
    expect(() => migrateDocument({ schemaVersion: 1, dailyLogs: { yesterday: {} } })).toThrow();
  });
});
