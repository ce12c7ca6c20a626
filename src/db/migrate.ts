// src/db/migrate.ts
// Versioned upgrade pass run once when the document is loaded. Each step takes
// the raw JSON of the previous version; the schema then fills every key a
// document at CURRENT_SCHEMA_VERSION may omit.

import { parseISO } from "date-fns";
import { CURRENT_SCHEMA_VERSION, JournalDocumentSchema } from "../schema";
import type { JournalDocument } from "../domain/types";

type RawObject = Record<string, unknown>;

interface Migration {
  version: number;
  description: string;
  // `repairs` collects a line for every stored value the step had to change
  up: (doc: RawObject, repairs: string[]) => RawObject;
}

function isObject(value: unknown): value is RawObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// Field names written by the original snake_case tracker.
const LEGACY_KEYS: Readonly<Record<string, string>> = {
  micronutrient_goals: "micronutrientGoals",
  custom_foods: "customFoods",
  daily_logs: "dailyLogs",
  weight_logs: "weightLogs",
  search_history: "searchHistory",
  meal_plans: "mealPlans",
  progress_photos: "progressPhotos",
  weight_kg: "weightKg",
  height_cm: "heightCm",
  start_weight_kg: "startWeightKg",
  goal_weight_kg: "goalWeightKg",
  activity_level: "activityLevel",
  protein_g: "proteinG",
  carbs_g: "carbsG",
  fats_g: "fatsG",
  water_ml: "waterMl",
  sodium_mg: "sodiumMg",
  sugar_g: "sugarG",
  fiber_g: "fiberG",
  serving_size_g: "servingSizeG",
  workout_entries: "workoutEntries",
  duration_min: "durationMin",
  calories_burned: "caloriesBurned",
  start_time: "startTime",
  duration_hours: "durationHours",
  calorie_goal: "calorieStreakDays",
  water_goal: "waterStreakDays",
  last_checked_date: "lastEvaluatedDate",
};

function renameLegacyKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(renameLegacyKeys);
  if (!isObject(value)) return value;

  const out: RawObject = {};
  for (const [key, child] of Object.entries(value)) {
    const target = LEGACY_KEYS[key] ?? key;
    // a key already in the new shape wins over its legacy twin
    if (target !== key && target in value) continue;
    out[target] = renameLegacyKeys(child);
  }
  return out;
}

// Legacy start times are local wall-clock strings without an offset.
function normalizeFastingStart(doc: RawObject): RawObject {
  const fasting = doc.fasting;
  if (!isObject(fasting) || typeof fasting.startTime !== "string") return doc;

  const parsed = parseISO(fasting.startTime);
  const startTime = Number.isNaN(parsed.getTime()) ? null : parsed.toISOString();
  return { ...doc, fasting: { ...fasting, startTime, active: startTime !== null && fasting.active === true } };
}

const LEGACY_FAST_HOURS = 16;

// The tracker stored an unanswered profile prompt as null.
function dropNullProfileFields(doc: RawObject, repairs: string[]): RawObject {
  const profile = doc.profile;
  if (!isObject(profile)) return doc;

  const kept: RawObject = {};
  for (const [key, value] of Object.entries(profile)) {
    if (value === null && key !== "startWeightKg" && key !== "goalWeightKg") {
      repairs.push(`profile.${key} was empty, using the default`);
      continue;
    }
    kept[key] = value;
  }
  return { ...doc, profile: kept };
}

function isEmptyPortion(entry: unknown): boolean {
  return isObject(entry) && typeof entry.grams === "number" && entry.grams <= 0;
}

// The tracker accepted 0 g portions; they carry no nutrients.
function dropEmptyPortions(doc: RawObject, repairs: string[]): RawObject {
  const logs = doc.dailyLogs;
  if (!isObject(logs)) return doc;

  const dailyLogs: RawObject = {};
  for (const [date, log] of Object.entries(logs)) {
    if (!isObject(log) || !isObject(log.meals)) {
      dailyLogs[date] = log;
      continue;
    }
    const meals: RawObject = {};
    for (const [meal, entries] of Object.entries(log.meals)) {
      if (!Array.isArray(entries)) {
        meals[meal] = entries;
        continue;
      }
      meals[meal] = entries.filter((entry) => {
        if (!isEmptyPortion(entry)) return true;
        const name = isObject(entry) && typeof entry.name === "string" ? entry.name : "?";
        repairs.push(`dropped 0 g entry "${name}" from ${date} ${meal}`);
        return false;
      });
    }
    dailyLogs[date] = { ...log, meals };
  }
  return { ...doc, dailyLogs };
}

function resetFastDuration(doc: RawObject, repairs: string[]): RawObject {
  const fasting = doc.fasting;
  if (!isObject(fasting) || typeof fasting.durationHours !== "number" || fasting.durationHours > 0) return doc;

  repairs.push(`fasting.durationHours was ${fasting.durationHours}, reset to ${LEGACY_FAST_HOURS}`);
  return { ...doc, fasting: { ...fasting, durationHours: LEGACY_FAST_HOURS } };
}

const MIGRATIONS: readonly Migration[] = [
  {
    version: 1,
    description: "snake_case tracker document to camelCase schema",
    up: (doc, repairs) => {
      const renamed = renameLegacyKeys(doc);
      let next = normalizeFastingStart(isObject(renamed) ? renamed : {});
      next = dropNullProfileFields(next, repairs);
      next = dropEmptyPortions(next, repairs);
      return resetFastDuration(next, repairs);
    },
  },
];

export function documentVersion(raw: RawObject): number {
  const v = raw.schemaVersion;
  return typeof v === "number" && Number.isInteger(v) && v >= 0 ? v : 0;
}

export interface MigrationOutcome {
  document: JournalDocument;
  fromVersion: number;
  applied: string[];
  repairs: string[];
}

/**
 * Upgrades raw JSON to the current schema. Throws a ZodError when the result
 * still does not validate, and a RangeError for documents from a newer build.
 */
export function migrateDocument(raw: unknown): MigrationOutcome {
  if (!isObject(raw)) {
    throw new TypeError("journal document must be a JSON object");
  }

  const fromVersion = documentVersion(raw);
  if (fromVersion > CURRENT_SCHEMA_VERSION) {
    throw new RangeError(
      `journal document version ${fromVersion} is newer than supported version ${CURRENT_SCHEMA_VERSION}`
    );
  }

  let doc: RawObject = raw;
  const applied: string[] = [];
  const repairs: string[] = [];
  for (const migration of MIGRATIONS) {
    if (migration.version <= fromVersion) continue;
    doc = migration.up(doc, repairs);
    applied.push(`v${migration.version}: ${migration.description}`);
  }

  const document = JournalDocumentSchema.parse({ ...doc, schemaVersion: CURRENT_SCHEMA_VERSION });
  return { document, fromVersion, applied, repairs };
}

export function createEmptyDocument(): JournalDocument {
  return JournalDocumentSchema.parse({});
}
