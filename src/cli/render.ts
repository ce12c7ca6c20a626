// src/cli/render.ts
// Text views. Every function returns lines so the views can be checked
// without a terminal.

import { MEAL_TYPES } from "../schema";
import type { FastingStatus, JournalDocument, PeriodReport, WeightPoint } from "../domain/types";
import {
  computeDayTotals,
  computeRemaining,
  computeWorkoutTotals,
  goalProgress,
  TRACKED_METRICS,
} from "../services/nutritionService";
import { fastingStatus } from "../services/fastingService";
import { peekLog } from "../services/journalService";
import { goalProfileOf } from "../services/profileService";
import { weightProgress, weightRegression } from "../services/trendService";
import { formatHoursMinutes, previousDateOnly, shiftDateOnly } from "../utils/date";
import { DASHBOARD_MENU, menuLine } from "./actions";

const BAR_WIDTH = 20;

export function num(value: number): string {
  return Math.round(value).toString();
}

export function signed(value: number, digits = 1): string {
  const text = value.toFixed(digits);
  return value > 0 ? `+${text}` : text;
}

export function progressBar(fraction: number, width = BAR_WIDTH): string {
  const clamped = Math.max(0, Math.min(1, fraction));
  const filled = Math.round(clamped * width);
  return `[${"#".repeat(filled)}${".".repeat(width - filled)}]`;
}

function days(n: number): string {
  return `${n} day${n === 1 ? "" : "s"}`;
}

export function dateLabel(date: string, today: string): string {
  if (date === today) return "Today";
  if (date === previousDateOnly(today)) return "Yesterday";
  if (date === shiftDateOnly(today, 1)) return "Tomorrow";
  return date;
}

export function fastingLine(status: FastingStatus): string {
  switch (status.kind) {
    case "idle":
      return `Fasting: not active (next fast ${status.defaultDurationHours}h)`;
    case "fasting": {
      const left = status.remainingMs > 0 ? `${formatHoursMinutes(status.remainingMs)} left` : "goal reached";
      return `Fasting: ${formatHoursMinutes(status.elapsedMs)} of ${status.durationHours}h, ${left} ${progressBar(status.progress)}`;
    }
  }
}

export interface DashboardView {
  date: string;
  today: string;
  now: Date;
  notices?: readonly string[];
}

export function renderDashboard(doc: JournalDocument, view: DashboardView): string[] {
  const goals = goalProfileOf(doc);
  const log = peekLog(doc, view.date);
  const totals = computeDayTotals(log);
  const remaining = computeRemaining(goals, totals);
  const lines: string[] = [];

  lines.push(`=== ${doc.profile.name} | ${dateLabel(view.date, view.today)} (${view.date}) ===`);
  for (const notice of view.notices ?? []) lines.push(`> ${notice}`);
  lines.push("");

  lines.push("Nutrition");
  for (const def of TRACKED_METRICS) {
    const goal = def.goal(goals);
    lines.push(
      `  ${def.label.padEnd(8)} ${num(totals[def.metric])} / ${num(goal)} ${def.unit} ` +
        `${progressBar(goalProgress(totals[def.metric], goal))} ${num(remaining[def.metric])} left`
    );
  }
  lines.push("");

  lines.push(
    `Streaks: calories ${days(doc.streaks.calorieStreakDays)}, water ${days(doc.streaks.waterStreakDays)}`
  );
  lines.push(fastingLine(fastingStatus(doc.fasting, view.now)));
  lines.push("");

  const plan = doc.mealPlans[view.date];
  if (view.date > view.today && plan) {
    lines.push("Planned meals");
    for (const meal of MEAL_TYPES) {
      lines.push(`  ${meal}: ${plan[meal].length ? plan[meal].join(", ") : "-"}`);
    }
  } else {
    lines.push("Food log");
    for (const meal of MEAL_TYPES) {
      const entries = log?.meals[meal] ?? [];
      lines.push(`  ${meal}`);
      if (entries.length === 0) {
        lines.push("    (nothing logged)");
        continue;
      }
      for (const e of entries) {
        lines.push(
          `    ${e.name} (${num(e.grams)} g) ${num(e.calories)} kcal ` +
            `P ${num(e.proteinG)} C ${num(e.carbsG)} F ${num(e.fatsG)}`
        );
      }
    }
  }
  lines.push("");

  const workouts = computeWorkoutTotals(log);
  if (workouts.sessions === 0) {
    lines.push("Workouts: none");
  } else {
    lines.push(`Workouts: ${num(workouts.durationMin)} min, ${num(workouts.caloriesBurned)} kcal burned`);
    for (const w of log?.workoutEntries ?? []) {
      lines.push(`  ${w.name}: ${num(w.durationMin)} min, ${num(w.caloriesBurned)} kcal burned`);
    }
  }

  if (log?.notes) lines.push(`Notes: ${log.notes}`);

  lines.push("");
  lines.push(menuLine(DASHBOARD_MENU));
  return lines;
}

export function renderReport(report: PeriodReport): string[] {
  const title = report.period === "weekly" ? "Weekly" : "Monthly";
  const lines: string[] = [
    `${title} report ${report.window.start} to ${report.window.end} ` +
      `(${report.loggedDays} of ${report.days.length} days logged)`,
    "",
    "Daily averages",
  ];

  for (const def of TRACKED_METRICS) {
    lines.push(
      `  ${def.label.padEnd(8)} ${num(report.averages[def.metric])} / ${num(def.goal(report.goals))} ${def.unit}`
    );
  }
  lines.push("");

  lines.push("Calories by day");
  for (const day of report.days) {
    const cal = day.totals.calories;
    lines.push(`  ${day.date} ${num(cal).padStart(5)} kcal ${progressBar(goalProgress(cal, report.goals.calorieGoal))}`);
  }
  lines.push("");

  const trend = report.trend;
  if (trend.weightChangeKg === null) {
    lines.push("Weight trend: not enough weigh-ins in this period.");
  } else {
    lines.push(`Weight change: ${signed(trend.weightChangeKg)} kg`);
    if (trend.regression) lines.push(`Trend line: ${signed(trend.regression.slopeKgPerWeek, 2)} kg/week`);
    lines.push(`Average logged calories: ${num(trend.avgCalories)}`);
  }
  if (trend.advice) lines.push(`Advice: ${trend.advice.message}`);

  return lines;
}

export function renderWeightHistory(doc: JournalDocument, points: readonly WeightPoint[]): string[] {
  const lines: string[] = ["Weight history"];
  points.forEach((p, i) => {
    const delta = i === 0 ? "" : `  ${signed(p.weightKg - points[i - 1].weightKg)}`;
    lines.push(`  ${p.date}  ${p.weightKg.toFixed(1)} kg${delta}`);
  });
  lines.push("");

  const progress = weightProgress(goalProfileOf(doc), doc.weightLogs);
  lines.push(
    `Start ${progress.startWeightKg.toFixed(1)} kg -> current ${progress.currentWeightKg.toFixed(1)} kg -> ` +
      `goal ${progress.goalWeightKg.toFixed(1)} kg (${Math.round(progress.percentToGoal * 100)}% to goal)`
  );

  const regression = weightRegression(points);
  if (regression) lines.push(`Trend line: ${signed(regression.slopeKgPerWeek, 2)} kg/week`);
  return lines;
}
