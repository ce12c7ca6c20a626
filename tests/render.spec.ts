// tests/render.spec.ts
// Menu parsing and text views

import { DASHBOARD_MENU, MORE_MENU, menuLine, parseDashboardKey, parseMoreKey } from "../src/cli/actions";
import {
  dateLabel,
  fastingLine,
  progressBar,
  renderDashboard,
  renderReport,
  renderWeightHistory,
} from "../src/cli/render";
import { createEmptyDocument } from "../src/db/migrate";
import type { JournalDocument } from "../src/domain/types";
import { startFast } from "../src/services/fastingService";
import { addFoodEntry, addPlanItem, addWorkoutEntry, setNotes } from "../src/services/journalService";
import { buildPeriodReport } from "../src/services/reportService";
import { sortedWeights } from "../src/services/trendService";
import { food, simpleDay } from "./helpers";

const TODAY = "2026-10-19";
const NOW = new Date(2026, 9, 19, 12, 0, 0);

describe("menu parsing", () => {
  it("maps dashboard keys to actions", () => {
    expect(parseDashboardKey("1")).toEqual({ kind: "log-food" });
    expect(parseDashboardKey(" m ")).toEqual({ kind: "more" });
    expect(parseDashboardKey("<")).toEqual({ kind: "navigate", days: -1 });
    expect(parseDashboardKey(">")).toEqual({ kind: "navigate", days: 1 });
    expect(parseDashboardKey("Q")).toEqual({ kind: "quit" });
    expect(parseDashboardKey("x")).toBeNull();
  });

  it("maps More keys to actions", () => {
    expect(parseMoreKey("7")).toEqual({ kind: "edit-profile" });
    expect(parseMoreKey("n")).toEqual({ kind: "notes" });
    expect(parseMoreKey("B")).toEqual({ kind: "back" });
    expect(parseMoreKey("8")).toBeNull();
  });

  it("prints every key in the footer", () => {
    expect(menuLine(DASHBOARD_MENU)).toBe(
      "[1] Log Food  [2] Log Workout  [3] Log Weight  [4] Log Water  [f] Fasting  [m] More  [<] Prev Day  [>] Next Day  [q] Quit"
    );
    expect(MORE_MENU).toHaveLength(9);
  });
});

describe("helpers", () => {
  it("draws clamped progress bars", () => {
    expect(progressBar(0.25)).toBe("[#####...............]");
    expect(progressBar(1.5, 4)).toBe("[####]");
    expect(progressBar(-1, 4)).toBe("[....]");
  });

  it("labels nearby dates", () => {
    expect(dateLabel("2026-10-19", TODAY)).toBe("Today");
    expect(dateLabel("2026-10-18", TODAY)).toBe("Yesterday");
    expect(dateLabel("2026-10-20", TODAY)).toBe("Tomorrow");
    expect(dateLabel("2026-10-01", TODAY)).toBe("2026-10-01");
  });

  it("describes fasting state", () => {
    expect(fastingLine({ kind: "idle", defaultDurationHours: 16 })).toBe("Fasting: not active (next fast 16h)");
    expect(
      fastingLine({
        kind: "fasting",
        startTime: NOW,
        durationHours: 16,
        elapsedMs: 10 * 3_600_000,
        remainingMs: 6 * 3_600_000,
        progress: 0.625,
      })
    ).toBe("Fasting: 10h 0m of 16h, 6h 0m left [#############.......]");
  });
});

describe("renderDashboard", () => {
  function journal(): JournalDocument {
    const doc = createEmptyDocument();
    doc.profile.name = "Sam";
    doc.streaks = { calorieStreakDays: 3, waterStreakDays: 1, lastEvaluatedDate: TODAY };
    addFoodEntry(doc, TODAY, "Breakfast", food("Oats", 50, 190, { proteinG: 6.5, carbsG: 33.5, fatsG: 3.5 }));
    addFoodEntry(doc, TODAY, "Lunch", food("Soup", 300, 310));
    addWorkoutEntry(doc, TODAY, { name: "Run", durationMin: 30, caloriesBurned: 300 });
    setNotes(doc, TODAY, "felt good");
    return doc;
  }

  it("shows header, notices, progress, streaks and the day's entries", () => {
    const lines = renderDashboard(journal(), { date: TODAY, today: TODAY, now: NOW, notices: ["Saved."] });

    expect(lines[0]).toBe("=== Sam | Today (2026-10-19) ===");
    expect(lines[1]).toBe("> Saved.");
    expect(lines).toContain("  Calories 500 / 2000 kcal [#####...............] 1500 left");
    expect(lines).toContain("  Water    0 / 2500 ml [....................] 2500 left");
    expect(lines).toContain("Streaks: calories 3 days, water 1 day");
    expect(lines).toContain("Fasting: not active (next fast 16h)");
    expect(lines).toContain("    Oats (50 g) 190 kcal P 7 C 34 F 4");
    expect(lines).toContain("Workouts: 30 min, 300 kcal burned");
    expect(lines).toContain("  Run: 30 min, 300 kcal burned");
    expect(lines).toContain("Notes: felt good");
    expect(lines[lines.length - 1]).toBe(menuLine(DASHBOARD_MENU));
  });

  it("marks empty meals and days without workouts", () => {
    const lines = renderDashboard(createEmptyDocument(), { date: "2026-10-10", today: TODAY, now: NOW });
    expect(lines[0]).toBe("=== Friend | 2026-10-10 (2026-10-10) ===");
    expect(lines.filter((l) => l === "    (nothing logged)")).toHaveLength(4);
    expect(lines).toContain("Workouts: none");
  });

  it("shows the meal plan for a planned future day", () => {
    const doc = createEmptyDocument();
    addPlanItem(doc, "2026-10-20", "Dinner", "Salmon");
    addPlanItem(doc, "2026-10-20", "Dinner", "Rice");
    const lines = renderDashboard(doc, { date: "2026-10-20", today: TODAY, now: NOW });
    expect(lines).toContain("Planned meals");
    expect(lines).toContain("  Dinner: Salmon, Rice");
    expect(lines).toContain("  Lunch: -");
  });

  it("shows a running fast", () => {
    const doc = createEmptyDocument();
    doc.fasting = startFast(doc.fasting, new Date(NOW.getTime() - 2 * 3_600_000), 16);
    const lines = renderDashboard(doc, { date: TODAY, today: TODAY, now: NOW });
    expect(lines).toContain("Fasting: 2h 0m of 16h, 14h 0m left [###.................]");
  });
});

describe("renderReport", () => {
  it("summarises the window and the advice", () => {
    const doc = createEmptyDocument();
    doc.profile.weightKg = 79.9;
    doc.profile.goalWeightKg = 75;
    doc.dailyLogs = { "2026-10-13": simpleDay(2100), "2026-10-19": simpleDay(1900) };
    doc.weightLogs = { "2026-10-13": 80, "2026-10-19": 79.9 };

    const lines = renderReport(buildPeriodReport(doc, TODAY, "weekly"));
    expect(lines[0]).toBe("Weekly report 2026-10-13 to 2026-10-19 (2 of 7 days logged)");
    expect(lines).toContain("  Calories 571 / 2000 kcal");
    expect(lines).toContain("  2026-10-13  2100 kcal [####################]");
    expect(lines).toContain("  2026-10-14     0 kcal [....................]");
    expect(lines).toContain("Weight change: -0.1 kg");
    expect(lines).toContain("Average logged calories: 2000");
    expect(lines[lines.length - 1]).toBe("Advice: Weight loss is slow. Consider reducing calories from ~2000 to ~1800.");
  });

  it("says when there are not enough weigh-ins", () => {
    const doc = createEmptyDocument();
    doc.dailyLogs = { "2026-10-19": simpleDay(1800) };
    expect(renderReport(buildPeriodReport(doc, TODAY, "monthly"))).toContain(
      "Weight trend: not enough weigh-ins in this period."
    );
  });
});

describe("renderWeightHistory", () => {
  it("lists weigh-ins with changes and progress to goal", () => {
    const doc = createEmptyDocument();
    doc.profile.startWeightKg = 90;
    doc.profile.weightKg = 85;
    doc.profile.goalWeightKg = 80;
    doc.weightLogs = { "2026-10-05": 90, "2026-10-12": 87, "2026-10-19": 85 };

    const lines = renderWeightHistory(doc, sortedWeights(doc.weightLogs));
    expect(lines).toEqual([
      "Weight history",
      "  2026-10-05  90.0 kg",
      "  2026-10-12  87.0 kg  -3.0",
      "  2026-10-19  85.0 kg  -2.0",
      "",
      "Start 90.0 kg -> current 85.0 kg -> goal 80.0 kg (50% to goal)",
      "Trend line: -2.50 kg/week",
    ]);
  });
});
