// src/cli/flows/tracking.ts
// Workouts, weight, water, fasting and day notes.

import { EXERCISES, estimateWorkoutCalories } from "../../services/profileService";
import { endFast, fastingStatus, startFast } from "../../services/fastingService";
import { addWater, addWorkoutEntry, logWeight, peekLog, setNotes } from "../../services/journalService";
import { formatHoursMinutes } from "../../utils/date";
import type { CliContext } from "../context";
import { askChoice, askConfirm, askIndex, askNumber, askText } from "../prompt";
import { fastingLine, num } from "../render";

export async function logWorkoutFlow(ctx: CliContext): Promise<void> {
  const { prompter: p, terminal: out } = ctx;

  const source = await askChoice(p, out, "Pick from the exercise list or enter manually", ["list", "manual"] as const, "list");

  let name: string;
  let durationMin: number;
  let caloriesBurned: number;

  if (source === "list") {
    EXERCISES.forEach((e, i) => out.write(`  ${i + 1}. ${e.name} (MET ${e.met})`));
    const idx = await askIndex(p, out, "Choose an exercise (0 to cancel)", EXERCISES.length, { allowCancel: true });
    if (idx === null) return;

    const exercise = EXERCISES[idx];
    name = exercise.name;
    durationMin = await askNumber(p, out, "Duration in minutes", { integer: true, min: 0, defaultValue: 30 });
    caloriesBurned = estimateWorkoutCalories(exercise.met, ctx.session.document.profile.weightKg, durationMin);
    out.write(`Estimated ${num(caloriesBurned)} kcal burned.`);
  } else {
    name = await askText(p, "Workout name");
    if (!name) return;
    durationMin = await askNumber(p, out, "Duration in minutes", { integer: true, min: 0, defaultValue: 30 });
    caloriesBurned = await askNumber(p, out, "Calories burned", { min: 0 });
  }

  ctx.session.mutate("log-workout", (doc) => addWorkoutEntry(doc, ctx.viewDate, { name, durationMin, caloriesBurned }));
  ctx.notify(`Logged ${name}: ${durationMin} min, ${num(caloriesBurned)} kcal.`);
}

export async function logWeightFlow(ctx: CliContext): Promise<void> {
  const current = ctx.session.document.weightLogs[ctx.viewDate] ?? ctx.session.document.profile.weightKg;
  const weightKg = await askNumber(ctx.prompter, ctx.terminal, `Weight on ${ctx.viewDate} (kg)`, {
    defaultValue: current,
    greaterThan: 0,
  });
  ctx.session.mutate("log-weight", (doc) => logWeight(doc, ctx.viewDate, weightKg));
  ctx.notify(`Weight ${weightKg.toFixed(1)} kg logged for ${ctx.viewDate}.`);
}

export async function logWaterFlow(ctx: CliContext): Promise<void> {
  const soFar = peekLog(ctx.session.document, ctx.viewDate)?.waterMl ?? 0;
  ctx.terminal.write(`Water so far: ${num(soFar)} ml`);

  const amount = await askNumber(ctx.prompter, ctx.terminal, "Amount to add (ml)", { defaultValue: 250, min: 0 });
  if (amount === 0) {
    ctx.notify("No water added.");
    return;
  }
  const total = ctx.session.mutate("log-water", (doc) => addWater(doc, ctx.viewDate, amount));
  ctx.notify(`Added ${num(amount)} ml of water (${num(total)} ml today).`);
}

export async function fastingFlow(ctx: CliContext): Promise<void> {
  const { prompter: p, terminal: out, session } = ctx;
  const status = fastingStatus(session.document.fasting, session.now());
  out.write(fastingLine(status));

  if (status.kind === "fasting") {
    if (!(await askConfirm(p, out, "End the current fast?", true))) return;
    session.mutate("end-fast", (doc) => {
      doc.fasting = endFast(doc.fasting);
    });
    ctx.notify(`Fast ended after ${formatHoursMinutes(status.elapsedMs)}.`);
    return;
  }

  if (!(await askConfirm(p, out, "Start a fast now?", true))) return;
  const hours = await askNumber(p, out, "Fast length in hours", {
    defaultValue: status.defaultDurationHours,
    greaterThan: 0,
  });
  const now = session.now();
  session.mutate("start-fast", (doc) => {
    doc.fasting = startFast(doc.fasting, now, hours);
  });
  ctx.notify(`Started a ${hours}h fast.`);
}

export async function notesFlow(ctx: CliContext): Promise<void> {
  const existing = peekLog(ctx.session.document, ctx.viewDate)?.notes ?? "";
  const notes = await askText(ctx.prompter, `Notes for ${ctx.viewDate}`, existing);
  ctx.session.mutate("notes", (doc) => setNotes(doc, ctx.viewDate, notes));
  ctx.notify(notes.trim() ? "Notes saved." : "Notes cleared.");
}
