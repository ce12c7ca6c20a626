// src/services/fastingService.ts
// Single active fast: start, end, and elapsed/remaining status.

import type { FastingState, FastingStatus } from "../domain/types";
import { FastingError } from "../domain/errors";

const MS_PER_HOUR = 60 * 60 * 1000;

export function startFast(state: FastingState, now: Date, durationHours: number): FastingState {
  if (state.active) {
    throw new FastingError("A fast is already active", "FAST_ALREADY_ACTIVE");
  }
  if (!Number.isFinite(durationHours) || durationHours <= 0) {
    throw new FastingError(`Fast duration must be positive (got ${durationHours})`, "INVALID_DURATION");
  }
  return { active: true, startTime: now.toISOString(), durationHours };
}

/**
 * Ends the active fast. The duration is kept as the default for the next one.
 */
export function endFast(state: FastingState): FastingState {
  if (!state.active) {
    throw new FastingError("No fast is active", "NO_ACTIVE_FAST");
  }
  return { active: false, startTime: null, durationHours: state.durationHours };
}

/**
 * Elapsed time, time left (floored at zero) and progress (capped at 1).
 * A fast past its duration stays active until it is ended explicitly.
 */
export function fastingStatus(state: FastingState, now: Date): FastingStatus {
  if (!state.active || state.startTime === null) {
    return { kind: "idle", defaultDurationHours: state.durationHours };
  }

  const startTime = new Date(state.startTime);
  const durationMs = state.durationHours * MS_PER_HOUR;
  const elapsedMs = Math.max(0, now.getTime() - startTime.getTime());

  return {
    kind: "fasting",
    startTime,
    durationHours: state.durationHours,
    elapsedMs,
    remainingMs: Math.max(0, durationMs - elapsedMs),
    progress: durationMs > 0 ? Math.min(elapsedMs / durationMs, 1) : 1,
  };
}
