import {
  addDays,
  differenceInCalendarDays,
  eachDayOfInterval,
  format,
  parse,
} from "date-fns";

const DATE_ONLY = "yyyy-MM-dd";

export function toDateOnly(date: Date): string {
  return format(date, DATE_ONLY);
}

export function todayDateOnly(now: Date = new Date()): string {
  return toDateOnly(now);
}

// Local midnight of the given calendar date.
export function parseDateOnly(iso: string): Date {
  return parse(iso, DATE_ONLY, new Date());
}

export function shiftDateOnly(iso: string, days: number): string {
  return toDateOnly(addDays(parseDateOnly(iso), days));
}

export function previousDateOnly(iso: string): string {
  return shiftDateOnly(iso, -1);
}

export function daysBetween(from: string, to: string): number {
  return differenceInCalendarDays(parseDateOnly(to), parseDateOnly(from));
}

/**
 * Every calendar date from `start` to `end`, both inclusive.
 * Empty when `end` is before `start`.
 */
export function datesInRange(start: string, end: string): string[] {
  const startDate = parseDateOnly(start);
  const endDate = parseDateOnly(end);
  if (endDate < startDate) return [];
  return eachDayOfInterval({ start: startDate, end: endDate }).map(toDateOnly);
}

export function isWithin(iso: string, start: string, end: string): boolean {
  // YYYY-MM-DD compares lexicographically
  return iso >= start && iso <= end;
}

export function formatHoursMinutes(ms: number): string {
  const totalMinutes = Math.floor(Math.max(0, ms) / 60000);
  const hours = Math.floor(totalMinutes / 60);
  const minutes = totalMinutes % 60;
  return `${hours}h ${minutes}m`;
}

export function backupStamp(now: Date): string {
  return format(now, "yyyy-MM-dd_HH-mm-ss");
}
