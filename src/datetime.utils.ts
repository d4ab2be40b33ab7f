import type { DayOfWeek, DayString, PlanningWindow, TimeOfDay } from "./types.js";

export const MINUTES_PER_DAY = 24 * 60;

export const DAY_OF_WEEK_MAP = {
  sunday: 0, // JavaScript Date week starts on Sunday
  monday: 1,
  tuesday: 2,
  wednesday: 3,
  thursday: 4,
  friday: 5,
  saturday: 6,
} as const satisfies Record<DayOfWeek, number>;

const DAY_NAMES = [
  "sunday",
  "monday",
  "tuesday",
  "wednesday",
  "thursday",
  "friday",
  "saturday",
] as const satisfies readonly DayOfWeek[];

/**
 * Parse a day string (YYYY-MM-DD) to a UTC Date.
 */
export function parseDayString(day: DayString): Date {
  return new Date(`${day}T00:00:00Z`);
}

/**
 * Formats a UTC date as YYYY-MM-DD string
 */
export function formatDayString(date: Date): DayString {
  const year = date.getUTCFullYear();
  const month = (date.getUTCMonth() + 1).toString().padStart(2, "0");
  const day = date.getUTCDate().toString().padStart(2, "0");
  return `${year}-${month}-${day}`;
}

/**
 * Helper to get the day of week name from a Date (UTC)
 */
export function toDayOfWeekUTC(date: Date): DayOfWeek {
  return DAY_NAMES[date.getUTCDay()] ?? "sunday";
}

export function dayOfWeekOf(day: DayString): DayOfWeek {
  return toDayOfWeekUTC(parseDayString(day));
}

/**
 * Shifts a day string by a number of calendar days.
 *
 * @example
 * ```typescript
 * addDays("2025-01-31", 1); // "2025-02-01"
 * ```
 */
export function addDays(day: DayString, days: number): DayString {
  const date = parseDayString(day);
  date.setUTCDate(date.getUTCDate() + days);
  return formatDayString(date);
}

/**
 * Generates every day string of an inclusive window, optionally filtered to
 * some days of the week.
 *
 * @example
 * ```typescript
 * const days = resolveDaysFromWindow(
 *   { start: "2025-02-03", end: "2025-02-09" },
 *   ["wednesday", "friday"],
 * );
 * // Returns: ["2025-02-05", "2025-02-07"]
 * ```
 */
export function resolveDaysFromWindow(
  window: PlanningWindow,
  daysOfWeek?: readonly DayOfWeek[],
): DayString[] {
  const allowedDays = daysOfWeek ? new Set(daysOfWeek) : null;
  const days: DayString[] = [];

  const current = parseDayString(window.start);
  const endDate = parseDayString(window.end);
  while (current <= endDate) {
    if (!allowedDays || allowedDays.has(toDayOfWeekUTC(current))) {
      days.push(formatDayString(current));
    }
    current.setUTCDate(current.getUTCDate() + 1);
  }

  return days;
}

/**
 * Intersects two inclusive windows. Returns undefined when they are disjoint.
 */
export function intersectWindows(
  a: PlanningWindow,
  b: PlanningWindow,
): PlanningWindow | undefined {
  const start = a.start > b.start ? a.start : b.start;
  const end = a.end < b.end ? a.end : b.end;
  if (end < start) return undefined;
  return { start, end };
}

/**
 * Returns the first day of the week containing `day`.
 *
 * @example
 * ```typescript
 * weekStartOf("2025-02-05", "monday"); // "2025-02-03"
 * weekStartOf("2025-02-05", "sunday"); // "2025-02-02"
 * ```
 */
export function weekStartOf(day: DayString, weekStartsOn: DayOfWeek): DayString {
  const date = parseDayString(day);
  const offset = (date.getUTCDay() - DAY_OF_WEEK_MAP[weekStartsOn] + 7) % 7;
  return addDays(day, -offset);
}

export function timeOfDayToMinutes(time: TimeOfDay): number {
  return time.hours * 60 + time.minutes;
}

/**
 * Treats an end time at or before the start as falling on the next day.
 */
export function normalizeEndMinutes(startMinutes: number, endMinutes: number): number {
  return endMinutes <= startMinutes ? endMinutes + MINUTES_PER_DAY : endMinutes;
}
