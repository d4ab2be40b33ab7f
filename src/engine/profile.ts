import type { DayOfWeek, DayString } from "../types.js";
import type { ShiftType } from "./shift-types.js";
import type { Employee } from "./types.js";

/**
 * An employee's constraints as lookup sets.
 *
 * Keys are `shiftType:dayOfWeek` or `shiftType:date`. `allowedDates` is
 * undefined when the employee has no date whitelist.
 */
export interface ConstraintProfile {
  readonly allowedDates: ReadonlySet<DayString> | undefined;
  readonly blockedDates: ReadonlySet<DayString>;
  readonly availability: ReadonlySet<string>;
  readonly preferredOnDates: ReadonlySet<string>;
  readonly preferredOnWeekdays: ReadonlySet<string>;
  readonly avoidedShiftTypes: ReadonlySet<ShiftType>;
}

export function shiftDayKey(shiftType: ShiftType, day: DayOfWeek | DayString): string {
  return `${shiftType}:${day}`;
}

export function buildConstraintProfile(employee: Employee): ConstraintProfile {
  const preferredOnDates = new Set<string>();
  const preferredOnWeekdays = new Set<string>();
  for (const preference of employee.preferences ?? []) {
    if ("date" in preference) {
      preferredOnDates.add(shiftDayKey(preference.shiftType, preference.date));
    } else {
      preferredOnWeekdays.add(shiftDayKey(preference.shiftType, preference.dayOfWeek));
    }
  }

  const allowedDates = employee.allowedDates ?? [];

  return {
    allowedDates: allowedDates.length > 0 ? new Set(allowedDates) : undefined,
    blockedDates: new Set(employee.blockedDates),
    availability: new Set(
      employee.availability.map((entry) => shiftDayKey(entry.shiftType, entry.dayOfWeek)),
    ),
    preferredOnDates,
    preferredOnWeekdays,
    avoidedShiftTypes: new Set(employee.avoidedShiftTypes ?? []),
  };
}

/**
 * Profiles for a roster, keyed by employee id. Built once per run from the
 * run's own snapshot.
 */
export function buildConstraintProfiles(
  employees: readonly Employee[],
): ReadonlyMap<string, ConstraintProfile> {
  return new Map(employees.map((employee) => [employee.id, buildConstraintProfile(employee)]));
}
