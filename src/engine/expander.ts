import { intersectWindows, resolveDaysFromWindow } from "../datetime.utils.js";
import type { DayString, PlanningWindow } from "../types.js";
import { compareShiftTypes, DEFAULT_SHIFT_CATALOG, type ShiftCatalog } from "./shift-types.js";
import type { Project, RecurrenceRule, ShiftSlot } from "./types.js";

/**
 * Dates of `window` a recurrence applies to, in ascending order.
 */
export function recurrenceDays(recurrence: RecurrenceRule, window: PlanningWindow): DayString[] {
  switch (recurrence.type) {
    case "daily":
      return resolveDaysFromWindow(window);
    case "weekly":
      return resolveDaysFromWindow(window, recurrence.daysOfWeek);
    case "dateRange": {
      const range = intersectWindows(window, { start: recurrence.start, end: recurrence.end });
      return range ? resolveDaysFromWindow(range, recurrence.daysOfWeek) : [];
    }
  }
}

/** Orders slots by date, then shift type, then project id. */
export function compareSlots(a: ShiftSlot, b: ShiftSlot): number {
  if (a.date !== b.date) return a.date < b.date ? -1 : 1;
  const byShift = compareShiftTypes(a.shiftType, b.shiftType);
  if (byShift !== 0) return byShift;
  if (a.projectId === b.projectId) return 0;
  return a.projectId < b.projectId ? -1 : 1;
}

export function slotKey(projectId: string, date: DayString, shiftType: string): string {
  return `${projectId}:${date}:${shiftType}`;
}

/**
 * Turns the recurring requirements of active projects into concrete slots
 * for `window`.
 *
 * Requirements of one project that land on the same date and shift type are
 * merged into a single slot whose headcount is their sum.
 *
 * @example
 * ```typescript
 * const slots = expandRequirements(projects, { start: "2025-03-03", end: "2025-03-09" });
 * slots[0].key; // "site-a:2025-03-03:morning"
 * ```
 */
export function expandRequirements(
  projects: readonly Project[],
  window: PlanningWindow,
  catalog: ShiftCatalog = DEFAULT_SHIFT_CATALOG,
): ShiftSlot[] {
  const slots = new Map<string, ShiftSlot>();

  for (const project of projects) {
    if (!project.active) continue;
    for (const requirement of project.requirements) {
      for (const date of recurrenceDays(requirement.recurrence, window)) {
        const key = slotKey(project.id, date, requirement.shiftType);
        const existing = slots.get(key);
        if (existing) {
          slots.set(key, {
            ...existing,
            requiredCount: existing.requiredCount + requirement.headcount,
          });
          continue;
        }
        slots.set(key, {
          key,
          projectId: project.id,
          date,
          shiftType: requirement.shiftType,
          requiredCount: requirement.headcount,
          durationMinutes: catalog.durationMinutes(requirement.shiftType),
          ...catalog.windowOn(date, requirement.shiftType),
        });
      }
    }
  }

  return [...slots.values()].sort(compareSlots);
}
