import type { DayString, PlanningWindow } from "../types.js";
import type { ShiftType, TimeWindow } from "./shift-types.js";

/**
 * A shift an employee holds during a run, either from the input snapshot
 * or created by the run itself.
 */
export interface HeldShift extends TimeWindow {
  readonly employeeId: string;
  readonly projectId: string;
  readonly date: DayString;
  readonly shiftType: ShiftType;
  readonly durationMinutes: number;
  readonly source: "existing" | "run";
}

/**
 * Read-only view of a run's accumulated state, handed to rules.
 */
export interface RunStateView {
  /** Non-cancelled shifts the employee holds, in the order they were recorded. */
  heldShifts(employeeId: string): readonly HeldShift[];
  /** Minutes held inside the planning window; the load-balancing measure. */
  loadMinutes(employeeId: string): number;
  /** Minutes held on dates within `[from, to]`, whether or not inside the window. */
  minutesBetween(employeeId: string, from: DayString, to: DayString): number;
  /** Non-cancelled assignments recorded against a slot key. */
  coverageOf(slotKey: string): number;
}

/**
 * Mutable accumulator for one run. Created fresh per run and never shared,
 * so concurrent runs over the same snapshot cannot see each other.
 */
export class RunState implements RunStateView {
  readonly window: PlanningWindow;

  #held = new Map<string, HeldShift[]>();
  #load = new Map<string, number>();
  #minutesByDay = new Map<string, Map<DayString, number>>();
  #coverage = new Map<string, number>();

  constructor(window: PlanningWindow) {
    this.window = window;
  }

  record(shift: HeldShift, slotKey: string): void {
    const held = this.#held.get(shift.employeeId);
    if (held) {
      held.push(shift);
    } else {
      this.#held.set(shift.employeeId, [shift]);
    }

    if (shift.date >= this.window.start && shift.date <= this.window.end) {
      this.#load.set(
        shift.employeeId,
        (this.#load.get(shift.employeeId) ?? 0) + shift.durationMinutes,
      );
    }

    let byDay = this.#minutesByDay.get(shift.employeeId);
    if (!byDay) {
      byDay = new Map();
      this.#minutesByDay.set(shift.employeeId, byDay);
    }
    byDay.set(shift.date, (byDay.get(shift.date) ?? 0) + shift.durationMinutes);

    this.#coverage.set(slotKey, (this.#coverage.get(slotKey) ?? 0) + 1);
  }

  heldShifts(employeeId: string): readonly HeldShift[] {
    return this.#held.get(employeeId) ?? [];
  }

  loadMinutes(employeeId: string): number {
    return this.#load.get(employeeId) ?? 0;
  }

  minutesBetween(employeeId: string, from: DayString, to: DayString): number {
    const byDay = this.#minutesByDay.get(employeeId);
    if (!byDay) return 0;
    let total = 0;
    for (const [day, minutes] of byDay) {
      if (day >= from && day <= to) total += minutes;
    }
    return total;
  }

  coverageOf(slotKey: string): number {
    return this.#coverage.get(slotKey) ?? 0;
  }
}
