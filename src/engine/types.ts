/**
 * Roster and plan types.
 *
 * Snapshot types are derived from the Zod schemas. `*Input` types are what
 * callers pass (shift type aliases allowed); the plain names are the
 * normalized values the engine works with.
 *
 * @see schemas.ts for the source Zod schemas
 */

import type { z } from "zod";
import type { DayString, PlanningWindow } from "../types.js";
import type {
  AssignmentSchema,
  AssignmentStatusSchema,
  AvailabilityEntrySchema,
  EmployeeSchema,
  PreferenceEntrySchema,
  ProjectSchema,
  RecurrenceRuleSchema,
  ScheduleInputSchema,
  ShiftRequirementSchema,
} from "./schemas.js";
import type { ShiftType, TimeWindow } from "./shift-types.js";

// --------------------------------------------------------------------------
// Snapshot types derived from Zod schemas
// --------------------------------------------------------------------------

/** An allowed (shift type, weekday) pair. */
export type AvailabilityEntry = z.output<typeof AvailabilityEntrySchema>;

/** A soft preference for a shift type on a date or on a weekday. */
export type PreferenceEntry = z.output<typeof PreferenceEntrySchema>;

/**
 * An employee as the engine sees it.
 *
 * - `availability`: the only (shift type, weekday) pairs the employee may work
 * - `allowedDates`: when non-empty, the only dates the employee may work
 * - `blockedDates`: dates the employee never works, whatever else says
 * - `preferences` / `avoidedShiftTypes`: ranking signals only
 */
export type Employee = z.output<typeof EmployeeSchema>;
export type EmployeeInput = z.input<typeof EmployeeSchema>;

/**
 * Which dates a requirement applies to.
 *
 * - `daily`: every date of the planning window
 * - `weekly`: dates falling on `daysOfWeek`
 * - `dateRange`: dates within `[start, end]`, optionally only on `daysOfWeek`
 */
export type RecurrenceRule = z.output<typeof RecurrenceRuleSchema>;

export type ShiftRequirement = z.output<typeof ShiftRequirementSchema>;
export type ShiftRequirementInput = z.input<typeof ShiftRequirementSchema>;

export type Project = z.output<typeof ProjectSchema>;
export type ProjectInput = z.input<typeof ProjectSchema>;

/**
 * `assigned` comes from the engine, `reported` from an employee's own report;
 * `cancelled` assignments hold no time and cost nothing.
 */
export type AssignmentStatus = z.output<typeof AssignmentStatusSchema>;

export type Assignment = z.output<typeof AssignmentSchema>;
export type AssignmentInput = z.input<typeof AssignmentSchema>;

export type ScheduleInput = z.output<typeof ScheduleInputSchema>;
export type ScheduleInputData = z.input<typeof ScheduleInputSchema>;

// --------------------------------------------------------------------------
// Engine-derived types
// --------------------------------------------------------------------------

/**
 * A concrete unit of required coverage: one project, one date, one shift type.
 *
 * `key` is `projectId:date:shiftType`. `start`/`end` are the absolute window
 * (see {@link TimeWindow}).
 */
export interface ShiftSlot extends TimeWindow {
  readonly key: string;
  readonly projectId: string;
  readonly date: DayString;
  readonly shiftType: ShiftType;
  readonly requiredCount: number;
  readonly durationMinutes: number;
}

/** A slot that could not be fully staffed. */
export interface UnfilledSlot {
  readonly projectId: string;
  readonly date: DayString;
  readonly shiftType: ShiftType;
  readonly shortfall: number;
}

/**
 * Per-slot accounting. `preexisting + assigned + shortfall === requiredCount`
 * unless the snapshot already over-covers the slot.
 */
export interface SlotCoverage {
  readonly key: string;
  readonly projectId: string;
  readonly date: DayString;
  readonly shiftType: ShiftType;
  readonly requiredCount: number;
  /** Non-cancelled assignments for this slot found in the input snapshot. */
  readonly preexisting: number;
  /** Assignments created by this run. */
  readonly assigned: number;
  readonly shortfall: number;
}

/**
 * Engine output for one run.
 *
 * @category Engine
 */
export interface CoveragePlan {
  readonly window: PlanningWindow;
  /** Duration of each shift type in the windows the plan was built with. */
  readonly shiftMinutes: Readonly<Record<ShiftType, number>>;
  /** New assignments in slot order, then rank order within a slot. */
  readonly assignments: readonly Assignment[];
  readonly unfilled: readonly UnfilledSlot[];
  readonly slots: readonly SlotCoverage[];
}
