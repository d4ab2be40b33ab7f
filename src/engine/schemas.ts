/**
 * Zod schemas for the snapshots a run consumes.
 *
 * These schemas define the contract between the engine and the collaborators
 * that load employees, projects and assignments. TypeScript types are derived
 * from them in types.ts so validation and types stay in sync.
 *
 * @see types.ts for the derived TypeScript types
 */

import * as z from "zod";
import { DayOfWeekSchema, DayStringSchema, PlanningWindowSchema } from "../types.js";
import { ShiftTypeSchema } from "./shift-types.js";

// --------------------------------------------------------------------------
// Identifiers
// --------------------------------------------------------------------------

// Slot keys are `projectId:date:shiftType`, so ids must not contain colons.
export const IdSchema = z
  .string()
  .min(1, "Identifier must not be empty")
  .refine((id) => !id.includes(":"), { message: "Identifier cannot contain colons" });

// --------------------------------------------------------------------------
// Employee schemas
// --------------------------------------------------------------------------

export const AvailabilityEntrySchema = z.object({
  shiftType: ShiftTypeSchema,
  dayOfWeek: DayOfWeekSchema,
});

export const DatePreferenceSchema = z.object({
  shiftType: ShiftTypeSchema,
  date: DayStringSchema,
});

export const WeekdayPreferenceSchema = z.object({
  shiftType: ShiftTypeSchema,
  dayOfWeek: DayOfWeekSchema,
});

export const PreferenceEntrySchema = z.union([DatePreferenceSchema, WeekdayPreferenceSchema]);

export const EmployeeSchema = z.object({
  id: IdSchema,
  name: z.string(),
  email: z.string().optional(),
  phone: z.string().optional(),
  isAdmin: z.boolean().optional(),
  active: z.boolean(),
  availability: z.array(AvailabilityEntrySchema),
  allowedDates: z.array(DayStringSchema).optional(),
  blockedDates: z.array(DayStringSchema),
  preferences: z.array(PreferenceEntrySchema).optional(),
  avoidedShiftTypes: z.array(ShiftTypeSchema).optional(),
});

// --------------------------------------------------------------------------
// Project schemas
// --------------------------------------------------------------------------

export const DailyRecurrenceSchema = z.object({
  type: z.literal("daily"),
});

export const WeeklyRecurrenceSchema = z.object({
  type: z.literal("weekly"),
  daysOfWeek: z.array(DayOfWeekSchema).min(1, "Weekly recurrence needs at least one day"),
});

export const DateRangeRecurrenceSchema = z.object({
  type: z.literal("dateRange"),
  start: DayStringSchema,
  end: DayStringSchema,
  daysOfWeek: z.array(DayOfWeekSchema).min(1).optional(),
});

export const RecurrenceRuleSchema = z.discriminatedUnion("type", [
  DailyRecurrenceSchema,
  WeeklyRecurrenceSchema,
  DateRangeRecurrenceSchema,
]);

export const ShiftRequirementSchema = z.object({
  shiftType: ShiftTypeSchema,
  recurrence: RecurrenceRuleSchema,
  headcount: z.number().int().min(1, "Headcount must be at least 1"),
});

const hasMinorUnitPrecision = (value: number) =>
  Math.abs(Math.round(value * 100) - value * 100) < 1e-6;

export const ProjectSchema = z.object({
  id: IdSchema,
  name: z.string(),
  hourlyRate: z
    .number()
    .nonnegative()
    .refine(hasMinorUnitPrecision, { message: "Hourly rate allows at most 2 decimal places" }),
  active: z.boolean(),
  requirements: z.array(ShiftRequirementSchema),
});

// --------------------------------------------------------------------------
// Assignment schemas
// --------------------------------------------------------------------------

export const AssignmentStatusSchema = z.enum(["assigned", "reported", "cancelled"]);

export const AssignmentSchema = z.object({
  employeeId: IdSchema,
  projectId: IdSchema,
  date: DayStringSchema,
  shiftType: ShiftTypeSchema,
  status: AssignmentStatusSchema,
});

// --------------------------------------------------------------------------
// Run input
// --------------------------------------------------------------------------

export const ScheduleInputSchema = z.object({
  employees: z.array(EmployeeSchema),
  projects: z.array(ProjectSchema),
  existingAssignments: z.array(AssignmentSchema).optional(),
  window: PlanningWindowSchema,
});
