import { createJsonLogger, type Logger } from "../../src/logger.js";
import { EmployeeSchema, ProjectSchema } from "../../src/engine/schemas.js";
import type { RunState } from "../../src/engine/run-state.js";
import { DEFAULT_SHIFT_CATALOG, type ShiftType } from "../../src/engine/shift-types.js";
import type {
  Employee,
  EmployeeInput,
  Project,
  ProjectInput,
  ShiftRequirementInput,
  ShiftSlot,
} from "../../src/engine/types.js";
import type { DayOfWeek } from "../../src/types.js";

/** Monday, March 3, 2025. */
export const MONDAY = "2025-03-03";

export const WEEKDAYS = [
  "monday",
  "tuesday",
  "wednesday",
  "thursday",
  "friday",
] as const satisfies readonly DayOfWeek[];

export const ALL_DAYS = [
  ...WEEKDAYS,
  "saturday",
  "sunday",
] as const satisfies readonly DayOfWeek[];

export function availableFor(
  shiftTypes: readonly ShiftType[],
  days: readonly DayOfWeek[] = ALL_DAYS,
): EmployeeInput["availability"] {
  return shiftTypes.flatMap((shiftType) => days.map((dayOfWeek) => ({ shiftType, dayOfWeek })));
}

export function employeeInput(id: string, overrides: Partial<EmployeeInput> = {}): EmployeeInput {
  return {
    id,
    name: id,
    active: true,
    availability: availableFor(["morning", "afternoon", "night"]),
    blockedDates: [],
    ...overrides,
  };
}

export function employee(id: string, overrides: Partial<EmployeeInput> = {}): Employee {
  return EmployeeSchema.parse(employeeInput(id, overrides));
}

export function daily(shiftType: ShiftType, headcount = 1): ShiftRequirementInput {
  return { shiftType, recurrence: { type: "daily" }, headcount };
}

export function weekly(
  shiftType: ShiftType,
  daysOfWeek: DayOfWeek[],
  headcount = 1,
): ShiftRequirementInput {
  return { shiftType, recurrence: { type: "weekly", daysOfWeek }, headcount };
}

export function projectInput(
  id: string,
  requirements: ShiftRequirementInput[],
  overrides: Partial<ProjectInput> = {},
): ProjectInput {
  return { id, name: id, hourlyRate: 20, active: true, requirements, ...overrides };
}

export function project(
  id: string,
  requirements: ShiftRequirementInput[],
  overrides: Partial<ProjectInput> = {},
): Project {
  return ProjectSchema.parse(projectInput(id, requirements, overrides));
}

/** Logger that keeps parsed records in memory. */
export function recordingLogger(): { logger: Logger; records: Record<string, unknown>[] } {
  const records: Record<string, unknown>[] = [];
  const logger = createJsonLogger({
    level: "debug",
    write: (line) => {
      const parsed: unknown = JSON.parse(line);
      if (typeof parsed === "object" && parsed !== null) {
        records.push({ ...parsed });
      }
    },
  });
  return { logger, records };
}

export function slotOn(
  date: string,
  shiftType: ShiftType,
  projectId = "site-a",
  requiredCount = 1,
): ShiftSlot {
  return {
    key: `${projectId}:${date}:${shiftType}`,
    projectId,
    date,
    shiftType,
    requiredCount,
    durationMinutes: DEFAULT_SHIFT_CATALOG.durationMinutes(shiftType),
    ...DEFAULT_SHIFT_CATALOG.windowOn(date, shiftType),
  };
}

/** Records a shift the employee already holds, as a seeded assignment would. */
export function hold(
  state: RunState,
  employeeId: string,
  date: string,
  shiftType: ShiftType,
  projectId = "site-a",
): void {
  const slot = slotOn(date, shiftType, projectId);
  state.record(
    {
      employeeId,
      projectId,
      date,
      shiftType,
      start: slot.start,
      end: slot.end,
      durationMinutes: slot.durationMinutes,
      source: "existing",
    },
    slot.key,
  );
}
