import { describe, expect, it } from "vitest";
import { ScheduleValidationError } from "../../src/errors.js";
import { parseScheduleInput } from "../../src/engine/validation.js";
import { MONDAY, daily, employeeInput, projectInput } from "./helpers.js";

const WINDOW = { start: MONDAY, end: "2025-03-09" };

function issuesOf(data: unknown) {
  try {
    parseScheduleInput(data);
  } catch (error) {
    if (error instanceof ScheduleValidationError) return error.issues;
    throw error;
  }
  throw new Error("expected a validation error");
}

describe("parseScheduleInput", () => {
  it("normalizes shift type aliases", () => {
    const input = parseScheduleInput({
      employees: [
        employeeInput("e1", { availability: [{ shiftType: "Evening", dayOfWeek: "monday" }] }),
      ],
      projects: [projectInput("site-a", [{ ...daily("morning"), shiftType: "overnight" }])],
      window: WINDOW,
    });

    expect(input.employees[0]?.availability).toEqual([
      { shiftType: "afternoon", dayOfWeek: "monday" },
    ]);
    expect(input.projects[0]?.requirements[0]?.shiftType).toBe("night");
  });

  it("rejects a headcount below one", () => {
    expect(
      issuesOf({
        employees: [],
        projects: [projectInput("site-a", [daily("morning", 0)])],
        window: WINDOW,
      }),
    ).toEqual([{ path: "projects.0.requirements.0.headcount", message: "Headcount must be at least 1" }]);
  });

  it("rejects a window ending before it starts", () => {
    expect(
      issuesOf({ employees: [], projects: [], window: { start: "2025-03-09", end: MONDAY } }),
    ).toEqual([{ path: "window.end", message: "Planning window end must not be before its start" }]);
  });

  it("rejects impossible dates", () => {
    expect(
      issuesOf({
        employees: [employeeInput("e1", { blockedDates: ["2025-02-30"] })],
        projects: [],
        window: WINDOW,
      }),
    ).toEqual([{ path: "employees.0.blockedDates.0", message: "Not a valid calendar date" }]);
  });

  it("rejects ids containing colons", () => {
    expect(
      issuesOf({ employees: [employeeInput("team:1")], projects: [], window: WINDOW }),
    ).toEqual([{ path: "employees.0.id", message: "Identifier cannot contain colons" }]);
  });

  it("rejects rates finer than minor units", () => {
    const issues = issuesOf({
      employees: [],
      projects: [projectInput("site-a", [], { hourlyRate: 12.345 })],
      window: WINDOW,
    });
    expect(issues.map((issue) => issue.path)).toEqual(["projects.0.hourlyRate"]);
  });

  it("accepts rates with two decimals", () => {
    expect(() =>
      parseScheduleInput({
        employees: [],
        projects: [projectInput("site-a", [], { hourlyRate: 12.34 })],
        window: WINDOW,
      }),
    ).not.toThrow();
  });

  it("reports duplicate ids and reversed date ranges together", () => {
    expect(
      issuesOf({
        employees: [employeeInput("e1"), employeeInput("e1")],
        projects: [
          projectInput("site-a", [
            {
              shiftType: "morning",
              recurrence: { type: "dateRange", start: "2025-03-05", end: "2025-03-04" },
              headcount: 1,
            },
          ]),
          projectInput("site-a", []),
        ],
        window: WINDOW,
      }),
    ).toEqual([
      { path: "employees.1.id", message: 'Duplicate employee id "e1"' },
      {
        path: "projects.0.requirements.0.recurrence.end",
        message: "Range ends (2025-03-04) before it starts (2025-03-05)",
      },
      { path: "projects.1.id", message: 'Duplicate project id "site-a"' },
    ]);
  });

  it("rejects existing assignments with unknown references", () => {
    expect(
      issuesOf({
        employees: [employeeInput("e1")],
        projects: [projectInput("site-a", [])],
        existingAssignments: [
          { employeeId: "e9", projectId: "site-z", date: MONDAY, shiftType: "morning", status: "assigned" },
        ],
        window: WINDOW,
      }),
    ).toEqual([
      { path: "existingAssignments.0.employeeId", message: 'Unknown employee "e9"' },
      { path: "existingAssignments.0.projectId", message: 'Unknown project "site-z"' },
    ]);
  });

  it("includes every issue in the error message", () => {
    expect(() =>
      parseScheduleInput({
        employees: [],
        projects: [projectInput("site-a", [daily("morning", 0)])],
        window: WINDOW,
      }),
    ).toThrow(
      "Invalid schedule input: projects.0.requirements.0.headcount: Headcount must be at least 1",
    );
  });
});
