import * as z from "zod";
import { ScheduleValidationError } from "../errors.js";
import type { Logger } from "../logger.js";
import { silentLogger } from "../logger.js";
import { DayOfWeekSchema, type DayOfWeek } from "../types.js";
import { buildSoftRules, MANDATORY_RULES } from "./rules/registry.js";
import type { AssignmentRule, HardRule, RuleConfigEntry, SoftRule } from "./rules/rules.types.js";
import { SHIFT_TYPES, ShiftCatalog, ShiftWindowSchema, type ShiftWindowOverrides } from "./shift-types.js";

const RuleConfigEntrySchema = z.looseObject({
  name: z.enum(["preferred-shifts", "weekly-hours-cap", "avoided-shifts"]),
});

const EngineSettingsSchema = z.object({
  shiftWindows: z.partialRecord(z.enum(SHIFT_TYPES), ShiftWindowSchema).optional(),
  weekStartsOn: DayOfWeekSchema.optional(),
  ruleConfigs: z.array(RuleConfigEntrySchema).optional(),
  runId: z.string().min(1).optional(),
});

/**
 * Options for {@link ScheduleEngine}.
 *
 * - `shiftWindows`: replaces the default window of some shift types
 * - `weekStartsOn`: first day of the week for the weekly hours cap; defaults to monday.
 *   A `weekStartsOn` in the `weekly-hours-cap` rule config takes precedence.
 * - `ruleConfigs`: reconfigures built-in soft rules by name
 * - `rules`: extra rules appended after the built-in ones
 * - `logger`: receives run events; silent by default
 * - `runId`: tags every log record of the run
 *
 * @category Engine
 */
export interface EngineOptions {
  shiftWindows?: ShiftWindowOverrides;
  weekStartsOn?: DayOfWeek;
  ruleConfigs?: RuleConfigEntry[];
  rules?: AssignmentRule[];
  logger?: Logger;
  runId?: string;
}

export interface ResolvedEngineOptions {
  readonly catalog: ShiftCatalog;
  readonly hardRules: readonly HardRule[];
  readonly softRules: readonly SoftRule[];
  readonly logger: Logger;
  readonly runId: string | undefined;
}

function withWeekStart(
  entries: readonly RuleConfigEntry[],
  weekStartsOn: DayOfWeek | undefined,
): RuleConfigEntry[] {
  if (!weekStartsOn) return [...entries];
  const capEntry = entries.find((entry) => entry.name === "weekly-hours-cap");
  if (!capEntry) return [...entries, { name: "weekly-hours-cap", weekStartsOn }];
  return entries.map((entry) =>
    entry.name === "weekly-hours-cap"
      ? { ...entry, weekStartsOn: entry.weekStartsOn ?? weekStartsOn }
      : entry,
  );
}

/**
 * Validates options and fills in defaults.
 *
 * @throws {ScheduleValidationError} for malformed options, shift windows
 * outside (0, 16] hours, or invalid rule configs
 */
export function resolveEngineOptions(options: EngineOptions = {}): ResolvedEngineOptions {
  const result = EngineSettingsSchema.safeParse(options);
  if (!result.success) {
    throw ScheduleValidationError.fromZod("Invalid engine options", result.error);
  }

  const ruleConfigs = withWeekStart(options.ruleConfigs ?? [], options.weekStartsOn);
  const extraRules = options.rules ?? [];

  return {
    catalog: new ShiftCatalog(options.shiftWindows),
    hardRules: [
      ...MANDATORY_RULES,
      ...extraRules.filter((rule): rule is HardRule => rule.kind === "hard"),
    ],
    softRules: [
      ...buildSoftRules(ruleConfigs),
      ...extraRules.filter((rule): rule is SoftRule => rule.kind === "soft"),
    ],
    logger: options.logger ?? silentLogger,
    runId: options.runId,
  };
}
