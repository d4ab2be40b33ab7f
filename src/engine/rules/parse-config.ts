import type * as z from "zod";
import { ScheduleValidationError } from "../../errors.js";

/**
 * Parses a rule config, reporting problems under `ruleConfigs.<name>`.
 */
export function parseRuleConfig<T extends z.ZodType>(
  name: string,
  schema: T,
  config: unknown,
): z.output<T> {
  const result = schema.safeParse(config);
  if (!result.success) {
    throw ScheduleValidationError.fromZod(`Invalid config for rule "${name}"`, result.error, [
      "ruleConfigs",
      name,
    ]);
  }
  return result.data;
}
