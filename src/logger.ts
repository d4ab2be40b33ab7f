/**
 * Structured JSON-line logging.
 *
 * Every record is a flat object with a timestamp, a level and an `event`
 * name; undefined fields are dropped before serializing.
 *
 * @example
 * ```typescript
 * const logger = createJsonLogger({ level: "warn" });
 * logger.warn({ event: "slot.shortfall", slot: "site-a:2025-03-03:night", shortfall: 1 });
 * // {"ts":"2025-03-01T09:00:00.000Z","level":"warn","event":"slot.shortfall",...}
 * ```
 *
 * @module
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFields = {
  event: string;
  run_id?: string | null;
  slot?: string | null;
  employee_id?: string | null;
  project_id?: string | null;
  [key: string]: unknown;
};

export interface LogRecord extends LogFields {
  ts: string;
  level: LogLevel;
}

export interface Logger {
  debug(fields: LogFields): void;
  info(fields: LogFields): void;
  warn(fields: LogFields): void;
  error(fields: LogFields): void;
}

export interface JsonLoggerOptions {
  /** Records below this level are dropped. @default "info" */
  level?: LogLevel;
  /** Receives each serialized line. Defaults to the matching `console` method. */
  write?: (line: string, level: LogLevel) => void;
  /** Clock used for `ts`. */
  now?: () => Date;
}

const LEVEL_ORDER = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
} as const satisfies Record<LogLevel, number>;

function compactFields(fields: LogFields): Record<string, unknown> {
  return Object.fromEntries(Object.entries(fields).filter(([, value]) => value !== undefined));
}

function writeToConsole(line: string, level: LogLevel): void {
  if (level === "error") {
    console.error(line);
    return;
  }
  if (level === "warn") {
    console.warn(line);
    return;
  }
  if (level === "debug") {
    console.debug(line);
    return;
  }
  console.info(line);
}

export function createJsonLogger(options: JsonLoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? "info"];
  const write = options.write ?? writeToConsole;
  const now = options.now ?? (() => new Date());

  const log = (level: LogLevel, fields: LogFields) => {
    if (LEVEL_ORDER[level] < threshold) return;
    const payload = {
      ts: now().toISOString(),
      level,
      ...compactFields(fields),
    };
    write(JSON.stringify(payload), level);
  };

  return {
    debug: (fields) => log("debug", fields),
    info: (fields) => log("info", fields),
    warn: (fields) => log("warn", fields),
    error: (fields) => log("error", fields),
  };
}

/** Logger that discards everything; the engine default. */
export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
