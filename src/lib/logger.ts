/**
 * Structured logging module with JSON output.
 *
 * Log lines go to stderr so that stdout carries only the human-readable
 * report and can be redirected on its own.
 *
 * @module logger
 *
 * @example
 * ```typescript
 * const logger = createLogger({ component: "RegionEnumerator" });
 *
 * logger.info("Region listing failed, using fallback regions", { fallbackCount: 15 });
 * // stderr: {"timestamp":"2024-01-01T12:00:00.000Z","level":"INFO","component":"RegionEnumerator","message":"Region listing failed, using fallback regions","fallbackCount":15}
 *
 * logger.error("Failed to collect reservations", error, { region: "eu-west-1" });
 * ```
 *
 * Filtering with jq:
 * ```
 * aws-reservations-report 2> log.jsonl
 * jq 'select(.level == "ERROR") | {region, reservationType, error}' log.jsonl
 * ```
 */

/**
 * Log level enumeration.
 */
export type LogLevel = "INFO" | "WARN" | "ERROR";

/**
 * Context fields that persist across all log entries for a logger instance.
 */
export interface LogContext {
  /**
   * Component name (e.g., "ResourceCollector", "ReportWriter").
   */
  component: string;

  /**
   * Optional AWS account ID for correlation.
   */
  accountId?: string;

  /**
   * Optional region the component is working on.
   */
  region?: string;

  /**
   * Any additional context fields.
   */
  [key: string]: string | number | boolean | null | undefined;
}

/**
 * Additional fields to include in a specific log entry.
 */
export interface LogFields {
  [key: string]: string | number | boolean | null | undefined | Error;
}

/**
 * Context fields added by {@link Logger.child}. The component is inherited
 * unless a string `component` is given.
 */
export type ChildContext = Record<string, string | number | boolean | null | undefined>;

/**
 * Structured log entry format.
 */
export interface LogEntry extends LogContext {
  timestamp: string;
  level: LogLevel;
  message: string;
  error?: string;
  errorStack?: string;
}

/**
 * Destination for serialized log lines.
 */
export type LogSink = (line: string) => void;

/**
 * Logger interface with context-aware logging methods.
 */
export interface Logger {
  /**
   * Log an informational message with optional additional fields.
   */
  info(message: string, fields?: LogFields): void;

  /**
   * Log a warning message with optional additional fields.
   */
  warn(message: string, fields?: LogFields): void;

  /**
   * Log an error message with optional Error object and additional fields.
   * The error's message and stack are copied into the entry.
   *
   * @example
   * ```typescript
   * try {
   *   await saveReport(records, path);
   * } catch (error) {
   *   logger.error("Failed to save report", error instanceof Error ? error : undefined, { path });
   * }
   * ```
   */
  error(message: string, error?: Error, fields?: LogFields): void;

  /**
   * Returns a logger that adds the given fields to this logger's context.
   */
  child(fields: ChildContext): Logger;
}

function writeToStderr(line: string): void {
  console.error(line);
}

/**
 * Creates a logger instance with persistent context fields.
 *
 * @param context - Context fields to include in all log entries
 * @param sink - Where serialized entries are written (stderr by default)
 *
 * @example
 * ```typescript
 * const logger = createLogger({ component: "ReservationsReport", accountId: "123456789012" });
 * const regionLogger = logger.child({ region: "eu-west-1" });
 * ```
 */
export function createLogger(
  context: LogContext,
  sink: LogSink = writeToStderr
): Logger {
  const write = (level: LogLevel, message: string, fields?: LogFields, error?: Error) => {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      ...context,
      message,
      ...extractFields(fields),
    };

    if (error) {
      entry.error = error.message;
      if (error.stack) {
        entry.errorStack = error.stack;
      }
    }

    sink(JSON.stringify(entry));
  };

  return {
    info(message: string, fields?: LogFields): void {
      write("INFO", message, fields);
    },

    warn(message: string, fields?: LogFields): void {
      write("WARN", message, fields);
    },

    error(message: string, error?: Error, fields?: LogFields): void {
      write("ERROR", message, fields, error);
    },

    child(extra: ChildContext): Logger {
      const component =
        typeof extra.component === "string" ? extra.component : context.component;
      return createLogger({ ...context, ...extra, component }, sink);
    },
  };
}

/**
 * Converts Error values to their message and drops undefined values.
 */
function extractFields(
  fields?: LogFields
): Record<string, string | number | boolean | null> {
  if (!fields) {
    return {};
  }

  const sanitized: Record<string, string | number | boolean | null> = {};

  for (const [key, value] of Object.entries(fields)) {
    if (value === undefined) {
      continue;
    }

    if (value instanceof Error) {
      sanitized[key] = value.message;
    } else {
      sanitized[key] = value;
    }
  }

  return sanitized;
}
