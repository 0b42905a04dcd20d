import { writeFile } from "node:fs/promises";
import { formatTimestamp } from "./date-utils.js";
import type { Logger } from "./logger.js";
import type { ReservationRecord } from "../types.js";

type JsonPrimitive = string | number | boolean;

/**
 * Renders a field value for the JSON file. Primitives pass through; dates use
 * the report timestamp format and any other value its text form.
 */
export function toJsonValue(value: unknown): JsonPrimitive {
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  if (value instanceof Date) {
    return formatTimestamp(value);
  }
  return String(value);
}

/**
 * Serializes records as a JSON array with two-space indentation, in the given order.
 *
 * @example
 * ```typescript
 * serializeRecords([{ Type: "Savings Plan", Region: "us-east-1", SavingsPlanId: "sp-1" }]);
 * // [
 * //   {
 * //     "Type": "Savings Plan",
 * //     "Region": "us-east-1",
 * //     "SavingsPlanId": "sp-1"
 * //   }
 * // ]
 * ```
 */
export function serializeRecords(records: readonly ReservationRecord[]): string {
  const serializable = records.map((record) => {
    const fields: Record<string, JsonPrimitive> = {};
    for (const [key, value] of Object.entries(record)) {
      fields[key] = toJsonValue(value);
    }
    return fields;
  });

  return JSON.stringify(serializable, null, 2);
}

export interface SaveReportResult {
  saved: boolean;
  path: string;
  /** Failure message when `saved` is false */
  error?: string;
}

/**
 * Writes the records to a JSON file.
 *
 * Failures are logged and returned as `saved: false`; this function never rejects.
 *
 * @param records - Records in report order
 * @param path - Output file path
 * @param logger - Logger for write failures
 */
export async function saveReport(
  records: readonly ReservationRecord[],
  path: string,
  logger: Logger
): Promise<SaveReportResult> {
  try {
    await writeFile(path, serializeRecords(records), "utf8");
    return { saved: true, path };
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    logger.error("Failed to save report", err, { path, recordCount: records.length });
    return { saved: false, path, error: err.message };
  }
}
