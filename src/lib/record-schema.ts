import { formatTimestamp } from "./date-utils.js";
import type { FieldValue, ReservationRecord, ReservationType } from "../types.js";

/**
 * Text written for an optional field the provider did not return.
 */
export const NOT_AVAILABLE = "N/A";

/**
 * How a field is rendered and what it defaults to when missing.
 *
 * | kind     | present                         | missing |
 * |----------|---------------------------------|---------|
 * | text     | verbatim                        | N/A     |
 * | money    | verbatim                        | 0       |
 * | count    | verbatim                        | 0       |
 * | flag     | verbatim                        | N/A     |
 * | date     | YYYY-MM-DD HH:MM:SS UTC         | N/A     |
 * | duration | "<n> seconds"                   | N/A     |
 */
export type FieldKind = "text" | "money" | "count" | "flag" | "date" | "duration";

/**
 * Raw value read from a provider item before normalization.
 */
export type RawFieldValue = string | number | boolean | Date | null | undefined;

/**
 * One output field of a reservation category.
 */
export interface FieldSpec<TItem> {
  /** Field name in the normalized record */
  name: string;
  kind: FieldKind;
  /** Reads the provider-native value from an item */
  read: (item: TItem) => RawFieldValue;
  /** Replaces the kind's default for a missing value */
  fallback?: FieldValue;
}

const KIND_DEFAULTS: Record<FieldKind, FieldValue> = {
  text: NOT_AVAILABLE,
  money: 0,
  count: 0,
  flag: NOT_AVAILABLE,
  date: NOT_AVAILABLE,
  duration: NOT_AVAILABLE,
};

/**
 * Normalizes a single raw value according to its field kind.
 *
 * @example
 * ```typescript
 * normalizeValue("duration", 31536000);    // "31536000 seconds"
 * normalizeValue("money", undefined);      // 0
 * normalizeValue("date", undefined);       // "N/A"
 * normalizeValue("text", undefined, "USD") // "USD"
 * ```
 */
export function normalizeValue(
  kind: FieldKind,
  raw: RawFieldValue,
  fallback: FieldValue = KIND_DEFAULTS[kind]
): FieldValue {
  if (kind === "date") {
    if (raw instanceof Date || typeof raw === "string") {
      return formatTimestamp(raw);
    }
    return fallback;
  }

  if (raw === undefined || raw === null || raw instanceof Date) {
    return fallback;
  }

  switch (kind) {
    case "duration":
      return `${String(raw)} seconds`;
    case "text":
    case "money":
    case "count":
    case "flag":
      return raw;
  }
}

/**
 * Builds a frozen reservation record from a provider item.
 *
 * `Type` and `Region` come first, followed by the schema fields in schema order.
 *
 * @param type - Record discriminant
 * @param region - Region the item was listed in
 * @param item - Provider-native item
 * @param fields - Field schema of the category
 */
export function normalizeRecord<TItem>(
  type: ReservationType,
  region: string,
  item: TItem,
  fields: readonly FieldSpec<TItem>[]
): ReservationRecord {
  const values: Record<string, FieldValue> = {};

  for (const field of fields) {
    values[field.name] = normalizeValue(field.kind, field.read(item), field.fallback);
  }

  return Object.freeze({ Type: type, Region: region, ...values });
}
