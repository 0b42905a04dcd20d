/**
 * Text written for a date field the provider did not return.
 */
export const MISSING_DATE = "N/A";

/**
 * Formats a reservation timestamp for the report.
 *
 * - `Date` values are rendered in UTC as `YYYY-MM-DD HH:MM:SS UTC`
 * - strings pass through unchanged (Savings Plans already return text)
 * - missing values and invalid dates render as `N/A`
 *
 * @param value - Timestamp from an AWS API response
 * @returns Formatted timestamp text
 *
 * @example
 * ```typescript
 * formatTimestamp(new Date("2024-03-01T08:15:00Z")); // "2024-03-01 08:15:00 UTC"
 * formatTimestamp("2024-03-01T08:15:00.000Z");       // "2024-03-01T08:15:00.000Z"
 * formatTimestamp(undefined);                         // "N/A"
 * ```
 */
export function formatTimestamp(value: Date | string | undefined): string {
  if (typeof value === "string") {
    return value === "" ? MISSING_DATE : value;
  }

  if (!value || isNaN(value.getTime())) {
    return MISSING_DATE;
  }

  return `${formatDateString(value)} ${pad(value.getUTCHours())}:${pad(
    value.getUTCMinutes()
  )}:${pad(value.getUTCSeconds())} UTC`;
}

/**
 * Formats a Date object to YYYY-MM-DD string in UTC.
 *
 * @param date - Date to format
 * @returns Date string in YYYY-MM-DD format
 */
export function formatDateString(date: Date): string {
  const year = date.getUTCFullYear();
  const month = pad(date.getUTCMonth() + 1);
  const day = pad(date.getUTCDate());
  return `${year}-${month}-${day}`;
}

/**
 * Formats the report generation time in the host's local time zone as
 * `YYYY-MM-DD HH:MM:SS`.
 */
export function formatLocalDateTime(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}
