/**
 * Input validation utilities for AWS API response data.
 *
 * Reservation descriptions and other free-text attributes are account
 * controlled and end up on the operator's terminal. These utilities remove:
 * - ANSI escape sequences that would recolor or move the cursor
 * - control characters that would break the one-field-per-line listing
 */

/**
 * Maximum length for a single text field in the report.
 * ARNs can be up to 2048 characters per AWS documentation.
 */
const MAX_TEXT_LENGTH = 2048;

const TRUNCATION_SUFFIX = "...[truncated]";

/**
 * AWS region identifier pattern (us-east-1, us-gov-west-1, ap-southeast-4).
 */
const AWS_REGION_REGEX = /^[a-z]{2}(-[a-z]+)+-\d+$/;

/**
 * C0 and C1 control characters, including tab, newline and stray escapes.
 */
const CONTROL_CHAR_REGEX = /[\x00-\x1F\x7F-\x9F]/g;

/**
 * ANSI escape sequences (SGR colors, cursor movement and other VT100 sequences).
 * Applied before the control character pass so multi-byte sequences are removed whole.
 */
const ANSI_ESCAPE_REGEX = /\x1B(?:[@-Z\\-_]|\[[0-?]*[ -/]*[@-~])/g;

/**
 * Removes ANSI escapes and control characters from a text value and caps its length.
 *
 * @param raw - Text from an AWS API response (untrusted)
 * @returns Text safe to print on one console line
 *
 * @example
 * ```typescript
 * sanitizeText("web\u001b[31m tier\n"); // "web tier"
 * ```
 */
export function sanitizeText(raw: string): string {
  let sanitized = raw.replace(ANSI_ESCAPE_REGEX, "");
  sanitized = sanitized.replace(CONTROL_CHAR_REGEX, "");

  if (sanitized.length > MAX_TEXT_LENGTH) {
    return (
      sanitized.substring(0, MAX_TEXT_LENGTH - TRUNCATION_SUFFIX.length) +
      TRUNCATION_SUFFIX
    );
  }

  return sanitized;
}

/**
 * Checks that a value looks like an AWS region identifier.
 *
 * @param value - Candidate region name
 * @returns True for names such as "eu-west-1" or "us-gov-east-1"
 */
export function isValidRegionName(value: string): boolean {
  return AWS_REGION_REGEX.test(value);
}
