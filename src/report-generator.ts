import { formatLocalDateTime } from "./lib/date-utils.js";
import { sanitizeText } from "./lib/validation-utils.js";
import {
  RESERVATION_TYPES,
  type CollectionIssue,
  type RegionCount,
  type ReservationRecord,
  type ReservationType,
  type TypeSummary,
} from "./types.js";

export const REPORT_TITLE = "AWS Reserved Instances and Savings Plans Report";

export const NO_RESERVATIONS_MESSAGE =
  "No Reserved Instances or Savings Plans found in this account.";

const SECTION_RULE = "=".repeat(80);
const RECORD_RULE = "-".repeat(40);

/**
 * Labels for the summary counts, in report order.
 */
const SUMMARY_LABELS: Record<ReservationType, string> = {
  "EC2 Reserved Instance": "EC2 Reserved Instances",
  "RDS Reserved Instance": "RDS Reserved Instances",
  "Savings Plan": "Savings Plans",
};

/**
 * Collected data the post-scan sections are rendered from.
 */
export interface ReservationsReport {
  records: readonly ReservationRecord[];
  /** Listed only when `showIssues` is set */
  issues?: readonly CollectionIssue[];
  showIssues?: boolean;
}

/**
 * Counts records per region for regions with at least one record, sorted by region id.
 */
export function buildRegionIndex(records: readonly ReservationRecord[]): RegionCount[] {
  const counts = new Map<string, number>();

  for (const record of records) {
    counts.set(record.Region, (counts.get(record.Region) ?? 0) + 1);
  }

  return Array.from(counts.entries())
    .map(([region, count]) => ({ region, count }))
    .sort((a, b) => (a.region < b.region ? -1 : a.region > b.region ? 1 : 0));
}

/**
 * Counts records per reservation type. The counts always sum to `total`.
 */
export function summarizeByType(records: readonly ReservationRecord[]): TypeSummary {
  const counts: Record<ReservationType, number> = {
    "EC2 Reserved Instance": 0,
    "RDS Reserved Instance": 0,
    "Savings Plan": 0,
  };

  for (const record of records) {
    counts[record.Type] += 1;
  }

  return { counts, total: records.length };
}

/**
 * Renders the report header printed before the region scan.
 */
export function renderHeader(accountId: string, generatedAt: Date): string[] {
  return [
    REPORT_TITLE,
    "=".repeat(50),
    `Account ID: ${accountId}`,
    `Generated: ${formatLocalDateTime(generatedAt)}`,
  ];
}

export function renderRegionIndex(regionIndex: readonly RegionCount[]): string[] {
  const lines = ["", SECTION_RULE, "REGIONS WITH RESERVATIONS", SECTION_RULE];

  if (regionIndex.length === 0) {
    lines.push("No regions found with reservations");
    return lines;
  }

  for (const { region, count } of regionIndex) {
    lines.push(`  ${region}: ${count} reservations`);
  }

  return lines;
}

export function renderSummary(summary: TypeSummary): string[] {
  const lines = ["", SECTION_RULE, "SUMMARY", SECTION_RULE];

  for (const type of RESERVATION_TYPES) {
    lines.push(`${SUMMARY_LABELS[type]}: ${summary.counts[type]}`);
  }
  lines.push(`Total Reservations: ${summary.total}`);

  return lines;
}

/**
 * Renders every record under its type label, one `Key: value` line per field.
 * `Type` is the label and is not repeated as a field. Text values have control
 * characters and ANSI escapes stripped.
 */
export function renderDetails(records: readonly ReservationRecord[]): string[] {
  if (records.length === 0) {
    return [NO_RESERVATIONS_MESSAGE];
  }

  const lines = ["", SECTION_RULE, "DETAILED REPORT", SECTION_RULE];

  for (const record of records) {
    lines.push("", `${record.Type}:`, RECORD_RULE);
    for (const [key, value] of Object.entries(record)) {
      if (key !== "Type") {
        const text = typeof value === "string" ? sanitizeText(value) : String(value);
        lines.push(`  ${key}: ${text}`);
      }
    }
  }

  return lines;
}

/**
 * Lists collection failures, keeping access denials apart from other errors.
 */
export function renderIssues(issues: readonly CollectionIssue[]): string[] {
  const lines = ["", SECTION_RULE, "COLLECTION ISSUES", SECTION_RULE];

  if (issues.length === 0) {
    lines.push("No collection issues");
    return lines;
  }

  const denied = issues.filter((issue) => issue.kind === "access-denied");
  const failed = issues.filter((issue) => issue.kind === "error");

  lines.push(`Access denied: ${denied.length}`);
  for (const issue of denied) {
    lines.push(`  ${issue.region} ${issue.type}: ${issue.code}`);
  }
  lines.push(`Errors: ${failed.length}`);
  for (const issue of failed) {
    lines.push(`  ${issue.region} ${issue.type}: ${issue.code}: ${issue.message}`);
  }

  return lines;
}

/**
 * Renders the sections printed after the region scan: region index, summary,
 * optional collection issues and the detailed listing.
 *
 * @example
 * ```typescript
 * const text = generateTextReport({ records, issues, showIssues: true });
 * console.log(text);
 * ```
 */
export function generateTextReport(report: ReservationsReport): string {
  const lines = [
    ...renderRegionIndex(buildRegionIndex(report.records)),
    ...renderSummary(summarizeByType(report.records)),
  ];

  if (report.showIssues) {
    lines.push(...renderIssues(report.issues ?? []));
  }

  lines.push(...renderDetails(report.records));

  return lines.join("\n");
}
