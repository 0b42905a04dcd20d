/**
 * Reservation categories reported by the tool. The string value is also the
 * `Type` field written into every record and the label used in the detailed
 * report.
 */
export type ReservationType =
  | "EC2 Reserved Instance"
  | "RDS Reserved Instance"
  | "Savings Plan";

/**
 * Report order of the reservation categories. Collectors run in this order
 * within each region and the summary lists counts in this order.
 */
export const RESERVATION_TYPES: readonly ReservationType[] = [
  "EC2 Reserved Instance",
  "RDS Reserved Instance",
  "Savings Plan",
];

/**
 * Value of a single normalized record field.
 */
export type FieldValue = string | number | boolean;

/**
 * A normalized reservation record.
 *
 * Keys keep insertion order: `Type` and `Region` first, then the category's
 * schema fields in schema order. Records are frozen once built.
 */
export type ReservationRecord = Readonly<
  { Type: ReservationType; Region: string } & Record<string, FieldValue>
>;

/**
 * Controls how per-region collection failures are surfaced.
 * - quiet: nothing is logged for either failure class
 * - default: unclassified errors are logged, access denials are silent
 * - verbose: both classes are logged and listed in the console report
 */
export type ErrorVerbosity = "quiet" | "default" | "verbose";

/**
 * A per-region, per-category failure converted into an empty result.
 */
export interface CollectionIssue {
  region: string;
  type: ReservationType;
  kind: "access-denied" | "error";
  /** Error name reported by the AWS SDK (e.g. UnauthorizedOperation) */
  code: string;
  message: string;
}

/**
 * Record count for one region in the region index.
 */
export interface RegionCount {
  region: string;
  count: number;
}

/**
 * Record counts by reservation category.
 */
export interface TypeSummary {
  counts: Record<ReservationType, number>;
  total: number;
}

/**
 * Account identity returned by STS GetCallerIdentity.
 */
export interface Identity {
  accountId: string;
}
