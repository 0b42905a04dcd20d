import {
  DescribeReservedInstancesCommand,
  type ReservedInstances,
} from "@aws-sdk/client-ec2";
import {
  DescribeReservedDBInstancesCommand,
  type ReservedDBInstance,
} from "@aws-sdk/client-rds";
import {
  DescribeSavingsPlansCommand,
  type SavingsPlan,
} from "@aws-sdk/client-savingsplans";
import {
  getEC2Client,
  getRDSClient,
  getSavingsPlansClient,
} from "./aws-clients.js";
import type { Logger } from "./logger.js";
import { NOT_AVAILABLE, normalizeRecord, type FieldSpec } from "./record-schema.js";
import type { Session } from "./session.js";
import type {
  CollectionIssue,
  ErrorVerbosity,
  ReservationRecord,
  ReservationType,
} from "../types.js";

/**
 * Error names that mean the caller may not list reservations in a region.
 * EC2 reports UnauthorizedOperation, RDS AccessDenied and Savings Plans
 * AccessDeniedException.
 */
const ACCESS_DENIED_CODES: ReadonlySet<string> = new Set([
  "UnauthorizedOperation",
  "AccessDenied",
  "AccessDeniedException",
]);

/**
 * Definition of one reservation category: how to list its items in a region
 * and how to turn an item into a record.
 */
export interface ResourceCollector<TItem> {
  type: ReservationType;
  /** Plural label used in log messages (e.g. "EC2 Reserved Instances") */
  label: string;
  /** Issues exactly one listing call and returns its first page */
  list(session: Session, region: string): Promise<TItem[]>;
  fields: readonly FieldSpec<TItem>[];
}

/**
 * A collector with its item type erased, so the three categories can share one list.
 */
export interface ReservationCollector {
  type: ReservationType;
  label: string;
  /**
   * Lists and normalizes the category's reservations in one region.
   * Rejects with the provider's error; see {@link collectFromRegion} for the
   * error-safe variant.
   */
  collect(session: Session, region: string): Promise<ReservationRecord[]>;
}

export function defineCollector<TItem>(
  definition: ResourceCollector<TItem>
): ReservationCollector {
  return {
    type: definition.type,
    label: definition.label,
    async collect(session, region) {
      const items = await definition.list(session, region);
      return items.map((item) =>
        normalizeRecord(definition.type, region, item, definition.fields)
      );
    },
  };
}

export const ec2ReservedInstanceCollector = defineCollector<ReservedInstances>({
  type: "EC2 Reserved Instance",
  label: "EC2 Reserved Instances",
  async list(session, region) {
    const ec2 = getEC2Client({ region, credentials: session.credentials });
    const response = await ec2.send(new DescribeReservedInstancesCommand({}));
    return response.ReservedInstances ?? [];
  },
  fields: [
    { name: "ReservedInstancesId", kind: "text", read: (ri) => ri.ReservedInstancesId },
    { name: "InstanceType", kind: "text", read: (ri) => ri.InstanceType },
    { name: "AvailabilityZone", kind: "text", read: (ri) => ri.AvailabilityZone },
    { name: "State", kind: "text", read: (ri) => ri.State },
    { name: "Start", kind: "date", read: (ri) => ri.Start },
    { name: "End", kind: "date", read: (ri) => ri.End },
    { name: "Duration", kind: "duration", read: (ri) => ri.Duration },
    { name: "InstanceCount", kind: "count", read: (ri) => ri.InstanceCount },
    { name: "ProductDescription", kind: "text", read: (ri) => ri.ProductDescription },
    { name: "InstanceTenancy", kind: "text", read: (ri) => ri.InstanceTenancy },
    { name: "OfferingClass", kind: "text", read: (ri) => ri.OfferingClass },
    { name: "OfferingType", kind: "text", read: (ri) => ri.OfferingType },
    { name: "FixedPrice", kind: "money", read: (ri) => ri.FixedPrice },
    { name: "UsagePrice", kind: "money", read: (ri) => ri.UsagePrice },
    { name: "CurrencyCode", kind: "text", read: (ri) => ri.CurrencyCode, fallback: "USD" },
  ],
});

export const rdsReservedInstanceCollector = defineCollector<ReservedDBInstance>({
  type: "RDS Reserved Instance",
  label: "RDS Reserved Instances",
  async list(session, region) {
    const rds = getRDSClient({ region, credentials: session.credentials });
    const response = await rds.send(new DescribeReservedDBInstancesCommand({}));
    return response.ReservedDBInstances ?? [];
  },
  fields: [
    { name: "ReservedDBInstanceId", kind: "text", read: (ri) => ri.ReservedDBInstanceId },
    { name: "DBInstanceClass", kind: "text", read: (ri) => ri.DBInstanceClass },
    { name: "Engine", kind: "text", read: (ri) => ri.ProductDescription },
    { name: "State", kind: "text", read: (ri) => ri.State },
    { name: "Start", kind: "date", read: (ri) => ri.StartTime },
    { name: "Duration", kind: "duration", read: (ri) => ri.Duration },
    { name: "DBInstanceCount", kind: "count", read: (ri) => ri.DBInstanceCount },
    { name: "OfferingType", kind: "text", read: (ri) => ri.OfferingType },
    { name: "MultiAZ", kind: "flag", read: (ri) => ri.MultiAZ },
    { name: "FixedPrice", kind: "money", read: (ri) => ri.FixedPrice },
    { name: "UsagePrice", kind: "money", read: (ri) => ri.UsagePrice },
    { name: "CurrencyCode", kind: "text", read: (ri) => ri.CurrencyCode, fallback: "USD" },
  ],
});

export const savingsPlanCollector = defineCollector<SavingsPlan>({
  type: "Savings Plan",
  label: "Savings Plans",
  async list(session, region) {
    const savingsPlans = getSavingsPlansClient({ region, credentials: session.credentials });
    const response = await savingsPlans.send(new DescribeSavingsPlansCommand({}));
    return response.savingsPlans ?? [];
  },
  fields: [
    { name: "SavingsPlanId", kind: "text", read: (sp) => sp.savingsPlanId },
    { name: "SavingsPlanArn", kind: "text", read: (sp) => sp.savingsPlanArn },
    { name: "Description", kind: "text", read: (sp) => sp.description },
    { name: "State", kind: "text", read: (sp) => sp.state },
    { name: "PlanType", kind: "text", read: (sp) => sp.savingsPlanType },
    { name: "PaymentOption", kind: "text", read: (sp) => sp.paymentOption },
    { name: "Start", kind: "date", read: (sp) => sp.start },
    { name: "End", kind: "date", read: (sp) => sp.end },
    {
      name: "Commitment",
      kind: "text",
      read: (sp) =>
        sp.commitment === undefined
          ? undefined
          : `${sp.commitment} ${sp.currency ?? NOT_AVAILABLE}/hour`,
    },
    { name: "Currency", kind: "text", read: (sp) => sp.currency },
    { name: "UpfrontPayment", kind: "money", read: (sp) => sp.upfrontPaymentAmount },
    { name: "RecurringPayment", kind: "money", read: (sp) => sp.recurringPaymentAmount },
    { name: "TermDurationInSeconds", kind: "count", read: (sp) => sp.termDurationInSeconds, fallback: NOT_AVAILABLE },
    { name: "EC2InstanceFamily", kind: "text", read: (sp) => sp.ec2InstanceFamily },
    { name: "PlanRegion", kind: "text", read: (sp) => sp.region },
  ],
});

/**
 * Collectors in report order: EC2, then RDS, then Savings Plans.
 */
export const RESERVATION_COLLECTORS: readonly ReservationCollector[] = [
  ec2ReservedInstanceCollector,
  rdsReservedInstanceCollector,
  savingsPlanCollector,
];

/**
 * Checks whether an error is an authorization denial for a listing call.
 */
export function isAccessDeniedError(error: unknown): boolean {
  return error instanceof Error && ACCESS_DENIED_CODES.has(error.name);
}

export interface CollectOptions {
  logger: Logger;
  errorVerbosity: ErrorVerbosity;
}

/**
 * Records collected in one region for one category. A failed call yields no
 * records and an issue.
 */
export interface CollectionResult {
  records: ReservationRecord[];
  issue?: CollectionIssue;
}

/**
 * Runs a collector for one region without letting any error escape.
 *
 * - access denied: empty result, logged only when verbosity is "verbose"
 * - any other error: empty result, logged unless verbosity is "quiet"
 *
 * @example
 * ```typescript
 * const { records, issue } = await collectFromRegion(
 *   rdsReservedInstanceCollector,
 *   session,
 *   "eu-west-1",
 *   { logger, errorVerbosity: "default" }
 * );
 * ```
 */
export async function collectFromRegion(
  collector: ReservationCollector,
  session: Session,
  region: string,
  options: CollectOptions
): Promise<CollectionResult> {
  try {
    return { records: await collector.collect(session, region) };
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    const issue: CollectionIssue = {
      region,
      type: collector.type,
      kind: isAccessDeniedError(err) ? "access-denied" : "error",
      code: err.name,
      message: err.message,
    };

    const fields = { region, reservationType: collector.type, errorCode: err.name };
    if (issue.kind === "access-denied") {
      if (options.errorVerbosity === "verbose") {
        options.logger.info(`Access denied listing ${collector.label} in ${region}`, fields);
      }
    } else if (options.errorVerbosity !== "quiet") {
      options.logger.error(`Error retrieving ${collector.label} in ${region}`, err, fields);
    }

    return { records: [], issue };
  }
}
