import type { AwsCredentialIdentityProvider } from "@aws-sdk/types";
import {
  RESERVATION_COLLECTORS,
  collectFromRegion,
  type ReservationCollector,
} from "./lib/collectors.js";
import type { ReportConfig } from "./lib/config.js";
import { createLogger, type Logger } from "./lib/logger.js";
import { listRegions } from "./lib/regions.js";
import { saveReport } from "./lib/report-writer.js";
import {
  CredentialsNotFoundError,
  createSession,
  resolveIdentity,
} from "./lib/session.js";
import { generateTextReport, renderHeader } from "./report-generator.js";
import type { CollectionIssue, ReservationRecord } from "./types.js";

export const MISSING_CREDENTIALS_MESSAGE = [
  "Error: AWS credentials not found. Please configure your AWS credentials.",
  "You can use: aws configure, environment variables, or IAM roles.",
];

/**
 * Collaborators of a report run. Everything has a production default;
 * tests replace the console, clock and credentials.
 */
export interface ReportDependencies {
  /** Prints one report line (console.log by default) */
  out?: (line: string) => void;
  logger?: Logger;
  now?: () => Date;
  /** Credential provider used instead of the SDK resolution chain */
  credentials?: AwsCredentialIdentityProvider;
  collectors?: readonly ReservationCollector[];
}

/**
 * Terminal state of a run.
 * - reported: the scan finished and the report was printed
 * - no-credentials: no credentials were found; nothing was collected
 * - failed: an unexpected error ended the run early
 */
export type RunStatus = "reported" | "no-credentials" | "failed";

export interface RunResult {
  status: RunStatus;
  accountId?: string;
  records: ReservationRecord[];
  issues: CollectionIssue[];
  /** Path of the JSON file, when it was written */
  outputFile?: string;
}

/**
 * Runs one collection and report pass.
 *
 * Regions are scanned one at a time in enumeration order; within a region the
 * collectors run in order and each call completes before the next starts. The
 * returned promise never rejects.
 *
 * @example
 * ```typescript
 * const result = await runReservationsReport(loadConfig());
 * if (result.status === "reported") {
 *   console.error(`${result.records.length} reservations`);
 * }
 * ```
 */
export async function runReservationsReport(
  config: ReportConfig,
  deps: ReportDependencies = {}
): Promise<RunResult> {
  const out = deps.out ?? ((line: string) => console.log(line));
  const now = deps.now ?? (() => new Date());
  const collectors = deps.collectors ?? RESERVATION_COLLECTORS;
  let logger = deps.logger ?? createLogger({ component: "ReservationsReport" });

  const records: ReservationRecord[] = [];
  const issues: CollectionIssue[] = [];

  try {
    const session = createSession({
      metadataRegion: config.metadataRegion,
      profile: config.profile,
      credentials: deps.credentials,
    });
    const { accountId } = await resolveIdentity(session);
    logger = logger.child({ accountId });

    for (const line of renderHeader(accountId, now())) {
      out(line);
    }

    let regions: string[];
    if (config.regions) {
      regions = config.regions;
      out(`\nUsing ${regions.length} configured regions...`);
    } else {
      out("\nGetting list of AWS regions...");
      regions = await listRegions(session, logger.child({ component: "RegionEnumerator" }));
    }
    out(`Checking ${regions.length} regions for reservations...`);

    for (const region of regions) {
      out(`\nChecking region: ${region}`);
      const regionLogger = logger.child({ region });
      const regionRecords: ReservationRecord[] = [];

      for (const collector of collectors) {
        const result = await collectFromRegion(collector, session, region, {
          logger: regionLogger,
          errorVerbosity: config.errorVerbosity,
        });
        regionRecords.push(...result.records);
        if (result.issue) {
          issues.push(result.issue);
        }
      }

      if (regionRecords.length > 0) {
        out(`  Found ${regionRecords.length} reservations in ${region}`);
        records.push(...regionRecords);
      } else {
        out(`  No reservations found in ${region}`);
      }
    }

    out(
      generateTextReport({
        records,
        issues,
        showIssues: config.errorVerbosity === "verbose",
      })
    );

    let outputFile: string | undefined;
    if (config.outputFile) {
      const saved = await saveReport(records, config.outputFile, logger);
      if (saved.saved) {
        outputFile = saved.path;
        out(`\nReport saved to: ${saved.path}`);
      } else {
        out(`\nError saving to JSON: ${saved.error ?? "unknown error"}`);
      }
    }

    logger.info("Reservations report completed", {
      regionCount: regions.length,
      recordCount: records.length,
      issueCount: issues.length,
    });

    return { status: "reported", accountId, records, issues, outputFile };
  } catch (error) {
    if (error instanceof CredentialsNotFoundError) {
      for (const line of MISSING_CREDENTIALS_MESSAGE) {
        out(line);
      }
      return { status: "no-credentials", records: [], issues: [] };
    }

    const err = error instanceof Error ? error : new Error(String(error));
    logger.error("Reservations report failed", err);
    out(`An unexpected error occurred: ${err.message}`);
    return { status: "failed", records, issues };
  }
}
