/**
 * End-to-end tests for a report run with every AWS client mocked.
 *
 * Each mocked client forwards `send` together with the region it was built for,
 * so responses can differ per region.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, stat } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  DescribeRegionsCommand,
  DescribeReservedInstancesCommand,
} from "@aws-sdk/client-ec2";
import {
  TEST_ACCOUNT_ID,
  buildReservedInstance,
  buildSavingsPlan,
  buildServiceError,
  buildSilentLogger,
  testCredentials,
} from "../test/factories.js";
import type { ReportConfig } from "./lib/config.js";
import { FALLBACK_REGIONS } from "./lib/regions.js";
import { NO_RESERVATIONS_MESSAGE, REPORT_TITLE } from "./report-generator.js";
import { MISSING_CREDENTIALS_MESSAGE, runReservationsReport } from "./reservations-report.js";

interface ClientArgs {
  region: string;
}

const mocks = vi.hoisted(() => ({
  stsSend: vi.fn(),
  ec2Send: vi.fn(),
  rdsSend: vi.fn(),
  savingsPlansSend: vi.fn(),
}));

vi.mock("@aws-sdk/client-sts", async (importOriginal) => {
  const actual = await importOriginal<typeof import("@aws-sdk/client-sts")>();
  return {
    ...actual,
    STSClient: vi.fn(function (args: ClientArgs) {
      return { send: (command: unknown) => mocks.stsSend(command, args.region) };
    }),
  };
});

vi.mock("@aws-sdk/client-ec2", async (importOriginal) => {
  const actual = await importOriginal<typeof import("@aws-sdk/client-ec2")>();
  return {
    ...actual,
    EC2Client: vi.fn(function (args: ClientArgs) {
      return { send: (command: unknown) => mocks.ec2Send(command, args.region) };
    }),
  };
});

vi.mock("@aws-sdk/client-rds", async (importOriginal) => {
  const actual = await importOriginal<typeof import("@aws-sdk/client-rds")>();
  return {
    ...actual,
    RDSClient: vi.fn(function (args: ClientArgs) {
      return { send: (command: unknown) => mocks.rdsSend(command, args.region) };
    }),
  };
});

vi.mock("@aws-sdk/client-savingsplans", async (importOriginal) => {
  const actual = await importOriginal<typeof import("@aws-sdk/client-savingsplans")>();
  return {
    ...actual,
    SavingsplansClient: vi.fn(function (args: ClientArgs) {
      return { send: (command: unknown) => mocks.savingsPlansSend(command, args.region) };
    }),
  };
});

describe("runReservationsReport", () => {
  let dir: string;
  let lines: string[];
  let logger: ReturnType<typeof buildSilentLogger>;

  const out = (line: string) => {
    lines.push(line);
  };
  const printed = () => lines.join("\n").split("\n");

  function configFor(overrides: Partial<ReportConfig> = {}): ReportConfig {
    return {
      metadataRegion: "us-east-1",
      outputFile: join(dir, "report.json"),
      errorVerbosity: "default",
      ...overrides,
    };
  }

  function run(config: ReportConfig) {
    return runReservationsReport(config, {
      out,
      logger,
      credentials: testCredentials,
      now: () => new Date(2024, 5, 1, 12, 0, 0),
    });
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "reservations-run-"));
    lines = [];
    logger = buildSilentLogger();

    mocks.stsSend.mockReset().mockResolvedValue({
      Account: TEST_ACCOUNT_ID,
      Arn: `arn:aws:iam::${TEST_ACCOUNT_ID}:user/report`,
    });
    mocks.ec2Send.mockReset().mockImplementation(async (command: unknown) => {
      if (command instanceof DescribeRegionsCommand) {
        return { Regions: [{ RegionName: "eu-west-1" }, { RegionName: "us-east-1" }] };
      }
      return { ReservedInstances: [] };
    });
    mocks.rdsSend.mockReset().mockResolvedValue({ ReservedDBInstances: [] });
    mocks.savingsPlansSend.mockReset().mockResolvedValue({ savingsPlans: [] });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("should print the header before scanning", async () => {
    await run(configFor());

    expect(lines.slice(0, 4)).toEqual([
      REPORT_TITLE,
      "=".repeat(50),
      `Account ID: ${TEST_ACCOUNT_ID}`,
      "Generated: 2024-06-01 12:00:00",
    ]);
    expect(lines[4]).toBe("\nGetting list of AWS regions...");
    expect(lines[5]).toBe("Checking 2 regions for reservations...");
  });

  it("should collect every category per region and save the records", async () => {
    mocks.ec2Send.mockImplementation(async (command: unknown, region: string) => {
      if (command instanceof DescribeRegionsCommand) {
        return { Regions: [{ RegionName: "eu-west-1" }, { RegionName: "us-east-1" }] };
      }
      return { ReservedInstances: region === "eu-west-1" ? [buildReservedInstance()] : [] };
    });
    mocks.savingsPlansSend.mockImplementation(async (_command: unknown, region: string) => ({
      savingsPlans: region === "us-east-1" ? [buildSavingsPlan()] : [],
    }));

    const result = await run(configFor());

    expect(result.status).toBe("reported");
    expect(result.accountId).toBe(TEST_ACCOUNT_ID);
    expect(result.records.map((record) => [record.Type, record.Region])).toEqual([
      ["EC2 Reserved Instance", "eu-west-1"],
      ["Savings Plan", "us-east-1"],
    ]);
    expect(result.issues).toEqual([]);

    expect(lines).toContain("  Found 1 reservations in eu-west-1");
    expect(lines).toContain("  Found 1 reservations in us-east-1");
    expect(printed()).toContain("  eu-west-1: 1 reservations");
    expect(printed()).toContain("Total Reservations: 2");

    const path = join(dir, "report.json");
    expect(result.outputFile).toBe(path);
    expect(lines.at(-1)).toBe(`\nReport saved to: ${path}`);
    expect(JSON.parse(await readFile(path, "utf8"))).toEqual(result.records);
  });

  it("should scan the fallback regions when region listing fails", async () => {
    mocks.ec2Send.mockImplementation(async (command: unknown) => {
      if (command instanceof DescribeRegionsCommand) {
        throw buildServiceError("UnauthorizedOperation", "not allowed");
      }
      return { ReservedInstances: [] };
    });

    const result = await run(configFor());

    expect(result.status).toBe("reported");
    expect(lines).toContain(`Checking ${FALLBACK_REGIONS.length} regions for reservations...`);
    const reservedInstanceCalls = mocks.ec2Send.mock.calls.filter(
      ([command]) => command instanceof DescribeReservedInstancesCommand
    );
    expect(reservedInstanceCalls.map(([, region]) => region)).toEqual([...FALLBACK_REGIONS]);
  });

  it("should use configured regions without listing regions", async () => {
    await run(configFor({ regions: ["ap-south-1"] }));

    expect(lines).toContain("\nUsing 1 configured regions...");
    expect(lines).toContain("\nChecking region: ap-south-1");
    expect(
      mocks.ec2Send.mock.calls.some(([command]) => command instanceof DescribeRegionsCommand)
    ).toBe(false);
  });

  it("should continue past an access denial without logging it by default", async () => {
    mocks.rdsSend.mockImplementation(async (_command: unknown, region: string) => {
      if (region === "eu-west-1") {
        throw buildServiceError("AccessDenied", "not authorized");
      }
      return { ReservedDBInstances: [] };
    });
    mocks.savingsPlansSend.mockImplementation(async (_command: unknown, region: string) => ({
      savingsPlans: region === "eu-west-1" ? [buildSavingsPlan({ region: "eu-west-1" })] : [],
    }));

    const result = await run(configFor());

    expect(result.status).toBe("reported");
    expect(result.records).toHaveLength(1);
    expect(result.records[0]).toMatchObject({ Type: "Savings Plan", Region: "eu-west-1" });
    expect(result.issues).toEqual([
      {
        region: "eu-west-1",
        type: "RDS Reserved Instance",
        kind: "access-denied",
        code: "AccessDenied",
        message: "not authorized",
      },
    ]);
    expect(logger.error).not.toHaveBeenCalled();
    expect(printed()).not.toContain("COLLECTION ISSUES");
  });

  it("should list collection issues in verbose mode", async () => {
    mocks.savingsPlansSend.mockRejectedValue(buildServiceError("ThrottlingException", "Rate exceeded"));

    await run(configFor({ regions: ["eu-west-1"], errorVerbosity: "verbose" }));

    expect(printed()).toContain("COLLECTION ISSUES");
    expect(printed()).toContain("  eu-west-1 Savings Plan: ThrottlingException: Rate exceeded");
  });

  it("should report no reservations and write an empty array", async () => {
    const result = await run(configFor());

    expect(result.records).toEqual([]);
    expect(lines).toContain("  No reservations found in eu-west-1");
    expect(printed()).toContain("No regions found with reservations");
    expect(printed()).toContain(NO_RESERVATIONS_MESSAGE);
    expect(await readFile(join(dir, "report.json"), "utf8")).toBe("[]");
  });

  it("should skip the file when output is disabled", async () => {
    const result = await run(configFor({ outputFile: undefined }));

    expect(result.outputFile).toBeUndefined();
    expect(lines.some((line) => line.includes("Report saved to"))).toBe(false);
    await expect(stat(join(dir, "report.json"))).rejects.toThrow();
  });

  it("should print the save error and still finish the report", async () => {
    const path = join(dir, "missing", "report.json");

    const result = await run(configFor({ outputFile: path }));

    expect(result.status).toBe("reported");
    expect(result.outputFile).toBeUndefined();
    expect(lines.at(-1)).toMatch(/^\nError saving to JSON: .*ENOENT/);
  });

  it("should print remediation and write nothing without credentials", async () => {
    mocks.stsSend.mockRejectedValue(
      buildServiceError("CredentialsProviderError", "Could not load credentials from any providers")
    );

    const result = await run(configFor());

    expect(result).toEqual({ status: "no-credentials", records: [], issues: [] });
    expect(lines).toEqual(MISSING_CREDENTIALS_MESSAGE);
    expect(mocks.ec2Send).not.toHaveBeenCalled();
    await expect(stat(join(dir, "report.json"))).rejects.toThrow();
  });

  it("should stop with a message on an unexpected error", async () => {
    mocks.stsSend.mockRejectedValue(new Error("endpoint unreachable"));

    const result = await run(configFor());

    expect(result.status).toBe("failed");
    expect(lines).toEqual(["An unexpected error occurred: endpoint unreachable"]);
    expect(logger.error).toHaveBeenCalledWith("Reservations report failed", expect.any(Error));
  });
});
