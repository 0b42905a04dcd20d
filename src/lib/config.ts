import { z } from "zod";
import { isValidRegionName } from "./validation-utils.js";

/**
 * Default output file, written relative to the working directory.
 */
export const DEFAULT_OUTPUT_FILE = "aws_reservations_report.json";

/**
 * Region used for STS and DescribeRegions when none is configured.
 * Region listing is account metadata, so any enabled region answers it.
 */
export const DEFAULT_METADATA_REGION = "us-east-1";

const regionSchema = z
  .string()
  .trim()
  .refine(isValidRegionName, (value) => ({
    message: `Invalid region: ${value}`,
  }));

const errorVerbositySchema = z.enum(["quiet", "default", "verbose"]);

/**
 * Comma separated region list ("eu-west-1, us-east-1"). Empty entries are ignored.
 */
const regionListSchema = z
  .string()
  .transform((value) =>
    value
      .split(",")
      .map((region) => region.trim())
      .filter((region) => region !== "")
  )
  .pipe(z.array(regionSchema).min(1, "At least one region is required"));

/**
 * Environment variables read by the tool. Empty values count as unset.
 * `AWS_PROFILE` is left to the SDK's default credential chain.
 */
const EnvSchema = z.object({
  REPORT_METADATA_REGION: regionSchema.optional(),
  REPORT_OUTPUT_FILE: z.string().min(1).optional(),
  REPORT_ERROR_VERBOSITY: errorVerbositySchema.optional(),
});

/**
 * Options accepted from the command line. Commander leaves unset options undefined
 * and sets `file` to false for `--no-file`.
 */
export const CliOptionsSchema = z.object({
  output: z.string().min(1).optional(),
  profile: z.string().min(1).optional(),
  metadataRegion: regionSchema.optional(),
  regions: regionListSchema.optional(),
  errorVerbosity: errorVerbositySchema.optional(),
  file: z.boolean().default(true),
});

export type CliOptions = z.input<typeof CliOptionsSchema>;

/**
 * Fully resolved configuration for one report run.
 */
export interface ReportConfig {
  metadataRegion: string;
  profile?: string;
  /** Regions to scan instead of calling DescribeRegions */
  regions?: string[];
  /** Output file path, or undefined when file output is disabled */
  outputFile?: string;
  errorVerbosity: z.infer<typeof errorVerbositySchema>;
}

/**
 * Thrown when CLI options or environment variables fail validation.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

function formatIssues(source: string, error: z.ZodError): string {
  const details = error.issues
    .map((issue) => {
      const path = issue.path.join(".");
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join("; ");
  return `Invalid ${source}: ${details}`;
}

function blankToUndefined(
  env: NodeJS.ProcessEnv
): Record<string, string | undefined> {
  const cleaned: Record<string, string | undefined> = {};
  for (const [key, value] of Object.entries(env)) {
    cleaned[key] = value === "" ? undefined : value;
  }
  return cleaned;
}

/**
 * Resolves the run configuration. CLI options take precedence over environment
 * variables, which take precedence over defaults.
 *
 * @param options - Parsed command line options
 * @param env - Environment to read (process.env by default)
 *
 * @throws {ConfigError} If any option or variable is invalid
 *
 * @example
 * ```typescript
 * loadConfig({ output: "ri.json", errorVerbosity: "verbose" }, {});
 * // { metadataRegion: "us-east-1", outputFile: "ri.json", errorVerbosity: "verbose", ... }
 * ```
 */
export function loadConfig(
  options: CliOptions = {},
  env: NodeJS.ProcessEnv = process.env
): ReportConfig {
  const cli = CliOptionsSchema.safeParse(options);
  if (!cli.success) {
    throw new ConfigError(formatIssues("options", cli.error));
  }

  const vars = EnvSchema.safeParse(blankToUndefined(env));
  if (!vars.success) {
    throw new ConfigError(formatIssues("environment", vars.error));
  }

  const outputFile = cli.data.output ?? vars.data.REPORT_OUTPUT_FILE ?? DEFAULT_OUTPUT_FILE;

  return {
    metadataRegion:
      cli.data.metadataRegion ?? vars.data.REPORT_METADATA_REGION ?? DEFAULT_METADATA_REGION,
    profile: cli.data.profile,
    regions: cli.data.regions,
    outputFile: cli.data.file ? outputFile : undefined,
    errorVerbosity:
      cli.data.errorVerbosity ?? vars.data.REPORT_ERROR_VERBOSITY ?? "default",
  };
}
