#!/usr/bin/env node
import { Command, Option } from "commander";
import { DEFAULT_OUTPUT_FILE, loadConfig, type CliOptions } from "./lib/config.js";
import { runReservationsReport } from "./reservations-report.js";

const program = new Command();

program
  .name("aws-reservations-report")
  .description(
    "Report EC2 Reserved Instances, RDS Reserved Instances and Savings Plans across all regions"
  )
  .version("1.0.0")
  .option("-o, --output <path>", `JSON output file (default: ${DEFAULT_OUTPUT_FILE})`)
  .option("--no-file", "Skip writing the JSON output file")
  .option("--profile <name>", "Named AWS profile (default: SDK credential chain)")
  .option(
    "--metadata-region <region>",
    "Region used for STS and region listing (default: us-east-1)"
  )
  .option("--regions <list>", "Comma separated regions to scan instead of all regions")
  .addOption(
    new Option("--error-verbosity <level>", "How per-region failures are reported").choices([
      "quiet",
      "default",
      "verbose",
    ])
  )
  .action(async (options: CliOptions) => {
    try {
      const config = loadConfig(options);
      await runReservationsReport(config);
    } catch (error) {
      // Only invalid options reach here; the report run itself never rejects
      if (error instanceof Error) {
        console.error(`Error: ${error.message}`);
      } else {
        console.error("An unexpected error occurred");
      }
      process.exitCode = 1;
    }
  });

await program.parseAsync(process.argv);
