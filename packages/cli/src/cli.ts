/**
 * The `stockrecon` command.
 *
 * Examples:
 *   $ stockrecon run --config recon.json
 *   $ stockrecon run --config recon.json --date 2024-03-01 --tolerance 0.05
 *   $ stockrecon run --config recon.json --sku-file skus.csv --format ndjson --json
 */

import { Command, Option } from "commander";
import type { OutputConfiguration } from "commander";
import { SchemaValidationError } from "@stockrecon/reconciler";
import { loadEnv } from "./config.js";
import type { CliEnv } from "./config.js";
import { createLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import { ExitStatus, runReconciliation } from "./run.js";
import type { RunDependencies, RunOutcome } from "./run.js";
import { formatFailure } from "./summary.js";

export const VERSION = "0.1.0";

export interface ProgramDependencies {
  readonly env?: Record<string, string | undefined>;
  readonly stdout?: (line: string) => void;
  readonly createLogger?: (env: CliEnv) => Logger;
  readonly createSource?: RunDependencies["createSource"];
  readonly clock?: () => number;
  /** Where commander writes help and usage errors */
  readonly output?: OutputConfiguration;
  /** Receives each run's outcome; the entry point turns it into the exit code */
  readonly onResult: (outcome: RunOutcome) => void;
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function jsonRequested(options: unknown): boolean {
  return typeof options === "object" && options !== null && "json" in options && options.json === true;
}

export function createProgram(deps: ProgramDependencies): Command {
  const program = new Command();
  const stdout = deps.stdout ?? ((line: string) => process.stdout.write(line + "\n"));

  program
    .name("stockrecon")
    .description("Reconcile inventory snapshots between two systems")
    .version(VERSION)
    .exitOverride((err) => {
      // Usage errors still end with a summary line; --help and --version do not
      if (err.exitCode !== 0) {
        stdout(formatFailure("CONFIG_ERROR", err.message, { json: false, color: false }));
      }
      throw err;
    });
  if (deps.output) program.configureOutput(deps.output);

  program
    .command("run")
    .description("Reconcile one snapshot window and write the diff artifact")
    .option("-c, --config <file>", "run configuration (JSON); default $STOCKRECON_CONFIG")
    .option("--date <yyyy-mm-dd>", "calendar day in the reference zone")
    .option("--window-start <timestamp>", "explicit window start (inclusive)")
    .option("--window-end <timestamp>", "explicit window end (inclusive)")
    .option("--tolerance <fraction>", "relative tolerance for every metric, e.g. 0.05")
    .option("-o, --output <dir>", "artifact directory")
    .addOption(new Option("--format <format>", "diff artifact format").choices(["csv", "ndjson"]))
    .option("--reference-timezone <zone>", "zone for windows and timestamps, e.g. UTC or Europe/Berlin")
    .option("--case-insensitive", "trim and case-fold sku and location before joining")
    .addOption(
      new Option("--missing-metric-policy <policy>", "how a metric absent on one side counts").choices([
        "flag_mismatch",
        "ignore",
      ]),
    )
    .option("--strict", "abort on the first record that fails validation")
    .option("--sku <sku>", "restrict to a SKU (repeatable)", collect, [])
    .option("--sku-file <file>", "restrict to SKUs listed in a file")
    .option("--location <id>", "restrict to a location (repeatable)", collect, [])
    .option("--json", "print the summary as JSON")
    .option("--no-color", "disable colored output")
    .action(async (_options: unknown, command: Command) => {
      const options: unknown = command.opts();
      let env: CliEnv;
      try {
        env = loadEnv(deps.env);
      } catch (err) {
        if (!(err instanceof SchemaValidationError)) throw err;
        const json = jsonRequested(options);
        stdout(formatFailure("CONFIG_ERROR", err.message, { json, color: false }));
        deps.onResult({ status: ExitStatus.CONFIG, report: null, artifacts: null });
        return;
      }

      const logger = (deps.createLogger ?? createLogger)(env);
      const outcome = await runReconciliation(
        { options, env },
        { logger, stdout, createSource: deps.createSource, clock: deps.clock },
      );
      logger.flush();
      deps.onResult(outcome);
    });

  return program;
}
