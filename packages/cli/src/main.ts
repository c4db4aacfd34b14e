#!/usr/bin/env node
/**
 * @stockrecon/cli: Entry point.
 */

import { CommanderError } from "commander";
import { createProgram } from "./cli.js";
import { ExitStatus, exitStatusFor, statusName } from "./run.js";
import { formatFailure } from "./summary.js";

async function main(): Promise<void> {
  const program = createProgram({
    onResult: (outcome) => {
      process.exitCode = outcome.status;
    },
  });
  await program.parseAsync(process.argv);
}

main().catch((err: unknown) => {
  // Usage errors, --help and --version: the program has already printed
  if (err instanceof CommanderError) {
    process.exitCode = err.exitCode === 0 ? ExitStatus.OK : ExitStatus.CONFIG;
    return;
  }
  // eslint-disable-next-line no-console
  console.error("Fatal error:", err);
  const status = exitStatusFor(err);
  const message = err instanceof Error ? err.message : String(err);
  const line = formatFailure(statusName(status), message, { json: false, color: false });
  process.stdout.write(line + "\n");
  process.exitCode = status;
});
