/**
 * @stockrecon/cli: Run configuration, record sources and the
 * `stockrecon` command.
 */

export { createProgram, VERSION } from "./cli.js";
export type { ProgramDependencies } from "./cli.js";
export { runReconciliation, exitStatusFor, ExitStatus } from "./run.js";
export type { RunRequest, RunDependencies, RunOutcome } from "./run.js";
export {
  EnvSchema,
  RunConfigSchema,
  OverridesSchema,
  SourceFormatSchema,
  loadEnv,
  loadRunConfig,
  parseRunConfig,
  parseOverrides,
  applyOverrides,
  toReconcilerConfig,
  toSourceDefinition,
  toToleranceConfig,
  fromZodError,
} from "./config.js";
export type { CliEnv, RunConfig, RunOverrides, SourceConfig } from "./config.js";
export {
  FileRecordSource,
  parseCsv,
  parseRecords,
  sniffDelimiter,
  formatFromPath,
  readSkuFile,
} from "./sources.js";
export type { RecordSource, SourceFormat } from "./sources.js";
export { fetchBoth } from "./fetch.js";
export type { SourceBinding, FetchedRecords, FetchLogFn } from "./fetch.js";
export { writeArtifact, artifactNames, windowStem } from "./output.js";
export type { ArtifactPaths } from "./output.js";
export { formatSummaryLine, formatFailure, formatFailureLine, summaryDocument } from "./summary.js";
export type { RunStatusName, SummaryLineOptions } from "./summary.js";
export { createLogger, reconcilerLogFn } from "./logger.js";
export type { Logger } from "./logger.js";
