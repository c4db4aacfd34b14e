/**
 * One reconciliation run, end to end:
 *
 *   options → config → sources (concurrent fetch) → engine → artifacts → summary line
 *
 * Returns the exit status instead of exiting, so the command wrapper and
 * tests decide what to do with it.
 */

import { join } from "node:path";
import {
  InventoryReconciler,
  SchemaValidationError,
  SourceFetchError,
  renderDiff,
} from "@stockrecon/reconciler";
import type { ReconciliationReport } from "@stockrecon/types";
import {
  applyOverrides,
  loadRunConfig,
  parseOverrides,
  toReconcilerConfig,
} from "./config.js";
import type { CliEnv, SourceConfig } from "./config.js";
import { fetchBoth } from "./fetch.js";
import { reconcilerLogFn } from "./logger.js";
import type { Logger } from "./logger.js";
import { artifactNames, windowStem, writeArtifact } from "./output.js";
import type { ArtifactPaths } from "./output.js";
import { FileRecordSource, readSkuFile } from "./sources.js";
import type { RecordSource } from "./sources.js";
import { formatFailure, formatSummaryLine, summaryDocument } from "./summary.js";

export const ExitStatus = {
  OK: 0,
  UNEXPECTED: 1,
  CONFIG: 2,
  FETCH: 3,
  FINDINGS: 10,
} as const;

export type ExitStatus = (typeof ExitStatus)[keyof typeof ExitStatus];

export interface RunRequest {
  /** Raw command-line options; validated here */
  readonly options: unknown;
  readonly env: CliEnv;
}

export interface RunDependencies {
  readonly logger: Logger;
  /** Receives the single summary line */
  readonly stdout: (line: string) => void;
  /** Build a source from its configuration. Default: FileRecordSource */
  readonly createSource?: (config: SourceConfig) => RecordSource;
  readonly clock?: () => number;
}

export interface RunOutcome {
  readonly status: ExitStatus;
  readonly report: ReconciliationReport | null;
  readonly artifacts: ArtifactPaths | null;
}

function fileSource(config: SourceConfig): RecordSource {
  return new FileRecordSource(config.label, config.path, config.format);
}

export async function runReconciliation(
  request: RunRequest,
  deps: RunDependencies,
): Promise<RunOutcome> {
  const { logger, stdout } = deps;
  const clock = deps.clock ?? Date.now;
  const startedAtMs = clock();

  let json = false;
  let color = false;
  try {
    const overrides = parseOverrides(request.options);
    json = overrides.json;
    color = overrides.color && !json;

    const configPath = overrides.config ?? request.env.STOCKRECON_CONFIG;
    if (configPath === undefined) {
      throw new SchemaValidationError("No run configuration: pass --config or set STOCKRECON_CONFIG", {
        field: "config",
        reason: "missing",
      });
    }

    const config = applyOverrides(await loadRunConfig(configPath), overrides);
    const skusFromFile =
      config.scope.sku_file === undefined ? [] : await readSkuFile(config.scope.sku_file);

    const reconciler = new InventoryReconciler(
      toReconcilerConfig(config, skusFromFile, { log: reconcilerLogFn(logger), clock }),
    );
    const window = reconciler.getSnapshotWindow();
    logger.info({ configPath, window, referenceTimezone: config.reference_timezone }, "Run started");

    const createSource = deps.createSource ?? fileSource;
    const fetched = await fetchBoth(
      {
        a: { source: createSource(config.sources.a), timeoutMs: config.sources.a.timeout_ms },
        b: { source: createSource(config.sources.b), timeoutMs: config.sources.b.timeout_ms },
      },
      window,
      (entry) => logger.info(entry, "Source fetched"),
    );

    const report = reconciler.reconcile(fetched, startedAtMs);

    const names = artifactNames(windowStem(window, config.window === undefined), config.format);
    const artifacts: ArtifactPaths = {
      diff: join(config.output, names.diff),
      summary: join(config.output, names.summary),
    };
    const labels = { a: config.sources.a.label, b: config.sources.b.label };
    await writeArtifact(config.output, names.diff, renderDiff(report.diff, labels, config.format));
    await writeArtifact(
      config.output,
      names.summary,
      JSON.stringify(summaryDocument(report, artifacts), null, 2) + "\n",
    );

    logger.info(
      { id: report.id, reportHash: report.reportHash, artifacts, allReconciled: report.summary.allReconciled },
      "Run complete",
    );
    stdout(
      json
        ? JSON.stringify(summaryDocument(report, artifacts))
        : formatSummaryLine(report, artifacts, { color }),
    );

    return {
      status: report.summary.allReconciled ? ExitStatus.OK : ExitStatus.FINDINGS,
      report,
      artifacts,
    };
  } catch (err) {
    const status = exitStatusFor(err);
    const message = err instanceof Error ? err.message : String(err);

    if (status === ExitStatus.UNEXPECTED) logger.error({ err }, "Run failed unexpectedly");
    else logger.error({ err, code: status }, message);

    stdout(formatFailure(statusName(status), message, { json, color }));
    return { status, report: null, artifacts: null };
  }
}

export function statusName(status: ExitStatus): "CONFIG_ERROR" | "FETCH_ERROR" | "ERROR" {
  if (status === ExitStatus.CONFIG) return "CONFIG_ERROR";
  if (status === ExitStatus.FETCH) return "FETCH_ERROR";
  return "ERROR";
}

export function exitStatusFor(err: unknown): ExitStatus {
  if (err instanceof SchemaValidationError) return ExitStatus.CONFIG;
  if (err instanceof SourceFetchError) return ExitStatus.FETCH;
  return ExitStatus.UNEXPECTED;
}
