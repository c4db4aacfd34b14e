/**
 * Run summary.
 *
 * Every run prints exactly one line on stdout: key=value pairs for people
 * and log scrapers, or a single JSON object with --json. The full diff
 * lives in the artifact.
 */

import chalk, { Chalk } from "chalk";
import type { ReconciliationReport } from "@stockrecon/types";
import type { ArtifactPaths } from "./output.js";

export type RunStatusName = "OK" | "FINDINGS" | "CONFIG_ERROR" | "FETCH_ERROR" | "ERROR";

export interface SummaryLineOptions {
  readonly color: boolean;
}

function quote(value: string): string {
  return /^[^\s"=]+$/.test(value) ? value : JSON.stringify(value);
}

function paint(color: boolean) {
  return color ? chalk : new Chalk({ level: 0 });
}

/** One-line summary of a completed run. */
export function formatSummaryLine(
  report: ReconciliationReport,
  artifacts: ArtifactPaths,
  options: SummaryLineOptions,
): string {
  const c = paint(options.color);
  const s = report.summary;
  const { a, b } = s.records;
  const status: RunStatusName = s.allReconciled ? "OK" : "FINDINGS";

  const pairs: [string, string | number][] = [
    ["window", `${report.window.start}..${report.window.end}`],
    ["keys", s.totalKeys],
    ["matched", s.matchedWithinTolerance],
    ["mismatched", s.mismatched],
    [`${a.label}_only`, s.sourceAOnly],
    [`${b.label}_only`, s.sourceBOnly],
    ["missing_metrics", s.missingMetricCount],
    ["rejected", a.rejected + b.rejected],
    ["ambiguous", s.ambiguousSnapshots],
    ["diff_rows", s.diffRowCount],
    ["duration_ms", s.durationMs],
    ["artifact", artifacts.diff],
  ];

  const statusText = s.allReconciled ? c.green(status) : c.yellow(status);
  const body = pairs.map(([k, v]) => `${k}=${quote(String(v))}`).join(" ");
  return `${c.bold("stockrecon")} status=${statusText} ${body}`;
}

/** One-line summary of a run that ended before producing a report. */
export function formatFailureLine(
  status: Exclude<RunStatusName, "OK" | "FINDINGS">,
  message: string,
  options: SummaryLineOptions,
): string {
  const c = paint(options.color);
  return `${c.bold("stockrecon")} status=${c.red(status)} error=${JSON.stringify(message)}`;
}

/** The failure line, or its JSON form under --json. */
export function formatFailure(
  status: Exclude<RunStatusName, "OK" | "FINDINGS">,
  message: string,
  options: SummaryLineOptions & { readonly json: boolean },
): string {
  return options.json
    ? JSON.stringify({ status, error: message })
    : formatFailureLine(status, message, options);
}

/** Machine-readable summary: the --json line and the summary artifact. */
export function summaryDocument(
  report: ReconciliationReport,
  artifacts: ArtifactPaths,
): Record<string, unknown> {
  return {
    status: report.summary.allReconciled ? "OK" : "FINDINGS",
    id: report.id,
    window: report.window,
    referenceTimezone: report.referenceTimezone,
    startedAt: report.startedAt,
    completedAt: report.completedAt,
    reportHash: report.reportHash,
    summary: report.summary,
    rejected: report.rejected,
    artifacts,
  };
}
