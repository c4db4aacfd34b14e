/**
 * Tests for summary.ts: the stdout summary line and summary document.
 */

import { describe, it, expect } from "vitest";
import { InventoryReconciler } from "@stockrecon/reconciler";
import type { ReconciliationReport } from "@stockrecon/types";
import { parseRunConfig, toReconcilerConfig } from "../src/config.js";
import { parseRecords } from "../src/sources.js";
import {
  formatFailure,
  formatFailureLine,
  formatSummaryLine,
  summaryDocument,
} from "../src/summary.js";
import { DWH_CSV, OMS_ROWS, RUN_CONFIG } from "./fixtures.js";

const ARTIFACTS = {
  diff: "out/inventory-diff_2024-03-01.csv",
  summary: "out/inventory-summary_2024-03-01.json",
};

function report(overrides: Record<string, unknown> = {}): ReconciliationReport {
  const config = parseRunConfig({ ...RUN_CONFIG, ...overrides }, "/srv/recon");
  const reconciler = new InventoryReconciler(toReconcilerConfig(config, [], { clock: () => 0 }));
  return reconciler.reconcile({ a: OMS_ROWS, b: parseRecords(DWH_CSV, "csv") });
}

describe("formatSummaryLine", () => {
  it("reports findings as key=value pairs", () => {
    expect(formatSummaryLine(report(), ARTIFACTS, { color: false })).toBe(
      "stockrecon status=FINDINGS window=2024-03-01T00:00:00.000Z..2024-03-01T23:59:59.999Z " +
        "keys=2 matched=0 mismatched=1 oms_only=1 dwh_only=0 missing_metrics=0 rejected=0 " +
        "ambiguous=0 diff_rows=2 duration_ms=0 artifact=out/inventory-diff_2024-03-01.csv",
    );
  });

  it("reports a clean run as OK", () => {
    const clean = report({ tolerance: 0.2, scope: { skus: ["X1"] } });
    expect(formatSummaryLine(clean, ARTIFACTS, { color: false })).toBe(
      "stockrecon status=OK window=2024-03-01T00:00:00.000Z..2024-03-01T23:59:59.999Z " +
        "keys=1 matched=1 mismatched=0 oms_only=0 dwh_only=0 missing_metrics=0 rejected=0 " +
        "ambiguous=0 diff_rows=0 duration_ms=0 artifact=out/inventory-diff_2024-03-01.csv",
    );
  });

  it("quotes values containing spaces", () => {
    const line = formatSummaryLine(
      report(),
      { diff: "my out/diff.csv", summary: "my out/summary.json" },
      { color: false },
    );
    expect(line.endsWith(' artifact="my out/diff.csv"')).toBe(true);
  });
});

describe("formatFailureLine", () => {
  it("quotes the error message as JSON", () => {
    expect(formatFailureLine("CONFIG_ERROR", 'bad "tolerance"', { color: false })).toBe(
      'stockrecon status=CONFIG_ERROR error="bad \\"tolerance\\""',
    );
  });
});

describe("formatFailure", () => {
  it("switches to a JSON object under --json", () => {
    expect(formatFailure("FETCH_ERROR", "timed out", { json: true, color: false })).toBe(
      '{"status":"FETCH_ERROR","error":"timed out"}',
    );
    expect(formatFailure("FETCH_ERROR", "timed out", { json: false, color: false })).toBe(
      'stockrecon status=FETCH_ERROR error="timed out"',
    );
  });
});

describe("summaryDocument", () => {
  it("carries the counts, hash and artifact paths", () => {
    const r = report();
    const doc = summaryDocument(r, ARTIFACTS);
    expect(doc["status"]).toBe("FINDINGS");
    expect(doc["reportHash"]).toBe(r.reportHash);
    expect(doc["window"]).toEqual({
      start: "2024-03-01T00:00:00.000Z",
      end: "2024-03-01T23:59:59.999Z",
    });
    expect(doc["artifacts"]).toEqual(ARTIFACTS);
    expect(doc["summary"]).toBe(r.summary);
    expect(doc).not.toHaveProperty("diff");
  });
});
