/**
 * Diff artifact rendering.
 *
 * Both formats are pure functions of the ordered diff, so identical runs
 * produce byte-identical files.
 *
 * CSV:    sku,location_id,metric,<a>_value,<b>_value,delta,pct_delta,status
 * NDJSON: one object per row with the same keys, in the same order
 *
 * Empty cells (CSV) and nulls (NDJSON) stand for a side with no value;
 * a zero base renders as the literal PCT_UNDEFINED.
 */

import type { DiffRow } from "@stockrecon/types";

export type DiffFormat = "csv" | "ndjson";

export interface ColumnLabels {
  readonly a: string;
  readonly b: string;
}

export function diffColumns(labels: ColumnLabels): readonly string[] {
  return [
    "sku",
    "location_id",
    "metric",
    `${labels.a}_value`,
    `${labels.b}_value`,
    "delta",
    "pct_delta",
    "status",
  ];
}

function cell(value: number | string | null): string {
  if (value === null) return "";
  return typeof value === "number" ? String(value) : value;
}

function escapeCsv(text: string): string {
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

function rowCells(row: DiffRow): readonly (number | string | null)[] {
  return [
    row.sku,
    row.locationId,
    row.metric,
    row.valueA,
    row.valueB,
    row.delta,
    row.pctDelta,
    row.status,
  ];
}

export function renderCsv(diff: readonly DiffRow[], labels: ColumnLabels): string {
  const lines = [diffColumns(labels).join(",")];
  for (const row of diff) {
    lines.push(rowCells(row).map((v) => escapeCsv(cell(v))).join(","));
  }
  return lines.join("\n") + "\n";
}

export function renderNdjson(diff: readonly DiffRow[], labels: ColumnLabels): string {
  const columns = diffColumns(labels);
  const lines = diff.map((row) => {
    const cells = rowCells(row);
    const entry: Record<string, number | string | null> = {};
    columns.forEach((column, i) => {
      entry[column] = cells[i] ?? null;
    });
    return JSON.stringify(entry);
  });
  return lines.length > 0 ? lines.join("\n") + "\n" : "";
}

export function renderDiff(
  diff: readonly DiffRow[],
  labels: ColumnLabels,
  format: DiffFormat,
): string {
  return format === "csv" ? renderCsv(diff, labels) : renderNdjson(diff, labels);
}
