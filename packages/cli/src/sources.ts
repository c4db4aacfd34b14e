/**
 * Record sources.
 *
 * A RecordSource hands the engine raw records for a snapshot window. How
 * the records are obtained (operational API, warehouse query, file
 * export) is the source's business; the engine only sees plain objects.
 *
 * FileRecordSource reads exports from disk:
 * - JSON: an array of records, or an object with a `records` array
 * - NDJSON: one record per line
 * - CSV: header row, delimiter sniffed from `,` `;` tab `|`
 */

import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import { SchemaValidationError } from "@stockrecon/reconciler";
import type { SnapshotWindow } from "@stockrecon/types";

export type SourceFormat = "json" | "ndjson" | "csv";

export interface RecordSource {
  readonly label: string;
  /**
   * Fetch raw records for the window. Implementations should stop work
   * when `signal` aborts.
   */
  fetch(window: SnapshotWindow, signal: AbortSignal): Promise<readonly unknown[]>;
}

// =============================================================================
// Parsing
// =============================================================================

const DELIMITERS = [",", ";", "\t", "|"] as const;

/** Pick the candidate delimiter that occurs most often in the header line. */
export function sniffDelimiter(text: string): string {
  let header = "";
  let quoted = false;
  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);
    if (ch === '"') quoted = !quoted;
    if (!quoted && (ch === "\n" || ch === "\r")) break;
    header += ch;
  }

  let best = ",";
  let bestCount = 0;
  for (const candidate of DELIMITERS) {
    let count = 0;
    let inQuotes = false;
    for (const ch of header) {
      if (ch === '"') inQuotes = !inQuotes;
      else if (!inQuotes && ch === candidate) count += 1;
    }
    if (count > bestCount) {
      best = candidate;
      bestCount = count;
    }
  }
  return best;
}

/**
 * Split CSV text into rows of fields. Quoted fields may contain the
 * delimiter, doubled quotes and line breaks. Blank lines are dropped.
 *
 * @throws {Error} on an unterminated quoted field
 */
export function parseCsv(text: string, delimiter: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = "";
  let quoted = false;
  let fieldQuoted = false;

  const endRow = (): void => {
    row.push(field);
    if (!(row.length === 1 && field === "" && !fieldQuoted)) rows.push(row);
    row = [];
    field = "";
    fieldQuoted = false;
  };

  let i = 0;
  while (i < text.length) {
    const ch = text.charAt(i);
    if (quoted) {
      if (ch === '"' && text.charAt(i + 1) === '"') {
        field += '"';
        i += 2;
        continue;
      }
      if (ch === '"') quoted = false;
      else field += ch;
      i += 1;
      continue;
    }

    if (ch === '"' && field === "") {
      quoted = true;
      fieldQuoted = true;
    } else if (ch === delimiter) {
      row.push(field);
      field = "";
      fieldQuoted = false;
    } else if (ch === "\r" || ch === "\n") {
      endRow();
      if (ch === "\r" && text.charAt(i + 1) === "\n") i += 1;
    } else {
      field += ch;
    }
    i += 1;
  }

  if (quoted) throw new Error("Unterminated quoted field");
  if (field !== "" || fieldQuoted || row.length > 0) endRow();
  return rows;
}

function csvRecords(text: string): Record<string, string>[] {
  const body = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
  const [header, ...rows] = parseCsv(body, sniffDelimiter(body));
  if (!header) return [];

  const columns = header.map((h) => h.trim());
  return rows.map((cells, i) => {
    if (cells.length > columns.length) {
      throw new Error(`CSV line ${i + 2} has ${cells.length} fields, header has ${columns.length}`);
    }
    const record: Record<string, string> = {};
    cells.forEach((cell, j) => {
      const column = columns[j];
      if (column !== undefined) record[column] = cell;
    });
    return record;
  });
}

function jsonRecords(text: string): unknown[] {
  const document: unknown = JSON.parse(text);
  if (Array.isArray(document)) return document;
  if (document !== null && typeof document === "object" && "records" in document) {
    const { records } = document;
    if (Array.isArray(records)) return records;
  }
  throw new Error("JSON source must be an array or an object with a records array");
}

function ndjsonRecords(text: string): unknown[] {
  const records: unknown[] = [];
  text.split(/\r?\n/).forEach((line, i) => {
    if (line.trim() === "") return;
    try {
      records.push(JSON.parse(line));
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new Error(`NDJSON line ${i + 1}: ${reason}`, { cause: err });
    }
  });
  return records;
}

/**
 * Parse an export into raw records.
 *
 * @throws {Error} when the text does not match the format
 */
export function parseRecords(text: string, format: SourceFormat): unknown[] {
  switch (format) {
    case "json":
      return jsonRecords(text);
    case "ndjson":
      return ndjsonRecords(text);
    case "csv":
      return csvRecords(text);
  }
}

const EXTENSIONS: Readonly<Record<string, SourceFormat>> = {
  ".json": "json",
  ".ndjson": "ndjson",
  ".jsonl": "ndjson",
  ".csv": "csv",
  ".tsv": "csv",
  ".txt": "csv",
};

/**
 * Infer the format from a file extension.
 *
 * @throws {SchemaValidationError} for an unrecognised extension
 */
export function formatFromPath(path: string, field = "format"): SourceFormat {
  const format = EXTENSIONS[extname(path).toLowerCase()];
  if (format === undefined) {
    throw new SchemaValidationError(
      `Cannot infer the format of ${path}; set it to json, ndjson or csv`,
      { field, reason: "invalid-mapping" },
    );
  }
  return format;
}

// =============================================================================
// File source
// =============================================================================

export class FileRecordSource implements RecordSource {
  readonly label: string;
  readonly path: string;
  readonly format: SourceFormat;

  constructor(label: string, path: string, format?: SourceFormat) {
    this.label = label;
    this.path = path;
    this.format = format ?? formatFromPath(path, `sources.${label}.format`);
  }

  async fetch(_window: SnapshotWindow, signal: AbortSignal): Promise<readonly unknown[]> {
    const text = await readFile(this.path, { encoding: "utf8", signal });
    return parseRecords(text, this.format);
  }
}

// =============================================================================
// SKU lists
// =============================================================================

/**
 * Read a SKU list: a CSV whose header names `column`, or one SKU per
 * line (blank lines and `#` comments skipped). Order kept, duplicates dropped.
 *
 * @throws {SchemaValidationError} when the file cannot be read
 */
export async function readSkuFile(path: string, column = "sku"): Promise<string[]> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new SchemaValidationError(`Cannot read SKU file ${path}: ${reason}`, {
      field: "sku_file",
      reason: "missing",
    });
  }

  const body = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
  const rows = parseCsv(body, sniffDelimiter(body));
  const header = rows[0]?.map((h) => h.trim()) ?? [];
  const index = header.indexOf(column);

  const values =
    index >= 0
      ? rows.slice(1).map((cells) => (cells[index] ?? "").trim())
      : body
          .split(/\r?\n/)
          .map((line) => line.trim())
          .filter((line) => !line.startsWith("#"));

  return [...new Set(values.filter((v) => v !== ""))];
}
