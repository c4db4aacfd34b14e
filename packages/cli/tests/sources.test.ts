/**
 * Tests for sources.ts: export parsing and the file-backed source.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { writeFileSync } from "node:fs";
import { join } from "node:path";
import { SchemaValidationError } from "@stockrecon/reconciler";
import {
  FileRecordSource,
  formatFromPath,
  parseCsv,
  parseRecords,
  readSkuFile,
  sniffDelimiter,
} from "../src/sources.js";
import { makeTestDir, removeTestDir } from "./fixtures.js";

const WINDOW = { start: "2024-03-01T00:00:00.000Z", end: "2024-03-01T23:59:59.999Z" };

describe("sniffDelimiter", () => {
  it("picks the most frequent delimiter in the header", () => {
    expect(sniffDelimiter("a;b;c\n1,2,3")).toBe(";");
    expect(sniffDelimiter("a\tb")).toBe("\t");
    expect(sniffDelimiter("a|b|c")).toBe("|");
  });

  it("ignores delimiters inside quotes", () => {
    expect(sniffDelimiter('"a,b";c\n')).toBe(";");
  });

  it("falls back to a comma", () => {
    expect(sniffDelimiter("sku\nX1")).toBe(",");
  });
});

describe("parseCsv", () => {
  it("handles quotes, doubled quotes, CRLF and blank lines", () => {
    const text = 'a,b\r\n"x, y","say ""hi"""\n\n1,2\n';
    expect(parseCsv(text, ",")).toEqual([
      ["a", "b"],
      ["x, y", 'say "hi"'],
      ["1", "2"],
    ]);
  });

  it("keeps line breaks inside quoted fields", () => {
    expect(parseCsv('"a\nb",c', ",")).toEqual([["a\nb", "c"]]);
  });

  it("keeps a trailing empty quoted field", () => {
    expect(parseCsv('a,""', ",")).toEqual([["a", ""]]);
  });

  it("rejects an unterminated quote", () => {
    expect(() => parseCsv('"abc', ",")).toThrow("Unterminated quoted field");
  });
});

describe("parseRecords", () => {
  it("maps CSV rows onto trimmed header names", () => {
    const text = "\uFEFFsku ; qty\nX1;5\nX2\n";
    expect(parseRecords(text, "csv")).toEqual([{ sku: "X1", qty: "5" }, { sku: "X2" }]);
  });

  it("rejects a CSV row with extra fields", () => {
    expect(() => parseRecords("a,b\n1,2,3\n", "csv")).toThrow(
      "CSV line 2 has 3 fields, header has 2",
    );
  });

  it("returns nothing for an empty CSV", () => {
    expect(parseRecords("", "csv")).toEqual([]);
  });

  it("accepts a JSON array or a records envelope", () => {
    expect(parseRecords('[{"a":1}]', "json")).toEqual([{ a: 1 }]);
    expect(parseRecords('{"records":[{"a":2}]}', "json")).toEqual([{ a: 2 }]);
  });

  it("rejects other JSON documents", () => {
    expect(() => parseRecords('{"rows":[]}', "json")).toThrow(
      "JSON source must be an array or an object with a records array",
    );
  });

  it("reads NDJSON, skipping blank lines", () => {
    expect(parseRecords('{"a":1}\n\n{"a":2}\n', "ndjson")).toEqual([{ a: 1 }, { a: 2 }]);
  });

  it("names the NDJSON line that fails", () => {
    expect(() => parseRecords('{"a":1}\nnot json', "ndjson")).toThrow(/^NDJSON line 2: /);
  });
});

describe("formatFromPath", () => {
  it("infers the format from the extension", () => {
    expect(formatFromPath("exports/oms.JSONL")).toBe("ndjson");
    expect(formatFromPath("dwh.tsv")).toBe("csv");
    expect(formatFromPath("dwh.json")).toBe("json");
  });

  it("rejects an unknown extension", () => {
    expect(() => formatFromPath("dwh.xlsx")).toThrow(SchemaValidationError);
  });
});

describe("FileRecordSource", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTestDir();
  });

  afterEach(() => {
    removeTestDir(dir);
  });

  it("reads records from an export", async () => {
    const path = join(dir, "oms.ndjson");
    writeFileSync(path, '{"article":"X1"}\n{"article":"X2"}\n');
    const source = new FileRecordSource("oms", path);
    expect(source.format).toBe("ndjson");
    const records = await source.fetch(WINDOW, new AbortController().signal);
    expect(records).toEqual([{ article: "X1" }, { article: "X2" }]);
  });

  it("uses an explicit format over the extension", async () => {
    const path = join(dir, "oms.dat");
    writeFileSync(path, "article\nX1\n");
    const source = new FileRecordSource("oms", path, "csv");
    expect(await source.fetch(WINDOW, new AbortController().signal)).toEqual([
      { article: "X1" },
    ]);
  });

  it("names the source field when the format cannot be inferred", () => {
    try {
      new FileRecordSource("oms", join(dir, "oms.dat"));
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(SchemaValidationError);
      expect(err).toMatchObject({ field: "sources.oms.format" });
    }
  });

  it("stops when the signal is already aborted", async () => {
    const path = join(dir, "oms.json");
    writeFileSync(path, "[]");
    const source = new FileRecordSource("oms", path);
    await expect(source.fetch(WINDOW, AbortSignal.abort())).rejects.toMatchObject({
      name: "AbortError",
    });
  });
});

describe("readSkuFile", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTestDir();
  });

  afterEach(() => {
    removeTestDir(dir);
  });

  it("reads the sku column of a CSV, dropping duplicates", async () => {
    const path = join(dir, "skus.csv");
    writeFileSync(path, "name,sku\nWidget,X1\nGadget, X2 \nWidget,X1\n");
    expect(await readSkuFile(path)).toEqual(["X1", "X2"]);
  });

  it("reads a plain list, skipping comments and blank lines", async () => {
    const path = join(dir, "skus.txt");
    writeFileSync(path, "# weekly scope\nX1\n\nX2\nX1\n");
    expect(await readSkuFile(path)).toEqual(["X1", "X2"]);
  });

  it("reports a missing file as a configuration error", async () => {
    await expect(readSkuFile(join(dir, "none.csv"))).rejects.toMatchObject({
      name: "SchemaValidationError",
      field: "sku_file",
    });
  });
});
