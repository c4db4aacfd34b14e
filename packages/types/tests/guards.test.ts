/**
 * Runtime type guard tests for @stockrecon/types
 *
 * Validates that guards narrow correctly for valid inputs
 * and reject malformed inputs at system boundaries.
 */
import { describe, it, expect } from "vitest";
import {
  isMetricName,
  isDiffStatus,
  isInventoryKey,
  isCanonicalRecord,
  isDiffRow,
} from "../src/guards.js";
import { PCT_UNDEFINED } from "../src/reconciliation.js";

function record(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    sku: "X1",
    locationId: "L1",
    asOf: "2024-03-01T10:00:00.000Z",
    asOfEpochMs: Date.UTC(2024, 2, 1, 10),
    onHand: 10,
    reserved: 2,
    available: 8,
    damaged: 0,
    availableDerived: true,
    source: "oms",
    recordRef: 0,
    ...overrides,
  };
}

// =============================================================================
// Scalars
// =============================================================================

describe("isMetricName", () => {
  it("accepts every declared metric", () => {
    for (const m of ["on_hand", "reserved", "available", "damaged"]) {
      expect(isMetricName(m)).toBe(true);
    }
  });

  it("rejects camelCase field names and non-strings", () => {
    expect(isMetricName("onHand")).toBe(false);
    expect(isMetricName(1)).toBe(false);
    expect(isMetricName(null)).toBe(false);
  });
});

describe("isDiffStatus", () => {
  it("accepts diff statuses", () => {
    expect(isDiffStatus("source-a-only")).toBe(true);
    expect(isDiffStatus("missing-metric")).toBe(true);
  });

  it("rejects within-tolerance, which never produces a row", () => {
    expect(isDiffStatus("within-tolerance")).toBe(false);
  });
});

// =============================================================================
// Records
// =============================================================================

describe("isInventoryKey", () => {
  it("accepts a sku and location", () => {
    expect(isInventoryKey({ sku: "X1", locationId: "L1" })).toBe(true);
  });

  it("rejects empty identifiers", () => {
    expect(isInventoryKey({ sku: "", locationId: "L1" })).toBe(false);
    expect(isInventoryKey({ sku: "X1", locationId: "" })).toBe(false);
  });

  it("rejects null and primitives", () => {
    expect(isInventoryKey(null)).toBe(false);
    expect(isInventoryKey("X1@L1")).toBe(false);
  });
});

describe("isCanonicalRecord", () => {
  it("accepts a complete record", () => {
    expect(isCanonicalRecord(record())).toBe(true);
  });

  it("accepts unavailable quantities", () => {
    expect(isCanonicalRecord(record({ damaged: null, available: null }))).toBe(true);
  });

  it("rejects missing quantities", () => {
    const r = record();
    delete r.reserved;
    expect(isCanonicalRecord(r)).toBe(false);
  });

  it("rejects non-finite quantities", () => {
    expect(isCanonicalRecord(record({ onHand: Number.NaN }))).toBe(false);
    expect(isCanonicalRecord(record({ onHand: Infinity }))).toBe(false);
  });

  it("rejects string quantities", () => {
    expect(isCanonicalRecord(record({ onHand: "10" }))).toBe(false);
  });

  it("rejects a record without a timestamp", () => {
    expect(isCanonicalRecord(record({ asOfEpochMs: undefined }))).toBe(false);
  });
});

describe("isDiffRow", () => {
  const row = {
    sku: "X1",
    locationId: "L1",
    metric: "available",
    valueA: 8,
    valueB: 7,
    delta: -1,
    pctDelta: -0.125,
    status: "mismatch",
  };

  it("accepts a mismatch row", () => {
    expect(isDiffRow(row)).toBe(true);
  });

  it("accepts the percentage sentinel", () => {
    expect(isDiffRow({ ...row, valueA: 0, delta: 7, pctDelta: PCT_UNDEFINED })).toBe(true);
  });

  it("accepts a source-only row with an empty side", () => {
    expect(
      isDiffRow({ ...row, valueB: null, delta: null, pctDelta: null, status: "source-a-only" }),
    ).toBe(true);
  });

  it("rejects an unknown status", () => {
    expect(isDiffRow({ ...row, status: "ok" })).toBe(false);
  });
});
