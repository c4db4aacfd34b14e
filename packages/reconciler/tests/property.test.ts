/**
 * Property-Based Tests for @stockrecon/reconciler
 *
 * Uses fast-check to verify invariants that must hold for ANY input:
 *
 * 1. Key coverage (every key lands in exactly one bucket)
 * 2. Tolerance symmetry (swapping sources never changes a classification)
 * 3. Determinism (input order never changes the diff or its hash)
 * 4. Zero base (pct delta is never NaN or infinite)
 * 5. Rounding consistency (sub-precision noise never creates a mismatch)
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { METRIC_ORDER, PCT_UNDEFINED } from "@stockrecon/types";
import { ToleranceComparator, isWithinTolerance } from "../src/comparator.js";
import { roundQuantity } from "../src/quantity.js";
import { InventoryReconciler } from "../src/reconciler.js";
import type { ReconcilerConfig } from "../src/reconciler.js";
import { EXACT_TOLERANCE } from "../src/types.js";
import type { SourceDefinition, ToleranceMode } from "../src/types.js";
import { OMS } from "./helpers.js";

// =============================================================================
// Arbitraries
// =============================================================================

const LEFT: SourceDefinition = { label: "left", mapping: OMS.mapping };
const RIGHT: SourceDefinition = { label: "right", mapping: OMS.mapping };

interface Row {
  readonly article: string;
  readonly plant: string;
  readonly snapshot_ts: string;
  readonly on_hand: number;
  readonly reserved: number;
}

/** A row on 2024-03-01 for a small key space, so keys collide often. */
const arbRow: fc.Arbitrary<Row> = fc
  .record({
    article: fc.constantFrom("A", "B", "C", "D"),
    plant: fc.constantFrom("L1", "L2", "L3"),
    hour: fc.integer({ min: 0, max: 23 }),
    on_hand: fc.integer({ min: 0, max: 500 }),
    reserved: fc.integer({ min: 0, max: 50 }),
  })
  .map(({ hour, ...rest }) => ({
    ...rest,
    snapshot_ts: `2024-03-01T${String(hour).padStart(2, "0")}:00:00Z`,
  }));

const arbRows = fc.array(arbRow, { maxLength: 30 });

const arbMode = fc.constantFrom<ToleranceMode>("pct", "abs", "abs_or_pct", "abs_and_pct");

const arbTolerance = fc.record({
  abs: fc.double({ min: 0, max: 100, noNaN: true }),
  pct: fc.double({ min: 0, max: 1, noNaN: true }),
  mode: arbMode,
});

const arbQuantity = fc.double({ min: -1e6, max: 1e6, noNaN: true });

const arbCount = fc.integer({ min: -1_000_000, max: 1_000_000 });

function run(a: readonly Row[], b: readonly Row[], overrides: Partial<ReconcilerConfig> = {}) {
  return new InventoryReconciler({
    sources: { a: LEFT, b: RIGHT },
    window: { date: "2024-03-01" },
    tolerance: { defaults: { abs: 0, pct: 0.05, mode: "pct" } },
    clock: () => 0,
    ...overrides,
  }).reconcile({ a, b });
}

function keysOf(rows: readonly Row[]): Set<string> {
  return new Set(rows.map((r) => `${r.article}@${r.plant}`));
}

// =============================================================================
// 1. Key coverage
// =============================================================================

describe("property: key coverage", () => {
  it("every key of either source is classified exactly once", () => {
    fc.assert(
      fc.property(arbRows, arbRows, (a, b) => {
        const report = run(a, b);
        const s = report.summary;
        const keysA = keysOf(a);
        const keysB = keysOf(b);
        const union = new Set([...keysA, ...keysB]);

        expect(s.totalKeys).toBe(union.size);
        expect(s.matchedWithinTolerance + s.mismatched + s.sourceAOnly + s.sourceBOnly).toBe(
          s.totalKeys,
        );
        expect(s.sourceAOnly).toBe([...keysA].filter((k) => !keysB.has(k)).length);
        expect(s.sourceBOnly).toBe([...keysB].filter((k) => !keysA.has(k)).length);

        const onlyRows = report.diff.filter(
          (r) => r.status === "source-a-only" || r.status === "source-b-only",
        );
        expect(onlyRows).toHaveLength(s.sourceAOnly + s.sourceBOnly);
      }),
    );
  });
});

// =============================================================================
// 2. Tolerance symmetry
// =============================================================================

describe("property: tolerance symmetry", () => {
  it("isWithinTolerance(a, b) equals isWithinTolerance(b, a)", () => {
    fc.assert(
      fc.property(arbQuantity, arbQuantity, arbTolerance, (a, b, tolerance) => {
        expect(isWithinTolerance(a, b, tolerance)).toBe(isWithinTolerance(b, a, tolerance));
      }),
    );
  });

  it("swapping the sources swaps only the source-only buckets", () => {
    fc.assert(
      fc.property(arbRows, arbRows, (a, b) => {
        const forward = run(a, b).summary;
        const backward = run(b, a).summary;
        expect(backward.matchedWithinTolerance).toBe(forward.matchedWithinTolerance);
        expect(backward.mismatched).toBe(forward.mismatched);
        expect(backward.sourceAOnly).toBe(forward.sourceBOnly);
        expect(backward.sourceBOnly).toBe(forward.sourceAOnly);
      }),
    );
  });
});

// =============================================================================
// 3. Determinism
// =============================================================================

describe("property: determinism", () => {
  it("shuffling either input leaves the diff and hash unchanged", () => {
    const arbCase = fc.tuple(arbRows, arbRows).chain(([a, b]) =>
      fc.tuple(
        fc.constant(a),
        fc.constant(b),
        fc.shuffledSubarray(a, { minLength: a.length, maxLength: a.length }),
        fc.shuffledSubarray(b, { minLength: b.length, maxLength: b.length }),
      ),
    );

    fc.assert(
      fc.property(arbCase, ([a, b, shuffledA, shuffledB]) => {
        const original = run(a, b);
        const shuffled = run(shuffledA, shuffledB);
        expect(shuffled.diff).toEqual(original.diff);
        expect(shuffled.reportHash).toBe(original.reportHash);
      }),
    );
  });
});

// =============================================================================
// 4. Zero base
// =============================================================================

describe("property: zero base", () => {
  const comparator = new ToleranceComparator({
    tolerance: EXACT_TOLERANCE,
    missingMetricPolicy: "flag_mismatch",
    precision: null,
  });

  it("pct delta is PCT_UNDEFINED exactly when A is zero", () => {
    fc.assert(
      fc.property(fc.constantFrom(...METRIC_ORDER), arbCount, arbCount, (metric, a, b) => {
        const c = comparator.compareValues(metric, a, b);
        if (a === 0) {
          expect(c.pctDelta).toBe(PCT_UNDEFINED);
        } else {
          expect(typeof c.pctDelta).toBe("number");
          expect(Number.isFinite(c.pctDelta)).toBe(true);
        }
      }),
    );
  });
});

// =============================================================================
// 5. Rounding consistency
// =============================================================================

describe("property: rounding consistency", () => {
  it("rounding is symmetric around zero", () => {
    fc.assert(
      fc.property(arbQuantity, fc.integer({ min: 0, max: 6 }), (x, precision) => {
        expect(roundQuantity(-x, precision) + roundQuantity(x, precision)).toBe(0);
      }),
    );
  });

  it("noise below the configured precision never produces a mismatch", () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 0, max: 1_000_000 }),
        fc.double({ min: -0.0004, max: 0.0004, noNaN: true }),
        (value, noise) => {
          const row = (onHand: number): Row => ({
            article: "A",
            plant: "L1",
            snapshot_ts: "2024-03-01T10:00:00Z",
            on_hand: onHand,
            reserved: 0,
          });
          const report = run([row(value)], [row(value + noise)], {
            tolerance: EXACT_TOLERANCE,
            precision: 3,
          });
          expect(report.summary.allReconciled).toBe(true);
          expect(report.diff).toEqual([]);
        },
      ),
    );
  });
});
