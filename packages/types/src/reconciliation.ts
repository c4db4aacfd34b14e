/**
 * Reconciliation Types
 *
 * Join results, per-metric comparisons, diff rows and run summaries.
 */

import type { CanonicalRecord, InventoryKey, MetricName } from "./inventory.js";

// =============================================================================
// Join
// =============================================================================

/** Outer-join state of one key. The three states are disjoint. */
export type JoinState = "matched" | "source-a-only" | "source-b-only";

export type JoinedKey =
  | {
      readonly state: "matched";
      readonly key: InventoryKey;
      readonly a: CanonicalRecord;
      readonly b: CanonicalRecord;
    }
  | {
      readonly state: "source-a-only";
      readonly key: InventoryKey;
      readonly a: CanonicalRecord;
    }
  | {
      readonly state: "source-b-only";
      readonly key: InventoryKey;
      readonly b: CanonicalRecord;
    };

// =============================================================================
// Comparison
// =============================================================================

/** Percentage delta sentinel for a zero base value. */
export const PCT_UNDEFINED = "PCT_UNDEFINED";
export type PctUndefined = typeof PCT_UNDEFINED;

export type ComparisonStatus =
  | "within-tolerance"
  | "mismatch"
  | "missing-metric";

/** One metric within a matched key. */
export interface MetricComparison {
  readonly metric: MetricName;
  readonly status: ComparisonStatus;
  readonly valueA: number | null;
  readonly valueB: number | null;

  /** valueB - valueA; null when either side is unavailable */
  readonly delta: number | null;

  /** delta / valueA, or PCT_UNDEFINED when valueA is zero */
  readonly pctDelta: number | PctUndefined | null;

  readonly withinTolerance: boolean;

  /** Set for `missing-metric` comparisons */
  readonly missingSide?: "a" | "b" | "both";
}

// =============================================================================
// Diff
// =============================================================================

export type DiffStatus =
  | "mismatch"
  | "missing-metric"
  | "source-a-only"
  | "source-b-only";

/** One row of the diff artifact. Only emitted for findings. */
export interface DiffRow extends InventoryKey {
  readonly metric: MetricName;
  readonly valueA: number | null;
  readonly valueB: number | null;
  readonly delta: number | null;
  readonly pctDelta: number | PctUndefined | null;
  readonly status: DiffStatus;
}

// =============================================================================
// Summary
// =============================================================================

/** Per-source record accounting. */
export interface SourceRecordCounts {
  readonly label: string;
  /** Raw records handed to the normalizer */
  readonly fetched: number;
  readonly normalized: number;
  /** Records that failed normalization and were skipped */
  readonly rejected: number;
  readonly outOfWindow: number;
  readonly outOfScope: number;
  /** Older snapshots of a key replaced by a later one */
  readonly superseded: number;
}

export interface MetricTotals {
  readonly absDelta: number;
  readonly mismatches: number;
}

export interface ReconciliationSummary {
  readonly totalKeys: number;
  readonly matchedWithinTolerance: number;
  readonly mismatched: number;
  readonly sourceAOnly: number;
  readonly sourceBOnly: number;

  readonly metricTotals: Readonly<Record<MetricName, MetricTotals>>;
  readonly missingMetricCount: number;

  readonly records: {
    readonly a: SourceRecordCounts;
    readonly b: SourceRecordCounts;
  };

  /** Keys where two snapshots shared the winning timestamp */
  readonly ambiguousSnapshots: number;

  readonly diffRowCount: number;
  readonly durationMs: number;
  readonly allReconciled: boolean;
}

// =============================================================================
// Report
// =============================================================================

export interface SnapshotWindow {
  /** Inclusive start, ISO-8601 in the reference zone */
  readonly start: string;
  /** Inclusive end, ISO-8601 in the reference zone */
  readonly end: string;
}

/** A record that could not be normalized. */
export interface NormalizationFailure {
  readonly source: string;
  readonly index: number;
  readonly recordKey: string;
  readonly field: string;
  readonly reason: string;
  readonly message: string;
}

export interface ReconciliationReport {
  readonly id: string;
  readonly window: SnapshotWindow;
  readonly referenceTimezone: string;
  readonly startedAt: string;
  readonly completedAt: string;
  readonly summary: ReconciliationSummary;
  readonly diff: readonly DiffRow[];
  readonly rejected: readonly NormalizationFailure[];

  /** SHA-256 of the canonical diff and counts (wall-clock fields excluded) */
  readonly reportHash: string;
}
