/**
 * Inventory Types
 *
 * Canonical inventory observations shared by every stockrecon package.
 *
 * Rules:
 * - A quantity of `null` means the source explicitly marked it unavailable.
 *   It is never the same thing as zero.
 * - Timestamps are carried twice: as an ISO-8601 string rendered in the
 *   run's reference time zone, and as epoch milliseconds for ordering.
 * - Records are immutable once normalized.
 */

/** Which side of the reconciliation a record came from. */
export type SourceSide = "a" | "b";

/** Quantity fields carried on every canonical record. */
export type QuantityField = "onHand" | "reserved" | "available" | "damaged";

/** Metric names as they appear in diff artifacts. */
export type MetricName = "on_hand" | "reserved" | "available" | "damaged";

/**
 * Declared metric order. Diff rows for one key are sorted by this,
 * never by the order comparisons happened to run in.
 */
export const METRIC_ORDER: readonly MetricName[] = [
  "on_hand",
  "reserved",
  "available",
  "damaged",
];

/** Metric name → canonical record field. */
export const METRIC_FIELDS: Readonly<Record<MetricName, QuantityField>> = {
  on_hand: "onHand",
  reserved: "reserved",
  available: "available",
  damaged: "damaged",
};

/** The join key: one SKU at one location. */
export interface InventoryKey {
  readonly sku: string;
  readonly locationId: string;
}

/**
 * One inventory observation for a (sku, location) at a point in time.
 */
export interface CanonicalRecord extends InventoryKey {
  /** ISO-8601 timestamp in the reference time zone */
  readonly asOf: string;

  /** Same instant as `asOf`, as epoch milliseconds */
  readonly asOfEpochMs: number;

  readonly onHand: number | null;
  readonly reserved: number | null;
  readonly available: number | null;
  readonly damaged: number | null;

  /** Whether `available` was derived rather than supplied by the source */
  readonly availableDerived: boolean;

  /** Source label (e.g. "oms", "dwh") */
  readonly source: string;

  /** Position of the raw record in its source batch */
  readonly recordRef: number;
}
