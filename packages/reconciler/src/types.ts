/**
 * @stockrecon/reconciler configuration types.
 *
 * These are the already-validated shapes the engine works with. Loading
 * and validating them from files or flags happens in @stockrecon/cli.
 */

import type { MetricName, QuantityField } from "@stockrecon/types";

// =============================================================================
// Field Mapping
// =============================================================================

/** Canonical fields a source column can map to. */
export type CanonicalField =
  | "sku"
  | "location_id"
  | "as_of"
  | "on_hand"
  | "reserved"
  | "available"
  | "damaged";

/** Quantities that may be absent from a source record. */
export type OptionalQuantityField = Extract<QuantityField, "reserved" | "damaged">;

/** What an absent quantity means for one source. */
export type MissingValuePolicy = "zero" | "unavailable";

/**
 * Declarative mapping from one source's record shape to the canonical
 * schema. Every canonical value can be traced back to exactly one column.
 */
export interface FieldMapping {
  /** Source column (or dotted path) → canonical field */
  readonly columns: Readonly<Record<string, CanonicalField>>;

  /** Multiplier applied to every quantity (e.g. 12 for cases → units). Default 1 */
  readonly unitFactor?: number;

  /** Zone of timestamps that carry no offset. Default: the reference zone */
  readonly timezone?: string;

  /**
   * Meaning of an absent reserved/damaged value. Default "zero".
   * on_hand is required; an absent available is derived.
   */
  readonly missing?: Partial<Record<OptionalQuantityField, MissingValuePolicy>>;

  /** Strings that mean "no value" (case-insensitive). Default ["N/A", "NULL"] */
  readonly unavailableMarkers?: readonly string[];
}

/** One side of the reconciliation. */
export interface SourceDefinition {
  /** Short label used in logs and artifact columns, e.g. "oms" */
  readonly label: string;
  readonly mapping: FieldMapping;
}

// =============================================================================
// Policies
// =============================================================================

/**
 * How `available` is obtained when a source may supply it.
 * - prefer_supplied: use the supplied value, derive only when absent
 * - always_derive: ignore the supplied value and compute on_hand - reserved - damaged
 */
export type AvailablePolicy = "prefer_supplied" | "always_derive";

export type MissingMetricPolicy = "flag_mismatch" | "ignore";

// =============================================================================
// Tolerance
// =============================================================================

/**
 * Which predicate(s) decide a metric is within tolerance.
 * - pct: relative deviation only
 * - abs: absolute delta only
 * - abs_or_pct: either suffices
 * - abs_and_pct: both required
 */
export type ToleranceMode = "pct" | "abs" | "abs_or_pct" | "abs_and_pct";

export interface MetricTolerance {
  readonly abs: number;
  readonly pct: number;
  readonly mode: ToleranceMode;
}

export interface ToleranceConfig {
  readonly defaults: MetricTolerance;
  readonly metrics?: Partial<Record<MetricName, Partial<MetricTolerance>>>;
}

export const EXACT_TOLERANCE: ToleranceConfig = {
  defaults: { abs: 0, pct: 0, mode: "pct" },
};

// =============================================================================
// Scope
// =============================================================================

/** Optional restriction of a run to some SKUs and/or locations. */
export interface ReconciliationScope {
  readonly skus?: readonly string[];
  readonly locationIds?: readonly string[];
}
