/**
 * Tolerance Comparator
 *
 * Compares each configured metric of a matched key and decides whether
 * the difference is within tolerance.
 *
 * - delta = valueB - valueA
 * - pctDelta = delta / valueA, or PCT_UNDEFINED when valueA is 0
 * - Relative deviation used for the decision is |delta| / min(|a|, |b|),
 *   so swapping the sources never changes a classification
 * - When that basis is 0 the relative rule is undefined and the
 *   absolute rule decides
 *
 * Pure: identical inputs always produce identical comparisons.
 */

import { METRIC_FIELDS, METRIC_ORDER, PCT_UNDEFINED } from "@stockrecon/types";
import type { CanonicalRecord, MetricComparison, MetricName } from "@stockrecon/types";
import { SchemaValidationError } from "./errors.js";
import { roundQuantity } from "./quantity.js";
import type { MetricTolerance, MissingMetricPolicy, ToleranceConfig } from "./types.js";

export interface ComparatorOptions {
  readonly tolerance: ToleranceConfig;
  /** Metrics to compare. Default: all, in declared order */
  readonly metrics?: readonly MetricName[];
  readonly missingMetricPolicy: MissingMetricPolicy;
  /** Precision applied to deltas so float noise cannot create a mismatch */
  readonly precision: number | null;
}

/**
 * Decide whether one metric difference is within tolerance.
 * Symmetric in (a, b). `rawDelta` lets callers pass an already rounded delta.
 */
export function isWithinTolerance(
  a: number,
  b: number,
  tolerance: MetricTolerance,
  rawDelta: number = b - a,
): boolean {
  const delta = Math.abs(rawDelta);
  if (delta === 0) return true;

  const absOk = delta <= tolerance.abs;
  const basis = Math.min(Math.abs(a), Math.abs(b));
  if (basis === 0) return absOk;

  const pctOk = delta / basis <= tolerance.pct;
  switch (tolerance.mode) {
    case "pct":
      return pctOk;
    case "abs":
      return absOk;
    case "abs_or_pct":
      return absOk || pctOk;
    case "abs_and_pct":
      return absOk && pctOk;
  }
}

function validateTolerance(metric: string, tolerance: MetricTolerance): MetricTolerance {
  for (const bound of ["abs", "pct"] as const) {
    const value = tolerance[bound];
    if (!Number.isFinite(value) || value < 0) {
      throw new SchemaValidationError(
        `Tolerance ${metric}.${bound} must be a non-negative number, got ${value}`,
        { field: `tolerance.${metric}.${bound}`, reason: "invalid-mapping" },
      );
    }
  }
  return tolerance;
}

export class ToleranceComparator {
  private readonly metrics: readonly MetricName[];
  private readonly tolerances: ReadonlyMap<MetricName, MetricTolerance>;
  private readonly missingMetricPolicy: MissingMetricPolicy;
  private readonly precision: number | null;

  constructor(options: ComparatorOptions) {
    const selected = new Set(options.metrics ?? METRIC_ORDER);
    this.metrics = METRIC_ORDER.filter((m) => selected.has(m));
    if (this.metrics.length === 0) {
      throw new SchemaValidationError("At least one metric must be compared", {
        field: "metrics",
        reason: "invalid-mapping",
      });
    }

    const defaults = validateTolerance("defaults", options.tolerance.defaults);
    const tolerances = new Map<MetricName, MetricTolerance>();
    for (const metric of this.metrics) {
      const override = options.tolerance.metrics?.[metric];
      tolerances.set(metric, validateTolerance(metric, { ...defaults, ...override }));
    }

    this.tolerances = tolerances;
    this.missingMetricPolicy = options.missingMetricPolicy;
    this.precision = options.precision;
  }

  /** Metrics this comparator evaluates, in declared order. */
  getMetrics(): readonly MetricName[] {
    return this.metrics;
  }

  toleranceFor(metric: MetricName): MetricTolerance {
    return this.tolerances.get(metric) ?? { abs: 0, pct: 0, mode: "pct" };
  }

  /** One comparison per configured metric, in declared order. */
  compare(a: CanonicalRecord, b: CanonicalRecord): readonly MetricComparison[] {
    return this.metrics.map((metric) => {
      const field = METRIC_FIELDS[metric];
      return this.compareValues(metric, a[field], b[field]);
    });
  }

  compareValues(
    metric: MetricName,
    valueA: number | null,
    valueB: number | null,
  ): MetricComparison {
    if (valueA === null || valueB === null) {
      const withinTolerance = this.missingMetricPolicy === "ignore";
      return {
        metric,
        status: "missing-metric",
        valueA,
        valueB,
        delta: null,
        pctDelta: null,
        withinTolerance,
        missingSide: valueA === null && valueB === null ? "both" : valueA === null ? "a" : "b",
      };
    }

    const delta = roundQuantity(valueB - valueA, this.precision);
    const pctDelta = valueA === 0 ? PCT_UNDEFINED : delta / valueA;
    const withinTolerance = isWithinTolerance(valueA, valueB, this.toleranceFor(metric), delta);

    return {
      metric,
      status: withinTolerance ? "within-tolerance" : "mismatch",
      valueA,
      valueB,
      delta,
      pctDelta,
      withinTolerance,
    };
  }
}
