/**
 * Aggregator
 *
 * Accumulates joined keys and their comparisons into a run summary and
 * an ordered diff. Every key lands in exactly one of four buckets:
 * matched within tolerance, matched with a mismatch, A-only, B-only.
 */

import { METRIC_FIELDS, METRIC_ORDER } from "@stockrecon/types";
import type {
  DiffRow,
  JoinedKey,
  MetricComparison,
  MetricName,
  MetricTotals,
  ReconciliationSummary,
  SourceRecordCounts,
} from "@stockrecon/types";
import { ReconcilerError } from "./errors.js";
import { compareKeys } from "./join-engine.js";

export interface AggregatorOptions {
  /** Metric reported on the single row of a source-only key. Default "available" */
  readonly headlineMetric?: MetricName;
}

export interface AggregateContext {
  readonly records: { readonly a: SourceRecordCounts; readonly b: SourceRecordCounts };
  readonly ambiguousSnapshots: number;
  readonly durationMs: number;
}

export interface AggregateResult {
  readonly summary: ReconciliationSummary;
  readonly diff: readonly DiffRow[];
}

const METRIC_RANK = new Map<MetricName, number>(METRIC_ORDER.map((m, i) => [m, i]));

/** Diff order: sku, location, then declared metric order. */
export function compareDiffRows(x: DiffRow, y: DiffRow): number {
  return (
    compareKeys(x, y) ||
    (METRIC_RANK.get(x.metric) ?? 0) - (METRIC_RANK.get(y.metric) ?? 0)
  );
}

export class Aggregator {
  private readonly headlineMetric: MetricName;

  private totalKeys = 0;
  private matchedWithinTolerance = 0;
  private mismatched = 0;
  private sourceAOnly = 0;
  private sourceBOnly = 0;
  private missingMetricCount = 0;
  private readonly absDelta = new Map<MetricName, number>();
  private readonly metricMismatches = new Map<MetricName, number>();
  private readonly rows: DiffRow[] = [];

  constructor(options: AggregatorOptions = {}) {
    this.headlineMetric = options.headlineMetric ?? "available";
  }

  /** Record one joined key. `comparisons` is ignored for source-only keys. */
  add(joined: JoinedKey, comparisons: readonly MetricComparison[] = []): void {
    this.totalKeys += 1;
    const { sku, locationId } = joined.key;

    if (joined.state === "source-a-only" || joined.state === "source-b-only") {
      const aOnly = joined.state === "source-a-only";
      const record = joined.state === "source-a-only" ? joined.a : joined.b;
      const value = record[METRIC_FIELDS[this.headlineMetric]];
      if (aOnly) this.sourceAOnly += 1;
      else this.sourceBOnly += 1;

      this.rows.push({
        sku,
        locationId,
        metric: this.headlineMetric,
        valueA: aOnly ? value : null,
        valueB: aOnly ? null : value,
        delta: null,
        pctDelta: null,
        status: joined.state,
      });
      return;
    }

    let findings = 0;
    for (const c of comparisons) {
      if (c.status === "missing-metric") this.missingMetricCount += 1;
      if (c.delta !== null) {
        this.absDelta.set(c.metric, (this.absDelta.get(c.metric) ?? 0) + Math.abs(c.delta));
      }
      if (c.withinTolerance) continue;

      findings += 1;
      this.metricMismatches.set(c.metric, (this.metricMismatches.get(c.metric) ?? 0) + 1);
      this.rows.push({
        sku,
        locationId,
        metric: c.metric,
        valueA: c.valueA,
        valueB: c.valueB,
        delta: c.delta,
        pctDelta: c.pctDelta,
        status: c.status === "missing-metric" ? "missing-metric" : "mismatch",
      });
    }

    if (findings > 0) this.mismatched += 1;
    else this.matchedWithinTolerance += 1;
  }

  /**
   * Produce the summary and the ordered diff.
   *
   * @throws {ReconcilerError} INVARIANT_VIOLATION if the four key buckets
   *   do not add up to the key total
   */
  finish(context: AggregateContext): AggregateResult {
    const bucketed =
      this.matchedWithinTolerance + this.mismatched + this.sourceAOnly + this.sourceBOnly;
    if (bucketed !== this.totalKeys) {
      throw new ReconcilerError(
        "INVARIANT_VIOLATION",
        `Key buckets sum to ${bucketed} but ${this.totalKeys} keys were aggregated`,
      );
    }

    const totals = (metric: MetricName): MetricTotals => ({
      absDelta: this.absDelta.get(metric) ?? 0,
      mismatches: this.metricMismatches.get(metric) ?? 0,
    });
    const metricTotals: Record<MetricName, MetricTotals> = {
      on_hand: totals("on_hand"),
      reserved: totals("reserved"),
      available: totals("available"),
      damaged: totals("damaged"),
    };

    const diff = [...this.rows].sort(compareDiffRows);

    return {
      summary: {
        totalKeys: this.totalKeys,
        matchedWithinTolerance: this.matchedWithinTolerance,
        mismatched: this.mismatched,
        sourceAOnly: this.sourceAOnly,
        sourceBOnly: this.sourceBOnly,
        metricTotals,
        missingMetricCount: this.missingMetricCount,
        records: context.records,
        ambiguousSnapshots: context.ambiguousSnapshots,
        diffRowCount: diff.length,
        durationMs: context.durationMs,
        allReconciled: this.mismatched === 0 && this.sourceAOnly === 0 && this.sourceBOnly === 0,
      },
      diff,
    };
  }
}
