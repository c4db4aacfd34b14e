/**
 * InventoryReconciler: Top-level coordinator
 *
 * Runs the pipeline for one snapshot window:
 *   raw records → Normalizer → KeyedJoinEngine → ToleranceComparator → Aggregator
 *
 * Usage:
 *   const reconciler = new InventoryReconciler({ sources, window: { date: "2024-03-01" } });
 *   const report = reconciler.reconcile({ a: omsRows, b: dwhRows });
 *
 * Per-record normalization failures are skipped and counted (unless
 * strict). The report is produced even when records were skipped.
 */

import { createHash, randomUUID } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type {
  CanonicalRecord,
  DiffRow,
  JoinedKey,
  MetricComparison,
  MetricName,
  NormalizationFailure,
  ReconciliationReport,
  ReconciliationSummary,
  SnapshotWindow,
  SourceRecordCounts,
} from "@stockrecon/types";
import { Aggregator } from "./aggregator.js";
import { ToleranceComparator } from "./comparator.js";
import { SchemaValidationError } from "./errors.js";
import { KeyedJoinEngine } from "./join-engine.js";
import type { JoinSideStats, JoinStats } from "./join-engine.js";
import { Normalizer } from "./normalizer.js";
import { dateInZone, dayBounds, formatInZone, parseTimestamp, resolveZone } from "./time.js";
import type { TimeZone } from "./time.js";
import { EXACT_TOLERANCE } from "./types.js";
import type {
  AvailablePolicy,
  MissingMetricPolicy,
  ReconciliationScope,
  SourceDefinition,
  ToleranceConfig,
} from "./types.js";

// =============================================================================
// Configuration
// =============================================================================

/** A calendar day in the reference zone, or explicit inclusive bounds. */
export type WindowSpec =
  | { readonly date: string }
  | { readonly start: string; readonly end: string };

export type ReconcilerLogEvent =
  | { readonly kind: "record-rejected"; readonly failure: NormalizationFailure }
  | {
      readonly kind: "normalized";
      readonly source: string;
      readonly normalized: number;
      readonly rejected: number;
    }
  | { readonly kind: "joined"; readonly keys: number; readonly stats: JoinStats };

export interface ReconcilerConfig {
  readonly sources: { readonly a: SourceDefinition; readonly b: SourceDefinition };
  /** Default: today in the reference zone */
  readonly window?: WindowSpec;
  /** Default "UTC" */
  readonly referenceTimezone?: string;
  /** Default: exact match */
  readonly tolerance?: ToleranceConfig;
  /** Default: every metric */
  readonly metrics?: readonly MetricName[];
  /** Default true */
  readonly keyCaseSensitive?: boolean;
  /** Default "flag_mismatch" */
  readonly missingMetricPolicy?: MissingMetricPolicy;
  /** Default "prefer_supplied" */
  readonly availablePolicy?: AvailablePolicy;
  /** Decimal places for quantities; default null (no rounding) */
  readonly precision?: number | null;
  /** Abort on the first bad record instead of skipping it */
  readonly strict?: boolean;
  readonly scope?: ReconciliationScope;
  /** Metric shown on source-only rows. Default "available" */
  readonly headlineMetric?: MetricName;
  readonly log?: (event: ReconcilerLogEvent) => void;
  /** Millisecond clock. Default Date.now */
  readonly clock?: () => number;
}

export interface ReconciliationInput {
  readonly a: readonly unknown[];
  readonly b: readonly unknown[];
}

export interface StreamReconciliationInput {
  /** Raw records, sorted by join key */
  readonly a: AsyncIterable<unknown>;
  readonly b: AsyncIterable<unknown>;
}

/**
 * Resolve a window spec to inclusive epoch bounds in `zone`.
 *
 * @throws {SchemaValidationError} on unparseable or inverted bounds
 */
export function resolveWindow(
  spec: WindowSpec | undefined,
  zone: TimeZone,
  nowMs: number,
): { readonly startMs: number; readonly endMs: number } {
  if (spec === undefined) return dayBounds(dateInZone(nowMs, zone), zone);
  if ("date" in spec) return dayBounds(spec.date, zone);

  const startMs = parseTimestamp(spec.start, zone);
  const endMs = parseTimestamp(spec.end, zone);
  if (startMs === null || endMs === null) {
    throw new SchemaValidationError(
      `Invalid snapshot window "${spec.start}" .. "${spec.end}"`,
      { field: "window", reason: "invalid-timestamp" },
    );
  }
  if (startMs > endMs) {
    throw new SchemaValidationError("Snapshot window start is after its end", {
      field: "window",
      reason: "invalid-timestamp",
    });
  }
  return { startMs, endMs };
}

// =============================================================================
// Reconciler
// =============================================================================

export class InventoryReconciler {
  private readonly config: ReconcilerConfig;
  private readonly zone: TimeZone;
  private readonly window: { readonly startMs: number; readonly endMs: number };
  private readonly normalizerA: Normalizer;
  private readonly normalizerB: Normalizer;
  private readonly joinEngine: KeyedJoinEngine;
  private readonly comparator: ToleranceComparator;
  private readonly clock: () => number;

  /**
   * @throws {SchemaValidationError} for any configuration that cannot
   *   produce a valid comparison
   */
  constructor(config: ReconcilerConfig) {
    const precision = config.precision ?? null;
    if (precision !== null && (!Number.isInteger(precision) || precision < 0 || precision > 12)) {
      throw new SchemaValidationError(`Precision must be an integer 0-12, got ${precision}`, {
        field: "precision",
        reason: "invalid-mapping",
      });
    }
    if (config.sources.a.label === config.sources.b.label) {
      throw new SchemaValidationError(
        `Sources need distinct labels, both are "${config.sources.a.label}"`,
        { field: "label", reason: "invalid-mapping" },
      );
    }

    this.config = config;
    this.clock = config.clock ?? Date.now;
    this.zone = resolveZone(config.referenceTimezone ?? "UTC", "reference_timezone");
    this.window = resolveWindow(config.window, this.zone, this.clock());

    const normalizerOptions = {
      referenceZone: this.zone,
      precision,
      availablePolicy: config.availablePolicy ?? "prefer_supplied",
    } as const;
    this.normalizerA = new Normalizer(config.sources.a, normalizerOptions);
    this.normalizerB = new Normalizer(config.sources.b, normalizerOptions);

    this.joinEngine = new KeyedJoinEngine({
      window: this.window,
      keyCaseSensitive: config.keyCaseSensitive ?? true,
      scope: config.scope,
    });
    this.comparator = new ToleranceComparator({
      tolerance: config.tolerance ?? EXACT_TOLERANCE,
      metrics: config.metrics,
      missingMetricPolicy: config.missingMetricPolicy ?? "flag_mismatch",
      precision,
    });
  }

  /** Resolved snapshot window, epoch milliseconds. */
  getWindow(): { readonly startMs: number; readonly endMs: number } {
    return this.window;
  }

  /** Resolved snapshot window, rendered in the reference zone. */
  getSnapshotWindow(): SnapshotWindow {
    return {
      start: formatInZone(this.window.startMs, this.zone),
      end: formatInZone(this.window.endMs, this.zone),
    };
  }

  /**
   * Reconcile two in-memory batches of raw records.
   *
   * @param startedAtMs when the run began (e.g. before fetching), for the
   *   reported duration. Defaults to now.
   */
  reconcile(input: ReconciliationInput, startedAtMs: number = this.clock()): ReconciliationReport {
    const strict = this.config.strict ?? false;
    const normalizedA = this.normalizerA.normalizeAll(input.a, strict);
    const normalizedB = this.normalizerB.normalizeAll(input.b, strict);
    const failures = [...normalizedA.failures, ...normalizedB.failures];

    this.logNormalized(this.config.sources.a.label, normalizedA.records.length, normalizedA.failures);
    this.logNormalized(this.config.sources.b.label, normalizedB.records.length, normalizedB.failures);

    const joined = this.joinEngine.join(normalizedA.records, normalizedB.records);
    this.config.log?.({ kind: "joined", keys: joined.keys.length, stats: joined.stats });

    const aggregator = new Aggregator({ headlineMetric: this.config.headlineMetric });
    for (const entry of joined.keys) {
      aggregator.add(entry, this.compare(entry));
    }

    return this.buildReport(aggregator, joined.stats, startedAtMs, {
      a: { fetched: input.a.length, normalized: normalizedA.records.length },
      b: { fetched: input.b.length, normalized: normalizedB.records.length },
    }, failures);
  }

  /**
   * Reconcile two key-sorted streams in bounded memory. Only diff rows
   * and counters are retained.
   */
  async reconcileStream(
    input: StreamReconciliationInput,
    startedAtMs: number = this.clock(),
  ): Promise<ReconciliationReport> {
    const strict = this.config.strict ?? false;
    const counts = {
      a: { fetched: 0, normalized: 0 },
      b: { fetched: 0, normalized: 0 },
    };
    const failures: NormalizationFailure[] = [];

    const log = this.config.log;
    const normalize = (
      raws: AsyncIterable<unknown>,
      normalizer: Normalizer,
      side: { fetched: number; normalized: number },
    ): AsyncIterable<CanonicalRecord> =>
      (async function* () {
        for await (const raw of raws) {
          const result = normalizer.attempt(raw, side.fetched, strict);
          side.fetched += 1;
          if (result.ok) {
            side.normalized += 1;
            yield result.record;
          } else {
            failures.push(result.failure);
            log?.({ kind: "record-rejected", failure: result.failure });
          }
        }
      })();

    const join = this.joinEngine.joinSorted(
      normalize(input.a, this.normalizerA, counts.a),
      normalize(input.b, this.normalizerB, counts.b),
    );

    const aggregator = new Aggregator({ headlineMetric: this.config.headlineMetric });
    let keys = 0;
    for await (const entry of join.keys) {
      keys += 1;
      aggregator.add(entry, this.compare(entry));
    }

    const stats = join.stats();
    this.config.log?.({ kind: "joined", keys, stats });
    return this.buildReport(aggregator, stats, startedAtMs, counts, failures);
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private compare(entry: JoinedKey): readonly MetricComparison[] {
    return entry.state === "matched" ? this.comparator.compare(entry.a, entry.b) : [];
  }

  private logNormalized(
    source: string,
    normalized: number,
    failures: readonly NormalizationFailure[],
  ): void {
    const log = this.config.log;
    if (!log) return;
    for (const failure of failures) log({ kind: "record-rejected", failure });
    log({ kind: "normalized", source, normalized, rejected: failures.length });
  }

  private buildReport(
    aggregator: Aggregator,
    stats: JoinStats,
    startedAtMs: number,
    counts: {
      readonly a: { readonly fetched: number; readonly normalized: number };
      readonly b: { readonly fetched: number; readonly normalized: number };
    },
    failures: readonly NormalizationFailure[],
  ): ReconciliationReport {
    const { a, b } = this.config.sources;
    const sideCounts = (
      label: string,
      side: { readonly fetched: number; readonly normalized: number },
      joinStats: JoinSideStats,
    ): SourceRecordCounts => ({
      label,
      fetched: side.fetched,
      normalized: side.normalized,
      rejected: side.fetched - side.normalized,
      outOfWindow: joinStats.outOfWindow,
      outOfScope: joinStats.outOfScope,
      superseded: joinStats.superseded,
    });

    const completedAtMs = this.clock();
    const { summary, diff } = aggregator.finish({
      records: {
        a: sideCounts(a.label, counts.a, stats.a),
        b: sideCounts(b.label, counts.b, stats.b),
      },
      ambiguousSnapshots: stats.a.ambiguous + stats.b.ambiguous,
      durationMs: Math.max(0, completedAtMs - startedAtMs),
    });

    const window = this.getSnapshotWindow();

    return {
      id: `recon:${randomUUID()}`,
      window,
      referenceTimezone: this.zone.name,
      startedAt: new Date(startedAtMs).toISOString(),
      completedAt: new Date(completedAtMs).toISOString(),
      summary,
      diff,
      rejected: failures,
      reportHash: hashReport(window, summary, diff),
    };
  }
}

/**
 * SHA-256 over the RFC 8785 canonical form of the window, the counts and
 * the diff. Wall-clock fields are excluded so reruns hash identically.
 */
export function hashReport(
  window: SnapshotWindow,
  summary: ReconciliationSummary,
  diff: readonly DiffRow[],
): string {
  const { durationMs: _durationMs, ...counts } = summary;
  const json = canonicalize({ window, counts, diff });
  return createHash("sha256").update(json).digest("hex");
}
