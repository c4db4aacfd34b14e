/**
 * @stockrecon/reconciler: Inventory reconciliation engine.
 *
 * Compares inventory measures between a system of record (source A)
 * and an analytical warehouse (source B), per SKU and location:
 *
 * 1. Normalizer: raw records → canonical records (zone, units, rounding)
 * 2. KeyedJoinEngine: full outer join on (sku, location_id) within a window
 * 3. ToleranceComparator: per-metric delta and tolerance decision
 * 4. Aggregator: summary counts and the ordered diff
 *
 * Findings are data, not errors: the report says whether everything
 * reconciled, and callers decide what status that maps to.
 */

// Coordinator
export { InventoryReconciler, resolveWindow, hashReport } from "./reconciler.js";
export type {
  ReconcilerConfig,
  ReconcilerLogEvent,
  ReconciliationInput,
  StreamReconciliationInput,
  WindowSpec,
} from "./reconciler.js";

// Pipeline stages
export { Normalizer } from "./normalizer.js";
export type { NormalizerOptions, NormalizeResult, NormalizeAttempt } from "./normalizer.js";
export { KeyedJoinEngine, compareKeys } from "./join-engine.js";
export type {
  JoinOptions,
  JoinResult,
  JoinStats,
  JoinSideStats,
  SortedJoin,
} from "./join-engine.js";
export { ToleranceComparator, isWithinTolerance } from "./comparator.js";
export type { ComparatorOptions } from "./comparator.js";
export { Aggregator, compareDiffRows } from "./aggregator.js";
export type { AggregatorOptions, AggregateContext, AggregateResult } from "./aggregator.js";

// Rendering
export { renderCsv, renderNdjson, renderDiff, diffColumns } from "./render.js";
export type { DiffFormat, ColumnLabels } from "./render.js";

// Primitives
export { parseQuantity, roundQuantity, DEFAULT_UNAVAILABLE_MARKERS } from "./quantity.js";
export type { ParsedQuantity } from "./quantity.js";
export {
  UTC,
  resolveZone,
  zoneOffsetMinutes,
  parseTimestamp,
  formatInZone,
  dateInZone,
  dayBounds,
} from "./time.js";
export type { TimeZone } from "./time.js";

// Errors
export { ReconcilerError, SchemaValidationError, SourceFetchError } from "./errors.js";
export type {
  ReconcilerErrorCode,
  SchemaViolation,
  SchemaValidationDetails,
} from "./errors.js";

// Configuration types
export { EXACT_TOLERANCE } from "./types.js";
export type {
  CanonicalField,
  OptionalQuantityField,
  MissingValuePolicy,
  FieldMapping,
  SourceDefinition,
  AvailablePolicy,
  MissingMetricPolicy,
  ToleranceMode,
  MetricTolerance,
  ToleranceConfig,
  ReconciliationScope,
} from "./types.js";
