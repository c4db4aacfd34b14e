/**
 * @stockrecon/types: Shared domain types for the stockrecon stack.
 *
 * - Canonical inventory records and join keys
 * - Join states, metric comparisons and diff rows
 * - Run summaries and reports
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - Constants only where ordering or sentinels must be shared
 */

// Inventory types
export type {
  SourceSide,
  QuantityField,
  MetricName,
  InventoryKey,
  CanonicalRecord,
} from "./inventory.js";
export { METRIC_ORDER, METRIC_FIELDS } from "./inventory.js";

// Reconciliation types
export type {
  JoinState,
  JoinedKey,
  PctUndefined,
  ComparisonStatus,
  MetricComparison,
  DiffStatus,
  DiffRow,
  SourceRecordCounts,
  MetricTotals,
  ReconciliationSummary,
  SnapshotWindow,
  NormalizationFailure,
  ReconciliationReport,
} from "./reconciliation.js";
export { PCT_UNDEFINED } from "./reconciliation.js";

// Runtime type guards
export {
  isMetricName,
  isDiffStatus,
  isInventoryKey,
  isCanonicalRecord,
  isDiffRow,
} from "./guards.js";
