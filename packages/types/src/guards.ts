/**
 * Runtime Type Guards
 *
 * Narrowing functions for stockrecon domain types, used where records
 * cross a process or package boundary (streams, files, collaborators).
 */

import type { CanonicalRecord, InventoryKey, MetricName } from "./inventory.js";
import { METRIC_ORDER } from "./inventory.js";
import type { DiffRow, DiffStatus } from "./reconciliation.js";
import { PCT_UNDEFINED } from "./reconciliation.js";

const METRICS = new Set<string>(METRIC_ORDER);
const DIFF_STATUSES = new Set<string>([
  "mismatch",
  "missing-metric",
  "source-a-only",
  "source-b-only",
]);

function isObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object";
}

function isQuantity(value: unknown): value is number | null {
  return value === null || (typeof value === "number" && Number.isFinite(value));
}

export function isMetricName(value: unknown): value is MetricName {
  return typeof value === "string" && METRICS.has(value);
}

export function isDiffStatus(value: unknown): value is DiffStatus {
  return typeof value === "string" && DIFF_STATUSES.has(value);
}

export function isInventoryKey(value: unknown): value is InventoryKey {
  if (!isObject(value)) return false;
  return (
    typeof value.sku === "string" &&
    value.sku.length > 0 &&
    typeof value.locationId === "string" &&
    value.locationId.length > 0
  );
}

export function isCanonicalRecord(v: unknown): v is CanonicalRecord {
  if (!isObject(v)) return false;
  return (
    isInventoryKey(v) &&
    typeof v.asOf === "string" &&
    typeof v.asOfEpochMs === "number" &&
    Number.isFinite(v.asOfEpochMs) &&
    isQuantity(v.onHand) &&
    isQuantity(v.reserved) &&
    isQuantity(v.available) &&
    isQuantity(v.damaged) &&
    typeof v.availableDerived === "boolean" &&
    typeof v.source === "string" &&
    typeof v.recordRef === "number"
  );
}

export function isDiffRow(v: unknown): v is DiffRow {
  if (!isObject(v)) return false;
  return (
    isInventoryKey(v) &&
    isMetricName(v.metric) &&
    isQuantity(v.valueA) &&
    isQuantity(v.valueB) &&
    isQuantity(v.delta) &&
    (isQuantity(v.pctDelta) || v.pctDelta === PCT_UNDEFINED) &&
    isDiffStatus(v.status)
  );
}
