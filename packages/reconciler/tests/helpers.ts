/**
 * Shared builders for reconciler tests.
 */
import type { CanonicalRecord } from "@stockrecon/types";
import type { SourceDefinition } from "../src/types.js";

export const MARCH_1_10AM = Date.UTC(2024, 2, 1, 10);

export const MARCH_1 = {
  startMs: Date.UTC(2024, 2, 1),
  endMs: Date.UTC(2024, 2, 2) - 1,
};

/** Build a canonical record; available defaults to onHand - reserved - damaged. */
export function rec(
  sku: string,
  locationId: string,
  fields: Partial<Omit<CanonicalRecord, "sku" | "locationId">> = {},
): CanonicalRecord {
  const onHand = fields.onHand === undefined ? 10 : fields.onHand;
  const reserved = fields.reserved === undefined ? 0 : fields.reserved;
  const damaged = fields.damaged === undefined ? 0 : fields.damaged;
  const asOfEpochMs = fields.asOfEpochMs ?? MARCH_1_10AM;
  return {
    sku,
    locationId,
    asOf: new Date(asOfEpochMs).toISOString(),
    asOfEpochMs,
    onHand,
    reserved,
    damaged,
    available:
      fields.available !== undefined
        ? fields.available
        : onHand === null || reserved === null || damaged === null
          ? null
          : onHand - reserved - damaged,
    availableDerived: fields.availableDerived ?? fields.available === undefined,
    source: fields.source ?? "oms",
    recordRef: fields.recordRef ?? 0,
  };
}

/** Operational system rows: flat, SAP-style column names. */
export const OMS: SourceDefinition = {
  label: "oms",
  mapping: {
    columns: {
      article: "sku",
      plant: "location_id",
      snapshot_ts: "as_of",
      on_hand: "on_hand",
      reserved: "reserved",
      damaged: "damaged",
      available: "available",
    },
  },
};

/** Warehouse rows: query result with nested quantities. */
export const DWH: SourceDefinition = {
  label: "dwh",
  mapping: {
    columns: {
      sku_code: "sku",
      location_code: "location_id",
      as_of_ts: "as_of",
      "qty.on_hand": "on_hand",
      "qty.reserved": "reserved",
      "qty.damaged": "damaged",
    },
  },
};

export function omsRow(
  article: string,
  plant: string,
  quantities: Record<string, unknown>,
  ts = "2024-03-01T10:00:00Z",
): Record<string, unknown> {
  return { article, plant, snapshot_ts: ts, ...quantities };
}

export function dwhRow(
  sku: string,
  location: string,
  qty: Record<string, unknown>,
  ts = "2024-03-01T10:00:00Z",
): Record<string, unknown> {
  return { sku_code: sku, location_code: location, as_of_ts: ts, qty };
}
