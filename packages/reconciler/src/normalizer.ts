/**
 * Canonical Record Normalizer
 *
 * Maps one source's raw records (API payloads, SQL rows, CSV lines) to
 * CanonicalRecords through a declarative column table.
 *
 * Per record:
 * 1. Read identifiers and timestamp from their mapped columns
 * 2. Convert the timestamp to the reference zone
 * 3. Parse quantities, apply the unit factor, round
 * 4. Resolve `available` under the run's available policy
 *
 * A bad mapping fails at construction. A bad record fails on its own.
 */

import type { CanonicalRecord, NormalizationFailure } from "@stockrecon/types";
import { SchemaValidationError } from "./errors.js";
import type { SchemaViolation } from "./errors.js";
import { DEFAULT_UNAVAILABLE_MARKERS, parseQuantity, roundQuantity } from "./quantity.js";
import { formatInZone, parseTimestamp, resolveZone } from "./time.js";
import type { TimeZone } from "./time.js";
import type {
  AvailablePolicy,
  CanonicalField,
  MissingValuePolicy,
  OptionalQuantityField,
  SourceDefinition,
} from "./types.js";

export interface NormalizerOptions {
  readonly referenceZone: TimeZone;
  /** Decimal places for every quantity; null leaves values unrounded */
  readonly precision: number | null;
  readonly availablePolicy: AvailablePolicy;
}

export type NormalizeAttempt =
  | { readonly ok: true; readonly record: CanonicalRecord }
  | { readonly ok: false; readonly failure: NormalizationFailure };

export interface NormalizeResult {
  readonly records: readonly CanonicalRecord[];
  readonly failures: readonly NormalizationFailure[];
}

const CANONICAL_FIELDS = new Set<string>([
  "sku",
  "location_id",
  "as_of",
  "on_hand",
  "reserved",
  "available",
  "damaged",
]);

const REQUIRED_FIELDS: readonly CanonicalField[] = ["sku", "location_id", "as_of", "on_hand"];

function isCanonicalField(value: string): value is CanonicalField {
  return CANONICAL_FIELDS.has(value);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/** Exact key first, then a dotted path into nested objects. */
function lookup(raw: Record<string, unknown>, column: string): unknown {
  if (Object.hasOwn(raw, column)) return raw[column];
  if (!column.includes(".")) return undefined;

  let current: unknown = raw;
  for (const segment of column.split(".")) {
    if (!isPlainObject(current) || !Object.hasOwn(current, segment)) return undefined;
    current = current[segment];
  }
  return current;
}

export class Normalizer {
  private readonly label: string;
  private readonly columns: ReadonlyMap<CanonicalField, string>;
  private readonly sourceZone: TimeZone;
  private readonly unitFactor: number;
  private readonly missing: Readonly<Record<OptionalQuantityField, MissingValuePolicy>>;
  private readonly unavailableMarkers: readonly string[];
  private readonly options: NormalizerOptions;

  /**
   * @throws {SchemaValidationError} when the mapping cannot normalize any record
   */
  constructor(source: SourceDefinition, options: NormalizerOptions) {
    const { label, mapping } = source;
    if (label.trim() === "") {
      throw new SchemaValidationError("Source label cannot be empty", {
        field: "label",
        reason: "invalid-mapping",
      });
    }

    const columns = new Map<CanonicalField, string>();
    for (const [column, field] of Object.entries(mapping.columns)) {
      if (!isCanonicalField(field)) {
        throw this.mappingError(label, field, `Column "${column}" maps to unknown field "${field}"`);
      }
      const existing = columns.get(field);
      if (existing !== undefined) {
        throw this.mappingError(
          label,
          field,
          `Columns "${existing}" and "${column}" both map to "${field}"`,
        );
      }
      columns.set(field, column);
    }

    for (const field of REQUIRED_FIELDS) {
      if (!columns.has(field)) {
        throw this.mappingError(label, field, `No column maps to required field "${field}"`);
      }
    }

    const unitFactor = mapping.unitFactor ?? 1;
    if (!Number.isFinite(unitFactor) || unitFactor <= 0) {
      throw this.mappingError(label, "unitFactor", `Unit factor must be positive, got ${unitFactor}`);
    }

    this.label = label;
    this.columns = columns;
    this.unitFactor = unitFactor;
    this.sourceZone =
      mapping.timezone === undefined
        ? options.referenceZone
        : resolveZone(mapping.timezone, `${label}.timezone`);
    this.missing = {
      reserved: mapping.missing?.reserved ?? "zero",
      damaged: mapping.missing?.damaged ?? "zero",
    };
    this.unavailableMarkers = mapping.unavailableMarkers ?? DEFAULT_UNAVAILABLE_MARKERS;
    this.options = options;
  }

  /**
   * Normalize one raw record.
   *
   * @throws {SchemaValidationError} naming the field and the record key
   */
  normalize(raw: unknown, index: number): CanonicalRecord {
    if (!isPlainObject(raw)) {
      throw new SchemaValidationError(`${this.label} record #${index} is not an object`, {
        field: "record",
        reason: "invalid-record",
        source: this.label,
        recordKey: `#${index}`,
      });
    }

    const recordKey = this.recordKey(raw, index);
    const fail = (field: CanonicalField, reason: SchemaViolation, detail: string): never => {
      throw new SchemaValidationError(
        `${this.label} record ${recordKey}: ${field} ${detail}`,
        { field, reason, source: this.label, recordKey },
      );
    };

    const sku = this.identifier(raw, "sku", fail);
    const locationId = this.identifier(raw, "location_id", fail);

    const rawAsOf = this.read(raw, "as_of");
    if (rawAsOf === undefined || rawAsOf === null || rawAsOf === "") {
      return fail("as_of", "missing", "is missing");
    }
    const asOfEpochMs = parseTimestamp(rawAsOf, this.sourceZone);
    if (asOfEpochMs === null) {
      return fail("as_of", "invalid-timestamp", `cannot be parsed: ${JSON.stringify(rawAsOf)}`);
    }

    const onHand = this.quantity(raw, "on_hand", fail);
    if (onHand === undefined) return fail("on_hand", "missing", "is missing");
    const reserved = this.withPolicy(this.quantity(raw, "reserved", fail), this.missing.reserved);
    const damaged = this.withPolicy(this.quantity(raw, "damaged", fail), this.missing.damaged);

    let available: number | null | undefined;
    if (this.options.availablePolicy === "prefer_supplied") {
      available = this.quantity(raw, "available", fail);
    }

    const availableDerived = available === undefined;
    if (available === undefined) {
      available =
        onHand === null || reserved === null || damaged === null
          ? null
          : roundQuantity(onHand - reserved - damaged, this.options.precision);
    }

    return Object.freeze({
      sku,
      locationId,
      asOf: formatInZone(asOfEpochMs, this.options.referenceZone),
      asOfEpochMs,
      onHand,
      reserved,
      available,
      damaged,
      availableDerived,
      source: this.label,
      recordRef: index,
    });
  }

  /**
   * Normalize one record, turning a SchemaValidationError into a failure
   * entry. In strict mode the error is rethrown.
   */
  attempt(raw: unknown, index: number, strict = false): NormalizeAttempt {
    try {
      return { ok: true, record: this.normalize(raw, index) };
    } catch (err) {
      if (strict || !(err instanceof SchemaValidationError)) throw err;
      return {
        ok: false,
        failure: {
          source: this.label,
          index,
          recordKey: err.recordKey ?? `#${index}`,
          field: err.field,
          reason: err.reason,
          message: err.message,
        },
      };
    }
  }

  /** Normalize a batch, collecting per-record failures. */
  normalizeAll(raws: readonly unknown[], strict = false): NormalizeResult {
    const records: CanonicalRecord[] = [];
    const failures: NormalizationFailure[] = [];

    raws.forEach((raw, index) => {
      const result = this.attempt(raw, index, strict);
      if (result.ok) records.push(result.record);
      else failures.push(result.failure);
    });

    return { records, failures };
  }

  // ===========================================================================
  // Field readers
  // ===========================================================================

  private read(raw: Record<string, unknown>, field: CanonicalField): unknown {
    const column = this.columns.get(field);
    return column === undefined ? undefined : lookup(raw, column);
  }

  private identifier(
    raw: Record<string, unknown>,
    field: "sku" | "location_id",
    fail: (field: CanonicalField, reason: SchemaViolation, detail: string) => never,
  ): string {
    const value = this.read(raw, field);
    if (value === undefined || value === null) return fail(field, "missing", "is missing");
    if (typeof value !== "string" && typeof value !== "number") {
      return fail(field, "invalid-record", `must be a string, got ${typeof value}`);
    }
    const text = String(value).trim();
    if (text === "") return fail(field, "empty", "is empty");
    return text;
  }

  /** Read a quantity; undefined means the record does not carry it. */
  private quantity(
    raw: Record<string, unknown>,
    field: "on_hand" | "reserved" | "damaged" | "available",
    fail: (field: CanonicalField, reason: SchemaViolation, detail: string) => never,
  ): number | null | undefined {
    const parsed = parseQuantity(this.read(raw, field), this.unavailableMarkers);
    switch (parsed.kind) {
      case "value":
        return roundQuantity(parsed.value * this.unitFactor, this.options.precision);
      case "unavailable":
        return null;
      case "missing":
        return undefined;
      case "invalid":
        return fail(field, parsed.reason, parsed.reason === "empty" ? "is empty" : "is not numeric");
    }
  }

  private withPolicy(value: number | null | undefined, policy: MissingValuePolicy): number | null {
    if (value !== undefined) return value;
    return policy === "zero" ? 0 : null;
  }

  private recordKey(raw: Record<string, unknown>, index: number): string {
    const sku = this.read(raw, "sku");
    const location = this.read(raw, "location_id");
    const usable = (v: unknown): v is string | number =>
      (typeof v === "string" && v.trim() !== "") || typeof v === "number";
    return usable(sku) && usable(location)
      ? `${String(sku).trim()}@${String(location).trim()}`
      : `#${index}`;
  }

  private mappingError(label: string, field: string, message: string): SchemaValidationError {
    return new SchemaValidationError(`${label} mapping: ${message}`, {
      field,
      reason: "invalid-mapping",
      source: label,
    });
  }
}
