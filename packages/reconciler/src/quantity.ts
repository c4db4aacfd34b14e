/**
 * Quantity parsing and rounding.
 *
 * Source quantities arrive as numbers, numeric strings, nulls or
 * vendor-specific "no value" markers. Parsing keeps three outcomes apart:
 *
 *   "12"   → 12
 *   null   → unavailable (null)
 *   ""     → rejected as empty, never read as zero
 */

/** Result of parsing one raw quantity. */
export type ParsedQuantity =
  | { readonly kind: "value"; readonly value: number }
  | { readonly kind: "unavailable" }
  | { readonly kind: "missing" }
  | { readonly kind: "invalid"; readonly reason: "empty" | "non-numeric" };

const NUMERAL = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

export const DEFAULT_UNAVAILABLE_MARKERS: readonly string[] = ["N/A", "NULL"];

/**
 * Parse a raw quantity.
 *
 * `undefined` is reported as missing so the caller can apply the field's
 * missing-value policy; `null` and any marker (case-insensitive) mean the
 * source explicitly has no value.
 */
export function parseQuantity(
  raw: unknown,
  unavailableMarkers: readonly string[] = DEFAULT_UNAVAILABLE_MARKERS,
): ParsedQuantity {
  if (raw === undefined) return { kind: "missing" };
  if (raw === null) return { kind: "unavailable" };

  if (typeof raw === "number") {
    return Number.isFinite(raw)
      ? { kind: "value", value: raw }
      : { kind: "invalid", reason: "non-numeric" };
  }

  if (typeof raw === "bigint") return finite(Number(raw));

  if (typeof raw !== "string") {
    return { kind: "invalid", reason: "non-numeric" };
  }

  const trimmed = raw.trim();
  if (trimmed === "") return { kind: "invalid", reason: "empty" };

  const upper = trimmed.toUpperCase();
  if (unavailableMarkers.some((m) => m.toUpperCase() === upper)) {
    return { kind: "unavailable" };
  }

  if (!NUMERAL.test(trimmed)) {
    return { kind: "invalid", reason: "non-numeric" };
  }

  return finite(Number(trimmed));
}

/** "1e400" and huge bigints pass the numeral check but overflow to Infinity. */
function finite(value: number): ParsedQuantity {
  return Number.isFinite(value)
    ? { kind: "value", value }
    : { kind: "invalid", reason: "non-numeric" };
}

/**
 * Round to `precision` decimal places, half away from zero.
 *
 * Uses exponent shifting ("1.005e2") rather than multiplying by 10^p,
 * so 1.005 rounds to 1.01 and not 1.00. A null precision leaves the
 * value untouched. Negative zero is normalized to zero.
 */
export function roundQuantity(value: number, precision: number | null): number {
  if (precision === null) return value === 0 ? 0 : value;

  const sign = value < 0 ? -1 : 1;
  const abs = Math.abs(value);
  const text = String(abs);

  let rounded: number;
  if (text.includes("e")) {
    const factor = 10 ** precision;
    rounded = Math.round(abs * factor) / factor;
  } else {
    const shifted = Math.round(Number(`${text}e${precision}`));
    rounded = Number(`${shifted}e-${precision}`);
  }

  const result = sign * rounded;
  return result === 0 ? 0 : result;
}
