/**
 * Time zone handling.
 *
 * Every timestamp is converted to one reference zone before any
 * comparison. Zones are either fixed offsets ("UTC", "+02:00", "-0530")
 * or IANA names resolved through Intl, so daylight-saving transitions
 * follow the runtime's tz database.
 *
 * Timestamps without an explicit offset are wall-clock time in the
 * zone of the source that produced them.
 */

import { SchemaValidationError } from "./errors.js";

export type TimeZone =
  | { readonly kind: "fixed"; readonly name: string; readonly offsetMinutes: number }
  | { readonly kind: "iana"; readonly name: string };

export const UTC: TimeZone = { kind: "fixed", name: "UTC", offsetMinutes: 0 };

const OFFSET = /^([+-])(\d{2}):?(\d{2})$/;

const TIMESTAMP =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?)?\s*(Z|[+-]\d{2}:?\d{2})?$/i;

const DATE_ONLY = /^(\d{4})-(\d{2})-(\d{2})$/;

const MINUTE_MS = 60_000;
const DAY_MS = 86_400_000;

/** Date range limit less a day, so any zone offset still renders. */
const MAX_EPOCH_MS = 8.64e15 - DAY_MS;

function inRange(ms: number): number | null {
  return Number.isFinite(ms) && Math.abs(ms) <= MAX_EPOCH_MS ? ms : null;
}

// =============================================================================
// Zone resolution
// =============================================================================

function parseOffset(text: string): number | null {
  const m = OFFSET.exec(text);
  if (!m) return null;
  const hours = Number(m[2]);
  const minutes = Number(m[3]);
  if (hours > 23 || minutes > 59) return null;
  const total = hours * 60 + minutes;
  return m[1] === "-" ? -total : total;
}

/**
 * Resolve a zone name.
 *
 * @throws {SchemaValidationError} when the name is neither an offset nor
 *   a zone known to the runtime
 */
export function resolveZone(name: string, field = "timezone"): TimeZone {
  const trimmed = name.trim();
  const upper = trimmed.toUpperCase();
  if (upper === "UTC" || upper === "Z" || upper === "GMT") return UTC;

  const offset = parseOffset(trimmed);
  if (offset !== null) {
    return { kind: "fixed", name: trimmed, offsetMinutes: offset };
  }

  try {
    new Intl.DateTimeFormat("en-US", { timeZone: trimmed });
  } catch {
    throw new SchemaValidationError(`Unknown time zone "${name}"`, {
      field,
      reason: "invalid-zone",
    });
  }
  return { kind: "iana", name: trimmed };
}

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(name: string): Intl.DateTimeFormat {
  let fmt = formatters.get(name);
  if (!fmt) {
    fmt = new Intl.DateTimeFormat("en-US", {
      timeZone: name,
      hourCycle: "h23",
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
    });
    formatters.set(name, fmt);
  }
  return fmt;
}

/** Offset of `zone` from UTC, in minutes, at the given instant. */
export function zoneOffsetMinutes(zone: TimeZone, epochMs: number): number {
  if (zone.kind === "fixed") return zone.offsetMinutes;

  const parts = formatterFor(zone.name).formatToParts(new Date(epochMs));
  const part = (type: Intl.DateTimeFormatPartTypes): number =>
    Number(parts.find((p) => p.type === type)?.value ?? "0");

  const wallAsUtc = Date.UTC(
    part("year"),
    part("month") - 1,
    part("day"),
    part("hour"),
    part("minute"),
    part("second"),
  );
  const wholeSeconds = epochMs - (((epochMs % 1000) + 1000) % 1000);
  return Math.round((wallAsUtc - wholeSeconds) / MINUTE_MS);
}

/**
 * Convert wall-clock milliseconds (components read as if UTC) in `zone`
 * to an instant. Two passes settle the offset across DST transitions.
 */
function wallToEpoch(wallMs: number, zone: TimeZone): number {
  const guess = wallMs - zoneOffsetMinutes(zone, wallMs) * MINUTE_MS;
  return wallMs - zoneOffsetMinutes(zone, guess) * MINUTE_MS;
}

// =============================================================================
// Parsing
// =============================================================================

function validWall(
  year: number,
  month: number,
  day: number,
  hour: number,
  minute: number,
  second: number,
): number | null {
  if (month < 1 || month > 12 || day < 1 || hour > 23 || minute > 59 || second > 59) {
    return null;
  }
  // setUTCFullYear keeps years 0-99 literal, where Date.UTC maps them to 19xx
  const date = new Date(Date.UTC(2000, 0, 1, hour, minute, second));
  date.setUTCFullYear(year, month - 1, day);
  // Rejects 2024-02-30 and friends, which would roll over into March
  if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) return null;
  return date.getTime();
}

/**
 * Parse a raw timestamp to epoch milliseconds.
 *
 * Accepts Date instances, epoch-millisecond numbers and ISO-like strings.
 * Returns null when the value cannot be read as an instant, or lies
 * outside the range a Date can render.
 */
export function parseTimestamp(raw: unknown, sourceZone: TimeZone): number | null {
  if (raw instanceof Date) return inRange(raw.getTime());
  if (typeof raw === "number") return inRange(raw);
  if (typeof raw !== "string") return null;

  const m = TIMESTAMP.exec(raw.trim());
  if (!m) return null;

  const wall = validWall(
    Number(m[1]),
    Number(m[2]),
    Number(m[3]),
    Number(m[4] ?? "0"),
    Number(m[5] ?? "0"),
    Number(m[6] ?? "0"),
  );
  if (wall === null) return null;

  const millis = Number((m[7] ?? "").padEnd(3, "0").slice(0, 3));
  const wallMs = wall + millis;

  const suffix = m[8];
  if (suffix === undefined) return inRange(wallToEpoch(wallMs, sourceZone));
  if (suffix.toUpperCase() === "Z") return inRange(wallMs);

  const offset = parseOffset(suffix);
  return offset === null ? null : inRange(wallMs - offset * MINUTE_MS);
}

// =============================================================================
// Formatting
// =============================================================================

function formatOffset(minutes: number): string {
  if (minutes === 0) return "Z";
  const sign = minutes < 0 ? "-" : "+";
  const abs = Math.abs(minutes);
  const hh = String(Math.floor(abs / 60)).padStart(2, "0");
  const mm = String(abs % 60).padStart(2, "0");
  return `${sign}${hh}:${mm}`;
}

/** Render an instant as ISO-8601 in `zone`, e.g. "2024-03-01T12:00:00.000+02:00". */
export function formatInZone(epochMs: number, zone: TimeZone): string {
  const offset = zoneOffsetMinutes(zone, epochMs);
  const wall = new Date(epochMs + offset * MINUTE_MS).toISOString().slice(0, 23);
  return `${wall}${formatOffset(offset)}`;
}

/** Calendar date ("YYYY-MM-DD") of an instant in `zone`. */
export function dateInZone(epochMs: number, zone: TimeZone): string {
  return formatInZone(epochMs, zone).slice(0, 10);
}

/**
 * Inclusive bounds of one calendar day in `zone`.
 *
 * @throws {SchemaValidationError} when `date` is not a valid YYYY-MM-DD
 */
export function dayBounds(
  date: string,
  zone: TimeZone,
): { readonly startMs: number; readonly endMs: number } {
  const m = DATE_ONLY.exec(date.trim());
  const wall = m ? validWall(Number(m[1]), Number(m[2]), Number(m[3]), 0, 0, 0) : null;
  if (wall === null) {
    throw new SchemaValidationError(`Invalid snapshot date "${date}", expected YYYY-MM-DD`, {
      field: "date",
      reason: "invalid-timestamp",
    });
  }
  return {
    startMs: wallToEpoch(wall, zone),
    endMs: wallToEpoch(wall + DAY_MS, zone) - 1,
  };
}
