/**
 * Keyed Join Engine
 *
 * Full outer join of two normalized record sets on (sku, location_id).
 *
 * Strategy:
 * 1. Drop records outside the snapshot window or the run's scope
 * 2. Index each side by key, keeping one snapshot per key
 * 3. Walk the union of keys in sorted order and emit one JoinedKey each
 *
 * Snapshot selection: the latest `asOf` within the window wins. Two
 * snapshots with the same `asOf` are ordered by their RFC 8785 canonical
 * form (greatest wins), so the choice never depends on arrival order.
 */

import { canonicalize } from "json-canonicalize";
import { isCanonicalRecord } from "@stockrecon/types";
import type { CanonicalRecord, InventoryKey, JoinedKey, SourceSide } from "@stockrecon/types";
import { SchemaValidationError } from "./errors.js";
import type { ReconciliationScope } from "./types.js";

export interface JoinOptions {
  /** Inclusive snapshot window, epoch milliseconds */
  readonly window: { readonly startMs: number; readonly endMs: number };
  /** When false, keys are trimmed and case-folded on both sides */
  readonly keyCaseSensitive: boolean;
  readonly scope?: ReconciliationScope;
}

export interface JoinSideStats {
  readonly outOfWindow: number;
  readonly outOfScope: number;
  readonly superseded: number;
  /** Keys whose winning snapshot tied with a different one */
  readonly ambiguous: number;
}

export interface JoinStats {
  readonly a: JoinSideStats;
  readonly b: JoinSideStats;
}

export interface JoinResult {
  readonly keys: readonly JoinedKey[];
  readonly stats: JoinStats;
}

export interface SortedJoin {
  /** JoinedKeys in key order. Consume once. */
  readonly keys: AsyncIterable<JoinedKey>;
  /** Counters so far; final once `keys` is exhausted */
  stats(): JoinStats;
}

// =============================================================================
// Key helpers
// =============================================================================

/** Code-unit order, independent of locale. */
function compareText(x: string, y: string): number {
  if (x < y) return -1;
  if (x > y) return 1;
  return 0;
}

export function compareKeys(x: InventoryKey, y: InventoryKey): number {
  return compareText(x.sku, y.sku) || compareText(x.locationId, y.locationId);
}

function foldKeyPart(value: string): string {
  return value.trim().normalize("NFKC").toLowerCase();
}

function keyId(key: InventoryKey): string {
  return `${key.sku}\u0000${key.locationId}`;
}

/** Fields that decide a same-timestamp tie. Excludes arrival position. */
function tieBreakForm(record: CanonicalRecord): string {
  return canonicalize({
    sku: record.sku,
    locationId: record.locationId,
    onHand: record.onHand,
    reserved: record.reserved,
    available: record.available,
    damaged: record.damaged,
    availableDerived: record.availableDerived,
  });
}

export class SideCounters {
  outOfWindow = 0;
  outOfScope = 0;
  superseded = 0;
  ambiguous = 0;

  snapshot(): JoinSideStats {
    return {
      outOfWindow: this.outOfWindow,
      outOfScope: this.outOfScope,
      superseded: this.superseded,
      ambiguous: this.ambiguous,
    };
  }
}

export interface Candidate {
  readonly key: InventoryKey;
  readonly id: string;
  readonly record: CanonicalRecord;
  /** Another snapshot with the same asOf but different values was seen */
  readonly tied: boolean;
}

// =============================================================================
// Engine
// =============================================================================

export class KeyedJoinEngine {
  private readonly options: JoinOptions;
  private readonly scopeSkus: ReadonlySet<string> | null;
  private readonly scopeLocations: ReadonlySet<string> | null;

  constructor(options: JoinOptions) {
    if (options.window.startMs > options.window.endMs) {
      throw new SchemaValidationError("Snapshot window start is after its end", {
        field: "window",
        reason: "invalid-timestamp",
      });
    }
    this.options = options;
    const scopeSet = (values: readonly string[] | undefined): ReadonlySet<string> | null =>
      values && values.length > 0
        ? new Set(values.map((v) => this.normalizeKeyPart(v)))
        : null;
    this.scopeSkus = scopeSet(options.scope?.skus);
    this.scopeLocations = scopeSet(options.scope?.locationIds);
  }

  /** The key a record joins on, after case folding when configured. */
  keyOf(record: InventoryKey): InventoryKey {
    return {
      sku: this.normalizeKeyPart(record.sku),
      locationId: this.normalizeKeyPart(record.locationId),
    };
  }

  /**
   * Join two in-memory record sets. Linear in the number of records,
   * plus sorting the distinct keys.
   */
  join(a: readonly CanonicalRecord[], b: readonly CanonicalRecord[]): JoinResult {
    const countersA = new SideCounters();
    const countersB = new SideCounters();
    const indexA = this.index(a, countersA);
    const indexB = this.index(b, countersB);

    const keys = new Map<string, InventoryKey>();
    for (const [id, c] of indexA) keys.set(id, c.key);
    for (const [id, c] of indexB) keys.set(id, c.key);

    const ordered = [...keys.entries()].sort(([, x], [, y]) => compareKeys(x, y));
    const joined: JoinedKey[] = [];
    for (const [id, key] of ordered) {
      const entry = this.pair(key, indexA.get(id)?.record, indexB.get(id)?.record);
      if (entry) joined.push(entry);
    }

    return {
      keys: joined,
      stats: { a: countersA.snapshot(), b: countersB.snapshot() },
    };
  }

  /**
   * Merge-join two streams already sorted by join key (sku, then
   * location, after case folding when configured). Holds one key group
   * per side in memory.
   *
   * @throws {SchemaValidationError} when a stream goes backwards or
   *   yields something that is not a canonical record
   */
  joinSorted(
    a: AsyncIterable<CanonicalRecord>,
    b: AsyncIterable<CanonicalRecord>,
  ): SortedJoin {
    const countersA = new SideCounters();
    const countersB = new SideCounters();
    const readerA = new GroupReader(this, a[Symbol.asyncIterator](), "a", countersA);
    const readerB = new GroupReader(this, b[Symbol.asyncIterator](), "b", countersB);

    const pair = (key: InventoryKey, ra?: CanonicalRecord, rb?: CanonicalRecord) =>
      this.pair(key, ra, rb);

    async function* merge(): AsyncGenerator<JoinedKey> {
      let ga = await readerA.next();
      let gb = await readerB.next();

      while (ga !== null || gb !== null) {
        const order =
          ga === null ? 1 : gb === null ? -1 : compareKeys(ga.key, gb.key);

        let entry: JoinedKey | null;
        if (order < 0 && ga !== null) {
          entry = pair(ga.key, ga.record ?? undefined, undefined);
          ga = await readerA.next();
        } else if (order > 0 && gb !== null) {
          entry = pair(gb.key, undefined, gb.record ?? undefined);
          gb = await readerB.next();
        } else if (ga !== null && gb !== null) {
          entry = pair(ga.key, ga.record ?? undefined, gb.record ?? undefined);
          ga = await readerA.next();
          gb = await readerB.next();
        } else {
          break;
        }

        if (entry) yield entry;
      }
    }

    return {
      keys: merge(),
      stats: () => ({ a: countersA.snapshot(), b: countersB.snapshot() }),
    };
  }

  // ===========================================================================
  // Selection
  // ===========================================================================

  /**
   * Apply window and scope filters. Returns the candidate, or null when
   * the record is excluded (and counted).
   */
  admit(record: CanonicalRecord, counters: SideCounters): Candidate | null {
    const { startMs, endMs } = this.options.window;
    if (record.asOfEpochMs < startMs || record.asOfEpochMs > endMs) {
      counters.outOfWindow += 1;
      return null;
    }

    const key = this.keyOf(record);
    if (
      (this.scopeSkus && !this.scopeSkus.has(key.sku)) ||
      (this.scopeLocations && !this.scopeLocations.has(key.locationId))
    ) {
      counters.outOfScope += 1;
      return null;
    }

    return { key, id: keyId(key), record, tied: false };
  }

  /**
   * Pick between the current snapshot of a key and a new one. Only a tie
   * at the winning asOf marks the key ambiguous.
   */
  choose(current: Candidate, next: Candidate, counters: SideCounters): Candidate {
    counters.superseded += 1;

    const byTime = next.record.asOfEpochMs - current.record.asOfEpochMs;
    if (byTime !== 0) return byTime > 0 ? next : current;

    const formCurrent = tieBreakForm(current.record);
    const formNext = tieBreakForm(next.record);
    if (formCurrent === formNext) return current;

    const winner = formNext > formCurrent ? next : current;
    return { ...winner, tied: true };
  }

  /** Count the final choice for a key. */
  settle(candidate: Candidate, counters: SideCounters): CanonicalRecord {
    if (candidate.tied) counters.ambiguous += 1;
    return candidate.record;
  }

  private index(
    records: readonly CanonicalRecord[],
    counters: SideCounters,
  ): Map<string, { key: InventoryKey; record: CanonicalRecord }> {
    const byKey = new Map<string, Candidate>();
    for (const record of records) {
      const candidate = this.admit(record, counters);
      if (!candidate) continue;
      const current = byKey.get(candidate.id);
      byKey.set(candidate.id, current ? this.choose(current, candidate, counters) : candidate);
    }
    const settled = new Map<string, { key: InventoryKey; record: CanonicalRecord }>();
    for (const [id, candidate] of byKey) {
      settled.set(id, { key: candidate.key, record: this.settle(candidate, counters) });
    }
    return settled;
  }

  private pair(
    key: InventoryKey,
    a: CanonicalRecord | undefined,
    b: CanonicalRecord | undefined,
  ): JoinedKey | null {
    if (a && b) return { state: "matched", key, a, b };
    if (a) return { state: "source-a-only", key, a };
    if (b) return { state: "source-b-only", key, b };
    return null;
  }

  private normalizeKeyPart(value: string): string {
    return this.options.keyCaseSensitive ? value : foldKeyPart(value);
  }
}

// =============================================================================
// Streaming support
// =============================================================================

interface KeyGroup {
  readonly key: InventoryKey;
  /** Winning snapshot, or null when every record of the key was excluded */
  readonly record: CanonicalRecord | null;
}

/** Reads one key group at a time from a key-sorted stream. */
class GroupReader {
  private pending: Candidate | null = null;
  private lastKey: InventoryKey | null = null;
  private done = false;
  private position = 0;

  constructor(
    private readonly engine: KeyedJoinEngine,
    private readonly iterator: AsyncIterator<CanonicalRecord>,
    private readonly side: SourceSide,
    private readonly counters: SideCounters,
  ) {}

  async next(): Promise<KeyGroup | null> {
    let group: { key: InventoryKey; id: string; best: Candidate | null } | null = null;

    if (this.pending) {
      group = { key: this.pending.key, id: this.pending.id, best: this.pending };
      this.pending = null;
    }

    while (!this.done) {
      const step = await this.iterator.next();
      if (step.done === true) {
        this.done = true;
        break;
      }

      const record: unknown = step.value;
      const index = this.position;
      this.position += 1;
      if (!isCanonicalRecord(record)) {
        throw new SchemaValidationError(
          `Stream ${this.side} item #${index} is not a canonical record`,
          { field: "record", reason: "invalid-record", recordKey: `#${index}` },
        );
      }

      const key = this.engine.keyOf(record);
      if (this.lastKey && compareKeys(key, this.lastKey) < 0) {
        throw new SchemaValidationError(
          `Stream ${this.side} is not sorted by key at item #${index} (${key.sku}@${key.locationId})`,
          { field: "record", reason: "unsorted-stream", recordKey: `${key.sku}@${key.locationId}` },
        );
      }
      this.lastKey = key;

      const id = keyId(key);
      const candidate = this.engine.admit(record, this.counters);
      if (group && group.id !== id) {
        // Key changed: hold this record for the next group
        this.pending = candidate;
        return this.finish(group);
      }

      if (!group) {
        group = { key, id, best: candidate };
      } else if (candidate) {
        group.best = group.best ? this.engine.choose(group.best, candidate, this.counters) : candidate;
      }
    }

    return group ? this.finish(group) : null;
  }

  private finish(group: { key: InventoryKey; best: Candidate | null }): KeyGroup {
    return {
      key: group.key,
      record: group.best ? this.engine.settle(group.best, this.counters) : null,
    };
  }
}
