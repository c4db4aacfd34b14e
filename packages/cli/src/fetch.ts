/**
 * Concurrent source fetching.
 *
 * Both sources are fetched at the same time, each under its own timeout.
 * The first failure aborts the other fetch and fails the run before any
 * comparison happens.
 */

import { SourceFetchError } from "@stockrecon/reconciler";
import type { SnapshotWindow, SourceSide } from "@stockrecon/types";
import type { RecordSource } from "./sources.js";

export interface SourceBinding {
  readonly source: RecordSource;
  readonly timeoutMs: number;
}

export interface FetchedRecords {
  readonly a: readonly unknown[];
  readonly b: readonly unknown[];
}

export type FetchLogFn = (entry: {
  readonly side: SourceSide;
  readonly source: string;
  readonly records: number;
  readonly durationMs: number;
}) => void;

async function fetchOne(
  binding: SourceBinding,
  window: SnapshotWindow,
  controller: AbortController,
): Promise<readonly unknown[]> {
  const { source, timeoutMs } = binding;
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new SourceFetchError(source.label, `timed out after ${timeoutMs} ms`));
      controller.abort();
    }, timeoutMs);
  });

  try {
    const records = await Promise.race([source.fetch(window, controller.signal), timeout]);
    if (!Array.isArray(records)) {
      throw new SourceFetchError(source.label, "did not return an array of records");
    }
    return records;
  } catch (err) {
    if (err instanceof SourceFetchError) throw err;
    const reason = err instanceof Error ? err.message : String(err);
    throw new SourceFetchError(source.label, reason, { cause: err });
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Fetch both sources concurrently.
 *
 * @throws {SourceFetchError} naming the source that failed first
 */
export async function fetchBoth(
  sources: { readonly a: SourceBinding; readonly b: SourceBinding },
  window: SnapshotWindow,
  logFn?: FetchLogFn,
): Promise<FetchedRecords> {
  const controllers = { a: new AbortController(), b: new AbortController() };

  const run = async (side: SourceSide): Promise<readonly unknown[]> => {
    const started = Date.now();
    try {
      const records = await fetchOne(sources[side], window, controllers[side]);
      logFn?.({
        side,
        source: sources[side].source.label,
        records: records.length,
        durationMs: Date.now() - started,
      });
      return records;
    } catch (err) {
      controllers.a.abort();
      controllers.b.abort();
      throw err;
    }
  };

  const [a, b] = await Promise.all([run("a"), run("b")]);
  return { a, b };
}
