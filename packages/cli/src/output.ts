/**
 * Artifact writing.
 *
 * Each artifact is written to a fresh temp file in the output directory
 * (opened exclusively) and renamed into place, so a reader never sees a
 * partial file. The temp file is removed if anything fails.
 */

import { randomUUID } from "node:crypto";
import { mkdir, rename, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { SnapshotWindow } from "@stockrecon/types";
import type { DiffFormat } from "@stockrecon/reconciler";

export interface ArtifactPaths {
  readonly diff: string;
  readonly summary: string;
}

function compactStamp(timestamp: string): string {
  return timestamp.slice(0, 19).replace(/[-:]/g, "");
}

/**
 * File name stem for a window: the calendar date for a one-day window,
 * otherwise both bounds, e.g. "20240301T060000_20240301T180000".
 */
export function windowStem(window: SnapshotWindow, singleDay: boolean): string {
  return singleDay
    ? window.start.slice(0, 10)
    : `${compactStamp(window.start)}_${compactStamp(window.end)}`;
}

export function artifactNames(
  stem: string,
  format: DiffFormat,
): { readonly diff: string; readonly summary: string } {
  return {
    diff: `inventory-diff_${stem}.${format}`,
    summary: `inventory-summary_${stem}.json`,
  };
}

/**
 * Atomically write `content` to `dir/name`, replacing any previous file.
 *
 * @returns the final path
 */
export async function writeArtifact(dir: string, name: string, content: string): Promise<string> {
  await mkdir(dir, { recursive: true });
  const target = join(dir, name);
  const temp = join(dir, `.${name}.${randomUUID()}.tmp`);

  let committed = false;
  try {
    await writeFile(temp, content, { encoding: "utf8", flag: "wx" });
    await rename(temp, target);
    committed = true;
    return target;
  } finally {
    if (!committed) await rm(temp, { force: true });
  }
}
