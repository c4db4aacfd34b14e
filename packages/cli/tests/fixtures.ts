/**
 * Test fixtures for @stockrecon/cli: a run configuration plus one JSON
 * and one CSV export in a scratch directory.
 */

import { mkdirSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { pino } from "pino";
import type { Logger } from "pino";

export const OMS_ROWS = [
  { article: "X1", plant: "L1", snapshot_ts: "2024-03-01T10:00:00Z", on_hand: 10, reserved: 2 },
  { article: "X2", plant: "L1", snapshot_ts: "2024-03-01T11:00:00Z", on_hand: 5 },
];

/** Semicolon-delimited, naive timestamps */
export const DWH_CSV = [
  "sku_code;location_code;as_of_ts;on_hand;reserved",
  "X1;L1;2024-03-01 10:00:00;10;3",
  "",
].join("\n");

export const OMS_SOURCE = {
  label: "oms",
  path: "oms.json",
  mapping: {
    columns: {
      article: "sku",
      plant: "location_id",
      snapshot_ts: "as_of",
      on_hand: "on_hand",
      reserved: "reserved",
    },
  },
};

export const DWH_SOURCE = {
  label: "dwh",
  path: "dwh.csv",
  mapping: {
    columns: {
      sku_code: "sku",
      location_code: "location_id",
      as_of_ts: "as_of",
      on_hand: "on_hand",
      reserved: "reserved",
    },
  },
};

export const RUN_CONFIG = {
  version: 1,
  date: "2024-03-01",
  metrics: ["on_hand", "available"],
  output: "out",
  sources: { a: OMS_SOURCE, b: DWH_SOURCE },
};

export function makeTestDir(): string {
  const dir = join(
    tmpdir(),
    `stockrecon-cli-test-${Date.now()}-${Math.random().toString(36).slice(2, 8)}`,
  );
  mkdirSync(dir, { recursive: true });
  return dir;
}

export function removeTestDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/** Write the exports and a config (with `overrides` merged in); returns the config path. */
export function writeFixture(dir: string, overrides: Record<string, unknown> = {}): string {
  writeFileSync(join(dir, "oms.json"), JSON.stringify(OMS_ROWS));
  writeFileSync(join(dir, "dwh.csv"), DWH_CSV);
  const configPath = join(dir, "recon.json");
  writeFileSync(configPath, JSON.stringify({ ...RUN_CONFIG, ...overrides }));
  return configPath;
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
