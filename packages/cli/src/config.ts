/**
 * @stockrecon/cli: Configuration.
 *
 * Two layers, both validated with Zod:
 * - EnvSchema: process environment (log level, runtime mode, config path)
 * - RunConfigSchema: the versioned JSON run configuration file
 *
 * Command-line flags override the file. Every validation failure surfaces
 * as a SchemaValidationError so the run exits with the configuration status.
 */

import { readFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { z } from "zod";
import { SchemaValidationError } from "@stockrecon/reconciler";
import type {
  FieldMapping,
  ReconcilerConfig,
  SourceDefinition,
  ToleranceConfig,
} from "@stockrecon/reconciler";

// =============================================================================
// Environment
// =============================================================================

export const EnvSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z.enum(["development", "production", "test"]).default("production"),
  /** Run configuration used when --config is not given */
  STOCKRECON_CONFIG: z.string().optional(),
});

export type CliEnv = z.infer<typeof EnvSchema>;

/**
 * Load and validate the environment.
 *
 * @throws {SchemaValidationError} if a variable is invalid
 */
export function loadEnv(env: Record<string, string | undefined> = process.env): CliEnv {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) throw fromZodError(parsed.error, "environment");
  return parsed.data;
}

// =============================================================================
// Run configuration
// =============================================================================

const MetricSchema = z.enum(["on_hand", "reserved", "available", "damaged"]);

const CanonicalFieldSchema = z.enum([
  "sku",
  "location_id",
  "as_of",
  "on_hand",
  "reserved",
  "available",
  "damaged",
]);

const MissingValueSchema = z.enum(["zero", "unavailable"]);

const MappingSchema = z
  .object({
    columns: z.record(CanonicalFieldSchema),
    unit_factor: z.number().positive().optional(),
    timezone: z.string().min(1).optional(),
    missing: z
      .object({ reserved: MissingValueSchema.optional(), damaged: MissingValueSchema.optional() })
      .strict()
      .optional(),
    unavailable_markers: z.array(z.string()).optional(),
  })
  .strict();

export const SourceFormatSchema = z.enum(["json", "ndjson", "csv"]);

const SourceSchema = z
  .object({
    /** Used in logs and as the artifact column prefix */
    label: z.string().regex(/^[A-Za-z0-9_-]+$/, "must be letters, digits, - or _"),
    path: z.string().min(1),
    format: SourceFormatSchema.optional(),
    timeout_ms: z.number().int().positive().default(30_000),
    mapping: MappingSchema,
  })
  .strict();

const ToleranceModeSchema = z.enum(["pct", "abs", "abs_or_pct", "abs_and_pct"]);

const MetricToleranceSchema = z
  .object({
    abs: z.number().min(0).optional(),
    pct: z.number().min(0).optional(),
    mode: ToleranceModeSchema.optional(),
  })
  .strict();

/** A bare number is a relative tolerance; an object sets both bounds and the mode. */
const ToleranceSchema = z.union([
  z.number().min(0),
  MetricToleranceSchema.extend({
    metrics: z.record(MetricSchema, MetricToleranceSchema).optional(),
  }).strict(),
]);

export const RunConfigSchema = z
  .object({
    version: z.literal(1),
    date: z.string().optional(),
    window: z.object({ start: z.string(), end: z.string() }).strict().optional(),
    reference_timezone: z.string().min(1).default("UTC"),
    tolerance: ToleranceSchema.default(0),
    metrics: z.array(MetricSchema).min(1).optional(),
    headline_metric: MetricSchema.default("available"),
    key_case_sensitive: z.boolean().default(true),
    missing_metric_policy: z.enum(["flag_mismatch", "ignore"]).default("flag_mismatch"),
    available_policy: z.enum(["prefer_supplied", "always_derive"]).default("prefer_supplied"),
    precision: z.number().int().min(0).max(12).nullable().default(null),
    strict: z.boolean().default(false),
    scope: z
      .object({
        skus: z.array(z.string()).optional(),
        sku_file: z.string().optional(),
        locations: z.array(z.string()).optional(),
      })
      .strict()
      .default({}),
    output: z.string().min(1).default("./out"),
    format: z.enum(["csv", "ndjson"]).default("csv"),
    sources: z.object({ a: SourceSchema, b: SourceSchema }).strict(),
  })
  .strict()
  .superRefine((config, ctx) => {
    if (config.date !== undefined && config.window !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["window"],
        message: "date and window cannot both be set",
      });
    }
    if (config.sources.a.label === config.sources.b.label) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["sources", "b", "label"],
        message: `duplicates source a label "${config.sources.a.label}"`,
      });
    }
  });

export type RunConfig = z.infer<typeof RunConfigSchema>;
export type SourceConfig = RunConfig["sources"]["a"];

// =============================================================================
// Command-line overrides
// =============================================================================

export const OverridesSchema = z
  .object({
    config: z.string().optional(),
    date: z.string().optional(),
    windowStart: z.string().optional(),
    windowEnd: z.string().optional(),
    tolerance: z
      .union([z.number(), z.string().trim().min(1, "must not be empty")])
      .pipe(z.coerce.number().min(0))
      .optional(),
    output: z.string().min(1).optional(),
    format: z.enum(["csv", "ndjson"]).optional(),
    referenceTimezone: z.string().min(1).optional(),
    caseInsensitive: z.boolean().optional(),
    missingMetricPolicy: z.enum(["flag_mismatch", "ignore"]).optional(),
    strict: z.boolean().optional(),
    sku: z.array(z.string()).default([]),
    skuFile: z.string().optional(),
    location: z.array(z.string()).default([]),
    json: z.boolean().default(false),
    color: z.boolean().default(true),
  })
  .superRefine((o, ctx) => {
    if ((o.windowStart === undefined) !== (o.windowEnd === undefined)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["windowStart"],
        message: "--window-start and --window-end must be given together",
      });
    }
    if (o.date !== undefined && o.windowStart !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["date"],
        message: "--date cannot be combined with --window-start/--window-end",
      });
    }
  });

export type RunOverrides = z.infer<typeof OverridesSchema>;

/**
 * Validate raw command-line options.
 *
 * @throws {SchemaValidationError} on an invalid flag value
 */
export function parseOverrides(options: unknown): RunOverrides {
  const parsed = OverridesSchema.safeParse(options);
  if (!parsed.success) throw fromZodError(parsed.error, "options");
  return parsed.data;
}

/**
 * Apply flags on top of a loaded configuration. Paths given on the
 * command line resolve against the working directory.
 */
export function applyOverrides(config: RunConfig, overrides: RunOverrides): RunConfig {
  let window: Pick<RunConfig, "date" | "window"> = { date: config.date, window: config.window };
  if (overrides.date !== undefined) {
    window = { date: overrides.date, window: undefined };
  } else if (overrides.windowStart !== undefined && overrides.windowEnd !== undefined) {
    window = { date: undefined, window: { start: overrides.windowStart, end: overrides.windowEnd } };
  }

  const scope = { ...config.scope };
  if (overrides.sku.length > 0) scope.skus = overrides.sku;
  if (overrides.skuFile !== undefined) scope.sku_file = resolve(overrides.skuFile);
  if (overrides.location.length > 0) scope.locations = overrides.location;

  return {
    ...config,
    ...window,
    tolerance: overrides.tolerance ?? config.tolerance,
    output: overrides.output === undefined ? config.output : resolve(overrides.output),
    format: overrides.format ?? config.format,
    reference_timezone: overrides.referenceTimezone ?? config.reference_timezone,
    key_case_sensitive: overrides.caseInsensitive === true ? false : config.key_case_sensitive,
    missing_metric_policy: overrides.missingMetricPolicy ?? config.missing_metric_policy,
    strict: overrides.strict ?? config.strict,
    scope,
  };
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Parse a run configuration. Relative paths resolve against `baseDir`.
 *
 * @throws {SchemaValidationError} if the document is invalid
 */
export function parseRunConfig(document: unknown, baseDir: string): RunConfig {
  const parsed = RunConfigSchema.safeParse(document);
  if (!parsed.success) throw fromZodError(parsed.error, "config");

  const config = parsed.data;
  const source = (s: SourceConfig): SourceConfig => ({ ...s, path: resolve(baseDir, s.path) });
  return {
    ...config,
    output: resolve(baseDir, config.output),
    scope: {
      ...config.scope,
      ...(config.scope.sku_file === undefined
        ? {}
        : { sku_file: resolve(baseDir, config.scope.sku_file) }),
    },
    sources: { a: source(config.sources.a), b: source(config.sources.b) },
  };
}

/**
 * Read and validate a run configuration file.
 *
 * @throws {SchemaValidationError} if the file is missing, not JSON, or invalid
 */
export async function loadRunConfig(path: string): Promise<RunConfig> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err) {
    throw new SchemaValidationError(`Cannot read config file ${path}: ${errorMessage(err)}`, {
      field: "config",
      reason: "missing",
    });
  }

  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (err) {
    throw new SchemaValidationError(`Config file ${path} is not valid JSON: ${errorMessage(err)}`, {
      field: "config",
      reason: "invalid-record",
    });
  }

  return parseRunConfig(document, dirname(resolve(path)));
}

// =============================================================================
// Engine configuration
// =============================================================================

function toMapping(mapping: SourceConfig["mapping"]): FieldMapping {
  return {
    columns: mapping.columns,
    unitFactor: mapping.unit_factor,
    timezone: mapping.timezone,
    missing: mapping.missing,
    unavailableMarkers: mapping.unavailable_markers,
  };
}

export function toSourceDefinition(source: SourceConfig): SourceDefinition {
  return { label: source.label, mapping: toMapping(source.mapping) };
}

export function toToleranceConfig(tolerance: RunConfig["tolerance"]): ToleranceConfig {
  if (typeof tolerance === "number") {
    return { defaults: { abs: 0, pct: tolerance, mode: "pct" } };
  }
  return {
    defaults: {
      abs: tolerance.abs ?? 0,
      pct: tolerance.pct ?? 0,
      mode: tolerance.mode ?? "pct",
    },
    metrics: tolerance.metrics,
  };
}

/** Build the engine configuration. `extraSkus` come from the SKU file. */
export function toReconcilerConfig(
  config: RunConfig,
  extraSkus: readonly string[],
  hooks: Pick<ReconcilerConfig, "log" | "clock"> = {},
): ReconcilerConfig {
  const skus = [...(config.scope.skus ?? []), ...extraSkus];
  return {
    sources: {
      a: toSourceDefinition(config.sources.a),
      b: toSourceDefinition(config.sources.b),
    },
    window:
      config.date !== undefined
        ? { date: config.date }
        : config.window !== undefined
          ? { start: config.window.start, end: config.window.end }
          : undefined,
    referenceTimezone: config.reference_timezone,
    tolerance: toToleranceConfig(config.tolerance),
    metrics: config.metrics,
    headlineMetric: config.headline_metric,
    keyCaseSensitive: config.key_case_sensitive,
    missingMetricPolicy: config.missing_metric_policy,
    availablePolicy: config.available_policy,
    precision: config.precision,
    strict: config.strict,
    scope: { skus, locationIds: config.scope.locations ?? [] },
    ...hooks,
  };
}

// =============================================================================
// Helpers
// =============================================================================

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Collapse Zod issues into one SchemaValidationError naming the first field. */
export function fromZodError(error: z.ZodError, root: string): SchemaValidationError {
  const issues = error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path === "" ? issue.message : `${path}: ${issue.message}`;
  });
  const first = error.issues[0];
  const field = first && first.path.length > 0 ? first.path.join(".") : root;
  return new SchemaValidationError(`Invalid ${root}: ${issues.join("; ")}`, {
    field,
    reason: "invalid-mapping",
  });
}
