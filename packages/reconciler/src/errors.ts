/**
 * Reconciler error taxonomy.
 *
 * - SchemaValidationError: bad configuration or an unparseable record field
 * - SourceFetchError: a source could not be read; aborts the run
 *
 * Mismatches are not errors. They are findings carried by the report.
 */

export type ReconcilerErrorCode =
  | "SCHEMA_VALIDATION"
  | "SOURCE_FETCH"
  | "INVARIANT_VIOLATION";

export class ReconcilerError extends Error {
  public readonly code: ReconcilerErrorCode;

  constructor(code: ReconcilerErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ReconcilerError";
    this.code = code;
  }
}

/** Why a field failed validation. */
export type SchemaViolation =
  | "missing"
  | "invalid-record"
  | "empty"
  | "non-numeric"
  | "invalid-timestamp"
  | "invalid-zone"
  | "invalid-mapping"
  | "unsorted-stream";

export interface SchemaValidationDetails {
  readonly field: string;
  readonly reason: SchemaViolation;
  /** Source label, when the failure belongs to one source */
  readonly source?: string;
  /** `sku@location` of the offending record, or `#index` */
  readonly recordKey?: string;
}

export class SchemaValidationError extends ReconcilerError {
  public readonly field: string;
  public readonly reason: SchemaViolation;
  public readonly source: string | undefined;
  public readonly recordKey: string | undefined;

  constructor(message: string, details: SchemaValidationDetails) {
    super("SCHEMA_VALIDATION", message);
    this.name = "SchemaValidationError";
    this.field = details.field;
    this.reason = details.reason;
    this.source = details.source;
    this.recordKey = details.recordKey;
  }
}

export class SourceFetchError extends ReconcilerError {
  public readonly source: string;

  constructor(source: string, message: string, options?: { cause?: unknown }) {
    super("SOURCE_FETCH", `Source "${source}": ${message}`, options);
    this.name = "SourceFetchError";
    this.source = source;
  }
}
