// Core types shared by the validator, schemas and records

/** Field name to type descriptor, in declaration order */
export type SchemaFields = Record<string, string>;

/** STRICT requires an exact key-set match; LOOSE tolerates extra and missing-nullable keys */
export type ValidationMode = 'strict' | 'loose';

export type Severity = 'error' | 'warning';

// Error codes for programmatic error handling
export enum ValidationErrorCode {
  EMPTY_SCHEMA = 'EMPTY_SCHEMA',
  MISSING_FIELD = 'MISSING_FIELD',
  TYPE_MISMATCH = 'TYPE_MISMATCH',
  UNEXPECTED_FIELD = 'UNEXPECTED_FIELD',
  INVALID_DESCRIPTOR = 'INVALID_DESCRIPTOR',
  CONSTRUCTION_REJECTED = 'CONSTRUCTION_REJECTED',
  SCHEMA_NOT_EXTENDABLE = 'SCHEMA_NOT_EXTENDABLE',
}

// Rich error information
export type ValidationError = {
  path: string; // JSON Pointer (e.g., "/tags/1")
  message: string;
  code: ValidationErrorCode;
  field?: string; // Top-level field the failure belongs to
  expected?: string; // Descriptor that failed
  actual?: string; // Kind name of the value received
  context?: Record<string, unknown>; // Neighbouring fields, for display only
};

export type ValidationResult = {
  valid: boolean;
  errors: ValidationError[];
};

/** Brand carried by every record instance, checked by the validator */
export const RECORD_TAG: unique symbol = Symbol('record-schema.record');

/**
 * What the validator needs to know about a record: that it is one, and which schema it is bound to.
 */
export interface RecordInstance {
  readonly [RECORD_TAG]: true;
  readonly schemaName: string;
  toObject(): Record<string, unknown>;
}

export function isRecordInstance(value: unknown): value is RecordInstance {
  return typeof value === 'object' && value !== null && RECORD_TAG in value;
}

export type CreateResult<T> = { ok: true; record: T } | { ok: false; errors: ValidationError[] };

export type CreateOptions = {
  /** Construct without reporting diagnostics */
  quiet?: boolean;
};

/**
 * Resolves schema references (descriptors such as "IPlayer") to record factories.
 */
export interface SchemaResolver {
  has(name: string): boolean;
  tryCreate(
    name: string,
    data: Record<string, unknown>,
    mode: ValidationMode,
    options?: CreateOptions,
  ): CreateResult<RecordInstance>;
}
