/**
 * ValidatedRecord - a key/value record bound to a schema
 *
 * Every write is validated against the effective schema. Strict records roll
 * back failed writes, so they only ever expose their last valid state. Loose
 * records keep a failed write and become tainted until a later write passes.
 */

import type { Descriptor } from './descriptor/ast.js';
import type { RecordSchema, SchemaDescription } from './schema.js';
import {
  isRecordInstance,
  RECORD_TAG,
  ValidationErrorCode,
  type CreateResult,
  type RecordInstance,
  type SchemaFields,
  type Severity,
  type ValidationError,
  type ValidationMode,
  type ValidationResult,
} from './types.js';
import { hasOwn, isPlainObject } from './utils.js';
import { Validator } from './validation/validator.js';

/** Reserved field holding per-owner data that is never validated */
export const NAMESPACE_FIELD = '_mod_data';

export type RecordStatus = 'valid' | 'tainted' | 'rejected';

export type RecordOptions = {
  mode?: ValidationMode; // default: 'loose'
  validator?: Validator; // default: a Validator without a schema resolver
  quiet?: boolean; // construct without reporting diagnostics
};

/** Owner id to owned data; entries that are not maps are left for their owner to replace */
type Namespaces = Record<string, unknown>;

/** Nested maps that already failed their schema are not offered to it again */
const unwrappable = new WeakSet<object>();

export class ValidatedRecord implements RecordInstance {
  readonly [RECORD_TAG] = true as const;
  readonly schema: RecordSchema;
  readonly mode: ValidationMode;
  private readonly validator: Validator;
  private data: Record<string, unknown> = {};
  private _status: RecordStatus = 'valid';
  private lastErrors: ValidationError[] = [];

  /**
   * Validate initialData and keep a copy of it. When validation fails the
   * record stays empty and its status is 'rejected'.
   */
  constructor(schema: RecordSchema, initialData: Record<string, unknown> = {}, options: RecordOptions = {}) {
    this.schema = schema;
    this.mode = options.mode ?? 'loose';
    this.validator = options.validator ?? new Validator();

    const candidate: Record<string, unknown> = {};
    const quiet = options.quiet ?? false;
    for (const [field, value] of Object.entries(initialData)) {
      candidate[field] = this.convert(field, copyValue(value), quiet);
    }

    const result = this.runValidation(candidate, 'error', !quiet);
    if (!result.valid) {
      this._status = 'rejected';
      this.lastErrors = [...result.errors, this.rejection(!quiet)];
      return;
    }

    this.data = candidate;
  }

  /**
   * Construct without leaving an empty record behind on failure
   */
  static tryCreate(
    schema: RecordSchema,
    initialData: Record<string, unknown> = {},
    options: RecordOptions = {},
  ): CreateResult<ValidatedRecord> {
    const record = new ValidatedRecord(schema, initialData, options);
    if (record.status === 'rejected') {
      return { ok: false, errors: record.errors() };
    }
    return { ok: true, record };
  }

  get schemaName(): string {
    return this.schema.name;
  }

  get status(): RecordStatus {
    return this._status;
  }

  isValid(): boolean {
    return this._status === 'valid';
  }

  /**
   * Errors from the last failed construction or write; empty after a successful one
   */
  errors(): ValidationError[] {
    return [...this.lastErrors];
  }

  /**
   * Stored value, or fallback when the field is absent. Plain maps stored
   * under a schema-typed field are upgraded to records on the way out,
   * without reporting anything.
   */
  get(field: string, fallback?: unknown): unknown {
    if (!hasOwn(this.data, field)) {
      return fallback;
    }
    const value = this.data[field];
    const upgraded = this.convert(field, value, true);
    if (upgraded !== value) {
      this.data[field] = upgraded;
    }
    return upgraded;
  }

  has(field: string): boolean {
    return hasOwn(this.data, field);
  }

  /** Stored field names, excluding the namespaced side-channel */
  keys(): string[] {
    return Object.keys(this.data).filter((key) => key !== NAMESPACE_FIELD);
  }

  /**
   * Write one field. Strict records restore the previous value on failure.
   * @returns true when the record is valid after the write
   */
  set(field: string, value: unknown): boolean {
    const existed = hasOwn(this.data, field);
    const previous = this.data[field];

    this.data[field] = this.convert(field, copyValue(value));

    return this.commit(() => {
      if (existed) {
        this.data[field] = previous;
      } else {
        delete this.data[field];
      }
    });
  }

  /**
   * Merge several fields at once. Strict records restore the whole
   * pre-merge state on failure.
   * @returns true when the record is valid after the merge
   */
  update(partialData: Record<string, unknown>): boolean {
    const snapshot = { ...this.data };

    for (const [field, value] of Object.entries(partialData)) {
      this.data[field] = this.convert(field, copyValue(value));
    }

    return this.commit(() => {
      this.data = snapshot;
    });
  }

  /**
   * Re-run validation on the current state without changing it
   */
  validate(): ValidationResult {
    return this.runValidation(this.data, this.mode === 'strict' ? 'error' : 'warning');
  }

  /**
   * Add fields to the schema's extension store, shared by every record of this schema
   * @returns false when the schema is not extendable
   */
  extendSchema(extraFields: SchemaFields): boolean {
    if (this.schema.extend(extraFields)) {
      return true;
    }
    this.validator.report({
      severity: 'warning',
      code: ValidationErrorCode.SCHEMA_NOT_EXTENDABLE,
      message: `Schema '${this.schema.name}' is not extendable`,
      label: this.schema.name,
    });
    return false;
  }

  effectiveSchema(): SchemaFields {
    return this.schema.fields();
  }

  describeSchema(): SchemaDescription {
    return this.schema.describe();
  }

  // Namespaced side-channel

  setNamespacedData(ownerId: string, key: string, value: unknown): void {
    const namespaces = this.namespaces(true);
    const owned = namespaces[ownerId];
    if (hasOwn(namespaces, ownerId) && isPlainObject(owned)) {
      owned[key] = value;
    } else {
      namespaces[ownerId] = { [key]: value };
    }
  }

  getNamespacedData(ownerId: string, key: string, fallback?: unknown): unknown {
    const owned = this.owned(ownerId);
    return owned && hasOwn(owned, key) ? owned[key] : fallback;
  }

  hasNamespacedData(ownerId: string): boolean {
    return this.owned(ownerId) !== null;
  }

  getAllNamespacedData(ownerId: string): Record<string, unknown> {
    return { ...this.owned(ownerId) };
  }

  clearNamespacedData(ownerId: string): void {
    const namespaces = this.namespaces(false);
    if (namespaces) {
      delete namespaces[ownerId];
    }
  }

  /** Owners holding a map of data, in insertion order */
  listNamespaceOwners(): string[] {
    const namespaces = this.namespaces(false) ?? {};
    return Object.keys(namespaces).filter((ownerId) => isPlainObject(namespaces[ownerId]));
  }

  /**
   * Plain copy of the record, nested records included. Feeding it back to
   * the constructor rebuilds an equivalent record.
   */
  toObject(): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [field, value] of Object.entries(this.data)) {
      result[field] = copyValue(value, true);
    }
    return result;
  }

  toJSON(): Record<string, unknown> {
    return this.toObject();
  }

  private commit(rollback: () => void): boolean {
    const result = this.runValidation(this.data, this.mode === 'strict' ? 'error' : 'warning');
    if (result.valid) {
      this._status = 'valid';
      this.lastErrors = [];
      return true;
    }

    this.lastErrors = result.errors;
    if (this.mode === 'strict') {
      rollback();
    } else {
      this._status = 'tainted';
    }
    return false;
  }

  /**
   * Validate everything except the side-channel. An empty effective schema
   * is not validated at all.
   */
  private runValidation(data: Record<string, unknown>, severity: Severity, report = true): ValidationResult {
    const fields = this.schema.fields();
    if (Object.keys(fields).length === 0) {
      return { valid: true, errors: [] };
    }

    const view: Record<string, unknown> = {};
    for (const [field, value] of Object.entries(data)) {
      if (field !== NAMESPACE_FIELD) view[field] = value;
    }

    return this.validator.validateRecord(view, fields, this.mode, {
      label: this.schema.name,
      severity,
      report,
    });
  }

  private rejection(report: boolean): ValidationError {
    const error: ValidationError = {
      path: '',
      message: `Initial data rejected for schema '${this.schema.name}'`,
      code: ValidationErrorCode.CONSTRUCTION_REJECTED,
    };
    if (!report) {
      return error;
    }
    this.validator.report({
      severity: 'error',
      code: error.code,
      message: error.message,
      label: this.schema.name,
    });
    return error;
  }

  /**
   * Wrap plain maps stored under schema-typed fields (or arrays of them)
   */
  private convert(field: string, value: unknown, quiet = false): unknown {
    const type = this.schema.descriptorFor(field);
    if (type === undefined || field === NAMESPACE_FIELD) {
      return value;
    }
    const descriptor = this.validator.tryParse(type);
    return descriptor ? this.wrap(value, descriptor, quiet) : value;
  }

  /**
   * Idempotent: records and values that need no wrapping come back unchanged
   */
  private wrap(value: unknown, descriptor: Descriptor, quiet: boolean): unknown {
    const type = descriptor.type;

    if (type.kind === 'schema' && isPlainObject(value)) {
      const resolver = this.validator.resolver;
      if (!resolver?.has(type.name) || unwrappable.has(value)) return value;
      const created = resolver.tryCreate(type.name, value, this.mode, { quiet });
      if (created.ok) return created.record;
      // A nested map that fails its own schema stays a map, so the outer check reports it
      unwrappable.add(value);
      return value;
    }

    if (type.kind === 'array' && type.element && Array.isArray(value)) {
      const element = type.element;
      let changed = false;
      const wrapped = value.map((item: unknown) => {
        const next = this.wrap(item, element, quiet);
        if (next !== item) changed = true;
        return next;
      });
      return changed ? wrapped : value;
    }

    return value;
  }

  private namespaces(create: true): Namespaces;
  private namespaces(create: false): Namespaces | null;
  private namespaces(create: boolean): Namespaces | null {
    const current = this.data[NAMESPACE_FIELD];
    if (isPlainObject(current)) {
      return current;
    }
    if (!create) {
      return null;
    }
    const fresh: Namespaces = {};
    this.data[NAMESPACE_FIELD] = fresh;
    return fresh;
  }

  private owned(ownerId: string): Record<string, unknown> | null {
    const namespaces = this.namespaces(false);
    if (!namespaces || !hasOwn(namespaces, ownerId)) return null;
    const owned = namespaces[ownerId];
    return isPlainObject(owned) ? owned : null;
  }
}


/**
 * Copy arrays, plain maps and Maps so callers cannot mutate stored state.
 * Records are shared unless flatten is set, in which case they become plain maps.
 */
function copyValue(value: unknown, flatten = false): unknown {
  if (Array.isArray(value)) {
    return value.map((item: unknown) => copyValue(item, flatten));
  }
  if (value instanceof Map) {
    const copy = new Map<unknown, unknown>();
    for (const [key, item] of value) {
      copy.set(key, copyValue(item, flatten));
    }
    return copy;
  }
  if (isRecordInstance(value)) {
    return flatten ? value.toObject() : value;
  }
  if (isPlainObject(value)) {
    const copy: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      copy[key] = copyValue(item, flatten);
    }
    return copy;
  }
  return value;
}
