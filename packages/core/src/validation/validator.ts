// Core validator implementation

import { createLogger } from '@record-schema/logger';
import { VALIDATION_ENVIRONMENTS, type Environment, type ValidationEnvironmentConfig } from '../config.js';
import type { Descriptor } from '../descriptor/ast.js';
import { parseDescriptor } from '../descriptor/parser.js';
import {
  createLoggerSink,
  reportSafely,
  toDiagnostic,
  type Diagnostic,
  type DiagnosticSink,
} from '../diagnostics.js';
import { DescriptorParseError, errorMessage } from '../errors.js';
import type {
  SchemaFields,
  SchemaResolver,
  Severity,
  ValidationError,
  ValidationMode,
  ValidationResult,
} from '../types.js';
import { ValidationErrorCode } from '../types.js';
import { appendPath, formatPath, hasOwn } from '../utils.js';
import { classify, kindName, kindOf } from '../value-kind.js';

// Validator options
export type ValidatorOptions = {
  // Production skips validation entirely
  environment?: Environment; // default: 'development'

  // Collect all errors (true) or fail on first error (false)
  collectAllErrors?: boolean; // default: false

  // Neighbouring fields attached to each error for display
  contextFields?: number; // default: 3

  // Where diagnostics go
  sink?: DiagnosticSink; // default: JSON lines through @record-schema/logger
};

export type ValidateRecordOptions = {
  label?: string;
  severity?: Severity;
  report?: boolean; // default: true
};

/**
 * First failing location inside a value
 */
export type Mismatch = {
  path: string;
  expected: string;
  actual: string;
  reason: 'type' | 'unknown_schema' | 'malformed';
};

type ParsedDescriptor = Descriptor | DescriptorParseError;

export class Validator {
  readonly resolver: SchemaResolver | null;
  readonly sink: DiagnosticSink;
  private readonly envConfig: ValidationEnvironmentConfig;
  private readonly collectAllErrors: boolean;
  private readonly contextFields: number;
  private readonly descriptors = new Map<string, ParsedDescriptor>();

  constructor(resolver?: SchemaResolver, options: ValidatorOptions = {}) {
    const environment = options.environment ?? 'development';
    this.resolver = resolver ?? null;
    this.envConfig = VALIDATION_ENVIRONMENTS[environment];
    this.collectAllErrors = options.collectAllErrors ?? false;
    this.contextFields = options.contextFields ?? 3;
    this.sink = options.sink ?? createLoggerSink(createLogger({ environment }));
  }

  /** False in production, where every check passes without looking at the data */
  get enabled(): boolean {
    return this.envConfig.validate;
  }

  /**
   * Parse a descriptor through the cache.
   * @throws DescriptorParseError
   */
  parse(descriptor: string): Descriptor {
    const parsed = this.lookup(descriptor);
    if (parsed instanceof DescriptorParseError) {
      throw parsed;
    }
    return parsed;
  }

  /**
   * Parse without throwing; malformed descriptors give null
   */
  tryParse(descriptor: string): Descriptor | null {
    const parsed = this.lookup(descriptor);
    return parsed instanceof DescriptorParseError ? null : parsed;
  }

  /**
   * Structural check of a single value
   */
  check(value: unknown, descriptor: string): boolean {
    return this.explain(value, descriptor) === null;
  }

  /**
   * Like check(), but says where and why the value failed
   */
  explain(value: unknown, descriptor: string, path = ''): Mismatch | null {
    if (!this.enabled) {
      return null;
    }

    const mismatch = this.locate(value, descriptor, path);
    if (mismatch?.reason === 'malformed') {
      this.report({
        severity: 'error',
        code: ValidationErrorCode.INVALID_DESCRIPTOR,
        message: errorMessage(this.lookup(descriptor)),
        label: 'descriptor',
        expected: descriptor,
        path,
      });
    }
    return mismatch;
  }

  /**
   * Validate every field of a record against a schema.
   *
   * Declared fields are checked in declaration order, then (strict only)
   * undeclared keys. Stops at the first failure unless collectAllErrors is set.
   */
  validateRecord(
    data: Record<string, unknown>,
    fields: SchemaFields,
    mode: ValidationMode | boolean = 'loose',
    options: ValidateRecordOptions = {},
  ): ValidationResult {
    if (!this.enabled) {
      return { valid: true, errors: [] };
    }

    const strict = mode === true || mode === 'strict';
    const label = options.label ?? 'record';
    const severity = options.severity ?? 'error';
    const report = options.report ?? true;
    const names = Object.keys(fields);
    const errors: ValidationError[] = [];

    const done = (): ValidationResult => {
      if (report) {
        for (const error of errors) {
          this.report(toDiagnostic(error, severity, label));
        }
      }
      return { valid: errors.length === 0, errors };
    };

    if (names.length === 0) {
      errors.push({
        path: '',
        message: 'Schema has no fields',
        code: ValidationErrorCode.EMPTY_SCHEMA,
      });
      return done();
    }

    for (const [index, field] of names.entries()) {
      const error = this.validateField(data, field, fields[field], names, index);
      if (error) {
        errors.push(error);
        if (!this.collectAllErrors) return done();
      }
    }

    if (strict) {
      const keys = Object.keys(data);
      for (const [index, key] of keys.entries()) {
        if (hasOwn(fields, key)) continue;
        errors.push({
          path: formatPath([key]),
          message: `Unexpected field '${key}' in strict mode`,
          code: ValidationErrorCode.UNEXPECTED_FIELD,
          field: key,
          actual: kindOf(data[key]),
          context: this.excerpt(data, keys, index),
        });
        if (!this.collectAllErrors) return done();
      }
    }

    return done();
  }

  /**
   * Fire-and-forget reporting, silenced when the environment emits nothing
   */
  report(diagnostic: Diagnostic): void {
    if (this.envConfig.emitDiagnostics) {
      reportSafely(this.sink, diagnostic);
    }
  }

  private validateField(
    data: Record<string, unknown>,
    field: string,
    descriptor: string,
    names: string[],
    index: number,
  ): ValidationError | null {
    const path = formatPath([field]);
    const present = hasOwn(data, field);
    const mismatch = this.locate(present ? data[field] : undefined, descriptor, path);
    if (!mismatch) {
      return null;
    }

    const context = this.excerpt(data, names, index);

    if (mismatch.reason === 'malformed') {
      return {
        path,
        message: `Field '${field}' has a malformed descriptor '${descriptor}'`,
        code: ValidationErrorCode.INVALID_DESCRIPTOR,
        field,
        expected: descriptor,
        context,
      };
    }

    // Presence is checked before type
    if (!present) {
      return {
        path,
        message: `Missing field '${field}'`,
        code: ValidationErrorCode.MISSING_FIELD,
        field,
        expected: descriptor,
        context,
      };
    }

    const where = mismatch.path === path ? '' : ` at ${mismatch.path}`;
    const unknown = mismatch.reason === 'unknown_schema' ? ' (schema not registered)' : '';
    return {
      path: mismatch.path,
      message: `Type mismatch for field '${field}'${where}: expected ${mismatch.expected}, got ${mismatch.actual}${unknown}`,
      code: ValidationErrorCode.TYPE_MISMATCH,
      field,
      expected: mismatch.expected,
      actual: mismatch.actual,
      context,
    };
  }

  private locate(value: unknown, descriptor: string, path: string): Mismatch | null {
    const parsed = this.lookup(descriptor);
    if (parsed instanceof DescriptorParseError) {
      return { path, expected: descriptor, actual: kindOf(value), reason: 'malformed' };
    }
    return this.mismatch(value, parsed, path);
  }

  /**
   * Recursive structural match
   */
  private mismatch(value: unknown, descriptor: Descriptor, path: string): Mismatch | null {
    const kind = classify(value);
    const fail = (reason: Mismatch['reason'] = 'type'): Mismatch => ({
      path,
      expected: descriptor.text,
      actual: kindName(kind),
      reason,
    });

    if (kind.tag === 'null') {
      return descriptor.nullable ? null : fail();
    }

    const type = descriptor.type;
    switch (type.kind) {
      case 'array': {
        if (kind.tag !== 'array') return fail();
        if (!type.element) return null;
        for (const [index, item] of kind.items.entries()) {
          const inner = this.mismatch(item, type.element, appendPath(path, index));
          if (inner) return inner;
        }
        return null;
      }
      case 'dictionary':
        return kind.tag === 'map' ? null : fail();
      case 'schema': {
        if (!this.resolver?.has(type.name)) return fail('unknown_schema');
        return kind.tag === 'record' && kind.record.schemaName === type.name ? null : fail();
      }
      case 'primitive':
        return matchesPrimitive(kindName(kind), type.written) ? null : fail();
    }
  }

  /**
   * Up to contextFields present neighbours of keys[index], nearest first,
   * returned in key order
   */
  private excerpt(
    data: Record<string, unknown>,
    keys: string[],
    index: number,
  ): Record<string, unknown> | undefined {
    if (this.contextFields <= 0) return undefined;

    const picked: number[] = [];
    for (let distance = 1; distance < keys.length && picked.length < this.contextFields; distance++) {
      for (const candidate of [index - distance, index + distance]) {
        if (picked.length >= this.contextFields) break;
        if (candidate >= 0 && candidate < keys.length && hasOwn(data, keys[candidate])) {
          picked.push(candidate);
        }
      }
    }

    if (picked.length === 0) return undefined;

    const context: Record<string, unknown> = {};
    for (const position of picked.sort((a, b) => a - b)) {
      context[keys[position]] = data[keys[position]];
    }
    return context;
  }

  private lookup(descriptor: string): ParsedDescriptor {
    const cached = this.descriptors.get(descriptor);
    if (cached) return cached;

    let parsed: ParsedDescriptor;
    try {
      parsed = parseDescriptor(descriptor);
    } catch (err) {
      if (!(err instanceof DescriptorParseError)) {
        throw new Error(`Unexpected failure parsing '${descriptor}': ${errorMessage(err)}`, { cause: err });
      }
      parsed = err;
    }
    this.descriptors.set(descriptor, parsed);
    return parsed;
  }
}

/**
 * Exact kind name, whole numbers where floats are expected, then case-insensitive
 */
function matchesPrimitive(actual: string, expected: string): boolean {
  if (actual === expected) return true;
  if (actual === 'int' && expected.toLowerCase() === 'float') return true;
  return actual.toLowerCase() === expected.toLowerCase();
}

/**
 * Convenience function for one-off validation
 */
export function validateRecord(
  data: Record<string, unknown>,
  fields: SchemaFields,
  strict = false,
  resolver?: SchemaResolver,
  options?: ValidatorOptions,
): ValidationResult {
  const validator = new Validator(resolver, options);
  return validator.validateRecord(data, fields, strict);
}
