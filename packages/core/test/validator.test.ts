import { afterEach, describe, expect, it, vi } from 'vitest';
import { nullSink, type DiagnosticSink } from '../src/diagnostics.js';
import { ValidationErrorCode } from '../src/types.js';
import { validateRecord, Validator } from '../src/validation/validator.js';
import { createTestValidator } from './helpers.js';

describe('Validator', () => {
  describe('check', () => {
    const { validator } = createTestValidator();

    it('should accept null only for nullable descriptors', () => {
      expect(validator.check(null, 'int?')).toBe(true);
      expect(validator.check(undefined, 'String?')).toBe(true);
      expect(validator.check(null, 'int')).toBe(false);
      expect(validator.check(undefined, 'Array<int>')).toBe(false);
    });

    it('should widen int to float but not float to int', () => {
      expect(validator.check(1, 'float')).toBe(true);
      expect(validator.check(2.0, 'int')).toBe(true);
      expect(validator.check(1.5, 'int')).toBe(false);
    });

    it('should match primitive names case-insensitively', () => {
      expect(validator.check('a', 'string')).toBe(true);
      expect(validator.check(true, 'Bool')).toBe(true);
      expect(validator.check(new Date(0), 'date')).toBe(true);
      expect(validator.check('a', 'bool')).toBe(false);
    });

    it('should check every element of a typed array', () => {
      expect(validator.check([], 'Array<int>')).toBe(true);
      expect(validator.check([1, 2], 'Array<int>')).toBe(true);
      expect(validator.check([1, 'x'], 'Array<int>')).toBe(false);
      expect(validator.check([1, null], 'Array<int?>')).toBe(true);
      expect(validator.check([[1], [2, 3]], 'Array<Array<int>>')).toBe(true);
    });

    it('should accept any elements in an untyped array', () => {
      expect(validator.check([1, 'a', null], 'Array')).toBe(true);
      expect(validator.check('x', 'Array')).toBe(false);
    });

    it('should accept maps for Dictionary', () => {
      expect(validator.check({ a: 1 }, 'Dictionary')).toBe(true);
      expect(validator.check(new Map([['a', 1]]), 'Dictionary')).toBe(true);
      expect(validator.check([], 'Dictionary')).toBe(false);
    });

    it('should fail schema references without a resolver', () => {
      expect(validator.check({ name: 'Sword' }, 'IItem')).toBe(false);
      expect(validator.check(null, 'IItem?')).toBe(true);
    });

    it('should fail and report malformed descriptors', () => {
      const { validator, sink } = createTestValidator();

      expect(validator.check(1, 'Array<int')).toBe(false);
      expect(sink.last()).toEqual({
        severity: 'error',
        code: ValidationErrorCode.INVALID_DESCRIPTOR,
        message: "Unclosed 'Array<' in descriptor 'Array<int' at offset 9",
        label: 'descriptor',
        expected: 'Array<int',
        path: '',
      });
    });
  });

  describe('explain', () => {
    const { validator } = createTestValidator();

    it('should point at the failing element', () => {
      expect(validator.explain([1, 'x'], 'Array<int>')).toEqual({
        path: '/1',
        expected: 'int',
        actual: 'String',
        reason: 'type',
      });
    });

    it('should point into nested arrays', () => {
      expect(validator.explain([[1], [2, 'x']], 'Array<Array<int>>')?.path).toBe('/1/1');
    });

    it('should return null for matching values', () => {
      expect(validator.explain(['a'], 'Array<String>')).toBeNull();
    });

    it('should flag unresolvable schemas', () => {
      expect(validator.explain({}, 'IPet')).toEqual({
        path: '',
        expected: 'IPet',
        actual: 'Dictionary',
        reason: 'unknown_schema',
      });
    });
  });

  describe('parse', () => {
    it('should cache parsed descriptors', () => {
      const { validator } = createTestValidator();
      expect(validator.parse('Array<int>')).toBe(validator.parse('Array<int>'));
    });

    it('should throw for malformed descriptors and tryParse should not', () => {
      const { validator } = createTestValidator();
      expect(() => validator.parse('int??')).toThrow("Unexpected '?'");
      expect(validator.tryParse('int??')).toBeNull();
    });
  });

  describe('validateRecord', () => {
    const heroFields = { name: 'String', level: 'int', health: 'float?' };

    it('should accept absent nullable fields in both modes', () => {
      const { validator } = createTestValidator();
      const data = { name: 'Hero', level: 1 };

      expect(validator.validateRecord(data, heroFields, 'loose')).toEqual({ valid: true, errors: [] });
      expect(validator.validateRecord(data, heroFields, 'strict')).toEqual({ valid: true, errors: [] });
    });

    it('should report a type mismatch with context', () => {
      const { validator } = createTestValidator();
      const result = validator.validateRecord({ name: 'Hero', level: 'one' }, heroFields, 'loose');

      expect(result.valid).toBe(false);
      expect(result.errors).toEqual([
        {
          path: '/level',
          message: "Type mismatch for field 'level': expected int, got String",
          code: ValidationErrorCode.TYPE_MISMATCH,
          field: 'level',
          expected: 'int',
          actual: 'String',
          context: { name: 'Hero' },
        },
      ]);
    });

    it('should reject extra keys only in strict mode', () => {
      const { validator } = createTestValidator();
      const fields = { a: 'int' };
      const data = { a: 1, b: 2 };

      expect(validator.validateRecord(data, fields, 'loose').valid).toBe(true);
      expect(validator.validateRecord(data, fields, 'strict').errors).toEqual([
        {
          path: '/b',
          message: "Unexpected field 'b' in strict mode",
          code: ValidationErrorCode.UNEXPECTED_FIELD,
          field: 'b',
          actual: 'int',
          context: { a: 1 },
        },
      ]);
    });

    it('should accept a boolean strict flag', () => {
      const { validator } = createTestValidator();
      expect(validator.validateRecord({ a: 1, b: 2 }, { a: 'int' }, true).valid).toBe(false);
      expect(validator.validateRecord({ a: 1, b: 2 }, { a: 'int' }, false).valid).toBe(true);
    });

    it('should point into typed arrays', () => {
      const { validator } = createTestValidator();
      const fields = { tags: 'Array<String>' };

      expect(validator.validateRecord({ tags: ['x', 'y'] }, fields).valid).toBe(true);
      expect(validator.validateRecord({ tags: ['x', 5] }, fields).errors).toEqual([
        {
          path: '/tags/1',
          message: "Type mismatch for field 'tags' at /tags/1: expected String, got int",
          code: ValidationErrorCode.TYPE_MISMATCH,
          field: 'tags',
          expected: 'String',
          actual: 'int',
          context: undefined,
        },
      ]);
    });

    it('should fail an empty schema', () => {
      const { validator } = createTestValidator();
      expect(validator.validateRecord({ a: 1 }, {})).toEqual({
        valid: false,
        errors: [{ path: '', message: 'Schema has no fields', code: ValidationErrorCode.EMPTY_SCHEMA }],
      });
    });

    it('should report missing fields before type', () => {
      const { validator } = createTestValidator();
      const [error] = validator.validateRecord({ name: 'Hero' }, { name: 'String', level: 'int' }).errors;

      expect(error.code).toBe(ValidationErrorCode.MISSING_FIELD);
      expect(error.message).toBe("Missing field 'level'");
      expect(error.expected).toBe('int');
    });

    it('should treat a present null as a type mismatch', () => {
      const { validator } = createTestValidator();
      const [error] = validator.validateRecord({ name: 'Hero', level: null }, { name: 'String', level: 'int' }).errors;

      expect(error.code).toBe(ValidationErrorCode.TYPE_MISMATCH);
      expect(error.actual).toBe('null');
    });

    it('should check fields in declaration order', () => {
      const { validator } = createTestValidator();
      const result = validator.validateRecord({ b: 'x', a: 'y' }, { a: 'int', b: 'int' });

      expect(result.errors).toHaveLength(1);
      expect(result.errors[0].field).toBe('a');
    });

    it('should collect every error when configured', () => {
      const { validator } = createTestValidator({ collectAllErrors: true });
      const result = validator.validateRecord({ a: 'x', c: 1 }, { a: 'int', b: 'String' }, 'strict');

      expect(result.errors.map((error) => [error.code, error.field])).toEqual([
        [ValidationErrorCode.TYPE_MISMATCH, 'a'],
        [ValidationErrorCode.MISSING_FIELD, 'b'],
        [ValidationErrorCode.UNEXPECTED_FIELD, 'c'],
      ]);
    });

    it('should fail fields with malformed descriptors', () => {
      const { validator, sink } = createTestValidator();
      const result = validator.validateRecord({ a: 1 }, { a: 'Array<' });

      expect(result.errors[0]).toMatchObject({
        code: ValidationErrorCode.INVALID_DESCRIPTOR,
        message: "Field 'a' has a malformed descriptor 'Array<'",
        field: 'a',
      });
      expect(sink.all()).toHaveLength(1);
    });

    describe('context', () => {
      it('should pick the nearest present neighbours in key order', () => {
        const { validator } = createTestValidator({ contextFields: 2 });
        const fields = { a: 'int', b: 'int', c: 'int', d: 'int', e: 'int' };
        const [error] = validator.validateRecord({ a: 1, b: 2, c: 'x', d: 4, e: 5 }, fields).errors;

        expect(error.context).toEqual({ b: 2, d: 4 });
      });

      it('should skip absent neighbours', () => {
        const { validator } = createTestValidator({ contextFields: 2 });
        const fields = { a: 'int', b: 'int?', c: 'int', d: 'int?', e: 'int' };
        const [error] = validator.validateRecord({ a: 1, c: 'x', e: 5 }, fields).errors;

        expect(error.context).toEqual({ a: 1, e: 5 });
      });

      it('should be omitted when disabled', () => {
        const { validator } = createTestValidator({ contextFields: 0 });
        const [error] = validator.validateRecord({ a: 1, b: 'x' }, { a: 'int', b: 'int' }).errors;

        expect(error.context).toBeUndefined();
      });
    });

    describe('diagnostics', () => {
      afterEach(() => {
        vi.restoreAllMocks();
      });

      it('should report failures with the given label and severity', () => {
        const { validator, sink } = createTestValidator();
        validator.validateRecord({ name: 'Hero', level: 'one' }, heroFields, 'loose', {
          label: 'IHero',
          severity: 'warning',
        });

        expect(sink.all()).toEqual([
          {
            severity: 'warning',
            code: ValidationErrorCode.TYPE_MISMATCH,
            message: "Type mismatch for field 'level': expected int, got String",
            label: 'IHero',
            path: '/level',
            field: 'level',
            expected: 'int',
            actual: 'String',
          },
        ]);
      });

      it('should report nothing for valid data', () => {
        const { validator, sink } = createTestValidator();
        validator.validateRecord({ name: 'Hero', level: 1 }, heroFields);

        expect(sink.all()).toEqual([]);
      });

      it('should not let a failing sink change the result', () => {
        const consoleError = vi.spyOn(console, 'error').mockImplementation(() => {});
        const sink: DiagnosticSink = {
          report() {
            throw new Error('sink down');
          },
        };
        const validator = new Validator(undefined, { environment: 'test', sink });

        const result = validator.validateRecord({ name: 'Hero', level: 'one' }, heroFields);

        expect(result.valid).toBe(false);
        expect(consoleError).toHaveBeenCalledTimes(1);
      });
    });

    describe('production', () => {
      it('should skip validation and report nothing', () => {
        const { validator, sink } = createTestValidator({ environment: 'production' });

        expect(validator.enabled).toBe(false);
        expect(validator.check('x', 'int')).toBe(true);
        expect(validator.validateRecord({ name: 5, extra: true }, heroFields, 'strict')).toEqual({
          valid: true,
          errors: [],
        });
        expect(sink.all()).toEqual([]);
      });
    });
  });
});

describe('validateRecord', () => {
  it('should validate with a one-off validator', () => {
    const fields = { a: 'int' };

    expect(validateRecord({ a: 1, b: 2 }, fields, false, undefined, { sink: nullSink }).valid).toBe(true);
    expect(validateRecord({ a: 1, b: 2 }, fields, true, undefined, { sink: nullSink }).valid).toBe(false);
  });
});
