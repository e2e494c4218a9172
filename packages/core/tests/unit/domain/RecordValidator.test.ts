import { describe, it, expect, vi } from 'vitest';
import { RecordValidator } from '../../../src/domain/services/RecordValidator.js';
import { SchemaValidator } from '../../../src/domain/services/SchemaValidator.js';
import { createSourceRecord } from '../../../src/domain/model/Record.js';
import { createAjvStructuralValidator } from '../../../src/infrastructure/structural/AjvStructuralValidator.js';
import type { Schema } from '../../../src/domain/model/Schema.js';
import type { ValidationOutcome } from '../../../src/domain/model/ValidationResult.js';
import type { StructuralValidator } from '../../../src/domain/ports/StructuralValidator.js';

function schemaOf(items: unknown[]): Schema {
  const schema = new SchemaValidator().validate({ items });
  if (schema === undefined) throw new Error('schema expected');
  return schema;
}

function withSchema(items: unknown[], fieldCount?: number): RecordValidator {
  return new RecordValidator({
    schema: schemaOf(items),
    fieldCount,
    structuralValidator: createAjvStructuralValidator,
  });
}

function messageOf(outcome: ValidationOutcome): string | undefined {
  return outcome.isValid ? undefined : outcome.error.message;
}

describe('RecordValidator', () => {
  describe('constructor', () => {
    it('should reject a non-positive field count', () => {
      expect(() => new RecordValidator({ fieldCount: 0 })).toThrow(RangeError);
      expect(() => new RecordValidator({ fieldCount: 2.5 })).toThrow(RangeError);
    });

    it('should require a structural validator factory with a schema', () => {
      expect(() => new RecordValidator({ schema: schemaOf([{}]) })).toThrow(
        'RecordValidator: a structuralValidator factory is required when a schema is given',
      );
    });

    it('should build the structural validator once', () => {
      const factory = vi.fn((): StructuralValidator => ({ validate: () => undefined }));
      const validator = new RecordValidator({ schema: schemaOf([{}]), structuralValidator: factory });

      validator.checkSchema(['a']);
      validator.checkSchema(['b']);

      expect(factory).toHaveBeenCalledOnce();
    });
  });

  describe('checkFieldCount()', () => {
    it('should adopt the first count as the contract', () => {
      const validator = new RecordValidator();
      expect(validator.fieldCount).toBeUndefined();

      expect(validator.checkFieldCount(3).isValid).toBe(true);
      expect(validator.fieldCount).toBe(3);
    });

    it('should report a mismatch against the adopted count', () => {
      const validator = new RecordValidator();
      validator.checkFieldCount(3);

      const outcome = validator.checkFieldCount(2);

      expect(outcome).toEqual({
        isValid: false,
        error: { code: 'FIELD_COUNT', message: 'bad field count - should be 3 but is: 2' },
      });
      expect(validator.lastError).toBe('bad field count - should be 3 but is: 2');
    });

    it('should keep the contract after a mismatch', () => {
      const validator = new RecordValidator();
      validator.checkFieldCount(3);
      validator.checkFieldCount(5);

      expect(validator.fieldCount).toBe(3);
      expect(validator.checkFieldCount(3).isValid).toBe(true);
    });

    it('should use a configured count from the first record on', () => {
      const validator = new RecordValidator({ fieldCount: 2 });

      expect(messageOf(validator.checkFieldCount(3))).toBe('bad field count - should be 2 but is: 3');
    });
  });

  describe('checkSchema()', () => {
    it('should pass any record without a schema', () => {
      const validator = new RecordValidator();
      expect(validator.checkSchema(['anything', '']).isValid).toBe(true);
      expect(validator.hasSchema).toBe(false);
    });

    it('should report a value that is not an integer', () => {
      const validator = withSchema([{ numericKind: 'integer' }]);

      const outcome = validator.checkSchema(['abc']);

      expect(outcome).toEqual({
        isValid: false,
        error: {
          code: 'NUMERIC_TYPE',
          message: 'Failed numericKind:integer check on field 0 - value: abc',
          fieldIndex: 0,
          value: 'abc',
        },
      });
    });

    it('should report a value that is not a float', () => {
      const validator = withSchema([{ title: 'price', numericKind: 'float' }]);

      expect(messageOf(validator.checkSchema(['1.2.3']))).toBe(
        'Failed numericKind:float check on field 0 (price) - value: 1.2.3',
      );
    });

    it('should report a value below the minimum', () => {
      const validator = withSchema([{ numericKind: 'integer', numericMinimum: 0 }]);

      const outcome = validator.checkSchema(['-5']);

      expect(outcome.isValid).toBe(false);
      if (!outcome.isValid) {
        expect(outcome.error.code).toBe('NUMERIC_MINIMUM');
        expect(outcome.error.message).toBe('Failed numericMinimum:0 check on field 0 - value: -5');
      }
    });

    it('should report a value above the maximum', () => {
      const validator = withSchema([{ numericKind: 'float', numericMaximum: '99.5' }]);

      const outcome = validator.checkSchema(['100']);

      expect(outcome.isValid).toBe(false);
      if (!outcome.isValid) {
        expect(outcome.error.code).toBe('NUMERIC_MAXIMUM');
        expect(outcome.error.message).toBe('Failed numericMaximum:99.5 check on field 0 - value: 100');
      }
    });

    it('should treat range limits as inclusive', () => {
      const validator = withSchema([{ numericKind: 'integer', numericMinimum: 1, numericMaximum: 10 }]);

      expect(validator.checkSchema(['1']).isValid).toBe(true);
      expect(validator.checkSchema(['10']).isValid).toBe(true);
      expect(validator.checkSchema(['11']).isValid).toBe(false);
    });

    it('should compare integers beyond double precision exactly', () => {
      const below = withSchema([{ numericKind: 'integer', numericMaximum: '9007199254740992' }]);
      const above = withSchema([{ numericKind: 'integer', numericMinimum: '10000000000000000001' }]);

      const overMaximum = below.checkSchema(['9007199254740993']);
      const underMinimum = above.checkSchema(['10000000000000000000']);

      expect(messageOf(overMaximum)).toBe('Failed numericMaximum:9007199254740992 check on field 0 - value: 9007199254740993');
      expect(messageOf(underMinimum)).toBe(
        'Failed numericMinimum:10000000000000000001 check on field 0 - value: 10000000000000000000',
      );
      expect(below.checkSchema(['9007199254740992']).isValid).toBe(true);
      expect(above.checkSchema(['10000000000000000001']).isValid).toBe(true);
    });

    it('should check numeric types before ranges and structure', () => {
      const validator = withSchema([
        { enum: ['a', 'b'] },
        { numericKind: 'integer', numericMinimum: 0 },
        { numericKind: 'integer' },
      ]);

      const outcome = validator.checkSchema(['z', '-1', 'x']);

      expect(messageOf(outcome)).toBe('Failed numericKind:integer check on field 2 - value: x');
    });

    it('should check numeric ranges before structure', () => {
      const validator = withSchema([{ enum: ['a', 'b'] }, { numericKind: 'integer', numericMinimum: 0 }]);

      expect(messageOf(validator.checkSchema(['z', '-1']))).toBe(
        'Failed numericMinimum:0 check on field 1 - value: -1',
      );
    });

    it('should report a structural violation', () => {
      const validator = withSchema([{}, { title: 'status', enum: ['active', 'retired'] }]);

      const outcome = validator.checkSchema(['1', 'unknown']);

      expect(outcome).toEqual({
        isValid: false,
        error: {
          code: 'STRUCTURAL',
          message: 'Failed enum check on field 1 (status) - must be equal to one of the allowed values - value: unknown',
          fieldIndex: 1,
          value: 'unknown',
        },
      });
    });

    it('should report a missing numeric field as a likely parsing error', () => {
      const validator = withSchema([{}, {}, { title: 'zip', numericKind: 'integer' }]);

      const outcome = validator.checkSchema(['a', 'b']);

      expect(outcome.isValid).toBe(false);
      if (!outcome.isValid) {
        expect(outcome.error.code).toBe('MISSING_FIELD');
        expect(outcome.error.message).toBe(
          'Missing field 2 (zip) - record has only 2 fields; likely a parsing error, check the delimiter and quoting settings',
        );
      }
    });

    it('should skip numeric checks on a blank value that blanks allow', () => {
      const validator = withSchema([{ numericKind: 'integer', numericMinimum: 1, blank: true }]);

      expect(validator.checkSchema(['']).isValid).toBe(true);
    });

    it('should reject a blank value by default', () => {
      const validator = withSchema([{ numericKind: 'integer' }]);

      expect(messageOf(validator.checkSchema(['']))).toBe('Failed numericKind:integer check on field 0 - value: ');
    });
  });

  describe('validate()', () => {
    it('should check the field count before the schema', () => {
      const validator = withSchema([{ numericKind: 'integer' }, {}], 2);

      const outcome = validator.validate(createSourceRecord(0, ['abc']));

      expect(messageOf(outcome)).toBe('bad field count - should be 2 but is: 1');
    });

    it('should accept a header row without a schema check', () => {
      const validator = withSchema([{ numericKind: 'integer' }, {}]);

      const outcome = validator.validate(createSourceRecord(0, ['id', 'name'], true));

      expect(outcome.isValid).toBe(true);
      expect(validator.fieldCount).toBe(2);
    });

    it('should still apply the field count to a header row', () => {
      const validator = new RecordValidator({ fieldCount: 3 });

      const outcome = validator.validate(createSourceRecord(0, ['id', 'name'], true));

      expect(messageOf(outcome)).toBe('bad field count - should be 3 but is: 2');
    });

    it('should give the same outcome for the same record', () => {
      const validator = withSchema([{ numericKind: 'integer', numericMaximum: 5 }]);
      const record = createSourceRecord(0, ['9']);

      const first = validator.validate(record);
      const second = validator.validate(record);

      expect(second).toEqual(first);
      expect(validator.lastError).toBe('Failed numericMaximum:5 check on field 0 - value: 9');
    });

    it('should clear the last error after a passing record', () => {
      const validator = withSchema([{ numericKind: 'integer' }]);

      validator.validate(createSourceRecord(0, ['x']));
      expect(validator.lastError).toBeDefined();

      validator.validate(createSourceRecord(1, ['4']));
      expect(validator.lastError).toBeUndefined();
    });
  });
});
