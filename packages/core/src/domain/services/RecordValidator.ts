import type { FieldRule, NumericLimit, NumericRule, Schema } from '../model/Schema.js';
import type { RecordFields, SourceRecord } from '../model/Record.js';
import type { ValidationOutcome } from '../model/ValidationResult.js';
import { diagnosticOf, invalidResult, validResult } from '../model/ValidationResult.js';
import type { StructuralValidator, StructuralValidatorFactory } from '../ports/StructuralValidator.js';
import { placeValue } from './NumericCoercion.js';
import { badFieldCount, failedCheck, failedStructuralCheck, missingField } from './messages.js';

export interface RecordValidatorOptions {
  /** Validated schema. Without one, only the field-count contract applies. */
  readonly schema?: Schema;
  /** Expected number of fields per record. Default: taken from the first record checked. */
  readonly fieldCount?: number;
  /** Builds the generic structural validator for `schema`. Required when a schema is given. */
  readonly structuralValidator?: StructuralValidatorFactory;
}

interface NumericCheck {
  readonly rule: FieldRule;
  readonly numeric: NumericRule;
}

/**
 * Domain service that classifies records under a field-count contract and an
 * optional schema. Reports the first failing check only.
 *
 * Holds two pieces of state: the expected field count, fixed by the first
 * record unless configured, and the outcome of the most recent check. An
 * instance must not be shared between concurrent streams.
 */
export class RecordValidator {
  private expectedFieldCount: number | undefined;
  private lastOutcome: ValidationOutcome = validResult();
  private readonly schema: Schema | undefined;
  private readonly numericChecks: readonly NumericCheck[];
  private readonly structural: StructuralValidator | undefined;

  constructor(options: RecordValidatorOptions = {}) {
    if (options.fieldCount !== undefined && (!Number.isInteger(options.fieldCount) || options.fieldCount < 1)) {
      throw new RangeError(`fieldCount must be a positive integer, got ${String(options.fieldCount)}`);
    }
    if (options.schema !== undefined && options.structuralValidator === undefined) {
      throw new Error('RecordValidator: a structuralValidator factory is required when a schema is given');
    }

    this.expectedFieldCount = options.fieldCount;
    this.schema = options.schema;
    this.numericChecks = (options.schema?.fields ?? []).flatMap((rule) =>
      rule.numeric !== undefined ? [{ rule, numeric: rule.numeric }] : [],
    );
    this.structural =
      options.schema !== undefined ? options.structuralValidator?.(options.schema) : undefined;
  }

  /** The field-count contract, or `undefined` until the first record fixes it. */
  get fieldCount(): number | undefined {
    return this.expectedFieldCount;
  }

  /** Whether records are checked against a schema. */
  get hasSchema(): boolean {
    return this.schema !== undefined;
  }

  /** Diagnostic of the most recent check, or `undefined` if it passed. */
  get lastError(): string | undefined {
    return diagnosticOf(this.lastOutcome);
  }

  /**
   * Compare a record's field count against the contract. The first call adopts
   * `actualCount` as the contract when none was configured.
   */
  checkFieldCount(actualCount: number): ValidationOutcome {
    const expected = (this.expectedFieldCount ??= actualCount);

    if (actualCount !== expected) {
      return this.remember(invalidResult({ code: 'FIELD_COUNT', message: badFieldCount(expected, actualCount) }));
    }
    return this.remember(validResult());
  }

  /** Run the numeric-type, numeric-range and structural checks, in that order. Passes when there is no schema. */
  checkSchema(fields: RecordFields): ValidationOutcome {
    return this.remember(this.runSchemaChecks(fields));
  }

  /**
   * Validate one record from a stream: field count first, then (for data rows
   * with the right field count) the schema. A header row with the right field
   * count is accepted without a schema check.
   */
  validate(record: SourceRecord): ValidationOutcome {
    const countOutcome = this.checkFieldCount(record.fields.length);
    if (!countOutcome.isValid || record.isHeader) return countOutcome;
    return this.checkSchema(record.fields);
  }

  private runSchemaChecks(fields: RecordFields): ValidationOutcome {
    if (this.structural === undefined) return validResult();

    const typeOutcome = this.checkNumericTypes(fields);
    if (!typeOutcome.isValid) return typeOutcome;

    const rangeOutcome = this.checkNumericRanges(fields);
    if (!rangeOutcome.isValid) return rangeOutcome;

    const violation = this.structural.validate(fields);
    if (violation === undefined) return validResult();

    const rule = this.schema?.fields[violation.fieldIndex] ?? { index: violation.fieldIndex };
    return invalidResult({
      code: 'STRUCTURAL',
      message: failedStructuralCheck(violation.keyword, rule, violation.message, violation.value),
      fieldIndex: violation.fieldIndex,
      value: violation.value,
    });
  }

  private checkNumericTypes(fields: RecordFields): ValidationOutcome {
    for (const { rule, numeric } of this.numericChecks) {
      const value = fields[rule.index];

      if (value === undefined) {
        return invalidResult({
          code: 'MISSING_FIELD',
          message: missingField(rule, fields.length),
          fieldIndex: rule.index,
        });
      }
      if (this.skipsNumericChecks(rule, value)) continue;

      if (placeValue(numeric, value) === 'type') {
        return invalidResult({
          code: 'NUMERIC_TYPE',
          message: failedCheck(`numericKind:${numeric.kind}`, rule, value),
          fieldIndex: rule.index,
          value,
        });
      }
    }
    return validResult();
  }

  private checkNumericRanges(fields: RecordFields): ValidationOutcome {
    for (const { rule, numeric } of this.numericChecks) {
      const value = fields[rule.index];
      if (value === undefined || this.skipsNumericChecks(rule, value)) continue;

      switch (placeValue(numeric, value)) {
        case 'below':
          if (numeric.minimum !== undefined) {
            return this.rangeFailure('NUMERIC_MINIMUM', 'numericMinimum', numeric.minimum, rule, value);
          }
          break;
        case 'above':
          if (numeric.maximum !== undefined) {
            return this.rangeFailure('NUMERIC_MAXIMUM', 'numericMaximum', numeric.maximum, rule, value);
          }
          break;
        default:
          break;
      }
    }
    return validResult();
  }

  private rangeFailure(
    code: 'NUMERIC_MINIMUM' | 'NUMERIC_MAXIMUM',
    check: string,
    limit: NumericLimit,
    rule: FieldRule,
    value: string,
  ): ValidationOutcome {
    return invalidResult({
      code,
      message: failedCheck(`${check}:${limit.raw}`, rule, value),
      fieldIndex: rule.index,
      value,
    });
  }

  /** An empty value in a field that allows blanks has no number to check. */
  private skipsNumericChecks(rule: FieldRule, value: string): boolean {
    return rule.blank && value === '';
  }

  private remember(outcome: ValidationOutcome): ValidationOutcome {
    this.lastOutcome = outcome;
    return outcome;
  }
}
