import { Ajv, type ErrorObject, type SchemaObject, type ValidateFunction } from 'ajv';
import type { FieldRule, Schema } from '../../domain/model/Schema.js';
import type { RecordFields } from '../../domain/model/Record.js';
import type { StructuralValidator, StructuralViolation } from '../../domain/ports/StructuralValidator.js';
import { SchemaDefinitionError } from '../../domain/errors/SchemaDefinitionError.js';
import { describeRule } from '../../domain/services/messages.js';

interface FieldCheck {
  readonly rule: FieldRule;
  readonly validate: ValidateFunction<string>;
}

/** JSON schema for the generic constraints of one rule. Numeric extensions are not the generic engine's concern. */
function toJsonSchema(rule: FieldRule): SchemaObject {
  const schema: SchemaObject = {};

  if (rule.declaredType !== undefined) schema.type = rule.declaredType;
  if (rule.minLength !== undefined) schema.minLength = rule.minLength;
  if (rule.maxLength !== undefined) schema.maxLength = rule.maxLength;
  if (rule.pattern !== undefined) schema.pattern = rule.pattern;
  if (rule.enum !== undefined) schema.enum = rule.enum;
  if (rule.title !== undefined) schema.title = rule.title;
  if (rule.description !== undefined) schema.description = rule.description;
  schema.blank = rule.blank;

  return schema;
}

function firstError(errors: ValidateFunction['errors']): ErrorObject | undefined {
  return errors?.[0];
}

/**
 * Structural validator backed by Ajv.
 *
 * Each field rule is compiled once, when the validator is built; a rule Ajv
 * cannot compile (unknown type, broken pattern) is a schema definition error.
 */
export class AjvStructuralValidator implements StructuralValidator {
  private readonly ajv: Ajv;
  private readonly checks: readonly FieldCheck[];

  constructor(schema: Schema) {
    this.ajv = new Ajv({ strict: true, strictTypes: false, allErrors: false });
    this.ajv.addKeyword({
      keyword: 'blank',
      type: 'string',
      schemaType: 'boolean',
      validate: (allowBlank: boolean, data: string) => allowBlank || data !== '',
      errors: false,
    });

    this.checks = schema.fields.map((rule) => ({ rule, validate: this.compile(rule) }));
  }

  validate(fields: RecordFields): StructuralViolation | undefined {
    for (const { rule, validate } of this.checks) {
      const value = fields[rule.index];

      if (value === undefined) {
        if (!rule.required) continue;
        return { fieldIndex: rule.index, keyword: 'required', message: 'field is required but missing' };
      }

      if (!validate(value)) {
        const error = firstError(validate.errors);
        const keyword = error?.keyword ?? 'schema';
        return {
          fieldIndex: rule.index,
          keyword,
          message: keyword === 'blank' ? 'must not be blank' : error?.message ?? 'validation failed',
          value,
        };
      }
    }

    return undefined;
  }

  private compile(rule: FieldRule): ValidateFunction<string> {
    try {
      return this.ajv.compile<string>(toJsonSchema(rule));
    } catch (compileError) {
      const detail = compileError instanceof Error ? compileError.message : String(compileError);
      throw new SchemaDefinitionError(
        'INVALID_VALUE',
        `Invalid constraints in ${describeRule(rule.index, rule.title)}: ${detail}`,
        { ruleIndex: rule.index },
      );
    }
  }
}

/** Factory matching the `StructuralValidatorFactory` port. */
export function createAjvStructuralValidator(schema: Schema): StructuralValidator {
  return new AjvStructuralValidator(schema);
}
