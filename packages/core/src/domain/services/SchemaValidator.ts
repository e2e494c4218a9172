import type { FieldRule, NumericBounds, NumericKind, NumericLimit, NumericRule, Schema } from '../model/Schema.js';
import { SchemaDefinitionError } from '../errors/SchemaDefinitionError.js';
import { coerceFloat, coerceInteger } from './NumericCoercion.js';
import { describeRule } from './messages.js';

/** Name of the single top-level attribute of a schema document. */
export const SCHEMA_ITEMS_KEY = 'items';

/** Keys a field rule may use. */
export const FIELD_RULE_KEYS = [
  'type',
  'minLength',
  'maxLength',
  'pattern',
  'enum',
  'required',
  'blank',
  'title',
  'description',
  'numericKind',
  'numericMinimum',
  'numericMaximum',
] as const;

/**
 * Keys of the generic engine that look usable but are not: the structural
 * validator only ever sees text, so numeric bounds and formats cannot apply.
 */
export const UNSUPPORTED_FIELD_RULE_KEYS = [
  'minimum',
  'maximum',
  'exclusiveMinimum',
  'exclusiveMaximum',
  'divisibleBy',
  'multipleOf',
  'format',
  'dependencies',
  'disallow',
  'extends',
  'uniqueItems',
  'additionalItems',
  'additionalProperties',
  'properties',
  'patternProperties',
  'minItems',
  'maxItems',
  'items',
  'default',
] as const;

const NUMERIC_BOUND_KEYS: ReadonlySet<string> = new Set(['minimum', 'maximum', 'exclusiveMinimum', 'exclusiveMaximum']);

const NUMERIC_KINDS: readonly NumericKind[] = ['integer', 'float', 'string'];

type LimitKey = 'numericMinimum' | 'numericMaximum';

type FieldRuleDraft = { -readonly [K in keyof FieldRule]?: FieldRule[K] };

function isMapping(value: unknown): value is { readonly [key: string]: unknown } {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isNumericKind(value: unknown): value is NumericKind {
  return NUMERIC_KINDS.some((kind) => kind === value);
}

function isUnsupportedKey(key: string): boolean {
  return UNSUPPORTED_FIELD_RULE_KEYS.some((unsupported) => unsupported === key);
}

function show(value: unknown): string {
  if (typeof value === 'string') return `"${value}"`;
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    // Circular values, as built by a self-referencing YAML alias.
    return String(value);
  }
}

/**
 * Domain service that checks a raw schema definition for internal consistency
 * and turns it into a typed {@link Schema}.
 *
 * Runs once, before any record is read. Every violation throws a
 * {@link SchemaDefinitionError}, which callers treat as fatal.
 */
export class SchemaValidator {
  /**
   * Validate a schema definition.
   *
   * @param definition - Nested mapping read from a YAML or JSON document. `undefined` or `null` means no schema.
   * @returns The typed schema, or `undefined` when no schema was given.
   * @throws SchemaDefinitionError on the first violation found.
   */
  validate(definition: unknown): Schema | undefined {
    if (definition === undefined || definition === null) return undefined;

    if (!isMapping(definition)) {
      throw new SchemaDefinitionError(
        'STRUCTURE',
        `Schema must be a mapping with a single "${SCHEMA_ITEMS_KEY}" attribute, got ${show(definition)}`,
      );
    }

    const attributes = Object.keys(definition);
    if (attributes.length !== 1 || attributes[0] !== SCHEMA_ITEMS_KEY) {
      throw new SchemaDefinitionError(
        'STRUCTURE',
        `Schema must have exactly one top-level attribute, "${SCHEMA_ITEMS_KEY}", ` +
          `but has ${String(attributes.length)}: [${attributes.join(', ')}]`,
      );
    }

    const items = definition[SCHEMA_ITEMS_KEY];
    if (!Array.isArray(items)) {
      throw new SchemaDefinitionError('STRUCTURE', `Schema attribute "${SCHEMA_ITEMS_KEY}" must be a sequence of field rules`);
    }

    const fields = items.map((rule: unknown, index) => this.validateRule(rule, index));
    return { fields };
  }

  private validateRule(rule: unknown, index: number): FieldRule {
    if (!isMapping(rule)) {
      throw new SchemaDefinitionError('STRUCTURE', `Schema ${describeRule(index, undefined)} must be a mapping`, {
        ruleIndex: index,
      });
    }

    const where = describeRule(index, typeof rule.title === 'string' ? rule.title : undefined);
    const draft: FieldRuleDraft = {};
    const limits: Array<[LimitKey, unknown]> = [];

    for (const [key, value] of Object.entries(rule)) {
      switch (key) {
        case 'required':
        case 'blank':
          draft[key] = this.expectBoolean(value, key, index, where);
          break;
        case 'numericKind':
          draft.numericKind = this.expectNumericKind(value, index, where);
          break;
        case 'title':
        case 'description':
        case 'pattern':
          draft[key] = this.expectString(value, key, index, where);
          break;
        case 'minLength':
        case 'maxLength':
          draft[key] = this.expectLength(value, key, index, where);
          break;
        case 'enum':
          draft.enum = this.expectEnum(value, index, where);
          break;
        case 'type':
          draft.declaredType = this.expectType(value, index, where);
          break;
        case 'numericMinimum':
        case 'numericMaximum':
          limits.push([key, value]);
          break;
        default:
          throw this.illegalKey(key, index, where);
      }
    }

    if (draft.minLength !== undefined && draft.maxLength !== undefined && draft.minLength > draft.maxLength) {
      throw new SchemaDefinitionError(
        'INVALID_VALUE',
        `minLength ${String(draft.minLength)} exceeds maxLength ${String(draft.maxLength)} in ${where}`,
        { ruleIndex: index, key: 'minLength' },
      );
    }

    return {
      index,
      title: draft.title,
      description: draft.description,
      declaredType: draft.declaredType,
      minLength: draft.minLength,
      maxLength: draft.maxLength,
      pattern: draft.pattern,
      enum: draft.enum,
      required: draft.required ?? true,
      blank: draft.blank ?? false,
      numericKind: draft.numericKind,
      numeric: this.buildNumericRule(draft.numericKind, limits, index, where),
    };
  }

  private illegalKey(key: string, index: number, where: string): SchemaDefinitionError {
    if (isUnsupportedKey(key)) {
      const hint = NUMERIC_BOUND_KEYS.has(key)
        ? ' - use numericMinimum or numericMaximum together with numericKind'
        : ' - the structural validator only sees text values';
      return new SchemaDefinitionError('UNSUPPORTED_KEY', `Unsupported key "${key}" in ${where}${hint}`, {
        ruleIndex: index,
        key,
      });
    }
    return new SchemaDefinitionError('UNKNOWN_KEY', `Unknown key "${key}" in ${where}`, { ruleIndex: index, key });
  }

  private invalidValue(key: string, value: unknown, expected: string, index: number, where: string): SchemaDefinitionError {
    return new SchemaDefinitionError(
      'INVALID_VALUE',
      `Invalid value ${show(value)} for "${key}" in ${where} - expected ${expected}`,
      { ruleIndex: index, key },
    );
  }

  private expectBoolean(value: unknown, key: string, index: number, where: string): boolean {
    if (typeof value !== 'boolean') throw this.invalidValue(key, value, 'true or false', index, where);
    return value;
  }

  private expectNumericKind(value: unknown, index: number, where: string): NumericKind {
    if (!isNumericKind(value)) {
      throw this.invalidValue('numericKind', value, `one of ${NUMERIC_KINDS.join(', ')}`, index, where);
    }
    return value;
  }

  private expectString(value: unknown, key: string, index: number, where: string): string {
    if (typeof value !== 'string') throw this.invalidValue(key, value, 'a string', index, where);
    return value;
  }

  private expectLength(value: unknown, key: string, index: number, where: string): number {
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
      throw this.invalidValue(key, value, 'a non-negative integer', index, where);
    }
    return value;
  }

  private expectEnum(value: unknown, index: number, where: string): readonly unknown[] {
    if (!Array.isArray(value) || value.length === 0) {
      throw this.invalidValue('enum', value, 'a non-empty sequence', index, where);
    }
    return [...value];
  }

  private expectType(value: unknown, index: number, where: string): string | readonly string[] {
    if (typeof value === 'string') return value;
    if (Array.isArray(value) && value.length > 0 && value.every((item) => typeof item === 'string')) {
      return value.map(String);
    }
    throw this.invalidValue('type', value, 'a type name or a sequence of type names', index, where);
  }

  private buildNumericRule(
    kind: NumericKind | undefined,
    limits: ReadonlyArray<[LimitKey, unknown]>,
    index: number,
    where: string,
  ): NumericRule | undefined {
    if (kind === undefined || kind === 'string') {
      const first = limits[0];
      if (first !== undefined) {
        const [key] = first;
        const found = kind === undefined ? 'numericKind is missing' : 'numericKind is string';
        throw new SchemaDefinitionError(
          'INVALID_LIMIT',
          `${key} in ${where} requires numericKind integer or float, but ${found}`,
          { ruleIndex: index, key },
        );
      }
      return undefined;
    }

    return kind === 'integer'
      ? { kind, ...this.parseBounds(limits, coerceInteger, kind, index, where) }
      : { kind, ...this.parseBounds(limits, coerceFloat, kind, index, where) };
  }

  private parseBounds<T extends number | bigint>(
    limits: ReadonlyArray<[LimitKey, unknown]>,
    coerce: (text: string) => T | undefined,
    kind: NumericRule['kind'],
    index: number,
    where: string,
  ): NumericBounds<T> {
    let minimum: NumericLimit<T> | undefined;
    let maximum: NumericLimit<T> | undefined;
    for (const [key, value] of limits) {
      const raw = typeof value === 'number' || typeof value === 'string' ? String(value) : undefined;
      const parsed = raw === undefined ? undefined : coerce(raw);
      if (raw === undefined || parsed === undefined) {
        throw new SchemaDefinitionError(
          'INVALID_LIMIT',
          `${key} ${show(value)} in ${where} is not a valid ${kind} for numericKind ${kind}`,
          { ruleIndex: index, key },
        );
      }
      if (key === 'numericMinimum') minimum = { raw, value: parsed };
      else maximum = { raw, value: parsed };
    }

    if (minimum !== undefined && maximum !== undefined && minimum.value > maximum.value) {
      throw new SchemaDefinitionError(
        'INVALID_LIMIT',
        `numericMinimum ${minimum.raw} exceeds numericMaximum ${maximum.raw} in ${where}`,
        { ruleIndex: index, key: 'numericMinimum' },
      );
    }

    return { minimum, maximum };
  }
}
