/** Numeric classification a field can declare. `string` disables the numeric checks. */
export type NumericKind = 'integer' | 'float' | 'string';

/**
 * A configured range limit, coerced to the field's numeric kind when the
 * schema is loaded. Integer limits are `bigint` so that values past 2^53 compare exactly.
 */
export interface NumericLimit<T extends number | bigint = number | bigint> {
  /** The limit as written in the schema document. */
  readonly raw: string;
  readonly value: T;
}

export interface NumericBounds<T extends number | bigint> {
  readonly minimum?: NumericLimit<T>;
  readonly maximum?: NumericLimit<T>;
}

export interface IntegerRule extends NumericBounds<bigint> {
  readonly kind: 'integer';
}

export interface FloatRule extends NumericBounds<number> {
  readonly kind: 'float';
}

/** Numeric coercion and range constraints for one column. Only present for `integer` and `float` kinds. */
export type NumericRule = IntegerRule | FloatRule;

/** Constraints for exactly one column position. */
export interface FieldRule {
  /** Zero-based column position the rule applies to. */
  readonly index: number;
  readonly title?: string;
  readonly description?: string;
  /** JSON-schema `type`, handed to the structural validator untouched. */
  readonly declaredType?: string | readonly string[];
  readonly minLength?: number;
  readonly maxLength?: number;
  /** Regular expression source the value must match. */
  readonly pattern?: string;
  readonly enum?: readonly unknown[];
  /** When `true` (the default), the record must contain this column. */
  readonly required: boolean;
  /** When `false` (the default), the empty string is rejected. */
  readonly blank: boolean;
  readonly numericKind?: NumericKind;
  readonly numeric?: NumericRule;
}

/** Validated, immutable set of per-column rules, in column order. */
export interface Schema {
  readonly fields: readonly FieldRule[];
}
