import type { NumericBounds, NumericRule } from '../model/Schema.js';

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

/** Where a value falls against a numeric rule. `type` means it is not a number of the rule's kind. */
export type NumericPlacement = 'type' | 'below' | 'above' | 'within';

/** Parse text as an integer of any size. Returns `undefined` when the text is not one. */
export function coerceInteger(text: string): bigint | undefined {
  const trimmed = text.trim();
  return INTEGER_PATTERN.test(trimmed) ? BigInt(trimmed.replace(/^\+/, '')) : undefined;
}

export function coerceFloat(text: string): number | undefined {
  const trimmed = text.trim();
  return FLOAT_PATTERN.test(trimmed) ? Number.parseFloat(trimmed) : undefined;
}

function place<T extends number | bigint>(value: T | undefined, bounds: NumericBounds<T>): NumericPlacement {
  if (value === undefined) return 'type';
  if (bounds.minimum !== undefined && value < bounds.minimum.value) return 'below';
  if (bounds.maximum !== undefined && value > bounds.maximum.value) return 'above';
  return 'within';
}

/** Coerce `text` to the rule's kind and compare it with the rule's inclusive limits. */
export function placeValue(rule: NumericRule, text: string): NumericPlacement {
  switch (rule.kind) {
    case 'integer':
      return place(coerceInteger(text), rule);
    case 'float':
      return place(coerceFloat(text), rule);
  }
}
