import type { FieldRule } from '../model/Schema.js';

/** `field 2 (zip)` or `field 2` when the rule has no title. */
export function describeField(rule: Pick<FieldRule, 'index' | 'title'>): string {
  return rule.title !== undefined ? `field ${String(rule.index)} (${rule.title})` : `field ${String(rule.index)}`;
}

/** `rule 2 (zip)` or `rule 2`, for schema definition errors. */
export function describeRule(index: number, title: string | undefined): string {
  return title !== undefined ? `rule ${String(index)} (${title})` : `rule ${String(index)}`;
}

export function badFieldCount(expected: number, actual: number): string {
  return `bad field count - should be ${String(expected)} but is: ${String(actual)}`;
}

export function failedCheck(check: string, rule: Pick<FieldRule, 'index' | 'title'>, value: string): string {
  return `Failed ${check} check on ${describeField(rule)} - value: ${value}`;
}

export function missingField(rule: Pick<FieldRule, 'index' | 'title'>, fieldCount: number): string {
  return (
    `Missing ${describeField(rule)} - record has only ${String(fieldCount)} fields; ` +
    'likely a parsing error, check the delimiter and quoting settings'
  );
}

export function failedStructuralCheck(
  keyword: string,
  rule: Pick<FieldRule, 'index' | 'title'>,
  detail: string,
  value: string | undefined,
): string {
  const base = `Failed ${keyword} check on ${describeField(rule)} - ${detail}`;
  return value === undefined ? base : `${base} - value: ${value}`;
}
