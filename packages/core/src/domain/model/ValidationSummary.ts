/**
 * Overall result of a validation run.
 *
 * - `valid`: at least one record was read and none was rejected.
 * - `invalid`: at least one record was rejected.
 * - `empty`: the input held no records.
 */
export type ValidationStatus = 'valid' | 'invalid' | 'empty';

/** Running tallies of a validation run. */
export interface ValidationSummary {
  /** Records read, the header row included. */
  readonly recordCount: number;
  readonly validCount: number;
  readonly invalidCount: number;
  readonly status: ValidationStatus;
  /** Field count the records were held to, or `undefined` when no record was read. */
  readonly fieldCount: number | undefined;
}

export function summarize(
  recordCount: number,
  validCount: number,
  invalidCount: number,
  fieldCount: number | undefined,
): ValidationSummary {
  let status: ValidationStatus = 'valid';
  if (recordCount === 0) status = 'empty';
  else if (invalidCount > 0) status = 'invalid';

  return { recordCount, validCount, invalidCount, status, fieldCount };
}
