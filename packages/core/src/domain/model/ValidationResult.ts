/** Machine-readable codes for the check that rejected a record. */
export type RecordErrorCode =
  | 'FIELD_COUNT'
  | 'MISSING_FIELD'
  | 'NUMERIC_TYPE'
  | 'NUMERIC_MINIMUM'
  | 'NUMERIC_MAXIMUM'
  | 'STRUCTURAL';

/** The first failing check of a record. */
export interface RecordError {
  readonly code: RecordErrorCode;
  /** Human-readable diagnostic naming the field, the check and the value. */
  readonly message: string;
  /** Zero-based position of the failing field. Absent for field-count failures. */
  readonly fieldIndex?: number;
  /** The offending value, when there is one. */
  readonly value?: string;
}

export interface ValidOutcome {
  readonly isValid: true;
}

export interface InvalidOutcome {
  readonly isValid: false;
  readonly error: RecordError;
}

/** Result of validating one record. A record is wholly valid or wholly invalid. */
export type ValidationOutcome = ValidOutcome | InvalidOutcome;

const VALID: ValidOutcome = Object.freeze({ isValid: true });

export function validResult(): ValidOutcome {
  return VALID;
}

export function invalidResult(error: RecordError): InvalidOutcome {
  return { isValid: false, error };
}

/** Return the diagnostic of a failing outcome, or `undefined` for a passing one. */
export function diagnosticOf(outcome: ValidationOutcome): string | undefined {
  return outcome.isValid ? undefined : outcome.error.message;
}
