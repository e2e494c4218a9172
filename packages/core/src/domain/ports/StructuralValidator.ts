import type { RecordFields } from '../model/Record.js';
import type { Schema } from '../model/Schema.js';

/** A constraint the generic structural validator found broken. */
export interface StructuralViolation {
  /** Zero-based position of the offending field. */
  readonly fieldIndex: number;
  /** Name of the broken constraint (e.g. `pattern`, `enum`, `required`). */
  readonly keyword: string;
  /** The validator's own description of the violation. */
  readonly message: string;
  /** The offending value, absent when the field is missing. */
  readonly value?: string;
}

/**
 * Port for the generic, JSON-schema-style engine that checks type, length,
 * pattern, enum, required and blank constraints on text values.
 */
export interface StructuralValidator {
  /** Return the first violation in the record, or `undefined` when it conforms. */
  validate(fields: RecordFields): StructuralViolation | undefined;
}

/** Builds a structural validator for a schema. May throw `SchemaDefinitionError` for constraints it cannot compile. */
export type StructuralValidatorFactory = (schema: Schema) => StructuralValidator;
