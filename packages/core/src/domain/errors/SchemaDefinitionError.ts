/** Reason a schema definition was rejected. */
export type SchemaDefinitionErrorCode =
  | 'STRUCTURE'
  | 'UNSUPPORTED_KEY'
  | 'UNKNOWN_KEY'
  | 'INVALID_VALUE'
  | 'INVALID_LIMIT';

export interface SchemaDefinitionErrorDetails {
  /** Zero-based position of the offending field rule. */
  readonly ruleIndex?: number;
  /** Offending key within the rule. */
  readonly key?: string;
}

/**
 * Fatal configuration error raised while validating a schema definition.
 *
 * No record may be validated once this has been thrown.
 */
export class SchemaDefinitionError extends Error {
  readonly ruleIndex?: number;
  readonly key?: string;

  constructor(
    readonly code: SchemaDefinitionErrorCode,
    message: string,
    details: SchemaDefinitionErrorDetails = {},
  ) {
    super(message);
    this.name = 'SchemaDefinitionError';
    this.ruleIndex = details.ruleIndex;
    this.key = details.key;
  }
}

/** Raised when a schema document cannot be read or parsed. */
export class SchemaReadError extends Error {
  constructor(
    readonly path: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`Cannot read schema '${path}': ${message}`, options);
    this.name = 'SchemaReadError';
  }
}
