// Main entry point
export { RecordCheck } from './RecordCheck.js';
export type { RecordCheckConfig } from './RecordCheck.js';

// Domain model
export type {
  Schema,
  FieldRule,
  NumericKind,
  NumericRule,
  IntegerRule,
  FloatRule,
  NumericLimit,
  NumericBounds,
} from './domain/model/Schema.js';
export type { RecordFields, SourceRecord } from './domain/model/Record.js';
export { createSourceRecord } from './domain/model/Record.js';
export type {
  ValidationOutcome,
  ValidOutcome,
  InvalidOutcome,
  RecordError,
  RecordErrorCode,
} from './domain/model/ValidationResult.js';
export { validResult, invalidResult, diagnosticOf } from './domain/model/ValidationResult.js';
export type { ValidationSummary, ValidationStatus } from './domain/model/ValidationSummary.js';

// Errors
export { SchemaDefinitionError, SchemaReadError } from './domain/errors/SchemaDefinitionError.js';
export type { SchemaDefinitionErrorCode, SchemaDefinitionErrorDetails } from './domain/errors/SchemaDefinitionError.js';

// Domain services
export {
  SchemaValidator,
  SCHEMA_ITEMS_KEY,
  FIELD_RULE_KEYS,
  UNSUPPORTED_FIELD_RULE_KEYS,
} from './domain/services/SchemaValidator.js';
export { RecordValidator } from './domain/services/RecordValidator.js';
export type { RecordValidatorOptions } from './domain/services/RecordValidator.js';
export { coerceInteger, coerceFloat, placeValue } from './domain/services/NumericCoercion.js';
export type { NumericPlacement } from './domain/services/NumericCoercion.js';

// Application
export { EventBus } from './application/EventBus.js';
export type { HandlerErrorListener } from './application/EventBus.js';
export { ValidateRecords } from './application/usecases/ValidateRecords.js';
export type { ValidateRecordsOptions } from './application/usecases/ValidateRecords.js';

// Ports (for custom implementations)
export type { DataSource, SourceMetadata } from './domain/ports/DataSource.js';
export type { RecordParser, ParserOptions } from './domain/ports/RecordParser.js';
export type { RecordSink } from './domain/ports/RecordSink.js';
export type {
  StructuralValidator,
  StructuralValidatorFactory,
  StructuralViolation,
} from './domain/ports/StructuralValidator.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  ValidationStartedEvent,
  RecordValidEvent,
  RecordInvalidEvent,
  ValidationCompletedEvent,
  ValidationFailedEvent,
} from './domain/events/DomainEvents.js';

// Infrastructure adapters (built-in)
export { AjvStructuralValidator, createAjvStructuralValidator } from './infrastructure/structural/AjvStructuralValidator.js';
export { CsvParser } from './infrastructure/parsers/CsvParser.js';
export { BufferSource } from './infrastructure/sources/BufferSource.js';
export { FilePathSource } from './infrastructure/sources/FilePathSource.js';
export type { FilePathSourceOptions } from './infrastructure/sources/FilePathSource.js';
export { StreamSource } from './infrastructure/sources/StreamSource.js';
export type { StreamSourceOptions } from './infrastructure/sources/StreamSource.js';
export { CsvRecordWriter } from './infrastructure/sinks/CsvRecordWriter.js';
export type { CsvRecordWriterOptions } from './infrastructure/sinks/CsvRecordWriter.js';
export { SplitRecordSink } from './infrastructure/sinks/SplitRecordSink.js';
export type { SplitRecordSinkOptions } from './infrastructure/sinks/SplitRecordSink.js';
export { MemoryRecordSink } from './infrastructure/sinks/MemoryRecordSink.js';
export type { RejectedRecord } from './infrastructure/sinks/MemoryRecordSink.js';
export { readSchemaFile, loadSchemaFile } from './infrastructure/schema/SchemaFileReader.js';
