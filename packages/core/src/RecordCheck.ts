import type { Schema } from './domain/model/Schema.js';
import type { RecordFields } from './domain/model/Record.js';
import type { ValidationOutcome } from './domain/model/ValidationResult.js';
import type { ValidationSummary } from './domain/model/ValidationSummary.js';
import type { DomainEvent, EventType, EventPayload } from './domain/events/DomainEvents.js';
import type { DataSource } from './domain/ports/DataSource.js';
import type { RecordParser } from './domain/ports/RecordParser.js';
import type { RecordSink } from './domain/ports/RecordSink.js';
import type { StructuralValidatorFactory } from './domain/ports/StructuralValidator.js';
import { createSourceRecord } from './domain/model/Record.js';
import { RecordValidator } from './domain/services/RecordValidator.js';
import { EventBus, type HandlerErrorListener } from './application/EventBus.js';
import { ValidateRecords } from './application/usecases/ValidateRecords.js';
import { createAjvStructuralValidator } from './infrastructure/structural/AjvStructuralValidator.js';
import { loadSchemaFile } from './infrastructure/schema/SchemaFileReader.js';

/** Configuration for a validation run. */
export interface RecordCheckConfig {
  /** Validated schema (see `SchemaValidator` and `loadSchemaFile()`). Without one only field counts are checked. */
  readonly schema?: Schema;
  /** Expected number of fields per record. Default: taken from the first record. */
  readonly fieldCount?: number;
  /** Treat the first record as a header row, exempt from the schema. Default: `false`. */
  readonly hasHeader?: boolean;
  /** Append each invalid record's diagnostic as a trailing field when writing it. Default: `false`. */
  readonly annotateInvalid?: boolean;
  /** Builds the generic structural validator. Default: the Ajv-backed one. */
  readonly structuralValidator?: StructuralValidatorFactory;
  /** Receives errors thrown by event handlers. Default: emits a process warning. */
  readonly onHandlerError?: HandlerErrorListener;
}

/**
 * Facade that wires a source, a parser, the record validator and a sink into
 * one validation run.
 *
 * @example
 * ```typescript
 * const check = await RecordCheck.fromSchemaFile('people.yml', { hasHeader: true });
 * check.from(new FilePathSource('people.csv'), new CsvParser()).to(sink);
 * const summary = await check.run();
 * ```
 */
export class RecordCheck {
  private readonly validator: RecordValidator;
  private readonly eventBus: EventBus;
  private source: DataSource | null = null;
  private parser: RecordParser | null = null;
  private sink: RecordSink | undefined;
  private started = false;

  /** @throws SchemaDefinitionError when the structural validator cannot compile the schema. */
  constructor(private readonly config: RecordCheckConfig = {}) {
    this.eventBus = new EventBus(config.onHandlerError);
    this.validator = new RecordValidator({
      schema: config.schema,
      fieldCount: config.fieldCount,
      structuralValidator: config.structuralValidator ?? createAjvStructuralValidator,
    });
  }

  /**
   * Load, validate and apply a schema document.
   *
   * @throws SchemaReadError when the file cannot be read or parsed.
   * @throws SchemaDefinitionError when the schema is malformed.
   */
  static async fromSchemaFile(path: string, config: Omit<RecordCheckConfig, 'schema'> = {}): Promise<RecordCheck> {
    const schema = await loadSchemaFile(path);
    return new RecordCheck({ ...config, schema });
  }

  /** Set the data source and parser. Returns `this` for chaining. */
  from(source: DataSource, parser: RecordParser): this {
    this.source = source;
    this.parser = parser;
    return this;
  }

  /** Set where classified records go. Without a sink records are only counted. Returns `this` for chaining. */
  to(sink: RecordSink): this {
    this.sink = sink;
    return this;
  }

  /** Subscribe to a lifecycle event. Returns `this` for chaining. */
  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.eventBus.on(type, handler);
    return this;
  }

  /** Subscribe to all events regardless of type. Returns `this` for chaining. */
  onAny(handler: (event: DomainEvent) => void): this {
    this.eventBus.onAny(handler);
    return this;
  }

  /** Unsubscribe a wildcard handler previously registered with `onAny()`. */
  offAny(handler: (event: DomainEvent) => void): this {
    this.eventBus.offAny(handler);
    return this;
  }

  /** Field-count contract in force, or `undefined` until the first record fixes it. */
  get fieldCount(): number | undefined {
    return this.validator.fieldCount;
  }

  /** Diagnostic of the most recent check, or `undefined` if it passed. */
  get lastError(): string | undefined {
    return this.validator.lastError;
  }

  /** Validate a single record outside of a run. Shares the field-count contract with `run()`. */
  validateRecord(fields: RecordFields, isHeader = false): ValidationOutcome {
    return this.validator.validate(createSourceRecord(0, fields, isHeader));
  }

  /**
   * Validate every record of the configured source.
   *
   * @throws Error if no source was configured or the run already started.
   */
  async run(): Promise<ValidationSummary> {
    if (!this.source || !this.parser) {
      throw new Error('Source and parser must be configured. Call .from(source, parser) first.');
    }
    if (this.started) {
      throw new Error('RecordCheck: run() can only be called once per instance.');
    }
    this.started = true;

    return new ValidateRecords(this.source, this.parser, this.validator, this.eventBus, {
      hasHeader: this.config.hasHeader,
      annotateInvalid: this.config.annotateInvalid,
    }).execute(this.sink);
  }
}
