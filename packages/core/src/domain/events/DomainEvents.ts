import type { RecordFields } from '../model/Record.js';
import type { RecordError } from '../model/ValidationResult.js';
import type { ValidationSummary } from '../model/ValidationSummary.js';

/** Emitted when a run starts, before the first record is read. */
export interface ValidationStartedEvent {
  readonly type: 'validation:started';
  readonly sourceName: string;
  readonly hasSchema: boolean;
  /** Configured field count, or `undefined` when the first record fixes it. */
  readonly fieldCount: number | undefined;
  readonly timestamp: number;
}

/** Emitted for every record that passed, the header row included. */
export interface RecordValidEvent {
  readonly type: 'record:valid';
  readonly index: number;
  readonly fields: RecordFields;
  readonly isHeader: boolean;
  readonly timestamp: number;
}

/** Emitted for every record that failed, with its single diagnostic. */
export interface RecordInvalidEvent {
  readonly type: 'record:invalid';
  readonly index: number;
  readonly fields: RecordFields;
  readonly error: RecordError;
  readonly timestamp: number;
}

/** Emitted once all records have been read and the sink is closed. */
export interface ValidationCompletedEvent {
  readonly type: 'validation:completed';
  readonly summary: ValidationSummary;
  readonly timestamp: number;
}

/** Emitted when reading, parsing or writing fails. The error is rethrown to the caller. */
export interface ValidationFailedEvent {
  readonly type: 'validation:failed';
  readonly error: string;
  readonly recordCount: number;
  readonly timestamp: number;
}

export type DomainEvent =
  | ValidationStartedEvent
  | RecordValidEvent
  | RecordInvalidEvent
  | ValidationCompletedEvent
  | ValidationFailedEvent;

export type EventType = DomainEvent['type'];

export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
