import type { RecordFields } from '../../domain/model/Record.js';
import type { RecordError } from '../../domain/model/ValidationResult.js';
import type { RecordSink } from '../../domain/ports/RecordSink.js';

export interface RejectedRecord {
  readonly fields: RecordFields;
  readonly error: RecordError;
}

/** Collects classified records in memory. Suited to embedding and tests. */
export class MemoryRecordSink implements RecordSink {
  private readonly validRecords: RecordFields[] = [];
  private readonly invalidRecords: RejectedRecord[] = [];
  private closed = false;

  get valid(): readonly RecordFields[] {
    return this.validRecords;
  }

  get invalid(): readonly RejectedRecord[] {
    return this.invalidRecords;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  writeValid(fields: RecordFields): void {
    this.validRecords.push(fields);
  }

  writeInvalid(fields: RecordFields, error: RecordError): void {
    this.invalidRecords.push({ fields, error });
  }

  close(): void {
    this.closed = true;
  }
}
