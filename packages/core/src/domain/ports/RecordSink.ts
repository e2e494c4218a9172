import type { RecordFields } from '../model/Record.js';
import type { RecordError } from '../model/ValidationResult.js';

/** Port receiving classified records. Writes may be sync or async. */
export interface RecordSink {
  writeValid(fields: RecordFields): Promise<void> | void;
  /** `fields` already carries the diagnostic as a trailing field when annotation is on. */
  writeInvalid(fields: RecordFields, error: RecordError): Promise<void> | void;
  /** Flush and release the sink. Called once, after the last record. */
  close(): Promise<void> | void;
}
