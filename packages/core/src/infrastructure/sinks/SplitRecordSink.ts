import type { RecordFields } from '../../domain/model/Record.js';
import type { RecordSink } from '../../domain/ports/RecordSink.js';
import type { CsvRecordWriter } from './CsvRecordWriter.js';

export interface SplitRecordSinkOptions {
  /** Receives valid records. Omit to discard them. */
  readonly valid?: CsvRecordWriter;
  /** Receives invalid records. Omit to discard them. */
  readonly invalid?: CsvRecordWriter;
}

/** Routes valid and invalid records to separate CSV writers. */
export class SplitRecordSink implements RecordSink {
  private readonly valid: CsvRecordWriter | undefined;
  private readonly invalid: CsvRecordWriter | undefined;

  constructor(options: SplitRecordSinkOptions) {
    this.valid = options.valid;
    this.invalid = options.invalid;
  }

  async writeValid(fields: RecordFields): Promise<void> {
    await this.valid?.write(fields);
  }

  async writeInvalid(fields: RecordFields): Promise<void> {
    await this.invalid?.write(fields);
  }

  async close(): Promise<void> {
    await Promise.all([this.valid?.close(), this.invalid?.close()]);
  }
}
