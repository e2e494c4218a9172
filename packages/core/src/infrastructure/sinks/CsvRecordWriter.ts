import { once } from 'node:events';
import type { Writable } from 'node:stream';
import Papa from 'papaparse';
import type { RecordFields } from '../../domain/model/Record.js';

export interface CsvRecordWriterOptions {
  /** Field delimiter. Default: `','`. */
  readonly delimiter?: string;
  /** Quote character. Default: `'"'`. */
  readonly quoteChar?: string;
  /** Line terminator. Default: `'\n'`. */
  readonly newline?: string;
  /** End the stream on `close()`. Set to `false` for process stdout/stderr. Default: `true`. */
  readonly end?: boolean;
}

/** Writes records as delimited lines to a Node.js writable stream, honouring back-pressure. */
export class CsvRecordWriter {
  private readonly delimiter: string;
  private readonly quoteChar: string;
  private readonly newline: string;
  private readonly end: boolean;
  private closed = false;
  private failure: Error | undefined;

  constructor(
    private readonly stream: Writable,
    options?: CsvRecordWriterOptions,
  ) {
    this.delimiter = options?.delimiter ?? ',';
    this.quoteChar = options?.quoteChar ?? '"';
    this.newline = options?.newline ?? '\n';
    this.end = options?.end ?? true;
    // Kept until the next write or close, which rethrow it.
    this.stream.on('error', (error) => {
      this.failure ??= error;
    });
  }

  /** Format one record as a line, without the terminator. */
  format(fields: RecordFields): string {
    return Papa.unparse([[...fields]], {
      delimiter: this.delimiter,
      quoteChar: this.quoteChar,
      newline: this.newline,
      header: false,
    });
  }

  async write(fields: RecordFields): Promise<void> {
    if (this.closed) throw new Error('CsvRecordWriter: cannot write after close()');
    if (this.failure) throw this.failure;

    if (!this.stream.write(this.format(fields) + this.newline)) {
      await once(this.stream, 'drain');
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    if (this.failure) throw this.failure;

    if (this.end) {
      this.stream.end();
      await once(this.stream, 'finish');
    }
  }
}
