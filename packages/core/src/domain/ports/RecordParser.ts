import type { RecordFields } from '../model/Record.js';

/** Dialect of delimited text. */
export interface ParserOptions {
  /** Field delimiter (e.g. `','`, `';'`, `'\t'`). Auto-detected when omitted. */
  readonly delimiter?: string;
  /** Quote character. Default: `'"'`. */
  readonly quoteChar?: string;
}

/**
 * Port for turning raw chunks into records.
 *
 * Records are yielded lazily, in stream order, one ordered list of text
 * fields per row.
 */
export interface RecordParser {
  parse(chunks: AsyncIterable<string | Buffer>): AsyncIterable<RecordFields>;
  /** Guess the dialect from a small sample of the data. */
  detect?(sample: string | Buffer): ParserOptions;
}
