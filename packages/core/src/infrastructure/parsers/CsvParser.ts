import { Readable } from 'node:stream';
import Papa from 'papaparse';
import type { RecordParser, ParserOptions } from '../../domain/ports/RecordParser.js';
import type { RecordFields } from '../../domain/model/Record.js';

const CANDIDATE_DELIMITERS = [',', ';', '\t', '|'];

function isTextRow(row: unknown): row is string[] {
  return Array.isArray(row) && row.every((field) => typeof field === 'string');
}

/**
 * CSV parser adapter using PapaParse's Node stream mode.
 *
 * Values are never typed (`dynamicTyping` is off) and blank lines are skipped.
 * Rows spanning chunk boundaries are reassembled by the stream parser.
 */
export class CsvParser implements RecordParser {
  private readonly options: ParserOptions;

  constructor(options?: Partial<ParserOptions>) {
    this.options = {
      delimiter: options?.delimiter,
      quoteChar: options?.quoteChar ?? '"',
    };
  }

  /** Delimiter in use, or `undefined` when PapaParse guesses it. */
  get delimiter(): string | undefined {
    return this.options.delimiter;
  }

  async *parse(chunks: AsyncIterable<string | Buffer>): AsyncIterable<RecordFields> {
    const input = Readable.from(chunks);
    const rows = Papa.parse(Papa.NODE_STREAM_INPUT, {
      header: false,
      delimiter: this.options.delimiter ?? '',
      quoteChar: this.options.quoteChar,
      skipEmptyLines: true,
      dynamicTyping: false,
    });
    input.on('error', (error) => rows.destroy(error));
    input.pipe(rows);

    try {
      for await (const row of rows) {
        if (isTextRow(row)) yield row;
      }
    } finally {
      // Releases the source when the caller stops early.
      input.destroy();
    }
  }

  /** Pick the candidate delimiter producing the most columns in the first lines of the sample. */
  detect(sample: string | Buffer): ParserOptions {
    const content = typeof sample === 'string' ? sample : sample.toString('utf-8');
    const firstLines = content.split('\n').slice(0, 5).join('\n');

    let bestDelimiter = ',';
    let maxColumns = 0;

    for (const delimiter of CANDIDATE_DELIMITERS) {
      const result = Papa.parse<string[]>(firstLines, { delimiter, header: false, quoteChar: this.options.quoteChar });
      const firstRow = result.data[0];
      if (firstRow && firstRow.length > maxColumns) {
        maxColumns = firstRow.length;
        bestDelimiter = delimiter;
      }
    }

    return {
      delimiter: bestDelimiter,
      quoteChar: this.options.quoteChar,
    };
  }
}
