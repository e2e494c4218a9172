/** Metadata about the data source (optional, for logging). */
export interface SourceMetadata {
  readonly fileName?: string;
  readonly fileSize?: number;
}

/**
 * Port for reading raw text from any origin (file, buffer, stream).
 *
 * `sample()` takes a byte budget rather than a record count: record boundaries
 * are unknown until the parser has run.
 */
export interface DataSource {
  /** Yield data chunks as strings or Buffers for lazy/streaming consumption. */
  read(): AsyncIterable<string | Buffer>;
  /** Return a small chunk of raw data (up to `maxBytes`) for dialect detection. */
  sample(maxBytes?: number): Promise<string | Buffer>;
  /** Return metadata about the source. */
  metadata(): SourceMetadata;
}
