/** One incoming row: an ordered sequence of text fields. */
export type RecordFields = readonly string[];

/** A record together with its position in the stream. */
export interface SourceRecord {
  /** Zero-based position in the stream, the header row included. */
  readonly index: number;
  readonly fields: RecordFields;
  /** `true` for the header row of a source that has one. */
  readonly isHeader: boolean;
}

export function createSourceRecord(index: number, fields: RecordFields, isHeader = false): SourceRecord {
  return { index, fields, isHeader };
}
