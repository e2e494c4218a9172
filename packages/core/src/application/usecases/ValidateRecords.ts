import type { DataSource } from '../../domain/ports/DataSource.js';
import type { RecordParser } from '../../domain/ports/RecordParser.js';
import type { RecordSink } from '../../domain/ports/RecordSink.js';
import type { RecordValidator } from '../../domain/services/RecordValidator.js';
import type { ValidationSummary } from '../../domain/model/ValidationSummary.js';
import { summarize } from '../../domain/model/ValidationSummary.js';
import { createSourceRecord } from '../../domain/model/Record.js';
import type { EventBus } from '../EventBus.js';

export interface ValidateRecordsOptions {
  /** Treat the first record as a header row. Default: `false`. */
  readonly hasHeader?: boolean;
  /** Append the diagnostic as a trailing field of each invalid record. Default: `false`. */
  readonly annotateInvalid?: boolean;
}

/**
 * Use case: stream every record of a source through the record validator,
 * route it to the sink and keep running tallies.
 *
 * Invalid records are an expected outcome and never stop the run; a failure
 * to read or write does, after a `validation:failed` event.
 */
export class ValidateRecords {
  constructor(
    private readonly source: DataSource,
    private readonly parser: RecordParser,
    private readonly validator: RecordValidator,
    private readonly eventBus: EventBus,
    private readonly options: ValidateRecordsOptions = {},
  ) {}

  async execute(sink?: RecordSink): Promise<ValidationSummary> {
    let recordCount = 0;
    let validCount = 0;
    let invalidCount = 0;
    let closing = false;

    try {
      this.eventBus.emit({
        type: 'validation:started',
        sourceName: this.source.metadata().fileName ?? 'input',
        hasSchema: this.validator.hasSchema,
        fieldCount: this.validator.fieldCount,
        timestamp: Date.now(),
      });

      for await (const fields of this.parser.parse(this.source.read())) {
        const record = createSourceRecord(recordCount, fields, this.options.hasHeader === true && recordCount === 0);
        recordCount++;

        const outcome = this.validator.validate(record);

        if (outcome.isValid) {
          validCount++;
          await sink?.writeValid(fields);
          this.eventBus.emit({
            type: 'record:valid',
            index: record.index,
            fields,
            isHeader: record.isHeader,
            timestamp: Date.now(),
          });
        } else {
          invalidCount++;
          const written = this.options.annotateInvalid === true ? [...fields, outcome.error.message] : fields;
          await sink?.writeInvalid(written, outcome.error);
          this.eventBus.emit({
            type: 'record:invalid',
            index: record.index,
            fields,
            error: outcome.error,
            timestamp: Date.now(),
          });
        }
      }

      closing = true;
      await sink?.close();
    } catch (error) {
      this.eventBus.emit({
        type: 'validation:failed',
        error: messageOf(error),
        recordCount,
        timestamp: Date.now(),
      });
      if (!closing) await closeAfterFailure(sink, error);
      throw error;
    }

    const summary = summarize(recordCount, validCount, invalidCount, this.validator.fieldCount);
    this.eventBus.emit({ type: 'validation:completed', summary, timestamp: Date.now() });
    return summary;
  }
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Flush and release the sink after a failed run, keeping the original failure first. */
async function closeAfterFailure(sink: RecordSink | undefined, cause: unknown): Promise<void> {
  try {
    await sink?.close();
  } catch (closeError) {
    if (closeError === cause) return;
    throw new AggregateError(
      [cause, closeError],
      `${messageOf(cause)}; closing the output also failed: ${messageOf(closeError)}`,
    );
  }
}
