import { open } from 'node:fs/promises';
import type { Writable } from 'node:stream';
import { Command, CommanderError, Option } from 'commander';
import {
  CsvParser,
  CsvRecordWriter,
  FilePathSource,
  RecordCheck,
  SchemaDefinitionError,
  SchemaReadError,
  SplitRecordSink,
  StreamSource,
  loadSchemaFile,
  type DataSource,
  type ValidationSummary,
} from '@rowcheck/core';
import { ExitCode, exitCodeFor } from './exitCodes.js';
import { LOG_LEVELS, Logger, type LogLevel } from './logger.js';
import { normalizeDelimiter, parseFieldCount, parseQuoteChar } from './options.js';

export const VERSION = '0.1.0';

/** Path meaning stdin for the input and stdout/stderr for the outputs. */
const STD_STREAM = '-';

/** Streams the command reads from and writes to. */
export interface CliIo {
  readonly stdin: AsyncIterable<string | Buffer>;
  readonly stdout: Writable;
  readonly stderr: Writable;
}

export interface CliOptions {
  readonly delimiter?: string;
  readonly quotechar: string;
  readonly hasheader?: boolean;
  readonly hasnoheader?: boolean;
  readonly schema?: string;
  readonly fieldcnt?: number;
  readonly outgood: string;
  readonly outerr: string;
  readonly errmsg?: boolean;
  readonly silent?: boolean;
  readonly logLevel: LogLevel;
}

export function buildProgram(io: CliIo): Command {
  return new Command()
    .name('rowcheck')
    .description(
      'Validate each record of a delimited file against a field count and an optional YAML or JSON schema.\n' +
        'Valid records are written to --outgood, invalid ones to --outerr.',
    )
    .version(VERSION, '-V, --version')
    .argument('[file]', 'input file, - for stdin', STD_STREAM)
    .option('-d, --delimiter <char>', 'field delimiter ("tab" or "\\t" for a tab); detected when omitted', normalizeDelimiter)
    .option('--quotechar <char>', 'quote character', parseQuoteChar, '"')
    .option('--hasheader', 'the first record is a header row')
    .addOption(new Option('--hasnoheader', 'the input has no header row (default)').conflicts('hasheader'))
    .option('-s, --schema <path>', 'YAML or JSON schema document')
    .option('-f, --fieldcnt <n>', 'expected number of fields; default: taken from the first record', parseFieldCount)
    .option('--outgood <path>', 'where valid records go, - for stdout', STD_STREAM)
    .option('--outerr <path>', 'where invalid records go, - for stderr', STD_STREAM)
    .option('--errmsg', 'append the diagnostic to each invalid record')
    .option('--silent', 'write no records, only set the exit status')
    .addOption(new Option('--log-level <level>', 'lowest level logged to stderr').choices(LOG_LEVELS).default('info'))
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout.write(text),
      writeErr: (text) => io.stderr.write(text),
    });
}

/**
 * Run the `rowcheck` command.
 *
 * The schema is loaded and validated before the input is opened; a broken
 * schema ends the run without reading a single record.
 *
 * @param argv - Arguments after the program name.
 * @returns The process exit status.
 */
export async function runCli(argv: readonly string[], io: CliIo): Promise<ExitCode> {
  const program = buildProgram(io);

  try {
    await program.parseAsync([...argv], { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? ExitCode.OK : ExitCode.CONFIG_ERROR;
    }
    throw error;
  }

  const options = program.opts<CliOptions>();
  const input = program.args[0] ?? STD_STREAM;
  const logger = new Logger({ stream: io.stderr, level: options.logLevel });

  let check: RecordCheck;
  try {
    check = await createCheck(options);
  } catch (error) {
    if (error instanceof SchemaReadError || error instanceof SchemaDefinitionError) {
      logger.error(error.message);
      return ExitCode.CONFIG_ERROR;
    }
    throw error;
  }

  check
    .on('validation:started', (event) => logger.debug(`Validating ${event.sourceName}`))
    .on('record:invalid', (event) => logger.debug(`Record ${String(event.index)}: ${event.error.message}`));

  try {
    const source: DataSource =
      input === STD_STREAM ? new StreamSource(io.stdin, { fileName: 'stdin' }) : new FilePathSource(input);
    const delimiter = options.delimiter ?? (await detectDelimiter(source, options.quotechar));
    const parser = new CsvParser({ delimiter, quoteChar: options.quotechar });

    check.from(source, parser);
    if (options.silent !== true) {
      check.to(await createSink(options, delimiter, io));
    }

    const summary = await check.run();
    logSummary(logger, summary);
    return exitCodeFor(summary.status);
  } catch (error) {
    logger.error(error instanceof Error ? error.message : String(error));
    return ExitCode.IO_ERROR;
  }
}

async function createCheck(options: CliOptions): Promise<RecordCheck> {
  const schema = options.schema !== undefined ? await loadSchemaFile(options.schema) : undefined;
  return new RecordCheck({
    schema,
    fieldCount: options.fieldcnt,
    hasHeader: options.hasheader === true,
    annotateInvalid: options.errmsg === true,
  });
}

async function detectDelimiter(source: DataSource, quoteChar: string): Promise<string> {
  const detected = new CsvParser({ quoteChar }).detect(await source.sample());
  return detected.delimiter ?? ',';
}

async function createSink(options: CliOptions, delimiter: string, io: CliIo): Promise<SplitRecordSink> {
  const writerOptions = { delimiter, quoteChar: options.quotechar };
  return new SplitRecordSink({
    valid: await openWriter(options.outgood, io.stdout, writerOptions),
    invalid: await openWriter(options.outerr, io.stderr, writerOptions),
  });
}

async function openWriter(
  path: string,
  standard: Writable,
  options: { delimiter: string; quoteChar: string },
): Promise<CsvRecordWriter> {
  if (path === STD_STREAM) {
    return new CsvRecordWriter(standard, { ...options, end: false });
  }
  const handle = await open(path, 'w');
  return new CsvRecordWriter(handle.createWriteStream({ encoding: 'utf-8' }), options);
}

function logSummary(logger: Logger, summary: ValidationSummary): void {
  if (summary.status === 'empty') {
    logger.warn('No records found in input');
    return;
  }
  logger.info(
    `${String(summary.recordCount)} records read: ` +
      `${String(summary.validCount)} valid, ${String(summary.invalidCount)} invalid`,
  );
}
