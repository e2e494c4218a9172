export { runCli, buildProgram, VERSION } from './runCli.js';
export type { CliIo, CliOptions } from './runCli.js';
export { ExitCode, exitCodeFor } from './exitCodes.js';
export { Logger, LOG_LEVELS } from './logger.js';
export type { LogLevel, LoggerOptions } from './logger.js';
export { normalizeDelimiter, parseFieldCount, parseQuoteChar } from './options.js';
