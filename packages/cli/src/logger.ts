import type { Writable } from 'node:stream';
import chalk, { Chalk, type ChalkInstance } from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const levelPriority: { readonly [L in LogLevel]: number } = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LoggerOptions {
  readonly stream: Writable;
  /** Lowest level written. Default: `'info'`. */
  readonly level?: LogLevel;
  /** Colour the level tags. Default: whether the stream is a TTY. */
  readonly colors?: boolean;
}

function isTty(stream: Writable): boolean {
  return 'isTTY' in stream && stream.isTTY === true;
}

/** Levelled logger writing one line per message. */
export class Logger {
  private readonly stream: Writable;
  private readonly level: LogLevel;
  private readonly paint: ChalkInstance;

  constructor(options: LoggerOptions) {
    this.stream = options.stream;
    this.level = options.level ?? 'info';
    this.paint = (options.colors ?? isTty(options.stream)) ? chalk : new Chalk({ level: 0 });
  }

  debug(message: string): void {
    this.log('debug', message);
  }

  info(message: string): void {
    this.log('info', message);
  }

  warn(message: string): void {
    this.log('warn', message);
  }

  error(message: string): void {
    this.log('error', message);
  }

  private log(level: LogLevel, message: string): void {
    if (levelPriority[level] < levelPriority[this.level]) return;
    this.stream.write(`${this.tag(level)} ${message}\n`);
  }

  private tag(level: LogLevel): string {
    const label = `[${level}]`;
    switch (level) {
      case 'debug':
        return this.paint.gray(label);
      case 'info':
        return this.paint.blue(label);
      case 'warn':
        return this.paint.yellow(label);
      case 'error':
        return this.paint.red(label);
    }
  }
}
