import { describe, it, expect } from 'vitest';
import { Writable } from 'node:stream';
import { Logger } from '../../src/logger.js';
import { ExitCode, exitCodeFor } from '../../src/exitCodes.js';

function collector(): { stream: Writable; text: () => string } {
  const chunks: Buffer[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk);
      callback();
    },
  });
  return { stream, text: () => Buffer.concat(chunks).toString('utf-8') };
}

describe('Logger', () => {
  it('should write one tagged line per message', () => {
    const out = collector();
    const logger = new Logger({ stream: out.stream, colors: false });

    logger.info('3 records read');
    logger.error('Cannot open file');

    expect(out.text()).toBe('[info] 3 records read\n[error] Cannot open file\n');
  });

  it('should drop messages below the level', () => {
    const out = collector();
    const logger = new Logger({ stream: out.stream, level: 'warn', colors: false });

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');

    expect(out.text()).toBe('[warn] shown\n');
  });

  it('should default to info', () => {
    const out = collector();
    const logger = new Logger({ stream: out.stream, colors: false });

    logger.debug('hidden');

    expect(out.text()).toBe('');
  });

  it('should not colour a stream that is not a terminal', () => {
    const out = collector();
    new Logger({ stream: out.stream }).warn('plain');

    expect(out.text()).toBe('[warn] plain\n');
  });
});

describe('exitCodeFor', () => {
  it('should map each run status to its exit code', () => {
    expect(exitCodeFor('valid')).toBe(ExitCode.OK);
    expect(exitCodeFor('invalid')).toBe(ExitCode.INVALID_DATA);
    expect(exitCodeFor('empty')).toBe(ExitCode.NO_DATA);
  });

  it('should keep the documented numbers', () => {
    expect(ExitCode).toEqual({ OK: 0, INVALID_DATA: 1, NO_DATA: 2, CONFIG_ERROR: 3, IO_ERROR: 4 });
  });
});
