import { InvalidArgumentError } from 'commander';

/** Turn unprintable delimiters given on the command line into the real character. */
export function normalizeDelimiter(value: string): string {
  switch (value) {
    case '\\t':
    case 'tab':
      return '\t';
    case '\\n':
      return '\n';
    default:
      if (value.length !== 1) {
        throw new InvalidArgumentError('Delimiter must be a single character, "tab" or "\\t".');
      }
      return value;
  }
}

export function parseQuoteChar(value: string): string {
  if (value.length !== 1) throw new InvalidArgumentError('Quote character must be a single character.');
  return value;
}

export function parseFieldCount(value: string): number {
  const count = Number(value);
  if (!/^\d+$/.test(value) || !Number.isSafeInteger(count) || count < 1) {
    throw new InvalidArgumentError('Field count must be a positive integer.');
  }
  return count;
}
