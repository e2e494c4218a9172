import type { ValidationStatus } from '@rowcheck/core';

/** Process exit statuses of the `rowcheck` command. */
export const ExitCode = {
  OK: 0,
  INVALID_DATA: 1,
  NO_DATA: 2,
  CONFIG_ERROR: 3,
  IO_ERROR: 4,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export function exitCodeFor(status: ValidationStatus): ExitCode {
  switch (status) {
    case 'valid':
      return ExitCode.OK;
    case 'invalid':
      return ExitCode.INVALID_DATA;
    case 'empty':
      return ExitCode.NO_DATA;
  }
}
