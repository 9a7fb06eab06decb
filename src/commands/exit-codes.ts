/**
 * CLI exit codes. Every fatal failure maps to 1; a dashboard that exits on
 * its own, with any code, is still a success.
 */
export const EXIT = {
  SUCCESS: 0,
  FAILURE: 1,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];
