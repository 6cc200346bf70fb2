/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  CHECK_FAILED: 1,
  INVALID_ARGS: 2,
  INTERNAL_ERROR: 3,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];
