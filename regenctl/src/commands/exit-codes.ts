/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  RUN_FAILED: 1,
  INVALID_ARGS: 2,
  CONCURRENT_CONFLICT: 4,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];
