/** Process exit codes, one per audit outcome. */
export const EXIT = {
  OK: 0,
  FAILED: 1,
  USAGE: 2,
  PARTIAL: 3,
  THRESHOLD: 4,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];
