/**
 * Process exit codes
 *
 * `no_new_data` and a user cancel are successes; an empty catalog fetch
 * is reported as a warning-level failure.
 */

export const EXIT_CODES = {
  SUCCESS: 0,
  NO_DATA_FETCHED: 1,
  ERRORS: 2,
  CONFIG_ERROR: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];
