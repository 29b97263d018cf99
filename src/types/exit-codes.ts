/**
 * Standardized exit codes for programs built on the registry
 */

export const ExitCode = {
  /** Successful execution */
  SUCCESS: 0,
  /** Unexpected/unhandled error */
  UNEXPECTED_ERROR: 1,
  /** Invalid command-line usage (unknown option, missing value, missing required) */
  USAGE_ERROR: 2,
  /** A supplied value was rejected by its validator */
  VALIDATION_ERROR: 3,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];
