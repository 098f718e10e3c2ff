/**
 * Process exit codes
 *
 * @module cli/lib/exit-codes
 */

import {
  ConfigError,
  EmptySourceError,
  SourceUnavailableError,
} from '../../core/errors.js';

export const EXIT_CODES = {
  SUCCESS: 0,
  /** Completed, but with conflicts or unmatched records to review */
  WARNINGS: 1,
  ERRORS: 2,
  CONFIG_ERROR: 3,
  NETWORK_ERROR: 4,
  DATA_INTEGRITY_ERROR: 5,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Exit code for an error that ended a command
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof ConfigError) return EXIT_CODES.CONFIG_ERROR;
  if (error instanceof SourceUnavailableError) return EXIT_CODES.NETWORK_ERROR;
  if (error instanceof EmptySourceError) return EXIT_CODES.DATA_INTEGRITY_ERROR;
  return EXIT_CODES.ERRORS;
}
