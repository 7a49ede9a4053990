/**
 * Standardized exit codes for tools built on the parser
 */

import { ArgParseError } from './parse-errors';

/**
 * Standard exit codes for a CLI
 */
export const ExitCode = {
  /** Successful execution */
  SUCCESS: 0,
  /** Unexpected/unhandled error */
  UNEXPECTED_ERROR: 1,
  /** Invalid CLI usage: unconvertible value, missing arguments or unknown tokens */
  USAGE_ERROR: 2,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/**
 * Get a human-readable description of an exit code
 */
export function getExitCodeDescription(code: ExitCode): string {
  switch (code) {
    case ExitCode.SUCCESS:
      return 'Successful execution';
    case ExitCode.UNEXPECTED_ERROR:
      return 'Unexpected or unhandled error';
    case ExitCode.USAGE_ERROR:
      return 'Invalid command line usage';
    default:
      return 'Unknown exit code';
  }
}

/**
 * Map a failure thrown while parsing to an exit code.
 * Conversion and argument-count failures are the user's mistake; anything
 * else points at the program's own option declarations.
 */
export function exitCodeForError(error: unknown): ExitCode {
  if (error instanceof ArgParseError) {
    switch (error.code) {
      case 'CONVERSION':
      case 'ARGUMENT_COUNT':
        return ExitCode.USAGE_ERROR;
      default:
        return ExitCode.UNEXPECTED_ERROR;
    }
  }
  return ExitCode.UNEXPECTED_ERROR;
}
