/**
 * Semantic exit codes for the secretdiff CLI
 *
 * @see Use these constants instead of magic numbers throughout the CLI
 */

import { UsageError } from '../config.js';
import { isSecretDiffError, type SecretDiffErrorCode } from '../errors.js';

export const EXIT_CODES = {
  /** Command completed successfully */
  SUCCESS: 0,

  /** General error (catch-all for unexpected errors) */
  ERROR: 1,

  /** Usage error (invalid arguments, flags, or command syntax) */
  USAGE_ERROR: 2,

  /** Input could not be read, or its format resolved or parsed */
  INPUT_ERROR: 3,

  /** Decryption or encryption failed, or plaintext was rejected */
  DECRYPTION_FAILED: 4,

  /** Conflict markers missing, malformed or still present */
  CONFLICT: 5,
} as const;

/**
 * Type for exit codes
 */
export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

const CODE_TO_EXIT: Record<SecretDiffErrorCode, ExitCode> = {
  UNRESOLVABLE_FORMAT: EXIT_CODES.INPUT_ERROR,
  MALFORMED_INPUT: EXIT_CODES.INPUT_ERROR,
  SOURCE_UNREADABLE: EXIT_CODES.INPUT_ERROR,
  DECRYPTION_FAILURE: EXIT_CODES.DECRYPTION_FAILED,
  PLAINTEXT_DETECTED: EXIT_CODES.DECRYPTION_FAILED,
  NO_CONFLICT_MARKERS: EXIT_CODES.CONFLICT,
  MALFORMED_CONFLICT: EXIT_CODES.CONFLICT,
  UNRESOLVED_CONFLICT: EXIT_CODES.CONFLICT,
  EXTERNAL_TOOL_FAILED: EXIT_CODES.ERROR,
};

/**
 * Exit code for a failure raised by a command.
 */
export function exitCodeFor(err: unknown): ExitCode {
  if (err instanceof UsageError) {
    return EXIT_CODES.USAGE_ERROR;
  }
  if (isSecretDiffError(err)) {
    return CODE_TO_EXIT[err.code];
  }
  return EXIT_CODES.ERROR;
}

/**
 * Exit code metadata for documentation
 */
export const EXIT_CODE_METADATA = [
  {
    code: EXIT_CODES.SUCCESS,
    name: 'SUCCESS',
    description: 'Command completed successfully',
  },
  {
    code: EXIT_CODES.ERROR,
    name: 'ERROR',
    description: 'General error (unexpected error, external tool failure, etc.)',
  },
  {
    code: EXIT_CODES.USAGE_ERROR,
    name: 'USAGE_ERROR',
    description: 'Usage error (invalid arguments or flags)',
  },
  {
    code: EXIT_CODES.INPUT_ERROR,
    name: 'INPUT_ERROR',
    description: 'Input unreadable, formats disagree, or content is malformed',
  },
  {
    code: EXIT_CODES.DECRYPTION_FAILED,
    name: 'DECRYPTION_FAILED',
    description: 'Decryption or encryption failed, or a decrypted file was rejected',
  },
  {
    code: EXIT_CODES.CONFLICT,
    name: 'CONFLICT',
    description: 'Conflict markers missing, malformed, or left unresolved',
  },
] as const;
