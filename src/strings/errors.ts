/**
 * Centralized error messages
 *
 * Grouped by the stage that raises them so wording stays consistent between
 * the comparison engine, the conflict commands and the CLI.
 */

/**
 * Format resolution and parsing errors
 */
export const formatErrors = {
  mismatch: (a: string, b: string) => `Files appear to be different formats: ${a} and ${b}`,
  parseFailed: (label: string) => `Error parsing ${label}`,
  envNotFlat: 'ENV documents must be a flat mapping of keys to values',
} as const;

/**
 * Source reading errors
 */
export const sourceErrors = {
  readFailed: (location: string) => `Error reading file ${location}`,
  revisionReadFailed: (location: string) => `Error reading Git file ${location}`,
  wrongArgCount: (count: number) => `accepts 2 arg(s), received ${count}`,
} as const;

/**
 * Secret store errors
 */
export const secretErrors = {
  decryptFailed: 'Error decrypting',
  encryptFailed: 'Encryption failed',
  plaintextRejected: (file: string) =>
    `File '${file}' is decrypted, aborting as --error-on-decrypted is enabled`,
  storeUnavailable: (binary: string) => `Could not run '${binary}'`,
} as const;

/**
 * Conflict extraction and resolution errors
 */
export const conflictErrors = {
  noMarkers: (file: string) => `File ${file} does not contain Git conflicts`,
  nestedStart: (line: number) => `Conflict start marker inside an open conflict at line ${line}`,
  endBeforeSeparator: (line: number) => `Conflict end marker before separator at line ${line}`,
  duplicateSeparator: (line: number) => `Second conflict separator at line ${line}`,
  misplacedBase: (line: number) => `Base section marker outside the ours region at line ${line}`,
  unterminated: (line: number) => `Conflict opened at line ${line} is never closed`,
  unresolved: 'Merge not complete: conflict markers still present in the merged file',
} as const;

/**
 * External tool errors
 */
export const toolErrors = {
  failed: (tool: string, status: number | null) =>
    status === null ? `${tool} was terminated by a signal` : `${tool} exited with status ${status}`,
  couldNotStart: (tool: string) => `Could not start ${tool}`,
  gitCommandFailed: (args: string[]) => `Error executing git ${args.join(' ')}`,
} as const;
