/**
 * Error model shared by every stage of a comparison or conflict operation.
 *
 * A failure aborts the current operation; nothing is retried. The CLI turns
 * each error into one line of context (file and stage) plus its cause.
 */

export type SecretDiffErrorCode =
  | 'UNRESOLVABLE_FORMAT' // inputs disagree on inferred format, none forced
  | 'MALFORMED_INPUT' // content does not parse under the resolved format
  | 'DECRYPTION_FAILURE' // secret store refused or failed to decrypt/encrypt
  | 'PLAINTEXT_DETECTED' // input has no encryption envelope (strict mode)
  | 'NO_CONFLICT_MARKERS' // conflict extraction on a clean file
  | 'MALFORMED_CONFLICT' // marker sequence cannot be split into two sides
  | 'UNRESOLVED_CONFLICT' // edited content still carries markers
  | 'SOURCE_UNREADABLE' // file or revision could not be read
  | 'EXTERNAL_TOOL_FAILED'; // diff/merge tool exited non-zero

export type Stage =
  | 'read'
  | 'resolve-format'
  | 'decrypt'
  | 'parse'
  | 'render'
  | 'extract'
  | 'validate'
  | 'encrypt'
  | 'tool';

export interface SecretDiffErrorOptions {
  stage: Stage;
  file?: string;
  cause?: unknown;
}

export class SecretDiffError extends Error {
  readonly stage: Stage;
  readonly file: string | undefined;

  constructor(
    message: string,
    public readonly code: SecretDiffErrorCode,
    options: SecretDiffErrorOptions,
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'SecretDiffError';
    this.stage = options.stage;
    this.file = options.file;
  }
}

export function isSecretDiffError(err: unknown): err is SecretDiffError {
  return err instanceof SecretDiffError;
}

/**
 * Message of an unknown thrown value.
 */
export function causeMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}

/**
 * Single-line description: stage and file first, then the message and cause.
 */
export function describeError(err: unknown): string {
  if (!isSecretDiffError(err)) {
    return causeMessage(err);
  }

  const where = err.file ? `[${err.stage}] ${err.file}: ` : `[${err.stage}] `;
  const cause = err.cause === undefined ? '' : `: ${causeMessage(err.cause)}`;
  return `${where}${err.message}${cause}`;
}
