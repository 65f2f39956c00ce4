/**
 * Decryption of one source, including plaintext detection and the env
 * fallbacks.
 */

import type { Format } from '../document/types.js';
import { SecretDiffError } from '../errors.js';
import { SecretStoreError, toSecretFormat, type SecretFormat, type SecretStore } from '../secrets/types.js';
import { plaintextNotices, secretErrors } from '../strings/index.js';

/**
 * Receiver for warnings and progress notes raised while comparing.
 */
export interface Notifier {
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
}

export interface DecryptedSource {
  text: string;
  /** True when the content had no encryption envelope and is used as-is */
  plaintext: boolean;
}

export interface DecryptOptions {
  /** Accept unencrypted input (after a warning) instead of failing */
  allowPlaintext: boolean;
  notifier: Notifier;
}

/**
 * Secret formats to try, in order. ENV files may have been encrypted as
 * YAML or JSON.
 */
function attemptsFor(format: Format): SecretFormat[] {
  return format === 'env' ? ['dotenv', 'yaml', 'json'] : [toSecretFormat(format)];
}

function plaintext(content: string, file: string, options: DecryptOptions): DecryptedSource {
  options.notifier.warn(plaintextNotices.warning(file));
  options.notifier.warn(plaintextNotices.reminder);
  if (!options.allowPlaintext) {
    throw new SecretDiffError(secretErrors.plaintextRejected(file), 'PLAINTEXT_DETECTED', {
      stage: 'decrypt',
      file,
    });
  }
  return { text: content, plaintext: true };
}

/**
 * Decrypt content read from `file`.
 *
 * @throws SecretDiffError DECRYPTION_FAILURE, or PLAINTEXT_DETECTED when
 *   plaintext is not allowed
 */
export function decryptSource(
  content: string,
  format: Format,
  file: string,
  store: SecretStore,
  options: DecryptOptions,
): DecryptedSource {
  let firstFailure: unknown;

  for (const [index, attempt] of attemptsFor(format).entries()) {
    try {
      return { text: store.decrypt(content, attempt), plaintext: false };
    } catch (err) {
      if (!(err instanceof SecretStoreError)) {
        throw new SecretDiffError(secretErrors.decryptFailed, 'DECRYPTION_FAILURE', {
          stage: 'decrypt',
          file,
          cause: err,
        });
      }
      if (index === 0 && err.reason === 'not_encrypted') {
        return plaintext(content, file, options);
      }
      options.notifier.debug(`decrypting ${file} as ${attempt} failed (${err.reason})`);
      firstFailure ??= err;
    }
  }

  throw new SecretDiffError(secretErrors.decryptFailed, 'DECRYPTION_FAILURE', {
    stage: 'decrypt',
    file,
    cause: firstFailure,
  });
}
