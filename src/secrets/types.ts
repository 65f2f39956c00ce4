/**
 * Capability boundary to the encryption-at-rest tool.
 */

import type { Format } from '../document/types.js';

/** Input/output type understood by the secret store */
export type SecretFormat = 'yaml' | 'json' | 'dotenv';

export type SecretStoreFailure =
  | 'not_encrypted' // content has no encryption metadata
  | 'access_denied' // keys unavailable or refused
  | 'malformed'; // anything else

export class SecretStoreError extends Error {
  constructor(
    message: string,
    public readonly reason: SecretStoreFailure,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'SecretStoreError';
  }
}

export interface SecretStore {
  /**
   * @throws SecretStoreError
   */
  decrypt(content: string, format: SecretFormat): string;

  /**
   * @param filename Path whose creation rules select the keys
   * @throws SecretStoreError
   */
  encrypt(content: string, format: SecretFormat, filename?: string): string;
}

export function toSecretFormat(format: Format): SecretFormat {
  return format === 'env' ? 'dotenv' : format;
}
