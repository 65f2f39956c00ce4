/**
 * Tests for the sops-backed secret store that do not run sops.
 */

import { describe, it, expect } from 'vitest';
import { SopsCli, classifySopsFailure } from '../src/secrets/sops.js';
import { SecretStoreError, toSecretFormat } from '../src/secrets/types.js';

describe('classifySopsFailure', () => {
  it('recognizes unencrypted input', () => {
    expect(classifySopsFailure('Error: sops metadata not found')).toBe('not_encrypted');
  });

  it('recognizes key access failures', () => {
    expect(classifySopsFailure('Failed to get the data key required to decrypt the SOPS file.')).toBe('access_denied');
    expect(classifySopsFailure('AccessDenied: User is not authorized to perform kms:Decrypt')).toBe('access_denied');
  });

  it('treats anything else as malformed', () => {
    expect(classifySopsFailure('Error unmarshalling input yaml: mapping values are not allowed')).toBe('malformed');
    expect(classifySopsFailure('')).toBe('malformed');
  });
});

describe('toSecretFormat', () => {
  it('maps env to dotenv', () => {
    expect(toSecretFormat('env')).toBe('dotenv');
    expect(toSecretFormat('yaml')).toBe('yaml');
    expect(toSecretFormat('json')).toBe('json');
  });
});

describe('SopsCli', () => {
  it('reports a missing binary', () => {
    const store = new SopsCli({ binary: '/nonexistent/secretdiff-test/sops' });
    try {
      store.decrypt('a: 1\n', 'yaml');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(SecretStoreError);
      expect(err instanceof SecretStoreError && err.message).toBe("Could not run '/nonexistent/secretdiff-test/sops'");
    }
  });
});
