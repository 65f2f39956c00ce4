/**
 * SecretStore backed by the sops command line.
 *
 * Content is passed on stdin and read back from stdout, so neither ciphertext
 * nor plaintext is staged on disk.
 */

import { execFileSync } from 'node:child_process';
import { DEFAULT_SOPS_BINARY } from '../config.js';
import { secretErrors } from '../strings/index.js';
import { SecretStoreError, type SecretFormat, type SecretStore, type SecretStoreFailure } from './types.js';

const NOT_ENCRYPTED = /sops metadata not found/i;

const ACCESS_DENIED =
  /failed to get the data key|error getting data key|could not decrypt|no key could|access ?denied|permission denied|unauthori[sz]ed|forbidden/i;

/**
 * Map sops diagnostics to a failure reason.
 */
export function classifySopsFailure(stderr: string): SecretStoreFailure {
  if (NOT_ENCRYPTED.test(stderr)) return 'not_encrypted';
  if (ACCESS_DENIED.test(stderr)) return 'access_denied';
  return 'malformed';
}

function stderrOf(err: unknown): string {
  if (typeof err === 'object' && err !== null && 'stderr' in err) {
    const { stderr } = err;
    if (typeof stderr === 'string') return stderr;
    if (Buffer.isBuffer(stderr)) return stderr.toString('utf-8');
  }
  return '';
}

function isMissingBinary(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

export interface SopsCliOptions {
  binary?: string;
  cwd?: string;
}

export class SopsCli implements SecretStore {
  private readonly binary: string;

  constructor(private readonly options: SopsCliOptions = {}) {
    this.binary = options.binary ?? DEFAULT_SOPS_BINARY;
  }

  decrypt(content: string, format: SecretFormat): string {
    return this.run(['--decrypt', '--input-type', format, '--output-type', format, '/dev/stdin'], content);
  }

  encrypt(content: string, format: SecretFormat, filename?: string): string {
    const args = ['--encrypt', '--input-type', format, '--output-type', format];
    if (filename) {
      args.push('--filename-override', filename);
    }
    args.push('/dev/stdin');
    return this.run(args, content);
  }

  private run(args: string[], input: string): string {
    try {
      return execFileSync(this.binary, args, {
        cwd: this.options.cwd,
        input,
        encoding: 'utf-8',
        stdio: ['pipe', 'pipe', 'pipe'],
        maxBuffer: 64 * 1024 * 1024,
      });
    } catch (err) {
      if (isMissingBinary(err)) {
        throw new SecretStoreError(secretErrors.storeUnavailable(this.binary), 'malformed', { cause: err });
      }
      const stderr = stderrOf(err).trim();
      throw new SecretStoreError(stderr || `${this.binary} failed`, classifySopsFailure(stderr), {
        cause: err,
      });
    }
  }
}
