/**
 * Tests for exit code constants and their mapping from errors
 */

import { describe, it, expect } from 'vitest';
import { EXIT_CODES, EXIT_CODE_METADATA, exitCodeFor } from '../src/cli/exit-codes.js';
import { UsageError } from '../src/config.js';
import { SecretDiffError, type SecretDiffErrorCode } from '../src/errors.js';

describe('EXIT_CODES constants', () => {
  it('should define all semantic exit codes', () => {
    expect(EXIT_CODES.SUCCESS).toBe(0);
    expect(EXIT_CODES.ERROR).toBe(1);
    expect(EXIT_CODES.USAGE_ERROR).toBe(2);
    expect(EXIT_CODES.INPUT_ERROR).toBe(3);
    expect(EXIT_CODES.DECRYPTION_FAILED).toBe(4);
    expect(EXIT_CODES.CONFLICT).toBe(5);
  });

  it('should have unique values for each exit code', () => {
    const values = Object.values(EXIT_CODES);
    expect(new Set(values).size).toBe(values.length);
  });
});

describe('EXIT_CODE_METADATA documentation', () => {
  it('should document all exit codes', () => {
    const documented = EXIT_CODE_METADATA.map((m) => m.code);
    expect(documented).toEqual(Object.values(EXIT_CODES));
  });

  it('should name each code after its constant', () => {
    for (const metadata of EXIT_CODE_METADATA) {
      expect(EXIT_CODES[metadata.name]).toBe(metadata.code);
      expect(metadata.description).toBeTruthy();
    }
  });
});

describe('exitCodeFor', () => {
  const cases: Array<[SecretDiffErrorCode, number]> = [
    ['UNRESOLVABLE_FORMAT', 3],
    ['MALFORMED_INPUT', 3],
    ['SOURCE_UNREADABLE', 3],
    ['DECRYPTION_FAILURE', 4],
    ['PLAINTEXT_DETECTED', 4],
    ['NO_CONFLICT_MARKERS', 5],
    ['MALFORMED_CONFLICT', 5],
    ['UNRESOLVED_CONFLICT', 5],
    ['EXTERNAL_TOOL_FAILED', 1],
  ];

  for (const [code, expected] of cases) {
    it(`maps ${code} to ${expected}`, () => {
      expect(exitCodeFor(new SecretDiffError('failed', code, { stage: 'read' }))).toBe(expected);
    });
  }

  it('maps usage errors and unexpected errors', () => {
    expect(exitCodeFor(new UsageError('bad option'))).toBe(EXIT_CODES.USAGE_ERROR);
    expect(exitCodeFor(new Error('boom'))).toBe(EXIT_CODES.ERROR);
    expect(exitCodeFor('thrown string')).toBe(EXIT_CODES.ERROR);
  });
});
