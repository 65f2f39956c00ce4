/**
 * Format parser: decrypted text to Document.
 */

import * as YAML from 'yaml';
import { SecretDiffError } from '../errors.js';
import { formatErrors } from '../strings/index.js';
import { parseEnv } from './env.js';
import { DocumentSchema, FORMAT_LABELS, type Document, type Format } from './types.js';

function malformed(format: Format, cause: unknown, file?: string): SecretDiffError {
  return new SecretDiffError(formatErrors.parseFailed(FORMAT_LABELS[format]), 'MALFORMED_INPUT', {
    stage: 'parse',
    file,
    cause,
  });
}

/**
 * Check that a library result only holds mappings, sequences and scalars.
 */
function toDocument(value: unknown, format: Format, file?: string): Document {
  const result = DocumentSchema.safeParse(value);
  if (!result.success) {
    throw malformed(format, new Error(result.error.issues[0]?.message ?? 'unsupported value'), file);
  }
  return result.data;
}

/**
 * Parse text in the given format.
 *
 * @param file Used only for error context
 * @throws SecretDiffError MALFORMED_INPUT
 */
export function parseDocument(text: string, format: Format, file?: string): Document {
  switch (format) {
    case 'env':
      return parseEnv(text);
    case 'json': {
      let value: unknown;
      try {
        value = JSON.parse(text);
      } catch (err) {
        throw malformed(format, err, file);
      }
      return toDocument(value, format, file);
    }
    case 'yaml': {
      let value: unknown;
      try {
        // integers past 2^53 would otherwise collapse onto their neighbours
        value = YAML.parse(text, { intAsBigInt: true });
      } catch (err) {
        throw malformed(format, err, file);
      }
      return toDocument(value ?? null, format, file);
    }
  }
}
