/**
 * Format detection and resolution for a pair of inputs.
 */

import * as path from 'node:path';
import { SecretDiffError } from '../errors.js';
import { formatErrors } from '../strings/index.js';
import type { Format } from './types.js';

/**
 * Explicit format or "auto" (infer from the file extension).
 */
export type FormatChoice = Format | 'auto';

/**
 * Suffix from the last dot of the basename; `.env` itself counts as an extension.
 */
function extensionOf(filePath: string): string {
  const base = path.basename(filePath).toLowerCase();
  const dot = base.lastIndexOf('.');
  return dot === -1 ? '' : base.slice(dot);
}

/**
 * Detect a file's format from its extension. Unknown extensions are YAML.
 *
 * A revision reference such as `HEAD:secrets.json` is detected by its path part.
 */
export function detectFormat(filePath: string): Format {
  switch (extensionOf(filePath)) {
    case '.json':
      return 'json';
    case '.yaml':
    case '.yml':
      return 'yaml';
    case '.env':
      return 'env';
    default:
      return 'yaml';
  }
}

/**
 * Resolve the single format a comparison runs under.
 *
 * @throws SecretDiffError UNRESOLVABLE_FORMAT when nothing is forced and the
 *   two inferred formats differ
 */
export function resolveFormat(firstPath: string, secondPath: string, choice: FormatChoice): Format {
  if (choice !== 'auto') {
    return choice;
  }

  const first = detectFormat(firstPath);
  const second = detectFormat(secondPath);
  if (first !== second) {
    throw new SecretDiffError(formatErrors.mismatch(first, second), 'UNRESOLVABLE_FORMAT', {
      stage: 'resolve-format',
    });
  }
  return first;
}
