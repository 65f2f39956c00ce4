/**
 * Conflict composer: rebuilds a marked block from decrypted sides and gates
 * edited content before it is re-encrypted.
 */

import { SecretDiffError } from '../errors.js';
import { conflictErrors } from '../strings/index.js';
import { BASE_MARKER, END_MARKER, SEPARATOR, START_MARKER, classifyMarker, scanLines } from './markers.js';

export interface ConflictLabels {
  /** Name of the current branch */
  ours: string;
  /** Description of the incoming side */
  theirs: string;
}

function withTrailingNewline(text: string): string {
  return text === '' || text.endsWith('\n') ? text : `${text}\n`;
}

/**
 * Compose a single conflict block for human editing:
 *
 *   <<<<<<< HEAD (<ours> branch)
 *   <ours>
 *   ||||||| BASE          (only when base is given)
 *   <base>
 *   =======
 *   <theirs>
 *   >>>>>>> OTHER (<theirs>)
 *
 * Each side is terminated with a newline if it lacks one.
 */
export function composeConflict(
  ours: string,
  theirs: string,
  labels: ConflictLabels,
  base?: string,
): string {
  let out = `${START_MARKER}HEAD (${labels.ours} branch)\n${withTrailingNewline(ours)}`;
  if (base !== undefined) {
    out += `${BASE_MARKER} BASE\n${withTrailingNewline(base)}`;
  }
  out += `${SEPARATOR}\n${withTrailingNewline(theirs)}${END_MARKER}OTHER (${labels.theirs})\n`;
  return out;
}

/**
 * Initial content of a merge tool's result file.
 */
export function composeMergeDraft(local: string, remote: string): string {
  return `${START_MARKER}LOCAL\n${withTrailingNewline(local)}${SEPARATOR}\n${withTrailingNewline(remote)}${END_MARKER}REMOTE\n`;
}

/**
 * True when no conflict marker line remains.
 */
export function validateResolved(text: string): boolean {
  return scanLines(text).every((line) => classifyMarker(line) === null);
}

/**
 * @throws SecretDiffError UNRESOLVED_CONFLICT when markers remain
 */
export function assertResolved(text: string, file?: string): void {
  if (!validateResolved(text)) {
    throw new SecretDiffError(conflictErrors.unresolved, 'UNRESOLVED_CONFLICT', {
      stage: 'validate',
      file,
    });
  }
}
