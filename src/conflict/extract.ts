/**
 * Conflict extractor: splits a conflicted text into its two sides.
 */

import { SecretDiffError } from '../errors.js';
import { conflictErrors } from '../strings/index.js';
import { classifyMarker, scanLines } from './markers.js';

export interface ConflictSides {
  /** Common lines plus every "ours" region, markers removed */
  ours: string;
  /** Common lines plus every "theirs" region, markers removed */
  theirs: string;
  /**
   * Common lines plus every base region; only set when each conflict carries
   * a diff3-style base section
   */
  base?: string;
  /** Number of conflict blocks found */
  conflicts: number;
}

type ExtractState = 'common' | 'ours' | 'base' | 'theirs';

function malformed(message: string, file?: string): SecretDiffError {
  return new SecretDiffError(message, 'MALFORMED_CONFLICT', { stage: 'extract', file });
}

/**
 * Extract both sides of every conflict block.
 *
 * State machine over lines, starting in `common`:
 *   common --start--> ours --separator--> theirs --end--> common
 *   ours --base--> base --separator--> theirs
 * Marker lines are dropped. Common lines go to both sides. A separator or end
 * marker outside a conflict is ordinary content.
 *
 * @param file Used only for error context
 * @throws SecretDiffError NO_CONFLICT_MARKERS when no block is present,
 *   MALFORMED_CONFLICT on nested, unordered or unterminated markers
 */
export function extractSides(text: string, file?: string): ConflictSides {
  const ours: string[] = [];
  const theirs: string[] = [];
  const base: string[] = [];
  let state: ExtractState = 'common';
  let openedAt = 0;
  let conflicts = 0;
  let blocksWithBase = 0;

  for (const [index, line] of scanLines(text).entries()) {
    const lineNo = index + 1;
    const marker = classifyMarker(line);

    switch (state) {
      case 'common':
        if (marker === 'start') {
          state = 'ours';
          openedAt = lineNo;
          conflicts += 1;
          continue;
        }
        ours.push(line);
        theirs.push(line);
        base.push(line);
        continue;

      case 'ours':
      case 'base':
        if (marker === 'start') throw malformed(conflictErrors.nestedStart(lineNo), file);
        if (marker === 'end') throw malformed(conflictErrors.endBeforeSeparator(lineNo), file);
        if (marker === 'base') {
          if (state === 'base') throw malformed(conflictErrors.misplacedBase(lineNo), file);
          state = 'base';
          blocksWithBase += 1;
          continue;
        }
        if (marker === 'separator') {
          state = 'theirs';
          continue;
        }
        (state === 'ours' ? ours : base).push(line);
        continue;

      case 'theirs':
        if (marker === 'start') throw malformed(conflictErrors.nestedStart(lineNo), file);
        if (marker === 'base') throw malformed(conflictErrors.misplacedBase(lineNo), file);
        if (marker === 'separator') throw malformed(conflictErrors.duplicateSeparator(lineNo), file);
        if (marker === 'end') {
          state = 'common';
          continue;
        }
        theirs.push(line);
        continue;
    }
  }

  if (state !== 'common') {
    throw malformed(conflictErrors.unterminated(openedAt), file);
  }

  if (conflicts === 0) {
    throw new SecretDiffError(conflictErrors.noMarkers(file ?? 'input'), 'NO_CONFLICT_MARKERS', {
      stage: 'extract',
      file,
    });
  }

  const sides: ConflictSides = {
    ours: ours.join('\n'),
    theirs: theirs.join('\n'),
    conflicts,
  };
  if (blocksWithBase === conflicts) {
    sides.base = base.join('\n');
  }
  return sides;
}
