/**
 * Where the two compared documents come from.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { UsageError } from '../config.js';
import { SecretDiffError } from '../errors.js';
import { sourceErrors } from '../strings/index.js';
import { parseRevisionRef, type VersionControl } from '../utils/git.js';

export interface SourceInput {
  /** File path or `<revision>:<path>` to read from */
  location: string;
  /** Basename shown in diff headers */
  name: string;
  /** Path whose extension decides the format */
  formatHint: string;
  /** No file on this side: git reports an added or deleted file */
  missing?: boolean;
}

export interface SourcePair {
  first: SourceInput;
  second: SourceInput;
}

export interface SourceReader {
  read(location: string): Promise<string>;
}

/** git's hash for "no object", used for the working tree side */
export const NULL_OBJECT_ID = '0000000000000000000000000000000000000000';

/** git's file and hex for the absent side of an added or deleted file */
export const NULL_FILE = '/dev/null';
export const NULL_HEX = '.';

function isMissingSide(file: string, hex: string): boolean {
  return hex === NULL_HEX || file === NULL_FILE;
}

function sourceFor(location: string, git: boolean): SourceInput {
  const ref = git ? parseRevisionRef(location) : null;
  const filePath = ref ? ref.path : location;
  return { location, name: path.basename(filePath), formatHint: filePath };
}

/**
 * Turn positional arguments into a pair of sources.
 *
 * With git support and seven or more arguments the list follows git's
 * external diff convention: path old-file old-hex old-mode new-file new-hex new-mode.
 * A side git passes as `/dev/null` with hex `.` is marked missing.
 *
 * @throws UsageError when the argument count is wrong
 */
export function resolveSourceArgs(args: readonly string[], git: boolean): SourcePair {
  if (git && args.length >= 7) {
    const [displayPath, oldFile, oldHex, , newFile, newHex] = args;
    const name = path.basename(displayPath);
    return {
      first: { location: oldFile, name, formatHint: displayPath, missing: isMissingSide(oldFile, oldHex) },
      second: {
        location: newHex === NULL_OBJECT_ID ? displayPath : newFile,
        name,
        formatHint: displayPath,
        missing: isMissingSide(newFile, newHex),
      },
    };
  }

  if (args.length !== 2) {
    throw new UsageError(sourceErrors.wrongArgCount(args.length));
  }
  return { first: sourceFor(args[0], git), second: sourceFor(args[1], git) };
}

/**
 * Reader for files and, with git support, revision references.
 */
export function createSourceReader(options: { git: boolean; vcs: VersionControl }): SourceReader {
  return {
    async read(location: string): Promise<string> {
      const ref = options.git ? parseRevisionRef(location) : null;
      if (ref) {
        try {
          return options.vcs.readAtRevision(ref.revision, ref.path);
        } catch (err) {
          throw new SecretDiffError(sourceErrors.revisionReadFailed(location), 'SOURCE_UNREADABLE', {
            stage: 'read',
            file: location,
            cause: err,
          });
        }
      }
      try {
        return await fs.readFile(location, 'utf-8');
      } catch (err) {
        throw new SecretDiffError(sourceErrors.readFailed(location), 'SOURCE_UNREADABLE', {
          stage: 'read',
          file: location,
          cause: err,
        });
      }
    },
  };
}
