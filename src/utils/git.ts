/**
 * Git integration utilities
 */

import { execFileSync } from 'node:child_process';
import type { ConflictLabels } from '../conflict/compose.js';
import { DEFAULT_CURRENT_BRANCH, DEFAULT_INCOMING_LABEL, toolErrors } from '../strings/index.js';

export type GitConfigScope = 'global' | 'local';

/**
 * `<revision>:<path>` reference, e.g. `HEAD:secrets.enc.yaml`
 */
export interface RevisionRef {
  revision: string;
  path: string;
}

/**
 * Version-control operations the tool relies on.
 */
export interface VersionControl {
  /** Content of a file at a revision; throws when it cannot be read */
  readAtRevision(revision: string, path: string): string;
  /** Short name of the checked-out branch, or null when detached/unknown */
  currentBranch(): string | null;
  /** Name of the branch being merged in, or null outside a merge */
  mergingBranch(): string | null;
  setConfig(key: string, value: string, scope: GitConfigScope): void;
}

/**
 * Parse a revision reference. Returns null for plain paths, including
 * Windows drive paths such as `C:\secrets.yaml`.
 */
export function parseRevisionRef(location: string): RevisionRef | null {
  const idx = location.indexOf(':');
  if (idx <= 0 || idx === location.length - 1) {
    return null;
  }
  const revision = location.slice(0, idx);
  const path = location.slice(idx + 1);
  if (revision.length === 1 && /^[A-Za-z]$/.test(revision) && /^[\\/]/.test(path)) {
    return null;
  }
  return { revision, path };
}

/**
 * Labels for the two sides of a conflict in the current repository.
 */
export function branchLabels(vcs: VersionControl): ConflictLabels {
  const merging = vcs.mergingBranch();
  return {
    ours: vcs.currentBranch() ?? DEFAULT_CURRENT_BRANCH,
    theirs: merging ? `${DEFAULT_INCOMING_LABEL} from ${merging}` : DEFAULT_INCOMING_LABEL,
  };
}

/**
 * VersionControl backed by the git command line.
 */
export class GitCli implements VersionControl {
  constructor(private readonly cwd?: string) {}

  readAtRevision(revision: string, path: string): string {
    return this.git(['show', `${revision}:${path}`]);
  }

  currentBranch(): string | null {
    try {
      return this.git(['symbolic-ref', '--short', 'HEAD']).trim() || null;
    } catch {
      return null;
    }
  }

  mergingBranch(): string | null {
    try {
      this.git(['rev-parse', '-q', '--verify', 'MERGE_HEAD']);
    } catch {
      return null;
    }
    try {
      return this.git(['name-rev', '--name-only', 'MERGE_HEAD']).trim() || null;
    } catch {
      return null;
    }
  }

  setConfig(key: string, value: string, scope: GitConfigScope): void {
    const args = ['config', `--${scope}`, key, value];
    try {
      this.git(args);
    } catch (err) {
      throw new Error(toolErrors.gitCommandFailed(args), { cause: err });
    }
  }

  private git(args: string[]): string {
    return execFileSync('git', args, {
      cwd: this.cwd,
      encoding: 'utf-8',
      stdio: ['pipe', 'pipe', 'pipe'],
      maxBuffer: 64 * 1024 * 1024,
    });
  }
}
