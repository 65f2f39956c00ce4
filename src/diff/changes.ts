/**
 * Change-set computation between two flattened documents.
 */

import type { Scalar } from '../document/types.js';
import { scalarToString, type FlatMap } from './flatten.js';

export type ChangeKind = 'added' | 'removed' | 'modified';

/**
 * One changed path. Never carries values.
 */
export interface ChangeEntry {
  kind: ChangeKind;
  path: string;
}

/**
 * Change entry with the values on each side, for callers that need them.
 * `before` is absent for added paths, `after` for removed ones.
 */
export interface DetailedChange extends ChangeEntry {
  before?: Scalar;
  after?: Scalar;
}

/**
 * How scalars are compared.
 * - textual: equal when their string forms match (`false` equals `"false"`)
 * - typed: equal only when type and value match
 */
export type ComparisonMode = 'textual' | 'typed';

export function scalarsEqual(a: Scalar, b: Scalar, mode: ComparisonMode = 'textual'): boolean {
  if (mode === 'textual') {
    return scalarToString(a) === scalarToString(b);
  }
  if (typeof a !== typeof b) {
    return false;
  }
  if (typeof a === 'number' && typeof b === 'number' && Number.isNaN(a) && Number.isNaN(b)) {
    return true;
  }
  return a === b;
}

function byPath(a: ChangeEntry, b: ChangeEntry): number {
  if (a.path < b.path) return -1;
  if (a.path > b.path) return 1;
  return 0;
}

/**
 * Compare two flat maps, keeping values on each entry.
 *
 * Sorted by path in code-unit order. Unchanged paths produce nothing.
 */
export function computeDetailedChanges(
  before: FlatMap,
  after: FlatMap,
  mode: ComparisonMode = 'textual',
): DetailedChange[] {
  const changes: DetailedChange[] = [];

  for (const [key, { path, value: oldValue }] of before) {
    const next = after.get(key);
    if (next === undefined) {
      changes.push({ kind: 'removed', path, before: oldValue });
      continue;
    }
    if (!scalarsEqual(oldValue, next.value, mode)) {
      changes.push({ kind: 'modified', path, before: oldValue, after: next.value });
    }
  }

  for (const [key, { path, value }] of after) {
    if (!before.has(key)) {
      changes.push({ kind: 'added', path, after: value });
    }
  }

  return changes.sort(byPath);
}

/**
 * Compare two flat maps by path only.
 */
export function computeChanges(
  before: FlatMap,
  after: FlatMap,
  mode: ComparisonMode = 'textual',
): ChangeEntry[] {
  return computeDetailedChanges(before, after, mode).map(({ kind, path }) => ({ kind, path }));
}
