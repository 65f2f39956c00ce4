/**
 * Flattening of nested documents into path -> scalar maps.
 */

import { isDocumentMap, type Document, type Scalar } from '../document/types.js';

/** Mapping key or sequence index */
export type PathSegment = string | number;

/**
 * One scalar and the path that reaches it.
 */
export interface FlatEntry {
  segments: PathSegment[];
  /** Rendered path, for display */
  path: string;
  value: Scalar;
}

/**
 * Flat view of a document in traversal order, keyed by `pathKey` of the
 * segments. `{"a.b": 1}` and `{"a": {"b": 1}}` render to the same path but
 * stay separate entries.
 */
export type FlatMap = Map<string, FlatEntry>;

export function pathKey(segments: readonly PathSegment[]): string {
  return JSON.stringify(segments);
}

/**
 * Render path segments: `a.b` for mapping members, `a[0]` for sequence members.
 */
export function formatPath(segments: readonly PathSegment[]): string {
  let out = '';
  for (const segment of segments) {
    if (typeof segment === 'number') {
      out += `[${segment}]`;
    } else {
      out = out === '' ? segment : `${out}.${segment}`;
    }
  }
  return out;
}

function visit(value: Document, segments: PathSegment[], result: FlatMap): void {
  if (Array.isArray(value)) {
    value.forEach((item, index) => visit(item, [...segments, index], result));
    return;
  }
  if (isDocumentMap(value)) {
    for (const [key, member] of Object.entries(value)) {
      visit(member, [...segments, key], result);
    }
    return;
  }
  result.set(pathKey(segments), { segments, path: formatPath(segments), value });
}

/**
 * Flatten a document. Empty mappings and sequences contribute no entries; a
 * scalar root is recorded under the empty path.
 */
export function flattenDocument(doc: Document): FlatMap {
  const result: FlatMap = new Map();
  visit(doc, [], result);
  return result;
}

/**
 * Canonical string form of a scalar, used for textual comparison.
 */
export function scalarToString(value: Scalar): string {
  if (value === null) {
    return 'null';
  }
  return typeof value === 'string' ? value : String(value);
}
