/**
 * Flattening, change sets and diff rendering.
 */

export type { FlatEntry, FlatMap, PathSegment } from './flatten.js';
export { flattenDocument, formatPath, pathKey, scalarToString } from './flatten.js';
export type { ChangeEntry, ChangeKind, ComparisonMode, DetailedChange } from './changes.js';
export { computeChanges, computeDetailedChanges, scalarsEqual } from './changes.js';
export { SUMMARY_MARKERS, formatSummaryLines, renderSummary } from './summary.js';
export type { Hunk, LineEdit, LineEditType } from './unified.js';
export { DEFAULT_CONTEXT, buildHunks, diffLines, splitLines, unifiedDiff } from './unified.js';
export { colorizeDiff } from './colorize.js';
