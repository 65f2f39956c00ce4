/**
 * Comparison of two encrypted documents.
 */

export type { SourcePair, SourceReader, SourceInput } from './sources.js';
export { NULL_OBJECT_ID, createSourceReader, resolveSourceArgs } from './sources.js';
export type { DecryptOptions, DecryptedSource, Notifier } from './decrypt.js';
export { decryptSource } from './decrypt.js';
export type { CompareDeps, CompareOptions, Comparison, LoadedSource } from './compare.js';
export { compareSources } from './compare.js';
export type { JsonReport } from './report.js';
export { openInDiffTool, renderFullDiff, renderReport, toJsonReport } from './report.js';
