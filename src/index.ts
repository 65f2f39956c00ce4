/**
 * Library entry point: parsing, flattening, diffing and conflict handling of
 * structured secrets files, independent of the command line.
 */

export * from './document/index.js';
export * from './diff/index.js';
export * from './conflict/index.js';
export * from './compare/index.js';
export * from './secrets/index.js';
export * from './utils/index.js';
export * from './errors.js';
export type { DiffConfig, ConflictConfig, MergeConfig, SetupConfig } from './config.js';
export { UsageError, loadConflictConfig, loadDiffConfig, loadMergeConfig, loadSetupConfig } from './config.js';
