// Re-export utilities

export type { GitConfigScope, RevisionRef, VersionControl } from './git.js';
export { GitCli, branchLabels, parseRevisionRef } from './git.js';
export type { SecureTempDir } from './secure-temp.js';
export { shredFile, withSecureTempDir, writeOwnerOnly } from './secure-temp.js';
export type { ToolRunner } from './external-tool.js';
export { runExternalTool, splitToolCommand } from './external-tool.js';
