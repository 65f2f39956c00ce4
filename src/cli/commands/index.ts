// Re-export command registration functions

export { registerConflictsCommand, runConflictsCommand } from './conflicts.js';
export { registerDiffCommand, runDiffCommand } from './diff.js';
export type { MergeInputs } from './git-merge.js';
export { registerGitMergeCommand, runGitMergeCommand } from './git-merge.js';
export { GIT_CONFIG_ENTRIES, registerSetupGitCommand, runSetupGitCommand } from './setup-git.js';
