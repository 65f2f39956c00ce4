/**
 * User-facing labels, notices and instructions
 */

export const SUMMARY_TITLE = 'Summary of key changes:';
export const SUMMARY_LEGEND = '! = modified key, + = added key, - = removed key';
export const SUMMARY_RULE = '--------------------------------------';
export const NO_CHANGES = 'No changes detected in keys';

export const DEFAULT_CURRENT_BRANCH = 'your branch';
export const DEFAULT_INCOMING_LABEL = 'incoming changes';

export const plaintextNotices = {
  warning: (file: string) => `WARNING: File '${file}' appears to be decrypted (no encryption metadata found)!`,
  reminder: "Make sure you don't commit decrypted sensitive files.",
  bothPlaintext: 'Both files appear to be already decrypted. Comparing as plain text.',
  mixed:
    'Note: Comparing encrypted and decrypted files may show structural differences in addition to actual content changes.',
} as const;

export const conflictNotices = {
  created: 'Created decrypted conflict file:',
  instructionsTitle: 'Instructions:',
  instructions: (outputFile: string, originalFile: string): string[] => [
    '1. Edit the decrypted file to resolve conflicts',
    '2. Once resolved, encrypt it using sops:',
    `   sops -e -i ${outputFile}`,
    '3. Replace the original file with the encrypted version:',
    `   mv ${outputFile} ${originalFile}`,
  ],
  sensitive: 'The decrypted file contains sensitive information. Delete it when no longer needed.',
} as const;

export const mergeNotices = {
  noTool: 'No diff tool specified. Using default merge with conflict markers.',
  merged: 'Successfully merged and encrypted the result.',
} as const;

export const setupNotices = {
  configured: 'Successfully configured Git to use secretdiff for encrypted files',
  nextSteps: 'Next steps:',
  attributesIntro: 'Add the following to your .gitattributes file:',
  attributes: [
    '*.enc.yaml diff=secretdiff merge=secretdiff',
    '*.enc.json diff=secretdiff merge=secretdiff',
    '*.enc.env diff=secretdiff merge=secretdiff',
  ],
} as const;
