#!/usr/bin/env node

import { realpathSync } from 'node:fs';
import { createRequire } from 'node:module';
import { fileURLToPath } from 'node:url';
import { Command } from 'commander';
import { z } from 'zod';
import {
  registerConflictsCommand,
  registerDiffCommand,
  registerGitMergeCommand,
  registerSetupGitCommand,
} from './commands/index.js';
import { EXIT_CODES } from './exit-codes.js';

// Version comes from package.json at runtime
const require = createRequire(import.meta.url);
const { version } = z.object({ version: z.string() }).parse(require('../../package.json'));

export function createProgram(): Command {
  const program = new Command();

  program
    .name('secretdiff')
    .description('Diff and merge SOPS-encrypted YAML, JSON and ENV files')
    .version(version)
    .showHelpAfterError()
    .exitOverride((err) => {
      // commander reports usage errors with exit code 1
      process.exit(err.exitCode === 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.USAGE_ERROR);
    });

  registerDiffCommand(program);
  registerConflictsCommand(program);
  registerGitMergeCommand(program);
  registerSetupGitCommand(program);

  return program;
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    // realpath resolves symlinks (e.g., when run via npm link)
    return realpathSync(entry) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

// Parse and execute (only when run directly)
if (isEntryPoint()) {
  await createProgram().parseAsync();
}
