/**
 * Collaborators a command runs against. Actions build the real ones; tests
 * pass fakes to the exported run functions.
 */

import { describeError, isSecretDiffError } from '../errors.js';
import { SopsCli } from '../secrets/sops.js';
import type { SecretStore } from '../secrets/types.js';
import { runExternalTool, type ToolRunner } from '../utils/external-tool.js';
import { GitCli, type VersionControl } from '../utils/git.js';
import { EXIT_CODES, exitCodeFor, type ExitCode } from './exit-codes.js';
import { Output, type OutputOptions } from './output.js';

export interface CommandDeps {
  output: Output;
  store: SecretStore;
  vcs: VersionControl;
  runTool: ToolRunner;
}

export function createDeps(config: { sopsBinary: string } & OutputOptions): CommandDeps {
  return {
    output: new Output({ json: config.json, color: config.color, debug: config.debug }),
    store: new SopsCli({ binary: config.sopsBinary }),
    vcs: new GitCli(),
    runTool: runExternalTool,
  };
}

/**
 * Print a failure and return the exit code it maps to.
 */
export function reportFailure(err: unknown, output: Output): ExitCode {
  output.error(describeError(err), { code: isSecretDiffError(err) ? err.code : undefined });
  output.debug(err instanceof Error && err.stack ? err.stack : String(err));
  return exitCodeFor(err);
}

/**
 * Load a command's configuration, then run it. Configuration failures are
 * reported as usage errors before any collaborator is created.
 */
export async function runAction<C extends { sopsBinary: string } & OutputOptions>(
  load: () => C,
  run: (config: C, deps: CommandDeps) => Promise<ExitCode>,
): Promise<void> {
  let config: C;
  try {
    config = load();
  } catch (err) {
    process.exitCode = reportFailure(err, new Output());
    return;
  }
  const code = await run(config, createDeps(config));
  if (code !== EXIT_CODES.SUCCESS) {
    process.exitCode = code;
  }
}
