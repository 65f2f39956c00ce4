/**
 * Register secretdiff with git as diff command, merge driver and merge tool.
 */

import type { Command } from 'commander';
import { loadSetupConfig, type SetupCommandOptions, type SetupConfig } from '../../config.js';
import { setupNotices } from '../../strings/index.js';
import { runAction, reportFailure, type CommandDeps } from '../context.js';
import { EXIT_CODES, type ExitCode } from '../exit-codes.js';

export const GIT_CONFIG_ENTRIES: ReadonlyArray<readonly [key: string, value: string]> = [
  ['merge.secretdiff.name', 'secretdiff merge driver for encrypted files'],
  ['merge.secretdiff.driver', 'secretdiff git-merge %A %O %B %P'],
  ['merge.secretdiff.recursive', 'binary'],
  ['mergetool.secretdiff.cmd', 'secretdiff git-merge "$LOCAL" "$BASE" "$REMOTE" "$MERGED" --output "$MERGED"'],
  ['mergetool.secretdiff.trustExitCode', 'true'],
  ['diff.secretdiff.command', 'secretdiff --git'],
];

export async function runSetupGitCommand(config: SetupConfig, deps: CommandDeps): Promise<ExitCode> {
  const { output } = deps;
  try {
    for (const [key, value] of GIT_CONFIG_ENTRIES) {
      output.debug(`git config --${config.scope} ${key}`);
      deps.vcs.setConfig(key, value, config.scope);
    }
    output.success(setupNotices.configured);
    output.line();
    output.line(setupNotices.nextSteps);
    output.line(setupNotices.attributesIntro);
    for (const line of setupNotices.attributes) {
      output.line(`  ${line}`);
    }
    return EXIT_CODES.SUCCESS;
  } catch (err) {
    return reportFailure(err, output);
  }
}

export function registerSetupGitCommand(program: Command): void {
  program
    .command('setup-git')
    .description('Configure git to diff and merge encrypted files with secretdiff')
    .option('--local', 'Write to the repository config instead of the global one')
    .action(async (options: SetupCommandOptions) => {
      await runAction(
        () => loadSetupConfig(options),
        (config, deps) => runSetupGitCommand(config, deps),
      );
    });
}
