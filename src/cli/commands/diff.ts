/**
 * Default command: compare two encrypted files.
 */

import type { Command } from 'commander';
import { compareSources } from '../../compare/compare.js';
import { openInDiffTool, renderReport, toJsonReport } from '../../compare/report.js';
import { createSourceReader, resolveSourceArgs } from '../../compare/sources.js';
import { loadDiffConfig, type DiffCommandOptions, type DiffConfig } from '../../config.js';
import { colorizeDiff } from '../../diff/colorize.js';
import { runAction, reportFailure, type CommandDeps } from '../context.js';
import { EXIT_CODES, type ExitCode } from '../exit-codes.js';

/**
 * Compare the sources named by `args` and print the result.
 *
 * The exit code is SUCCESS whether or not the documents differ.
 */
export async function runDiffCommand(
  args: readonly string[],
  config: DiffConfig,
  deps: CommandDeps,
): Promise<ExitCode> {
  const { output } = deps;
  try {
    const pair = resolveSourceArgs(args, config.git);
    if (config.git && args.length >= 7) {
      output.debug(`git external diff: ${pair.first.location} -> ${pair.second.location}`);
    }

    const comparison = await compareSources(
      pair,
      {
        format: config.format,
        errorOnDecrypted: config.errorOnDecrypted,
        comparison: config.comparison,
        summary: config.summary,
      },
      {
        store: deps.store,
        reader: createSourceReader({ git: config.git, vcs: deps.vcs }),
        notifier: output,
      },
    );

    if (config.diffTool) {
      await openInDiffTool(comparison, config.diffTool, config.summary, deps.runTool);
    } else if (config.json) {
      output.json(toJsonReport(comparison, config.summary));
    } else {
      const report = renderReport(comparison, config.summary);
      output.print(config.summary ? report : colorizeDiff(report, output.colors));
    }
    return EXIT_CODES.SUCCESS;
  } catch (err) {
    return reportFailure(err, output);
  }
}

export function registerDiffCommand(program: Command): void {
  program
    .command('diff', { isDefault: true })
    .description('Show differences between two encrypted files')
    .argument('<files...>', 'two files to compare (or git external diff arguments with --git)')
    .option('-s, --summary', 'Show only a summary of changed keys')
    .option('-f, --format <format>', 'Force the format: auto, yaml, json or env', 'auto')
    .option('--no-color', 'Disable colored output')
    .option('-d, --diff-tool <tool>', 'Open the decrypted files in an external diff tool')
    .option('-g, --git', 'Accept <revision>:<path> references and git external diff arguments')
    .option('--no-error-on-decrypted', 'Compare files that are already decrypted instead of failing')
    .option('--strict-types', 'Treat values of different types as changed (false vs "false")')
    .option('--json', 'Output in JSON format')
    .action(async (files: string[], options: DiffCommandOptions) => {
      await runAction(
        () => loadDiffConfig(options),
        (config, deps) => runDiffCommand(files, config, deps),
      );
    });
}
