/**
 * Show the decrypted sides of a conflicted encrypted file.
 */

import * as fs from 'node:fs/promises';
import type { Command } from 'commander';
import { decryptSource } from '../../compare/decrypt.js';
import { loadConflictConfig, type ConflictCommandOptions, type ConflictConfig } from '../../config.js';
import { colorizeConflict } from '../../conflict/colorize.js';
import { composeConflict } from '../../conflict/compose.js';
import { extractSides } from '../../conflict/extract.js';
import { detectFormat } from '../../document/format.js';
import { SecretDiffError } from '../../errors.js';
import { conflictNotices, sourceErrors } from '../../strings/index.js';
import { branchLabels } from '../../utils/git.js';
import { writeOwnerOnly } from '../../utils/secure-temp.js';
import { runAction, reportFailure, type CommandDeps } from '../context.js';
import { EXIT_CODES, type ExitCode } from '../exit-codes.js';

async function readConflicted(file: string): Promise<string> {
  try {
    return await fs.readFile(file, 'utf-8');
  } catch (err) {
    throw new SecretDiffError(sourceErrors.readFailed(file), 'SOURCE_UNREADABLE', {
      stage: 'read',
      file,
      cause: err,
    });
  }
}

/**
 * Extract both sides of every conflict in `file`, decrypt them and rebuild a
 * single readable conflict block.
 */
export async function runConflictsCommand(
  file: string,
  config: ConflictConfig,
  deps: CommandDeps,
): Promise<ExitCode> {
  const { output } = deps;
  try {
    const sides = extractSides(await readConflicted(file), file);
    output.debug(`${sides.conflicts} conflict block(s) in ${file}`);

    const format = detectFormat(file);
    const decryptOptions = { allowPlaintext: false, notifier: output };
    const ours = decryptSource(sides.ours, format, file, deps.store, decryptOptions).text;
    const theirs = decryptSource(sides.theirs, format, file, deps.store, decryptOptions).text;
    const base =
      sides.base === undefined ? undefined : decryptSource(sides.base, format, file, deps.store, decryptOptions).text;

    const content = composeConflict(ours, theirs, branchLabels(deps.vcs), base);

    if (config.output) {
      await writeOwnerOnly(config.output, content);
      output.success(`${conflictNotices.created} ${config.output}`);
      output.line();
      output.line(conflictNotices.instructionsTitle);
      for (const step of conflictNotices.instructions(config.output, file)) {
        output.line(step);
      }
    } else {
      output.print(colorizeConflict(content, output.colors));
    }
    output.warn(conflictNotices.sensitive);
    return EXIT_CODES.SUCCESS;
  } catch (err) {
    return reportFailure(err, output);
  }
}

export function registerConflictsCommand(program: Command): void {
  program
    .command('conflicts')
    .description('Show decrypted Git conflicts of an encrypted file')
    .argument('<file>', 'encrypted file containing conflict markers')
    .option('-o, --output <file>', 'Write the decrypted conflict to a file instead of stdout')
    .option('--no-color', 'Disable colored output')
    .action(async (file: string, options: ConflictCommandOptions) => {
      await runAction(
        () => loadConflictConfig(options),
        (config, deps) => runConflictsCommand(file, config, deps),
      );
    });
}
