/**
 * Merge driver and merge tool for encrypted files.
 *
 * Git invokes the driver as `secretdiff git-merge %A %O %B %P`: the local,
 * base and remote versions plus the path being merged. The merged result is
 * written back to the local file, which is where git expects it.
 */

import * as fs from 'node:fs/promises';
import type { Command } from 'commander';
import { decryptSource } from '../../compare/decrypt.js';
import { loadMergeConfig, type MergeCommandOptions, type MergeConfig } from '../../config.js';
import { assertResolved, composeMergeDraft } from '../../conflict/compose.js';
import { detectFormat } from '../../document/format.js';
import type { Format } from '../../document/types.js';
import { SecretDiffError } from '../../errors.js';
import { toSecretFormat, type SecretStore } from '../../secrets/types.js';
import { mergeNotices, secretErrors, sourceErrors } from '../../strings/index.js';
import { withSecureTempDir, writeOwnerOnly } from '../../utils/secure-temp.js';
import { runAction, reportFailure, type CommandDeps } from '../context.js';
import { EXIT_CODES, type ExitCode } from '../exit-codes.js';

export interface MergeInputs {
  local: string;
  base: string;
  remote: string;
  /** Path of the file in the repository; decides the format */
  path?: string;
}

async function readInput(file: string): Promise<string> {
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

function encrypt(store: SecretStore, content: string, format: Format, file: string): string {
  try {
    return store.encrypt(content, toSecretFormat(format), file);
  } catch (err) {
    throw new SecretDiffError(secretErrors.encryptFailed, 'DECRYPTION_FAILURE', {
      stage: 'encrypt',
      file,
      cause: err,
    });
  }
}

export async function runGitMergeCommand(
  inputs: MergeInputs,
  config: MergeConfig,
  deps: CommandDeps,
): Promise<ExitCode> {
  const { output, store } = deps;
  const target = inputs.path ?? inputs.local;
  const destination = config.output ?? inputs.local;

  try {
    const format = detectFormat(target);
    const decryptOptions = { allowPlaintext: false, notifier: output };
    const decryptFile = async (file: string) =>
      decryptSource(await readInput(file), format, file, store, decryptOptions).text;

    const local = await decryptFile(inputs.local);
    const base = await decryptFile(inputs.base);
    const remote = await decryptFile(inputs.remote);

    const merged = await withSecureTempDir('secretdiff-merge-', async (dir) => {
      const localFile = await dir.write('LOCAL', local);
      await dir.write('BASE', base);
      const remoteFile = await dir.write('REMOTE', remote);
      const draft = local === remote ? local : composeMergeDraft(local, remote);
      const mergedFile = await dir.write('MERGED', draft);

      if (config.diffTool) {
        output.debug(`running ${config.diffTool} on LOCAL REMOTE MERGED`);
        deps.runTool(config.diffTool, [localFile, remoteFile, mergedFile]);
      } else {
        output.info(mergeNotices.noTool);
      }
      return dir.read('MERGED');
    });

    assertResolved(merged, target);
    await writeOwnerOnly(destination, encrypt(store, merged, format, target));
    output.success(mergeNotices.merged);
    return EXIT_CODES.SUCCESS;
  } catch (err) {
    return reportFailure(err, output);
  }
}

export function registerGitMergeCommand(program: Command): void {
  program
    .command('git-merge')
    .description('Merge three versions of an encrypted file (git merge driver)')
    .argument('<local>', 'our version (%A); receives the merged result')
    .argument('<base>', 'common ancestor (%O)')
    .argument('<remote>', 'their version (%B)')
    .argument('[path]', 'path of the file in the repository (%P)')
    .option('-d, --diff-tool <tool>', 'Merge tool run on LOCAL, REMOTE and MERGED')
    .option('-o, --output <file>', 'Write the merged, encrypted result here instead of <local>')
    .action(
      async (local: string, base: string, remote: string, filePath: string | undefined, options: MergeCommandOptions) => {
        await runAction(
          () => loadMergeConfig(options),
          (config, deps) => runGitMergeCommand({ local, base, remote, path: filePath }, config, deps),
        );
      },
    );
}
