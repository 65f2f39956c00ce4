/**
 * Launching interactive diff and merge tools.
 */

import { spawnSync } from 'node:child_process';
import { SecretDiffError } from '../errors.js';
import { toolErrors } from '../strings/index.js';

/**
 * Runs a tool on the given files; throws when it fails.
 */
export type ToolRunner = (tool: string, files: string[]) => void;

/**
 * Split a tool setting such as `code --wait` into command and arguments.
 */
export function splitToolCommand(tool: string): [string, string[]] {
  const [command = '', ...args] = tool.trim().split(/\s+/);
  return [command, args];
}

/**
 * Run the tool with inherited stdio and wait for it to exit.
 *
 * @throws SecretDiffError EXTERNAL_TOOL_FAILED
 */
export const runExternalTool: ToolRunner = (tool, files) => {
  const [command, args] = splitToolCommand(tool);
  const result = spawnSync(command, [...args, ...files], { stdio: 'inherit' });

  if (result.error) {
    throw new SecretDiffError(toolErrors.couldNotStart(command), 'EXTERNAL_TOOL_FAILED', {
      stage: 'tool',
      cause: result.error,
    });
  }
  if (result.status !== 0) {
    throw new SecretDiffError(toolErrors.failed(command, result.status), 'EXTERNAL_TOOL_FAILED', {
      stage: 'tool',
    });
  }
};
