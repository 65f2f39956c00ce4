/**
 * Tests for the conflicts command.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { runConflictsCommand } from '../src/cli/commands/conflicts.js';
import { EXIT_CODES } from '../src/cli/exit-codes.js';
import { loadConflictConfig } from '../src/config.js';
import {
  FakeVersionControl,
  captureOutput,
  cleanupTempDir,
  createTempDir,
  fakeDeps,
  sealed,
  writeFiles,
} from './helpers/cli.js';

const SENSITIVE = '⚠ The decrypted file contains sensitive information. Delete it when no longer needed.\n';

function conflicted(ours: string, theirs: string): string {
  return `<<<<<<< HEAD\n${ours}=======\n${theirs}>>>>>>> feature\n`;
}

describe('conflicts command', () => {
  let tempDir: string;
  let files: Record<string, string>;
  const vcs = new FakeVersionControl({ branch: 'main', merging: 'feature' });

  beforeEach(async () => {
    tempDir = await createTempDir();
    files = await writeFiles(tempDir, {
      'secrets.yaml': conflicted(sealed('password: ours-value\n'), sealed('password: theirs-value\n')),
      'clean.yaml': sealed('password: x\n'),
      'broken.yaml': '<<<<<<< HEAD\na\n<<<<<<< HEAD\n',
      'plain.yaml': conflicted('password: a\n', 'password: b\n'),
    });
  });

  afterEach(async () => {
    await cleanupTempDir(tempDir);
  });

  it('prints the decrypted conflict with branch labels', async () => {
    const { output, stdout, stderr } = captureOutput();
    const code = await runConflictsCommand(files['secrets.yaml'], loadConflictConfig({}, {}), fakeDeps(output, { vcs }));

    expect(code).toBe(EXIT_CODES.SUCCESS);
    expect(stdout()).toBe(
      '<<<<<<< HEAD (main branch)\npassword: ours-value\n=======\npassword: theirs-value\n' +
        '>>>>>>> OTHER (incoming changes from feature)\n',
    );
    expect(stderr()).toBe(SENSITIVE);
  });

  it('falls back to default labels outside a merge', async () => {
    const { output, stdout } = captureOutput();
    await runConflictsCommand(files['secrets.yaml'], loadConflictConfig({}, {}), fakeDeps(output));

    expect(stdout()).toBe(
      '<<<<<<< HEAD (your branch branch)\npassword: ours-value\n=======\npassword: theirs-value\n' +
        '>>>>>>> OTHER (incoming changes)\n',
    );
  });

  it('writes the conflict to an owner-only file with instructions', async () => {
    const { output, stdout } = captureOutput();
    const out = path.join(tempDir, 'resolved.yaml');
    const file = files['secrets.yaml'];

    const code = await runConflictsCommand(file, loadConflictConfig({ output: out }, {}), fakeDeps(output, { vcs }));

    expect(code).toBe(EXIT_CODES.SUCCESS);
    expect(await fs.readFile(out, 'utf-8')).toBe(
      '<<<<<<< HEAD (main branch)\npassword: ours-value\n=======\npassword: theirs-value\n' +
        '>>>>>>> OTHER (incoming changes from feature)\n',
    );
    expect((await fs.stat(out)).mode & 0o777).toBe(0o600);
    expect(stdout()).toBe(
      [
        `OK Created decrypted conflict file: ${out}`,
        '',
        'Instructions:',
        '1. Edit the decrypted file to resolve conflicts',
        '2. Once resolved, encrypt it using sops:',
        `   sops -e -i ${out}`,
        '3. Replace the original file with the encrypted version:',
        `   mv ${out} ${file}`,
        '',
      ].join('\n'),
    );
  });

  it('fails when the file has no conflicts', async () => {
    const { output, stdout, stderr } = captureOutput();
    const file = files['clean.yaml'];
    const code = await runConflictsCommand(file, loadConflictConfig({}, {}), fakeDeps(output));

    expect(code).toBe(EXIT_CODES.CONFLICT);
    expect(stdout()).toBe('');
    expect(stderr()).toBe(`✗ [extract] ${file}: File ${file} does not contain Git conflicts\n`);
  });

  it('fails on malformed markers', async () => {
    const { output, stderr } = captureOutput();
    const file = files['broken.yaml'];
    const code = await runConflictsCommand(file, loadConflictConfig({}, {}), fakeDeps(output));

    expect(code).toBe(EXIT_CODES.CONFLICT);
    expect(stderr()).toBe(`✗ [extract] ${file}: Conflict start marker inside an open conflict at line 3\n`);
  });

  it('refuses sides that are not encrypted', async () => {
    const { output, stdout } = captureOutput();
    const code = await runConflictsCommand(files['plain.yaml'], loadConflictConfig({}, {}), fakeDeps(output));

    expect(code).toBe(EXIT_CODES.DECRYPTION_FAILED);
    expect(stdout()).toBe('');
  });

  it('fails with an input error when the file is missing', async () => {
    const { output } = captureOutput();
    const code = await runConflictsCommand(path.join(tempDir, 'none.yaml'), loadConflictConfig({}, {}), fakeDeps(output));

    expect(code).toBe(EXIT_CODES.INPUT_ERROR);
  });
});
