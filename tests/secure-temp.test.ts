/**
 * Tests for owner-only temporary files.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { shredFile, withSecureTempDir, writeOwnerOnly } from '../src/utils/secure-temp.js';
import { cleanupTempDir, createTempDir } from './helpers/cli.js';

describe('writeOwnerOnly', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await createTempDir();
  });

  afterEach(async () => {
    await cleanupTempDir(tempDir);
  });

  it('creates the file with mode 0600', async () => {
    const file = path.join(tempDir, 'secret.yaml');
    await writeOwnerOnly(file, 'token: test-secret\n');
    expect(fs.readFileSync(file, 'utf-8')).toBe('token: test-secret\n');
    expect(fs.statSync(file).mode & 0o777).toBe(0o600);
  });

  it('tightens the mode of an existing file', async () => {
    const file = path.join(tempDir, 'existing.yaml');
    fs.writeFileSync(file, 'old', { mode: 0o644 });
    await writeOwnerOnly(file, 'new');
    expect(fs.statSync(file).mode & 0o777).toBe(0o600);
  });

  it('shreds files and ignores missing ones', async () => {
    const file = path.join(tempDir, 'gone.yaml');
    fs.writeFileSync(file, 'secret');
    await shredFile(file);
    expect(fs.existsSync(file)).toBe(false);
    await expect(shredFile(file)).resolves.toBeUndefined();
  });
});

describe('withSecureTempDir', () => {
  it('stages owner-only files and removes them afterwards', async () => {
    let dirPath = '';
    const result = await withSecureTempDir('secretdiff-test-', async (dir) => {
      dirPath = dir.path;
      const file = await dir.write('a.yaml', 'a: 1\n');
      expect(path.dirname(file)).toBe(dir.path);
      expect(fs.statSync(dir.path).mode & 0o777).toBe(0o700);
      expect(fs.statSync(file).mode & 0o777).toBe(0o600);
      expect(await dir.read('a.yaml')).toBe('a: 1\n');
      return 'done';
    });

    expect(result).toBe('done');
    expect(fs.existsSync(dirPath)).toBe(false);
  });

  it('keeps written files inside the directory', async () => {
    await withSecureTempDir('secretdiff-test-', async (dir) => {
      const file = await dir.write('../escape.yaml', 'x');
      expect(file).toBe(path.join(dir.path, 'escape.yaml'));
    });
  });

  it('cleans up when the callback throws', async () => {
    let dirPath = '';
    await expect(
      withSecureTempDir('secretdiff-test-', async (dir) => {
        dirPath = dir.path;
        await dir.write('b.yaml', 'b: 2\n');
        throw new Error('tool crashed');
      }),
    ).rejects.toThrow('tool crashed');
    expect(fs.existsSync(dirPath)).toBe(false);
  });

  it('removes its exit and signal handlers', async () => {
    const before = {
      exit: process.listenerCount('exit'),
      sigint: process.listenerCount('SIGINT'),
      sigterm: process.listenerCount('SIGTERM'),
    };
    await withSecureTempDir('secretdiff-test-', async () => {
      expect(process.listenerCount('SIGINT')).toBe(before.sigint + 1);
    });
    expect({
      exit: process.listenerCount('exit'),
      sigint: process.listenerCount('SIGINT'),
      sigterm: process.listenerCount('SIGTERM'),
    }).toEqual(before);
  });
});
