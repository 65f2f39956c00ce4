/**
 * Owner-only temporary files for decrypted material handed to external tools.
 *
 * Every file written through a SecureTempDir is overwritten with zeros and
 * removed when the scope ends, when the process exits, and on SIGINT/SIGTERM.
 */

import * as fs from 'node:fs/promises';
import * as fsSync from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

const OWNER_ONLY = 0o600;

export interface SecureTempDir {
  readonly path: string;
  /** Write a file inside the directory and return its path */
  write(name: string, content: string): Promise<string>;
  read(name: string): Promise<string>;
}

/**
 * Write a file readable and writable by the owner only.
 */
export async function writeOwnerOnly(file: string, content: string): Promise<void> {
  await fs.writeFile(file, content, { mode: OWNER_ONLY });
  // mode only applies when the file is created
  await fs.chmod(file, OWNER_ONLY);
}

/**
 * Overwrite a file with zeros, then remove it. Missing files are ignored.
 */
export async function shredFile(file: string): Promise<void> {
  let size: number;
  try {
    size = (await fs.stat(file)).size;
  } catch {
    return;
  }
  await fs.writeFile(file, Buffer.alloc(size));
  await fs.rm(file, { force: true });
}

function shredFileSync(file: string): void {
  try {
    const { size } = fsSync.statSync(file);
    fsSync.writeFileSync(file, Buffer.alloc(size));
    fsSync.rmSync(file, { force: true });
  } catch {
    return;
  }
}

/**
 * Run `fn` with a fresh owner-only directory under the OS temp dir.
 */
export async function withSecureTempDir<T>(
  prefix: string,
  fn: (dir: SecureTempDir) => Promise<T>,
): Promise<T> {
  const dirPath = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
  await fs.chmod(dirPath, 0o700);
  const files = new Set<string>();

  const cleanupSync = () => {
    for (const file of files) shredFileSync(file);
    fsSync.rmSync(dirPath, { recursive: true, force: true });
  };
  const onSignal = (signal: NodeJS.Signals) => {
    cleanupSync();
    process.exit(signal === 'SIGINT' ? 130 : 143);
  };

  process.on('exit', cleanupSync);
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  const dir: SecureTempDir = {
    path: dirPath,
    async write(name, content) {
      const file = path.join(dirPath, path.basename(name));
      files.add(file);
      await writeOwnerOnly(file, content);
      return file;
    },
    async read(name) {
      return fs.readFile(path.join(dirPath, path.basename(name)), 'utf-8');
    },
  };

  try {
    return await fn(dir);
  } finally {
    process.off('exit', cleanupSync);
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
    for (const file of files) {
      await shredFile(file);
    }
    await fs.rm(dirPath, { recursive: true, force: true });
  }
}
