import { constants, promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';

export async function pathExists(targetPath: string): Promise<boolean> {
  try {
    await fs.access(targetPath, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

export async function ensureDir(targetPath: string): Promise<void> {
  await fs.mkdir(targetPath, { recursive: true });
}

export async function readTextFile(targetPath: string): Promise<string> {
  return fs.readFile(targetPath, 'utf8');
}

export async function writeFile(targetPath: string, data: string | NodeJS.ArrayBufferView): Promise<void> {
  await ensureDir(path.dirname(targetPath));
  await fs.writeFile(targetPath, data);
}

export async function removeDir(targetPath: string): Promise<void> {
  await fs.rm(targetPath, { recursive: true, force: true });
}

export async function isDirectory(targetPath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(targetPath);
    return stats.isDirectory();
  } catch {
    return false;
  }
}

export async function isNonEmptyFile(targetPath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(targetPath);
    return stats.isFile() && stats.size > 0;
  } catch {
    return false;
  }
}

/** Creates the file when missing and bumps its modification time. */
export async function touch(targetPath: string): Promise<void> {
  await ensureDir(path.dirname(targetPath));
  const now = new Date();
  try {
    await fs.utimes(targetPath, now, now);
  } catch {
    await fs.writeFile(targetPath, '', { flag: 'a' });
  }
}

export async function createTempDir(prefix = 'labflow_'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}
