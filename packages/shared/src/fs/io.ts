import { promises as fs, type Stats } from 'fs';
import { dirname } from 'path';
import { tmpName } from 'tmp-promise';
import fse from 'fs-extra';

export async function ensureDir(path: string): Promise<void> {
  await fse.ensureDir(dirname(path));
}

export async function atomicWrite(path: string, content: string | Buffer): Promise<void> {
  await ensureDir(path);
  const tempPath = await tmpName({ dir: dirname(path) });
  await fs.writeFile(tempPath, content);
  await fs.rename(tempPath, path);
}

/**
 * Removes a file or directory tree. Absent paths are not an error and
 * symbolic links are removed without touching their targets.
 */
export async function removePath(path: string): Promise<void> {
  await fse.remove(path);
}

function isMissing(error: unknown): boolean {
  return isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR');
}

/**
 * `lstat` that maps a missing path to `undefined`.
 */
export async function lstatIfExists(path: string): Promise<Stats | undefined> {
  try {
    return await fs.lstat(path);
  } catch (error) {
    if (isMissing(error)) return undefined;
    throw error;
  }
}

/**
 * `stat` (following links) that maps a missing path to `undefined`.
 */
export async function statIfExists(path: string): Promise<Stats | undefined> {
  try {
    return await fs.stat(path);
  } catch (error) {
    if (isMissing(error)) return undefined;
    throw error;
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
