import path from 'path';
import os from 'os';

/**
 * Checks if the current environment is Windows.
 *
 * @returns `true` if the OS is Windows, `false` otherwise.
 */
export function isWindows(): boolean {
  return os.platform() === 'win32';
}

/**
 * Whether `candidate` resolves to `root` itself or a path below it.
 */
export function isWithin(root: string, candidate: string): boolean {
  const rel = path.relative(path.resolve(root), path.resolve(root, candidate));
  const escapes = rel === '..' || rel.startsWith(`..${path.sep}`);
  return rel === '' || (!escapes && !path.isAbsolute(rel));
}
