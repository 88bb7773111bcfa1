import path from 'path';
import { ConfigError, isWithin, removePath } from '@examplecheck/shared';

/**
 * Removes template-owned paths from the workspace. Paths that are already
 * absent are skipped silently; paths outside the workspace are refused.
 *
 * @returns the relative paths that were requested for removal, in order
 */
export async function pruneTemplate(workspaceDir: string, paths: string[]): Promise<string[]> {
  for (const rel of paths) {
    const target = path.resolve(workspaceDir, rel);
    if (!isWithin(workspaceDir, rel) || target === path.resolve(workspaceDir)) {
      throw new ConfigError(`Refusing to prune "${rel}": it is not inside the workspace.`);
    }
  }

  for (const rel of paths) {
    await removePath(path.resolve(workspaceDir, rel));
  }
  return [...paths];
}
