import * as fs from 'fs/promises';
import path from 'path';
import fse from 'fs-extra';
import {
  PreconditionError,
  ProvisionError,
  errorMessage,
  isWindows,
  lstatIfExists,
  statIfExists,
  type LinkStrategy,
} from '@examplecheck/shared';

/** Conventional location of examples inside a Cargo package */
export const WORKSPACE_EXAMPLES_DIR = 'examples';

/**
 * Makes `sourceDir` visible at `<workspaceDir>/examples`, by symbolic link
 * (directory junction on Windows) or by copy. Nothing may exist at the
 * destination yet.
 *
 * @returns the examples path inside the workspace
 */
export async function linkExamples(
  workspaceDir: string,
  sourceDir: string,
  strategy: LinkStrategy = 'symlink',
): Promise<string> {
  const destination = path.join(workspaceDir, WORKSPACE_EXAMPLES_DIR);
  if (await lstatIfExists(destination)) {
    throw new PreconditionError(
      `Cannot link examples: ${destination} already exists in the workspace.`,
    );
  }

  const source = path.resolve(sourceDir);
  const sourceStats = await statIfExists(source);
  if (!sourceStats?.isDirectory()) {
    throw new PreconditionError(`Examples directory not found: ${source}`);
  }

  try {
    if (strategy === 'symlink') {
      await fs.symlink(source, destination, isWindows() ? 'junction' : 'dir');
    } else {
      await fse.copy(source, destination);
    }
  } catch (error) {
    throw new ProvisionError(`Failed to ${strategy} examples into workspace: ${errorMessage(error)}`, {
      cause: error,
    });
  }
  return destination;
}
