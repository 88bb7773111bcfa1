import { dir } from 'tmp-promise';
import { ProvisionError, errorMessage, removePath } from '@examplecheck/shared';

export const DEFAULT_SCRATCH_PREFIX = 'examplecheck-';

/**
 * A temporary directory owned by a single verification run.
 */
export interface ScratchWorkspace {
  readonly path: string;
  /** Removes the directory tree. Safe to call more than once. */
  dispose(): Promise<void>;
}

export async function createScratchWorkspace(
  prefix: string = DEFAULT_SCRATCH_PREFIX,
): Promise<ScratchWorkspace> {
  let workspacePath: string;
  try {
    ({ path: workspacePath } = await dir({ prefix }));
  } catch (error) {
    throw new ProvisionError(`Failed to create scratch workspace: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  return {
    path: workspacePath,
    async dispose() {
      try {
        await removePath(workspacePath);
      } catch (error) {
        throw new ProvisionError(
          `Failed to remove scratch workspace ${workspacePath}: ${errorMessage(error)}`,
          { cause: error },
        );
      }
    },
  };
}
