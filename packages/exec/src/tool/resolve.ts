import which from 'which';
import { PreconditionError } from '@examplecheck/shared';

/**
 * Resolves a command name to its absolute path on PATH.
 */
export async function resolveTool(command: string): Promise<string> {
  try {
    return await which(command);
  } catch (error) {
    throw new PreconditionError(`Required tool "${command}" was not found in PATH.`, {
      cause: error,
    });
  }
}
