import path from 'path';
import { PreconditionError, lstatIfExists, statIfExists } from '@examplecheck/shared';
import { CargoManifest } from '../manifest/manifest';

export const CARGO_MANIFEST = 'Cargo.toml';

/**
 * The library-under-test as found on disk.
 */
export interface LibrarySource {
  /** Absolute root of the library; used as its local dependency path */
  root: string;
  crateName: string;
  examplesDir: string;
}

export interface InspectLibraryOptions {
  /** Examples directory, relative to the root */
  examplesDir: string;
  /** Overrides the crate name read from the manifest */
  name?: string;
}

/**
 * Checks that `root` is a Cargo package with an examples directory and
 * resolves the crate name. Nothing is written.
 */
export async function inspectLibrary(
  root: string,
  options: InspectLibraryOptions,
): Promise<LibrarySource> {
  const libraryRoot = path.resolve(root);
  const manifestPath = path.join(libraryRoot, CARGO_MANIFEST);
  if (!(await lstatIfExists(manifestPath))) {
    throw new PreconditionError(
      `${libraryRoot} is not a Cargo package: ${CARGO_MANIFEST} not found.`,
    );
  }

  const examplesDir = path.resolve(libraryRoot, options.examplesDir);
  const examplesStats = await statIfExists(examplesDir);
  if (!examplesStats?.isDirectory()) {
    throw new PreconditionError(`Examples directory not found: ${examplesDir}`);
  }

  const crateName = options.name ?? (await CargoManifest.load(manifestPath)).packageName;
  if (!crateName) {
    throw new PreconditionError(
      `Could not determine the crate name from ${manifestPath}. Set library.name in the config.`,
    );
  }

  return { root: libraryRoot, crateName, examplesDir };
}
