import { CargoManifest } from './manifest';

export interface DependencyInjection {
  /** The library-under-test, resolved from its source directory */
  library: { name: string; path: string };
  /** The auxiliary framework, pinned to a fixed version */
  framework: { name: string; version: string };
}

/**
 * Adds the library-under-test and the framework to the workspace manifest,
 * keeping everything already declared there.
 */
export async function injectDependencies(
  manifestPath: string,
  injection: DependencyInjection,
): Promise<CargoManifest> {
  const manifest = await CargoManifest.load(manifestPath);
  manifest.addDependency(injection.library.name, { path: injection.library.path });
  manifest.addDependency(injection.framework.name, { version: injection.framework.version });
  await manifest.save();
  return manifest;
}
