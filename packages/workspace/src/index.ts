export { createScratchWorkspace, DEFAULT_SCRATCH_PREFIX } from './scratch/scratch';
export type { ScratchWorkspace } from './scratch/scratch';
export { fetchTemplate, openArchive, extractArchive, resolveArchiveUrl } from './template/archive';
export type { TemplateArchiveRef } from './template/archive';
export { pruneTemplate } from './template/prune';
export { WorkspaceProvisioner } from './template/provisioner';
export type { ProvisionResult } from './template/provisioner';
export { CargoManifest } from './manifest/manifest';
export type { DependencySource, AddDependencyResult } from './manifest/manifest';
export { injectDependencies } from './manifest/injector';
export type { DependencyInjection } from './manifest/injector';
export { linkExamples, WORKSPACE_EXAMPLES_DIR } from './examples/linker';
export { DirectoryExampleSet, exampleName } from './examples/example-set';
export type { ExampleSet, ExampleUnit } from './examples/example-set';
export { inspectLibrary, CARGO_MANIFEST } from './library/source';
export type { LibrarySource, InspectLibraryOptions } from './library/source';
