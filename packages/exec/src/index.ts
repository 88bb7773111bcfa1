export { CommandRunner } from './runner/runner';
export type { CommandRequest, CommandResult, CommandRunnerOptions } from './runner/runner';
export { resolveTool } from './tool/resolve';
