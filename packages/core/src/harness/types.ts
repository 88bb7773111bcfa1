import type { CommandRequest, CommandResult } from '@examplecheck/exec';

/** Outcome of one example's compilation check */
export interface ExampleCheck {
  example: string;
  exitCode: number;
  durationMs: number;
}

export interface HarnessReport {
  runId: string;
  target: string;
  /** The scratch workspace the checks ran in; removed by the time the report is returned */
  workspaceDir: string;
  checked: ExampleCheck[];
  durationMs: number;
}

/**
 * Anything that can run a check command to completion. `CommandRunner` is the
 * production implementation.
 */
export interface CheckRunner {
  run(request: CommandRequest): Promise<CommandResult>;
}
