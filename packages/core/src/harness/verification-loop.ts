import {
  eventBase,
  PreconditionError,
  VerificationError,
  type CheckConfig,
  type Logger,
} from '@examplecheck/shared';
import type { ExampleSet } from '@examplecheck/workspace';
import type { CheckRunner, ExampleCheck } from './types';

export interface VerificationLoopInput {
  runId: string;
  workspaceDir: string;
  target: string;
  examples: ExampleSet;
  /** Called after each check, including the failing one */
  onCheck?: (check: ExampleCheck) => void;
}

/**
 * Arguments for checking a single example: the configured ones followed by the
 * example and target selectors.
 */
export function checkArgs(base: readonly string[], example: string, target: string): string[] {
  return [...base, '--example', example, '--target', target];
}

/**
 * Checks each example in order and stops at the first one that fails.
 */
export class VerificationLoop {
  constructor(
    private readonly check: CheckConfig,
    private readonly runner: CheckRunner,
    private readonly logger: Logger,
  ) {}

  async run(input: VerificationLoopInput): Promise<ExampleCheck[]> {
    const { runId, workspaceDir, target } = input;
    const units = await input.examples.list();

    if (units.length === 0) {
      throw new PreconditionError(
        'No examples found to verify. Add at least one example to the examples directory.',
      );
    }

    const checked: ExampleCheck[] = [];

    for (const [i, unit] of units.entries()) {
      const args = checkArgs(this.check.args, unit.name, target);

      await this.logger.trace(
        {
          ...eventBase(runId),
          type: 'ExampleCheckStarted',
          payload: { example: unit.name, index: i + 1, total: units.length },
        },
        `[${i + 1}/${units.length}] ${this.check.command} ${args.join(' ')}`,
      );

      // Output of the check goes straight to the console; only the exit code matters here.
      const result = await this.runner.run({
        command: this.check.command,
        args,
        cwd: workspaceDir,
        timeoutMs: this.check.timeoutMs,
      });

      const outcome = { example: unit.name, exitCode: result.exitCode, durationMs: result.durationMs };
      checked.push(outcome);
      input.onCheck?.(outcome);
      await this.logger.log({
        ...eventBase(runId),
        type: 'ExampleCheckFinished',
        payload: outcome,
      });

      if (result.exitCode !== 0) {
        throw new VerificationError(
          unit.name,
          result.exitCode,
          `Example "${unit.name}" failed to check for target ${target} (exit code ${result.exitCode}).`,
          { details: { example: unit.name, exitCode: result.exitCode } },
        );
      }
    }

    return checked;
  }
}
