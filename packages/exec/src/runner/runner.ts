import { execa } from 'execa';
import { TimeoutError, ToolError } from '@examplecheck/shared';

export interface CommandRequest {
  command: string;
  args: string[];
  cwd: string;
  /** Kill the command after this many milliseconds. No limit when omitted. */
  timeoutMs?: number;
}

export interface CommandRunnerOptions {
  /** Write the command's stdout to stderr, leaving stdout to the caller's own output */
  stdoutToStderr?: boolean;
}

export interface CommandResult {
  exitCode: number;
  durationMs: number;
}

/**
 * Runs a command to completion with its output passed straight through to the
 * console. A non-zero exit is a result, not an error; only a command that
 * cannot start, times out or dies from a signal throws.
 */
export class CommandRunner {
  constructor(private readonly options: CommandRunnerOptions = {}) {}

  async run(req: CommandRequest): Promise<CommandResult> {
    const start = Date.now();
    const result = await execa(req.command, req.args, {
      cwd: req.cwd,
      stdio: this.options.stdoutToStderr ? ['inherit', process.stderr, 'inherit'] : 'inherit',
      timeout: req.timeoutMs,
      reject: false,
    });
    const durationMs = Date.now() - start;

    if (result.timedOut) {
      throw new TimeoutError(`Command timed out after ${req.timeoutMs}ms: ${result.command}`, {
        details: { command: result.command, cwd: req.cwd },
      });
    }

    if (result.signal) {
      throw new ToolError(`Command was killed by ${result.signal}: ${result.command}`, {
        details: { command: result.command, signal: result.signal },
      });
    }

    // execa reports spawn failures (e.g. ENOENT) without an exit code.
    if (result.failed && !Number.isInteger(result.exitCode)) {
      throw new ToolError(`Failed to start process: ${req.command}`, {
        details: { command: result.command, cwd: req.cwd },
      });
    }

    return { exitCode: result.exitCode, durationMs };
  }
}
