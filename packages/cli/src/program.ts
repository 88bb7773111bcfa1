import { Command, CommanderError } from 'commander';
import { version } from '../package.json';
import { AppError, isUserCorrectable, type ErrorCode } from '@examplecheck/shared';
import { registerVerifyCommand } from './commands/verify';

export const name = '@examplecheck/cli';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('examplecheck')
    .description('Check that every example of a library still builds for a target')
    .version(version)
    .option('--json', 'Output results as JSON')
    .option('--config <path>', 'Path to configuration file')
    .option('--verbose', 'Enable verbose logging')
    .exitOverride();

  registerVerifyCommand(program);
  return program;
}

export function reportError(e: unknown, opts: { json?: boolean; verbose?: boolean }): void {
  if (opts.json) {
    if (e instanceof AppError) {
      console.log(
        JSON.stringify({
          error: {
            code: e.code,
            message: e.message,
            details: e.details,
          },
        }),
      );
    } else {
      const code: ErrorCode = 'UnknownError';
      console.log(
        JSON.stringify({
          error: {
            code,
            message: e instanceof Error ? e.message : String(e),
          },
        }),
      );
    }
    return;
  }

  // Human-readable output
  console.error(`❌ Error: ${(e instanceof Error && e.message) || String(e)}`);
  if (e instanceof AppError && e.details) {
    console.error(
      `  Details: ${typeof e.details === 'string' ? e.details : JSON.stringify(e.details, null, 2)}`,
    );
  }
  if (opts.verbose && e instanceof Error && e.stack) {
    console.error(`\nStack Trace:\n${e.stack}`);
  } else {
    console.error(`\nFor more details, run with the --verbose flag.`);
  }
}

/**
 * Parses `argv`, runs the verification and returns the process exit code.
 */
export async function main(argv: string[]): Promise<number> {
  const program = createProgram();
  try {
    await program.parseAsync(argv);
    return 0;
  } catch (e) {
    if (e instanceof CommanderError) {
      // commander has already printed the message, or the help/version text
      return e.exitCode === 0 ? 0 : 2;
    }
    reportError(e, program.opts());
    return isUserCorrectable(e) ? 2 : 1;
  }
}
