import path from 'path';
import { Command, InvalidArgumentError, Option } from 'commander';
import { ConfigLoader, VerificationHarness, type HarnessReport } from '@examplecheck/core';
import { CommandRunner } from '@examplecheck/exec';
import {
  ConsoleLogger,
  JsonlLogger,
  type ExampleOrder,
  type HarnessConfigInput,
  type LinkStrategy,
  type Logger,
} from '@examplecheck/shared';
import { OutputRenderer } from '../output/renderer';

export type VerifyOptions = {
  target?: string;
  root?: string;
  config?: string;
  templateUrl?: string;
  templateVersion?: string;
  link?: LinkStrategy;
  order?: ExampleOrder;
  tool?: string;
  timeout?: number;
  events?: string;
  json?: boolean;
  verbose?: boolean;
};

export function parseTimeout(value: string): number {
  const ms = Number(value);
  if (!Number.isInteger(ms) || ms <= 0) {
    // commander reports this as an invalid argument
    throw new InvalidArgumentError('Timeout must be a positive number of milliseconds.');
  }
  return ms;
}

/**
 * Config overrides from command line flags. Unset flags stay undefined so
 * they do not mask lower-precedence sources.
 */
export function buildFlags(options: VerifyOptions): Partial<HarnessConfigInput> {
  return {
    target: options.target,
    template: { urlTemplate: options.templateUrl, version: options.templateVersion },
    examples: { link: options.link, order: options.order },
    check: { command: options.tool, timeoutMs: options.timeout },
  };
}

// With --json, stdout carries only the report.
function createLogger(options: VerifyOptions): Logger {
  const loggerOptions = { verbose: !!options.verbose, stderr: !!options.json };
  return options.events
    ? new JsonlLogger(path.resolve(options.events), loggerOptions)
    : new ConsoleLogger(loggerOptions);
}

export async function runVerify(options: VerifyOptions): Promise<HarnessReport> {
  const renderer = new OutputRenderer(!!options.json);
  const libraryRoot = path.resolve(options.root ?? process.cwd());

  const config = ConfigLoader.load({
    cwd: libraryRoot,
    configPath: options.config,
    flags: buildFlags(options),
  });
  if (options.verbose) {
    renderer.log(`Library root: ${libraryRoot}`);
    renderer.log(`Template: ${config.template.urlTemplate} (${config.template.version})`);
  }

  const harness = new VerificationHarness({
    libraryRoot,
    config,
    logger: createLogger(options),
    runner: new CommandRunner({ stdoutToStderr: !!options.json }),
  });
  const report = await harness.run();
  renderer.render(report);
  return report;
}

/**
 * The tool has a single entry point, so the options and action live on the
 * root program.
 */
export function registerVerifyCommand(program: Command) {
  program
    .option('--target <triple>', 'Cross-compilation target (overrides $TARGET)')
    .option('--root <dir>', 'Root of the library to verify (default: current directory)')
    .option('--template-url <url>', 'Template archive URL or path; {version} is substituted')
    .option('--template-version <version>', 'Template version')
    .addOption(
      new Option('--link <strategy>', 'How examples enter the workspace').choices(['symlink', 'copy']),
    )
    .addOption(
      new Option('--order <order>', 'Order in which examples are checked').choices([
        'lexicographic',
        'directory',
      ]),
    )
    .option('--tool <command>', 'Check command to run for each example')
    .option('--timeout <ms>', 'Per-example check timeout in milliseconds', parseTimeout)
    .option('--events <file>', 'Append structured events to a JSONL file')
    .action(async () => {
      await runVerify(program.opts<VerifyOptions>());
    });
}
