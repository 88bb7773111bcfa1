import { randomUUID } from 'crypto';
import path from 'path';
import {
  errorMessage,
  eventBase,
  type HarnessConfig,
  type HarnessEvent,
  type Logger,
} from '@examplecheck/shared';
import { CommandRunner, resolveTool } from '@examplecheck/exec';
import {
  CARGO_MANIFEST,
  DirectoryExampleSet,
  WORKSPACE_EXAMPLES_DIR,
  WorkspaceProvisioner,
  createScratchWorkspace,
  injectDependencies,
  inspectLibrary,
  linkExamples,
  type LibrarySource,
  type ScratchWorkspace,
} from '@examplecheck/workspace';
import type { CheckRunner, ExampleCheck, HarnessReport } from './types';
import { VerificationLoop } from './verification-loop';

export interface HarnessOptions {
  /** Root of the library-under-test; nothing below it is modified */
  libraryRoot: string;
  config: HarnessConfig;
  logger: Logger;
  runner?: CheckRunner;
  resolveTool?: (command: string) => Promise<string>;
  createWorkspace?: () => Promise<ScratchWorkspace>;
  runId?: string;
}

/**
 * Runs one verification: builds a scratch workspace around the library's
 * examples, checks each example and always removes the workspace afterwards.
 */
export class VerificationHarness {
  private readonly runId: string;
  private readonly config: HarnessConfig;
  private readonly logger: Logger;
  private readonly runner: CheckRunner;

  constructor(private readonly options: HarnessOptions) {
    this.runId = options.runId ?? randomUUID();
    this.config = options.config;
    this.logger = options.logger;
    this.runner = options.runner ?? new CommandRunner();
  }

  async run(): Promise<HarnessReport> {
    const startedAt = Date.now();
    const { target } = this.config;

    // Preflight: nothing is created until the library and the tool look usable.
    const library = await inspectLibrary(this.options.libraryRoot, {
      examplesDir: this.config.examples.dir,
      name: this.config.library.name,
    });
    const toolPath = await (this.options.resolveTool ?? resolveTool)(this.config.check.command);
    await this.logger.debug(`Using ${this.config.check.command} at ${toolPath}`);

    await this.emit(
      { type: 'RunStarted', payload: { target, libraryRoot: library.root } },
      `Verifying examples of ${library.crateName} for ${target}`,
    );

    const workspace = await (this.options.createWorkspace ?? createScratchWorkspace)();
    const checked: ExampleCheck[] = [];
    let failure: { error: unknown } | undefined;
    try {
      await this.emit(
        { type: 'WorkspaceCreated', payload: { workspaceDir: workspace.path } },
        `Created workspace ${workspace.path}`,
      );
      await this.verify(library, workspace.path, checked);
    } catch (error) {
      failure = { error };
    }

    try {
      await this.emit({
        type: 'RunFinished',
        payload: {
          status: failure ? 'failure' : 'success',
          checked: checked.map((c) => c.example),
          durationMs: Date.now() - startedAt,
          error: failure ? errorMessage(failure.error) : undefined,
        },
      });
    } catch (error) {
      if (failure) {
        await this.logSecondary(error, 'Failed to record the end of the run');
      } else {
        failure = { error };
      }
    } finally {
      await this.teardown(workspace, failure);
    }

    if (failure) {
      throw failure.error;
    }

    return {
      runId: this.runId,
      target,
      workspaceDir: workspace.path,
      checked,
      durationMs: Date.now() - startedAt,
    };
  }

  private async verify(
    library: LibrarySource,
    workspaceDir: string,
    checked: ExampleCheck[],
  ): Promise<void> {
    const provisioned = await new WorkspaceProvisioner(this.config.template).provision(workspaceDir);
    await this.emit(
      { type: 'TemplateFetched', payload: { url: provisioned.url, version: provisioned.version } },
      `Fetched template ${provisioned.version} from ${provisioned.url}`,
    );
    await this.emit({ type: 'TemplatePruned', payload: { removed: provisioned.removed } });

    const injection = {
      library: { name: library.crateName, path: library.root },
      framework: { name: this.config.framework.name, version: this.config.framework.version },
    };
    await injectDependencies(path.join(workspaceDir, CARGO_MANIFEST), injection);
    await this.emit(
      { type: 'DependenciesInjected', payload: injection },
      `Added ${injection.library.name} (path) and ${injection.framework.name} ${injection.framework.version} to the workspace manifest`,
    );

    await linkExamples(workspaceDir, library.examplesDir, this.config.examples.link);
    await this.emit({
      type: 'ExamplesLinked',
      payload: { strategy: this.config.examples.link, source: library.examplesDir },
    });

    const examples = new DirectoryExampleSet(
      path.join(workspaceDir, WORKSPACE_EXAMPLES_DIR),
      this.config.examples.order,
    );
    const loop = new VerificationLoop(this.config.check, this.runner, this.logger);
    await loop.run({
      runId: this.runId,
      workspaceDir,
      target: this.config.target,
      examples,
      onCheck: (check) => checked.push(check),
    });
  }

  /**
   * Removes the workspace. When the run has already failed, errors from here
   * are logged so that the run's error is the one the caller sees.
   */
  private async teardown(workspace: ScratchWorkspace, failure?: { error: unknown }): Promise<void> {
    try {
      await workspace.dispose();
    } catch (cleanupError) {
      if (!failure) {
        throw cleanupError;
      }
      await this.logSecondary(cleanupError, 'Failed to remove the workspace after a failed run');
      return;
    }

    try {
      await this.emit({ type: 'WorkspaceRemoved', payload: { workspaceDir: workspace.path } });
    } catch (error) {
      if (!failure) {
        throw error;
      }
      await this.logSecondary(error, 'Failed to record the workspace removal');
    }
  }

  private async logSecondary(error: unknown, message: string): Promise<void> {
    const err = error instanceof Error ? error : new Error(String(error));
    try {
      await this.logger.error(err, message);
    } catch (loggerError) {
      console.error(message, err, loggerError);
    }
  }

  private async emit(event: HarnessEventInit, message?: string): Promise<void> {
    const full: HarnessEvent = { ...eventBase(this.runId), ...event };
    if (message) {
      await this.logger.trace(full, message);
    } else {
      await this.logger.log(full);
    }
  }
}

/** An event without the metadata `emit` fills in */
type HarnessEventInit = WithoutMetadata<HarnessEvent>;
type WithoutMetadata<E> = E extends HarnessEvent
  ? Omit<E, 'schemaVersion' | 'timestamp' | 'runId'>
  : never;
