import type { HarnessEvent } from '../types/events';

/**
 * A value that may be synchronous or a Promise.
 */
export type MaybePromise<T> = T | Promise<T>;

/**
 * Interface for logging throughout the harness.
 * Supports both structured event logging and traditional log levels.
 *
 * @example
 * ```typescript
 * // Log a structured event
 * logger.log({ ...eventBase(runId), type: 'WorkspaceCreated', payload: { workspaceDir } });
 *
 * // Log with a human-readable summary
 * logger.trace(event, 'Checking example blink');
 * ```
 */
export interface Logger {
  /**
   * Persist a structured harness event.
   */
  log(event: HarnessEvent): MaybePromise<void>;

  /**
   * High-signal trace event with a human-readable message.
   */
  trace(event: HarnessEvent, message: string): MaybePromise<void>;

  /** Log a debug message (only shown in verbose mode) */
  debug(message: string): MaybePromise<void>;
  /**
   * Log an error with optional message.
   * @param message - Optional additional context
   */
  error(error: Error, message?: string): MaybePromise<void>;
}

export interface LoggerOptions {
  /** Emit debug messages */
  verbose?: boolean;
  /** Write messages to stderr, leaving stdout to the command's result */
  stderr?: boolean;
}
