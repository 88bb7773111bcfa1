/**
 * Error codes used throughout the harness.
 * User-correctable errors use exit code 2.
 * Runtime errors use exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  | 'UsageError'
  // Runtime errors (exit code 1)
  | 'PreconditionError'
  | 'HttpError'
  | 'ProvisionError'
  | 'ManifestError'
  | 'VerificationError'
  | 'TimeoutError'
  | 'ToolError'
  | 'UnknownError';

/**
 * Options for constructing an AppError.
 */
export interface AppErrorOptions {
  /** The underlying cause of this error */
  cause?: unknown;
  /** Additional error details (structured or string) */
  details?: Record<string, unknown> | string;
}

/**
 * Base error class for all harness errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('HttpError', 'Template download failed', {
 *   cause: originalError,
 *   details: { status: 404, url },
 * });
 * ```
 */
export class AppError extends Error {
  /** Error classification code */
  public readonly code: ErrorCode;
  /** Additional error details */
  public readonly details?: Record<string, unknown> | string;
  /** The underlying cause of this error */
  public readonly cause?: unknown;

  constructor(code: ErrorCode, message: string, options: AppErrorOptions = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = options.details;
    this.cause = options.cause;
  }
}

/**
 * Error thrown when configuration is invalid or missing.
 * User-correctable - suggests fixing configuration files or environment.
 */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ConfigError', message, options);
  }
}

/**
 * Error thrown when CLI usage is incorrect.
 */
export class UsageError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('UsageError', message, options);
  }
}

/**
 * Error thrown when the filesystem or toolchain is not in the state a step requires.
 */
export class PreconditionError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('PreconditionError', message, options);
  }
}

/**
 * Error thrown for HTTP-related failures.
 */
export class HttpError extends AppError {
  /** HTTP status code, when a response was received */
  public readonly status?: number;

  constructor(message: string, options: AppErrorOptions & { status?: number } = {}) {
    super('HttpError', message, options);
    this.status = options.status;
  }
}

/**
 * Error thrown when the scratch workspace cannot be created, populated or removed.
 */
export class ProvisionError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ProvisionError', message, options);
  }
}

/**
 * Error thrown when the dependency manifest cannot be read or extended.
 */
export class ManifestError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ManifestError', message, options);
  }
}

/**
 * Error thrown when an example fails its compilation check.
 */
export class VerificationError extends AppError {
  /** Logical name of the failing example */
  public readonly example: string;
  /** Exit code of the check command */
  public readonly exitCode: number;

  constructor(example: string, exitCode: number, message: string, options: AppErrorOptions = {}) {
    super('VerificationError', message, options);
    this.example = example;
    this.exitCode = exitCode;
  }
}

/**
 * Error thrown when an operation times out.
 */
export class TimeoutError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('TimeoutError', message, options);
  }
}

/**
 * Error thrown when a tool cannot be started or is killed.
 */
export class ToolError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ToolError', message, options);
  }
}

/**
 * Whether the error is one the user can fix through configuration or CLI input.
 */
export function isUserCorrectable(error: unknown): boolean {
  return error instanceof ConfigError || error instanceof UsageError;
}

/**
 * Message of an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
