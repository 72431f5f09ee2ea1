/**
 * Error codes used throughout findfile.
 * User-correctable errors use exit code 2.
 * Runtime errors use exit code 1.
 */
export type ErrorCode =
  // User-correctable errors (exit code 2)
  | 'ConfigError'
  // Runtime errors (exit code 1)
  | 'ProcessError'
  | 'LaunchError';

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
 * Base error class for all findfile errors.
 * Provides consistent error handling with codes, causes, and details.
 *
 * @example
 * ```typescript
 * throw new AppError('ProcessError', 'Search command failed', {
 *   cause: originalError,
 *   details: { command: 'find ~/ -type f' },
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
 * Error thrown when configuration is invalid or unreadable.
 * User-correctable - suggests fixing the config file or environment.
 */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super('ConfigError', message, options);
  }
}

/**
 * Error thrown when the search subprocess fails.
 * Includes the process exit code when available.
 */
export class ProcessError extends AppError {
  /** Exit code of the failed process */
  public readonly exitCode?: number;

  constructor(message: string, options: AppErrorOptions & { exitCode?: number } = {}) {
    super('ProcessError', message, options);
    this.exitCode = options.exitCode;
  }
}

/**
 * Error thrown when a result cannot be handed to the launcher.
 * Reported per result, never fatal.
 */
export class LaunchError extends AppError {
  /** Path that was being opened */
  public readonly target: string;

  constructor(target: string, message: string, options: AppErrorOptions = {}) {
    super('LaunchError', message, options);
    this.target = target;
  }
}

/**
 * Exit code for an error escaping the CLI.
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof ConfigError) {
    return 2;
  }
  return 1;
}

/**
 * Best-effort human message for an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return (error instanceof Error && error.message) || String(error);
}
