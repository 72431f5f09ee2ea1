/**
 * Severity levels understood by every logger, lowest first.
 */
export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Interface for logging throughout findfile.
 *
 * @example
 * ```typescript
 * logger.debug('Compiled command: find ~/ -type f ...');
 * logger.warn('Dropping malformed output line');
 * logger.error(new Error('Failed'), 'Search failed');
 *
 * // Create a child logger with additional context
 * const childLogger = logger.child({ stage: 'parse' });
 * ```
 */
export interface Logger {
  /** Log a debug message (lowest priority, disabled unless asked for) */
  debug(message: string): void;
  /** Log an informational message */
  info(message: string): void;
  /** Log a warning message */
  warn(message: string): void;
  /**
   * Log an error with optional message.
   * @param message - Optional additional context
   */
  error(error: Error, message?: string): void;

  /**
   * Create a child logger with additional context bindings.
   * All logs from the child will include these bindings.
   * @param bindings - Key-value pairs to include in all child logs
   */
  child(bindings: Record<string, unknown>): Logger;
}
