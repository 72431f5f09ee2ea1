import { AppError, ProcessError, errorMessage } from '@findfile/shared';

/**
 * Lines printed to stderr for an error that ends the invocation.
 */
export function formatError(error: unknown): string[] {
  const lines = [`❌ Error: ${errorMessage(error)}`];
  if (error instanceof ProcessError && error.exitCode !== undefined) {
    lines.push(`  Exit code: ${error.exitCode}`);
  }
  if (error instanceof AppError && error.details) {
    lines.push(
      `  Details: ${typeof error.details === 'string' ? error.details : JSON.stringify(error.details, null, 2)}`,
    );
  }
  return lines;
}
