import { LOG_LEVELS, type LogLevel, type Logger } from './types';

function rank(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level);
}

// stdout carries results; every diagnostic goes to stderr.
export class ConsoleLogger implements Logger {
  constructor(private readonly level: LogLevel = 'warn') {}

  debug(message: string): void {
    if (this.enabled('debug')) console.error(message);
  }

  info(message: string): void {
    if (this.enabled('info')) console.error(message);
  }

  warn(message: string): void {
    if (this.enabled('warn')) console.warn(message);
  }

  error(error: Error, message?: string): void {
    if (!this.enabled('error')) return;
    if (message) {
      console.error(message, error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this, bindings);
  }

  private enabled(level: LogLevel): boolean {
    return rank(level) >= rank(this.level);
  }
}

class ScopedLogger implements Logger {
  constructor(
    private readonly base: Logger,
    private readonly bindings: Record<string, unknown>,
  ) {}

  debug(message: string) {
    return this.base.debug(this.withPrefix(message));
  }

  info(message: string) {
    return this.base.info(this.withPrefix(message));
  }

  warn(message: string) {
    return this.base.warn(this.withPrefix(message));
  }

  error(error: Error, message?: string) {
    return this.base.error(error, message ? this.withPrefix(message) : undefined);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this.base, { ...this.bindings, ...bindings });
  }

  private withPrefix(message: string): string {
    const prefix = Object.entries(this.bindings)
      .map(([k, v]) => `${k}=${String(v)}`)
      .join(' ');
    return prefix ? `[${prefix}] ${message}` : message;
  }
}

/** A logger that drops everything; handy as a default collaborator. */
export const silentLogger: Logger = new ConsoleLogger('silent');
