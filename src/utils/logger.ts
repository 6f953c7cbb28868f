/**
 * Console logger for the digest tools.
 *
 * Lines look like `[2026-03-14T09:00:00.000Z] [WARN] [openai] message`. The
 * scope names the feed source or tool that produced the line; `child()` adds
 * one. LOG_LEVEL decides what is printed and defaults to `info`.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

function isLogLevel(value: string | undefined): value is LogLevel {
  return LEVELS.some(level => level === value);
}

export class Logger {
  constructor(
    private readonly level: LogLevel,
    private readonly scope?: string
  ) {}

  child(scope: string): Logger {
    return new Logger(this.level, this.scope ? `${this.scope}:${scope}` : scope);
  }

  private enabled(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.level);
  }

  private prefix(level: LogLevel): string {
    const scope = this.scope ? ` [${this.scope}]` : '';
    return `[${new Date().toISOString()}] [${level.toUpperCase()}]${scope}`;
  }

  debug(message: string, data?: unknown) {
    if (this.enabled('debug')) console.debug(this.prefix('debug'), message, data ?? '');
  }

  info(message: string, data?: unknown) {
    if (this.enabled('info')) console.info(this.prefix('info'), message, data ?? '');
  }

  warn(message: string, data?: unknown) {
    if (this.enabled('warn')) console.warn(this.prefix('warn'), message, data ?? '');
  }

  // The error comes second, so a caught value can be passed along as-is
  error(message: string, error?: unknown, data?: unknown) {
    if (this.enabled('error')) console.error(this.prefix('error'), message, data ?? '', error ?? '');
  }
}

const fromEnv = process.env.LOG_LEVEL;

export const logger = new Logger(isLogLevel(fromEnv) ? fromEnv : 'info');

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
