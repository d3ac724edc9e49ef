import { LOG_LEVEL_ENV } from '../../shared/constants';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

export function parseLevel(value: string | undefined): LogLevel | undefined {
  const lower = value?.toLowerCase();
  return lower && isLogLevel(lower) ? lower : undefined;
}

let threshold: LogLevel = parseLevel(process.env[LOG_LEVEL_ENV]) ?? 'warn';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

/**
 * Scoped diagnostics, written as `[Scope] message ...` to stderr so they never
 * interleave with the reply text on stdout.
 */
export function createLogger(scope: string): Logger {
  const emit = (level: Exclude<LogLevel, 'silent'>, args: unknown[]) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;
    console.error(`[${scope}]`, ...args);
  };

  return {
    debug: (...args) => emit('debug', args),
    info: (...args) => emit('info', args),
    warn: (...args) => emit('warn', args),
    error: (...args) => emit('error', args),
  };
}
