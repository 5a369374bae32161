/**
 * Console logger for the registry modules.
 *
 * One level is shared by every category in the process. `EcsRegistry` sets it
 * from `logLevel` or ECS_LOG_LEVEL when either is given.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Levels in ascending severity. */
export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

let globalLevel: LogLevel = 'info';

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function setLogLevel(level: LogLevel): void {
  globalLevel = level;
}

export function getLogLevel(): LogLevel {
  return globalLevel;
}

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

/** Logger whose output is prefixed with `[category]`. */
export function createLogger(category: string): Logger {
  const prefix = `[${category}]`;

  const write = (level: LogLevel, args: unknown[]): void => {
    if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(globalLevel)) return;
    console[level](prefix, ...args);
  };

  return {
    debug: (...args) => write('debug', args),
    info: (...args) => write('info', args),
    warn: (...args) => write('warn', args),
    error: (...args) => write('error', args),
  };
}
