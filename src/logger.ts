/**
 * Console logging with a `[Scope]` prefix and a process-wide level.
 */

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

const LEVEL_RANK: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

let currentLevel: LogLevel = 'warn';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export interface Logger {
  error(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  debug(message: string, ...details: unknown[]): void;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_RANK[level] <= LEVEL_RANK[currentLevel];
}

export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    error(message, ...details) {
      if (enabled('error')) console.error(prefix, message, ...details);
    },
    warn(message, ...details) {
      if (enabled('warn')) console.warn(prefix, message, ...details);
    },
    info(message, ...details) {
      if (enabled('info')) console.log(prefix, message, ...details);
    },
    debug(message, ...details) {
      if (enabled('debug')) console.log(prefix, message, ...details);
    },
  };
}
