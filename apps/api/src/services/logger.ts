/**
 * Scoped console logger
 * Writes "[Scope] message" lines, filtered by the configured level.
 * Components receive a Logger instead of printing directly.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
  /** Logger for a nested scope, e.g. [Pipeline:Citations] */
  child(scope: string): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const WRITERS: Record<LogLevel, (...args: unknown[]) => void> = {
  debug: (...args) => console.debug(...args),
  info: (...args) => console.info(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
};

export function createLogger(scope: string, level: LogLevel = 'info'): Logger {
  const threshold = LEVEL_ORDER[level];

  const write = (messageLevel: LogLevel, message: string, details: unknown[]) => {
    if (LEVEL_ORDER[messageLevel] < threshold) return;
    WRITERS[messageLevel](`[${scope}] ${message}`, ...details);
  };

  return {
    debug: (message, ...details) => write('debug', message, details),
    info: (message, ...details) => write('info', message, details),
    warn: (message, ...details) => write('warn', message, details),
    error: (message, ...details) => write('error', message, details),
    child: (childScope) => createLogger(`${scope}:${childScope}`, level),
  };
}

/** Logger that drops everything (tests, library callers without logging) */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger,
};
