/**
 * Minimal leveled logger. Everything goes to stderr so that stdout stays
 * available for command-line output.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

let currentLevel: LogLevel = 'warn';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

function prefix(level: LogLevel, scope: string): string {
  return `[hepplot:${scope}] ${level.toUpperCase()}`;
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

export function createLogger(scope: string): Logger {
  return {
    debug(message) {
      if (enabled('debug')) console.warn(`${prefix('debug', scope)} ${message}`);
    },
    info(message) {
      if (enabled('info')) console.warn(`${prefix('info', scope)} ${message}`);
    },
    warn(message) {
      if (enabled('warn')) console.warn(`${prefix('warn', scope)} ${message}`);
    },
    error(message, error) {
      if (!enabled('error')) return;
      if (error instanceof Error) {
        console.error(`${prefix('error', scope)} ${message}: ${error.message}`);
      } else {
        console.error(`${prefix('error', scope)} ${message}`);
      }
    }
  };
}
