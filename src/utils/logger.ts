import type { LogLevel } from '../types.js';

const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let currentLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

/** Console logger that prefixes every line with `[tag]` and honours LOG_LEVEL. */
export function createLogger(tag: string): Logger {
  const enabled = (level: LogLevel) => LEVELS[level] >= LEVELS[currentLevel];
  const prefix = `[${tag}]`;

  return {
    debug(message, ...details) {
      if (enabled('debug')) console.debug(`${prefix} ${message}`, ...details);
    },
    info(message, ...details) {
      if (enabled('info')) console.log(`${prefix} ${message}`, ...details);
    },
    warn(message, ...details) {
      if (enabled('warn')) console.warn(`${prefix} ${message}`, ...details);
    },
    error(message, ...details) {
      if (enabled('error')) console.error(`${prefix} ${message}`, ...details);
    },
  };
}
