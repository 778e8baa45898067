import { config, type LogLevel } from '../config/index';

const RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let currentLevel: LogLevel = config.logging.level;

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

const enabled = (level: LogLevel): boolean => RANK[level] >= RANK[currentLevel];

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

/**
 * Console logger tagged with a scope, e.g. `[fetcher] Fetching random photo...`
 */
export function createLogger(scope: string): Logger {
  const tag = `[${scope}]`;

  return {
    debug: (message, ...details) => {
      if (enabled('debug')) console.debug(tag, message, ...details);
    },
    info: (message, ...details) => {
      if (enabled('info')) console.log(tag, message, ...details);
    },
    warn: (message, ...details) => {
      if (enabled('warn')) console.warn(tag, message, ...details);
    },
    error: (message, ...details) => {
      if (enabled('error')) console.error(tag, message, ...details);
    },
  };
}
