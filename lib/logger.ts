/* eslint-disable no-console */

const LOG_LEVELS = {
  DEBUG: 1,
  INFO: 2,
  WARN: 3,
  ERROR: 4,
  SILENT: 5,
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

function resolveLevel(): number {
  const raw = process.env.LOG_LEVEL?.trim().toUpperCase() ?? "";
  return isLogLevel(raw) ? LOG_LEVELS[raw] : LOG_LEVELS.INFO;
}

export type Logger = {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
};

/**
 * Console logger tagged with a scope, e.g. `[scheduler]`.
 * LOG_LEVEL is read on every call so tests and long-running processes can change it.
 */
export function createLogger(scope: string): Logger {
  const tag = `[${scope}]`;
  return {
    debug: (...args) => {
      if (resolveLevel() <= LOG_LEVELS.DEBUG) console.debug(tag, ...args);
    },
    info: (...args) => {
      if (resolveLevel() <= LOG_LEVELS.INFO) console.log(tag, ...args);
    },
    warn: (...args) => {
      if (resolveLevel() <= LOG_LEVELS.WARN) console.warn(tag, ...args);
    },
    error: (...args) => {
      if (resolveLevel() <= LOG_LEVELS.ERROR) console.error(tag, ...args);
    },
  };
}
