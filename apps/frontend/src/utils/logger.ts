export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const PREFIX = '[capsule]';

function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && value in LEVEL_ORDER;
}

function initialLevel(): LogLevel {
  const fromEnv: unknown = import.meta.env.VITE_LOG_LEVEL;
  if (isLogLevel(fromEnv)) return fromEnv;
  return import.meta.env.DEV ? 'debug' : 'warn';
}

let currentLevel: LogLevel = initialLevel();

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

/**
 * Leveled console logger shared by the store, hooks and components.
 * Usage mirrors console: `logger.error('Primary action failed:', err)`.
 */
export const logger = {
  debug: (message: string, ...args: unknown[]) => {
    if (enabled('debug')) console.debug(PREFIX, message, ...args);
  },
  info: (message: string, ...args: unknown[]) => {
    if (enabled('info')) console.info(PREFIX, message, ...args);
  },
  warn: (message: string, ...args: unknown[]) => {
    if (enabled('warn')) console.warn(PREFIX, message, ...args);
  },
  error: (message: string, ...args: unknown[]) => {
    if (enabled('error')) console.error(PREFIX, message, ...args);
  },
};

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}
