// Console logging with a bracketed scope prefix, e.g. "[IngestTracker] ...".
// Messages below the current level are dropped.

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

const RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

function initialLevel(): LogLevel {
  const fromEnv = process.env.RECIPLAN_LOG_LEVEL;
  if (fromEnv && isLogLevel(fromEnv)) return fromEnv;
  return process.env.NODE_ENV === 'test' ? 'warn' : 'info';
}

let currentLevel: LogLevel = initialLevel();

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function enabled(level: LogLevel): boolean {
  return RANK[level] >= RANK[currentLevel];
}

export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    debug: (...args) => {
      if (enabled('debug')) console.log(prefix, ...args);
    },
    info: (...args) => {
      if (enabled('info')) console.info(prefix, ...args);
    },
    warn: (...args) => {
      if (enabled('warn')) console.warn(prefix, ...args);
    },
    error: (...args) => {
      if (enabled('error')) console.error(prefix, ...args);
    },
  };
}
