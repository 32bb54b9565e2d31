// MARK: - Logger Utility
// Structured JSON logging with level filtering

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogMeta = Record<string, unknown>;

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && value in LOG_LEVELS;
}

let currentLevelValue = LOG_LEVELS[isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : 'info'];

/**
 * Overrides the level read from LOG_LEVEL at import time
 */
export function setLogLevel(level: LogLevel): void {
  currentLevelValue = LOG_LEVELS[level];
}

/**
 * Main logger function with level filtering
 */
export function log(level: LogLevel, message: string, meta?: LogMeta): void {
  if (LOG_LEVELS[level] < currentLevelValue) {
    return;
  }

  const output = JSON.stringify({
    timestamp: new Date().toISOString(),
    level: level.toUpperCase(),
    message,
    ...meta,
  });

  switch (level) {
    case 'error':
      console.error(output);
      break;
    case 'warn':
      console.warn(output);
      break;
    case 'debug':
      console.debug(output);
      break;
    default:
      console.log(output);
  }
}

export const logger = {
  debug: (message: string, meta?: LogMeta) => log('debug', message, meta),
  info: (message: string, meta?: LogMeta) => log('info', message, meta),
  warn: (message: string, meta?: LogMeta) => log('warn', message, meta),
  error: (message: string, meta?: LogMeta) => log('error', message, meta),
};
