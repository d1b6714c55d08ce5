export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface Logger {
  debug(message: string, ...extra: unknown[]): void;
  info(message: string, ...extra: unknown[]): void;
  warn(message: string, ...extra: unknown[]): void;
  error(message: string, ...extra: unknown[]): void;
}

export function parseLogLevel(value: string | undefined): LogLevel {
  const v = (value ?? '').trim().toLowerCase();
  if (v === 'debug' || v === 'info' || v === 'warn' || v === 'error') return v;
  if (v === 'warning') return 'warn';
  return 'info';
}

// Level is read per call so LOG_LEVEL from .env applies to loggers created at import time
function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[parseLogLevel(process.env.LOG_LEVEL)];
}

export function createLogger(tag: string): Logger {
  const prefix = `[${tag.toUpperCase()}]`;
  return {
    debug: (message, ...extra) => {
      if (enabled('debug')) console.log(`${prefix} ${message}`, ...extra);
    },
    info: (message, ...extra) => {
      if (enabled('info')) console.log(`${prefix} ${message}`, ...extra);
    },
    warn: (message, ...extra) => {
      if (enabled('warn')) console.warn(`${prefix} ${message}`, ...extra);
    },
    error: (message, ...extra) => {
      if (enabled('error')) console.error(`${prefix} ${message}`, ...extra);
    }
  };
}
