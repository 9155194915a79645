/**
 * Leveled console logger shared by agents, the fill loop and scripts.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let threshold: LogLevel = parseLogLevel(process.env.LOG_LEVEL) ?? 'info';

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVEL_ORDER, value);
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const lower = value?.toLowerCase();
  if (lower === 'warning') return 'warn';
  if (lower && isLogLevel(lower)) return lower;
  return undefined;
}

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

function write(source: string, level: LogLevel, message: string, data?: unknown): void {
  if (LOG_LEVEL_ORDER[level] < LOG_LEVEL_ORDER[threshold]) return;

  const line = `[${source}] [${level.toUpperCase()}] ${message}`;
  const sink = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;
  if (data === undefined) {
    sink(line);
  } else {
    sink(line, data);
  }
}

export function createLogger(source: string): Logger {
  return {
    debug: (message, data) => write(source, 'debug', message, data),
    info: (message, data) => write(source, 'info', message, data),
    warn: (message, data) => write(source, 'warn', message, data),
    error: (message, data) => write(source, 'error', message, data),
  };
}
