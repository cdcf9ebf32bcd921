/**
 * Console logging with a level threshold.
 *
 * The threshold comes from the configuration (`logLevel`) and can be changed
 * at startup; it defaults to "info".
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = typeof LOG_LEVELS[number];

let threshold: LogLevel = 'info';

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

function enabled(level: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(threshold);
}

export const log = {
  debug(message: string, ...details: unknown[]): void {
    if (enabled('debug')) console.debug(message, ...details);
  },
  info(message: string, ...details: unknown[]): void {
    if (enabled('info')) console.log(message, ...details);
  },
  warn(message: string, ...details: unknown[]): void {
    if (enabled('warn')) console.warn(message, ...details);
  },
  error(message: string, ...details: unknown[]): void {
    if (enabled('error')) console.error(message, ...details);
  }
};
