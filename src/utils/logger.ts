export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && LOG_LEVELS.some(level => level === value);
}

const envLevel = process.env['SCRIPTORIUM_LOG_LEVEL'];
let configuredLevel: LogLevel = 'info';

/**
 * Set the process-wide log level. SCRIPTORIUM_LOG_LEVEL, when set, wins.
 */
export function setLogLevel(level: LogLevel): void {
  configuredLevel = level;
}

export function getLogLevel(): LogLevel {
  return isLogLevel(envLevel) ? envLevel : configuredLevel;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[getLogLevel()];
}

/**
 * Create a console logger whose lines are prefixed with `[scope]`
 */
export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;

  return {
    debug(message, ...details) {
      if (enabled('debug')) console.debug(prefix, message, ...details);
    },
    info(message, ...details) {
      if (enabled('info')) console.log(prefix, message, ...details);
    },
    warn(message, ...details) {
      if (enabled('warn')) console.warn(prefix, message, ...details);
    },
    error(message, ...details) {
      if (enabled('error')) console.error(prefix, message, ...details);
    },
  };
}
