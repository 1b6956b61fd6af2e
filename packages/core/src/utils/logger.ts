// packages/core/src/utils/logger.ts

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export interface LoggerOptions {
  /** Send every level to stderr, keeping stdout free for machine output. */
  stderrOnly?: boolean;
  /** Omit the timestamp prefix (operator-facing tables read better without it). */
  plain?: boolean;
}

export function createLogger(level: LogLevel = 'info', options: LoggerOptions = {}): Logger {
  const threshold = LOG_LEVELS[level];

  function log(msgLevel: LogLevel, message: string, args: unknown[]): void {
    if (LOG_LEVELS[msgLevel] < threshold) {
      return;
    }
    const prefix = options.plain
      ? `${msgLevel.toUpperCase()}:`
      : `[${new Date().toISOString()}] ${msgLevel.toUpperCase()}:`;
    const method = options.stderrOnly ? 'error' : msgLevel === 'debug' ? 'log' : msgLevel;
    console[method](prefix, message, ...args);
  }

  return {
    debug: (message, ...args) => log('debug', message, args),
    info: (message, ...args) => log('info', message, args),
    warn: (message, ...args) => log('warn', message, args),
    error: (message, ...args) => log('error', message, args),
  };
}

/** A logger that drops everything. Default for library callers that pass none. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
