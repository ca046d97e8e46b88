/**
 * Console-backed logger with level filtering.
 *
 * Transports log through an injected `Logger`; the default is `noopLogger`
 * so the library stays quiet unless the embedder opts in.
 *
 * @module utils/logger
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVELS: Record<LogLevel, number> = {
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  silent: 99,
};

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

export function createConsoleLogger(level: LogLevel = 'info', prefix = 'evm-rpc'): Logger {
  const enabled = (target: Exclude<LogLevel, 'silent'>) => LEVELS[target] >= LEVELS[level];
  const tag = `[${prefix}]`;

  return {
    debug: (message, ...args) => {
      if (enabled('debug')) console.debug(`${tag} ${message}`, ...args);
    },
    info: (message, ...args) => {
      if (enabled('info')) console.info(`${tag} ${message}`, ...args);
    },
    warn: (message, ...args) => {
      if (enabled('warn')) console.warn(`${tag} ${message}`, ...args);
    },
    error: (message, ...args) => {
      if (enabled('error')) console.error(`${tag} ${message}`, ...args);
    },
  };
}

const noop = (): void => undefined;

export const noopLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};
