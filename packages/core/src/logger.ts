/**
 * Logger for symgraph
 *
 * All diagnostic output of the graph builder and the resolution pass goes
 * through this logger so that callers can silence or redirect it.
 *
 * @example
 * ```ts
 * import { Logger } from '@symgraph/core';
 *
 * Logger.setLevel('debug');
 * Logger.configure({
 *   handler: (level, message) => {
 *     appendFileSync('graph.log', `[${level}] ${message}\n`);
 *   },
 * });
 * ```
 */

/**
 * Log levels in order of verbosity (least to most)
 */
export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

export type LogHandler = (level: LogLevel, message: string, ...args: unknown[]) => void;

export interface LoggerConfig {
  /** Minimum log level to output (default: 'warn') */
  level?: LogLevel;
  /** Custom handler function (replaces console output) */
  handler?: LogHandler;
}

export interface ChildLogger {
  error(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}

function defaultHandler(level: LogLevel, message: string, ...args: unknown[]): void {
  const formattedMessage = `[symgraph] ${message}`;

  switch (level) {
    case 'error':
      console.error(formattedMessage, ...args);
      break;
    case 'warn':
      console.warn(formattedMessage, ...args);
      break;
    case 'info':
    case 'debug':
      console.log(formattedMessage, ...args);
      break;
    case 'silent':
      break;
  }
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LOG_LEVEL_VALUES, value);
}

/**
 * Initial log level from environment variables
 */
function getInitialLevel(): LogLevel {
  if (typeof process !== 'undefined') {
    if (process.env['SYMGRAPH_QUIET'] === '1') return 'silent';
    if (process.env['SYMGRAPH_DEBUG'] === '1') return 'debug';
    const requested = process.env['SYMGRAPH_LOG_LEVEL'];
    if (isLogLevel(requested)) return requested;
  }
  return 'warn';
}

let currentLevel: LogLevel = getInitialLevel();
let currentHandler: LogHandler = defaultHandler;

function emit(level: LogLevel, message: string, args: unknown[]): void {
  if (Logger.isEnabled(level)) {
    currentHandler(level, message, ...args);
  }
}

export const Logger = {
  configure(config: LoggerConfig): void {
    if (config.level !== undefined) currentLevel = config.level;
    if (config.handler !== undefined) currentHandler = config.handler;
  },

  setLevel(level: LogLevel): void {
    currentLevel = level;
  },

  getLevel(): LogLevel {
    return currentLevel;
  },

  /**
   * Check if messages at `level` will be output
   */
  isEnabled(level: LogLevel): boolean {
    return level !== 'silent' && LOG_LEVEL_VALUES[level] <= LOG_LEVEL_VALUES[currentLevel];
  },

  error(message: string, ...args: unknown[]): void {
    emit('error', message, args);
  },

  warn(message: string, ...args: unknown[]): void {
    emit('warn', message, args);
  },

  info(message: string, ...args: unknown[]): void {
    emit('info', message, args);
  },

  debug(message: string, ...args: unknown[]): void {
    emit('debug', message, args);
  },

  /**
   * Reset logger to default configuration
   * Useful for testing
   */
  reset(): void {
    currentLevel = getInitialLevel();
    currentHandler = defaultHandler;
  },

  /**
   * Create a child logger that prefixes every message
   *
   * With `level`, the child filters by its own level instead of the shared
   * one; the handler is still shared.
   */
  child(prefix: string, level?: LogLevel): ChildLogger {
    const log = (at: LogLevel, message: string, args: unknown[]): void => {
      if (level === undefined) {
        emit(at, `${prefix} ${message}`, args);
      } else if (at !== 'silent' && LOG_LEVEL_VALUES[at] <= LOG_LEVEL_VALUES[level]) {
        currentHandler(at, `${prefix} ${message}`, ...args);
      }
    };
    return {
      error: (message, ...args) => {
        log('error', message, args);
      },
      warn: (message, ...args) => {
        log('warn', message, args);
      },
      info: (message, ...args) => {
        log('info', message, args);
      },
      debug: (message, ...args) => {
        log('debug', message, args);
      },
    };
  },
};
