/**
 * Universal Logger Interface
 * Compatible with Pino, Winston, console, and custom loggers
 */

/**
 * Logger interface accepted by the fetcher and the crawler
 *
 * @example Pino
 * ```typescript
 * import pino from 'pino';
 * const fetcher = new Fetcher({ logger: pino({ level: 'debug' }) });
 * ```
 *
 * @example Console
 * ```typescript
 * const crawler = new Crawler({ logger: console });
 * ```
 *
 * @example Custom logger
 * ```typescript
 * const logger = {
 *   debug: (msg) => myCustomLog('DEBUG', msg),
 *   info: (msg) => myCustomLog('INFO', msg),
 *   warn: (msg) => myCustomLog('WARN', msg),
 *   error: (msg) => myCustomLog('ERROR', msg),
 * };
 * ```
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  debug(obj: object, message?: string, ...args: unknown[]): void;

  info(message: string, ...args: unknown[]): void;
  info(obj: object, message?: string, ...args: unknown[]): void;

  warn(message: string, ...args: unknown[]): void;
  warn(obj: object, message?: string, ...args: unknown[]): void;

  error(message: string, ...args: unknown[]): void;
  error(obj: object, message?: string, ...args: unknown[]): void;
}

export type LoggerLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LoggerLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

/**
 * Console adapter
 */
export const consoleLogger: Logger = {
  debug: (msgOrObj: string | object, ...args: unknown[]) => console.debug(msgOrObj, ...args),
  info: (msgOrObj: string | object, ...args: unknown[]) => console.info(msgOrObj, ...args),
  warn: (msgOrObj: string | object, ...args: unknown[]) => console.warn(msgOrObj, ...args),
  error: (msgOrObj: string | object, ...args: unknown[]) => console.error(msgOrObj, ...args),
};

/**
 * Silent logger - no output
 * Useful for testing or when you want to completely disable logging
 */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/**
 * Call `logger[level]` with arguments received through the untyped overload pair
 */
function forward(logger: Logger, level: LoggerLevel, msgOrObj: string | object, args: unknown[]): void {
  if (typeof msgOrObj === 'string') {
    logger[level](msgOrObj, ...args);
    return;
  }
  const [message, ...rest] = args;
  if (typeof message === 'string') {
    logger[level](msgOrObj, message, ...rest);
  } else {
    logger[level](msgOrObj);
  }
}

/**
 * Create a logger that only logs at or above the specified level
 */
export function createLevelLogger(baseLogger: Logger, minLevel: LoggerLevel): Logger {
  const minLevelNum = LEVEL_ORDER[minLevel];

  const at =
    (level: LoggerLevel) =>
    (msgOrObj: string | object, ...args: unknown[]): void => {
      if (LEVEL_ORDER[level] >= minLevelNum) {
        forward(baseLogger, level, msgOrObj, args);
      }
    };

  return {
    debug: at('debug'),
    info: at('info'),
    warn: at('warn'),
    error: at('error'),
  };
}
