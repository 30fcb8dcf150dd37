import type { Logger as UniversalLogger } from '../types/logger.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'none';

export interface LoggerOptions {
  level?: LogLevel;
  prefix?: string;
  timestamp?: boolean;
  colors?: boolean;
}

// ANSI color codes
const colors = {
  reset: '\x1b[0m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
};

const levels: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  none: 999,
};

/**
 * Default logger: one line per message on stdout, silent unless `DEBUG`
 * names `husker` (or `*`)
 *
 * @example
 * ```bash
 * DEBUG=husker node crawl.js
 * ```
 */
export class Logger implements UniversalLogger {
  private level: LogLevel;
  private prefix: string;
  private useTimestamp: boolean;
  private useColors: boolean;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level || this.detectLogLevel();
    this.prefix = options.prefix || 'husker';
    this.useTimestamp = options.timestamp !== false;
    this.useColors = options.colors !== false && this.supportsColors();
  }

  private detectLogLevel(): LogLevel {
    const env = process.env.DEBUG || '';
    if (env.includes('husker') || env.includes('*')) {
      return 'debug';
    }
    return 'none';
  }

  private supportsColors(): boolean {
    return Boolean(process.stdout.isTTY) && !process.env.NO_COLOR && process.env.TERM !== 'dumb';
  }

  private colorize(text: string, color: keyof typeof colors): string {
    if (!this.useColors) return text;
    return `${colors[color]}${text}${colors.reset}`;
  }

  private formatTimestamp(): string {
    if (!this.useTimestamp) return '';
    const time = new Date().toTimeString().split(' ')[0];
    return this.colorize(`[${time}]`, 'gray') + ' ';
  }

  /**
   * `message key=value …`, for pino-style calls that pass a context object first
   */
  private format(msgOrObj: string | object, args: unknown[]): string {
    if (typeof msgOrObj === 'string') {
      return [msgOrObj, ...args.map(String)].join(' ');
    }
    const [message, ...rest] = args;
    const fields = Object.entries(msgOrObj)
      .map(([key, value]) => this.colorize(`${key}=`, 'gray') + String(value))
      .join(' ');
    return [typeof message === 'string' ? message : undefined, fields, ...rest.map(String)]
      .filter((part) => part !== undefined && part !== '')
      .join(' ');
  }

  shouldLog(level: LogLevel): boolean {
    return levels[level] >= levels[this.level];
  }

  private log(level: LogLevel, message: string): void {
    if (!this.shouldLog(level)) return;

    const timestamp = this.formatTimestamp();
    const prefix = this.colorize(`[${this.prefix}]`, 'cyan');
    console.log(`${timestamp}${prefix} ${message}`);
  }

  debug(msgOrObj: string | object, ...args: unknown[]): void {
    this.log('debug', this.format(msgOrObj, args));
  }

  info(msgOrObj: string | object, ...args: unknown[]): void {
    this.log('info', this.format(msgOrObj, args));
  }

  warn(msgOrObj: string | object, ...args: unknown[]): void {
    this.log('warn', this.colorize(this.format(msgOrObj, args), 'yellow'));
  }

  error(msgOrObj: string | object, ...args: unknown[]): void {
    this.log('error', this.colorize(this.format(msgOrObj, args), 'red'));
  }
}

// Global logger instance
let globalLogger: Logger | null = null;

export function getLogger(): Logger {
  if (!globalLogger) {
    globalLogger = new Logger();
  }
  return globalLogger;
}

export function setLogger(logger: Logger): void {
  globalLogger = logger;
}
