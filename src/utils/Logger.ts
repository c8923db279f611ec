import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Writes to stderr so that command output on stdout (paths, JSON) stays machine-readable.
 */
export class Logger {
  private static instance: Logger;
  private logLevel: LogLevel = 'warn';
  private readonly levels: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
  };

  private constructor() {}

  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  setLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  debug(message: string, meta?: unknown): void {
    this.log('debug', message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.log('info', message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.log('warn', message, meta);
  }

  error(message: string, meta?: unknown): void {
    this.log('error', message, meta);
  }

  /**
   * Logger bound to a `[SCOPE]` prefix, e.g. `logger.scoped('jvm').debug(...)`.
   */
  scoped(scope: string): ScopedLogger {
    const prefix = `[${scope.toUpperCase()}]`;
    return {
      debug: (message, meta) => this.debug(`${prefix} ${message}`, meta),
      info: (message, meta) => this.info(`${prefix} ${message}`, meta),
      warn: (message, meta) => this.warn(`${prefix} ${message}`, meta),
      error: (message, meta) => this.error(`${prefix} ${message}`, meta),
    };
  }

  private log(level: LogLevel, message: string, meta?: unknown): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const timestamp = this.getTimestamp();
    const prefix = this.getLevelPrefix(level);
    const formatted = this.formatMessage(level, message);
    const metaStr = meta ? ` ${this.formatMeta(meta)}` : '';

    console.error(`${timestamp} ${prefix} ${formatted}${metaStr}`);
  }

  private shouldLog(level: LogLevel): boolean {
    return this.levels[level] >= this.levels[this.logLevel];
  }

  private getTimestamp(): string {
    return chalk.gray(new Date().toISOString());
  }

  private getLevelPrefix(level: LogLevel): string {
    const prefixes = {
      debug: chalk.cyan('[DEBUG]'),
      info: chalk.blue('[INFO]'),
      warn: chalk.yellow('[WARN]'),
      error: chalk.red('[ERROR]'),
    };
    return prefixes[level];
  }

  private formatMessage(level: LogLevel, message: string): string {
    switch (level) {
      case 'error':
        return chalk.red(message);
      case 'warn':
        return chalk.yellow(message);
      case 'info':
        return chalk.white(message);
      case 'debug':
        return chalk.gray(message);
      default:
        return message;
    }
  }

  private formatMeta(meta: unknown): string {
    if (typeof meta === 'string') {
      return chalk.gray(`(${meta})`);
    }

    if (meta instanceof Error) {
      return chalk.red(`(${meta.message})`);
    }

    try {
      return chalk.gray(`(${JSON.stringify(meta)})`);
    } catch {
      return chalk.gray(`(${String(meta)})`);
    }
  }
}

export interface ScopedLogger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}

export const logger = Logger.getInstance();
