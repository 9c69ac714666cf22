import chalk from 'chalk';
import { isErrorLike } from '../types/Errors';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVELS;
}

/**
 * Diagnostic logger. Writes to stderr so that command output on stdout
 * (tables, --json) stays clean.
 */
export class Logger {
  private static instance: Logger;
  private logLevel: LogLevel;
  private levelSource: Logger | undefined;

  private constructor(private readonly scope?: string) {
    const fromEnv = process.env.PHPSWITCH_LOG_LEVEL;
    this.logLevel = isLogLevel(fromEnv) ? fromEnv : 'info';
  }

  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  /**
   * A logger that prefixes every line with `[scope]` and shares the level of
   * the root logger.
   */
  child(scope: string): Logger {
    const root = this.scope === undefined ? this : Logger.getInstance();
    const child = new Logger(scope);
    child.levelSource = root;
    return child;
  }

  setLevel(level: LogLevel): void {
    if (this.levelSource) {
      this.levelSource.setLevel(level);
      return;
    }
    this.logLevel = level;
  }

  getLevel(): LogLevel {
    return this.levelSource ? this.levelSource.getLevel() : this.logLevel;
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

  private log(level: LogLevel, message: string, meta?: unknown): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const prefix = this.getLevelPrefix(level);
    const formatted = this.formatMessage(level, this.withScope(message));
    const metaStr = meta ? ` ${this.formatMeta(meta)}` : '';

    this.write(`${this.getTimestamp()} ${prefix} ${formatted}${metaStr}`);
  }

  private write(line: string): void {
    console.error(line);
  }

  private withScope(message: string): string {
    return this.scope ? `[${this.scope}] ${message}` : message;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[this.getLevel()];
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

    if (isErrorLike(meta)) {
      return chalk.red(`(${meta.message})`);
    }

    try {
      return chalk.gray(`(${JSON.stringify(meta)})`);
    } catch {
      return chalk.gray(`(${String(meta)})`);
    }
  }
}

export const logger = Logger.getInstance();
