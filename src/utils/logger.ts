/**
 * Console logging with levels and colors.
 * Diagnostics go to stdout through the formatters; everything logged here goes to stderr.
 */
import chalk, { type ChalkInstance } from 'chalk';
import { AddonLintError } from './errors.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

type MessageLevel = Exclude<LogLevel, 'silent'>;

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const STYLES: Readonly<Record<MessageLevel, { tag: string; color: ChalkInstance }>> = {
  debug: { tag: '[DEBUG]', color: chalk.gray },
  info: { tag: '[INFO]', color: chalk.blue },
  warn: { tag: '[WARN]', color: chalk.yellow },
  error: { tag: '[ERROR]', color: chalk.red },
};

class Logger {
  private level: LogLevel = process.env.ADDONLINT_DEBUG ? 'debug' : 'info';
  private prefix = '';
  private parent: Logger | null = null;

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  /** Children follow their parent's level. */
  getLevel(): LogLevel {
    return this.parent ? this.parent.getLevel() : this.level;
  }

  setPrefix(prefix: string): void {
    this.prefix = prefix;
  }

  private shouldLog(level: MessageLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.getLevel()];
  }

  private write(level: MessageLevel, lines: string[]): void {
    const { color } = STYLES[level];
    const print = level === 'warn' ? console.warn : console.error;
    for (const line of lines) print(color(line));
  }

  private emit(level: MessageLevel, message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) return;
    const text = this.prefix ? `[${this.prefix}] ${message}` : message;
    const lines = [`${STYLES[level].tag} ${text}`];
    if (data) lines.push(JSON.stringify(data, null, 2));
    this.write(level, lines);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.emit('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.emit('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.emit('warn', message, data);
  }

  /**
   * Our own errors print as `CODE: message`; anything else prints its stack.
   * At debug level the stack is always printed.
   */
  error(message: string, error?: Error | Record<string, unknown>): void {
    if (!this.shouldLog('error')) return;
    this.emit('error', message);
    if (!error) return;
    if (error instanceof AddonLintError && this.getLevel() !== 'debug') {
      this.write('error', [`${error.code}: ${error.message}`]);
    } else if (error instanceof Error) {
      this.write('error', [error.stack ?? error.message]);
    } else {
      this.write('error', [JSON.stringify(error, null, 2)]);
    }
  }

  /** Shown at info level. */
  success(message: string): void {
    if (!this.shouldLog('info')) return;
    console.error(chalk.green(`✓ ${message}`));
  }

  /**
   * Logger whose messages carry `parent:prefix`.
   */
  child(prefix: string): Logger {
    const child = new Logger();
    child.parent = this;
    child.prefix = this.prefix ? `${this.prefix}:${prefix}` : prefix;
    return child;
  }
}

export const logger = new Logger();

export { Logger };
