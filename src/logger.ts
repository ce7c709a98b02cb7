/**
 * Leveled logger with pluggable transports.
 */

import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface LogRecord {
  level: Exclude<LogLevel, 'silent'>;
  scope: string | null;
  message: string;
  data?: Record<string, unknown>;
}

export interface LogTransport {
  log(entry: LogRecord): void;
}

const LEVEL_STYLES: Record<LogRecord['level'], (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

/** Writes colored, single-line entries to stderr. */
export class ConsoleTransport implements LogTransport {
  log(entry: LogRecord): void {
    const label = LEVEL_STYLES[entry.level](entry.level.toUpperCase().padEnd(5));
    const scope = entry.scope ? chalk.dim(`[${entry.scope}] `) : '';
    const data = entry.data ? ` ${chalk.dim(JSON.stringify(entry.data))}` : '';
    process.stderr.write(`${label} ${scope}${entry.message}${data}\n`);
  }
}

export class Logger {
  // Same object in every child
  private shared: { level: LogLevel };
  private readonly scope: string | null;
  private readonly transports: LogTransport[];

  constructor(opts: { level?: LogLevel; scope?: string | null; transports?: LogTransport[] } = {}) {
    this.shared = { level: opts.level ?? 'warn' };
    this.scope = opts.scope ?? null;
    this.transports = opts.transports ?? [new ConsoleTransport()];
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log('error', message, data);
  }

  setLevel(level: LogLevel): void {
    this.shared.level = level;
  }

  getLevel(): LogLevel {
    return this.shared.level;
  }

  /**
   * Create a logger sharing this one's transports and level, tagged with
   * `scope` (nested scopes are joined with `:`). Later level changes on
   * either side apply to both.
   */
  child(scope: string): Logger {
    const child = new Logger({
      scope: this.scope ? `${this.scope}:${scope}` : scope,
      transports: this.transports,
    });
    child.shared = this.shared;
    return child;
  }

  private log(level: LogRecord['level'], message: string, data?: Record<string, unknown>): void {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[this.shared.level]) return;
    const entry: LogRecord = { level, scope: this.scope, message };
    if (data !== undefined) entry.data = data;
    for (const transport of this.transports) transport.log(entry);
  }
}
