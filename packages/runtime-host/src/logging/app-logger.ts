/**
 * Cyberdeck Runtime Host — Application Logger
 *
 * Implements the Logger interface from @cyberdeck/kernel. Lines go to
 * `<home>/logs/app.log` (2 MiB, three backups by default):
 *
 *   [2026-01-01T00:00:00.000Z] [WARNING] [gate] Command not whitelisted: rm
 *
 * Warnings and errors are optionally mirrored to stderr in colour.
 */

import chalk from 'chalk';
import { LOG_LEVEL_ORDER, LogLevel } from '@cyberdeck/kernel';
import type { Clock, Logger } from '@cyberdeck/kernel';
import type { LineWriter } from './rotating-file.js';

/** Anything with a write(string) method; process.stderr in production. */
export interface TextStream {
  write(text: string): unknown;
}

export interface AppLoggerOptions {
  readonly level?: LogLevel | undefined;
  /** Mirror warnings and errors here. */
  readonly console?: TextStream | undefined;
  readonly now?: Clock | undefined;
}

const CONSOLE_STYLE = {
  [LogLevel.Debug]: chalk.gray,
  [LogLevel.Info]: chalk.cyan,
  [LogLevel.Warning]: chalk.yellow,
  [LogLevel.Error]: chalk.red,
} as const;

export class AppLogger implements Logger {
  private readonly level: LogLevel;
  private readonly console: TextStream | undefined;
  private readonly now: Clock;

  constructor(
    private readonly writer: LineWriter | undefined,
    options: AppLoggerOptions = {},
    private readonly scope = 'deck',
  ) {
    this.level = options.level ?? LogLevel.Info;
    this.console = options.console;
    this.now = options.now ?? (() => Date.now());
  }

  debug(message: string): void { this.write(LogLevel.Debug, message); }
  info(message: string): void { this.write(LogLevel.Info, message); }
  warn(message: string): void { this.write(LogLevel.Warning, message); }
  error(message: string): void { this.write(LogLevel.Error, message); }

  child(scope: string): Logger {
    return new AppLogger(
      this.writer,
      { level: this.level, console: this.console, now: this.now },
      scope,
    );
  }

  private write(level: LogLevel, message: string): void {
    if (LOG_LEVEL_ORDER[level] < LOG_LEVEL_ORDER[this.level]) return;

    const line = `[${new Date(this.now()).toISOString()}] [${level}] [${this.scope}] ${message}`;
    this.writer?.appendLine(line);

    if (this.console !== undefined && LOG_LEVEL_ORDER[level] >= LOG_LEVEL_ORDER[LogLevel.Warning]) {
      this.console.write(CONSOLE_STYLE[level](`[${level}] ${message}`) + '\n');
    }
  }
}
