/**
 * Cyberdeck Kernel — Application Logger Interface
 *
 * Operational log contract (debug output, warnings, failures). The concrete
 * rotating-file logger lives in @cyberdeck/runtime-host.
 */

export enum LogLevel {
  Debug = 'DEBUG',
  Info = 'INFO',
  Warning = 'WARNING',
  Error = 'ERROR',
}

export const LOG_LEVEL_ORDER: Readonly<Record<LogLevel, number>> = {
  [LogLevel.Debug]: 0,
  [LogLevel.Info]: 1,
  [LogLevel.Warning]: 2,
  [LogLevel.Error]: 3,
} as const;

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** A logger that tags every line with `scope`. */
  child(scope: string): Logger;
}

/** Discards everything. The default wherever no logger is injected. */
export const NOOP_LOGGER: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => NOOP_LOGGER,
};
