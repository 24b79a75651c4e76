/**
 * Cyberdeck Runtime Host — Deck Context
 *
 * The explicitly constructed object graph of a running deck. There are no
 * module-level singletons: the entry point calls createDeckContext() once,
 * passes the context to every collaborator, and calls shutdown() on exit.
 *
 * Construction order: home → settings → app log → audit log → supervisor →
 * sudo token → gate → task pool → (optional) privilege drop.
 */

import {
  AuditLogger,
  CommandGate,
  SudoTokenManager,
  systemClock,
} from '@cyberdeck/kernel';
import type { AuditSink, Clock, Logger, ProcessRunner } from '@cyberdeck/kernel';
import { loadSettings } from './config/settings.js';
import type { Settings } from './config/settings.js';
import { resolveDeckHome } from './home.js';
import { AppLogger } from './logging/app-logger.js';
import type { TextStream } from './logging/app-logger.js';
import { FileAuditSink, MemoryAuditSink } from './logging/audit-sink.js';
import { RotatingFileWriter } from './logging/rotating-file.js';
import { PathCategory, getSafePath } from './paths.js';
import { dropPrivileges, processPrivilegeOps } from './privileges.js';
import type { PrivilegeOps } from './privileges.js';
import { ProcessSupervisor } from './process/supervisor.js';
import { TaskPool } from './process/task-pool.js';

export const APP_LOG_FILENAME = 'app.log';
export const AUDIT_LOG_FILENAME = 'audit.log';

export interface DeckContextOptions {
  /** Explicit home directory (highest precedence). */
  readonly home?: string | undefined;
  readonly env?: NodeJS.ProcessEnv | undefined;
  /** Use these settings instead of reading config.json. */
  readonly settings?: Settings | undefined;
  /** Write app.log and audit.log under the home directory. Default true. */
  readonly persistLogs?: boolean | undefined;
  /** Audit sink to use instead of the file or memory default. */
  readonly auditSink?: AuditSink | undefined;
  /** Replace the supervisor as the gate's runner (tests, simulation). */
  readonly runner?: ProcessRunner | undefined;
  /** Where warnings are mirrored when logging.console is on. Default stderr. */
  readonly console?: TextStream | undefined;
  readonly privilegeOps?: PrivilegeOps | null | undefined;
  readonly now?: Clock | undefined;
}

export interface DeckContext {
  readonly home: string;
  readonly settings: Settings;
  readonly logger: Logger;
  readonly audit: AuditLogger;
  readonly auditLogPath: string | null;
  readonly supervisor: ProcessSupervisor;
  readonly sudo: SudoTokenManager;
  readonly gate: CommandGate;
  readonly pool: TaskPool;
  readonly now: Clock;
  /** getSafePath() bound to this deck's home. */
  safePath(category: string, filename: string): string;
  /** Idempotent teardown: clears credentials and terminates every child. */
  shutdown(): Promise<void>;
}

export function createDeckContext(options: DeckContextOptions = {}): DeckContext {
  const env = options.env ?? process.env;
  const now = options.now ?? systemClock;
  const home = resolveDeckHome({ home: options.home, env });
  const settings = options.settings ?? loadSettings(home, env);
  const persist = options.persistLogs ?? true;
  const { logging } = settings;

  const appWriter = persist
    ? new RotatingFileWriter(getSafePath(home, PathCategory.Logs, APP_LOG_FILENAME), {
        maxBytes: logging.appLogMaxBytes,
        backups: logging.appLogBackups,
      })
    : undefined;

  const logger = new AppLogger(appWriter, {
    level: logging.level,
    console: logging.console ? (options.console ?? process.stderr) : undefined,
    now,
  });

  let auditLogPath: string | null = null;
  let auditSink: AuditSink;
  if (options.auditSink !== undefined) {
    auditSink = options.auditSink;
  } else if (persist) {
    auditLogPath = getSafePath(home, PathCategory.Logs, AUDIT_LOG_FILENAME);
    auditSink = new FileAuditSink(
      new RotatingFileWriter(auditLogPath, {
        maxBytes: logging.auditLogMaxBytes,
        backups: logging.auditLogBackups,
      }),
    );
  } else {
    auditSink = new MemoryAuditSink();
  }
  const audit = new AuditLogger(auditSink, now);

  const { processes, tools } = settings;
  const supervisor = new ProcessSupervisor({
    maxProcesses: processes.maxProcesses,
    limits: processes.enforceLimits
      ? {
          maxMemoryMb: processes.maxMemoryMb,
          cpuBufferSeconds: processes.cpuBufferSeconds,
          prlimitPath: processes.prlimitPath,
        }
      : null,
    killGraceMs: processes.killGraceMs,
    maxOutputBytes: tools.maxOutputBytes,
    env,
    logger,
  });

  const sudo = new SudoTokenManager({ ttlSeconds: settings.sudo.tokenTtlSeconds, audit, now });

  const gate = new CommandGate({
    runner: options.runner ?? supervisor,
    audit,
    logger,
    sudo,
    defaultTimeoutMs: tools.defaultTimeoutMs,
  });

  const pool = new TaskPool(settings.workers.poolSize, now);

  if (settings.privileges.drop) {
    const ops = options.privilegeOps === undefined ? processPrivilegeOps() : options.privilegeOps;
    dropPrivileges(settings.privileges, ops, audit, logger.child('privileges'));
  }

  logger.info(`Deck context ready (home=${home})`);

  let shutdownPromise: Promise<void> | null = null;
  const shutdown = (): Promise<void> => {
    if (shutdownPromise === null) {
      shutdownPromise = (async () => {
        pool.abortAll();
        sudo.dispose();
        await supervisor.shutdown();
        logger.info('Deck context shut down');
      })();
    }
    return shutdownPromise;
  };

  return {
    home,
    settings,
    logger,
    audit,
    auditLogPath,
    supervisor,
    sudo,
    gate,
    pool,
    now,
    safePath: (category, filename) => getSafePath(home, category, filename),
    shutdown,
  };
}
