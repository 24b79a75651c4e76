/**
 * @cyberdeck/runtime-host
 *
 * Side-effectful implementations behind the kernel's interfaces: the process
 * supervisor, the task pool, rotating log files, settings, safe paths,
 * privilege dropping and the deck context that wires them together.
 *
 * No kernel code imports from this package.
 */

// Deck context (entry point wiring)
export type { DeckContext, DeckContextOptions } from './context.js';
export { APP_LOG_FILENAME, AUDIT_LOG_FILENAME, createDeckContext } from './context.js';

// Process supervision
export type { ProcessSupervisorOptions } from './process/supervisor.js';
export {
  DEFAULT_KILL_GRACE_MS,
  DEFAULT_MAX_OUTPUT_BYTES,
  DEFAULT_MAX_PROCESSES,
  ProcessSupervisor,
} from './process/supervisor.js';
export type { LimitedCommand, ResourceLimits } from './process/limits.js';
export { DEFAULT_RESOURCE_LIMITS, buildLimitedArgv } from './process/limits.js';
export type { TaskFn, TaskHandle, TaskResult, TaskSnapshot, TaskState } from './process/task-pool.js';
export { DEFAULT_POOL_SIZE, TaskPool } from './process/task-pool.js';
export type { BinaryProbeOptions } from './process/binary-probe.js';
export { BinaryProbe } from './process/binary-probe.js';

// Logging
export type { LineWriter, RotationOptions } from './logging/rotating-file.js';
export { RotatingFileWriter } from './logging/rotating-file.js';
export { FileAuditSink, MemoryAuditSink, formatAuditLine } from './logging/audit-sink.js';
export type { AuditReadResult } from './logging/audit-reader.js';
export { parseAuditLog } from './logging/audit-reader.js';
export type { AppLoggerOptions, TextStream } from './logging/app-logger.js';
export { AppLogger } from './logging/app-logger.js';

// Settings and home
export type { Settings, SettingsInput } from './config/settings.js';
export {
  CONFIG_FILENAME,
  ConfigError,
  LOG_LEVEL_ENV_VAR,
  MAX_TIMER_MS,
  defaultSettings,
  loadSettings,
  parseSettings,
  settingsSchema,
} from './config/settings.js';
export type { ResolveDeckHomeOptions } from './home.js';
export { HOME_ENV_VAR, resolveDeckHome } from './home.js';
export { PathCategory, getSafePath, isPathCategory } from './paths.js';

// Privileges
export type { DropTarget, PrivilegeOps } from './privileges.js';
export { dropPrivileges, processPrivilegeOps } from './privileges.js';

export { isNodeError } from './util/errors.js';
