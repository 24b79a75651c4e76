/**
 * @cyberdeck/kernel
 *
 * Cyberdeck command-gate core: whitelist table, argument validators, the
 * command gate, audit logger, bounded cache and sudo token manager.
 *
 * This package is side-effect free. It contains no imports of node:fs,
 * node:child_process, node:net or any other I/O API. The process
 * supervisor and log sinks live in @cyberdeck/runtime-host.
 */

// Types
export type {
  ArgumentClass,
  ExecutionResult,
  WhitelistEntry,
} from './types/command.js';
export {
  ArgumentKind,
  CommandStatus,
  EXIT_CANCELLED,
  EXIT_FAILURE,
  EXIT_TIMEOUT,
  executionResult,
} from './types/command.js';

// Errors
export type { SecurityErrorCode } from './errors.js';
export {
  SecurityError,
  ValidationError,
  errorMessage,
  isSecurityError,
  isValidationError,
} from './errors.js';

// Whitelist
export {
  COMMAND_WHITELIST,
  INTERFACE_NAMES,
  NMCLI_WIFI_FIELDS,
  SUDO_PATH,
} from './whitelist/table.js';

// Validators
export {
  classifyArgument,
  isValidHostname,
  isValidIpOrCidr,
  isValidIpv4,
  isValidMacAddress,
  isValidPortRange,
} from './validation/arguments.js';
export {
  HIDDEN_SSID,
  MAX_SSID_LENGTH,
  sanitizeSsid,
  validateBssid,
} from './validation/wireless.js';

// Logging contracts (sinks live in runtime-host)
export type { AuditDetails, AuditEvent, AuditSink, Clock } from './logging/audit.js';
export { AuditLevel, AuditLogger, systemClock } from './logging/audit.js';
export type { Logger } from './logging/logger.js';
export { LOG_LEVEL_ORDER, LogLevel, NOOP_LOGGER } from './logging/logger.js';

// Process runner interface (supervisor lives in runtime-host)
export type { ProcessRunner, RunOptions, RunOutcome } from './adapters/runner.js';

// Implementations
export { CommandGate, DEFAULT_COMMAND_TIMEOUT_MS } from './gate/command-gate.js';
export type { CommandGateOptions, ExecuteOptions } from './gate/command-gate.js';
export { DEFAULT_SUDO_TTL_SECONDS, SudoTokenManager } from './credentials/sudo-token.js';
export type { SudoTokenManagerOptions } from './credentials/sudo-token.js';
export { BoundedCache } from './cache/bounded-cache.js';
export type { BoundedCacheOptions, CacheStats } from './cache/bounded-cache.js';
