/**
 * Cyberdeck Kernel — Command Gate
 *
 * The CommandGate is the only path from deck code to OS process execution.
 * No tool spawns a process without passing through it, and no decision it
 * makes goes unaudited.
 *
 * Gate contract:
 * - An unknown command name rejects with SecurityError. Nothing is executed.
 * - Each argument must equal a literal flag of the command's whitelist entry
 *   or pass a structural validator the entry names; otherwise the call
 *   rejects with SecurityError. Nothing is executed.
 * - Accepted calls run the entry's canonical path with the validated argument
 *   vector through the injected ProcessRunner. No shell is involved.
 * - Environmental failures come back as data: a timeout is exit code 124, a
 *   spawn failure or a refusal by the supervisor is exit code 1.
 * - Every outcome is written to the audit log with the command, the argument
 *   list and a status tag.
 */

import type { ProcessRunner, RunOutcome } from '../adapters/runner.js';
import type { SudoTokenManager } from '../credentials/sudo-token.js';
import { SecurityError, errorMessage } from '../errors.js';
import type { AuditLogger } from '../logging/audit.js';
import { AuditLevel } from '../logging/audit.js';
import type { Logger } from '../logging/logger.js';
import { NOOP_LOGGER } from '../logging/logger.js';
import {
  CommandStatus,
  EXIT_CANCELLED,
  EXIT_FAILURE,
  EXIT_TIMEOUT,
  executionResult,
} from '../types/command.js';
import type { ExecutionResult, WhitelistEntry } from '../types/command.js';
import { classifyArgument } from '../validation/arguments.js';
import { COMMAND_WHITELIST, SUDO_PATH } from '../whitelist/table.js';

/** Default wall-clock timeout for a gated command. */
export const DEFAULT_COMMAND_TIMEOUT_MS = 30_000;

export interface CommandGateOptions {
  readonly runner: ProcessRunner;
  readonly audit?: AuditLogger | undefined;
  readonly logger?: Logger | undefined;
  /** Source of the sudo password for privileged commands. */
  readonly sudo?: SudoTokenManager | undefined;
  readonly whitelist?: ReadonlyMap<string, WhitelistEntry> | undefined;
  readonly defaultTimeoutMs?: number | undefined;
}

export interface ExecuteOptions {
  readonly timeoutMs?: number | undefined;
  /** Run the command through sudo. */
  readonly privileged?: boolean | undefined;
  /** Aborting kills the running process. */
  readonly signal?: AbortSignal | undefined;
}

interface Invocation {
  readonly path: string;
  readonly argv: ReadonlyArray<string>;
  readonly input: string | undefined;
}

export class CommandGate {
  private readonly runner: ProcessRunner;
  private readonly audit: AuditLogger | undefined;
  private readonly logger: Logger;
  private readonly sudo: SudoTokenManager | undefined;
  private readonly whitelist: ReadonlyMap<string, WhitelistEntry>;
  private readonly defaultTimeoutMs: number;

  constructor(options: CommandGateOptions) {
    this.runner = options.runner;
    this.audit = options.audit;
    this.logger = (options.logger ?? NOOP_LOGGER).child('gate');
    this.sudo = options.sudo;
    this.whitelist = options.whitelist ?? COMMAND_WHITELIST;
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_COMMAND_TIMEOUT_MS;
  }

  /**
   * Validate and execute a whitelisted command.
   *
   * @param name - Whitelist key, e.g. `nmap`
   * @param args - Argument strings, each validated against the entry
   * @throws {SecurityError} Unknown command or rejected argument (as a rejection)
   */
  async execute(
    name: string,
    args: ReadonlyArray<string>,
    options: ExecuteOptions = {},
  ): Promise<ExecutionResult> {
    const argList = [...args];
    const entry = this.whitelist.get(name);

    if (entry === undefined) {
      this.logger.warn(`Command not whitelisted: ${name}`);
      this.record(name, argList, CommandStatus.BlockedNotWhitelisted, {}, AuditLevel.Warning);
      throw new SecurityError('UNKNOWN_COMMAND', name);
    }

    for (const arg of argList) {
      const cls = classifyArgument(entry, arg);
      if (cls.kind === 'rejected') {
        this.logger.warn(`Argument not whitelisted: ${arg} for ${name}`);
        this.record(name, argList, CommandStatus.BlockedInvalidArg, { invalid_arg: arg }, AuditLevel.Warning);
        throw new SecurityError('INVALID_ARGUMENT', name, arg);
      }
      if (cls.kind !== 'flag') {
        this.logger.debug(`Validated ${cls.kind} argument: ${arg} for ${name}`);
      }
    }

    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    const privileged = options.privileged === true;
    const invocation = this.buildInvocation(entry, argList, privileged);
    const extra = privileged ? { privileged: true } : {};

    let outcome: RunOutcome;
    try {
      outcome = await this.runner.run(invocation.path, invocation.argv, {
        timeoutMs,
        input: invocation.input,
        signal: options.signal,
      });
    } catch (err) {
      const message = errorMessage(err);
      this.logger.error(`Command execution error: ${name}: ${message}`);
      this.record(name, argList, CommandStatus.Error, { ...extra, error: message }, AuditLevel.Error);
      return executionResult('', message, EXIT_FAILURE);
    }

    switch (outcome.kind) {
      case 'exited':
        this.logger.info(`Command executed: ${name} with ${argList.length} args`);
        this.record(name, argList, CommandStatus.Success, {
          ...extra,
          returncode: outcome.exitCode,
          ...(outcome.truncated ? { truncated: true } : {}),
        });
        return executionResult(outcome.stdout, outcome.stderr, outcome.exitCode);

      case 'timeout': {
        const seconds = timeoutMs / 1000;
        this.logger.warn(`Command timeout: ${name} (timeout=${seconds}s)`);
        this.record(name, argList, CommandStatus.Timeout, { ...extra, timeout_sec: seconds }, AuditLevel.Warning);
        return executionResult('', `Command timeout (${seconds}s)`, EXIT_TIMEOUT);
      }

      case 'aborted':
        this.logger.info(`Command cancelled: ${name}`);
        this.record(name, argList, CommandStatus.Cancelled, extra);
        return executionResult(outcome.stdout, outcome.stderr, EXIT_CANCELLED);

      case 'refused': {
        const message = `Process limit reached (${outcome.limit})`;
        this.logger.warn(`Command refused: ${name}: ${message}`);
        this.record(name, argList, CommandStatus.Busy, { ...extra, active: outcome.active }, AuditLevel.Warning);
        return executionResult('', message, EXIT_FAILURE);
      }
    }
  }

  private buildInvocation(
    entry: WhitelistEntry,
    args: ReadonlyArray<string>,
    privileged: boolean,
  ): Invocation {
    if (!privileged) {
      return { path: entry.path, argv: args, input: undefined };
    }

    // The password goes to stdin, never into argv or the audit log.
    const token = this.sudo?.get() ?? null;
    if (token === null) {
      return { path: SUDO_PATH, argv: ['-n', '--', entry.path, ...args], input: undefined };
    }
    return { path: SUDO_PATH, argv: ['-S', '-p', '', '--', entry.path, ...args], input: `${token}\n` };
  }

  private record(
    cmd: string,
    args: ReadonlyArray<string>,
    status: CommandStatus,
    detail: Readonly<Record<string, unknown>>,
    level: AuditLevel = AuditLevel.Info,
  ): void {
    this.audit?.log('COMMAND', { cmd, args, status, ...detail }, level);
  }
}
