/**
 * Cyberdeck Runtime Host — Process Supervisor
 *
 * Implements the ProcessRunner interface from @cyberdeck/kernel. Every OS
 * process the deck starts is spawned here, with node:child_process.spawn
 * and an argument vector (never a shell).
 *
 * Supervisor invariants:
 * - At most `maxProcesses` children are tracked. Above the cap run() returns
 *   `refused` without spawning; there is no queue.
 * - Exited handles are pruned before every capacity check and after every
 *   completion.
 * - Limits apply at two layers: a parent-side wall-clock timer and child-side
 *   RLIMIT_AS / RLIMIT_CPU (see limits.ts).
 * - Termination is two-stage: SIGTERM, then SIGKILL after `killGraceMs`.
 *   `timeout` and `aborted` outcomes are reported only after `close`, so the
 *   child has been reaped.
 * - cleanupAll() is synchronous and leaves zero tracked handles.
 */

import { spawn } from 'node:child_process';
import type { ChildProcess } from 'node:child_process';
import { constants } from 'node:os';
import type { Logger, ProcessRunner, RunOptions, RunOutcome } from '@cyberdeck/kernel';
import { NOOP_LOGGER } from '@cyberdeck/kernel';
import { buildLimitedArgv } from './limits.js';
import type { ResourceLimits } from './limits.js';

export const DEFAULT_MAX_PROCESSES = 10;
export const DEFAULT_KILL_GRACE_MS = 5_000;
export const DEFAULT_MAX_OUTPUT_BYTES = 10 * 1024 * 1024;

export interface ProcessSupervisorOptions {
  readonly maxProcesses?: number | undefined;
  /** Child-side rlimits. `null` disables the prlimit wrapper. */
  readonly limits?: ResourceLimits | null | undefined;
  readonly killGraceMs?: number | undefined;
  /** Per-stream capture limit; the rest of the output is dropped. */
  readonly maxOutputBytes?: number | undefined;
  readonly env?: NodeJS.ProcessEnv | undefined;
  readonly logger?: Logger | undefined;
}

type StopReason = 'timeout' | 'aborted';

interface TrackedProcess {
  readonly child: ChildProcess;
  readonly command: string;
  /** Mark why the process is being stopped; the first reason wins. */
  markStopped(reason: StopReason): void;
}

// ---------------------------------------------------------------------------
// Output capture
// ---------------------------------------------------------------------------

class CappedBuffer {
  private readonly chunks: Buffer[] = [];
  private bytes = 0;
  truncated = false;

  constructor(private readonly limit: number) {}

  push(chunk: Buffer): void {
    const room = this.limit - this.bytes;
    if (room <= 0) {
      this.truncated = true;
      return;
    }
    const kept = chunk.length > room ? chunk.subarray(0, room) : chunk;
    if (kept.length < chunk.length) this.truncated = true;
    this.chunks.push(kept);
    this.bytes += kept.length;
  }

  toString(): string {
    return Buffer.concat(this.chunks).toString('utf-8');
  }
}

const SIGNAL_NUMBERS: ReadonlyMap<string, number> = new Map(Object.entries(constants.signals));

function isRunning(child: ChildProcess): boolean {
  return child.exitCode === null && child.signalCode === null;
}

/** Shell convention: a child killed by signal N exits with 128 + N. */
function exitCodeFor(code: number | null, signal: NodeJS.Signals | null): number {
  if (code !== null) return code;
  if (signal !== null) return 128 + (SIGNAL_NUMBERS.get(signal) ?? 0);
  return 1;
}

// ---------------------------------------------------------------------------
// ProcessSupervisor
// ---------------------------------------------------------------------------

export class ProcessSupervisor implements ProcessRunner {
  private readonly tracked: Map<number, TrackedProcess> = new Map();
  private readonly draining: Set<ChildProcess> = new Set();
  private readonly maxProcesses: number;
  private readonly limits: ResourceLimits | null;
  private readonly killGraceMs: number;
  private readonly maxOutputBytes: number;
  private readonly env: NodeJS.ProcessEnv;
  private readonly logger: Logger;

  constructor(options: ProcessSupervisorOptions = {}) {
    this.maxProcesses = options.maxProcesses ?? DEFAULT_MAX_PROCESSES;
    this.limits = options.limits ?? null;
    this.killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;
    this.maxOutputBytes = options.maxOutputBytes ?? DEFAULT_MAX_OUTPUT_BYTES;
    this.env = options.env ?? process.env;
    this.logger = (options.logger ?? NOOP_LOGGER).child('supervisor');
  }

  get limit(): number {
    return this.maxProcesses;
  }

  /** Number of live tracked children, after pruning exited ones. */
  activeCount(): number {
    this.prune();
    return this.tracked.size;
  }

  /** Pids and command paths of the live tracked children. */
  list(): ReadonlyArray<{ readonly pid: number; readonly command: string }> {
    this.prune();
    return Array.from(this.tracked.entries()).map(([pid, p]) => ({ pid, command: p.command }));
  }

  run(path: string, args: ReadonlyArray<string>, options: RunOptions): Promise<RunOutcome> {
    this.prune();
    if (this.tracked.size >= this.maxProcesses) {
      this.logger.warn(`Process limit reached (${this.tracked.size}/${this.maxProcesses}), refusing ${path}`);
      return Promise.resolve({ kind: 'refused', active: this.tracked.size, limit: this.maxProcesses });
    }
    if (options.signal?.aborted === true) {
      return Promise.resolve({ kind: 'aborted', stdout: '', stderr: '' });
    }

    const { file, args: argv } =
      this.limits === null ? { file: path, args } : buildLimitedArgv(path, args, this.limits, options.timeoutMs);

    return new Promise<RunOutcome>((resolve, reject) => {
      const child = spawn(file, [...argv], {
        env: this.env,
        stdio: [options.input === undefined ? 'ignore' : 'pipe', 'pipe', 'pipe'],
      });

      const stdout = new CappedBuffer(this.maxOutputBytes);
      const stderr = new CappedBuffer(this.maxOutputBytes);
      let stopReason: StopReason | null = null;
      let escalation: NodeJS.Timeout | undefined;
      let settled = false;

      const stop = (reason: StopReason): void => {
        if (stopReason !== null || !isRunning(child)) return;
        stopReason = reason;
        this.logger.warn(`Stopping ${path} (pid ${child.pid ?? '?'}): ${reason}`);
        child.kill('SIGTERM');
        escalation = setTimeout(() => {
          if (isRunning(child)) {
            this.logger.warn(`Process ${child.pid ?? '?'} ignored SIGTERM, sending SIGKILL`);
            child.kill('SIGKILL');
          }
        }, this.killGraceMs);
      };

      const timer = setTimeout(() => { stop('timeout'); }, options.timeoutMs);
      const onAbort = (): void => { stop('aborted'); };
      options.signal?.addEventListener('abort', onAbort, { once: true });

      const finish = (): void => {
        settled = true;
        clearTimeout(timer);
        if (escalation !== undefined) clearTimeout(escalation);
        options.signal?.removeEventListener('abort', onAbort);
        if (child.pid !== undefined) this.tracked.delete(child.pid);
        this.prune();
      };

      if (child.pid !== undefined) {
        this.tracked.set(child.pid, {
          child,
          command: path,
          markStopped: (reason) => {
            if (stopReason === null) stopReason = reason;
          },
        });
      }

      child.stdout?.on('data', (chunk: Buffer) => { stdout.push(chunk); });
      child.stderr?.on('data', (chunk: Buffer) => { stderr.push(chunk); });

      if (options.input !== undefined && child.stdin !== null) {
        child.stdin.on('error', (err: Error) => {
          this.logger.debug(`stdin closed early for ${path}: ${err.message}`);
        });
        child.stdin.end(options.input);
      }

      child.on('error', (err: Error) => {
        if (settled) return;
        finish();
        reject(err);
      });

      child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
        if (settled) return;
        finish();
        const out = stdout.toString();
        const err = stderr.toString();
        if (stopReason !== null) {
          resolve({ kind: stopReason, stdout: out, stderr: err });
          return;
        }
        resolve({
          kind: 'exited',
          exitCode: exitCodeFor(code, signal),
          stdout: out,
          stderr: err,
          truncated: stdout.truncated || stderr.truncated,
        });
      });
    });
  }

  /**
   * Terminate every tracked child. Synchronous: sends SIGTERM, schedules an
   * unref'd SIGKILL escalation and empties the tracked set before returning.
   *
   * @returns The number of children signalled
   */
  cleanupAll(): number {
    this.prune();
    const victims = Array.from(this.tracked.values());
    this.tracked.clear();

    for (const p of victims) {
      p.markStopped('aborted');
      this.draining.add(p.child);
      p.child.once('exit', () => { this.draining.delete(p.child); });
      p.child.kill('SIGTERM');
    }

    if (victims.length > 0) {
      this.logger.info(`Terminated ${victims.length} tracked process(es)`);
      const escalation = setTimeout(() => {
        for (const p of victims) {
          if (isRunning(p.child)) p.child.kill('SIGKILL');
        }
      }, this.killGraceMs);
      escalation.unref();
    }
    return victims.length;
  }

  /** cleanupAll(), then wait until every signalled child has exited. */
  async shutdown(): Promise<void> {
    this.cleanupAll();
    const pending = Array.from(this.draining).filter(isRunning);
    await Promise.all(
      pending.map((child) => new Promise<void>((resolve) => {
        if (!isRunning(child)) {
          resolve();
          return;
        }
        child.once('exit', () => { resolve(); });
      })),
    );
    this.draining.clear();
  }

  private prune(): void {
    for (const [pid, p] of this.tracked) {
      if (!isRunning(p.child)) this.tracked.delete(pid);
    }
  }
}
