/**
 * Shared fixtures for the recon tests: a scripted in-process runner behind a
 * real CommandGate, an in-memory audit log and a manual clock.
 */

import { basename } from 'node:path';
import { AuditLogger, CommandGate, SUDO_PATH } from '@cyberdeck/kernel';
import type { ProcessRunner, RunOptions, RunOutcome } from '@cyberdeck/kernel';
import { MemoryAuditSink } from '@cyberdeck/runtime-host';
import type { ReconDeps } from '../src/index.js';

export interface RecordedCall {
  /** Binary name, with sudo unwrapped. */
  readonly name: string;
  readonly args: ReadonlyArray<string>;
  readonly sudo: boolean;
  readonly options: RunOptions;
}

export type Responder = (call: RecordedCall) => Promise<RunOutcome>;

export function exited(stdout: string, exitCode = 0, stderr = ''): Promise<RunOutcome> {
  return Promise.resolve({ kind: 'exited', exitCode, stdout, stderr, truncated: false });
}

/** Stays running until the call's signal aborts. */
export function untilAborted(call: RecordedCall): Promise<RunOutcome> {
  return new Promise<RunOutcome>((resolve) => {
    const done = (): void => resolve({ kind: 'aborted', stdout: '', stderr: '' });
    const { signal } = call.options;
    if (signal === undefined) return;
    if (signal.aborted) done();
    else signal.addEventListener('abort', done, { once: true });
  });
}

export class ScriptedRunner implements ProcessRunner {
  readonly calls: RecordedCall[] = [];
  private readonly responders = new Map<string, Responder[]>();

  /** Queue responses for a binary; the last one repeats. */
  on(name: string, ...responders: Responder[]): this {
    this.responders.set(name, [...(this.responders.get(name) ?? []), ...responders]);
    return this;
  }

  callsTo(name: string): ReadonlyArray<RecordedCall> {
    return this.calls.filter((c) => c.name === name);
  }

  run(path: string, args: ReadonlyArray<string>, options: RunOptions): Promise<RunOutcome> {
    const call = unwrap(path, args, options);
    this.calls.push(call);
    const queue = this.responders.get(call.name) ?? [];
    const responder = queue.length > 1 ? queue.shift() : queue[0];
    if (responder === undefined) {
      return Promise.reject(new Error(`no scripted response for ${call.name}`));
    }
    return responder(call);
  }
}

function unwrap(path: string, args: ReadonlyArray<string>, options: RunOptions): RecordedCall {
  if (path !== SUDO_PATH) {
    return { name: basename(path), args: [...args], sudo: false, options };
  }
  const split = args.indexOf('--');
  return {
    name: basename(args[split + 1] ?? ''),
    args: args.slice(split + 2),
    sudo: true,
    options,
  };
}

export class ManualClock {
  constructor(public time = 1_000_000) {}
  readonly now = (): number => this.time;
  advance(ms: number): void {
    this.time += ms;
  }
}

export interface Harness extends ReconDeps {
  readonly gate: CommandGate;
  readonly audit: AuditLogger;
  readonly now: () => number;
  readonly runner: ScriptedRunner;
  readonly sink: MemoryAuditSink;
  readonly clock: ManualClock;
}

export function harness(runner = new ScriptedRunner()): Harness {
  const sink = new MemoryAuditSink();
  const clock = new ManualClock();
  const audit = new AuditLogger(sink, clock.now);
  const gate = new CommandGate({ runner, audit });
  return { gate, audit, now: clock.now, runner, sink, clock };
}
