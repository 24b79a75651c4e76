/**
 * Cyberdeck Kernel — Command Gate Tests
 *
 *   GATE-U1: unknown command rejects with SecurityError and runs nothing
 *   GATE-U2: rejected argument rejects with SecurityError and runs nothing
 *   GATE-U3: accepted call runs the canonical path with the argument vector
 *   GATE-U4: runner timeout becomes exit code 124 with an explanatory stderr
 *   GATE-U5: runner failure becomes exit code 1 with the error text
 *   GATE-U6: supervisor refusal becomes exit code 1 with status 'busy'
 *   GATE-U7: every outcome is audited with cmd, args and status
 *   GATE-U8: privileged calls go through sudo; the token goes to stdin only
 *   GATE-U9: the whitelist is reached only through execute()
 *
 * The runner is an in-process stub that records calls. No process is spawned.
 */

import { describe, it, expect } from 'vitest';
import * as kernel from '../src/index.js';
import {
  AuditLogger,
  CommandGate,
  SecurityError,
  SudoTokenManager,
} from '../src/index.js';
import type {
  AuditEvent,
  AuditSink,
  ProcessRunner,
  RunOptions,
  RunOutcome,
} from '../src/index.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

interface RecordedRun {
  readonly path: string;
  readonly args: ReadonlyArray<string>;
  readonly options: RunOptions;
}

class StubRunner implements ProcessRunner {
  readonly calls: RecordedRun[] = [];

  constructor(private readonly respond: () => Promise<RunOutcome>) {}

  run(path: string, args: ReadonlyArray<string>, options: RunOptions): Promise<RunOutcome> {
    this.calls.push({ path, args: [...args], options });
    return this.respond();
  }
}

class RecordingSink implements AuditSink {
  readonly events: AuditEvent[] = [];
  append(event: AuditEvent): void {
    this.events.push(event);
  }
}

const exited = (stdout: string, exitCode = 0): (() => Promise<RunOutcome>) =>
  () => Promise.resolve({ kind: 'exited', exitCode, stdout, stderr: '', truncated: false });

function makeGate(runner: ProcessRunner, sudo?: SudoTokenManager) {
  const sink = new RecordingSink();
  const audit = new AuditLogger(sink, () => 0);
  const gate = new CommandGate({ runner, audit, sudo });
  return { gate, sink };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('CommandGate', () => {
  it('GATE-U1: unknown command is refused before any process runs', async () => {
    const runner = new StubRunner(exited(''));
    const { gate, sink } = makeGate(runner);

    await expect(gate.execute('rm', ['-rf', '/'])).rejects.toBeInstanceOf(SecurityError);
    await expect(gate.execute('sh', ['-c', 'id'])).rejects.toMatchObject({ code: 'UNKNOWN_COMMAND' });

    expect(runner.calls).toHaveLength(0);
    expect(sink.events[0]?.details).toEqual({
      cmd: 'rm',
      args: ['-rf', '/'],
      status: 'blocked_not_whitelisted',
    });
  });

  it('GATE-U2: an argument that is neither a flag nor a valid target is refused', async () => {
    const runner = new StubRunner(exited(''));
    const { gate, sink } = makeGate(runner);

    await expect(gate.execute('nmap', ['-F', '1.2.3.4; rm -rf /'])).rejects.toMatchObject({
      code: 'INVALID_ARGUMENT',
      command: 'nmap',
      argument: '1.2.3.4; rm -rf /',
    });
    await expect(gate.execute('nmap', ['-sV', '10.0.0.1'])).rejects.toBeInstanceOf(SecurityError);
    // reboot accepts no arguments at all.
    await expect(gate.execute('reboot', ['now'])).rejects.toBeInstanceOf(SecurityError);

    expect(runner.calls).toHaveLength(0);
    expect(sink.events[0]?.details).toEqual({
      cmd: 'nmap',
      args: ['-F', '1.2.3.4; rm -rf /'],
      status: 'blocked_invalid_arg',
      invalid_arg: '1.2.3.4; rm -rf /',
    });
    expect(sink.events[0]?.level).toBe('WARNING');
  });

  it('GATE-U3: runs the canonical absolute path with the validated argv', async () => {
    const runner = new StubRunner(exited('22/tcp open ssh\n'));
    const { gate } = makeGate(runner);

    const result = await gate.execute('nmap', ['-p', '1-1024', '-Pn', '-T4', '192.168.1.10']);

    expect(result).toEqual({ stdout: '22/tcp open ssh\n', stderr: '', exitCode: 0 });
    expect(Object.isFrozen(result)).toBe(true);
    expect(runner.calls).toHaveLength(1);
    expect(runner.calls[0]?.path).toBe('/usr/bin/nmap');
    expect(runner.calls[0]?.args).toEqual(['-p', '1-1024', '-Pn', '-T4', '192.168.1.10']);
    expect(runner.calls[0]?.options.timeoutMs).toBe(30_000);
    expect(runner.calls[0]?.options.input).toBeUndefined();
  });

  it('GATE-U4: a timed-out command yields exit code 124', async () => {
    const runner = new StubRunner(() => Promise.resolve({ kind: 'timeout', stdout: 'partial', stderr: '' }));
    const { gate, sink } = makeGate(runner);

    const result = await gate.execute('nmap', ['-F', '10.0.0.0/24'], { timeoutMs: 5_000 });

    expect(result).toEqual({ stdout: '', stderr: 'Command timeout (5s)', exitCode: 124 });
    expect(runner.calls[0]?.options.timeoutMs).toBe(5_000);
    expect(sink.events[0]?.details).toEqual({
      cmd: 'nmap',
      args: ['-F', '10.0.0.0/24'],
      status: 'timeout',
      timeout_sec: 5,
    });
  });

  it('GATE-U5: a runner failure is reported as data, not thrown', async () => {
    const runner = new StubRunner(() => Promise.reject(new Error('spawn /usr/bin/nmap ENOENT')));
    const { gate, sink } = makeGate(runner);

    const result = await gate.execute('nmap', ['-F', '10.0.0.1']);

    expect(result).toEqual({ stdout: '', stderr: 'spawn /usr/bin/nmap ENOENT', exitCode: 1 });
    expect(sink.events[0]?.details).toEqual({
      cmd: 'nmap',
      args: ['-F', '10.0.0.1'],
      status: 'error',
      error: 'spawn /usr/bin/nmap ENOENT',
    });
    expect(sink.events[0]?.level).toBe('ERROR');
  });

  it('GATE-U6: a supervisor refusal is reported as busy', async () => {
    const runner = new StubRunner(() => Promise.resolve({ kind: 'refused', active: 10, limit: 10 }));
    const { gate, sink } = makeGate(runner);

    const result = await gate.execute('ip', ['route', 'show', 'default']);

    expect(result).toEqual({ stdout: '', stderr: 'Process limit reached (10)', exitCode: 1 });
    expect(sink.events[0]?.details['status']).toBe('busy');
  });

  it('GATE-U7: success is audited with the exit code', async () => {
    const runner = new StubRunner(exited('', 3));
    const { gate, sink } = makeGate(runner);

    await gate.execute('bluetoothctl', ['devices']);

    expect(sink.events).toHaveLength(1);
    expect(sink.events[0]).toEqual({
      timestamp: '1970-01-01T00:00:00.000Z',
      level: 'INFO',
      event_type: 'COMMAND',
      details: { cmd: 'bluetoothctl', args: ['devices'], status: 'success', returncode: 3 },
    });
  });

  it('cancelled commands report exit code 130', async () => {
    const runner = new StubRunner(() => Promise.resolve({ kind: 'aborted', stdout: 'x', stderr: '' }));
    const { gate, sink } = makeGate(runner);

    const result = await gate.execute('arpspoof', ['-i', 'wlan0', '-t', '192.168.1.20', '192.168.1.1']);

    expect(result.exitCode).toBe(130);
    expect(result.stdout).toBe('x');
    expect(sink.events[0]?.details['status']).toBe('cancelled');
  });

  it('GATE-U8: privileged calls use sudo -S with the cached token on stdin', async () => {
    const runner = new StubRunner(exited(''));
    const sudo = new SudoTokenManager({ now: () => 0 });
    sudo.set('test-secret');
    const { gate, sink } = makeGate(runner, sudo);

    await gate.execute('reboot', [], { privileged: true });

    expect(runner.calls[0]?.path).toBe('/usr/bin/sudo');
    expect(runner.calls[0]?.args).toEqual(['-S', '-p', '', '--', '/usr/sbin/reboot']);
    expect(runner.calls[0]?.options.input).toBe('test-secret\n');
    expect(JSON.stringify(sink.events)).not.toContain('test-secret');
  });

  it('GATE-U8: privileged calls without a token use sudo -n', async () => {
    const runner = new StubRunner(exited(''));
    const { gate } = makeGate(runner, new SudoTokenManager());

    await gate.execute('shutdown', ['-h', 'now'], { privileged: true });

    expect(runner.calls[0]?.args).toEqual(['-n', '--', '/usr/sbin/shutdown', '-h', 'now']);
    expect(runner.calls[0]?.options.input).toBeUndefined();
  });

  it('GATE-U9: execute() is the only public entry to the whitelist', () => {
    const methods = Object.getOwnPropertyNames(CommandGate.prototype).sort();
    expect(methods).toEqual(['buildInvocation', 'constructor', 'execute', 'record']);
    expect(Object.keys(kernel).filter((name) => /whitelist|lookup/i.test(name))).toEqual(['COMMAND_WHITELIST']);
  });
});
