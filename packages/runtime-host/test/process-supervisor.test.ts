/**
 * Cyberdeck Runtime Host — ProcessSupervisor Tests
 *
 *   PROC-U1: exit code, stdout and stderr of a normal child are captured
 *   PROC-U2: wall-clock timeout kills and reaps the child; nothing stays tracked
 *   PROC-U3: a child ignoring SIGTERM is killed with SIGKILL after the grace period
 *   PROC-U4: at the cap, run() is refused without spawning
 *   PROC-U5: cleanupAll() leaves zero tracked handles and running calls report 'aborted'
 *   PROC-U6: input is written to the child's stdin
 *   PROC-U7: output beyond the capture limit is dropped and flagged
 *   PROC-U8: spawn failure rejects; through the gate it becomes exit code 1
 *   PROC-U9: death by signal maps to 128 + signal number
 *   PROC-U10: gate + supervisor timeout yields exit code 124 with no handle left
 *   PROC-U11: prlimit argv carries the memory and CPU ceilings
 *
 * Children are the node binary running the tests (process.execPath) with
 * inline scripts. Resource limits are disabled: prlimit is not assumed present.
 */

import { describe, it, expect } from 'vitest';
import { CommandGate } from '@cyberdeck/kernel';
import type { WhitelistEntry } from '@cyberdeck/kernel';
import { ProcessSupervisor } from '../src/process/supervisor.js';
import { DEFAULT_RESOURCE_LIMITS, buildLimitedArgv } from '../src/process/limits.js';

const NODE = process.execPath;
const IDLE = 'setInterval(() => {}, 1000)';

function node(script: string): ReadonlyArray<string> {
  return ['-e', script];
}

function scriptEntry(script: string): WhitelistEntry {
  return { path: NODE, flags: new Set(['-e', script]), targets: [] };
}

describe('ProcessSupervisor', () => {
  it('PROC-U1: captures exit code and both streams', async () => {
    const supervisor = new ProcessSupervisor();
    const outcome = await supervisor.run(
      NODE,
      node("process.stdout.write('ok'); process.stderr.write('warn'); process.exit(3)"),
      { timeoutMs: 10_000 },
    );

    expect(outcome).toEqual({ kind: 'exited', exitCode: 3, stdout: 'ok', stderr: 'warn', truncated: false });
    expect(supervisor.activeCount()).toBe(0);
  });

  it('PROC-U2: timeout kills the child and untracks it', async () => {
    const supervisor = new ProcessSupervisor({ killGraceMs: 1_000 });
    const outcome = await supervisor.run(NODE, node(IDLE), { timeoutMs: 300 });

    expect(outcome.kind).toBe('timeout');
    expect(supervisor.activeCount()).toBe(0);
  });

  it('PROC-U3: escalates to SIGKILL when SIGTERM is ignored', async () => {
    const supervisor = new ProcessSupervisor({ killGraceMs: 200 });
    const started = Date.now();
    const outcome = await supervisor.run(
      NODE,
      node(`process.on('SIGTERM', () => {}); ${IDLE}`),
      { timeoutMs: 500 },
    );

    expect(outcome.kind).toBe('timeout');
    expect(Date.now() - started).toBeLessThan(10_000);
    expect(supervisor.activeCount()).toBe(0);
  });

  it('PROC-U4: refuses beyond the concurrency cap', async () => {
    const supervisor = new ProcessSupervisor({ maxProcesses: 1 });
    const controller = new AbortController();
    const first = supervisor.run(NODE, node(IDLE), { timeoutMs: 10_000, signal: controller.signal });

    expect(supervisor.activeCount()).toBe(1);
    const second = await supervisor.run(NODE, node(''), { timeoutMs: 10_000 });
    expect(second).toEqual({ kind: 'refused', active: 1, limit: 1 });

    controller.abort();
    expect((await first).kind).toBe('aborted');
    expect(supervisor.activeCount()).toBe(0);
  });

  it('PROC-U5: cleanupAll terminates every tracked child', async () => {
    const supervisor = new ProcessSupervisor({ maxProcesses: 5 });
    const runs = [
      supervisor.run(NODE, node(IDLE), { timeoutMs: 10_000 }),
      supervisor.run(NODE, node(IDLE), { timeoutMs: 10_000 }),
    ];
    expect(supervisor.activeCount()).toBe(2);

    expect(supervisor.cleanupAll()).toBe(2);
    expect(supervisor.activeCount()).toBe(0);

    const outcomes = await Promise.all(runs);
    expect(outcomes.map((o) => o.kind)).toEqual(['aborted', 'aborted']);
  });

  it('shutdown waits for signalled children to exit', async () => {
    const supervisor = new ProcessSupervisor();
    const run = supervisor.run(NODE, node(IDLE), { timeoutMs: 10_000 });

    await supervisor.shutdown();

    expect(supervisor.activeCount()).toBe(0);
    expect((await run).kind).toBe('aborted');
  });

  it('PROC-U6: writes input to stdin', async () => {
    const supervisor = new ProcessSupervisor();
    const outcome = await supervisor.run(NODE, node('process.stdin.pipe(process.stdout)'), {
      timeoutMs: 10_000,
      input: 'test-secret\n',
    });

    expect(outcome.kind === 'exited' ? outcome.stdout : null).toBe('test-secret\n');
  });

  it('PROC-U7: truncates output beyond maxOutputBytes', async () => {
    const supervisor = new ProcessSupervisor({ maxOutputBytes: 16 });
    const outcome = await supervisor.run(NODE, node("process.stdout.write('x'.repeat(100))"), {
      timeoutMs: 10_000,
    });

    expect(outcome).toEqual({ kind: 'exited', exitCode: 0, stdout: 'x'.repeat(16), stderr: '', truncated: true });
  });

  it('PROC-U8: spawn failure rejects and is reported as data by the gate', async () => {
    const supervisor = new ProcessSupervisor();
    await expect(
      supervisor.run('/nonexistent/cyberdeck-tool', [], { timeoutMs: 1_000 }),
    ).rejects.toThrow('ENOENT');
    expect(supervisor.activeCount()).toBe(0);

    const gate = new CommandGate({
      runner: supervisor,
      whitelist: new Map([['missing', { path: '/nonexistent/cyberdeck-tool', flags: new Set<string>(), targets: [] }]]),
    });
    const result = await gate.execute('missing', []);
    expect(result.exitCode).toBe(1);
    expect(result.stdout).toBe('');
    expect(result.stderr).toContain('ENOENT');
  });

  it('PROC-U9: a child killed by SIGKILL exits with 137', async () => {
    const supervisor = new ProcessSupervisor();
    const outcome = await supervisor.run(NODE, node("process.kill(process.pid, 'SIGKILL')"), {
      timeoutMs: 10_000,
    });

    expect(outcome.kind === 'exited' ? outcome.exitCode : null).toBe(137);
  });

  it('PROC-U10: gate timeout returns 124 and leaves nothing tracked', async () => {
    const supervisor = new ProcessSupervisor({ killGraceMs: 500 });
    const gate = new CommandGate({
      runner: supervisor,
      whitelist: new Map([['idle', scriptEntry(IDLE)]]),
    });

    const result = await gate.execute('idle', ['-e', IDLE], { timeoutMs: 300 });

    expect(result).toEqual({ stdout: '', stderr: 'Command timeout (0.3s)', exitCode: 124 });
    expect(supervisor.activeCount()).toBe(0);
  });
});

describe('buildLimitedArgv', () => {
  it('PROC-U11: wraps the command in prlimit with AS and CPU ceilings', () => {
    const limited = buildLimitedArgv('/usr/bin/nmap', ['-F', '10.0.0.1'], DEFAULT_RESOURCE_LIMITS, 30_000);
    expect(limited).toEqual({
      file: '/usr/bin/prlimit',
      args: ['--as=268435456', '--cpu=35:40', '--', '/usr/bin/nmap', '-F', '10.0.0.1'],
    });
  });

  it('rounds sub-second timeouts up', () => {
    const limited = buildLimitedArgv('/usr/sbin/reboot', [], { ...DEFAULT_RESOURCE_LIMITS, maxMemoryMb: 64 }, 1_500);
    expect(limited.args).toEqual(['--as=67108864', '--cpu=7:12', '--', '/usr/sbin/reboot']);
  });
});
