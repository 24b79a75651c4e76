/**
 * Shared fixtures for the CLI tests: a deck over a temporary home whose
 * runner answers from a script, and an output that records plain lines.
 */

import { mkdtempSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { basename } from 'node:path';
import { SUDO_PATH } from '@cyberdeck/kernel';
import type { ProcessRunner, RunOptions, RunOutcome } from '@cyberdeck/kernel';
import { parseSettings } from '@cyberdeck/runtime-host';
import { openDeck } from '../src/deck.js';
import type { Deck } from '../src/deck.js';
import type { CliOutput } from '../src/commands/index.js';

export type Responder = (args: ReadonlyArray<string>, options: RunOptions) => Promise<RunOutcome>;

export function exited(stdout: string, exitCode = 0): Responder {
  return () => Promise.resolve({ kind: 'exited', exitCode, stdout, stderr: '', truncated: false });
}

/** Keeps running until the call's signal aborts. */
export const untilAborted: Responder = (_args, { signal }) =>
  new Promise<RunOutcome>((resolve) => {
    const done = (): void => resolve({ kind: 'aborted', stdout: '', stderr: '' });
    if (signal === undefined) return;
    if (signal.aborted) done();
    else signal.addEventListener('abort', done, { once: true });
  });

/** Answers by binary name, with sudo unwrapped. */
export class FakeRunner implements ProcessRunner {
  readonly calls: Array<{ name: string; args: ReadonlyArray<string> }> = [];
  private readonly script = new Map<string, Responder>();

  on(name: string, responder: Responder): this {
    this.script.set(name, responder);
    return this;
  }

  run(path: string, args: ReadonlyArray<string>, options: RunOptions): Promise<RunOutcome> {
    let name = basename(path);
    let rest = [...args];
    if (path === SUDO_PATH) {
      const split = args.indexOf('--');
      name = basename(args[split + 1] ?? '');
      rest = args.slice(split + 2);
    }
    this.calls.push({ name, args: rest });
    const responder = this.script.get(name);
    if (responder === undefined) return Promise.reject(new Error(`no scripted response for ${name}`));
    return responder(rest, options);
  }
}

const ANSI = /\u001b\[[0-9;]*m/g;

export class CapturedOutput implements CliOutput {
  readonly lines: string[] = [];
  text = '';

  line(text = ''): void {
    this.lines.push(text.replace(ANSI, ''));
  }

  write(text: string): void {
    this.text += text.replace(ANSI, '');
  }
}

export interface TestDeckOptions {
  readonly home?: string | undefined;
  readonly persistLogs?: boolean | undefined;
}

export function testDeck(options: TestDeckOptions = {}): { deck: Deck; runner: FakeRunner; home: string } {
  const runner = new FakeRunner();
  const home = options.home ?? mkdtempSync(`${tmpdir()}/cyberdeck-cli-`);
  const deck = openDeck({
    home,
    env: {},
    settings: parseSettings({ logging: { console: false } }),
    persistLogs: options.persistLogs ?? false,
    runner,
    probe: { missing: () => [] },
    now: () => 1_000_000,
  });
  return { deck, runner, home };
}
