/**
 * Cyberdeck CLI — One-shot Mode
 *
 * Runs a single command line against an open deck, then shuts the deck
 * down. Ctrl+C aborts a running tool; the gate and supervisor kill its
 * process before the deck closes.
 */

import { buildProgram } from './commands/index.js';
import { consoleOutput, createInlineLauncher, reportError } from './commands/session.js';
import type { CliOutput, SecretPrompt } from './commands/session.js';
import type { Deck } from './deck.js';
import { readSecret } from './tui/secret.js';

export interface RunOnceOptions {
  readonly out?: CliOutput | undefined;
  readonly askSecret?: SecretPrompt | undefined;
  /** Aborting cancels the running tool. Default: Ctrl+C. */
  readonly signal?: AbortSignal | undefined;
}

/**
 * @param argv - User arguments, without the node and script paths
 * @returns the process exit code
 */
export async function runOnce(deck: Deck, argv: ReadonlyArray<string>, options: RunOnceOptions = {}): Promise<number> {
  const out = options.out ?? consoleOutput;

  let onSigint: (() => void) | null = null;
  let signal = options.signal;
  if (signal === undefined) {
    const controller = new AbortController();
    onSigint = () => controller.abort();
    process.once('SIGINT', onSigint);
    signal = controller.signal;
  }

  const inline = createInlineLauncher(deck, out, signal);
  const program = buildProgram({
    deck,
    out,
    launch: inline.launch,
    askSecret: options.askSecret ?? readSecret,
  });

  try {
    await program.parseAsync([...argv], { from: 'user' });
    return inline.failures() > 0 ? 1 : 0;
  } catch (err: unknown) {
    return reportError(out, err);
  } finally {
    if (onSigint !== null) process.off('SIGINT', onSigint);
    await deck.shutdown();
  }
}
