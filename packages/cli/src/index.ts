/**
 * @cyberdeck/cli
 *
 * Programmatic surface of the CLI: open a deck, build the command program,
 * run one command line, or drive the shell session from code.
 */

export type { Deck, OpenDeckOptions } from './deck.js';
export { openDeck } from './deck.js';

export type { CliOutput, CliSession, SecretPrompt, ToolLauncher, ToolRequest } from './commands/index.js';
export {
  CLI_VERSION,
  buildProgram,
  consoleOutput,
  createInlineLauncher,
  renderRun,
  reportError,
} from './commands/index.js';

export type { RunOnceOptions } from './main.js';
export { runOnce } from './main.js';

export type { ShellSession, ShellSessionOptions } from './tui/shell.js';
export { createShellSession, launchShell } from './tui/shell.js';
export { splitCommandLine } from './tui/tokenize.js';
