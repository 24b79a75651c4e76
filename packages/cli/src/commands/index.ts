/**
 * commands/index.ts — Commander program, built fresh for each invocation.
 *
 * Used by:
 *   src/main.ts        (one-shot / CYBERDECK_NO_TUI path)
 *   src/tui/shell.ts   (one program per shell line)
 *
 * The program never calls process.exit(): exitOverride() turns Commander's
 * exits into CommanderError, which the caller's error boundary handles.
 */

import { Command } from 'commander';
import { registerSystemCommands } from './system.js';
import { registerToolCommands } from './tools.js';
import type { CliSession } from './session.js';

export const CLI_VERSION = '0.1.0';

export function buildProgram(session: CliSession): Command {
  const program = new Command();

  program
    .name('cyberdeck')
    .description(
      'Cyberdeck — whitelisted security tools behind one command gate.\n' +
      'Every command is validated, resource-bounded and written to the audit log.',
    )
    .version(CLI_VERSION)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => session.out.write(text),
      writeErr: (text) => session.out.write(text),
    });

  registerToolCommands(program, session);
  registerSystemCommands(program, session);

  return program;
}

export type { CliOutput, CliSession, SecretPrompt, ToolLauncher, ToolRequest } from './session.js';
export { consoleOutput, createInlineLauncher, renderRun, reportError } from './session.js';
