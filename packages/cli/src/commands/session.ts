/**
 * Cyberdeck CLI — Command Session
 *
 * What every command needs: the deck, somewhere to print, a way to run a
 * tool, and a way to ask for the sudo password. The one-shot entry point
 * runs tools inline; the shell runs them as background jobs.
 */

import { CommanderError } from 'commander';
import { errorMessage, isSecurityError, isValidationError } from '@cyberdeck/kernel';
import { ConfigError } from '@cyberdeck/runtime-host';
import type { ToolParams, ToolRunResult } from '@cyberdeck/tool-registry';
import type { Deck } from '../deck.js';
import { t } from '../tui/theme.js';

export interface CliOutput {
  /** Print one line. */
  line(text?: string): void;
  /** Print raw text (Commander help and errors). */
  write(text: string): void;
}

/** Prints through console.log. */
export const consoleOutput: CliOutput = {
  line: (text = '') => {
    // eslint-disable-next-line no-console
    console.log(text);
  },
  write: (text) => {
    process.stdout.write(text);
  },
};

export interface ToolRequest {
  readonly toolId: string;
  readonly params?: ToolParams | undefined;
  /** Shown in job listings, e.g. `scan 10.0.0.5`. */
  readonly label: string;
}

export type ToolLauncher = (request: ToolRequest) => Promise<void>;

/** Reads a secret without echoing it. */
export type SecretPrompt = (prompt: string) => Promise<string>;

export interface CliSession {
  readonly deck: Deck;
  readonly out: CliOutput;
  readonly launch: ToolLauncher;
  readonly askSecret: SecretPrompt;
}

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

/**
 * Print a finished tool run.
 *
 * @returns true if the run completed
 */
export function renderRun(out: CliOutput, label: string, run: ToolRunResult): boolean {
  switch (run.status) {
    case 'completed':
      for (const line of run.output.lines) out.line(line);
      out.line(t.dim(`${label} finished in ${(run.durationMs / 1000).toFixed(1)}s`));
      return true;
    case 'failed':
      out.line(t.red(`[FAILED] ${label}: ${run.error}`));
      return false;
    case 'unavailable':
      out.line(t.amber(
        run.reason === 'disabled'
          ? `[UNAVAILABLE] ${label}: tool is disabled (missing dependencies?)`
          : `[UNAVAILABLE] ${label}: no such tool`,
      ));
      return false;
  }
}

/**
 * The error boundary of the CLI. Refusals and bad input become status
 * lines; anything else is reported as an error.
 *
 * @returns the process exit code for the error
 */
export function reportError(out: CliOutput, err: unknown): number {
  if (err instanceof CommanderError) {
    // Commander has already printed its message.
    return err.exitCode;
  }
  if (isSecurityError(err)) {
    out.line(t.red(`[BLOCKED] ${err.message}`));
    return 3;
  }
  if (isValidationError(err)) {
    out.line(t.amber(`[INVALID] ${err.message}`));
    return 2;
  }
  if (err instanceof ConfigError) {
    out.line(t.red(err.message));
    return 2;
  }
  out.line(t.red(`[ERROR] ${errorMessage(err)}`));
  return 1;
}

// ---------------------------------------------------------------------------
// Inline launcher
// ---------------------------------------------------------------------------

export interface InlineLauncher {
  readonly launch: ToolLauncher;
  /** Runs that did not complete. */
  failures(): number;
}

/** Runs each tool to completion before returning. */
export function createInlineLauncher(deck: Deck, out: CliOutput, signal: AbortSignal): InlineLauncher {
  let failed = 0;
  return {
    launch: async ({ toolId, params, label }) => {
      const run = await deck.registry.execute(toolId, params ?? {}, signal);
      if (!renderRun(out, label, run)) failed++;
    },
    failures: () => failed,
  };
}
