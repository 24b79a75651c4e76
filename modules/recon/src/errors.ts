/**
 * Cyberdeck Recon — Errors
 */

import { EXIT_CANCELLED } from '@cyberdeck/kernel';
import type { ExecutionResult } from '@cyberdeck/kernel';

/**
 * A gated command ran but did not succeed (non-zero exit, timeout,
 * cancellation). Thrown by the tool services so the registry records the
 * run as failed.
 */
export class CommandFailedError extends Error {
  override readonly name = 'CommandFailedError';

  constructor(
    readonly command: string,
    readonly result: ExecutionResult,
  ) {
    super(
      result.exitCode === EXIT_CANCELLED
        ? `${command} cancelled`
        : `${command} failed (code ${result.exitCode}): ${result.stderr.trim() || 'no output'}`,
    );
  }
}

