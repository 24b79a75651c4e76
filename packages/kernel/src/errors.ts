/**
 * Cyberdeck Kernel — Errors
 *
 * Only programmer or attacker mistakes are thrown: an unknown command, a
 * rejected argument, malformed user input. Environmental failures (a hung
 * or crashed process) are returned as data by the gate and never thrown.
 */

export type SecurityErrorCode = 'UNKNOWN_COMMAND' | 'INVALID_ARGUMENT';

/**
 * Raised by the command gate before anything is executed.
 */
export class SecurityError extends Error {
  override readonly name = 'SecurityError';

  constructor(
    readonly code: SecurityErrorCode,
    readonly command: string,
    readonly argument?: string,
  ) {
    super(
      code === 'UNKNOWN_COMMAND'
        ? `Command '${command}' not allowed`
        : `Argument '${argument ?? ''}' not allowed for '${command}'`,
    );
  }
}

/**
 * Raised for malformed user-supplied values (BSSID, scan target, file name).
 * Caught at the UI boundary and shown as a status line.
 */
export class ValidationError extends Error {
  override readonly name = 'ValidationError';

  constructor(
    readonly field: string,
    readonly value: string,
    message: string,
  ) {
    super(message);
  }
}

export function isSecurityError(err: unknown): err is SecurityError {
  return err instanceof SecurityError;
}

export function isValidationError(err: unknown): err is ValidationError {
  return err instanceof ValidationError;
}

/** Render any thrown value as a message string. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
