/**
 * Cyberdeck Kernel — Command Types
 *
 * Defines the whitelist entry shape, the argument classification produced by
 * the validators, and the execution result returned by the command gate.
 */

// ---------------------------------------------------------------------------
// Argument Kinds
// ---------------------------------------------------------------------------

/**
 * Structural argument kinds a whitelist entry may accept in lieu of a
 * literal token. Each kind has exactly one dedicated validator.
 */
export enum ArgumentKind {
  /** IPv4 address with optional `/N` prefix length. */
  IpOrCidr = 'ip-cidr',
  /** `80`, `1-1000`, `21,22,80,443`. */
  PortRange = 'port-range',
  /** DNS hostname (letters, digits, hyphens, dot-separated labels). */
  Hostname = 'hostname',
  /** Six hex pairs separated by `:` or `-` (MAC / BSSID). */
  MacAddress = 'mac-address',
}

/**
 * The classification of a single argument against a whitelist entry.
 * `flag` means the argument matched a literal token exactly.
 */
export type ArgumentClass =
  | { readonly kind: 'flag' }
  | { readonly kind: ArgumentKind }
  | { readonly kind: 'rejected' };

// ---------------------------------------------------------------------------
// Whitelist Entry
// ---------------------------------------------------------------------------

/**
 * Static record for one allowed tool.
 *
 * Invariant: every argument passed to `path` equals a member of `flags` or
 * passes the validator of one of the `targets` kinds.
 */
export interface WhitelistEntry {
  /** Canonical absolute binary path. The raw command name never reaches the OS. */
  readonly path: string;
  /** Literal tokens accepted verbatim. */
  readonly flags: ReadonlySet<string>;
  /** Structural kinds accepted in lieu of a literal, checked in order. */
  readonly targets: ReadonlyArray<ArgumentKind>;
}

// ---------------------------------------------------------------------------
// Execution Result
// ---------------------------------------------------------------------------

/**
 * The outcome of one OS process invocation.
 *
 * Created once per invocation, frozen, and never retried automatically.
 * Timeouts surface as exit code 124; any other execution failure as exit code 1.
 */
export interface ExecutionResult {
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number;
}

/** Exit code reported when the wall-clock timeout fired. */
export const EXIT_TIMEOUT = 124;

/** Exit code reported for spawn failures and supervisor refusals. */
export const EXIT_FAILURE = 1;

/** Exit code reported when the caller cancelled a running command. */
export const EXIT_CANCELLED = 130;

/**
 * Status tag written to the audit log for each gate outcome.
 */
export enum CommandStatus {
  BlockedNotWhitelisted = 'blocked_not_whitelisted',
  BlockedInvalidArg = 'blocked_invalid_arg',
  Success = 'success',
  Timeout = 'timeout',
  Error = 'error',
  Busy = 'busy',
  Cancelled = 'cancelled',
}

/** Build a frozen ExecutionResult. */
export function executionResult(stdout: string, stderr: string, exitCode: number): ExecutionResult {
  return Object.freeze({ stdout, stderr, exitCode });
}
