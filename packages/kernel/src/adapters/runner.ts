/**
 * Cyberdeck Kernel — Process Runner Interface
 *
 * The injection point between the command gate and the OS. The kernel never
 * spawns processes itself; the runtime host provides the supervisor that
 * implements this contract.
 *
 * Runner contract:
 * - `path` is an absolute binary path and `args` a validated argument vector.
 *   Implementations must never build a shell string from them.
 * - A `timeout` or `aborted` outcome is reported only after the child has
 *   been reaped.
 * - `refused` means nothing was spawned (the process cap was reached).
 * - Spawn failures reject the returned promise.
 */

export interface RunOptions {
  /** Wall-clock limit in milliseconds. */
  readonly timeoutMs: number;
  /** Written to the child's stdin, which is then closed. */
  readonly input?: string | undefined;
  /** Aborting kills the child through the terminate path. */
  readonly signal?: AbortSignal | undefined;
}

export type RunOutcome =
  | {
      readonly kind: 'exited';
      readonly exitCode: number;
      readonly stdout: string;
      readonly stderr: string;
      /** True if output beyond the capture limit was dropped. */
      readonly truncated: boolean;
    }
  | { readonly kind: 'timeout'; readonly stdout: string; readonly stderr: string }
  | { readonly kind: 'aborted'; readonly stdout: string; readonly stderr: string }
  | { readonly kind: 'refused'; readonly active: number; readonly limit: number };

export interface ProcessRunner {
  run(path: string, args: ReadonlyArray<string>, options: RunOptions): Promise<RunOutcome>;
}
