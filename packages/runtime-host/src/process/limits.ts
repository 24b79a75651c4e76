/**
 * Cyberdeck Runtime Host — Child Resource Limits
 *
 * Node's spawn() has no pre-exec hook, so RLIMIT_AS and RLIMIT_CPU are set
 * by running the command under util-linux `prlimit`, which applies the
 * limits and then execs the target in place. The child keeps the same pid,
 * so the supervisor's signals reach the tool itself.
 *
 * The CPU limit is the wall-clock timeout plus a buffer (soft) and plus
 * twice the buffer (hard): a runaway child is stopped by the kernel even if
 * the parent-side timer never fires.
 */

export interface ResourceLimits {
  /** Address-space ceiling (RLIMIT_AS) in MiB. */
  readonly maxMemoryMb: number;
  /** Seconds added to the timeout for the soft CPU limit; doubled for the hard limit. */
  readonly cpuBufferSeconds: number;
  /** Absolute path of the prlimit binary. */
  readonly prlimitPath: string;
}

export const DEFAULT_RESOURCE_LIMITS: ResourceLimits = {
  maxMemoryMb: 256,
  cpuBufferSeconds: 5,
  prlimitPath: '/usr/bin/prlimit',
};

export interface LimitedCommand {
  readonly file: string;
  readonly args: ReadonlyArray<string>;
}

/**
 * Wrap `path args` in a prlimit invocation.
 *
 * @example
 *   buildLimitedArgv('/usr/bin/nmap', ['-F', '10.0.0.1'], DEFAULT_RESOURCE_LIMITS, 30_000)
 *   // → /usr/bin/prlimit --as=268435456 --cpu=35:40 -- /usr/bin/nmap -F 10.0.0.1
 */
export function buildLimitedArgv(
  path: string,
  args: ReadonlyArray<string>,
  limits: ResourceLimits,
  timeoutMs: number,
): LimitedCommand {
  const timeoutSec = Math.ceil(timeoutMs / 1000);
  const soft = timeoutSec + limits.cpuBufferSeconds;
  const hard = timeoutSec + limits.cpuBufferSeconds * 2;
  const asBytes = limits.maxMemoryMb * 1024 * 1024;

  return {
    file: limits.prlimitPath,
    args: [`--as=${asBytes}`, `--cpu=${soft}:${hard}`, '--', path, ...args],
  };
}
