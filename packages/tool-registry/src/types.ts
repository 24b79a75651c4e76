/**
 * Cyberdeck Tool Registry — Types
 *
 * A tool is a named, categorised operation the operator can run from the
 * deck: a scan, an attack, a system action. Tools reach the OS only through
 * the kernel's CommandGate; the registry itself never spawns anything.
 */

export enum ToolCategory {
  Wifi = 'wifi',
  Network = 'network',
  Bluetooth = 'bluetooth',
  System = 'system',
  Exploit = 'exploit',
  Recon = 'recon',
  Custom = 'custom',
}

export enum ToolStatus {
  Idle = 'idle',
  Running = 'running',
  Completed = 'completed',
  Failed = 'failed',
}

/** Named string parameters passed from the CLI or shell to a tool. */
export type ToolParams = Readonly<Record<string, string | undefined>>;

/** What a tool hands back for display. */
export interface ToolOutput {
  /** Human-readable report, one entry per line. */
  readonly lines: ReadonlyArray<string>;
  /** Structured result for programmatic callers. */
  readonly data?: unknown;
}

/**
 * Runs the tool. Aborting `signal` must stop any child process the tool
 * started; the gate and supervisor do this when the signal is passed on.
 */
export type ToolHandler = (params: ToolParams, signal: AbortSignal) => Promise<ToolOutput>;

export interface ToolDefinition {
  /** Unique identifier, e.g. `port_scan`. */
  readonly id: string;
  /** Display name, e.g. `Port Scanner`. */
  readonly name: string;
  readonly category: ToolCategory;
  readonly icon: string;
  readonly description: string;
  readonly requiresRoot: boolean;
  readonly requiresNetwork: boolean;
  /** Whitelisted command names the tool needs installed. */
  readonly dependencies: ReadonlyArray<string>;
  readonly version: string;
  readonly handler: ToolHandler;
}

/** Produces a definition on first access. */
export type ToolLoader = () => ToolDefinition;

/**
 * Answers which of a tool's dependencies are not installed.
 * The runtime host supplies one that checks the whitelisted binaries.
 */
export interface DependencyProbe {
  missing(dependencies: ReadonlyArray<string>): ReadonlyArray<string>;
}

export interface ToolExecutionContext {
  readonly toolId: string;
  readonly status: ToolStatus;
  readonly startedAt: number;
  readonly endedAt: number | null;
  readonly error: string | null;
}

export type ToolRunResult =
  | { readonly status: 'completed'; readonly output: ToolOutput; readonly durationMs: number }
  | { readonly status: 'failed'; readonly error: string; readonly durationMs: number }
  | { readonly status: 'unavailable'; readonly reason: 'not_found' | 'disabled' };

export interface ToolStatistics {
  readonly totalTools: number;
  readonly enabledTools: number;
  readonly activeTools: number;
  readonly categories: number;
  readonly lazyLoaders: number;
  readonly toolsByCategory: Readonly<Partial<Record<ToolCategory, number>>>;
}
