/**
 * Cyberdeck Runtime Host — Task Pool
 *
 * A fixed-width pool that runs blocking tool calls off the interactive
 * prompt. Tasks start in submission order; completion order is whatever the
 * underlying processes produce.
 *
 * Cancellation:
 * - cancel() removes a task that has not started yet.
 * - A running task is never interrupted in-process. kill() aborts the
 *   task's AbortSignal, which the command gate hands to the supervisor,
 *   which terminates the child.
 *
 * Task results are data (`TaskResult`), so an abandoned handle never
 * produces an unhandled rejection.
 */

export const DEFAULT_POOL_SIZE = 2;

/** How many finished tasks list() keeps for display. */
const FINISHED_HISTORY = 20;

export type TaskState = 'queued' | 'running' | 'completed' | 'failed' | 'cancelled';

export type TaskResult<T> =
  | { readonly status: 'completed'; readonly value: T }
  | { readonly status: 'failed'; readonly error: unknown }
  | { readonly status: 'cancelled' };

export interface TaskSnapshot {
  readonly id: number;
  readonly label: string;
  readonly state: TaskState;
  readonly submittedAt: number;
  readonly startedAt: number | null;
  readonly finishedAt: number | null;
}

export interface TaskHandle<T> {
  readonly id: number;
  readonly label: string;
  readonly state: TaskState;
  /** Settles once; never rejects. */
  readonly result: Promise<TaskResult<T>>;
  /** Remove the task if it has not started. */
  cancel(): boolean;
  /** Abort the signal of a running task. */
  kill(): boolean;
}

export type TaskFn<T> = (signal: AbortSignal) => Promise<T>;

interface PoolEntry {
  readonly id: number;
  readonly label: string;
  state: TaskState;
  readonly submittedAt: number;
  startedAt: number | null;
  finishedAt: number | null;
  readonly controller: AbortController;
  readonly start: () => void;
  readonly settleCancelled: () => void;
  readonly done: Promise<unknown>;
}

export class TaskPool {
  private readonly entries: Map<number, PoolEntry> = new Map();
  private readonly queue: PoolEntry[] = [];
  private running = 0;
  private nextId = 1;

  constructor(
    readonly size: number = DEFAULT_POOL_SIZE,
    private readonly now: () => number = () => Date.now(),
  ) {
    if (size < 1) throw new RangeError(`pool size must be at least 1, got ${size}`);
  }

  submit<T>(label: string, fn: TaskFn<T>): TaskHandle<T> {
    const id = this.nextId++;
    const controller = new AbortController();

    let settle: (result: TaskResult<T>) => void = () => undefined;
    const result = new Promise<TaskResult<T>>((resolve) => { settle = resolve; });

    const entry: PoolEntry = {
      id,
      label,
      state: 'queued',
      submittedAt: this.now(),
      startedAt: null,
      finishedAt: null,
      controller,
      start: () => {
        Promise.resolve().then(() => fn(controller.signal)).then(
          (value) => { this.finish(entry, 'completed'); settle({ status: 'completed', value }); },
          (error: unknown) => { this.finish(entry, 'failed'); settle({ status: 'failed', error }); },
        );
      },
      settleCancelled: () => { settle({ status: 'cancelled' }); },
      done: result,
    };

    this.entries.set(id, entry);
    this.queue.push(entry);
    this.pump();

    return {
      id,
      label,
      get state() { return entry.state; },
      result,
      cancel: () => this.cancel(id),
      kill: () => this.kill(id),
    };
  }

  /** Cancel a queued task. Returns false once it has started. */
  cancel(id: number): boolean {
    const entry = this.entries.get(id);
    if (entry === undefined || entry.state !== 'queued') return false;

    const index = this.queue.indexOf(entry);
    if (index !== -1) this.queue.splice(index, 1);
    entry.state = 'cancelled';
    entry.finishedAt = this.now();
    entry.settleCancelled();
    this.trimHistory();
    return true;
  }

  /** Abort the signal of a running task. Returns false if it is not running. */
  kill(id: number): boolean {
    const entry = this.entries.get(id);
    if (entry === undefined || entry.state !== 'running') return false;
    entry.controller.abort();
    return true;
  }

  get(id: number): TaskSnapshot | undefined {
    const entry = this.entries.get(id);
    return entry === undefined ? undefined : snapshot(entry);
  }

  list(): ReadonlyArray<TaskSnapshot> {
    return Array.from(this.entries.values()).map(snapshot);
  }

  get activeCount(): number {
    return this.running;
  }

  get queuedCount(): number {
    return this.queue.length;
  }

  /** Resolve once every submitted task has settled. */
  async drain(): Promise<void> {
    while (this.running > 0 || this.queue.length > 0) {
      await Promise.all(Array.from(this.entries.values()).map((e) => e.done));
    }
  }

  /** Cancel everything queued and abort everything running. */
  abortAll(): void {
    for (const entry of [...this.queue]) this.cancel(entry.id);
    for (const entry of this.entries.values()) {
      if (entry.state === 'running') entry.controller.abort();
    }
  }

  private pump(): void {
    while (this.running < this.size) {
      const entry = this.queue.shift();
      if (entry === undefined) return;
      entry.state = 'running';
      entry.startedAt = this.now();
      this.running++;
      entry.start();
    }
  }

  private finish(entry: PoolEntry, state: 'completed' | 'failed'): void {
    entry.state = state;
    entry.finishedAt = this.now();
    this.running--;
    this.trimHistory();
    this.pump();
  }

  private trimHistory(): void {
    const finished = Array.from(this.entries.values()).filter(
      (e) => e.state !== 'queued' && e.state !== 'running',
    );
    for (const entry of finished.slice(0, Math.max(0, finished.length - FINISHED_HISTORY))) {
      this.entries.delete(entry.id);
    }
  }
}

function snapshot(entry: PoolEntry): TaskSnapshot {
  return {
    id: entry.id,
    label: entry.label,
    state: entry.state,
    submittedAt: entry.submittedAt,
    startedAt: entry.startedAt,
    finishedAt: entry.finishedAt,
  };
}
