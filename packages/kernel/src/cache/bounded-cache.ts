/**
 * Cyberdeck Kernel — Bounded Result Cache
 *
 * A small ordered list of results, oldest first. Lookups are a linear scan;
 * the lists hold a handful of entries.
 *
 * Eviction:
 * - Staleness: an entry whose age reaches `ttlMs` is dropped by the get()
 *   that finds it.
 * - Capacity: put() trims from the front until the entry count AND the byte
 *   total are both within bounds.
 * - Nothing happens between calls. There are no timers.
 */

import type { Clock } from '../logging/audit.js';
import { systemClock } from '../logging/audit.js';

export interface BoundedCacheOptions<V> {
  /** Maximum number of entries. */
  readonly maxEntries: number;
  /** Maximum total size as reported by `sizeOf`. Unbounded when omitted. */
  readonly maxBytes?: number | undefined;
  /** Freshness window in milliseconds. Entries never go stale when omitted. */
  readonly ttlMs?: number | undefined;
  /** Size of a value in bytes. Defaults to the UTF-8 length of its JSON form. */
  readonly sizeOf?: ((value: V) => number) | undefined;
  /** Move an entry to the back on every hit (LRU rather than FIFO). */
  readonly refreshOnHit?: boolean | undefined;
  readonly now?: Clock | undefined;
}

export interface CacheStats {
  readonly entries: number;
  readonly bytes: number;
  readonly maxEntries: number;
  readonly maxBytes: number | null;
  readonly keys: ReadonlyArray<string>;
}

interface CacheEntry<V> {
  readonly key: string;
  readonly value: V;
  readonly size: number;
  storedAt: number;
}

function jsonSize(value: unknown): number {
  return new TextEncoder().encode(JSON.stringify(value) ?? '').byteLength;
}

export class BoundedCache<V> {
  private entries: CacheEntry<V>[] = [];
  private bytes = 0;
  private readonly sizeOf: (value: V) => number;
  private readonly now: Clock;

  constructor(private readonly options: BoundedCacheOptions<V>) {
    if (options.maxEntries < 1) {
      throw new RangeError(`maxEntries must be at least 1, got ${options.maxEntries}`);
    }
    this.sizeOf = options.sizeOf ?? jsonSize;
    this.now = options.now ?? systemClock;
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Return the fresh value for `key`, or undefined. A stale entry is removed.
   */
  get(key: string): V | undefined {
    const index = this.entries.findIndex((e) => e.key === key);
    if (index === -1) return undefined;

    const entry = this.entries[index];
    if (entry === undefined) return undefined;

    const { ttlMs } = this.options;
    if (ttlMs !== undefined && this.now() - entry.storedAt >= ttlMs) {
      this.removeAt(index);
      return undefined;
    }

    if (this.options.refreshOnHit === true) {
      this.entries.splice(index, 1);
      this.entries.push(entry);
    }
    return entry.value;
  }

  /**
   * Insert or replace `key`. Returns false, storing nothing, when the value
   * alone exceeds `maxBytes`.
   */
  put(key: string, value: V): boolean {
    const size = this.sizeOf(value);
    const { maxBytes } = this.options;
    if (maxBytes !== undefined && size > maxBytes) return false;

    this.delete(key);
    this.entries.push({ key, value, size, storedAt: this.now() });
    this.bytes += size;

    while (this.overCapacity()) {
      this.removeAt(0);
    }
    return true;
  }

  has(key: string): boolean {
    return this.get(key) !== undefined;
  }

  delete(key: string): boolean {
    const index = this.entries.findIndex((e) => e.key === key);
    if (index === -1) return false;
    this.removeAt(index);
    return true;
  }

  clear(): void {
    this.entries = [];
    this.bytes = 0;
  }

  stats(): CacheStats {
    return {
      entries: this.entries.length,
      bytes: this.bytes,
      maxEntries: this.options.maxEntries,
      maxBytes: this.options.maxBytes ?? null,
      keys: this.entries.map((e) => e.key),
    };
  }

  private overCapacity(): boolean {
    if (this.entries.length === 0) return false;
    const { maxEntries, maxBytes } = this.options;
    return this.entries.length > maxEntries || (maxBytes !== undefined && this.bytes > maxBytes);
  }

  private removeAt(index: number): void {
    const [removed] = this.entries.splice(index, 1);
    if (removed !== undefined) this.bytes -= removed.size;
  }
}
