/**
 * Cyberdeck Kernel — Sudo Token Manager
 *
 * Holds the sudo password in memory only, for a bounded lifetime.
 *
 * Invariants:
 * - The token is never persisted and never written to a log.
 * - Expiry is lazy: get() checks the age and clears a stale token. There is
 *   no background timer.
 * - Value and timestamp are always updated together. Every method is
 *   synchronous, so on the single JavaScript thread no caller can observe
 *   one without the other.
 */

import type { AuditLogger } from '../logging/audit.js';
import type { Clock } from '../logging/audit.js';
import { systemClock } from '../logging/audit.js';

/** Default token lifetime: 15 minutes. */
export const DEFAULT_SUDO_TTL_SECONDS = 900;

interface CachedToken {
  readonly value: string;
  readonly storedAt: number;
}

export interface SudoTokenManagerOptions {
  readonly ttlSeconds?: number | undefined;
  readonly audit?: AuditLogger | undefined;
  readonly now?: Clock | undefined;
}

export class SudoTokenManager {
  private token: CachedToken | null = null;
  private readonly ttlMs: number;
  private readonly audit: AuditLogger | undefined;
  private readonly now: Clock;

  constructor(options: SudoTokenManagerOptions = {}) {
    this.ttlMs = (options.ttlSeconds ?? DEFAULT_SUDO_TTL_SECONDS) * 1000;
    this.audit = options.audit;
    this.now = options.now ?? systemClock;
  }

  /** Lifetime of a cached token, in seconds. */
  get ttlSeconds(): number {
    return this.ttlMs / 1000;
  }

  set(value: string): void {
    this.token = { value, storedAt: this.now() };
    this.audit?.log('SUDO', { action: 'token cached', timeout_sec: this.ttlSeconds });
  }

  /**
   * Return the cached token, or null if none is held or it has expired.
   * An expired token is cleared by this call.
   */
  get(): string | null {
    if (this.token === null) return null;

    const ageMs = this.now() - this.token.storedAt;
    const ageSec = ageMs / 1000;
    if (ageMs > this.ttlMs) {
      this.token = null;
      this.audit?.log('SUDO', { action: 'token expired', age_sec: ageSec });
      return null;
    }

    this.audit?.log('SUDO', { action: 'token retrieved', age_sec: ageSec });
    return this.token.value;
  }

  /**
   * Whether a live token is held. Not a retrieval: only expiry is audited,
   * so prompts and status displays may call it freely.
   */
  isCached(): boolean {
    if (this.token === null) return false;
    const ageMs = this.now() - this.token.storedAt;
    if (ageMs > this.ttlMs) {
      this.token = null;
      this.audit?.log('SUDO', { action: 'token expired', age_sec: ageMs / 1000 });
      return false;
    }
    return true;
  }

  /** Idempotent. Audits only when a token was actually held. */
  clear(reason = 'manual clear'): void {
    if (this.token === null) return;
    this.token = null;
    this.audit?.log('SUDO', { action: 'token cleared', reason });
  }

  /** Called by the owning context on teardown. */
  dispose(): void {
    this.clear('shutdown');
  }
}
