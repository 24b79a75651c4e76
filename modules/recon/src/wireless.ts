/**
 * Cyberdeck Recon — Monitor Mode and Deauthentication
 *
 * Both need root and run through sudo. The interface arguments are checked
 * by the gate against the whitelist's interface names.
 */

import { NOOP_LOGGER, ValidationError, validateBssid } from '@cyberdeck/kernel';
import type { AuditLogger, CommandGate, Logger } from '@cyberdeck/kernel';
import type { ReconDeps } from './deps.js';
import { CommandFailedError } from './errors.js';

function outputLines(stdout: string): ReadonlyArray<string> {
  return stdout.split('\n').map((l) => l.trimEnd()).filter((l) => l !== '');
}

// ---------------------------------------------------------------------------
// Monitor mode
// ---------------------------------------------------------------------------

export interface MonitorModeOptions extends ReconDeps {
  readonly timeoutMs?: number | undefined;
}

export class MonitorMode {
  private readonly gate: CommandGate;
  private readonly logger: Logger;
  private readonly timeoutMs: number;

  constructor(options: MonitorModeOptions) {
    this.gate = options.gate;
    this.logger = (options.logger ?? NOOP_LOGGER).child('monitor');
    this.timeoutMs = options.timeoutMs ?? 15_000;
  }

  /** `airmon-ng start <iface>`; returns airmon-ng's output lines. */
  start(iface = 'wlan0', signal?: AbortSignal): Promise<ReadonlyArray<string>> {
    return this.airmon('start', iface, signal);
  }

  /** `airmon-ng stop <iface>` */
  stop(iface = 'wlan0mon', signal?: AbortSignal): Promise<ReadonlyArray<string>> {
    return this.airmon('stop', iface, signal);
  }

  private async airmon(action: 'start' | 'stop', iface: string, signal?: AbortSignal): Promise<ReadonlyArray<string>> {
    const result = await this.gate.execute('airmon-ng', [action, iface], {
      timeoutMs: this.timeoutMs,
      privileged: true,
      signal,
    });
    if (result.exitCode !== 0) {
      throw new CommandFailedError('airmon-ng', result);
    }
    this.logger.info(`Monitor mode ${action} on ${iface}`);
    return outputLines(result.stdout);
  }
}

// ---------------------------------------------------------------------------
// Deauthentication
// ---------------------------------------------------------------------------

/** Burst sizes the deck offers. */
export const DEAUTH_COUNTS: ReadonlyArray<number> = [1, 5, 10];

export interface DeauthOptions extends ReconDeps {
  readonly monitorInterface?: string | undefined;
  readonly timeoutMs?: number | undefined;
}

export interface DeauthRequest {
  readonly bssid: string;
  readonly count?: number | undefined;
  readonly iface?: string | undefined;
}

export class Deauth {
  private readonly gate: CommandGate;
  private readonly audit: AuditLogger | undefined;
  private readonly logger: Logger;
  private readonly monitorInterface: string;
  private readonly timeoutMs: number;

  constructor(options: DeauthOptions) {
    this.gate = options.gate;
    this.audit = options.audit;
    this.logger = (options.logger ?? NOOP_LOGGER).child('deauth');
    this.monitorInterface = options.monitorInterface ?? 'wlan0mon';
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  /**
   * Send a burst of deauthentication frames to every client of `bssid`.
   *
   * @throws {ValidationError} Malformed BSSID or a count outside 1, 5, 10
   * @throws {CommandFailedError} If aireplay-ng does not exit cleanly
   */
  async run(request: DeauthRequest, signal?: AbortSignal): Promise<ReadonlyArray<string>> {
    const bssid = validateBssid(request.bssid, this.audit);
    const count = request.count ?? 5;
    if (!DEAUTH_COUNTS.includes(count)) {
      throw new ValidationError('count', String(count), `Deauth count must be one of ${DEAUTH_COUNTS.join(', ')}`);
    }
    const iface = request.iface ?? this.monitorInterface;

    this.logger.warn(`Deauth: ${count} frames to ${bssid} on ${iface}`);
    const result = await this.gate.execute(
      'aireplay-ng',
      ['--deauth', String(count), '-a', bssid, iface],
      { timeoutMs: this.timeoutMs, privileged: true, signal },
    );
    if (result.exitCode !== 0) {
      throw new CommandFailedError('aireplay-ng', result);
    }
    return outputLines(result.stdout);
  }
}
