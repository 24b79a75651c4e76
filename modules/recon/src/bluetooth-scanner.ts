/**
 * Cyberdeck Recon — Bluetooth Scanner
 *
 * A timed discovery (`bluetoothctl --timeout 5 scan on`) followed by
 * `bluetoothctl devices`, which lists what the controller now knows.
 */

import { NOOP_LOGGER } from '@cyberdeck/kernel';
import type { CommandGate, Logger } from '@cyberdeck/kernel';
import type { ReconDeps } from './deps.js';
import { CommandFailedError } from './errors.js';

export interface BluetoothDevice {
  readonly mac: string;
  readonly name: string;
}

const DEVICE_LINE = /^Device\s+((?:[0-9A-Fa-f]{2}:){5}[0-9A-Fa-f]{2})(?:\s+(.*))?$/;

/** Parse `Device AA:BB:CC:DD:EE:FF Name` lines; other lines are ignored. */
export function parseBluetoothDevices(stdout: string): ReadonlyArray<BluetoothDevice> {
  const devices: BluetoothDevice[] = [];
  for (const line of stdout.split('\n')) {
    const match = DEVICE_LINE.exec(line.trim());
    const mac = match?.[1];
    if (mac === undefined) continue;
    devices.push({ mac: mac.toUpperCase(), name: match?.[2]?.trim() || mac.toUpperCase() });
  }
  return devices;
}

export class BluetoothScanner {
  private readonly gate: CommandGate;
  private readonly logger: Logger;

  constructor(options: ReconDeps) {
    this.gate = options.gate;
    this.logger = (options.logger ?? NOOP_LOGGER).child('bluetooth');
  }

  /** @throws {CommandFailedError} If the device listing fails */
  async scan(signal?: AbortSignal): Promise<ReadonlyArray<BluetoothDevice>> {
    const discovery = await this.gate.execute('bluetoothctl', ['--timeout', '5', 'scan', 'on'], {
      timeoutMs: 8_000,
      signal,
    });
    if (discovery.exitCode !== 0) {
      this.logger.warn(`Discovery ended with code ${discovery.exitCode}: ${discovery.stderr.trim()}`);
    }

    const listing = await this.gate.execute('bluetoothctl', ['devices'], { timeoutMs: 5_000, signal });
    if (listing.exitCode !== 0) {
      throw new CommandFailedError('bluetoothctl', listing);
    }
    const devices = parseBluetoothDevices(listing.stdout);
    this.logger.info(`Bluetooth scan complete: ${devices.length} devices`);
    return devices;
  }
}
