/**
 * Cyberdeck Recon — Service Wiring
 *
 * Builds every recon service over one deck context, sized from its settings.
 */

import type { DeckContext } from '@cyberdeck/runtime-host';
import { ArpSpoofer } from './arp-spoofer.js';
import { BluetoothScanner } from './bluetooth-scanner.js';
import { NetworkMapper } from './network-mapper.js';
import { PortScanner } from './port-scanner.js';
import { PowerControl } from './power.js';
import { WifiScanner } from './wifi-scanner.js';
import { Deauth, MonitorMode } from './wireless.js';

export interface ReconInterfaces {
  readonly defaultInterface: string;
  readonly wirelessInterface: string;
  readonly monitorInterface: string;
}

export interface ReconServices {
  readonly scanner: PortScanner;
  readonly mapper: NetworkMapper;
  readonly spoofer: ArpSpoofer;
  readonly wifi: WifiScanner;
  readonly monitor: MonitorMode;
  readonly deauth: Deauth;
  readonly bluetooth: BluetoothScanner;
  readonly power: PowerControl;
  readonly interfaces: ReconInterfaces;
  /** Default port range for scans. */
  readonly defaultPorts: string;
}

export function createReconServices(ctx: DeckContext): ReconServices {
  const { tools, network } = ctx.settings;
  const deps = { gate: ctx.gate, audit: ctx.audit, logger: ctx.logger, now: ctx.now };

  return {
    scanner: new PortScanner({
      ...deps,
      cacheSize: tools.scanCacheSize,
      cacheTtlMs: tools.scanCacheTtlMs,
      minScanIntervalMs: tools.minScanIntervalMs,
      timeoutMs: tools.defaultTimeoutMs,
    }),
    mapper: new NetworkMapper({
      ...deps,
      defaultNetwork: network.defaultNetwork,
      cacheSize: tools.hostCacheSize,
      cacheMaxBytes: tools.hostCacheMaxBytes,
      cacheTtlMs: tools.hostCacheTtlMs,
      timeoutMs: tools.defaultTimeoutMs,
    }),
    spoofer: new ArpSpoofer(deps),
    wifi: new WifiScanner(deps),
    monitor: new MonitorMode(deps),
    deauth: new Deauth({ ...deps, monitorInterface: network.monitorInterface }),
    bluetooth: new BluetoothScanner(deps),
    power: new PowerControl(deps),
    interfaces: {
      defaultInterface: network.defaultInterface,
      wirelessInterface: network.wirelessInterface,
      monitorInterface: network.monitorInterface,
    },
    defaultPorts: tools.portScanDefaultPorts,
  };
}
