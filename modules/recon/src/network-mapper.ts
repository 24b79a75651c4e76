/**
 * Cyberdeck Recon — Network Mapper
 *
 * Default gateway detection and ping-sweep host discovery. Discovered host
 * lists are cached per network (3 networks, 256 KiB, 5 minutes, LRU).
 */

import {
  BoundedCache,
  NOOP_LOGGER,
  ValidationError,
  isValidIpOrCidr,
  isValidIpv4,
} from '@cyberdeck/kernel';
import type { AuditLogger, CommandGate, Logger } from '@cyberdeck/kernel';
import type { ReconDeps } from './deps.js';
import { CommandFailedError } from './errors.js';
import { parseHostDiscovery } from './nmap.js';

export const DEFAULT_NETWORK = '192.168.1.0/24';

export interface NetworkMapperOptions extends ReconDeps {
  readonly defaultNetwork?: string | undefined;
  readonly cacheSize?: number | undefined;
  readonly cacheMaxBytes?: number | undefined;
  readonly cacheTtlMs?: number | undefined;
  readonly timeoutMs?: number | undefined;
}

export interface HostDiscovery {
  readonly network: string;
  readonly hosts: ReadonlyArray<string>;
  readonly cached: boolean;
}

const DEFAULT_VIA = /\bdefault via (\S+)/;

export class NetworkMapper {
  private readonly gate: CommandGate;
  private readonly audit: AuditLogger | undefined;
  private readonly logger: Logger;
  private readonly cache: BoundedCache<ReadonlyArray<string>>;
  private readonly timeoutMs: number;
  readonly defaultNetwork: string;

  constructor(options: NetworkMapperOptions) {
    this.gate = options.gate;
    this.audit = options.audit;
    this.logger = (options.logger ?? NOOP_LOGGER).child('hosts');
    this.defaultNetwork = options.defaultNetwork ?? DEFAULT_NETWORK;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.cache = new BoundedCache<ReadonlyArray<string>>({
      maxEntries: options.cacheSize ?? 3,
      maxBytes: options.cacheMaxBytes ?? 256 * 1024,
      ttlMs: options.cacheTtlMs ?? 300_000,
      refreshOnHit: true,
      now: options.now,
    });
  }

  /**
   * The default route's next hop, or null when there is none or it cannot
   * be read.
   */
  async gatewayIp(signal?: AbortSignal): Promise<string | null> {
    const result = await this.gate.execute('ip', ['route', 'show', 'default'], { timeoutMs: 5_000, signal });
    if (result.exitCode !== 0) {
      this.logger.warn(`Gateway detection failed: ${result.stderr.trim()}`);
      return null;
    }
    const via = DEFAULT_VIA.exec(result.stdout)?.[1];
    return via !== undefined && isValidIpv4(via) ? via : null;
  }

  /**
   * Ping-sweep `network` (CIDR) for live hosts.
   *
   * @throws {ValidationError} If `network` is not an IPv4 CIDR block
   * @throws {CommandFailedError} If nmap does not exit cleanly
   */
  async discoverHosts(network: string = this.defaultNetwork, signal?: AbortSignal): Promise<HostDiscovery> {
    if (!network.includes('/') || !isValidIpOrCidr(network)) {
      throw new ValidationError('network', network, `Invalid network (expected CIDR): ${network}`);
    }

    const cached = this.cache.get(network);
    if (cached !== undefined) {
      return { network, hosts: cached, cached: true };
    }

    this.audit?.log('COMMAND', { type: 'arp_host_scan', network, status: 'started' });
    const result = await this.gate.execute('nmap', ['-sn', '-T5', network], { timeoutMs: this.timeoutMs, signal });
    if (result.exitCode !== 0) {
      throw new CommandFailedError('nmap', result);
    }

    const hosts = parseHostDiscovery(result.stdout);
    this.cache.put(network, hosts);
    this.logger.info(`Found ${hosts.length} active hosts on ${network}`);
    this.audit?.log('COMMAND', { type: 'arp_host_scan', network, count: hosts.length });
    return { network, hosts, cached: false };
  }

  clearCache(): void {
    this.cache.clear();
  }
}
