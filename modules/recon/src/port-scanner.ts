/**
 * Cyberdeck Recon — Port Scanner
 *
 * nmap port scans with target validation, a minimum interval between scans,
 * and a result cache keyed by target (5 entries, 1 hour by default).
 *
 * Scan flow: validate target → rate limit → cache → `nmap` through the gate
 * → parse → cache. Only a scan that reaches nmap restarts the interval.
 */

import {
  AuditLevel,
  BoundedCache,
  NOOP_LOGGER,
  ValidationError,
  isValidHostname,
  isValidIpOrCidr,
  isValidPortRange,
  systemClock,
} from '@cyberdeck/kernel';
import type { AuditLogger, CacheStats, Clock, CommandGate, Logger } from '@cyberdeck/kernel';
import type { ReconDeps } from './deps.js';
import { formatPortReport, parseNmapOutput } from './nmap.js';
import type { PortRow } from './nmap.js';

/** The range scanned with nmap's fast mode (`-F`, top 100 ports). */
export const FAST_SCAN_RANGE = '1-100';

export interface PortScannerOptions extends ReconDeps {
  readonly cacheSize?: number | undefined;
  readonly cacheTtlMs?: number | undefined;
  readonly minScanIntervalMs?: number | undefined;
  readonly timeoutMs?: number | undefined;
}

export interface PortReport {
  readonly target: string;
  readonly ports: string;
  readonly rows: ReadonlyArray<PortRow>;
  readonly lines: ReadonlyArray<string>;
  readonly scannedAt: number;
}

export type ScanResult =
  | { readonly status: 'completed'; readonly report: PortReport; readonly cached: boolean }
  | { readonly status: 'invalid_target'; readonly target: string }
  | { readonly status: 'rate_limited'; readonly retryAfterMs: number }
  | { readonly status: 'failed'; readonly target: string; readonly exitCode: number; readonly error: string };

export class PortScanner {
  private readonly gate: CommandGate;
  private readonly audit: AuditLogger | undefined;
  private readonly logger: Logger;
  private readonly now: Clock;
  private readonly cache: BoundedCache<PortReport>;
  private readonly minIntervalMs: number;
  private readonly timeoutMs: number;
  private lastScanAt: number | null = null;

  constructor(options: PortScannerOptions) {
    this.gate = options.gate;
    this.audit = options.audit;
    this.logger = (options.logger ?? NOOP_LOGGER).child('scan');
    this.now = options.now ?? systemClock;
    this.minIntervalMs = options.minScanIntervalMs ?? 2_000;
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.cache = new BoundedCache<PortReport>({
      maxEntries: options.cacheSize ?? 5,
      ttlMs: options.cacheTtlMs ?? 3_600_000,
      now: this.now,
    });
  }

  /** IPv4 address, IPv4 CIDR block, or hostname. Every check is audited. */
  isValidTarget(target: string): boolean {
    const valid = target !== '' && (isValidIpOrCidr(target) || isValidHostname(target));
    if (valid) {
      this.audit?.log('COMMAND', { type: 'port_scan', target, status: 'target_valid' });
    } else {
      this.audit?.log('VALIDATION', { type: 'scan_target', value: target, reason: 'invalid format' }, AuditLevel.Warning);
    }
    return valid;
  }

  /** Milliseconds until the next scan may start; 0 if it may start now. */
  retryAfterMs(): number {
    if (this.lastScanAt === null) return 0;
    return Math.max(0, this.lastScanAt + this.minIntervalMs - this.now());
  }

  cached(target: string): PortReport | undefined {
    return this.cache.get(target);
  }

  cacheStats(): CacheStats {
    return this.cache.stats();
  }

  /**
   * Scan `target`.
   *
   * @param ports - `1-100` selects fast mode; anything else is passed to `-p`
   * @throws {ValidationError} If `ports` is not a port or port range
   */
  async scan(target: string, ports = '1-1024', signal?: AbortSignal): Promise<ScanResult> {
    if (!isValidPortRange(ports)) {
      throw new ValidationError('ports', ports, `Invalid port range: ${ports}`);
    }
    if (!this.isValidTarget(target)) {
      return { status: 'invalid_target', target };
    }

    const wait = this.retryAfterMs();
    if (wait > 0) {
      return { status: 'rate_limited', retryAfterMs: wait };
    }

    const hit = this.cache.get(target);
    if (hit !== undefined) {
      this.logger.debug(`Cache hit for ${target} (age: ${Math.floor((this.now() - hit.scannedAt) / 1000)}s)`);
      return { status: 'completed', report: hit, cached: true };
    }

    this.logger.info(`Starting nmap scan: ${target} (ports: ${ports})`);
    this.lastScanAt = this.now();

    const args = ports === FAST_SCAN_RANGE
      ? ['-F', '-Pn', '-T4', target]
      : ['-p', ports, '-Pn', '-T4', target];
    const result = await this.gate.execute('nmap', args, { timeoutMs: this.timeoutMs, signal });
    this.lastScanAt = this.now();

    if (result.exitCode !== 0) {
      const error = result.stderr.trim();
      this.logger.warn(`nmap error: ${error}`);
      return { status: 'failed', target, exitCode: result.exitCode, error };
    }

    const rows = parseNmapOutput(result.stdout);
    const report: PortReport = {
      target,
      ports,
      rows,
      lines: formatPortReport(rows),
      scannedAt: this.now(),
    };
    this.cache.put(target, report);
    this.logger.info(`Scan complete for ${target}: ${rows.length} ports`);
    return { status: 'completed', report, cached: false };
  }

  clearCache(): void {
    this.cache.clear();
  }
}
