/**
 * Cyberdeck Recon — WiFi Scanner
 *
 * Lists nearby access points with `nmcli -t` (terse, colon-separated, with
 * `\:` and `\\` escapes inside fields). SSIDs are untrusted broadcast data
 * and are sanitised; malformed BSSIDs are replaced by the zero address.
 */

import {
  NMCLI_WIFI_FIELDS,
  NOOP_LOGGER,
  isValidationError,
  sanitizeSsid,
  validateBssid,
} from '@cyberdeck/kernel';
import type { AuditLogger, CommandGate, Logger } from '@cyberdeck/kernel';
import type { ReconDeps } from './deps.js';
import { CommandFailedError } from './errors.js';

export const ZERO_BSSID = '00:00:00:00:00:00';

export type SecurityClass = 'secured' | 'weak' | 'open';

export interface WifiNetwork {
  readonly ssid: string;
  readonly bssid: string;
  /** Signal quality, 0–100. */
  readonly signal: number;
  /** nmcli's SECURITY field, e.g. `WPA2 WPA3`. Empty for open networks. */
  readonly security: string;
  readonly securityClass: SecurityClass;
  readonly channel: string;
  readonly frequency: string;
}

export function classifySecurity(security: string): SecurityClass {
  if (security.includes('WPA') || security.includes('RSN')) return 'secured';
  if (security.includes('WEP')) return 'weak';
  return 'open';
}

/** Split one terse nmcli line on unescaped colons and unescape each field. */
export function splitTerseFields(line: string): ReadonlyArray<string> {
  const fields: string[] = [];
  let current = '';
  for (let i = 0; i < line.length; i++) {
    const ch = line.charAt(i);
    if (ch === '\\' && i + 1 < line.length) {
      current += line.charAt(i + 1);
      i++;
    } else if (ch === ':') {
      fields.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  fields.push(current);
  return fields;
}

/**
 * Parse `nmcli -t -f SSID,BSSID,SIGNAL,SECURITY,CHAN,FREQ dev wifi list`.
 * Lines with fewer than six fields are skipped.
 */
export function parseNmcliWifi(stdout: string, audit?: AuditLogger, logger: Logger = NOOP_LOGGER): ReadonlyArray<WifiNetwork> {
  const networks: WifiNetwork[] = [];
  for (const line of stdout.split('\n')) {
    if (line.trim() === '') continue;
    const [ssid, bssid, signal, security, channel, frequency] = splitTerseFields(line);
    if (frequency === undefined || ssid === undefined || bssid === undefined
      || signal === undefined || security === undefined || channel === undefined) {
      continue;
    }

    let cleanBssid = ZERO_BSSID;
    try {
      cleanBssid = validateBssid(bssid, audit);
    } catch (err: unknown) {
      if (!isValidationError(err)) throw err;
      logger.warn(`Invalid BSSID: ${err.message}`);
    }

    const strength = Number.parseInt(signal, 10);
    networks.push({
      ssid: sanitizeSsid(ssid, audit),
      bssid: cleanBssid,
      signal: Number.isNaN(strength) ? 0 : strength,
      security,
      securityClass: classifySecurity(security),
      channel,
      frequency,
    });
  }
  return networks;
}

const SECURITY_MARK: Readonly<Record<SecurityClass, string>> = {
  secured: 'LOCK',
  weak: 'WEAK',
  open: 'OPEN',
};

/** Terminal listing, one numbered line per network. */
export function formatWifiReport(networks: ReadonlyArray<WifiNetwork>): ReadonlyArray<string> {
  if (networks.length === 0) return ['[WiFi] No networks found'];
  const rule = '-'.repeat(40);
  return [
    `[WiFi] Found ${networks.length} networks:`,
    rule,
    ...networks.map((n, i) =>
      `${String(i + 1).padStart(2)}. ${n.ssid.slice(0, 20).padEnd(20)} | Signal: ${String(n.signal).padStart(3)}% | ${SECURITY_MARK[n.securityClass]} ${n.security.slice(0, 8)}`.trimEnd(),
    ),
    rule,
  ];
}

export interface WifiScannerOptions extends ReconDeps {
  readonly timeoutMs?: number | undefined;
}

export class WifiScanner {
  private readonly gate: CommandGate;
  private readonly audit: AuditLogger | undefined;
  private readonly logger: Logger;
  private readonly timeoutMs: number;

  constructor(options: WifiScannerOptions) {
    this.gate = options.gate;
    this.audit = options.audit;
    this.logger = (options.logger ?? NOOP_LOGGER).child('wifi');
    this.timeoutMs = options.timeoutMs ?? 10_000;
  }

  /** @throws {CommandFailedError} If nmcli does not exit cleanly */
  async scan(signal?: AbortSignal): Promise<ReadonlyArray<WifiNetwork>> {
    const result = await this.gate.execute(
      'nmcli',
      ['-t', '-f', NMCLI_WIFI_FIELDS, 'dev', 'wifi', 'list'],
      { timeoutMs: this.timeoutMs, signal },
    );
    if (result.exitCode !== 0) {
      throw new CommandFailedError('nmcli', result);
    }
    const networks = parseNmcliWifi(result.stdout, this.audit, this.logger);
    this.logger.info(`WiFi scan complete: ${networks.length} networks found`);
    return networks;
  }
}
