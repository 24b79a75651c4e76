/**
 * Cyberdeck Recon — nmap Output Parsing
 *
 * Pure functions over nmap's normal (human-readable) output. No I/O.
 */

export interface PortRow {
  /** `22/tcp` */
  readonly port: string;
  /** OPEN, CLOSED, or nmap's state upper-cased (FILTERED, UNFILTERED, ...). */
  readonly state: string;
  readonly service: string;
  readonly version: string;
}

const RULE = '─'.repeat(60);

function stateLabel(state: string): string {
  if (state.includes('open')) return 'OPEN';
  if (state.includes('closed')) return 'CLOSED';
  return state.toUpperCase();
}

/**
 * Extract port lines (`22/tcp open ssh OpenSSH 9.6`) from a port scan.
 */
export function parseNmapOutput(stdout: string): ReadonlyArray<PortRow> {
  const rows: PortRow[] = [];
  for (const line of stdout.split('\n')) {
    if (!line.includes('/tcp') && !line.includes('/udp')) continue;
    const parts = line.trim().split(/\s+/);
    const [port, state, service] = parts;
    if (port === undefined || state === undefined || service === undefined) continue;
    rows.push({ port, state: stateLabel(state), service, version: parts.slice(3).join(' ') });
  }
  return rows;
}

/** The `PORT | STATE | SERVICE | VERSION` table shown to the operator. */
export function formatPortReport(rows: ReadonlyArray<PortRow>): ReadonlyArray<string> {
  return [
    'PORT    | STATE | SERVICE | VERSION',
    RULE,
    ...rows.map((r) => `${r.port.padEnd(7)} | ${r.state.padEnd(5)} | ${r.service.padEnd(7)} | ${r.version}`.trimEnd()),
    RULE,
    `Found: ${rows.length} ports`,
  ];
}

const REPORT_FOR = /^Nmap scan report for (?:\S+ \((\d{1,3}(?:\.\d{1,3}){3})\)|(\d{1,3}(?:\.\d{1,3}){3}))\s*$/;

/**
 * Addresses of the hosts a ping scan (`-sn`) reported as up, in output order.
 * Handles both `for 10.0.0.5` and `for router.lan (10.0.0.1)`.
 */
export function parseHostDiscovery(stdout: string): ReadonlyArray<string> {
  const hosts: string[] = [];
  for (const line of stdout.split('\n')) {
    const match = REPORT_FOR.exec(line.trim());
    const ip = match?.[1] ?? match?.[2];
    if (ip !== undefined) hosts.push(ip);
  }
  return hosts;
}
