/**
 * Cyberdeck Kernel — Argument Validators
 *
 * Pure, stateless structural validators. Each accepts exactly one shape and
 * rejects everything else, so shell metacharacters are excluded by
 * construction rather than by a blacklist.
 *
 * classifyArgument() is the single place where an argument is matched
 * against a whitelist entry.
 */

import { ArgumentKind } from '../types/command.js';
import type { ArgumentClass, WhitelistEntry } from '../types/command.js';

const IPV4_CIDR = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})(?:\/(\d{1,2}))?$/;
const PORT_LIST = /^\d+(?:-\d+)?(?:,\d+(?:-\d+)?)*$/;
const HOST_LABEL = /^[A-Za-z0-9](?:[A-Za-z0-9-]{0,61}[A-Za-z0-9])?$/;
const MAC_ADDRESS = /^(?:[0-9A-Fa-f]{2}[:-]){5}[0-9A-Fa-f]{2}$/;

/**
 * IPv4 address with an optional prefix length: four octets each 0–255,
 * optional `/N` with 0 ≤ N ≤ 32.
 */
export function isValidIpOrCidr(value: string): boolean {
  const match = IPV4_CIDR.exec(value);
  if (match === null) return false;

  for (const octet of match.slice(1, 5)) {
    if (octet === undefined || Number(octet) > 255) return false;
  }

  const prefix = match[5];
  return prefix === undefined || Number(prefix) <= 32;
}

/** A bare IPv4 address (no prefix length). */
export function isValidIpv4(value: string): boolean {
  return !value.includes('/') && isValidIpOrCidr(value);
}

/**
 * One or more comma-separated `port` or `a-b` items, every numeric token
 * in [1, 65535].
 */
export function isValidPortRange(value: string): boolean {
  if (!PORT_LIST.test(value)) return false;

  for (const token of value.split(/[,-]/)) {
    const port = Number(token);
    if (port < 1 || port > 65535) return false;
  }
  return true;
}

/**
 * DNS hostname: dot-separated labels of letters, digits and hyphens, no label
 * starting or ending with a hyphen, the last label starting with a letter.
 */
export function isValidHostname(value: string): boolean {
  if (value.length === 0 || value.length > 253) return false;

  const labels = value.split('.');
  const last = labels[labels.length - 1] ?? '';
  if (!/^[A-Za-z]/.test(last)) return false;

  return labels.every((label) => HOST_LABEL.test(label));
}

/** Six hex pairs separated by `:` or `-`. */
export function isValidMacAddress(value: string): boolean {
  return MAC_ADDRESS.test(value);
}

const VALIDATORS: Readonly<Record<ArgumentKind, (value: string) => boolean>> = {
  [ArgumentKind.IpOrCidr]: isValidIpOrCidr,
  [ArgumentKind.PortRange]: isValidPortRange,
  [ArgumentKind.Hostname]: isValidHostname,
  [ArgumentKind.MacAddress]: isValidMacAddress,
};

/**
 * Classify one argument against a whitelist entry.
 *
 * Literal flags are checked first, then the entry's target kinds in the
 * order the entry declares them.
 */
export function classifyArgument(entry: WhitelistEntry, arg: string): ArgumentClass {
  if (entry.flags.has(arg)) return { kind: 'flag' };

  for (const kind of entry.targets) {
    if (VALIDATORS[kind](arg)) return { kind };
  }
  return { kind: 'rejected' };
}
