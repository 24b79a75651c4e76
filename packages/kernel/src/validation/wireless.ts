/**
 * Cyberdeck Kernel — Wireless Input Cleaning
 *
 * BSSIDs arrive from user input and from nmcli output; SSIDs are arbitrary
 * bytes broadcast by any nearby access point. Both are cleaned here before
 * they are displayed or handed to the command gate. Every outcome is audited
 * under `VALIDATION`.
 */

import { ValidationError } from '../errors.js';
import type { AuditLogger } from '../logging/audit.js';
import { AuditLevel } from '../logging/audit.js';
import { isValidMacAddress } from './arguments.js';

/** Shown in place of an empty or fully non-printable SSID. */
export const HIDDEN_SSID = '<HIDDEN>';

/** Maximum SSID length in characters. */
export const MAX_SSID_LENGTH = 32;

const NON_PRINTABLE = /[\p{C}\p{Zl}\p{Zp}]|(?! )\p{Zs}/gu;
const SHELL_METACHARACTERS = /[;&|`$(){}[\]<>'"]/g;

/**
 * Validate a BSSID (MAC address) and return it upper-cased.
 *
 * @throws {ValidationError} If the value is empty or not six hex pairs
 */
export function validateBssid(value: string, audit?: AuditLogger): string {
  const trimmed = value.trim();

  if (trimmed === '') {
    audit?.log('VALIDATION', { type: 'BSSID', value, reason: 'invalid type or empty' }, AuditLevel.Warning);
    throw new ValidationError('bssid', value, 'BSSID must be a non-empty string');
  }

  if (!isValidMacAddress(trimmed)) {
    audit?.log('VALIDATION', { type: 'BSSID', value, reason: 'invalid format' }, AuditLevel.Warning);
    throw new ValidationError('bssid', value, `Invalid BSSID format: ${value}`);
  }

  const bssid = trimmed.toUpperCase();
  audit?.log('VALIDATION', { type: 'BSSID', value: bssid, reason: 'success' });
  return bssid;
}

/**
 * Clean an SSID for display.
 *
 * Non-printable characters are removed, the result trimmed and cut to 32
 * characters, and shell metacharacters backslash-escaped. Empty input, or
 * input with nothing printable, becomes `<HIDDEN>`.
 */
export function sanitizeSsid(value: string, audit?: AuditLogger): string {
  if (value === '') {
    audit?.log('VALIDATION', { type: 'SSID', value: '<empty>', reason: 'empty network' });
    return HIDDEN_SSID;
  }

  const printable = value.replace(NON_PRINTABLE, '').trim();
  const truncated = Array.from(printable).slice(0, MAX_SSID_LENGTH).join('');

  if (truncated === '') {
    audit?.log('VALIDATION', { type: 'SSID', value: '<empty>', reason: 'no printable chars' });
    return HIDDEN_SSID;
  }

  const escaped = truncated.replace(SHELL_METACHARACTERS, (ch) => `\\${ch}`);
  audit?.log('VALIDATION', { type: 'SSID', value: escaped, reason: 'success' });
  return escaped;
}
