/**
 * Cyberdeck Kernel — Wireless Input Tests
 *
 *   WIFI-U1: validateBssid upper-cases valid input
 *   WIFI-U2: validateBssid throws ValidationError for empty or malformed input
 *   WIFI-U3: sanitizeSsid strips control characters and escapes shell metacharacters
 *   WIFI-U4: sanitizeSsid maps empty or non-printable input to <HIDDEN>
 *   WIFI-U5: sanitizeSsid truncates to 32 characters
 */

import { describe, it, expect } from 'vitest';
import { AuditLogger, HIDDEN_SSID, ValidationError, sanitizeSsid, validateBssid } from '../src/index.js';
import type { AuditEvent } from '../src/index.js';

describe('validateBssid', () => {
  it('WIFI-U1: returns the upper-cased BSSID', () => {
    expect(validateBssid('aa:bb:cc:dd:ee:0f')).toBe('AA:BB:CC:DD:EE:0F');
    expect(validateBssid(' aa-bb-cc-dd-ee-ff ')).toBe('AA-BB-CC-DD-EE-FF');
  });

  it('WIFI-U2: rejects empty and malformed values and audits them', () => {
    const events: AuditEvent[] = [];
    const audit = new AuditLogger({ append: (e) => { events.push(e); } });

    expect(() => validateBssid('', audit)).toThrow(ValidationError);
    expect(() => validateBssid('AA:BB:CC:DD:EE:FF;reboot', audit)).toThrow('Invalid BSSID format');
    expect(events.map((e) => e.details['reason'])).toEqual(['invalid type or empty', 'invalid format']);
  });
});

describe('sanitizeSsid', () => {
  it('WIFI-U3: removes control characters and escapes metacharacters', () => {
    expect(sanitizeSsid('Normal Network')).toBe('Normal Network');
    expect(sanitizeSsid('Network\u0000Injection')).toBe('NetworkInjection');
    expect(sanitizeSsid('cafe;$(id)')).toBe('cafe\\;\\$\\(id\\)');
    expect(sanitizeSsid('  padded\n')).toBe('padded');
  });

  it('WIFI-U4: returns <HIDDEN> for empty or unprintable input', () => {
    expect(sanitizeSsid('')).toBe(HIDDEN_SSID);
    expect(sanitizeSsid('\u0001\u0002\t')).toBe('<HIDDEN>');
  });

  it('WIFI-U5: truncates to 32 characters before escaping', () => {
    const long = 'A'.repeat(40);
    expect(sanitizeSsid(long)).toBe('A'.repeat(32));
  });
});
