/**
 * Cyberdeck Runtime Host — BinaryProbe Tests
 *
 *   PROBE-U1: whitelisted names are checked at their canonical path
 *   PROBE-U2: other names are searched on PATH
 */

import { describe, it, expect } from 'vitest';
import { basename, dirname } from 'node:path';
import type { WhitelistEntry } from '@cyberdeck/kernel';
import { BinaryProbe } from '../src/process/binary-probe.js';

function entry(path: string): WhitelistEntry {
  return { path, flags: new Set<string>(), targets: [] };
}

describe('BinaryProbe', () => {
  it('PROBE-U1: uses the whitelist path', () => {
    const probe = new BinaryProbe({
      whitelist: new Map([
        ['present', entry(process.execPath)],
        ['absent', entry('/nonexistent/cyberdeck-tool')],
      ]),
      env: { PATH: '' },
    });

    expect(probe.isInstalled('present')).toBe(true);
    expect(probe.missing(['present', 'absent'])).toEqual(['absent']);
  });

  it('PROBE-U2: falls back to PATH for other names', () => {
    const probe = new BinaryProbe({
      whitelist: new Map(),
      env: { PATH: dirname(process.execPath) },
    });

    expect(probe.isInstalled(basename(process.execPath))).toBe(true);
    expect(probe.isInstalled('cyberdeck-no-such-binary')).toBe(false);
  });
});
