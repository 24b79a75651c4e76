/**
 * Cyberdeck Runtime Host — Settings Tests
 *
 *   CONF-U1: an empty object yields every default
 *   CONF-U2: unknown keys and out-of-range values raise ConfigError
 *   CONF-U3: a missing config.json means defaults
 *   CONF-U4: config.json values override defaults section by section
 *   CONF-U5: malformed JSON raises ConfigError naming the file
 *   CONF-U6: CYBERDECK_LOG_LEVEL overrides logging.level, case-insensitively
 *   CONF-U7: ports, networks and interfaces are checked against the gate's rules
 *   CONF-U8: millisecond settings stay within Node's timer range
 */

import { describe, it, expect } from 'vitest';
import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { LogLevel } from '@cyberdeck/kernel';
import {
  CONFIG_FILENAME,
  ConfigError,
  MAX_TIMER_MS,
  defaultSettings,
  loadSettings,
  parseSettings,
} from '../src/config/settings.js';

function tempHome(config?: string): string {
  const home = mkdtempSync(`${tmpdir()}/cyberdeck-conf-`);
  if (config !== undefined) writeFileSync(join(home, CONFIG_FILENAME), config, 'utf-8');
  return home;
}

describe('parseSettings', () => {
  it('CONF-U1: fills in defaults', () => {
    const settings = defaultSettings();

    expect(settings.tools.defaultTimeoutMs).toBe(30_000);
    expect(settings.tools.scanCacheSize).toBe(5);
    expect(settings.processes).toEqual({
      maxProcesses: 10,
      maxMemoryMb: 256,
      cpuBufferSeconds: 5,
      killGraceMs: 5_000,
      enforceLimits: true,
      prlimitPath: '/usr/bin/prlimit',
    });
    expect(settings.workers.poolSize).toBe(2);
    expect(settings.sudo.tokenTtlSeconds).toBe(900);
    expect(settings.privileges).toEqual({ drop: false, uid: 1000, gid: 1000 });
    expect(settings.network.monitorInterface).toBe('wlan0mon');
    expect(settings.logging.level).toBe(LogLevel.Info);
    expect(settings.logging.auditLogMaxBytes).toBe(1024 * 1024);
  });

  it('CONF-U2: rejects unknown keys and bad values', () => {
    expect(() => parseSettings({ tools: { bogus: 1 } })).toThrow(ConfigError);
    expect(() => parseSettings({ workers: { poolSize: 0 } })).toThrow(ConfigError);
    expect(() => parseSettings({ network: { defaultInterface: 'eth0; rm -rf /' } })).toThrow(ConfigError);

    try {
      parseSettings({ sudo: { tokenTtlSeconds: -1 } }, 'test.json');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.path).toBe('test.json');
        expect(err.issues).toHaveLength(1);
        expect(err.issues[0]).toMatch(/^sudo\.tokenTtlSeconds: /);
      }
    }
  });
});

function issuesOf(input: unknown): ReadonlyArray<string> {
  try {
    parseSettings(input);
  } catch (err) {
    if (err instanceof ConfigError) return err.issues;
    throw err;
  }
  return [];
}

describe('parseSettings value checks', () => {
  it('CONF-U7: rejects a default port list the scanner would refuse', () => {
    expect(issuesOf({ tools: { portScanDefaultPorts: '0-70000' } })).toEqual([
      'tools.portScanDefaultPorts: must be a port or port range',
    ]);
    expect(issuesOf({ tools: { portScanDefaultPorts: '22;ls' } })).toHaveLength(1);
    expect(parseSettings({ tools: { portScanDefaultPorts: '22,80,8000-8100' } }).tools.portScanDefaultPorts).toBe(
      '22,80,8000-8100',
    );
  });

  it('CONF-U7: rejects a default network that is not IPv4 or CIDR', () => {
    expect(issuesOf({ network: { defaultNetwork: 'lan' } })).toEqual([
      'network.defaultNetwork: must be an IPv4 address or CIDR',
    ]);
    expect(issuesOf({ network: { defaultNetwork: '10.0.0.0/33' } })).toHaveLength(1);
    expect(parseSettings({ network: { defaultNetwork: '10.0.0.0/8' } }).network.defaultNetwork).toBe('10.0.0.0/8');
  });

  it('CONF-U7: accepts only the deck interfaces', () => {
    expect(issuesOf({ network: { monitorInterface: 'wlan2mon' } })).toEqual([
      'network.monitorInterface: must be one of eth0, wlan0, wlan1, wlan0mon, wlan1mon',
    ]);
    expect(issuesOf({ network: { defaultInterface: 'enp3s0' } })).toHaveLength(1);
    expect(parseSettings({ network: { wirelessInterface: 'wlan1' } }).network.wirelessInterface).toBe('wlan1');
  });

  it('CONF-U8: rejects timers past the 32-bit limit', () => {
    const tooLong = MAX_TIMER_MS + 1;
    for (const input of [
      { tools: { defaultTimeoutMs: tooLong } },
      { tools: { minScanIntervalMs: tooLong } },
      { tools: { scanCacheTtlMs: tooLong } },
      { tools: { hostCacheTtlMs: tooLong } },
      { processes: { killGraceMs: tooLong } },
    ]) {
      expect(() => parseSettings(input)).toThrow(ConfigError);
    }
    expect(parseSettings({ tools: { defaultTimeoutMs: MAX_TIMER_MS } }).tools.defaultTimeoutMs).toBe(MAX_TIMER_MS);
  });
});

describe('loadSettings', () => {
  it('CONF-U3: defaults when config.json is absent', () => {
    expect(loadSettings(tempHome(), {})).toEqual(defaultSettings());
  });

  it('CONF-U4: merges file values over defaults', () => {
    const home = tempHome(JSON.stringify({ workers: { poolSize: 4 }, logging: { level: 'debug' } }));
    const settings = loadSettings(home, {});

    expect(settings.workers.poolSize).toBe(4);
    expect(settings.logging.level).toBe(LogLevel.Debug);
    expect(settings.logging.appLogBackups).toBe(3);
    expect(settings.tools).toEqual(defaultSettings().tools);
  });

  it('CONF-U5: malformed JSON is an error, not defaults', () => {
    const home = tempHome('{ "workers": ');
    expect(() => loadSettings(home, {})).toThrow(ConfigError);
    expect(() => loadSettings(home, {})).toThrow(/not valid JSON/);
  });

  it('CONF-U6: the log level override wins', () => {
    const home = tempHome(JSON.stringify({ logging: { level: 'error' } }));

    expect(loadSettings(home, { CYBERDECK_LOG_LEVEL: 'DEBUG' }).logging.level).toBe(LogLevel.Debug);
    expect(loadSettings(home, { CYBERDECK_LOG_LEVEL: '' }).logging.level).toBe(LogLevel.Error);
    expect(() => loadSettings(home, { CYBERDECK_LOG_LEVEL: 'loud' })).toThrow(ConfigError);
  });
});
