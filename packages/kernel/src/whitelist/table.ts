/**
 * Cyberdeck Kernel — Command Whitelist
 *
 * The one canonical table of OS commands the gate may execute. A command
 * absent from this table cannot be run by any code path in the deck.
 *
 * Interface names are accepted as literals rather than validated
 * structurally: the deck only ever drives its own on-board adapters.
 */

import { ArgumentKind } from '../types/command.js';
import type { WhitelistEntry } from '../types/command.js';

/** Wireless and wired interface names the deck's tools may address. */
export const INTERFACE_NAMES: ReadonlyArray<string> = [
  'eth0',
  'wlan0',
  'wlan1',
  'wlan0mon',
  'wlan1mon',
];

/** Absolute path of sudo, used only for privileged execution. */
export const SUDO_PATH = '/usr/bin/sudo';

/** The field list requested from `nmcli` by the WiFi scanner. */
export const NMCLI_WIFI_FIELDS = 'SSID,BSSID,SIGNAL,SECURITY,CHAN,FREQ';

function entry(
  path: string,
  flags: ReadonlyArray<string>,
  targets: ReadonlyArray<ArgumentKind> = [],
): WhitelistEntry {
  return Object.freeze({
    path,
    flags: new Set(flags),
    targets: Object.freeze([...targets]),
  });
}

export const COMMAND_WHITELIST: ReadonlyMap<string, WhitelistEntry> = new Map([
  [
    'nmap',
    entry(
      '/usr/bin/nmap',
      ['-F', '-T4', '-T5', '-sn', '-Pn', '-p', '--host-timeout', '60', '-oG', '-'],
      [ArgumentKind.IpOrCidr, ArgumentKind.PortRange, ArgumentKind.Hostname],
    ),
  ],
  ['ip', entry('/usr/sbin/ip', ['route', 'show', 'default'])],
  [
    'arpspoof',
    entry('/usr/sbin/arpspoof', ['-i', '-t', '-r', ...INTERFACE_NAMES], [ArgumentKind.IpOrCidr]),
  ],
  [
    'airmon-ng',
    entry('/usr/sbin/airmon-ng', ['start', 'stop', 'status', 'check', 'kill', ...INTERFACE_NAMES]),
  ],
  [
    'aireplay-ng',
    entry(
      '/usr/sbin/aireplay-ng',
      ['--deauth', '--count', '-a', '-c', '-w', '0', '1', '5', '10', ...INTERFACE_NAMES],
      [ArgumentKind.MacAddress],
    ),
  ],
  [
    'reaver',
    entry(
      '/usr/sbin/reaver',
      ['-i', '-b', '-vv', '-K', '-N', '-t', ...INTERFACE_NAMES],
      [ArgumentKind.MacAddress],
    ),
  ],
  ['iwconfig', entry('/sbin/iwconfig', ['mode', 'monitor', 'managed', ...INTERFACE_NAMES])],
  [
    'nmcli',
    entry('/usr/bin/nmcli', ['-t', '-f', NMCLI_WIFI_FIELDS, 'dev', 'wifi', 'list', 'rescan', 'connect']),
  ],
  [
    'bluetoothctl',
    entry('/usr/bin/bluetoothctl', ['--timeout', '5', '10', 'scan', 'on', 'off', 'devices', 'power']),
  ],
  ['shutdown', entry('/usr/sbin/shutdown', ['-h', 'now'])],
  ['reboot', entry('/usr/sbin/reboot', [])],
]);
