/**
 * cyberdeck scan | hosts | gateway | spoof | wifi | monitor | deauth | bluetooth | power
 *
 * Each tool command turns its arguments into tool parameters and hands
 * them to the session's launcher. Validation happens in the tools.
 */

import { Argument, Option } from 'commander';
import type { Command } from 'commander';
import { DEAUTH_COUNTS, FAST_SCAN_RANGE } from '@cyberdeck/module-recon';
import type { CliSession } from './session.js';
import { t } from '../tui/theme.js';

export function registerToolCommands(program: Command, session: CliSession): void {
  const { launch, out, deck } = session;

  program
    .command('scan')
    .description('Scan a host or network for open ports')
    .argument('<target>', 'IPv4 address, CIDR block or hostname')
    .option('-p, --ports <range>', 'Port list or range, e.g. 22,80,1000-2000')
    .option('-f, --fast', `Fast scan of the top 100 ports (${FAST_SCAN_RANGE})`)
    .action((target: string, options: { ports?: string; fast?: boolean }) =>
      launch({
        toolId: 'port_scan',
        params: { target, ports: options.fast === true ? FAST_SCAN_RANGE : options.ports },
        label: `scan ${target}`,
      }),
    );

  program
    .command('hosts')
    .description('Ping-sweep a network for live hosts')
    .argument('[network]', 'CIDR block (default from settings)')
    .action((network: string | undefined) =>
      launch({ toolId: 'host_discovery', params: { network }, label: `hosts ${network ?? 'default'}` }),
    );

  program
    .command('gateway')
    .description('Show the default gateway')
    .action(() => launch({ toolId: 'gateway_detect', label: 'gateway' }));

  const spoof = program.command('spoof').description('ARP spoofing');

  spoof
    .command('start')
    .description('Start poisoning a host\'s ARP cache (runs until stopped or the duration limit)')
    .argument('<target>', 'Victim IPv4 address')
    .option('-g, --gateway <ip>', 'Gateway to impersonate (default: detected)')
    .option('-i, --interface <name>', 'Interface to spoof on')
    .action((target: string, options: { gateway?: string; interface?: string }) =>
      launch({
        toolId: 'arp_spoof',
        params: { target, gateway: options.gateway, interface: options.interface },
        label: `spoof ${target}`,
      }),
    );

  spoof
    .command('stop')
    .description('Stop spoofing a host')
    .argument('<target>', 'Victim IPv4 address')
    .action((target: string) => {
      out.line(deck.services.spoofer.stop(target)
        ? t.green(`Stopped spoofing ${target}`)
        : t.amber(`${target} is not being spoofed`));
    });

  spoof
    .command('list')
    .description('List active spoofs')
    .action(() => {
      const active = deck.services.spoofer.list();
      if (active.length === 0) {
        out.line(t.muted('  (no active spoofs)'));
        return;
      }
      for (const s of active) {
        out.line(`  ${t.white(s.victim.padEnd(15))} <- -> ${s.gateway.padEnd(15)} ${t.muted(s.iface.padEnd(8))} ${Math.floor(s.durationMs / 1000)}s`);
      }
    });

  program
    .command('wifi')
    .description('List nearby wireless networks')
    .action(() => launch({ toolId: 'wifi_scan', label: 'wifi' }));

  program
    .command('monitor')
    .description('Put a wireless adapter into or out of monitor mode')
    .addArgument(new Argument('<action>', 'start or stop').choices(['start', 'stop']))
    .option('-i, --interface <name>', 'Adapter (default: wireless interface to start, monitor interface to stop)')
    .action((action: string, options: { interface?: string }) =>
      launch({ toolId: 'monitor_mode', params: { action, interface: options.interface }, label: `monitor ${action}` }),
    );

  program
    .command('deauth')
    .description('Send deauthentication frames to every client of an access point')
    .argument('<bssid>', 'Access point MAC address')
    .addOption(
      new Option('-c, --count <n>', 'Frames per burst')
        .choices(DEAUTH_COUNTS.map(String))
        .default('5'),
    )
    .option('-i, --interface <name>', 'Monitor-mode interface')
    .action((bssid: string, options: { count: string; interface?: string }) =>
      launch({
        toolId: 'deauth',
        params: { bssid, count: options.count, interface: options.interface },
        label: `deauth ${bssid}`,
      }),
    );

  program
    .command('bluetooth')
    .description('Discover nearby Bluetooth devices')
    .action(() => launch({ toolId: 'bluetooth_scan', label: 'bluetooth' }));

  program
    .command('power')
    .description('Reboot or shut down the deck')
    .addArgument(new Argument('<action>', 'reboot or shutdown').choices(['reboot', 'shutdown']))
    .option('-y, --yes', 'Confirm the action')
    .action(async (action: string, options: { yes?: boolean }) => {
      if (options.yes !== true) {
        out.line(t.amber(`Refusing to ${action} without --yes`));
        return;
      }
      await launch({ toolId: action, label: action });
    });
}
