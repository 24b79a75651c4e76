/**
 * Cyberdeck Recon — Tool Definitions
 *
 * Adapts the recon services to the tool registry. Handlers take string
 * parameters from the CLI or shell, throw ValidationError for bad input,
 * and return report lines for the terminal.
 */

import { ValidationError } from '@cyberdeck/kernel';
import { ToolCategory } from '@cyberdeck/tool-registry';
import type { ToolDefinition, ToolHandler, ToolOutput, ToolParams } from '@cyberdeck/tool-registry';
import type { SpoofRejection } from './arp-spoofer.js';
import { formatWifiReport } from './wifi-scanner.js';
import type { ReconServices } from './services.js';

function requireParam(params: ToolParams, name: string): string {
  const value = params[name]?.trim();
  if (value === undefined || value === '') {
    throw new ValidationError(name, '', `Missing required parameter: ${name}`);
  }
  return value;
}

function optionalParam(params: ToolParams, name: string): string | undefined {
  const value = params[name]?.trim();
  return value === '' ? undefined : value;
}

const SPOOF_REJECTION_MESSAGE: Readonly<Record<SpoofRejection, string>> = {
  invalid_ip: 'Invalid target or gateway address',
  invalid_interface: 'Interface is not one of the deck adapters',
  same_as_gateway: 'Target and gateway are the same address',
  already_active: 'Target is already being spoofed',
};

interface ToolSpec {
  readonly id: string;
  readonly name: string;
  readonly category: ToolCategory;
  readonly icon: string;
  readonly description: string;
  readonly requiresRoot?: boolean;
  readonly dependencies: ReadonlyArray<string>;
  readonly handler: ToolHandler;
}

function define(spec: ToolSpec): ToolDefinition {
  return {
    requiresRoot: false,
    requiresNetwork: true,
    version: '1.0.0',
    ...spec,
  };
}

export function createReconTools(services: ReconServices): ReadonlyArray<ToolDefinition> {
  const { scanner, mapper, spoofer, wifi, monitor, deauth, bluetooth, power, interfaces } = services;

  const portScan: ToolHandler = async (params, signal) => {
    const target = requireParam(params, 'target');
    const result = await scanner.scan(target, optionalParam(params, 'ports') ?? services.defaultPorts, signal);
    switch (result.status) {
      case 'completed':
        return {
          lines: result.cached ? ['CACHED RESULT (from memory):', '', ...result.report.lines] : result.report.lines,
          data: result.report,
        };
      case 'invalid_target':
        throw new ValidationError('target', target, 'Invalid target format. Use: 192.168.1.1 or 192.168.1.0/24');
      case 'rate_limited':
        throw new Error(`Scan rate limited. Wait ${Math.ceil(result.retryAfterMs / 1000)}s before the next scan.`);
      case 'failed':
        throw new Error(`nmap failed (code ${result.exitCode}): ${result.error}`);
    }
  };

  const hostDiscovery: ToolHandler = async (params, signal) => {
    const found = await mapper.discoverHosts(optionalParam(params, 'network'), signal);
    return {
      lines: [
        `[ARP] Found ${found.hosts.length} active hosts on ${found.network}${found.cached ? ' (cached)' : ''}`,
        ...found.hosts.map((ip) => `  ${ip}`),
      ],
      data: found,
    };
  };

  const gatewayDetect: ToolHandler = async (_params, signal) => {
    const gateway = await mapper.gatewayIp(signal);
    return { lines: [gateway === null ? 'No default gateway found' : `Gateway: ${gateway}`], data: gateway };
  };

  const arpSpoof: ToolHandler = async (params, signal): Promise<ToolOutput> => {
    const target = requireParam(params, 'target');
    const gateway = optionalParam(params, 'gateway') ?? (await mapper.gatewayIp(signal));
    if (gateway === null) {
      throw new Error('No default gateway detected; pass one explicitly');
    }
    const iface = optionalParam(params, 'interface') ?? interfaces.defaultInterface;

    const started = spoofer.start(target, gateway, iface, signal);
    if (started.status === 'rejected') {
      throw new ValidationError('target', target, SPOOF_REJECTION_MESSAGE[started.reason]);
    }
    const end = await started.finished;
    return {
      lines: [`Spoofing ${end.victim} <- -> ${gateway} ended (${end.reason}) after ${Math.round(end.durationMs / 1000)}s`],
      data: end,
    };
  };

  const wifiScan: ToolHandler = async (_params, signal) => {
    const networks = await wifi.scan(signal);
    return { lines: formatWifiReport(networks), data: networks };
  };

  const monitorMode: ToolHandler = async (params, signal) => {
    const action = optionalParam(params, 'action') ?? 'start';
    const iface = optionalParam(params, 'interface');
    if (action === 'start') {
      return { lines: await monitor.start(iface ?? interfaces.wirelessInterface, signal) };
    }
    if (action === 'stop') {
      return { lines: await monitor.stop(iface ?? interfaces.monitorInterface, signal) };
    }
    throw new ValidationError('action', action, 'Monitor action must be start or stop');
  };

  const deauthAttack: ToolHandler = async (params, signal) => {
    const countText = optionalParam(params, 'count');
    const count = countText === undefined ? undefined : Number(countText);
    const lines = await deauth.run(
      { bssid: requireParam(params, 'bssid'), count, iface: optionalParam(params, 'interface') },
      signal,
    );
    return { lines: ['[!] Deauth frames sent', ...lines] };
  };

  const bluetoothScan: ToolHandler = async (_params, signal) => {
    const devices = await bluetooth.scan(signal);
    return {
      lines: devices.length === 0
        ? ['[BT] No devices found']
        : [`[BT] Found ${devices.length} devices:`, ...devices.map((d) => `  ${d.name} (${d.mac})`)],
      data: devices,
    };
  };

  return [
    define({
      id: 'port_scan',
      name: 'Port Scanner',
      category: ToolCategory.Network,
      icon: '🔍',
      description: 'Scan a host or network for open ports with nmap',
      dependencies: ['nmap'],
      handler: portScan,
    }),
    define({
      id: 'host_discovery',
      name: 'Host Discovery',
      category: ToolCategory.Recon,
      icon: '🛰',
      description: 'Ping-sweep a network for live hosts',
      dependencies: ['nmap'],
      handler: hostDiscovery,
    }),
    define({
      id: 'gateway_detect',
      name: 'Gateway Detection',
      category: ToolCategory.Recon,
      icon: '🧭',
      description: 'Show the default gateway',
      dependencies: ['ip'],
      handler: gatewayDetect,
    }),
    define({
      id: 'arp_spoof',
      name: 'ARP Spoofer',
      category: ToolCategory.Exploit,
      icon: '☠',
      description: 'Poison a host\'s ARP cache to intercept its traffic',
      requiresRoot: true,
      dependencies: ['arpspoof', 'ip'],
      handler: arpSpoof,
    }),
    define({
      id: 'wifi_scan',
      name: 'WiFi Scanner',
      category: ToolCategory.Wifi,
      icon: '📡',
      description: 'List nearby wireless networks',
      dependencies: ['nmcli'],
      handler: wifiScan,
    }),
    define({
      id: 'monitor_mode',
      name: 'Monitor Mode',
      category: ToolCategory.Wifi,
      icon: '📶',
      description: 'Put a wireless adapter into or out of monitor mode',
      requiresRoot: true,
      dependencies: ['airmon-ng'],
      handler: monitorMode,
    }),
    define({
      id: 'deauth',
      name: 'Deauth Attack',
      category: ToolCategory.Wifi,
      icon: '⚡',
      description: 'Disconnect the clients of an access point',
      requiresRoot: true,
      dependencies: ['aireplay-ng'],
      handler: deauthAttack,
    }),
    define({
      id: 'bluetooth_scan',
      name: 'Bluetooth Scanner',
      category: ToolCategory.Bluetooth,
      icon: '🔵',
      description: 'Discover nearby Bluetooth devices',
      dependencies: ['bluetoothctl'],
      handler: bluetoothScan,
    }),
    define({
      id: 'reboot',
      name: 'Reboot',
      category: ToolCategory.System,
      icon: '↻',
      description: 'Restart the deck',
      requiresRoot: true,
      dependencies: ['reboot'],
      handler: async () => { await power.reboot(); return { lines: ['Rebooting...'] }; },
    }),
    define({
      id: 'shutdown',
      name: 'Shutdown',
      category: ToolCategory.System,
      icon: '⏻',
      description: 'Power the deck off',
      requiresRoot: true,
      dependencies: ['shutdown'],
      handler: async () => { await power.shutdown(); return { lines: ['Shutting down...'] }; },
    }),
  ];
}
