import type { CliOutput } from '../../commands/session.js'
import { t } from '../theme.js'

/**
 * renderHelp — print available shell commands grouped by category.
 */
export function renderHelp(out: CliOutput): void {
  const section = (label: string) =>
    '\n  ' + t.dim('─── ') + t.green(label)

  const cmd = (name: string, desc: string) => {
    const pad = ' '.repeat(Math.max(1, 34 - name.length))
    return '  ' + t.white(name) + t.dim(pad + desc)
  }

  const lines = [
    section('network'),
    cmd('scan <target> [-p ports] [-f]',  'port scan (background job)'),
    cmd('hosts [cidr]',                   'ping-sweep for live hosts'),
    cmd('gateway',                        'show the default gateway'),
    cmd('spoof start <ip> [-g gw]',       'ARP spoof a host (background job)'),
    cmd('spoof stop <ip>',                'stop spoofing a host'),
    cmd('spoof list',                     'active spoofs'),

    section('wireless'),
    cmd('wifi',                           'list nearby networks'),
    cmd('monitor start|stop [-i iface]',  'toggle monitor mode'),
    cmd('deauth <bssid> [-c 1|5|10]',     'deauthentication burst'),
    cmd('bluetooth',                      'discover Bluetooth devices'),

    section('deck'),
    cmd('status',                         'credentials, processes, jobs, tools'),
    cmd('tools [list|enable|disable|stats]', 'registered tools'),
    cmd('audit [-n N] [-t TYPE]',         'recent audit log entries'),
    cmd('sudo set|clear',                 'cache or forget the sudo password'),
    cmd('power reboot|shutdown --yes',    'restart or power off'),

    section('shell'),
    cmd('jobs',                           'background jobs'),
    cmd('cancel <job>',                   'cancel a queued job or kill a running one'),
    cmd('help',                           'show this help'),
    cmd('<command> --help',               'options of one command'),
    cmd('exit  Ctrl+C',                   'stop everything and leave'),
  ]

  for (const line of lines) out.line(line)
}
