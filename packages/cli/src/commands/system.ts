/**
 * cyberdeck tools | audit | status | sudo
 */

import { readFileSync } from 'node:fs';
import { Option } from 'commander';
import type { Command } from 'commander';
import { ValidationError } from '@cyberdeck/kernel';
import { isNodeError, parseAuditLog } from '@cyberdeck/runtime-host';
import { ToolCategory } from '@cyberdeck/tool-registry';
import type { CliSession } from './session.js';
import { auditLevelColor, t } from '../tui/theme.js';

export function registerSystemCommands(program: Command, session: CliSession): void {
  registerToolsCommand(program, session);
  registerAuditCommand(program, session);
  registerStatusCommand(program, session);
  registerSudoCommand(program, session);
}

// ---------------------------------------------------------------------------
// tools
// ---------------------------------------------------------------------------

function registerToolsCommand(program: Command, { deck, out }: CliSession): void {
  const tools = program.command('tools').description('List and manage registered tools');

  tools
    .command('list', { isDefault: true })
    .description('List tools')
    .addOption(new Option('-c, --category <category>', 'Only this category').choices(Object.values(ToolCategory)))
    .action((options: { category?: ToolCategory }) => {
      const list = options.category === undefined
        ? deck.registry.list()
        : deck.registry.listByCategory(options.category);
      for (const tool of list) {
        const enabled = deck.registry.isEnabled(tool.id);
        out.line(
          `  ${tool.icon} ` +
          (enabled ? t.white(tool.id.padEnd(16)) : t.muted(tool.id.padEnd(16))) +
          t.text(tool.name.padEnd(20)) +
          t.muted(tool.category.padEnd(10)) +
          (enabled ? t.green('enabled') : t.dim('disabled')) +
          (tool.requiresRoot ? t.amber('  root') : ''),
        );
      }
      if (list.length === 0) out.line(t.muted('  (no tools)'));
    });

  tools
    .command('enable')
    .description('Enable a tool')
    .argument('<id>', 'Tool id')
    .action((id: string) => {
      out.line(deck.registry.enable(id) ? t.green(`Enabled ${id}`) : t.amber(`No such tool: ${id}`));
    });

  tools
    .command('disable')
    .description('Disable a tool')
    .argument('<id>', 'Tool id')
    .action((id: string) => {
      out.line(deck.registry.disable(id) ? t.green(`Disabled ${id}`) : t.amber(`No such tool: ${id}`));
    });

  tools
    .command('stats')
    .description('Registry statistics')
    .action(() => {
      const stats = deck.registry.statistics();
      out.line(`  total ${stats.totalTools}  enabled ${stats.enabledTools}  active ${stats.activeTools}  categories ${stats.categories}`);
      for (const [category, count] of Object.entries(stats.toolsByCategory)) {
        out.line(`    ${t.muted(category.padEnd(10))} ${count}`);
      }
    });
}

// ---------------------------------------------------------------------------
// audit
// ---------------------------------------------------------------------------

function parseLimit(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new ValidationError('limit', value, `Limit must be a positive integer, got ${value}`);
  }
  return n;
}

function registerAuditCommand(program: Command, { deck, out }: CliSession): void {
  program
    .command('audit')
    .description('Show the most recent audit log entries')
    .option('-n, --limit <n>', 'Number of entries', '20')
    .option('-t, --type <type>', 'Only this event type, e.g. COMMAND or SUDO')
    .action((options: { limit: string; type?: string }) => {
      const limit = parseLimit(options.limit);
      const path = deck.ctx.auditLogPath;
      if (path === null) {
        out.line(t.muted('  audit log is not persisted for this deck'));
        return;
      }

      let content = '';
      try {
        content = readFileSync(path, 'utf-8');
      } catch (err: unknown) {
        if (!isNodeError(err, 'ENOENT')) throw err;
      }

      const type = options.type?.toUpperCase();
      const { events, parseErrors } = parseAuditLog(content);
      const shown = events.filter((e) => type === undefined || e.event_type === type).slice(-limit);
      if (shown.length === 0) {
        out.line(t.muted('  (no audit entries)'));
      }
      for (const e of shown) {
        out.line(
          `${t.dim(e.timestamp)} ${auditLevelColor(e.level)(e.level.padEnd(7))} ` +
          `${t.white(e.event_type)} ${t.text(JSON.stringify(e.details))}`,
        );
      }
      if (parseErrors > 0) {
        out.line(t.amber(`  ${parseErrors} malformed lines skipped`));
      }
    });
}

// ---------------------------------------------------------------------------
// status
// ---------------------------------------------------------------------------

function registerStatusCommand(program: Command, { deck, out }: CliSession): void {
  program
    .command('status')
    .description('Show deck state: credentials, processes, jobs, spoofs and tools')
    .option('--json', 'Output as JSON')
    .action((options: { json?: boolean }) => {
      const { ctx, registry, services } = deck;
      const stats = registry.statistics();
      const state = {
        home: ctx.home,
        sudo_cached: ctx.sudo.isCached(),
        processes: { active: ctx.supervisor.activeCount(), limit: ctx.supervisor.limit },
        jobs: { running: ctx.pool.activeCount, queued: ctx.pool.queuedCount },
        spoofs: services.spoofer.list().length,
        tools: { enabled: stats.enabledTools, total: stats.totalTools },
        audit_log: ctx.auditLogPath,
      };

      if (options.json === true) {
        out.line(JSON.stringify(state, null, 2));
        return;
      }

      const label = (s: string): string => t.muted(s.padEnd(14));
      out.line(t.dim('─── Cyberdeck Status ─────────────────────────────'));
      out.line(`  ${label('home')}${t.text(state.home)}`);
      out.line(`  ${label('sudo token')}${state.sudo_cached ? t.green('cached') : t.dim('not set')}`);
      out.line(`  ${label('processes')}${t.white(String(state.processes.active))}${t.dim(` / ${state.processes.limit}`)}`);
      out.line(`  ${label('jobs')}${t.white(String(state.jobs.running))} running  ${t.white(String(state.jobs.queued))} queued`);
      out.line(`  ${label('spoofs')}${state.spoofs > 0 ? t.red(`${state.spoofs} active`) : t.dim('none')}`);
      out.line(`  ${label('tools')}${t.white(String(state.tools.enabled))}${t.dim(` / ${state.tools.total} enabled`)}`);
      out.line(`  ${label('audit log')}${t.text(state.audit_log ?? 'memory')}`);
    });
}

// ---------------------------------------------------------------------------
// sudo
// ---------------------------------------------------------------------------

function registerSudoCommand(program: Command, { deck, out, askSecret }: CliSession): void {
  const sudo = program.command('sudo').description('Manage the cached sudo password');

  sudo
    .command('set')
    .description('Cache the sudo password for privileged tools')
    .action(async () => {
      const password = await askSecret('sudo password: ');
      if (password === '') {
        throw new ValidationError('password', '', 'Password must not be empty');
      }
      deck.ctx.sudo.set(password);
      out.line(t.green(`sudo token cached for ${Math.round(deck.ctx.sudo.ttlSeconds / 60)} min`));
    });

  sudo
    .command('clear')
    .description('Forget the cached sudo password')
    .action(() => {
      deck.ctx.sudo.clear();
      out.line(t.green('sudo token cleared'));
    });
}
