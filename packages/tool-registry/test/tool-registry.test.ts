/**
 * Cyberdeck Tool Registry — Registry Tests
 *
 *   TOOL-U1: registered tools are listed, grouped and counted by category
 *   TOOL-U2: empty id or name is a ValidationError
 *   TOOL-U3: missing dependencies register the tool disabled
 *   TOOL-U4: re-registering an id replaces the definition
 *   TOOL-U5: lazy tools load on first lookup; a failing loader stays pending
 *   TOOL-U6: execute() tracks context, audits, and returns failures as data
 *   TOOL-U7: a SecurityError from a tool is re-thrown
 *   TOOL-U8: disabled or unknown tools are unavailable
 */

import { describe, it, expect } from 'vitest';
import { AuditLogger, SecurityError, ValidationError } from '@cyberdeck/kernel';
import type { AuditEvent, AuditSink } from '@cyberdeck/kernel';
import { ToolCategory, ToolRegistry, ToolStatus } from '../src/index.js';
import type { DependencyProbe, ToolDefinition, ToolHandler, ToolOutput } from '../src/index.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

class RecordingSink implements AuditSink {
  readonly events: AuditEvent[] = [];
  append(event: AuditEvent): void {
    this.events.push(event);
  }
}

const done: ToolHandler = () => Promise.resolve({ lines: ['done'] });

function tool(id: string, overrides: Partial<ToolDefinition> = {}): ToolDefinition {
  return {
    id,
    name: `Tool ${id}`,
    category: ToolCategory.Network,
    icon: '*',
    description: 'test tool',
    requiresRoot: false,
    requiresNetwork: false,
    dependencies: [],
    version: '1.0.0',
    handler: done,
    ...overrides,
  };
}

function setup(probe?: DependencyProbe): { registry: ToolRegistry; sink: RecordingSink; clock: { t: number } } {
  const sink = new RecordingSink();
  const clock = { t: 1_000 };
  const registry = new ToolRegistry({ audit: new AuditLogger(sink), probe, now: () => clock.t });
  return { registry, sink, clock };
}

// ---------------------------------------------------------------------------
// Registration
// ---------------------------------------------------------------------------

describe('ToolRegistry registration', () => {
  it('TOOL-U1: lists and groups tools', () => {
    const { registry, sink } = setup();
    registry.register(tool('port_scan'));
    registry.register(tool('wifi_scan', { category: ToolCategory.Wifi }));
    registry.register(tool('host_discovery'));

    expect(registry.list().map((t) => t.id)).toEqual(['port_scan', 'wifi_scan', 'host_discovery']);
    expect(registry.listByCategory(ToolCategory.Network).map((t) => t.id)).toEqual(['port_scan', 'host_discovery']);
    expect(registry.categories()).toEqual([ToolCategory.Network, ToolCategory.Wifi]);
    expect(registry.statistics()).toEqual({
      totalTools: 3,
      enabledTools: 3,
      activeTools: 0,
      categories: 2,
      lazyLoaders: 0,
      toolsByCategory: { network: 2, wifi: 1 },
    });
    expect(sink.events[1]?.details).toEqual({ tool_id: 'wifi_scan', category: 'wifi', enabled: true });
  });

  it('TOOL-U2: rejects an empty id or name', () => {
    const { registry } = setup();
    expect(() => registry.register(tool(''))).toThrow(ValidationError);
    expect(() => registry.register(tool('x', { name: '  ' }))).toThrow('Tool name cannot be empty');
    expect(registry.list()).toEqual([]);
  });

  it('TOOL-U3: disables a tool with missing dependencies', () => {
    const probe: DependencyProbe = { missing: (deps) => deps.filter((d) => d === 'reaver') };
    const { registry } = setup(probe);
    registry.register(tool('wps', { dependencies: ['reaver'] }));
    registry.register(tool('scan', { dependencies: ['nmap'] }));

    expect(registry.isEnabled('wps')).toBe(false);
    expect(registry.isEnabled('scan')).toBe(true);
    expect(registry.listEnabled().map((t) => t.id)).toEqual(['scan']);

    expect(registry.enable('wps')).toBe(true);
    expect(registry.isEnabled('wps')).toBe(true);
    expect(registry.enable('missing')).toBe(false);
  });

  it('TOOL-U4: replaces an existing definition', () => {
    const { registry } = setup();
    registry.register(tool('scan', { version: '1.0.0' }));
    registry.register(tool('scan', { version: '2.0.0' }));

    expect(registry.list()).toHaveLength(1);
    expect(registry.get('scan')?.version).toBe('2.0.0');
  });

  it('TOOL-U5: loads lazy tools on demand', () => {
    const { registry } = setup();
    let loads = 0;
    registry.registerLazy('bt_scan', () => {
      loads++;
      return tool('bt_scan', { category: ToolCategory.Bluetooth });
    });
    registry.registerLazy('broken', () => { throw new Error('module missing'); });

    expect(registry.statistics().lazyLoaders).toBe(2);
    expect(registry.get('bt_scan')?.category).toBe(ToolCategory.Bluetooth);
    expect(registry.get('bt_scan')).toBeDefined();
    expect(loads).toBe(1);

    expect(registry.get('broken')).toBeUndefined();
    expect(registry.statistics().lazyLoaders).toBe(1);
    expect(registry.list().map((t) => t.id)).toEqual(['bt_scan']);
  });

  it('unregisters tools and loaders', () => {
    const { registry, sink } = setup();
    registry.register(tool('scan'));
    registry.registerLazy('later', () => tool('later'));

    expect(registry.unregister('scan')).toBe(true);
    expect(registry.unregister('later')).toBe(true);
    expect(registry.unregister('scan')).toBe(false);
    expect(registry.list()).toEqual([]);
    expect(sink.events.at(-1)).toMatchObject({ event_type: 'TOOL_UNREGISTERED', details: { tool_id: 'scan' } });
  });
});

// ---------------------------------------------------------------------------
// Execution
// ---------------------------------------------------------------------------

describe('ToolRegistry execution', () => {
  it('TOOL-U6: records context and audits each phase', async () => {
    const { registry, sink, clock } = setup();
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => { release = resolve; });
    registry.register(tool('scan', {
      handler: async (params) => {
        await gate;
        clock.t += 250;
        return { lines: [`scanned ${params['target'] ?? ''}`] };
      },
    }));
    registry.register(tool('broken', { handler: () => Promise.reject(new Error('nmap exited 1')) }));

    const pending = registry.execute('scan', { target: '10.0.0.1' });
    expect(registry.isActive('scan')).toBe(true);
    expect(registry.executionContext('scan')?.status).toBe(ToolStatus.Running);

    release();
    expect(await pending).toEqual({ status: 'completed', output: { lines: ['scanned 10.0.0.1'] }, durationMs: 250 });
    expect(registry.isActive('scan')).toBe(false);
    expect(registry.executionContext('scan')).toEqual({
      toolId: 'scan',
      status: ToolStatus.Completed,
      startedAt: 1_000,
      endedAt: 1_250,
      error: null,
    });

    expect(await registry.execute('broken')).toEqual({ status: 'failed', error: 'nmap exited 1', durationMs: 0 });
    expect(registry.executionContext('broken')?.error).toBe('nmap exited 1');

    expect(sink.events.slice(2).map((e) => [e.event_type, e.details])).toEqual([
      ['TOOL_EXECUTE_START', { tool_id: 'scan' }],
      ['TOOL_EXECUTE_SUCCESS', { tool_id: 'scan', duration_ms: 250 }],
      ['TOOL_EXECUTE_START', { tool_id: 'broken' }],
      ['TOOL_EXECUTE_FAILURE', { tool_id: 'broken', error: 'nmap exited 1' }],
    ]);
  });

  it('TOOL-U7: re-throws gate refusals', async () => {
    const { registry } = setup();
    registry.register(tool('evil', {
      handler: () => Promise.reject(new SecurityError('INVALID_ARGUMENT', 'nmap', '; rm -rf /')),
    }));

    await expect(registry.execute('evil')).rejects.toThrow(SecurityError);
    expect(registry.executionContext('evil')?.status).toBe(ToolStatus.Failed);
    expect(registry.isActive('evil')).toBe(false);
  });

  it('TOOL-U8: reports unavailable tools', async () => {
    const { registry } = setup();
    registry.register(tool('scan'));
    registry.disable('scan');

    expect(await registry.execute('scan')).toEqual({ status: 'unavailable', reason: 'disabled' });
    expect(await registry.execute('nope')).toEqual({ status: 'unavailable', reason: 'not_found' });
  });

  it('passes the abort signal to the handler', async () => {
    const { registry } = setup();
    const controller = new AbortController();
    registry.register(tool('spoof', {
      handler: (_params, signal) =>
        new Promise<ToolOutput>((resolve) => {
          signal.addEventListener('abort', () => { resolve({ lines: ['stopped'] }); });
        }),
    }));

    const run = registry.execute('spoof', {}, controller.signal);
    controller.abort();
    const result = await run;
    expect(result.status === 'completed' ? result.output.lines : null).toEqual(['stopped']);
  });
});
