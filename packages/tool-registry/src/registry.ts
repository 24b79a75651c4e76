/**
 * Cyberdeck Tool Registry — Tool Registry
 *
 * The ToolRegistry is the authoritative record of the deck's tools, their
 * enablement, and their last execution.
 *
 * Registry invariants:
 * - A tool whose dependencies are missing is registered Disabled.
 * - Registering an existing id replaces the definition (with a warning).
 * - execute() never rejects with a tool's own error: failures come back as
 *   a `failed` result and are audited. SecurityError is the exception: a
 *   gate refusal is re-thrown so the caller sees the attempted violation.
 * - No module-level instance. The entry point constructs one per deck.
 */

import {
  AuditLevel,
  NOOP_LOGGER,
  ValidationError,
  errorMessage,
  isSecurityError,
  systemClock,
} from '@cyberdeck/kernel';
import type { AuditLogger, Clock, Logger } from '@cyberdeck/kernel';
import { ToolStatus } from './types.js';
import type {
  DependencyProbe,
  ToolCategory,
  ToolDefinition,
  ToolExecutionContext,
  ToolLoader,
  ToolParams,
  ToolRunResult,
  ToolStatistics,
} from './types.js';

interface RegistryEntry {
  readonly tool: ToolDefinition;
  enabled: boolean;
}

/** Every dependency counts as installed. */
export const ASSUME_INSTALLED: DependencyProbe = { missing: () => [] };

export interface ToolRegistryOptions {
  readonly audit?: AuditLogger | undefined;
  readonly logger?: Logger | undefined;
  readonly probe?: DependencyProbe | undefined;
  readonly now?: Clock | undefined;
}

export class ToolRegistry {
  private readonly entries = new Map<string, RegistryEntry>();
  private readonly loaders = new Map<string, ToolLoader>();
  private readonly contexts = new Map<string, ToolExecutionContext>();
  /** Running executions per tool id. */
  private readonly running = new Map<string, number>();
  private readonly audit: AuditLogger | undefined;
  private readonly logger: Logger;
  private readonly probe: DependencyProbe;
  private readonly now: Clock;

  constructor(options: ToolRegistryOptions = {}) {
    this.audit = options.audit;
    this.logger = (options.logger ?? NOOP_LOGGER).child('tools');
    this.probe = options.probe ?? ASSUME_INSTALLED;
    this.now = options.now ?? systemClock;
  }

  /**
   * Register a tool definition.
   *
   * @throws {ValidationError} If the id or name is empty
   */
  register(tool: ToolDefinition): void {
    if (tool.id.trim() === '') {
      throw new ValidationError('id', tool.id, 'Tool ID cannot be empty');
    }
    if (tool.name.trim() === '') {
      throw new ValidationError('name', tool.name, 'Tool name cannot be empty');
    }

    if (this.entries.has(tool.id)) {
      this.logger.warn(`Tool ${tool.id} already registered, updating`);
    }

    let enabled = true;
    if (tool.dependencies.length > 0) {
      const missing = this.probe.missing(tool.dependencies);
      if (missing.length > 0) {
        this.logger.warn(`Tool ${tool.id} missing dependencies: ${missing.join(', ')}`);
        enabled = false;
      }
    }

    this.entries.set(tool.id, { tool, enabled });
    this.audit?.log('TOOL_REGISTERED', { tool_id: tool.id, category: tool.category, enabled });
    this.logger.info(`Registered tool: ${tool.id} (${tool.name})`);
  }

  /** Defer building a definition until the tool is first looked up. */
  registerLazy(id: string, loader: ToolLoader): void {
    this.loaders.set(id, loader);
    this.logger.debug(`Registered lazy loader for tool: ${id}`);
  }

  /** @returns false if the id was not registered */
  unregister(id: string): boolean {
    const removedLoader = this.loaders.delete(id);
    if (!this.entries.delete(id)) {
      if (!removedLoader) this.logger.warn(`Tool ${id} not registered`);
      return removedLoader;
    }
    this.running.delete(id);
    this.audit?.log('TOOL_UNREGISTERED', { tool_id: id });
    this.logger.info(`Unregistered tool: ${id}`);
    return true;
  }

  /**
   * Look up a tool, running its lazy loader if it has not been loaded yet.
   * A loader that throws is logged and left in place; the lookup returns
   * undefined.
   */
  get(id: string): ToolDefinition | undefined {
    return this.entry(id)?.tool;
  }

  /** Every tool, lazy ones included (this loads them). */
  list(): ReadonlyArray<ToolDefinition> {
    for (const id of Array.from(this.loaders.keys())) this.entry(id);
    return Array.from(this.entries.values(), (e) => e.tool);
  }

  listByCategory(category: ToolCategory): ReadonlyArray<ToolDefinition> {
    return this.list().filter((t) => t.category === category);
  }

  listEnabled(): ReadonlyArray<ToolDefinition> {
    this.list();
    return Array.from(this.entries.values())
      .filter((e) => e.enabled)
      .map((e) => e.tool);
  }

  /** Categories with at least one registered tool, in registration order. */
  categories(): ReadonlyArray<ToolCategory> {
    return Array.from(new Set(Array.from(this.entries.values(), (e) => e.tool.category)));
  }

  isEnabled(id: string): boolean {
    return this.entry(id)?.enabled === true;
  }

  enable(id: string): boolean {
    return this.setEnabled(id, true);
  }

  disable(id: string): boolean {
    return this.setEnabled(id, false);
  }

  /** True while at least one execution of the tool is in flight. */
  isActive(id: string): boolean {
    return (this.running.get(id) ?? 0) > 0;
  }

  /** The most recent execution of the tool, if any. */
  executionContext(id: string): ToolExecutionContext | undefined {
    return this.contexts.get(id);
  }

  /**
   * Run a tool.
   *
   * @throws {SecurityError} If the tool attempted a command the gate refused
   */
  async execute(
    id: string,
    params: ToolParams = {},
    signal: AbortSignal = new AbortController().signal,
  ): Promise<ToolRunResult> {
    const entry = this.entry(id);
    if (entry === undefined) {
      this.logger.error(`Tool ${id} not found`);
      return { status: 'unavailable', reason: 'not_found' };
    }
    if (!entry.enabled) {
      this.logger.warn(`Tool ${id} is disabled`);
      return { status: 'unavailable', reason: 'disabled' };
    }

    const startedAt = this.now();
    this.contexts.set(id, { toolId: id, status: ToolStatus.Running, startedAt, endedAt: null, error: null });
    this.running.set(id, (this.running.get(id) ?? 0) + 1);
    this.audit?.log('TOOL_EXECUTE_START', { tool_id: id });
    this.logger.info(`Executing tool: ${id}`);

    try {
      const output = await entry.tool.handler(params, signal);
      const endedAt = this.now();
      const durationMs = endedAt - startedAt;
      this.contexts.set(id, { toolId: id, status: ToolStatus.Completed, startedAt, endedAt, error: null });
      this.audit?.log('TOOL_EXECUTE_SUCCESS', { tool_id: id, duration_ms: durationMs });
      this.logger.info(`Tool ${id} completed successfully`);
      return { status: 'completed', output, durationMs };
    } catch (err: unknown) {
      const endedAt = this.now();
      const error = errorMessage(err);
      this.contexts.set(id, { toolId: id, status: ToolStatus.Failed, startedAt, endedAt, error });
      this.audit?.log('TOOL_EXECUTE_FAILURE', { tool_id: id, error }, AuditLevel.Error);
      this.logger.error(`Tool ${id} execution failed: ${error}`);
      if (isSecurityError(err)) throw err;
      return { status: 'failed', error, durationMs: endedAt - startedAt };
    } finally {
      const count = (this.running.get(id) ?? 1) - 1;
      if (count > 0) {
        this.running.set(id, count);
      } else {
        this.running.delete(id);
      }
    }
  }

  statistics(): ToolStatistics {
    const toolsByCategory: Partial<Record<ToolCategory, number>> = {};
    let enabledTools = 0;
    for (const { tool, enabled } of this.entries.values()) {
      toolsByCategory[tool.category] = (toolsByCategory[tool.category] ?? 0) + 1;
      if (enabled) enabledTools++;
    }
    return {
      totalTools: this.entries.size,
      enabledTools,
      activeTools: this.running.size,
      categories: Object.keys(toolsByCategory).length,
      lazyLoaders: this.loaders.size,
      toolsByCategory,
    };
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private entry(id: string): RegistryEntry | undefined {
    const existing = this.entries.get(id);
    if (existing !== undefined) return existing;

    const loader = this.loaders.get(id);
    if (loader === undefined) return undefined;

    try {
      this.register(loader());
    } catch (err: unknown) {
      this.logger.error(`Failed to load lazy tool ${id}: ${errorMessage(err)}`);
      return undefined;
    }
    this.loaders.delete(id);
    return this.entries.get(id);
  }

  private setEnabled(id: string, enabled: boolean): boolean {
    const entry = this.entry(id);
    if (entry === undefined) return false;
    entry.enabled = enabled;
    this.audit?.log(enabled ? 'TOOL_ENABLED' : 'TOOL_DISABLED', { tool_id: id });
    this.logger.info(`${enabled ? 'Enabled' : 'Disabled'} tool: ${id}`);
    return true;
  }
}
