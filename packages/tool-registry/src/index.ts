/**
 * @cyberdeck/tool-registry
 *
 * Registration, lazy loading, enablement and tracked execution of deck tools.
 */

export { ToolCategory, ToolStatus } from './types.js';
export type {
  DependencyProbe,
  ToolDefinition,
  ToolExecutionContext,
  ToolHandler,
  ToolLoader,
  ToolOutput,
  ToolParams,
  ToolRunResult,
  ToolStatistics,
} from './types.js';
export { ASSUME_INSTALLED, ToolRegistry } from './registry.js';
export type { ToolRegistryOptions } from './registry.js';
