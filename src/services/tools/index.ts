// Tool System Initialization
// Registers the built-in tools on startup

import { createLogger } from '../../utils/logger.js';
import { ToolRegistry } from './registry.js';
import { analyzeProductTool } from './analyze-product-tool.js';
import { positioningReadinessTool } from './positioning-readiness-tool.js';
import type { ToolDefinition } from './types.js';

const log = createLogger('tools');

export { ToolRegistry, buildArgumentSchema } from './registry.js';
export { ToolExecutor } from './executor.js';
export type { ToolExecutorOptions } from './executor.js';
export type { ToolDefinition, ToolResult, ToolParameter, ToolContext } from './types.js';

export const BUILTIN_TOOLS: readonly ToolDefinition[] = [
  analyzeProductTool,
  positioningReadinessTool,
];

export function initializeTools(
  registry: ToolRegistry = new ToolRegistry(),
  tools: readonly ToolDefinition[] = BUILTIN_TOOLS,
): ToolRegistry {
  for (const tool of tools) {
    registry.register(tool);
  }

  log.info({ tools: registry.getAll().map(t => t.name) }, `Tool system initialized with ${registry.size} tool(s)`);
  return registry;
}
