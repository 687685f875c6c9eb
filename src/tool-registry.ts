/**
 * Tool Registry
 *
 * Central registration and dispatch for the MCP tools.
 *
 * Usage:
 *   registerTool(definition, handler, { requiresCredential: true });
 *   // ...
 *   server.setRequestHandler(CallToolRequestSchema, (req) =>
 *     dispatch(req.params.name, req.params.arguments)
 *   );
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { wrapTool, type ToolConfig, type ToolHandler, type ToolResult } from './middleware.js';

interface ToolEntry {
  definition: Tool;
  handler: (args: Record<string, unknown>) => Promise<ToolResult>;
}

const TOOL_MAP = new Map<string, ToolEntry>();

/**
 * Register a tool. The handler is wrapped with the middleware pipeline.
 */
export function registerTool(definition: Tool, handler: ToolHandler, config: Partial<ToolConfig> = {}): void {
  TOOL_MAP.set(definition.name, {
    definition,
    handler: wrapTool(definition.name, handler, config),
  });
}

/**
 * Get all registered tool definitions (for ListTools response)
 */
export function getAllToolDefinitions(): Tool[] {
  return Array.from(TOOL_MAP.values()).map((e) => e.definition);
}

/**
 * Dispatch a tool call by name
 */
export async function dispatch(name: string, args?: Record<string, unknown>): Promise<ToolResult> {
  const entry = TOOL_MAP.get(name);
  if (!entry) {
    return {
      content: [{ type: 'text', text: `Unknown tool: ${name}` }],
      isError: true,
    };
  }
  return entry.handler(args ?? {});
}

export function clearTools(): void {
  TOOL_MAP.clear();
}
