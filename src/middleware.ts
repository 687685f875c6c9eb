/**
 * Middleware Pipeline
 *
 * Wraps every tool handler with standard pre/post processing:
 * 1. Service lookup (config is parsed once, on first call)
 * 2. Credential check for tools that may pay
 * 3. Timing and metrics per tool
 * 4. Error normalization (PaygateError → MCP response)
 */

import { PaygateError, PaygateErrorCode, formatPaygateError, toPaygateError } from './errors.js';
import { getServices, type Services } from './services.js';
import { withTiming } from './utils/logger.js';

/**
 * Context injected into tool handlers
 */
export interface ToolContext {
  services: Services;
}

/**
 * Standard MCP tool result type
 */
export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

export type ToolHandler = (args: Record<string, unknown>, ctx: ToolContext) => Promise<ToolResult>;

/**
 * Configuration for how middleware wraps a tool
 */
export interface ToolConfig {
  /** Refuse to run without a payer credential */
  requiresCredential: boolean;
}

const DEFAULT_CONFIG: ToolConfig = {
  requiresCredential: false,
};

/**
 * Wrap a tool handler with the middleware pipeline
 *
 * Returns a flat (args) => Promise<ToolResult> function that the
 * tool registry can call directly from MCP dispatch.
 */
export function wrapTool(
  name: string,
  handler: ToolHandler,
  config: Partial<ToolConfig> = {},
): (args: Record<string, unknown>) => Promise<ToolResult> {
  const cfg = { ...DEFAULT_CONFIG, ...config };

  return async (args: Record<string, unknown>): Promise<ToolResult> => {
    try {
      const services = getServices();

      if (cfg.requiresCredential && !services.orchestrator.payer) {
        throw new PaygateError(
          PaygateErrorCode.VALIDATION,
          `${name} may need to pay, but no payer credential is configured.`,
          'Set PAYER_PRIVATE_KEY in the server environment and restart.',
        );
      }

      const { result } = await withTiming(`tool.${name}`, { tool: name }, () => handler(args, { services }));
      return result;
    } catch (error) {
      return formatPaygateError(toPaygateError(error));
    }
  };
}
