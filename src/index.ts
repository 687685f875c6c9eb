#!/usr/bin/env node
/**
 * Paygate Oracle MCP Server
 *
 * Exposes oracle tools to an agent. Oracles may answer HTTP 402; the
 * payment core authorizes USDC payments within the spend guard and makes
 * sure one logical request is never paid twice.
 *
 * @see https://x402.org
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';

import { validateConfig } from './config/settings.js';
import { SubmoltNotifier } from './events/notifier.js';
import { getServices } from './services.js';
import { dispatch, getAllToolDefinitions, registerTool } from './tool-registry.js';
import { logger } from './utils/logger.js';

import { appraiseRepoToolDefinition, handleAppraiseRepoRequest } from './tools/appraise-repo.js';
import { handleStatusRequest, statusToolDefinition } from './tools/status.js';
import { handleVerifyAssetRequest, verifyAssetToolDefinition } from './tools/verify-asset.js';

// Catch fatal errors
process.on('uncaughtException', (err) => {
  logger.fatal({ err }, 'Uncaught exception');
  process.exit(1);
});
process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled rejection');
});

// ─── Tool Registration ──────────────────────────────────────────────

// Oracles (may pay)
registerTool(verifyAssetToolDefinition, handleVerifyAssetRequest, { requiresCredential: true });
registerTool(appraiseRepoToolDefinition, handleAppraiseRepoRequest, { requiresCredential: true });

// Read
registerTool(statusToolDefinition, handleStatusRequest);

// ─── Server Setup ───────────────────────────────────────────────────

const MAINTENANCE_INTERVAL_MS = 60_000;

function createServer(): Server {
  const server = new Server(
    {
      name: 'paygate-oracle-mcp',
      version: '0.1.0',
    },
    {
      capabilities: {
        tools: {},
      },
    },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: getAllToolDefinitions() };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    return dispatch(name, args);
  });

  return server;
}

/**
 * Sweep old ledger records and re-verify pending payments
 */
async function runMaintenance(): Promise<void> {
  const { ledger, orchestrator } = getServices();
  ledger.evictExpired();
  const reconciled = await orchestrator.reconcilePending();
  if (reconciled.length > 0) {
    logger.info({ reconciled }, 'Pending payments reconciled');
  }
}

async function main(): Promise<void> {
  const services = getServices();

  // Validate config (warnings only, startup continues)
  for (const warning of validateConfig(services.config)) {
    logger.warn(warning);
  }

  const server = createServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info({ chain: services.config.chain, payer: services.orchestrator.payer }, 'Paygate Oracle MCP Server running on stdio');

  const timer = setInterval(() => {
    runMaintenance().catch((error: unknown) => {
      logger.warn({ err: error instanceof Error ? error.message : String(error) }, 'Ledger maintenance failed');
    });
  }, MAINTENANCE_INTERVAL_MS);
  timer.unref();

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Shutting down');
    clearInterval(timer);
    if (services.sink instanceof SubmoltNotifier) {
      await services.sink.flush();
    }
    await server.close();
    process.exit(0);
  };

  process.on('SIGINT', () => {
    shutdown('SIGINT').catch((error: unknown) => {
      logger.error({ err: error }, 'Shutdown failed');
      process.exit(1);
    });
  });
  process.on('SIGTERM', () => {
    shutdown('SIGTERM').catch((error: unknown) => {
      logger.error({ err: error }, 'Shutdown failed');
      process.exit(1);
    });
  });
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Fatal error');
  process.exit(1);
});
