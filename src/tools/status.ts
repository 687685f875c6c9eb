/**
 * Paygate Status Tool
 *
 * Read-only view of the payment core: configuration that bounds spending,
 * ledger records by status, and per-operation metrics.
 */

import { z } from 'zod';
import { formatUsdc } from '../config/chains.js';
import { PaygateError, PaygateErrorCode } from '../errors.js';
import type { ToolContext, ToolResult } from '../middleware.js';
import { getStats } from '../utils/logger.js';
import type { RecordStatus, SettlementRecord } from '../x402/types.js';
import { textResult } from './format.js';

const StatusInputSchema = z.object({
  showRecords: z.boolean().optional().default(true),
  limit: z.number().int().min(1).max(100).optional().default(20),
});

export const statusToolDefinition = {
  name: 'paygate_status',
  description: `Show payment status: spend guard, payer, ledger records and operation metrics.

Use this to check whether a paid oracle call settled, or why a call was refused.

**Example:**
\`\`\`json
{ "showRecords": true, "limit": 10 }
\`\`\``,
  inputSchema: {
    type: 'object' as const,
    properties: {
      showRecords: {
        type: 'boolean',
        default: true,
        description: 'Include the most recent ledger records',
      },
      limit: {
        type: 'number',
        minimum: 1,
        maximum: 100,
        default: 20,
        description: 'How many records to list',
      },
    },
  },
};

const STATUS_ICON: Record<RecordStatus, string> = {
  pending: '⏳',
  confirmed: '✅',
  failed: '❌',
  expired: '⌛',
};

function formatRecord(record: SettlementRecord): string {
  const parts = [
    `${STATUS_ICON[record.status]} ${record.status}`,
    `$${formatUsdc(record.amount)}`,
    `nonce ${record.nonceLabel}`,
    record.resource,
  ];
  if (record.txHash) parts.push(`tx ${record.txHash}`);
  return `- ${parts.join(' · ')}`;
}

export async function handleStatusRequest(args: Record<string, unknown>, ctx: ToolContext): Promise<ToolResult> {
  const parsed = StatusInputSchema.safeParse(args);
  if (!parsed.success) {
    throw new PaygateError(PaygateErrorCode.VALIDATION, `Invalid parameters: ${parsed.error.issues[0]?.message}`);
  }
  const { showRecords, limit } = parsed.data;
  const { config, ledger, orchestrator } = ctx.services;

  const records = ledger.snapshot().sort((a, b) => b.updatedAt - a.updatedAt);
  const counts: Record<RecordStatus, number> = { pending: 0, confirmed: 0, failed: 0, expired: 0 };
  for (const record of records) counts[record.status]++;

  const lines = [
    '## Paygate status',
    '',
    `**Payer:** ${orchestrator.payer ?? 'not configured'}`,
    `**Chain:** ${config.chain}`,
    `**Spend guard:** $${config.maxSpendUsd} per call`,
    '',
    `**Ledger:** ${records.length} records (${counts.confirmed} confirmed, ${counts.pending} pending, ${counts.failed} failed, ${counts.expired} expired)`,
  ];

  if (showRecords && records.length > 0) {
    lines.push('', ...records.slice(0, limit).map(formatRecord));
  }

  const stats = getStats();
  const operations = Object.entries(stats.metrics);
  if (operations.length > 0) {
    lines.push('', '**Operations:**');
    for (const [operation, m] of operations) {
      lines.push(`- ${operation}: ${m.count} calls, ${m.successRate}% ok, avg ${m.avgDurationMs}ms`);
    }
  }

  if (stats.recentErrors.length > 0) {
    lines.push('', '**Recent errors:**');
    for (const e of stats.recentErrors) {
      lines.push(`- ${e.operation}: ${e.message} (×${e.count})`);
    }
  }

  return textResult(lines.join('\n'));
}
