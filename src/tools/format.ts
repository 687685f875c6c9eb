/**
 * Shared text formatting for tool responses
 */

import { CHAINS, formatUsdc, getExplorerTxUrl } from '../config/chains.js';
import type { ToolResult } from '../middleware.js';
import type { PaymentReceipt } from '../x402/types.js';

export function formatReceipt(payment: PaymentReceipt | undefined): string {
  if (!payment) return 'No payment was required.';

  const lines = [
    payment.reused
      ? `💳 Reused settled payment of $${formatUsdc(payment.amount)} USDC (no new charge)`
      : `💳 Paid $${formatUsdc(payment.amount)} USDC on ${CHAINS[payment.network].name}`,
    `Nonce: ${payment.nonceLabel}`,
  ];
  if (payment.txHash) {
    lines.push(`Transaction: ${getExplorerTxUrl(payment.network, payment.txHash)}`);
  }
  return lines.join('\n');
}

export function textResult(text: string): ToolResult {
  return { content: [{ type: 'text', text }] };
}
