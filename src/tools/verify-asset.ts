/**
 * Asset Verification Tool
 *
 * Sends an image to the vision oracle and returns a vehicle asset
 * observation. The oracle may demand an x402 payment, which is made
 * within the configured spend guard.
 */

import type { ToolContext, ToolResult } from '../middleware.js';
import { formatReceipt, textResult } from './format.js';

export const verifyAssetToolDefinition = {
  name: 'oracle_verify_asset',
  description: `Verify a vehicle asset from an image.

Routes the image to the vision oracle and returns a structured asset observation
(make, model, year, color, confidence score, estimated price).

The oracle may charge a small USDC fee via HTTP 402. Payments are capped by
PAYGATE_MAX_SPEND_USD and never repeated for the same image while a settled
payment is still valid.

**Example:**
\`\`\`json
{ "imageUrl": "https://example.com/car.jpg" }
\`\`\``,
  inputSchema: {
    type: 'object' as const,
    properties: {
      imageUrl: {
        type: 'string',
        description: 'Public URL of the image to verify',
      },
    },
    required: ['imageUrl'],
  },
};

export async function handleVerifyAssetRequest(
  args: Record<string, unknown>,
  ctx: ToolContext,
): Promise<ToolResult> {
  const result = await ctx.services.adapter.verifyAssetQuality(args);
  if (!result.ok) throw result.error;

  return textResult(
    [
      '🔍 **Asset verified**',
      '',
      '```json',
      JSON.stringify(result.data, null, 2),
      '```',
      '',
      formatReceipt(result.payment),
    ].join('\n'),
  );
}
