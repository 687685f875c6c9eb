/**
 * Code Appraisal Tool
 *
 * Asks the code oracle for a repository's requirement matches and size,
 * then scores affinity and complexity into a SURGE valuation.
 */

import type { ToolContext, ToolResult } from '../middleware.js';
import { formatReceipt, textResult } from './format.js';

export const appraiseRepoToolDefinition = {
  name: 'oracle_appraise_repo',
  description: `Appraise a GitHub repository.

Scores the repository's requirement affinity (matched/total × 0.618) and
complexity (size and stars, clamped to 1-10), and reports a value in SURGE.
Affinity above 0.5 is reported as high quality.

The code oracle may charge a small USDC fee via HTTP 402, capped by
PAYGATE_MAX_SPEND_USD.

**Example:**
\`\`\`json
{ "repoUrl": "https://github.com/owner/repo" }
\`\`\``,
  inputSchema: {
    type: 'object' as const,
    properties: {
      repoUrl: {
        type: 'string',
        description: 'Repository URL, https://github.com/<owner>/<repo>',
      },
    },
    required: ['repoUrl'],
  },
};

export async function handleAppraiseRepoRequest(
  args: Record<string, unknown>,
  ctx: ToolContext,
): Promise<ToolResult> {
  const result = await ctx.services.adapter.appraiseCodeRepository(args);
  if (!result.ok) throw result.error;

  const appraisal = result.data;
  const icon = appraisal.status === 'Low Affinity' ? '🍂' : '🍯';

  return textResult(
    [
      `${icon} **${appraisal.repository}**: ${appraisal.status}`,
      '',
      `| Metric | Value |`,
      `|--------|-------|`,
      `| Affinity | ${appraisal.affinity} |`,
      `| Complexity | ${appraisal.complexity} |`,
      `| Value | ${appraisal.valuation} |`,
      '',
      formatReceipt(result.payment),
    ].join('\n'),
  );
}
