/**
 * Tool dispatch through the registry and middleware, with services built
 * from configuration and a scripted oracle.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { Hex } from 'viem';
import { privateKeyToAccount } from 'viem/accounts';
import { loadConfig } from '../../config/settings.js';
import type { FetchFn } from '../../orchestrator/http.js';
import { createServices, setServices } from '../../services.js';
import { resetStats } from '../../utils/logger.js';
import { clearTools, dispatch, getAllToolDefinitions, registerTool } from '../../tool-registry.js';
import { appraiseRepoToolDefinition, handleAppraiseRepoRequest } from '../../tools/appraise-repo.js';
import { handleStatusRequest, statusToolDefinition } from '../../tools/status.js';
import { handleVerifyAssetRequest, verifyAssetToolDefinition } from '../../tools/verify-asset.js';
import { FakeClock, ORACLE_URL, TEST_KEY, createFakeRpc, encodeBase64Json, jsonResponse, paymentRequired } from '../helpers.js';

const TX_HASH: Hex = `0x${'ef'.repeat(32)}`;
const ENV = {
  PAYER_PRIVATE_KEY: TEST_KEY,
  VISION_ORACLE_URL: 'https://vision.test',
  CODE_ORACLE_URL: 'https://code.test',
  PAYGATE_CHECK_BALANCE: 'false',
};
const STATS = { matchedRequirements: 9, totalRequirements: 10, size: 450, stargazersCount: 12 };

function textOf(result: { content: Array<{ text: string }> }): string {
  return result.content.map((c) => c.text).join('\n');
}

describe('MCP tools', () => {
  const fetchFn = vi.fn<FetchFn>();

  function install(env: NodeJS.ProcessEnv): void {
    const clock = new FakeClock();
    setServices(
      createServices(loadConfig(env), { fetchFn, rpc: createFakeRpc(), now: clock.now, sleep: clock.sleep }),
    );
  }

  beforeEach(() => {
    fetchFn.mockReset();
    resetStats();
    clearTools();
    registerTool(verifyAssetToolDefinition, handleVerifyAssetRequest, { requiresCredential: true });
    registerTool(appraiseRepoToolDefinition, handleAppraiseRepoRequest, { requiresCredential: true });
    registerTool(statusToolDefinition, handleStatusRequest);
    install(ENV);
  });

  afterEach(() => {
    setServices(null);
  });

  it('lists the registered tools', () => {
    expect(getAllToolDefinitions().map((t) => t.name)).toEqual([
      'oracle_verify_asset',
      'oracle_appraise_repo',
      'paygate_status',
    ]);
  });

  it('appraises a repository and shows the payment', async () => {
    fetchFn
      .mockResolvedValueOnce(paymentRequired())
      .mockResolvedValueOnce(
        jsonResponse(STATS, 200, { 'X-PAYMENT-RESPONSE': encodeBase64Json({ success: true, transaction: TX_HASH }) }),
      );

    const result = await dispatch('oracle_appraise_repo', { repoUrl: 'https://github.com/acme/widgets' });

    expect(result.isError).toBeUndefined();
    expect(textOf(result)).toBe(
      [
        '🍯 **acme/widgets**: High-Quality Code-Honey Detected',
        '',
        '| Metric | Value |',
        '|--------|-------|',
        '| Affinity | 0.5562 |',
        '| Complexity | 1.65 |',
        '| Value | 72.12 SURGE |',
        '',
        '💳 Paid $0.01 USDC on Base Sepolia',
        'Nonce: n1',
        `Transaction: https://sepolia.basescan.org/tx/${TX_HASH}`,
      ].join('\n'),
    );
  });

  it('verifies an asset without payment', async () => {
    fetchFn.mockResolvedValueOnce(jsonResponse({ make: 'Tesla', model: 'Model 3', year: 2022 }));

    const text = textOf(await dispatch('oracle_verify_asset', { imageUrl: 'https://img.test/car.jpg' }));

    expect(text.split('\n')[0]).toBe('🔍 **Asset verified**');
    expect(text).toContain('"make": "Tesla"');
    expect(text.endsWith('No payment was required.')).toBe(true);
  });

  it('turns oracle failures into error results', async () => {
    const result = await dispatch('oracle_verify_asset', { imageUrl: 'nope' });

    expect(result.isError).toBe(true);
    expect(textOf(result).split('\n')[0]).toBe(
      '❌ [ValidationError] Invalid parameters for verify_asset_quality: imageUrl: Invalid url',
    );
  });

  it('refuses paying tools without a credential', async () => {
    install({ ...ENV, PAYER_PRIVATE_KEY: undefined });

    const result = await dispatch('oracle_appraise_repo', { repoUrl: 'https://github.com/acme/widgets' });

    expect(result.isError).toBe(true);
    expect(textOf(result)).toBe(
      [
        '❌ [ValidationError] oracle_appraise_repo may need to pay, but no payer credential is configured.',
        '',
        '→ Set PAYER_PRIVATE_KEY in the server environment and restart.',
        '',
        'Do not retry this call unchanged.',
      ].join('\n'),
    );
    expect(fetchFn).not.toHaveBeenCalled();
  });

  it('reports payer, spend guard and ledger records', async () => {
    fetchFn.mockResolvedValueOnce(paymentRequired()).mockResolvedValueOnce(jsonResponse(STATS));
    await dispatch('oracle_appraise_repo', { repoUrl: 'https://github.com/acme/widgets' });

    const lines = textOf(await dispatch('paygate_status', {})).split('\n');

    expect(lines).toContain(`**Payer:** ${privateKeyToAccount(TEST_KEY).address}`);
    expect(lines).toContain('**Chain:** base-sepolia');
    expect(lines).toContain('**Spend guard:** $1.00 per call');
    expect(lines).toContain('**Ledger:** 1 records (1 confirmed, 0 pending, 0 failed, 0 expired)');
    expect(lines).toContain(`- ✅ confirmed · $0.01 · nonce n1 · ${ORACLE_URL}`);
    expect(lines.some((line) => line.startsWith('- tool.oracle_appraise_repo: 1 calls, 100% ok'))).toBe(true);
  });

  it('validates status parameters', async () => {
    const result = await dispatch('paygate_status', { limit: 0 });

    expect(result.isError).toBe(true);
    expect(textOf(result).split('\n')[0]).toBe(
      '❌ [ValidationError] Invalid parameters: Number must be greater than or equal to 1',
    );
  });

  it('reports unknown tools', async () => {
    expect(await dispatch('nope')).toEqual({
      content: [{ type: 'text', text: 'Unknown tool: nope' }],
      isError: true,
    });
  });
});
