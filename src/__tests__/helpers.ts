/**
 * Shared test fixtures: a fixed clock, 402 responses, a fake settlement
 * RPC and a fully wired orchestrator running against a vi.fn fetch.
 */

import { vi, type Mock } from 'vitest';
import { keccak256, toHex } from 'viem';
import { CHAINS } from '../config/chains.js';
import { PaygateError } from '../errors.js';
import { QueueSink } from '../events/notifier.js';
import { IdempotencyLedger } from '../ledger/ledger.js';
import type { FetchFn } from '../orchestrator/http.js';
import { RequestOrchestrator } from '../orchestrator/orchestrator.js';
import { SettlementVerifier, type SettlementRpc } from '../settlement/verifier.js';
import { PaymentAuthorizer } from '../x402/authorizer.js';
import { credentialFromPrivateKey, type PaymentCredential } from '../x402/credential.js';
import type { PaymentChallenge } from '../x402/types.js';

/** Placeholder key, never funded anywhere */
export const TEST_KEY = `0x${'11'.repeat(32)}` as const;
export const OTHER_KEY = `0x${'22'.repeat(32)}` as const;

export const PAY_TO = '0x1234567890123456789012345678901234567890';
export const USDC_SEPOLIA = CHAINS['base-sepolia'].usdc;

export const NOW_MS = 1_750_000_000_000;
export const NOW_S = NOW_MS / 1000;

export const ORACLE_URL = 'https://oracle.test/v1/data?q=1';

/**
 * A clock that only moves when something sleeps on it
 */
export class FakeClock {
  ms = NOW_MS;

  now = (): number => this.ms;

  sleep = async (ms: number): Promise<void> => {
    this.ms += ms;
  };
}

export interface ChallengeTerms {
  amount?: string;
  nonce?: string;
  validUntil?: number;
  network?: string;
  asset?: string;
}

/**
 * A parsed challenge as the authorizer receives it
 */
export function makeChallenge(overrides: Partial<PaymentChallenge> = {}): PaymentChallenge {
  return {
    x402Version: 2,
    scheme: 'exact',
    network: 'base-sepolia',
    chainId: 84532,
    asset: USDC_SEPOLIA,
    amount: 10_000n,
    payTo: PAY_TO,
    nonce: keccak256(toHex('n1')),
    nonceLabel: 'n1',
    expiresAt: NOW_S + 60,
    resource: ORACLE_URL,
    tokenDomain: { name: 'USDC', version: '2' },
    ...overrides,
  };
}

export function encodeBase64Json(value: unknown): string {
  return Buffer.from(JSON.stringify(value)).toString('base64');
}

export function v2Challenge(terms: ChallengeTerms = {}) {
  return {
    x402Version: 2,
    resource: { url: ORACLE_URL, description: 'Oracle data' },
    accepts: [
      {
        scheme: 'exact',
        network: terms.network ?? 'eip155:84532',
        asset: terms.asset ?? USDC_SEPOLIA,
        amount: terms.amount ?? '10000',
        payTo: PAY_TO,
        validUntil: terms.validUntil ?? NOW_S + 60,
        extra: { name: 'USDC', version: '2', nonce: terms.nonce ?? 'n1' },
      },
    ],
  };
}

/**
 * A 402 carrying a PAYMENT-REQUIRED header
 */
export function paymentRequired(terms: ChallengeTerms = {}): Response {
  return new Response(JSON.stringify({ error: 'payment required' }), {
    status: 402,
    headers: { 'payment-required': encodeBase64Json(v2Challenge(terms)) },
  });
}

export function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json', ...headers },
  });
}

export function createFakeRpc() {
  return {
    getReceiptStatus: vi.fn<SettlementRpc['getReceiptStatus']>().mockResolvedValue(null),
    authorizationState: vi.fn<SettlementRpc['authorizationState']>().mockResolvedValue(false),
  };
}

export interface HarnessOptions {
  maxSpendPerCall?: bigint;
  credential?: PaymentCredential;
  settlementTimeoutMs?: number;
}

export function createHarness(options: HarnessOptions = {}) {
  const clock = new FakeClock();
  const fetchFn = vi.fn<FetchFn>();
  const rpc = createFakeRpc();
  const sink = new QueueSink();
  const credential = options.credential ?? credentialFromPrivateKey(TEST_KEY);
  const signSpy = vi.spyOn(credential, 'signTransferAuthorization');

  const ledger = new IdempotencyLedger({
    retentionMs: 86_400_000,
    dedupWindowMs: 600_000,
    now: clock.now,
  });
  const authorizer = new PaymentAuthorizer({
    chain: 'base-sepolia',
    maxSpendPerCall: options.maxSpendPerCall ?? 1_000_000n,
    now: clock.now,
  });
  const verifier = new SettlementVerifier(rpc, {
    timeoutMs: options.settlementTimeoutMs ?? 2_000,
    baseDelayMs: 500,
    maxDelayMs: 1_000,
    now: clock.now,
    sleep: clock.sleep,
  });
  const orchestrator = new RequestOrchestrator(
    { ledger, authorizer, verifier, credential, fetchFn, sink, now: clock.now, sleep: clock.sleep },
    { maxAttempts: 3, backoffMs: 10, deadlineMs: 30_000 },
  );

  return { clock, fetchFn, rpc, sink, credential, signSpy, ledger, authorizer, verifier, orchestrator };
}

/**
 * Headers a fetch call was made with
 */
export function sentHeaders(fetchFn: Mock<FetchFn>, call: number): Record<string, string> {
  const init = fetchFn.mock.calls[call]?.[1];
  const headers = init?.headers;
  if (!headers || headers instanceof Headers || Array.isArray(headers)) return {};
  return headers;
}

/**
 * Await a promise expected to reject with a PaygateError
 */
export async function rejectionOf(promise: Promise<unknown>): Promise<PaygateError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof PaygateError) return error;
    throw error;
  }
  throw new Error('Expected promise to reject');
}
