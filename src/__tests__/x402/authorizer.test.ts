/**
 * Tests for the payment authorizer: spend guard, expiry, funds preflight
 * and EIP-3009 signing.
 */

import { describe, it, expect, vi } from 'vitest';
import { keccak256, toHex } from 'viem';
import { privateKeyToAccount } from 'viem/accounts';
import { CHAINS } from '../../config/chains.js';
import { PaygateErrorCode } from '../../errors.js';
import { PaymentAuthorizer, verifyAuthorization } from '../../x402/authorizer.js';
import { credentialFromPrivateKey, type PaymentCredential } from '../../x402/credential.js';
import { NOW_MS, NOW_S, OTHER_KEY, TEST_KEY, USDC_SEPOLIA, makeChallenge, rejectionOf } from '../helpers.js';

const payer = privateKeyToAccount(TEST_KEY).address;

function authorizer(overrides: Partial<ConstructorParameters<typeof PaymentAuthorizer>[0]> = {}): PaymentAuthorizer {
  return new PaymentAuthorizer({
    chain: 'base-sepolia',
    maxSpendPerCall: 1_000_000n,
    now: () => NOW_MS,
    ...overrides,
  });
}

describe('PaymentAuthorizer', () => {
  it('signs a TransferWithAuthorization bound to the challenge', async () => {
    const auth = await authorizer().authorize(makeChallenge(), credentialFromPrivateKey(TEST_KEY));

    expect(auth.payer).toBe(payer);
    expect(auth.amount).toBe(10_000n);
    expect(auth.validAfter).toBe(0n);
    expect(auth.validBefore).toBe(BigInt(NOW_S + 60));
    expect(auth.nonce).toBe(keccak256(toHex('n1')));
    expect(auth.nonceLabel).toBe('n1');
    expect(auth.domain).toEqual({
      name: 'USDC',
      version: '2',
      chainId: 84532,
      verifyingContract: USDC_SEPOLIA,
    });
    expect(await verifyAuthorization(auth)).toBe(true);
  });

  it('produces the same signature for the same challenge', async () => {
    const credential = credentialFromPrivateKey(TEST_KEY);
    const first = await authorizer().authorize(makeChallenge(), credential);
    const second = await authorizer().authorize(makeChallenge(), credential);

    expect(second.signature).toBe(first.signature);
  });

  it('allows an amount exactly at the limit', async () => {
    const auth = await authorizer({ maxSpendPerCall: 10_000n }).authorize(
      makeChallenge(),
      credentialFromPrivateKey(TEST_KEY),
    );
    expect(auth.amount).toBe(10_000n);
  });

  it('refuses an amount above the spend guard without signing', async () => {
    const credential = credentialFromPrivateKey(TEST_KEY);
    const sign = vi.spyOn(credential, 'signTransferAuthorization');

    const error = await rejectionOf(
      authorizer().authorize(makeChallenge({ amount: 2_000_000n }), credential),
    );

    expect(error.code).toBe(PaygateErrorCode.SPEND_LIMIT_EXCEEDED);
    expect(error.category).toBe('AuthorizationError');
    expect(error.message).toBe('Payment amount ($2) exceeds the per-call limit ($1)');
    expect(error.context).toEqual({ resource: 'https://oracle.test/v1/data?q=1', nonce: 'n1' });
    expect(sign).not.toHaveBeenCalled();
  });

  it('refuses a challenge for a chain other than the configured one', async () => {
    const credential = credentialFromPrivateKey(TEST_KEY);
    const sign = vi.spyOn(credential, 'signTransferAuthorization');

    const error = await rejectionOf(
      authorizer().authorize(
        makeChallenge({ network: 'base', chainId: 8453, asset: CHAINS.base.usdc }),
        credential,
      ),
    );

    expect(error.code).toBe(PaygateErrorCode.PROTOCOL_VIOLATION);
    expect(error.message).toBe('Payment challenge n1 asks for chain 8453, payments are configured for Base Sepolia (84532)');
    expect(error.context).toEqual({ resource: 'https://oracle.test/v1/data?q=1', network: 'base' });
    expect(sign).not.toHaveBeenCalled();
  });

  it('refuses a challenge inside the clock-skew margin', async () => {
    const error = await rejectionOf(
      authorizer().authorize(makeChallenge({ expiresAt: NOW_S + 5 }), credentialFromPrivateKey(TEST_KEY)),
    );

    expect(error.code).toBe(PaygateErrorCode.CHALLENGE_EXPIRED);
  });

  it('checks expiry before the spend guard', async () => {
    const error = await rejectionOf(
      authorizer().authorize(
        makeChallenge({ expiresAt: NOW_S - 1, amount: 5_000_000n }),
        credentialFromPrivateKey(TEST_KEY),
      ),
    );

    expect(error.code).toBe(PaygateErrorCode.CHALLENGE_EXPIRED);
  });

  describe('funds preflight', () => {
    it('refuses when the balance is short', async () => {
      const balanceOf = vi.fn().mockResolvedValue(5_000n);
      const error = await rejectionOf(
        authorizer({ balanceReader: { balanceOf } }).authorize(makeChallenge(), credentialFromPrivateKey(TEST_KEY)),
      );

      expect(error.code).toBe(PaygateErrorCode.INSUFFICIENT_FUNDS);
      expect(error.message).toBe('Insufficient USDC: have $0.005, need $0.01');
      expect(balanceOf).toHaveBeenCalledWith(USDC_SEPOLIA, payer);
    });

    it('signs when the balance covers the amount', async () => {
      const balanceOf = vi.fn().mockResolvedValue(10_000n);
      const auth = await authorizer({ balanceReader: { balanceOf } }).authorize(
        makeChallenge(),
        credentialFromPrivateKey(TEST_KEY),
      );

      expect(auth.amount).toBe(10_000n);
    });

    it('reports an unreadable balance as a network error', async () => {
      const balanceOf = vi.fn().mockRejectedValue(new Error('rpc down'));
      const error = await rejectionOf(
        authorizer({ balanceReader: { balanceOf } }).authorize(makeChallenge(), credentialFromPrivateKey(TEST_KEY)),
      );

      expect(error.code).toBe(PaygateErrorCode.TRANSIENT_NETWORK);
      expect(error.message).toBe('Could not read payer balance: rpc down');
    });
  });

  it('wraps signer failures', async () => {
    const credential: PaymentCredential = {
      address: payer,
      signTransferAuthorization: vi.fn().mockRejectedValue(new Error('device locked')),
    };

    const error = await rejectionOf(authorizer().authorize(makeChallenge(), credential));

    expect(error.code).toBe(PaygateErrorCode.SIGNING_FAILURE);
    expect(error.message).toBe('Signing the payment authorization failed: device locked');
  });
});

describe('verifyAuthorization', () => {
  it('rejects an authorization presented for another nonce', async () => {
    const auth = await authorizer().authorize(makeChallenge(), credentialFromPrivateKey(TEST_KEY));

    expect(await verifyAuthorization(auth, keccak256(toHex('n2')))).toBe(false);
  });

  it('rejects a tampered amount', async () => {
    const auth = await authorizer().authorize(makeChallenge(), credentialFromPrivateKey(TEST_KEY));

    expect(await verifyAuthorization({ ...auth, amount: 20_000n })).toBe(false);
  });

  it('rejects a signature from someone other than the payer', async () => {
    const auth = await authorizer().authorize(makeChallenge(), credentialFromPrivateKey(OTHER_KEY));

    expect(await verifyAuthorization({ ...auth, payer })).toBe(false);
  });
});
