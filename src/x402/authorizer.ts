/**
 * Payment Authorizer
 *
 * Turns a PaymentChallenge into a signed EIP-3009 authorization:
 *
 * 1. Reject challenges for another chain, and stale ones (past expiry, with
 *    a small clock-skew margin)
 * 2. Enforce the per-call spend guard (never clamps)
 * 3. Optionally check the payer's USDC balance
 * 4. Sign TransferWithAuthorization bound to the challenge nonce
 *
 * Nothing is submitted to the network here. The signed authorization is
 * handed to the resource, which settles it.
 */

import { parseAbi, verifyTypedData, type Address, type Hex } from 'viem';
import { CHAINS, formatUsdc, type RpcClient, type SupportedChain } from '../config/chains.js';
import { PaygateError, PaygateErrorCode } from '../errors.js';
import {
  TRANSFER_WITH_AUTHORIZATION_TYPES,
  type PaymentCredential,
  type TransferWithAuthorizationMessage,
} from './credential.js';
import type { PaymentAuthorization, PaymentChallenge, SigningDomain } from './types.js';

const erc20BalanceAbi = parseAbi(['function balanceOf(address owner) view returns (uint256)']);

/**
 * Reads token balances for the optional funds preflight
 */
export interface BalanceReader {
  balanceOf(token: Address, owner: Address): Promise<bigint>;
}

export function balanceReaderFromClient(client: RpcClient): BalanceReader {
  return {
    balanceOf: (token, owner) =>
      client.readContract({
        address: token,
        abi: erc20BalanceAbi,
        functionName: 'balanceOf',
        args: [owner],
      }),
  };
}

export interface PaymentAuthorizerOptions {
  /** The only chain payments are signed for; settlement is checked there too */
  chain: SupportedChain;
  /** Spend guard in token base units */
  maxSpendPerCall: bigint;
  balanceReader?: BalanceReader;
  /** Clock in unix milliseconds */
  now?: () => number;
  clockSkewSeconds?: number;
}

export class PaymentAuthorizer {
  private readonly now: () => number;
  private readonly clockSkewSeconds: number;

  constructor(private readonly options: PaymentAuthorizerOptions) {
    this.now = options.now ?? Date.now;
    this.clockSkewSeconds = options.clockSkewSeconds ?? 5;
  }

  get chain(): SupportedChain {
    return this.options.chain;
  }

  async authorize(
    challenge: PaymentChallenge,
    credential: PaymentCredential,
  ): Promise<PaymentAuthorization> {
    const nowSeconds = Math.floor(this.now() / 1000);

    const chain = CHAINS[this.options.chain];
    if (challenge.network !== this.options.chain || challenge.chainId !== chain.chainId) {
      throw new PaygateError(
        PaygateErrorCode.PROTOCOL_VIOLATION,
        `Payment challenge ${challenge.nonceLabel} asks for chain ${challenge.chainId}, payments are configured for ${chain.name} (${chain.chainId})`,
        `Set PAYGATE_CHAIN to pay on ${challenge.network}.`,
        { resource: challenge.resource, network: challenge.network },
      );
    }

    if (challenge.expiresAt <= nowSeconds + this.clockSkewSeconds) {
      throw new PaygateError(
        PaygateErrorCode.CHALLENGE_EXPIRED,
        `Payment challenge ${challenge.nonceLabel} expired at ${new Date(challenge.expiresAt * 1000).toISOString()}`,
        'Request the resource again to receive a fresh challenge.',
      );
    }

    if (challenge.amount > this.options.maxSpendPerCall) {
      throw new PaygateError(
        PaygateErrorCode.SPEND_LIMIT_EXCEEDED,
        `Payment amount ($${formatUsdc(challenge.amount)}) exceeds the per-call limit ($${formatUsdc(this.options.maxSpendPerCall)})`,
        'Raise PAYGATE_MAX_SPEND_USD if this price is expected.',
        { resource: challenge.resource, nonce: challenge.nonceLabel },
      );
    }

    if (this.options.balanceReader) {
      await this.requireFunds(this.options.balanceReader, challenge, credential.address);
    }

    const domain: SigningDomain = {
      name: challenge.tokenDomain.name,
      version: challenge.tokenDomain.version,
      chainId: challenge.chainId,
      verifyingContract: challenge.asset,
    };

    const message: TransferWithAuthorizationMessage = {
      from: credential.address,
      to: challenge.payTo,
      value: challenge.amount,
      validAfter: 0n,
      validBefore: BigInt(challenge.expiresAt),
      nonce: challenge.nonce,
    };

    let signature: Hex;
    try {
      signature = await credential.signTransferAuthorization(domain, message);
    } catch (error) {
      throw new PaygateError(
        PaygateErrorCode.SIGNING_FAILURE,
        `Signing the payment authorization failed: ${error instanceof Error ? error.message : String(error)}`,
      );
    }

    return {
      x402Version: challenge.x402Version,
      scheme: challenge.scheme,
      network: challenge.network,
      payer: credential.address,
      payTo: challenge.payTo,
      amount: challenge.amount,
      asset: challenge.asset,
      validAfter: message.validAfter,
      validBefore: message.validBefore,
      nonce: challenge.nonce,
      nonceLabel: challenge.nonceLabel,
      domain,
      signature,
    };
  }

  private async requireFunds(
    reader: BalanceReader,
    challenge: PaymentChallenge,
    payer: Address,
  ): Promise<void> {
    let balance: bigint;
    try {
      balance = await reader.balanceOf(challenge.asset, payer);
    } catch (error) {
      throw new PaygateError(
        PaygateErrorCode.TRANSIENT_NETWORK,
        `Could not read payer balance: ${error instanceof Error ? error.message : String(error)}`,
      );
    }

    if (balance < challenge.amount) {
      throw new PaygateError(
        PaygateErrorCode.INSUFFICIENT_FUNDS,
        `Insufficient USDC: have $${formatUsdc(balance)}, need $${formatUsdc(challenge.amount)}`,
        `Fund ${payer} with USDC on ${CHAINS[challenge.network].name}.`,
      );
    }
  }
}

/**
 * Check that an authorization was signed by its payer and is bound to the
 * expected challenge nonce. An authorization never transfers to another nonce.
 */
export async function verifyAuthorization(
  authorization: PaymentAuthorization,
  expectedNonce: Hex = authorization.nonce,
): Promise<boolean> {
  if (authorization.nonce.toLowerCase() !== expectedNonce.toLowerCase()) {
    return false;
  }

  try {
    return await verifyTypedData({
      address: authorization.payer,
      domain: authorization.domain,
      types: TRANSFER_WITH_AUTHORIZATION_TYPES,
      primaryType: 'TransferWithAuthorization',
      message: {
        from: authorization.payer,
        to: authorization.payTo,
        value: authorization.amount,
        validAfter: authorization.validAfter,
        validBefore: authorization.validBefore,
        nonce: authorization.nonce,
      },
      signature: authorization.signature,
    });
  } catch {
    // Malformed signature bytes
    return false;
  }
}
