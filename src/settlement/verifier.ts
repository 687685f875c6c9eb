/**
 * Settlement Verifier
 *
 * Answers one question for a signed authorization: did it settle?
 *
 * - With a known transaction hash the receipt decides.
 * - Without one, USDC's EIP-3009 `authorizationState(payer, nonce)` tells
 *   whether the nonce was consumed on-chain.
 *
 * `verify()` polls with exponential backoff until a definitive answer or
 * the timeout. It never reports success it could not observe.
 */

import { parseAbi, TransactionReceiptNotFoundError, type Address, type Hex } from 'viem';
import type { RpcClient } from '../config/chains.js';
import { PaygateError, PaygateErrorCode } from '../errors.js';
import { logger } from '../utils/logger.js';
import { verifyAuthorization } from '../x402/authorizer.js';
import type { PaymentAuthorization, SettlementOutcome, SettlementStatus } from '../x402/types.js';

const eip3009Abi = parseAbi([
  'function authorizationState(address authorizer, bytes32 nonce) view returns (bool)',
]);

/**
 * The RPC surface the verifier needs. Narrow on purpose so tests can fake it.
 */
export interface SettlementRpc {
  /** null while the transaction is unknown or unmined */
  getReceiptStatus(hash: Hex): Promise<'success' | 'reverted' | null>;
  /** true once the authorization nonce has been used */
  authorizationState(token: Address, authorizer: Address, nonce: Hex): Promise<boolean>;
}

export function createSettlementRpc(client: RpcClient): SettlementRpc {
  return {
    async getReceiptStatus(hash) {
      try {
        const receipt = await client.getTransactionReceipt({ hash });
        return receipt.status;
      } catch (error) {
        if (error instanceof TransactionReceiptNotFoundError) return null;
        throw error;
      }
    },
    authorizationState: (token, authorizer, nonce) =>
      client.readContract({
        address: token,
        abi: eip3009Abi,
        functionName: 'authorizationState',
        args: [authorizer, nonce],
      }),
  };
}

export interface VerifyTarget {
  /** Nonce of the challenge the authorization must be bound to */
  expectedNonce: Hex;
  txHash?: Hex;
}

export interface SettlementVerifierOptions {
  timeoutMs: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class SettlementVerifier {
  private readonly baseDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly rpc: SettlementRpc,
    private readonly options: SettlementVerifierOptions,
  ) {
    this.baseDelayMs = options.baseDelayMs ?? 500;
    this.maxDelayMs = options.maxDelayMs ?? 4000;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * A single settlement check. RPC failures surface as TRANSIENT_NETWORK.
   */
  async checkOnce(authorization: PaymentAuthorization, target: VerifyTarget): Promise<SettlementStatus> {
    // An authorization that does not match its challenge can never settle it
    if (!(await verifyAuthorization(authorization, target.expectedNonce))) {
      return 'failed';
    }

    try {
      if (target.txHash) {
        const receipt = await this.rpc.getReceiptStatus(target.txHash);
        if (receipt === 'success') return 'confirmed';
        if (receipt === 'reverted') return 'failed';
        return 'pending';
      }

      const used = await this.rpc.authorizationState(
        authorization.asset,
        authorization.payer,
        authorization.nonce,
      );
      return used ? 'confirmed' : 'not_found';
    } catch (error) {
      throw new PaygateError(
        PaygateErrorCode.TRANSIENT_NETWORK,
        `Settlement RPC unavailable: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  /**
   * Poll until confirmed/failed or the timeout. At timeout, `not_found`
   * becomes `failed`; `pending` or an unreachable RPC becomes `ambiguous`.
   */
  async verify(authorization: PaymentAuthorization, target: VerifyTarget): Promise<SettlementOutcome> {
    const start = this.now();
    let delay = this.baseDelayMs;
    let lastObserved: SettlementStatus | null = null;
    let attempts = 0;

    for (;;) {
      attempts++;
      try {
        const status = await this.checkOnce(authorization, target);
        if (status === 'confirmed' || status === 'failed') {
          logger.debug({ nonce: authorization.nonceLabel, status, attempts }, 'Settlement decided');
          return status;
        }
        lastObserved = status;
      } catch (error) {
        // Keep the last status actually observed; one flaky read does not erase it
        logger.debug({ nonce: authorization.nonceLabel, attempts, err: error }, 'Settlement check failed');
      }

      const elapsed = this.now() - start;
      if (elapsed >= this.options.timeoutMs) break;

      await this.sleep(Math.min(delay, this.options.timeoutMs - elapsed));
      delay = Math.min(delay * 2, this.maxDelayMs);
    }

    const outcome: SettlementOutcome = lastObserved === 'not_found' ? 'failed' : 'ambiguous';
    logger.warn(
      { nonce: authorization.nonceLabel, lastObserved, attempts, timeoutMs: this.options.timeoutMs },
      'Settlement undecided at timeout',
    );
    return outcome;
  }
}
