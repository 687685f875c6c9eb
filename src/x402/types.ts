/**
 * x402 Data Model
 *
 * Types shared by the challenge parser, the authorizer, the settlement
 * verifier and the idempotency ledger.
 */

import type { Address, Hex } from 'viem';
import type { SupportedChain, TokenDomain } from '../config/chains.js';

/**
 * A payment demand parsed from a 402 response. Single-use: its nonce
 * identifies exactly one payable request instance.
 */
export interface PaymentChallenge {
  x402Version: 1 | 2;
  scheme: 'exact';
  network: SupportedChain;
  chainId: number;
  /** Token contract (USDC) */
  asset: Address;
  /** Amount in token base units (USDC has 6 decimals, so 1 USDC = 1000000) */
  amount: bigint;
  payTo: Address;
  /** 32-byte nonce the authorization is bound to */
  nonce: Hex;
  /** Nonce as issued by the resource, for logs and ledger records */
  nonceLabel: string;
  /** Unix seconds after which the challenge may not be signed */
  expiresAt: number;
  /** Resource the challenge gates */
  resource: string;
  description?: string;
  tokenDomain: TokenDomain;
}

/**
 * EIP-712 domain the authorization was signed under
 */
export interface SigningDomain {
  name: string;
  version: string;
  chainId: number;
  verifyingContract: Address;
}

/**
 * A signed EIP-3009 transferWithAuthorization, bound to one challenge nonce.
 * Immutable after signing.
 */
export interface PaymentAuthorization {
  x402Version: 1 | 2;
  scheme: 'exact';
  network: SupportedChain;
  payer: Address;
  payTo: Address;
  amount: bigint;
  asset: Address;
  validAfter: bigint;
  validBefore: bigint;
  nonce: Hex;
  nonceLabel: string;
  domain: SigningDomain;
  signature: Hex;
}

/**
 * Status reported by one settlement check
 */
export type SettlementStatus = 'pending' | 'confirmed' | 'failed' | 'not_found';

/**
 * Result of polling settlement until a decision or timeout
 */
export type SettlementOutcome = 'confirmed' | 'failed' | 'ambiguous';

/**
 * Lifecycle of a ledger record
 */
export type RecordStatus = 'pending' | 'confirmed' | 'failed' | 'expired';

export interface SettlementRecord {
  fingerprint: Hex;
  resource: string;
  challengeNonce: Hex;
  nonceLabel: string;
  amount: bigint;
  asset: Address;
  network: SupportedChain;
  /** Absent when authorization itself failed */
  authorization?: PaymentAuthorization;
  status: RecordStatus;
  txHash?: Hex;
  createdAt: number;
  updatedAt: number;
}

/**
 * Payment facts attached to a successful paid response
 */
export interface PaymentReceipt {
  nonce: Hex;
  nonceLabel: string;
  amount: bigint;
  asset: Address;
  network: SupportedChain;
  payer: Address;
  txHash?: Hex;
  /** True when an earlier settled authorization was reused */
  reused: boolean;
}
