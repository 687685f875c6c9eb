/**
 * Payment Credential
 *
 * The signing identity supplied at process start. The rest of the core
 * only ever sees the payer address and a signing function; the key itself
 * stays inside the viem account closure and is never stored or logged.
 */

import { privateKeyToAccount } from 'viem/accounts';
import type { Address, Hex } from 'viem';
import type { SigningDomain } from './types.js';

/**
 * EIP-3009 typed data definition (USDC transferWithAuthorization)
 */
export const TRANSFER_WITH_AUTHORIZATION_TYPES = {
  TransferWithAuthorization: [
    { name: 'from', type: 'address' },
    { name: 'to', type: 'address' },
    { name: 'value', type: 'uint256' },
    { name: 'validAfter', type: 'uint256' },
    { name: 'validBefore', type: 'uint256' },
    { name: 'nonce', type: 'bytes32' },
  ],
} as const;

export interface TransferWithAuthorizationMessage {
  from: Address;
  to: Address;
  value: bigint;
  validAfter: bigint;
  validBefore: bigint;
  nonce: Hex;
}

export interface PaymentCredential {
  readonly address: Address;
  signTransferAuthorization(
    domain: SigningDomain,
    message: TransferWithAuthorizationMessage,
  ): Promise<Hex>;
}

/**
 * Build a credential from a raw private key. Local accounts sign with
 * RFC 6979 nonces, so identical typed data always yields the same signature.
 */
export function credentialFromPrivateKey(privateKey: Hex): PaymentCredential {
  const account = privateKeyToAccount(privateKey);

  return {
    address: account.address,
    signTransferAuthorization: (domain, message) =>
      account.signTypedData({
        domain,
        types: TRANSFER_WITH_AUTHORIZATION_TYPES,
        primaryType: 'TransferWithAuthorization',
        message,
      }),
  };
}
