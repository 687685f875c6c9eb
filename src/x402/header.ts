/**
 * X-PAYMENT / X-PAYMENT-RESPONSE header codec
 *
 * X-PAYMENT:          base64(JSON({ x402Version, scheme, network, payload: { signature, authorization } }))
 * X-PAYMENT-RESPONSE: base64(JSON({ success, transaction, network, payer }))
 */

import { z } from 'zod';
import { isHex, type Hex } from 'viem';
import { CHAINS } from '../config/chains.js';
import type { PaymentAuthorization } from './types.js';

export const PAYMENT_HEADER = 'X-PAYMENT';
export const PAYMENT_RESPONSE_HEADER = 'X-PAYMENT-RESPONSE';

export interface PaymentHeaderPayload {
  x402Version: 1 | 2;
  scheme: 'exact';
  network: string;
  payload: {
    signature: Hex;
    authorization: {
      from: string;
      to: string;
      value: string;
      validAfter: string;
      validBefore: string;
      nonce: Hex;
    };
  };
}

/**
 * Create the X-PAYMENT header value for a signed authorization
 */
export function encodePaymentHeader(authorization: PaymentAuthorization): string {
  const chain = CHAINS[authorization.network];

  const payload: PaymentHeaderPayload = {
    x402Version: authorization.x402Version,
    scheme: authorization.scheme,
    // v2 speaks CAIP-2 network ids, v1 the short names
    network: authorization.x402Version === 2 ? chain.caip2 : authorization.network,
    payload: {
      signature: authorization.signature,
      authorization: {
        from: authorization.payer,
        to: authorization.payTo,
        value: authorization.amount.toString(),
        validAfter: authorization.validAfter.toString(),
        validBefore: authorization.validBefore.toString(),
        nonce: authorization.nonce,
      },
    },
  };

  return Buffer.from(JSON.stringify(payload)).toString('base64');
}

const SettlementResponseSchema = z.object({
  success: z.boolean(),
  transaction: z.string().optional(),
  network: z.string().optional(),
  payer: z.string().optional(),
  errorReason: z.string().optional(),
});

export interface SettlementResponse {
  success: boolean;
  transaction?: Hex;
  network?: string;
  payer?: string;
  errorReason?: string;
}

/**
 * Decode the optional X-PAYMENT-RESPONSE header. Returns null when absent or unreadable:
 * the header is informational and never decides the outcome on its own.
 */
export function decodeSettlementResponse(header: string | null): SettlementResponse | null {
  if (!header) return null;

  let data: unknown;
  try {
    data = JSON.parse(Buffer.from(header, 'base64').toString('utf-8'));
  } catch {
    return null;
  }

  const parsed = SettlementResponseSchema.safeParse(data);
  if (!parsed.success) return null;

  const { transaction, ...rest } = parsed.data;
  return {
    ...rest,
    transaction: transaction && isHex(transaction) ? transaction : undefined,
  };
}
