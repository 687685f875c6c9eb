/**
 * x402 Challenge Parsing
 *
 * Turns a 402 Payment Required response into a PaymentChallenge.
 *
 * Supported formats, checked in this order (the first one present wins):
 * 1. PAYMENT-REQUIRED header with base64-encoded JSON (x402 v2 `accepts`, or flat v1)
 * 2. JSON response body carrying an x402 v2 `accepts` array
 * 3. X-Payment-Instructions header with plain JSON
 * 4. X-Payment-* individual headers (legacy)
 *
 * A format that is present but malformed is a protocol violation; it never
 * falls through to a weaker format.
 *
 * @see https://x402.org
 */

import { z } from 'zod';
import {
  getAddress,
  hexToBytes,
  isAddress,
  isHex,
  keccak256,
  parseUnits,
  toHex,
  type Address,
  type Hex,
} from 'viem';
import { CHAINS, resolveNetwork, type SupportedChain } from '../config/chains.js';
import { PaygateError, PaygateErrorCode } from '../errors.js';
import type { PaymentChallenge } from './types.js';

const amountish = z.union([z.string(), z.number()]);

const ExtraSchema = z
  .object({
    name: z.string().optional(),
    version: z.string().optional(),
    nonce: z.string().optional(),
  })
  .passthrough();

const AcceptSchema = z.object({
  scheme: z.string(),
  network: z.string(),
  asset: z.string(),
  payTo: z.string(),
  amount: amountish.optional(),
  maxAmountRequired: amountish.optional(),
  maxTimeoutSeconds: z.number().int().positive().optional(),
  validUntil: z.number().int().positive().optional(),
  nonce: z.string().optional(),
  description: z.string().optional(),
  resource: z.string().optional(),
  extra: ExtraSchema.optional(),
});

const V2Schema = z.object({
  x402Version: z.number().int(),
  resource: z
    .union([z.string(), z.object({ url: z.string(), description: z.string().optional() })])
    .optional(),
  accepts: z.array(AcceptSchema).min(1),
  nonce: z.string().optional(),
});

const V1Schema = z.object({
  payTo: z.string(),
  maxAmountRequired: amountish,
  asset: z.string(),
  network: z.string().default('base'),
  validUntil: z.number().int().positive().optional(),
  maxTimeoutSeconds: z.number().int().positive().optional(),
  paymentId: z.string().optional(),
  nonce: z.string().optional(),
  description: z.string().optional(),
  resource: z.string().optional(),
  extra: ExtraSchema.optional(),
});

const InstructionsSchema = z.object({
  amount: amountish,
  currency: z.string(),
  destination: z.string(),
  network: z.string(),
  nonce: z.string(),
  expiresAt: z.number().int().positive(),
  description: z.string().optional(),
});

/**
 * Format-independent payment terms, before validation against chain config
 */
interface RawTerms {
  x402Version: 1 | 2;
  scheme: string;
  network: string;
  asset: string;
  amount: string | number | undefined;
  payTo: string;
  nonce: string | undefined;
  validUntil?: number;
  maxTimeoutSeconds?: number;
  resource?: string;
  description?: string;
  tokenName?: string;
  tokenVersion?: string;
}

const HEX_NONCE = /^0x[0-9a-fA-F]{64}$/;
const BASE_UNITS = /^\d+$/;
const DECIMAL_UNITS = /^\d+\.\d{1,6}$/;

function violation(message: string, context?: Record<string, unknown>): PaygateError {
  return new PaygateError(
    PaygateErrorCode.PROTOCOL_VIOLATION,
    message,
    'The resource is not speaking a supported x402 dialect; retrying will not help.',
    context,
  );
}

/**
 * Bind a challenge nonce to 32 bytes. Hex nonces are used as-is; any other
 * label is hashed so the same label always yields the same wire nonce.
 */
export function toWireNonce(label: string): Hex {
  if (HEX_NONCE.test(label) && isHex(label)) {
    return toHex(hexToBytes(label));
  }
  return keccak256(toHex(label));
}

/**
 * Parse an amount given either in base units ("10000") or as a decimal ("0.01")
 */
export function parseAmount(value: string | number, decimals: number): bigint {
  const text = typeof value === 'number' ? value.toString() : value.trim();

  let amount: bigint;
  if (BASE_UNITS.test(text)) {
    amount = BigInt(text);
  } else if (DECIMAL_UNITS.test(text)) {
    amount = parseUnits(text, decimals);
  } else {
    throw violation(`Unparseable payment amount "${text}"`);
  }

  if (amount <= 0n) {
    throw violation('Payment amount must be positive');
  }
  return amount;
}

function resolveAsset(asset: string, chain: SupportedChain): Address {
  const usdc = CHAINS[chain].usdc;
  if (asset.toUpperCase() === 'USDC') return usdc;
  if (isAddress(asset, { strict: false }) && asset.toLowerCase() === usdc.toLowerCase()) {
    return usdc;
  }
  throw violation(`Unsupported payment asset ${asset} on ${chain}`, { supported: usdc });
}

function toChallenge(
  raw: RawTerms,
  configured: SupportedChain,
  requestUrl: string,
  nowSeconds: number,
): PaymentChallenge {
  if (raw.scheme !== 'exact') {
    throw violation(`Unsupported payment scheme "${raw.scheme}"`);
  }

  const network = resolveNetwork(raw.network);
  if (!network) {
    throw violation(`Unsupported payment network "${raw.network}"`);
  }
  if (network !== configured) {
    throw violation(`Payment network ${network} does not match the configured chain ${configured}`, {
      offered: raw.network,
    });
  }
  const chain = CHAINS[network];

  if (!isAddress(raw.payTo, { strict: false })) {
    throw violation(`Invalid payment destination "${raw.payTo}"`);
  }
  if (raw.amount === undefined) {
    throw violation('Payment challenge is missing an amount');
  }
  if (!raw.nonce) {
    throw violation('Payment challenge is missing a nonce');
  }

  let expiresAt: number;
  if (raw.validUntil !== undefined) {
    expiresAt = raw.validUntil;
  } else if (raw.maxTimeoutSeconds !== undefined) {
    expiresAt = nowSeconds + raw.maxTimeoutSeconds;
  } else {
    throw violation('Payment challenge carries no expiry');
  }

  return {
    x402Version: raw.x402Version,
    scheme: 'exact',
    network,
    chainId: chain.chainId,
    asset: resolveAsset(raw.asset, network),
    amount: parseAmount(raw.amount, chain.usdcDecimals),
    payTo: getAddress(raw.payTo),
    nonce: toWireNonce(raw.nonce),
    nonceLabel: raw.nonce,
    expiresAt,
    resource: raw.resource ?? requestUrl,
    description: raw.description,
    tokenDomain: {
      name: raw.tokenName ?? chain.usdcDomain.name,
      version: raw.tokenVersion ?? chain.usdcDomain.version,
    },
  };
}

function fromJsonPayload(data: unknown, source: string, configured: SupportedChain): RawTerms {
  if (typeof data === 'object' && data !== null && 'accepts' in data) {
    const parsed = V2Schema.safeParse(data);
    if (!parsed.success) {
      throw violation(`Malformed x402 v2 challenge in ${source}`, { issues: parsed.error.issues.length });
    }

    const payload = parsed.data;
    const accept = payload.accepts.find(
      (entry) => entry.scheme === 'exact' && resolveNetwork(entry.network) === configured,
    );
    if (!accept) {
      throw violation(`No payable option on ${configured} in ${source}`, {
        offered: payload.accepts.map((entry) => `${entry.scheme}@${entry.network}`),
      });
    }

    const resource = typeof payload.resource === 'string' ? payload.resource : payload.resource?.url;
    return {
      x402Version: 2,
      scheme: accept.scheme,
      network: accept.network,
      asset: accept.asset,
      amount: accept.amount ?? accept.maxAmountRequired,
      payTo: accept.payTo,
      nonce: accept.extra?.nonce ?? accept.nonce ?? payload.nonce,
      validUntil: accept.validUntil,
      maxTimeoutSeconds: accept.maxTimeoutSeconds,
      resource: accept.resource ?? resource,
      description:
        accept.description ?? (typeof payload.resource === 'object' ? payload.resource.description : undefined),
      tokenName: accept.extra?.name,
      tokenVersion: accept.extra?.version,
    };
  }

  const parsed = V1Schema.safeParse(data);
  if (!parsed.success) {
    throw violation(`Malformed x402 challenge in ${source}`, { issues: parsed.error.issues.length });
  }
  const v1 = parsed.data;
  return {
    x402Version: 1,
    scheme: 'exact',
    network: v1.network,
    asset: v1.asset,
    amount: v1.maxAmountRequired,
    payTo: v1.payTo,
    nonce: v1.paymentId ?? v1.nonce ?? v1.extra?.nonce,
    validUntil: v1.validUntil,
    maxTimeoutSeconds: v1.maxTimeoutSeconds,
    resource: v1.resource,
    description: v1.description,
    tokenName: v1.extra?.name,
    tokenVersion: v1.extra?.version,
  };
}

function parseJson(text: string, source: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    throw violation(`${source} is not valid JSON`);
  }
}

function fromPaymentRequiredHeader(header: string, configured: SupportedChain): RawTerms {
  const decoded = Buffer.from(header, 'base64').toString('utf-8');
  return fromJsonPayload(parseJson(decoded, 'PAYMENT-REQUIRED header'), 'PAYMENT-REQUIRED header', configured);
}

function fromInstructionsHeader(header: string): RawTerms {
  const parsed = InstructionsSchema.safeParse(parseJson(header, 'X-Payment-Instructions header'));
  if (!parsed.success) {
    throw violation('Malformed X-Payment-Instructions header');
  }
  const instr = parsed.data;
  return {
    x402Version: 1,
    scheme: 'exact',
    network: instr.network,
    asset: instr.currency,
    amount: instr.amount,
    payTo: instr.destination,
    nonce: instr.nonce,
    validUntil: instr.expiresAt,
    description: instr.description,
  };
}

function fromLegacyHeaders(headers: Headers): RawTerms {
  const recipient = headers.get('X-Payment-Recipient');
  const amount = headers.get('X-Payment-Amount');
  const token = headers.get('X-Payment-Token');
  const chainId = headers.get('X-Payment-Chain-Id');
  const validUntil = headers.get('X-Payment-Valid-Until');
  const paymentId = headers.get('X-Payment-Id');

  if (!recipient || !amount || !token || !chainId || !validUntil || !paymentId) {
    throw violation('Incomplete X-Payment-* headers', {
      recipient: !!recipient,
      amount: !!amount,
      token: !!token,
      chainId: !!chainId,
      validUntil: !!validUntil,
      paymentId: !!paymentId,
    });
  }

  const expiry = Number.parseInt(validUntil, 10);
  if (!Number.isFinite(expiry)) {
    throw violation(`Invalid X-Payment-Valid-Until "${validUntil}"`);
  }

  return {
    x402Version: 1,
    scheme: 'exact',
    network: `eip155:${chainId.trim()}`,
    asset: token,
    amount,
    payTo: recipient,
    nonce: paymentId,
    validUntil: expiry,
    description: headers.get('X-Payment-Description') ?? undefined,
  };
}

/**
 * Parse a payment-required response into a PaymentChallenge.
 *
 * Only terms on the `chain` payments are configured for are accepted. Throws
 * PaygateError(PROTOCOL_VIOLATION) if the response is not a 402 or carries no
 * usable challenge. Consumes the response body.
 */
export async function parseChallenge(
  response: Response,
  requestUrl: string,
  chain: SupportedChain,
  nowSeconds: number = Math.floor(Date.now() / 1000),
): Promise<PaymentChallenge> {
  if (response.status !== 402) {
    throw violation(`Expected HTTP 402, got ${response.status}`);
  }

  const headers = response.headers;

  const paymentRequired = headers.get('payment-required');
  if (paymentRequired) {
    return toChallenge(fromPaymentRequiredHeader(paymentRequired, chain), chain, requestUrl, nowSeconds);
  }

  const bodyText = await response.text();
  if (bodyText.trim().startsWith('{')) {
    const body = parseJson(bodyText, 'Response body');
    if (typeof body === 'object' && body !== null && 'accepts' in body) {
      return toChallenge(fromJsonPayload(body, 'response body', chain), chain, requestUrl, nowSeconds);
    }
  }

  const instructions = headers.get('x-payment-instructions');
  if (instructions) {
    return toChallenge(fromInstructionsHeader(instructions), chain, requestUrl, nowSeconds);
  }

  if (headers.has('x-payment-recipient') || headers.has('x-payment-amount')) {
    return toChallenge(fromLegacyHeaders(headers), chain, requestUrl, nowSeconds);
  }

  throw violation('402 response carries no payment challenge');
}
