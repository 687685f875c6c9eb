/**
 * Runtime Configuration
 *
 * Every tunable of the payment core comes from the environment and is
 * validated here once, at startup. The payer key is kept as an opaque
 * string; nothing in this module logs it.
 */

import { z } from 'zod';
import { parseUnits, type Hex } from 'viem';
import { PaygateError, PaygateErrorCode } from '../errors.js';
import { CHAINS, getRpcUrl, type SupportedChain } from './chains.js';

const usdAmount = z
  .string()
  .regex(/^\d+(\.\d{1,6})?$/, 'must be a decimal USD amount such as "1.00"');

const positiveInt = z.coerce.number().int().positive();

const booleanFlag = z
  .enum(['true', 'false'])
  .transform((value) => value === 'true');

const EnvSchema = z.object({
  PAYER_PRIVATE_KEY: z
    .string()
    .regex(/^0x[0-9a-fA-F]{64}$/, 'must be a 0x-prefixed 32-byte hex key')
    .optional(),
  PAYGATE_CHAIN: z.enum(['base', 'base-sepolia']).default('base-sepolia'),
  PAYGATE_MAX_SPEND_USD: usdAmount.default('1.00'),
  PAYGATE_DEDUP_WINDOW_MS: positiveInt.default(10 * 60 * 1000),
  PAYGATE_RETENTION_MS: positiveInt.default(24 * 60 * 60 * 1000),
  PAYGATE_MAX_ATTEMPTS: positiveInt.max(10).default(3),
  PAYGATE_BACKOFF_MS: positiveInt.default(250),
  PAYGATE_DEADLINE_MS: positiveInt.default(30_000),
  PAYGATE_SETTLEMENT_TIMEOUT_MS: positiveInt.default(15_000),
  PAYGATE_CHECK_BALANCE: booleanFlag.default('true'),
  VISION_ORACLE_URL: z.string().url().optional(),
  CODE_ORACLE_URL: z.string().url().optional(),
  SUBMOLT_API_URL: z.string().url().optional(),
  SUBMOLT_API_KEY: z.string().min(1).optional(),
  SUBMOLT_NAME: z.string().min(1).optional(),
});

export interface SubmoltSettings {
  apiUrl: string;
  apiKey: string;
  submolt: string;
}

export interface PaygateConfig {
  /** Opaque signing credential; absent when only read-only tools are used */
  payerPrivateKey?: Hex;
  chain: SupportedChain;
  rpcUrl: string;
  /** Spend guard per call, in USDC base units */
  maxSpendPerCall: bigint;
  maxSpendUsd: string;
  dedupWindowMs: number;
  retentionMs: number;
  maxAttempts: number;
  backoffMs: number;
  deadlineMs: number;
  settlementTimeoutMs: number;
  checkBalance: boolean;
  oracles: {
    visionUrl?: string;
    codeUrl?: string;
  };
  submolt?: SubmoltSettings;
}

function isHexKey(value: string | undefined): value is Hex {
  return value !== undefined && value.startsWith('0x');
}

/**
 * Parse and validate configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Readonly<PaygateConfig> {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = issue?.path.join('.') || 'environment';
    throw new PaygateError(
      PaygateErrorCode.VALIDATION,
      `Invalid configuration: ${variable} ${issue?.message ?? 'is invalid'}`,
      `Fix ${variable} in the server environment and restart.`,
    );
  }

  const e = parsed.data;
  const chain = e.PAYGATE_CHAIN;

  const { SUBMOLT_API_URL: apiUrl, SUBMOLT_API_KEY: apiKey, SUBMOLT_NAME: submolt } = e;

  return Object.freeze({
    payerPrivateKey: isHexKey(e.PAYER_PRIVATE_KEY) ? e.PAYER_PRIVATE_KEY : undefined,
    chain,
    rpcUrl: getRpcUrl(chain, env),
    maxSpendPerCall: parseUnits(e.PAYGATE_MAX_SPEND_USD, CHAINS[chain].usdcDecimals),
    maxSpendUsd: e.PAYGATE_MAX_SPEND_USD,
    dedupWindowMs: e.PAYGATE_DEDUP_WINDOW_MS,
    retentionMs: e.PAYGATE_RETENTION_MS,
    maxAttempts: e.PAYGATE_MAX_ATTEMPTS,
    backoffMs: e.PAYGATE_BACKOFF_MS,
    deadlineMs: e.PAYGATE_DEADLINE_MS,
    settlementTimeoutMs: e.PAYGATE_SETTLEMENT_TIMEOUT_MS,
    checkBalance: e.PAYGATE_CHECK_BALANCE,
    oracles: {
      visionUrl: e.VISION_ORACLE_URL,
      codeUrl: e.CODE_ORACLE_URL,
    },
    submolt: apiUrl && apiKey && submolt ? { apiUrl, apiKey, submolt } : undefined,
  });
}

/**
 * Non-fatal configuration problems, reported at startup
 */
export function validateConfig(config: PaygateConfig): string[] {
  const warnings: string[] = [];
  if (!config.payerPrivateKey) warnings.push('PAYER_PRIVATE_KEY not set: paid oracle calls will fail');
  if (!config.oracles.visionUrl) warnings.push('VISION_ORACLE_URL not set: oracle_verify_asset is unavailable');
  if (!config.oracles.codeUrl) warnings.push('CODE_ORACLE_URL not set: oracle_appraise_repo is unavailable');
  if (!config.submolt) warnings.push('SUBMOLT_API_URL/SUBMOLT_API_KEY/SUBMOLT_NAME not all set: result events are not forwarded');
  return warnings;
}
