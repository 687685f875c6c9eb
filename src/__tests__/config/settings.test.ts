import { describe, it, expect } from 'vitest';
import { loadConfig, validateConfig } from '../../config/settings.js';
import { PaygateError, PaygateErrorCode } from '../../errors.js';
import { TEST_KEY } from '../helpers.js';

describe('loadConfig', () => {
  it('applies defaults', () => {
    const config = loadConfig({});

    expect(config).toEqual({
      payerPrivateKey: undefined,
      chain: 'base-sepolia',
      rpcUrl: 'https://sepolia.base.org',
      maxSpendPerCall: 1_000_000n,
      maxSpendUsd: '1.00',
      dedupWindowMs: 600_000,
      retentionMs: 86_400_000,
      maxAttempts: 3,
      backoffMs: 250,
      deadlineMs: 30_000,
      settlementTimeoutMs: 15_000,
      checkBalance: true,
      oracles: { visionUrl: undefined, codeUrl: undefined },
      submolt: undefined,
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('reads overrides from the environment', () => {
    const config = loadConfig({
      PAYER_PRIVATE_KEY: TEST_KEY,
      PAYGATE_CHAIN: 'base',
      BASE_RPC_URL: 'https://rpc.test',
      PAYGATE_MAX_SPEND_USD: '0.25',
      PAYGATE_MAX_ATTEMPTS: '5',
      PAYGATE_CHECK_BALANCE: 'false',
      CODE_ORACLE_URL: 'https://code.test',
    });

    expect(config.payerPrivateKey).toBe(TEST_KEY);
    expect(config.chain).toBe('base');
    expect(config.rpcUrl).toBe('https://rpc.test');
    expect(config.maxSpendPerCall).toBe(250_000n);
    expect(config.maxAttempts).toBe(5);
    expect(config.checkBalance).toBe(false);
    expect(config.oracles.codeUrl).toBe('https://code.test');
  });

  it('enables the submolt sink only when fully configured', () => {
    const partial = loadConfig({ SUBMOLT_API_URL: 'https://submolt.test', SUBMOLT_NAME: 'lablab' });
    expect(partial.submolt).toBeUndefined();

    const full = loadConfig({
      SUBMOLT_API_URL: 'https://submolt.test',
      SUBMOLT_API_KEY: 'test-key',
      SUBMOLT_NAME: 'lablab',
    });
    expect(full.submolt).toEqual({ apiUrl: 'https://submolt.test', apiKey: 'test-key', submolt: 'lablab' });
  });

  it('rejects an unparseable spend guard', () => {
    let caught: unknown;
    try {
      loadConfig({ PAYGATE_MAX_SPEND_USD: 'ten' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(PaygateError);
    expect(caught instanceof PaygateError && caught.code).toBe(PaygateErrorCode.VALIDATION);
    expect(caught instanceof PaygateError && caught.message).toBe(
      'Invalid configuration: PAYGATE_MAX_SPEND_USD must be a decimal USD amount such as "1.00"',
    );
  });

  it('rejects a malformed payer key', () => {
    expect(() => loadConfig({ PAYER_PRIVATE_KEY: 'abc' })).toThrow(
      'Invalid configuration: PAYER_PRIVATE_KEY must be a 0x-prefixed 32-byte hex key',
    );
  });
});

describe('validateConfig', () => {
  it('warns about everything missing from a bare environment', () => {
    expect(validateConfig(loadConfig({}))).toEqual([
      'PAYER_PRIVATE_KEY not set: paid oracle calls will fail',
      'VISION_ORACLE_URL not set: oracle_verify_asset is unavailable',
      'CODE_ORACLE_URL not set: oracle_appraise_repo is unavailable',
      'SUBMOLT_API_URL/SUBMOLT_API_KEY/SUBMOLT_NAME not all set: result events are not forwarded',
    ]);
  });

  it('is quiet when fully configured', () => {
    const config = loadConfig({
      PAYER_PRIVATE_KEY: TEST_KEY,
      VISION_ORACLE_URL: 'https://vision.test',
      CODE_ORACLE_URL: 'https://code.test',
      SUBMOLT_API_URL: 'https://submolt.test',
      SUBMOLT_API_KEY: 'test-key',
      SUBMOLT_NAME: 'lablab',
    });

    expect(validateConfig(config)).toEqual([]);
  });
});
