/**
 * Service wiring
 *
 * Builds the payment core from configuration: one ledger, one authorizer,
 * one verifier and one orchestrator per process, shared by every tool.
 */

import { createRpcClient, type RpcClient } from './config/chains.js';
import { loadConfig, type PaygateConfig } from './config/settings.js';
import { SubmoltNotifier, type NotificationSink } from './events/notifier.js';
import { IdempotencyLedger } from './ledger/ledger.js';
import { OracleToolAdapter } from './oracles/adapter.js';
import type { FetchFn } from './orchestrator/http.js';
import { RequestOrchestrator } from './orchestrator/orchestrator.js';
import { SettlementVerifier, createSettlementRpc, type SettlementRpc } from './settlement/verifier.js';
import { PaymentAuthorizer, balanceReaderFromClient, type BalanceReader } from './x402/authorizer.js';
import { credentialFromPrivateKey, type PaymentCredential } from './x402/credential.js';

export interface Services {
  config: Readonly<PaygateConfig>;
  ledger: IdempotencyLedger;
  authorizer: PaymentAuthorizer;
  verifier: SettlementVerifier;
  orchestrator: RequestOrchestrator;
  adapter: OracleToolAdapter;
  sink?: NotificationSink;
}

/**
 * Seams for tests and embedding
 */
export interface ServiceOverrides {
  fetchFn?: FetchFn;
  rpc?: SettlementRpc;
  balanceReader?: BalanceReader;
  credential?: PaymentCredential;
  sink?: NotificationSink;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export function createServices(config: Readonly<PaygateConfig>, overrides: ServiceOverrides = {}): Services {
  let client: RpcClient | undefined;
  const rpcClient = (): RpcClient => {
    client ??= createRpcClient(config.chain, config.rpcUrl);
    return client;
  };

  const ledger = new IdempotencyLedger({
    retentionMs: config.retentionMs,
    dedupWindowMs: config.dedupWindowMs,
    now: overrides.now,
  });

  const balanceReader = config.checkBalance
    ? (overrides.balanceReader ?? balanceReaderFromClient(rpcClient()))
    : undefined;

  const authorizer = new PaymentAuthorizer({
    chain: config.chain,
    maxSpendPerCall: config.maxSpendPerCall,
    balanceReader,
    now: overrides.now,
  });

  const verifier = new SettlementVerifier(overrides.rpc ?? createSettlementRpc(rpcClient()), {
    timeoutMs: config.settlementTimeoutMs,
    now: overrides.now,
    sleep: overrides.sleep,
  });

  const credential =
    overrides.credential ?? (config.payerPrivateKey ? credentialFromPrivateKey(config.payerPrivateKey) : undefined);

  const sink =
    overrides.sink ??
    (config.submolt ? new SubmoltNotifier({ ...config.submolt, fetchFn: overrides.fetchFn }) : undefined);

  const orchestrator = new RequestOrchestrator(
    {
      ledger,
      authorizer,
      verifier,
      credential,
      fetchFn: overrides.fetchFn,
      sink,
      now: overrides.now,
      sleep: overrides.sleep,
    },
    {
      maxAttempts: config.maxAttempts,
      backoffMs: config.backoffMs,
      deadlineMs: config.deadlineMs,
    },
  );

  const adapter = new OracleToolAdapter(orchestrator, config.oracles);

  return { config, ledger, authorizer, verifier, orchestrator, adapter, sink };
}

let services: Services | null = null;

/**
 * Process-wide services, built from the environment on first use
 */
export function getServices(): Services {
  services ??= createServices(loadConfig());
  return services;
}

export function setServices(next: Services | null): void {
  services = next;
}
