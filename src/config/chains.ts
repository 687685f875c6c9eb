/**
 * Centralized Chain Configuration
 *
 * Single source of truth for the chains payments settle on, their USDC
 * deployments and RPC URLs. x402 network identifiers from challenges are
 * resolved here.
 */

import { createPublicClient, formatUnits, http, type Address } from 'viem';
import { base, baseSepolia } from 'viem/chains';

/**
 * Supported chain names
 */
export type SupportedChain = 'base' | 'base-sepolia';

/**
 * EIP-712 domain of a token that implements EIP-3009
 */
export interface TokenDomain {
  name: string;
  version: string;
}

/**
 * Chain configuration
 */
export interface ChainConfig {
  chain: typeof base | typeof baseSepolia;
  chainId: number;
  name: string;
  /** CAIP-2 identifier used by x402 v2 */
  caip2: string;
  explorerUrl: string;
  usdc: Address;
  usdcDomain: TokenDomain;
  usdcDecimals: number;
}

export const CHAINS: Record<SupportedChain, ChainConfig> = {
  base: {
    chain: base,
    chainId: 8453,
    name: 'Base',
    caip2: 'eip155:8453',
    explorerUrl: 'https://basescan.org',
    usdc: '0x833589fCD6eDb6E08f4c7C32D4f71b54bdA02913',
    usdcDomain: { name: 'USD Coin', version: '2' },
    usdcDecimals: 6,
  },
  'base-sepolia': {
    chain: baseSepolia,
    chainId: 84532,
    name: 'Base Sepolia',
    caip2: 'eip155:84532',
    explorerUrl: 'https://sepolia.basescan.org',
    usdc: '0x036CbD53842c5426634e7929541eC2318f3dCF7e',
    usdcDomain: { name: 'USDC', version: '2' },
    usdcDecimals: 6,
  },
};

/**
 * x402 network identifiers → chain
 */
const NETWORK_ALIASES: Record<string, SupportedChain> = {
  base: 'base',
  'base-mainnet': 'base',
  'eip155:8453': 'base',
  'base-sepolia': 'base-sepolia',
  'eip155:84532': 'base-sepolia',
};

/**
 * Fallback public RPC URLs (last resort when no RPC is configured)
 */
const FALLBACK_RPCS: Record<SupportedChain, string> = {
  base: 'https://mainnet.base.org',
  'base-sepolia': 'https://sepolia.base.org',
};

/**
 * Resolve an x402 network identifier. Returns null for networks we cannot settle on.
 */
export function resolveNetwork(network: string): SupportedChain | null {
  return NETWORK_ALIASES[network.trim().toLowerCase()] ?? null;
}

/**
 * USDC base units as a decimal string ("10000" -> "0.01")
 */
export function formatUsdc(amount: bigint): string {
  return formatUnits(amount, CHAINS.base.usdcDecimals);
}

/**
 * Get RPC URL for a chain
 *
 * Priority:
 * 1. Chain-specific env var (BASE_RPC_URL, BASE_SEPOLIA_RPC_URL)
 * 2. Fallback public RPC
 */
export function getRpcUrl(chain: SupportedChain, env: NodeJS.ProcessEnv = process.env): string {
  const envKey = `${chain.toUpperCase().replace('-', '_')}_RPC_URL`;
  return env[envKey] || FALLBACK_RPCS[chain];
}

/**
 * Create the read-only RPC client used for settlement checks and balance reads
 */
export function createRpcClient(chain: SupportedChain, rpcUrl?: string) {
  return createPublicClient({
    chain: CHAINS[chain].chain,
    transport: http(rpcUrl ?? getRpcUrl(chain)),
  });
}

export type RpcClient = ReturnType<typeof createRpcClient>;

/**
 * Get explorer URL for a transaction
 */
export function getExplorerTxUrl(chain: SupportedChain, txHash: string): string {
  return `${CHAINS[chain].explorerUrl}/tx/${txHash}`;
}
