/**
 * Result notification
 *
 * Successful calls produce a ResultEvent. Delivery is someone else's job:
 * the orchestrator pushes and moves on, and a failing sink never changes
 * the result of the call.
 */

import { z } from 'zod';
import type { Hex } from 'viem';
import { formatUsdc } from '../config/chains.js';
import type { FetchFn } from '../orchestrator/http.js';
import { logger } from '../utils/logger.js';
import type { PaymentReceipt } from '../x402/types.js';

export interface ResultEvent {
  type: 'tool_call.succeeded';
  fingerprint: Hex;
  resource: string;
  status: number;
  payment?: PaymentReceipt;
  /** ISO timestamp */
  at: string;
}

export interface NotificationSink {
  push(event: ResultEvent): void;
}

/**
 * Collects events in memory
 */
export class QueueSink implements NotificationSink {
  readonly events: ResultEvent[] = [];

  push(event: ResultEvent): void {
    this.events.push(event);
  }

  drain(): ResultEvent[] {
    return this.events.splice(0, this.events.length);
  }
}

// ─── Submolt ────────────────────────────────────────────

export interface SubmoltNotifierOptions {
  apiUrl: string;
  apiKey: string;
  submolt: string;
  origin?: string;
  fetchFn?: FetchFn;
  now?: () => number;
}

interface TokenCache {
  token: string;
  expiresAt: number; // Unix ms
}

const IdentityTokenResponse = z.object({
  identity_token: z.string().min(1),
});

/** Identity tokens live for one hour */
const TOKEN_TTL_MS = 60 * 60 * 1000;
const REFRESH_MARGIN_MS = 60 * 1000;

export function formatResultEvent(event: ResultEvent): string {
  const lines = [`Oracle call succeeded: ${event.resource} (HTTP ${event.status})`];
  if (event.payment) {
    const { payment } = event;
    lines.push(
      `Paid ${formatUsdc(payment.amount)} USDC on ${payment.network}${payment.reused ? ' (reused settlement)' : ''}`,
    );
    if (payment.txHash) lines.push(`tx: ${payment.txHash}`);
  }
  return lines.join('\n');
}

/**
 * Posts result events to a submolt, authenticating with a short-lived
 * identity token exchanged for the API key.
 */
export class SubmoltNotifier implements NotificationSink {
  private readonly fetchFn: FetchFn;
  private readonly now: () => number;
  private readonly origin: string;
  private tokenCache: TokenCache | null = null;
  private tokenInFlight: Promise<string> | null = null;
  private readonly deliveries = new Set<Promise<void>>();

  constructor(private readonly options: SubmoltNotifierOptions) {
    this.fetchFn = options.fetchFn ?? fetch;
    this.now = options.now ?? Date.now;
    this.origin = options.origin ?? 'paygate-oracle';
  }

  push(event: ResultEvent): void {
    const delivery: Promise<void> = this.deliver(event)
      .catch((error: unknown) => {
        logger.warn(
          { fingerprint: event.fingerprint, err: error instanceof Error ? error.message : String(error) },
          'Submolt notification failed',
        );
      })
      .finally(() => {
        this.deliveries.delete(delivery);
      });
    this.deliveries.add(delivery);
  }

  /**
   * Wait for deliveries in progress (used on shutdown and in tests)
   */
  async flush(): Promise<void> {
    await Promise.all([...this.deliveries]);
  }

  clearToken(): void {
    this.tokenCache = null;
    this.tokenInFlight = null;
  }

  private async deliver(event: ResultEvent): Promise<void> {
    const token = await this.getIdentityToken();
    const url = `${this.options.apiUrl}/submolt/${encodeURIComponent(this.options.submolt)}/post`;

    const response = await this.fetchFn(url, {
      method: 'POST',
      headers: {
        'X-Moltbook-Identity': token,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({ content: formatResultEvent(event), origin: this.origin }),
    });

    if (!response.ok) {
      throw new Error(`Submolt post failed: HTTP ${response.status}`);
    }
    logger.info({ fingerprint: event.fingerprint, submolt: this.options.submolt }, 'Result signaled to submolt');
  }

  /**
   * Cached token, refreshed a minute before expiry. Concurrent refreshes share one request.
   */
  private async getIdentityToken(): Promise<string> {
    if (this.tokenCache && this.now() < this.tokenCache.expiresAt - REFRESH_MARGIN_MS) {
      return this.tokenCache.token;
    }

    if (this.tokenInFlight) {
      return this.tokenInFlight;
    }

    this.tokenInFlight = this.fetchIdentityToken();
    try {
      return await this.tokenInFlight;
    } finally {
      this.tokenInFlight = null;
    }
  }

  private async fetchIdentityToken(): Promise<string> {
    logger.debug('Refreshing submolt identity token');

    const response = await this.fetchFn(`${this.options.apiUrl}/me/identity-token`, {
      method: 'POST',
      headers: { Authorization: `Bearer ${this.options.apiKey}` },
    });

    if (!response.ok) {
      throw new Error(`Identity token request failed: HTTP ${response.status}`);
    }

    const parsed = IdentityTokenResponse.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error('Identity token response carried no identity_token');
    }

    this.tokenCache = {
      token: parsed.data.identity_token,
      expiresAt: this.now() + TOKEN_TTL_MS,
    };
    return parsed.data.identity_token;
  }
}
