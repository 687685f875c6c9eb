/**
 * Idempotency Ledger
 *
 * Remembers, per request fingerprint, which challenge was paid and how
 * settlement went. The orchestrator consults it under the fingerprint's
 * lock before ever signing:
 *
 * - confirmed + inside the dedup window + authorization still valid → reuse
 * - pending → verify first, never sign again
 * - failed / expired / absent → fresh payment cycle
 *
 * Records are swept after the retention window, except pending ones which
 * wait for reconciliation.
 */

import type { Hex } from 'viem';
import { logger } from '../utils/logger.js';
import type { SettlementRecord } from '../x402/types.js';
import { KeyedLock, type LockContext } from './keyed-lock.js';

/**
 * Storage behind the ledger. In-memory by default.
 */
export interface LedgerStore {
  get(fingerprint: Hex): SettlementRecord | undefined;
  set(record: SettlementRecord): void;
  delete(fingerprint: Hex): void;
  values(): IterableIterator<SettlementRecord>;
  readonly size: number;
}

export class MemoryLedgerStore implements LedgerStore {
  private records = new Map<Hex, SettlementRecord>();

  get(fingerprint: Hex): SettlementRecord | undefined {
    return this.records.get(fingerprint);
  }

  set(record: SettlementRecord): void {
    this.records.set(record.fingerprint, record);
  }

  delete(fingerprint: Hex): void {
    this.records.delete(fingerprint);
  }

  values(): IterableIterator<SettlementRecord> {
    return this.records.values();
  }

  get size(): number {
    return this.records.size;
  }
}

export interface IdempotencyLedgerOptions {
  retentionMs: number;
  dedupWindowMs: number;
  now?: () => number;
  store?: LedgerStore;
}

export type NewSettlementRecord = Omit<SettlementRecord, 'createdAt' | 'updatedAt'>;

export type SettlementRecordPatch = Partial<Pick<SettlementRecord, 'status' | 'txHash'>>;

export class IdempotencyLedger {
  private readonly store: LedgerStore;
  private readonly lock = new KeyedLock();
  private readonly now: () => number;

  constructor(private readonly options: IdempotencyLedgerOptions) {
    this.store = options.store ?? new MemoryLedgerStore();
    this.now = options.now ?? Date.now;
  }

  get(fingerprint: Hex): SettlementRecord | undefined {
    return this.store.get(fingerprint);
  }

  /**
   * Start a new record for a fingerprint, replacing any previous cycle.
   */
  put(record: NewSettlementRecord): SettlementRecord {
    const at = this.now();
    const stored: SettlementRecord = { ...record, createdAt: at, updatedAt: at };
    this.store.set(stored);

    // Clean up old records opportunistically
    if (this.store.size > 100) {
      this.evictExpired();
    }

    return stored;
  }

  update(fingerprint: Hex, patch: SettlementRecordPatch): SettlementRecord | undefined {
    const existing = this.store.get(fingerprint);
    if (!existing) return undefined;

    const updated: SettlementRecord = { ...existing, ...patch, updatedAt: this.now() };
    this.store.set(updated);

    if (patch.status && patch.status !== existing.status) {
      logger.debug(
        { fingerprint, nonce: existing.nonceLabel, from: existing.status, to: patch.status },
        'Ledger record updated',
      );
    }

    return updated;
  }

  /**
   * Whether a record's settled authorization may be resubmitted instead of paying again
   */
  isReusable(record: SettlementRecord): boolean {
    if (record.status !== 'confirmed' || !record.authorization) return false;

    const now = this.now();
    if (now - record.updatedAt > this.options.dedupWindowMs) return false;

    return record.authorization.validBefore > BigInt(Math.floor(now / 1000));
  }

  /**
   * Drop records older than the retention window. Pending records stay.
   */
  evictExpired(): number {
    const cutoff = this.now() - this.options.retentionMs;
    const stale: Hex[] = [];

    for (const record of this.store.values()) {
      if (record.status !== 'pending' && record.updatedAt < cutoff) {
        stale.push(record.fingerprint);
      }
    }

    for (const fingerprint of stale) {
      this.store.delete(fingerprint);
    }

    if (stale.length > 0) {
      logger.debug({ evicted: stale.length }, 'Ledger records evicted');
    }
    return stale.length;
  }

  /**
   * Run `fn` holding the fingerprint's single-flight lock
   */
  withLock<T>(fingerprint: Hex, fn: (ctx: LockContext) => Promise<T>): Promise<T> {
    return this.lock.run(fingerprint, fn);
  }

  isLocked(fingerprint: Hex): boolean {
    return this.lock.isLocked(fingerprint);
  }

  snapshot(): SettlementRecord[] {
    return [...this.store.values()];
  }

  pending(): SettlementRecord[] {
    return this.snapshot().filter((record) => record.status === 'pending');
  }
}
