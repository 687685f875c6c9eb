/**
 * Structured Logging & Observability
 *
 * Provides:
 * - JSON logging via pino (stderr: stdout belongs to the MCP stdio transport)
 * - Timing utilities for tool calls
 * - Per-operation counts and recent errors for paygate_status
 *
 * Usage:
 *   import { logger, withTiming, getStats } from './utils/logger.js';
 *
 *   logger.info({ fingerprint, nonce }, 'Payment authorized');
 *
 *   const { result } = await withTiming('oracle.verify_asset_quality', { tool }, async () => {
 *     return await adapter.call(tool, params);
 *   });
 */

import pino from 'pino';

// ============================================================================
// Logger Configuration
// ============================================================================

const isDev = process.env.NODE_ENV !== 'production';

function defaultLevel(): string {
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  if (process.env.VITEST) return 'silent';
  return isDev ? 'debug' : 'info';
}

export const logger = pino(
  {
    level: defaultLevel(),
    base: {
      service: 'paygate-oracle-mcp',
      version: '0.1.0',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    // Signing material never reaches the log stream
    redact: {
      paths: [
        'credential',
        'privateKey',
        'apiKey',
        'signature',
        'authorization.signature',
        '*.signature',
        '*.privateKey',
      ],
      censor: '[redacted]',
    },
  },
  pino.destination(2),
);

export type Logger = pino.Logger;

// ============================================================================
// Timing Utilities
// ============================================================================

interface TimingContext {
  [key: string]: string | number | boolean | undefined;
}

interface TimingResult<T> {
  result: T;
  durationMs: number;
}

/**
 * Execute an async function with timing measurement and logging
 */
export async function withTiming<T>(
  operation: string,
  context: TimingContext,
  fn: () => Promise<T>,
): Promise<TimingResult<T>> {
  const startTime = performance.now();

  try {
    const result = await fn();
    const durationMs = Math.round(performance.now() - startTime);

    logger.debug({ operation, ...context, durationMs, success: true }, `${operation} completed`);
    recordMetric(operation, durationMs, true);

    return { result, durationMs };
  } catch (error) {
    const durationMs = Math.round(performance.now() - startTime);

    logger.error(
      {
        operation,
        ...context,
        durationMs,
        success: false,
        error: error instanceof Error ? error.message : String(error),
      },
      `${operation} failed`,
    );

    recordMetric(operation, durationMs, false);
    recordError(operation, error);

    throw error;
  }
}

/**
 * Create a child logger with bound context
 */
export function createChildLogger(context: TimingContext): Logger {
  return logger.child(context);
}

// ============================================================================
// Operation Stats (read by paygate_status)
// ============================================================================

interface OperationTally {
  count: number;
  ok: number;
  totalMs: number;
}

interface ErrorTally {
  operation: string;
  message: string;
  count: number;
}

const MAX_ERROR_KINDS = 50;
const RECENT_ERRORS = 10;

const tallies = new Map<string, OperationTally>();
// Insertion order is age order; a repeat moves the entry to the end
const errors = new Map<string, ErrorTally>();

function recordMetric(operation: string, durationMs: number, success: boolean): void {
  const tally = tallies.get(operation) ?? { count: 0, ok: 0, totalMs: 0 };
  tally.count++;
  if (success) tally.ok++;
  tally.totalMs += durationMs;
  tallies.set(operation, tally);
}

function recordError(operation: string, error: unknown): void {
  const message = (error instanceof Error ? error.message : String(error)).slice(0, 300);
  const key = `${operation}:${message}`;
  const previous = errors.get(key);

  errors.delete(key);
  errors.set(key, { operation, message, count: (previous?.count ?? 0) + 1 });

  if (errors.size > MAX_ERROR_KINDS) {
    const oldest = errors.keys().next();
    if (!oldest.done) errors.delete(oldest.value);
  }
}

export interface Stats {
  metrics: Record<string, { count: number; successRate: number; avgDurationMs: number }>;
  /** Most recent first */
  recentErrors: ErrorTally[];
}

export function getStats(): Stats {
  const metrics: Stats['metrics'] = {};
  for (const [operation, t] of tallies) {
    metrics[operation] = {
      count: t.count,
      successRate: Math.round((t.ok / t.count) * 100),
      avgDurationMs: Math.round(t.totalMs / t.count),
    };
  }

  const recentErrors = [...errors.values()].slice(-RECENT_ERRORS).reverse();
  return { metrics, recentErrors: recentErrors.map((e) => ({ ...e })) };
}

export function resetStats(): void {
  tallies.clear();
  errors.clear();
}
