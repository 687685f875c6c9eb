/**
 * Per-call state machine
 *
 *   initiated → awaiting_challenge → authorizing → resubmitting → verifying → {succeeded | failed}
 *
 * Every transition is checked against an explicit table and bounded by a
 * transition budget. A resubmission rejected by the resource may return to
 * awaiting_challenge once; the second rejection fails the call.
 */

import { PaygateError, PaygateErrorCode } from '../errors.js';
import type { Logger } from '../utils/logger.js';

export type CallState =
  | 'initiated'
  | 'awaiting_challenge'
  | 'authorizing'
  | 'resubmitting'
  | 'verifying'
  | 'succeeded'
  | 'failed';

const TRANSITIONS: Record<CallState, readonly CallState[]> = {
  // Reuse of a confirmed record skips straight to resubmitting; a pending one to verifying
  initiated: ['awaiting_challenge', 'resubmitting', 'verifying', 'failed'],
  awaiting_challenge: ['succeeded', 'authorizing', 'resubmitting', 'verifying', 'failed'],
  authorizing: ['resubmitting', 'failed'],
  resubmitting: ['succeeded', 'awaiting_challenge', 'verifying', 'failed'],
  verifying: ['awaiting_challenge', 'authorizing', 'resubmitting', 'failed'],
  succeeded: [],
  failed: [],
};

export const MAX_REJECTIONS = 1;
const MAX_TRANSITIONS = 16;

export function canTransition(from: CallState, to: CallState): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminal(state: CallState): boolean {
  return TRANSITIONS[state].length === 0;
}

export class CallMachine {
  private current: CallState = 'initiated';
  private transitions = 0;
  private rejections = 0;

  constructor(
    private readonly log: Logger,
    private readonly maxTransitions = MAX_TRANSITIONS,
  ) {}

  get state(): CallState {
    return this.current;
  }

  to(next: CallState, context: Record<string, unknown> = {}): void {
    const from = this.current;
    if (!canTransition(from, next)) {
      throw new PaygateError(
        PaygateErrorCode.PROTOCOL_VIOLATION,
        `Illegal call state transition: ${from} → ${next}`,
      );
    }

    this.transitions++;
    if (this.transitions > this.maxTransitions) {
      throw new PaygateError(
        PaygateErrorCode.PROTOCOL_VIOLATION,
        `Call exceeded ${this.maxTransitions} state transitions`,
      );
    }

    this.current = next;
    this.log.info({ from, to: next, ...context }, 'Call state transition');
  }

  /**
   * Move to `failed` (if not already terminal) and hand back the error to throw
   */
  fail(error: PaygateError): PaygateError {
    if (!isTerminal(this.current)) {
      this.current = 'failed';
      this.log.warn({ code: error.code, category: error.category, err: error.message }, 'Call failed');
    }
    return error;
  }

  /**
   * Count a rejected payment proof. Throws once the allowance is spent.
   */
  recordRejection(nonceLabel: string): void {
    this.rejections++;
    if (this.rejections > MAX_REJECTIONS) {
      throw new PaygateError(
        PaygateErrorCode.PAYMENT_REJECTED,
        `Resource rejected payment proof again (nonce ${nonceLabel})`,
        'The resource keeps refusing valid payments. Check the oracle endpoint before retrying.',
      );
    }
  }
}
