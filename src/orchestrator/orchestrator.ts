/**
 * Request Orchestrator
 *
 * Drives one logical call through the x402 flow:
 *
 * 1. Fingerprint the request and consult the ledger
 * 2. Send it plainly; anything but 402 is returned as-is
 * 3. On 402, take the fingerprint's lock, parse the challenge, authorize,
 *    record a pending payment and resubmit with X-PAYMENT
 * 4. If the answer to a paid request is lost, verify settlement before
 *    deciding anything. A second authorization is never signed while an
 *    earlier one for the fingerprint may have settled.
 *
 * Successful calls produce a ResultEvent for the notification sink.
 */

import type { Address, Hex } from 'viem';
import { PaygateError, PaygateErrorCode, toPaygateError } from '../errors.js';
import type { NotificationSink, ResultEvent } from '../events/notifier.js';
import type { IdempotencyLedger } from '../ledger/ledger.js';
import { computeFingerprint } from '../ledger/fingerprint.js';
import type { SettlementVerifier } from '../settlement/verifier.js';
import { createChildLogger, type Logger } from '../utils/logger.js';
import type { PaymentAuthorizer } from '../x402/authorizer.js';
import { parseChallenge } from '../x402/challenge.js';
import type { PaymentCredential } from '../x402/credential.js';
import {
  PAYMENT_HEADER,
  PAYMENT_RESPONSE_HEADER,
  decodeSettlementResponse,
  encodePaymentHeader,
} from '../x402/header.js';
import type {
  PaymentAuthorization,
  PaymentChallenge,
  PaymentReceipt,
  SettlementOutcome,
  SettlementStatus,
} from '../x402/types.js';
import {
  createDeadline,
  headersToRecord,
  isTransientStatus,
  readBody,
  sendRequest,
  type Deadline,
  type FetchFn,
  type RequestDescription,
} from './http.js';
import { sleep as defaultSleep, withRetry } from './retry.js';
import { CallMachine } from './state-machine.js';

export interface OrchestratedResponse {
  status: number;
  headers: Record<string, string>;
  /** Parsed JSON when the body parses, otherwise text (null when empty) */
  body: unknown;
  fingerprint: Hex;
  payment?: PaymentReceipt;
}

export interface ExecuteOptions {
  deadlineMs?: number;
  signal?: AbortSignal;
}

export interface OrchestratorDeps {
  ledger: IdempotencyLedger;
  authorizer: PaymentAuthorizer;
  verifier: SettlementVerifier;
  credential?: PaymentCredential;
  fetchFn?: FetchFn;
  sink?: NotificationSink;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export interface OrchestratorOptions {
  maxAttempts: number;
  backoffMs: number;
  deadlineMs: number;
}

export interface ReconcileResult {
  fingerprint: Hex;
  nonceLabel: string;
  outcome: SettlementOutcome;
}

/**
 * Per-call working state
 */
interface CallContext {
  request: RequestDescription;
  fingerprint: Hex;
  log: Logger;
  machine: CallMachine;
  deadline: Deadline;
  /** Challenge nonces already answered in this call */
  usedNonces: Set<Hex>;
}

type Resubmission =
  | { kind: 'succeeded'; result: OrchestratedResponse }
  | { kind: 'rejected'; response: Response };

function toReceipt(authorization: PaymentAuthorization, reused: boolean, txHash?: Hex): PaymentReceipt {
  return {
    nonce: authorization.nonce,
    nonceLabel: authorization.nonceLabel,
    amount: authorization.amount,
    asset: authorization.asset,
    network: authorization.network,
    payer: authorization.payer,
    txHash,
    reused,
  };
}

function ambiguous(authorization: PaymentAuthorization, fingerprint: Hex): PaygateError {
  return new PaygateError(
    PaygateErrorCode.SETTLEMENT_AMBIGUOUS,
    `Settlement of payment ${authorization.nonceLabel} could not be confirmed`,
    'The payment is recorded as pending. Retrying the call verifies it before any new payment is made.',
    { fingerprint, nonce: authorization.nonceLabel },
  );
}

async function discard(response: Response): Promise<void> {
  await response.body?.cancel();
}

export class RequestOrchestrator {
  private readonly ledger: IdempotencyLedger;
  private readonly authorizer: PaymentAuthorizer;
  private readonly verifier: SettlementVerifier;
  private readonly credential?: PaymentCredential;
  private readonly fetchFn: FetchFn;
  private readonly sink?: NotificationSink;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    deps: OrchestratorDeps,
    private readonly options: OrchestratorOptions,
  ) {
    this.ledger = deps.ledger;
    this.authorizer = deps.authorizer;
    this.verifier = deps.verifier;
    this.credential = deps.credential;
    this.fetchFn = deps.fetchFn ?? fetch;
    this.sink = deps.sink;
    this.now = deps.now ?? Date.now;
    this.sleep = deps.sleep ?? defaultSleep;
  }

  get payer(): Address | undefined {
    return this.credential?.address;
  }

  async execute(request: RequestDescription, options: ExecuteOptions = {}): Promise<OrchestratedResponse> {
    const fingerprint = computeFingerprint(request);
    const log = createChildLogger({ fingerprint, method: request.method, url: request.url });
    const call: CallContext = {
      request,
      fingerprint,
      log,
      machine: new CallMachine(log),
      deadline: createDeadline(options.deadlineMs ?? this.options.deadlineMs, options.signal),
      usedNonces: new Set(),
    };

    try {
      const result = await this.run(call);
      this.emit(call, result);
      return result;
    } catch (error) {
      throw call.machine.fail(toPaygateError(error));
    } finally {
      call.deadline.dispose();
    }
  }

  /**
   * Re-verify every pending record. Records that settle become confirmed,
   * those that provably did not become failed (or expired); the rest stay pending.
   */
  async reconcilePending(): Promise<ReconcileResult[]> {
    const results: ReconcileResult[] = [];

    for (const record of this.ledger.pending()) {
      const authorization = record.authorization;
      if (!authorization) continue;

      const outcome = await this.ledger.withLock(record.fingerprint, async () => {
        // A call may have settled it while we waited for the lock
        if (this.ledger.get(record.fingerprint)?.status !== 'pending') return null;
        const log = createChildLogger({ fingerprint: record.fingerprint, task: 'reconcile' });
        return this.verifyAndRecord(record.fingerprint, authorization, log);
      });

      if (outcome) {
        results.push({ fingerprint: record.fingerprint, nonceLabel: record.nonceLabel, outcome });
      }
    }

    return results;
  }

  // ==========================================================================
  // Flow
  // ==========================================================================

  private async run(call: CallContext): Promise<OrchestratedResponse> {
    const existing = this.ledger.get(call.fingerprint);
    if (existing && (existing.status === 'pending' || this.ledger.isReusable(existing))) {
      call.log.debug({ status: existing.status, nonce: existing.nonceLabel }, 'Ledger record found');
      return this.ledger.withLock(call.fingerprint, () => this.runLocked(call, null));
    }

    call.machine.to('awaiting_challenge');
    const response = await this.sendPlain(call);
    if (response.status !== 402) {
      return this.succeed(call, response);
    }

    return this.ledger.withLock(call.fingerprint, ({ contended }) => {
      if (contended) {
        call.log.debug('Waited on an in-flight call for the same request');
      }
      return this.runLocked(call, response);
    });
  }

  /**
   * Everything from here runs holding the fingerprint's lock
   */
  private async runLocked(call: CallContext, challengeResponse: Response | null): Promise<OrchestratedResponse> {
    const record = this.ledger.get(call.fingerprint);

    if (record?.authorization && this.ledger.isReusable(record)) {
      if (challengeResponse) await discard(challengeResponse);

      call.machine.to('resubmitting', { reuse: record.nonceLabel });
      const reuse = await this.resubmit(call, record.authorization, true);
      if (reuse.kind === 'succeeded') return reuse.result;

      // The resource no longer honours the settled authorization
      this.ledger.update(call.fingerprint, { status: 'expired' });
      call.machine.to('awaiting_challenge', { reason: 'reused authorization refused' });
      return this.paymentCycle(call, reuse.response);
    }

    if (record?.status === 'pending' && record.authorization) {
      if (challengeResponse) await discard(challengeResponse);
      challengeResponse = null;

      call.machine.to('verifying', { reason: 'pending record', nonce: record.nonceLabel });
      const outcome = await this.verifyAndRecord(call.fingerprint, record.authorization, call.log);
      if (outcome === 'ambiguous') throw ambiguous(record.authorization, call.fingerprint);
      if (outcome === 'confirmed') return this.resubmitSettled(call, record.authorization);
    }

    if (!challengeResponse) {
      call.machine.to('awaiting_challenge');
      const response = await this.sendPlain(call);
      if (response.status !== 402) return this.succeed(call, response);
      challengeResponse = response;
    }

    return this.paymentCycle(call, challengeResponse);
  }

  private async paymentCycle(call: CallContext, response: Response): Promise<OrchestratedResponse> {
    let challengeResponse = response;

    for (;;) {
      const challenge = await parseChallenge(
        challengeResponse,
        call.request.url,
        this.authorizer.chain,
        Math.floor(this.now() / 1000),
      );

      if (call.usedNonces.has(challenge.nonce)) {
        throw new PaygateError(
          PaygateErrorCode.PAYMENT_REJECTED,
          `Resource re-issued challenge ${challenge.nonceLabel} after refusing payment for it`,
        );
      }
      call.usedNonces.add(challenge.nonce);

      call.machine.to('authorizing', {
        nonce: challenge.nonceLabel,
        amount: challenge.amount.toString(),
        network: challenge.network,
      });
      const authorization = await this.authorizeAndRecord(call, challenge);

      call.machine.to('resubmitting', { nonce: challenge.nonceLabel });
      const outcome = await this.resubmit(call, authorization, false);
      if (outcome.kind === 'succeeded') return outcome.result;

      await this.handleRejection(call, authorization, outcome.response);
      challengeResponse = outcome.response;
    }
  }

  private async sendPlain(call: CallContext): Promise<Response> {
    return withRetry(
      async () => {
        const response = await sendRequest(this.fetchFn, call.request, call.deadline);
        if (isTransientStatus(response.status)) {
          await discard(response);
          throw new PaygateError(
            PaygateErrorCode.TRANSIENT_NETWORK,
            `${call.request.url} answered HTTP ${response.status}`,
            'The oracle is having trouble; retry later.',
          );
        }
        return response;
      },
      {
        attempts: this.options.maxAttempts,
        baseDelayMs: this.options.backoffMs,
        sleep: this.sleep,
        shouldRetry: (error) =>
          error instanceof PaygateError &&
          error.code === PaygateErrorCode.TRANSIENT_NETWORK &&
          !call.deadline.expired,
        onRetry: (error, attempt, delayMs) =>
          call.log.warn({ attempt, delayMs, err: toPaygateError(error).message }, 'Retrying request'),
      },
    );
  }

  private async authorizeAndRecord(call: CallContext, challenge: PaymentChallenge): Promise<PaymentAuthorization> {
    const base = {
      fingerprint: call.fingerprint,
      resource: challenge.resource,
      challengeNonce: challenge.nonce,
      nonceLabel: challenge.nonceLabel,
      amount: challenge.amount,
      asset: challenge.asset,
      network: challenge.network,
    };

    // Nothing is recorded for a call that never reached the authorizer
    if (call.deadline.expired) {
      throw new PaygateError(PaygateErrorCode.TIMEOUT, 'Deadline exceeded before payment was authorized');
    }
    const credential = this.credential;
    if (!credential) {
      throw new PaygateError(
        PaygateErrorCode.SIGNING_FAILURE,
        'No payer credential configured',
        'Set PAYER_PRIVATE_KEY to enable paid oracle calls.',
      );
    }

    try {
      const authorization = await this.authorizer.authorize(challenge, credential);
      this.ledger.put({ ...base, authorization, status: 'pending' });
      call.log.info({ nonce: challenge.nonceLabel, payer: authorization.payer }, 'Payment authorized');
      return authorization;
    } catch (error) {
      this.ledger.put({ ...base, status: 'failed' });
      throw error;
    }
  }

  private async resubmit(
    call: CallContext,
    authorization: PaymentAuthorization,
    reused: boolean,
  ): Promise<Resubmission> {
    if (reused && call.deadline.expired) {
      throw new PaygateError(
        PaygateErrorCode.TIMEOUT,
        `Deadline exceeded before settled payment ${authorization.nonceLabel} was resubmitted`,
        'The payment stays recorded; retrying the call reuses it.',
        { fingerprint: call.fingerprint, nonce: authorization.nonceLabel },
      );
    }

    let response: Response;
    try {
      response = await sendRequest(this.fetchFn, call.request, call.deadline, {
        [PAYMENT_HEADER]: encodePaymentHeader(authorization),
      });
    } catch (error) {
      return { kind: 'succeeded', result: await this.recoverLostResponse(call, authorization, toPaygateError(error)) };
    }

    if (response.ok) {
      const settlement = decodeSettlementResponse(response.headers.get(PAYMENT_RESPONSE_HEADER));
      const previous = this.ledger.get(call.fingerprint);
      const txHash = settlement?.transaction ?? previous?.txHash;
      this.ledger.update(call.fingerprint, { status: 'confirmed', txHash });
      return { kind: 'succeeded', result: await this.succeed(call, response, toReceipt(authorization, reused, txHash)) };
    }

    if (response.status === 402) {
      return { kind: 'rejected', response };
    }

    await discard(response);

    if (isTransientStatus(response.status)) {
      const cause = new PaygateError(
        PaygateErrorCode.TRANSIENT_NETWORK,
        `${call.request.url} answered HTTP ${response.status} to a paid request`,
      );
      return { kind: 'succeeded', result: await this.recoverLostResponse(call, authorization, cause) };
    }

    call.machine.to('verifying', { reason: `HTTP ${response.status} after payment` });
    const outcome = await this.verifyAndRecord(call.fingerprint, authorization, call.log);
    throw new PaygateError(
      PaygateErrorCode.PROTOCOL_VIOLATION,
      `Resource answered HTTP ${response.status} to a paid request`,
      undefined,
      { nonce: authorization.nonceLabel, settlement: outcome },
    );
  }

  /**
   * The paid request's answer never arrived: find out whether the payment
   * landed before doing anything else.
   */
  private async recoverLostResponse(
    call: CallContext,
    authorization: PaymentAuthorization,
    cause: PaygateError,
  ): Promise<OrchestratedResponse> {
    call.machine.to('verifying', { reason: cause.code, nonce: authorization.nonceLabel });
    const outcome = await this.verifyAndRecord(call.fingerprint, authorization, call.log);

    if (call.deadline.expired) {
      throw new PaygateError(
        PaygateErrorCode.TIMEOUT,
        `Deadline exceeded after payment ${authorization.nonceLabel} was sent (settlement: ${outcome})`,
        'Retrying the call reuses or verifies this payment; it will not pay twice.',
        { fingerprint: call.fingerprint, nonce: authorization.nonceLabel, settlement: outcome },
      );
    }
    if (outcome === 'ambiguous') throw ambiguous(authorization, call.fingerprint);
    if (outcome === 'failed') throw cause;

    return this.resubmitSettled(call, authorization);
  }

  /**
   * One more delivery attempt for an authorization known to have settled
   */
  private async resubmitSettled(call: CallContext, authorization: PaymentAuthorization): Promise<OrchestratedResponse> {
    call.machine.to('resubmitting', { reason: 'settled', nonce: authorization.nonceLabel });

    const response = await sendRequest(this.fetchFn, call.request, call.deadline, {
      [PAYMENT_HEADER]: encodePaymentHeader(authorization),
    });

    if (!response.ok) {
      await discard(response);
      throw new PaygateError(
        PaygateErrorCode.TRANSIENT_NETWORK,
        `Resource answered HTTP ${response.status} for settled payment ${authorization.nonceLabel}`,
        'The payment is settled and recorded; retrying the call will reuse it.',
      );
    }

    const txHash = this.ledger.get(call.fingerprint)?.txHash;
    return this.succeed(call, response, toReceipt(authorization, true, txHash));
  }

  /**
   * A paid resubmission came back 402. Decide whether to accept one fresh
   * challenge or stop.
   */
  private async handleRejection(
    call: CallContext,
    authorization: PaymentAuthorization,
    response: Response,
  ): Promise<void> {
    call.machine.to('verifying', { reason: 'payment refused', nonce: authorization.nonceLabel });

    let status: SettlementStatus;
    try {
      status = await this.verifier.checkOnce(authorization, {
        expectedNonce: authorization.nonce,
        txHash: this.ledger.get(call.fingerprint)?.txHash,
      });
    } catch (error) {
      await discard(response);
      call.log.warn({ err: toPaygateError(error).message }, 'Could not check refused payment');
      throw ambiguous(authorization, call.fingerprint);
    }

    if (status === 'confirmed') {
      await discard(response);
      this.ledger.update(call.fingerprint, { status: 'confirmed' });
      throw new PaygateError(
        PaygateErrorCode.PAYMENT_REJECTED,
        `Resource refused payment ${authorization.nonceLabel} although it settled`,
        'The payment is recorded as settled and no further payment is made for this request. Ask the resource operator to honour it.',
        { nonce: authorization.nonceLabel },
      );
    }
    if (status === 'pending') {
      await discard(response);
      throw ambiguous(authorization, call.fingerprint);
    }

    this.ledger.update(call.fingerprint, { status: 'failed' });
    try {
      call.machine.recordRejection(authorization.nonceLabel);
    } catch (error) {
      await discard(response);
      throw error;
    }
    call.machine.to('awaiting_challenge', { reason: 'fresh challenge after refusal' });
  }

  private async verifyAndRecord(
    fingerprint: Hex,
    authorization: PaymentAuthorization,
    log: Logger,
  ): Promise<SettlementOutcome> {
    const outcome = await this.verifier.verify(authorization, {
      expectedNonce: authorization.nonce,
      txHash: this.ledger.get(fingerprint)?.txHash,
    });

    if (outcome === 'confirmed') {
      this.ledger.update(fingerprint, { status: 'confirmed' });
    } else if (outcome === 'failed') {
      const lapsed = authorization.validBefore <= BigInt(Math.floor(this.now() / 1000));
      this.ledger.update(fingerprint, { status: lapsed ? 'expired' : 'failed' });
    } else {
      log.warn({ nonce: authorization.nonceLabel }, 'Settlement ambiguous; record stays pending');
    }

    return outcome;
  }

  private async succeed(
    call: CallContext,
    response: Response,
    payment?: PaymentReceipt,
  ): Promise<OrchestratedResponse> {
    call.machine.to('succeeded', { status: response.status, paid: payment !== undefined });
    return {
      status: response.status,
      headers: headersToRecord(response.headers),
      body: await readBody(response),
      fingerprint: call.fingerprint,
      payment,
    };
  }

  private emit(call: CallContext, result: OrchestratedResponse): void {
    if (!this.sink) return;

    const event: ResultEvent = {
      type: 'tool_call.succeeded',
      fingerprint: result.fingerprint,
      resource: call.request.url,
      status: result.status,
      payment: result.payment,
      at: new Date(this.now()).toISOString(),
    };

    try {
      this.sink.push(event);
    } catch (error) {
      call.log.warn({ err: toPaygateError(error).message }, 'Notification sink failed');
    }
  }
}
