/**
 * Paygate Error Types
 *
 * Standardized error codes for the payment-gated request core and the
 * oracle tools built on it. Every failure that crosses a module boundary
 * is a PaygateError; the middleware pipeline formats them into MCP responses.
 */

export enum PaygateErrorCode {
  PROTOCOL_VIOLATION = 'PROTOCOL_VIOLATION',
  PAYMENT_REJECTED = 'PAYMENT_REJECTED',
  SPEND_LIMIT_EXCEEDED = 'SPEND_LIMIT_EXCEEDED',
  CHALLENGE_EXPIRED = 'CHALLENGE_EXPIRED',
  INSUFFICIENT_FUNDS = 'INSUFFICIENT_FUNDS',
  SIGNING_FAILURE = 'SIGNING_FAILURE',
  TRANSIENT_NETWORK = 'TRANSIENT_NETWORK',
  TIMEOUT = 'TIMEOUT',
  SETTLEMENT_AMBIGUOUS = 'SETTLEMENT_AMBIGUOUS',
  VALIDATION = 'VALIDATION',
  UNKNOWN = 'UNKNOWN',
}

/**
 * Coarse failure classes reported to callers.
 */
export type ErrorCategory =
  | 'ProtocolViolation'
  | 'AuthorizationError'
  | 'TransientNetworkError'
  | 'SettlementAmbiguous'
  | 'ValidationError'
  | 'Unknown';

const CATEGORY_BY_CODE: Record<PaygateErrorCode, ErrorCategory> = {
  [PaygateErrorCode.PROTOCOL_VIOLATION]: 'ProtocolViolation',
  [PaygateErrorCode.PAYMENT_REJECTED]: 'ProtocolViolation',
  [PaygateErrorCode.SPEND_LIMIT_EXCEEDED]: 'AuthorizationError',
  [PaygateErrorCode.CHALLENGE_EXPIRED]: 'AuthorizationError',
  [PaygateErrorCode.INSUFFICIENT_FUNDS]: 'AuthorizationError',
  [PaygateErrorCode.SIGNING_FAILURE]: 'AuthorizationError',
  [PaygateErrorCode.TRANSIENT_NETWORK]: 'TransientNetworkError',
  [PaygateErrorCode.TIMEOUT]: 'TransientNetworkError',
  [PaygateErrorCode.SETTLEMENT_AMBIGUOUS]: 'SettlementAmbiguous',
  [PaygateErrorCode.VALIDATION]: 'ValidationError',
  [PaygateErrorCode.UNKNOWN]: 'Unknown',
};

export class PaygateError extends Error {
  constructor(
    public code: PaygateErrorCode,
    message: string,
    public suggestion?: string,
    public context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'PaygateError';
  }

  get category(): ErrorCategory {
    return CATEGORY_BY_CODE[this.code];
  }

  /**
   * Whether the caller may safely repeat the whole call. The ledger
   * prevents a second payment for these classes.
   */
  get retryable(): boolean {
    return this.category === 'TransientNetworkError' || this.category === 'SettlementAmbiguous';
  }
}

/**
 * Normalize anything thrown into a PaygateError
 */
export function toPaygateError(error: unknown): PaygateError {
  if (error instanceof PaygateError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new PaygateError(PaygateErrorCode.UNKNOWN, message);
}

/**
 * Format a PaygateError into an MCP tool response
 */
export function formatPaygateError(error: PaygateError): {
  content: Array<{ type: 'text'; text: string }>;
  isError: boolean;
} {
  const icon = error.category === 'AuthorizationError' ? '🛑' : '❌';
  let text = `${icon} [${error.category}] ${error.message}`;
  if (error.suggestion) text += `\n\n→ ${error.suggestion}`;
  text += error.retryable
    ? '\n\nRetrying this call is safe; it will not pay twice.'
    : '\n\nDo not retry this call unchanged.';
  if (error.context) {
    const context = JSON.stringify(
      error.context,
      (_key, value: unknown) => (typeof value === 'bigint' ? value.toString() : value),
      2,
    );
    text += `\n\n${context}`;
  }
  return { content: [{ type: 'text', text }], isError: true };
}
