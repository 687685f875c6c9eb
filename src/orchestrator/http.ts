/**
 * HTTP plumbing for the orchestrator: request descriptions, deadlines and
 * the mapping of fetch failures onto the error taxonomy.
 */

import { PaygateError, PaygateErrorCode } from '../errors.js';

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

/**
 * Canonical description of one logical request. The fingerprint is computed from it.
 */
export interface RequestDescription {
  method: string;
  url: string;
  headers?: Record<string, string>;
  body?: string;
}

export interface Deadline {
  signal: AbortSignal;
  readonly expired: boolean;
  dispose(): void;
}

/**
 * A deadline that aborts after `ms`, or earlier when the caller's signal aborts
 */
export function createDeadline(ms: number, parent?: AbortSignal): Deadline {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(new Error(`Deadline of ${ms}ms exceeded`)), ms);

  const onParentAbort = () => controller.abort(parent?.reason);
  if (parent) {
    if (parent.aborted) onParentAbort();
    else parent.addEventListener('abort', onParentAbort, { once: true });
  }

  return {
    signal: controller.signal,
    get expired() {
      return controller.signal.aborted;
    },
    dispose() {
      clearTimeout(timeoutId);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}

export function isTransientStatus(status: number): boolean {
  return status >= 500;
}

/**
 * Send a request. Network failures become TRANSIENT_NETWORK, deadline expiry TIMEOUT.
 */
export async function sendRequest(
  fetchFn: FetchFn,
  request: RequestDescription,
  deadline: Deadline,
  extraHeaders: Record<string, string> = {},
): Promise<Response> {
  if (deadline.expired) {
    throw new PaygateError(PaygateErrorCode.TIMEOUT, `Deadline exceeded before ${request.method} ${request.url}`);
  }

  try {
    return await fetchFn(request.url, {
      method: request.method,
      headers: { ...request.headers, ...extraHeaders },
      body: request.body,
      signal: deadline.signal,
    });
  } catch (error) {
    if (deadline.expired) {
      throw new PaygateError(
        PaygateErrorCode.TIMEOUT,
        `Deadline exceeded during ${request.method} ${request.url}`,
        'The call may be retried; any payment already made is tracked and will not be repeated.',
      );
    }
    throw new PaygateError(
      PaygateErrorCode.TRANSIENT_NETWORK,
      `Request to ${request.url} failed: ${error instanceof Error ? error.message : String(error)}`,
      'The call may be retried; any payment already made is tracked and will not be repeated.',
    );
  }
}

/**
 * Read a response body as JSON when it parses, otherwise as text
 */
export async function readBody(response: Response): Promise<unknown> {
  const text = await response.text();
  if (text === '') return null;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

export function headersToRecord(headers: Headers): Record<string, string> {
  const record: Record<string, string> = {};
  headers.forEach((value, key) => {
    record[key] = value;
  });
  return record;
}
