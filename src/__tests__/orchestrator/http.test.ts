import { describe, it, expect, vi } from 'vitest';
import { PaygateErrorCode } from '../../errors.js';
import { createDeadline, readBody, sendRequest, type FetchFn } from '../../orchestrator/http.js';
import { withRetry } from '../../orchestrator/retry.js';
import { rejectionOf } from '../helpers.js';

const REQUEST = { method: 'POST', url: 'https://oracle.test/v1/data', headers: { Accept: 'application/json' }, body: '{}' };

describe('sendRequest', () => {
  it('merges extra headers over the request headers', async () => {
    const fetchFn = vi.fn<FetchFn>().mockResolvedValue(new Response('ok'));
    const deadline = createDeadline(1_000);

    await sendRequest(fetchFn, REQUEST, deadline, { 'X-PAYMENT': 'abc' });
    deadline.dispose();

    expect(fetchFn).toHaveBeenCalledWith('https://oracle.test/v1/data', {
      method: 'POST',
      headers: { Accept: 'application/json', 'X-PAYMENT': 'abc' },
      body: '{}',
      signal: deadline.signal,
    });
  });

  it('maps network failures to TRANSIENT_NETWORK', async () => {
    const fetchFn = vi.fn<FetchFn>().mockRejectedValue(new TypeError('fetch failed'));
    const deadline = createDeadline(1_000);

    const error = await rejectionOf(sendRequest(fetchFn, REQUEST, deadline));
    deadline.dispose();

    expect(error.code).toBe(PaygateErrorCode.TRANSIENT_NETWORK);
    expect(error.message).toBe('Request to https://oracle.test/v1/data failed: fetch failed');
  });

  it('maps an aborted deadline to TIMEOUT', async () => {
    const parent = new AbortController();
    const deadline = createDeadline(1_000, parent.signal);
    const fetchFn = vi.fn<FetchFn>().mockImplementation(async () => {
      parent.abort();
      throw new Error('aborted');
    });

    const error = await rejectionOf(sendRequest(fetchFn, REQUEST, deadline));
    deadline.dispose();

    expect(deadline.expired).toBe(true);
    expect(error.code).toBe(PaygateErrorCode.TIMEOUT);
  });
});

describe('readBody', () => {
  it('parses JSON, falls back to text and maps empty to null', async () => {
    expect(await readBody(new Response('{"a":1}'))).toEqual({ a: 1 });
    expect(await readBody(new Response('plain'))).toBe('plain');
    expect(await readBody(new Response(''))).toBeNull();
  });
});

describe('withRetry', () => {
  it('backs off exponentially up to the cap', async () => {
    const delays: number[] = [];
    const fn = vi.fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new Error('1'))
      .mockRejectedValueOnce(new Error('2'))
      .mockRejectedValueOnce(new Error('3'))
      .mockResolvedValueOnce('done');

    const result = await withRetry(fn, {
      attempts: 4,
      baseDelayMs: 100,
      maxDelayMs: 300,
      shouldRetry: () => true,
      sleep: async (ms) => {
        delays.push(ms);
      },
    });

    expect(result).toBe('done');
    expect(delays).toEqual([100, 200, 300]);
    expect(fn.mock.calls.map(([attempt]) => attempt)).toEqual([1, 2, 3, 4]);
  });

  it('stops at the first error it may not retry', async () => {
    const fn = vi.fn<(attempt: number) => Promise<string>>().mockRejectedValue(new Error('fatal'));

    await expect(
      withRetry(fn, { attempts: 3, baseDelayMs: 1, shouldRetry: () => false, sleep: async () => undefined }),
    ).rejects.toThrow('fatal');
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
