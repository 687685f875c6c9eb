import { describe, it, expect } from 'vitest';
import { computeFingerprint } from '../../ledger/fingerprint.js';

describe('computeFingerprint', () => {
  const base = { method: 'GET', url: 'https://oracle.test/v1/data?b=2&a=1' };

  it('is stable for the same request', () => {
    expect(computeFingerprint(base)).toBe(computeFingerprint({ ...base }));
    expect(computeFingerprint(base)).toMatch(/^0x[0-9a-f]{64}$/);
  });

  it('ignores query order, fragments and method case', () => {
    expect(computeFingerprint({ method: 'get', url: 'https://oracle.test/v1/data?a=1&b=2#top' })).toBe(
      computeFingerprint(base),
    );
  });

  it('ignores JSON key order in the body', () => {
    const a = computeFingerprint({ method: 'POST', url: base.url, body: '{"x":1,"y":{"b":2,"a":1}}' });
    const b = computeFingerprint({ method: 'POST', url: base.url, body: '{ "y": { "a": 1, "b": 2 }, "x": 1 }' });
    expect(a).toBe(b);
  });

  it('treats an empty body like no body', () => {
    expect(computeFingerprint({ ...base, body: '' })).toBe(computeFingerprint(base));
  });

  it('distinguishes different requests', () => {
    const fp = computeFingerprint(base);
    expect(computeFingerprint({ ...base, method: 'POST' })).not.toBe(fp);
    expect(computeFingerprint({ ...base, url: 'https://oracle.test/v1/data?a=1&b=3' })).not.toBe(fp);
    expect(computeFingerprint({ ...base, body: 'plain text' })).not.toBe(fp);
  });

  it('fingerprints relative URLs as given', () => {
    expect(computeFingerprint({ method: 'GET', url: '/v1/data' })).not.toBe(
      computeFingerprint({ method: 'GET', url: '/v1/data/' }),
    );
  });
});
