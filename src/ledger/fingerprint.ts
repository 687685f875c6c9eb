/**
 * Request fingerprint
 *
 * A deterministic id for one logical request: method, normalized URL and
 * body. Headers are excluded, so a resubmission carrying X-PAYMENT has the
 * same fingerprint as the request that was challenged.
 */

import { keccak256, toHex, type Hex } from 'viem';

export interface FingerprintInput {
  method: string;
  url: string;
  body?: string;
}

function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(canonicalize);
  if (value !== null && typeof value === 'object') {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = canonicalize(Reflect.get(value, key));
    }
    return sorted;
  }
  return value;
}

function normalizeUrl(url: string): string {
  try {
    const parsed = new URL(url);
    parsed.hash = '';
    parsed.searchParams.sort();
    return parsed.toString();
  } catch {
    // Not absolute; fingerprint the raw string
    return url;
  }
}

function normalizeBody(body: string | undefined): unknown {
  if (body === undefined || body === '') return null;
  try {
    return canonicalize(JSON.parse(body));
  } catch {
    return body;
  }
}

export function computeFingerprint(input: FingerprintInput): Hex {
  const canonical = JSON.stringify([
    input.method.toUpperCase(),
    normalizeUrl(input.url),
    normalizeBody(input.body),
  ]);
  return keccak256(toHex(canonical));
}
