import bs58 from 'bs58';
import { Result, ok, fail } from '../models/api-response.model';

// Canonical padded base64: full quads, then an optional padded tail
const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

export function decodeBase58(value: string): Result<Uint8Array> {
  try {
    return ok(bs58.decode(value));
  } catch (error) {
    return fail(error instanceof Error ? error.message : 'Invalid base58 string');
  }
}

export function encodeBase58(bytes: Uint8Array): string {
  return bs58.encode(bytes);
}

/**
 * Buffer.from(..., 'base64') silently skips garbage, so the input is
 * checked against the alphabet and re-encoded to reject non-zero pad bits.
 */
export function decodeBase64(value: string): Result<Uint8Array> {
  if (!BASE64_PATTERN.test(value)) {
    return fail('Invalid base64 string');
  }

  const bytes = Buffer.from(value, 'base64');
  if (bytes.toString('base64') !== value) {
    return fail('Non-canonical base64 string');
  }

  return ok(new Uint8Array(bytes));
}

export function encodeBase64(data: Uint8Array | string): string {
  return typeof data === 'string'
    ? Buffer.from(data, 'utf-8').toString('base64')
    : Buffer.from(data).toString('base64');
}
