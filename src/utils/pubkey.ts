import { PublicKey } from '@solana/web3.js';
import { Result, ok, fail } from '../models/api-response.model';
import { decodeBase58 } from './encoding';

export const PUBLIC_KEY_LENGTH = 32;

/**
 * Parse a base58 address into a PublicKey.
 * `new PublicKey(str)` accepts short inputs and left-pads them, so the
 * decoded length is checked here first.
 */
export function parsePublicKey(value: string, errorMessage: string): Result<PublicKey> {
  const decoded = decodeBase58(value);
  if (!decoded.ok || decoded.value.length !== PUBLIC_KEY_LENGTH) {
    return fail(errorMessage);
  }
  return ok(new PublicKey(decoded.value));
}
