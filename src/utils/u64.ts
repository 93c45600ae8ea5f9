import { Result, ok, fail } from '../models/api-response.model';
import { U64Input } from '../models/instruction.model';

export const MAX_U64 = 2n ** 64n - 1n;

const DIGITS = /^[0-9]+$/;

/**
 * Accepts a safe JSON integer or a decimal string. Larger JSON integers
 * are turned into exact strings by the body parser before they get here.
 */
export function parseU64(value: U64Input, field: string): Result<bigint> {
  const error = `Invalid ${field} (expected unsigned 64-bit integer)`;

  let parsed: bigint;
  if (typeof value === 'number') {
    if (!Number.isSafeInteger(value) || value < 0) {
      return fail(error);
    }
    parsed = BigInt(value);
  } else {
    if (!DIGITS.test(value)) {
      return fail(error);
    }
    parsed = BigInt(value);
  }

  if (parsed > MAX_U64) {
    return fail(error);
  }
  return ok(parsed);
}
