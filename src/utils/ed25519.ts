import * as nacl from 'tweetnacl';
import { ed25519 } from '@noble/curves/ed25519';

export const SIGNATURE_LENGTH = 64;

// Order of the prime-order subgroup
const CURVE_ORDER = 2n ** 252n + 27742317777372353535851937790883648493n;

type EdwardsPoint = ReturnType<typeof ed25519.ExtendedPoint.fromHex>;

function decodePoint(bytes: Uint8Array): EdwardsPoint | null {
  try {
    return ed25519.ExtendedPoint.fromHex(bytes);
  } catch {
    return null;
  }
}

function readScalarLE(bytes: Uint8Array): bigint {
  let value = 0n;
  for (let i = bytes.length - 1; i >= 0; i--) {
    value = (value << 8n) | BigInt(bytes[i]);
  }
  return value;
}

/** 32 bytes that decompress to a point on the curve. */
export function isValidPublicKey(bytes: Uint8Array): boolean {
  return bytes.length === 32 && decodePoint(bytes) !== null;
}

/** 64 bytes with the three high bits of S clear. */
export function isValidSignatureEncoding(bytes: Uint8Array): boolean {
  return bytes.length === SIGNATURE_LENGTH && (bytes[63] & 0xe0) === 0;
}

/**
 * Ed25519 verification that also rejects malleable signatures:
 * S must be reduced and neither R nor A may be a small-order point.
 */
export function verifyStrict(message: Uint8Array, signature: Uint8Array, publicKey: Uint8Array): boolean {
  if (!isValidSignatureEncoding(signature) || publicKey.length !== 32) {
    return false;
  }

  if (readScalarLE(signature.subarray(32)) >= CURVE_ORDER) {
    return false;
  }

  const r = decodePoint(signature.subarray(0, 32));
  const a = decodePoint(publicKey);
  if (!r || !a || r.isSmallOrder() || a.isSmallOrder()) {
    return false;
  }

  return nacl.sign.detached.verify(message, signature, publicKey);
}
