/**
 * @ethkey/crypto - ECDSA Verification
 *
 * A signature that does not match is a `false` result. Only a
 * structurally malformed signature throws.
 */

import { CryptoError } from '../types';
import { COMPACT_SIGNATURE_SIZE, KECCAK256_SIZE } from '../constants';
import { hashMessage } from '../hash/keccak';
import type { PublicKey } from '../keys/public-key';
import { secp256k1 } from './setup';

/**
 * Parse 64-byte r || s, requiring 0 < r, s < n.
 */
function parseCompact(compact: Uint8Array): InstanceType<typeof secp256k1.Signature> {
  if (compact.length !== COMPACT_SIGNATURE_SIZE) {
    throw new CryptoError('Invalid signature length', 'INVALID_SIGNATURE');
  }

  try {
    return secp256k1.Signature.fromCompact(compact);
  } catch {
    throw new CryptoError('Invalid signature', 'INVALID_SIGNATURE');
  }
}

/**
 * Verify a compact signature over a 32-byte digest.
 *
 * High-S signatures are well-formed but not accepted (returns false).
 *
 * @throws CryptoError INVALID_LENGTH | INVALID_SIGNATURE
 */
export function verifyDigest(
  digest: Uint8Array,
  compact: Uint8Array,
  publicKey: PublicKey
): boolean {
  if (digest.length !== KECCAK256_SIZE) {
    throw new CryptoError('Invalid digest length', 'INVALID_LENGTH');
  }

  const signature = parseCompact(compact);
  return secp256k1.verify(signature, digest, publicKey.toBytes(), { lowS: true });
}

/**
 * Verify a compact signature over keccak256(message).
 *
 * @throws CryptoError INVALID_SIGNATURE
 */
export function verify(
  message: string | Uint8Array,
  compact: Uint8Array,
  publicKey: PublicKey
): boolean {
  return verifyDigest(hashMessage(message), compact, publicKey);
}
