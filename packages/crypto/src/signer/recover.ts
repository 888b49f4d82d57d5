/**
 * @ethkey/crypto - Public Key Recovery
 *
 * `ecrecover` takes an already-computed digest and does NOT hash its
 * input. Use `recoverFromMessage` when holding the original message.
 */

import { CryptoError } from '../types';
import { COMPACT_SIGNATURE_SIZE, KECCAK256_SIZE, MAX_RECOVERY_ID } from '../constants';
import { hashMessage } from '../hash/keccak';
import { PublicKey } from '../keys/public-key';
import { secp256k1 } from './setup';
import type { RecoveryId } from './types';

export function isRecoveryId(value: number): value is RecoveryId {
  return Number.isInteger(value) && value >= 0 && value <= MAX_RECOVERY_ID;
}

/**
 * Recover the public key that produced a signature over a digest.
 *
 * @param digest - 32-byte message digest (not hashed again)
 * @param compact - 64-byte r || s
 * @param recoveryId - 0..3
 * @throws CryptoError INVALID_RECOVERY_ID | INVALID_LENGTH | RECOVERY_FAILED
 */
export function ecrecover(digest: Uint8Array, compact: Uint8Array, recoveryId: number): PublicKey {
  if (!isRecoveryId(recoveryId)) {
    throw new CryptoError('Invalid recovery id', 'INVALID_RECOVERY_ID');
  }
  if (digest.length !== KECCAK256_SIZE) {
    throw new CryptoError('Invalid digest length', 'INVALID_LENGTH');
  }
  if (compact.length !== COMPACT_SIGNATURE_SIZE) {
    throw new CryptoError('Public key recovery failed', 'RECOVERY_FAILED');
  }

  try {
    const point = secp256k1.Signature.fromCompact(compact)
      .addRecoveryBit(recoveryId)
      .recoverPublicKey(digest);
    return PublicKey.fromBytes(point.toRawBytes(false));
  } catch {
    throw new CryptoError('Public key recovery failed', 'RECOVERY_FAILED');
  }
}

/**
 * keccak256 the message, then {@link ecrecover}.
 */
export function recoverFromMessage(
  message: string | Uint8Array,
  compact: Uint8Array,
  recoveryId: number
): PublicKey {
  return ecrecover(hashMessage(message), compact, recoveryId);
}
