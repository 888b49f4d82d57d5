/**
 * @ethkey/crypto - Signer Types
 */

import type { RandomSource } from '../types';

/**
 * Selects which of the candidate public keys produced the signature.
 */
export type RecoveryId = 0 | 1 | 2 | 3;

/**
 * ECDSA signature plus the id needed to recover the signer's key.
 */
export type RecoverableSignature = {
  /** 64 bytes: r (32) || s (32), low-S normalised */
  compact: Uint8Array;
  recoveryId: RecoveryId;
};

export type SignOptions = {
  /** Source of the 32 bytes of extra entropy mixed into the RFC 6979 nonce */
  random?: RandomSource;
};
