/**
 * @ethkey/crypto - Recoverable ECDSA Signing
 *
 * `sign` hashes the message with keccak256 first; `signDigest` signs a
 * digest the caller already computed.
 */

import { CryptoError } from '../types';
import { KECCAK256_SIZE } from '../constants';
import { hashMessage } from '../hash/keccak';
import type { PrivateKey } from '../keys/private-key';
import { clearAll } from '../utils/memory';
import { drawRandomBytes, generateRandomBytes } from '../utils/random';
import { isRecoveryId } from './recover';
import { secp256k1 } from './setup';
import type { RecoverableSignature, SignOptions } from './types';

const NONCE_ENTROPY_SIZE = 32;

/**
 * Sign a 32-byte digest.
 *
 * Nonces follow RFC 6979 with 32 bytes of extra entropy drawn from
 * `options.random`, so signature values differ between calls unless the
 * source is deterministic.
 *
 * @throws CryptoError INVALID_LENGTH if digest is not 32 bytes
 * @throws CryptoError SIGNING_FAILED on any curve library failure
 */
export function signDigest(
  digest: Uint8Array,
  privateKey: PrivateKey,
  options: SignOptions = {}
): RecoverableSignature {
  if (digest.length !== KECCAK256_SIZE) {
    throw new CryptoError('Invalid digest length', 'INVALID_LENGTH');
  }

  const entropy = drawRandomBytes(options.random ?? generateRandomBytes, NONCE_ENTROPY_SIZE);
  const secret = privateKey.toBytes();

  try {
    const signature = secp256k1.sign(digest, secret, { lowS: true, extraEntropy: entropy });
    if (!isRecoveryId(signature.recovery)) {
      throw new Error('unexpected recovery id');
    }

    return { compact: signature.toCompactRawBytes(), recoveryId: signature.recovery };
  } catch {
    throw new CryptoError('Signing failed', 'SIGNING_FAILED');
  } finally {
    clearAll(secret, entropy);
  }
}

/**
 * Sign keccak256(message).
 */
export function sign(
  message: string | Uint8Array,
  privateKey: PrivateKey,
  options: SignOptions = {}
): RecoverableSignature {
  return signDigest(hashMessage(message), privateKey, options);
}
