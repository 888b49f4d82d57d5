/**
 * @ethkey/crypto - secp256k1 Private Key
 *
 * A validated 32-byte big-endian scalar in [1, n-1].
 */

import { CryptoError, type KeyEncoding, type RandomSource } from '../types';
import {
  MAX_KEYGEN_ATTEMPTS,
  SECP256K1_CURVE_ORDER,
  SECP256K1_PRIVATE_KEY_SIZE,
} from '../constants';
import {
  bytesToBigInt,
  bytesToHex,
  equalBytes,
  hexToBytes,
  isHexString,
  stripHexPrefix,
} from '../utils/encoding';
import { clearBytes } from '../utils/memory';
import { drawRandomBytes, generateRandomBytes } from '../utils/random';
import { PublicKey } from './public-key';

function isValidScalar(bytes: Uint8Array): boolean {
  const value = bytesToBigInt(bytes);
  return value > 0n && value < SECP256K1_CURVE_ORDER;
}

/**
 * secp256k1 private key.
 *
 * Instances only come from the static factories, which reject anything
 * that is not a valid scalar. The key never renders its value through
 * `toString()` or `JSON.stringify`; use {@link PrivateKey.toHex} explicitly.
 */
export class PrivateKey implements KeyEncoding<PrivateKey> {
  private readonly bytes: Uint8Array;

  private constructor(bytes: Uint8Array) {
    this.bytes = bytes;
  }

  /**
   * Generate a private key from a secure random source.
   *
   * Draws 32 bytes until they form a valid scalar. Rejected candidates
   * are zeroed.
   *
   * @param random - Randomness provider (defaults to Web Crypto)
   * @throws CryptoError RANDOM_GENERATION_FAILED if no valid scalar is drawn
   *   within MAX_KEYGEN_ATTEMPTS
   */
  static random(random: RandomSource = generateRandomBytes): PrivateKey {
    for (let attempt = 0; attempt < MAX_KEYGEN_ATTEMPTS; attempt++) {
      const candidate = drawRandomBytes(random, SECP256K1_PRIVATE_KEY_SIZE);
      if (isValidScalar(candidate)) {
        return new PrivateKey(Uint8Array.from(candidate));
      }
      clearBytes(candidate);
    }

    throw new CryptoError('Random source produced no valid key', 'RANDOM_GENERATION_FAILED');
  }

  /**
   * Create a private key from 32 raw bytes.
   *
   * @throws CryptoError INVALID_LENGTH | INVALID_SCALAR
   */
  static fromBytes(bytes: Uint8Array): PrivateKey {
    if (bytes.length !== SECP256K1_PRIVATE_KEY_SIZE) {
      throw new CryptoError('Invalid private key length', 'INVALID_LENGTH');
    }
    if (!isValidScalar(bytes)) {
      throw new CryptoError('Invalid private key', 'INVALID_SCALAR');
    }

    return new PrivateKey(Uint8Array.from(bytes));
  }

  /**
   * Create a private key from 64 hex characters, optionally 0x-prefixed.
   *
   * @throws CryptoError INVALID_LENGTH | INVALID_ENCODING | INVALID_SCALAR
   */
  static fromHex(hex: string): PrivateKey {
    const cleanHex = stripHexPrefix(hex);

    if (cleanHex.length !== SECP256K1_PRIVATE_KEY_SIZE * 2) {
      throw new CryptoError('Invalid private key length', 'INVALID_LENGTH');
    }
    if (!isHexString(cleanHex)) {
      throw new CryptoError('Invalid private key encoding', 'INVALID_ENCODING');
    }

    const bytes = hexToBytes(cleanHex);
    try {
      return PrivateKey.fromBytes(bytes);
    } finally {
      clearBytes(bytes);
    }
  }

  toBytes(): Uint8Array {
    return Uint8Array.from(this.bytes);
  }

  toHex(): string {
    return bytesToHex(this.bytes);
  }

  /**
   * Derive the public key (k * G). Deterministic.
   */
  derivePublicKey(): PublicKey {
    return PublicKey.fromPrivate(this);
  }

  equals(other: PrivateKey): boolean {
    return equalBytes(this.bytes, other.bytes);
  }

  toString(): string {
    return 'PrivateKey(<redacted>)';
  }

  toJSON(): string {
    return this.toString();
  }
}
