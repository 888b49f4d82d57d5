/**
 * @ethkey/crypto - Random Generation Utilities
 *
 * Cryptographically secure random number generation using Web Crypto API.
 */

import { CryptoError, type RandomSource } from '../types';

/**
 * Generate cryptographically secure random bytes.
 *
 * This is the default {@link RandomSource} for key generation and signing.
 *
 * @param length - Number of bytes to generate
 * @returns Random bytes
 * @throws CryptoError if crypto.getRandomValues is unavailable
 */
export function generateRandomBytes(length: number): Uint8Array {
  if (typeof crypto === 'undefined' || typeof crypto.getRandomValues !== 'function') {
    throw new CryptoError('Secure random generation unavailable', 'RANDOM_GENERATION_FAILED');
  }

  const bytes = new Uint8Array(length);
  crypto.getRandomValues(bytes);
  return bytes;
}

/**
 * Draw bytes from a caller-supplied source and check it honoured the length.
 *
 * @throws CryptoError if the source returns the wrong number of bytes
 */
export function drawRandomBytes(random: RandomSource, length: number): Uint8Array {
  const bytes = random(length);
  if (!(bytes instanceof Uint8Array) || bytes.length !== length) {
    throw new CryptoError('Random source returned wrong length', 'RANDOM_GENERATION_FAILED');
  }
  return bytes;
}
