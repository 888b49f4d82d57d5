/**
 * @ethkey/crypto - Keccak Hashing
 *
 * Legacy Keccak (original submission padding, 0x01), not NIST SHA3 (0x06).
 * This is the variant used for addresses and message digests.
 */

import { keccak_256, keccak_512 } from '@noble/hashes/sha3';
import { bytesToHex } from '../utils/encoding';

/**
 * Compute the Keccak-256 digest of arbitrary bytes.
 *
 * @returns 32-byte digest
 */
export function keccak256(data: Uint8Array): Uint8Array {
  return keccak_256(data);
}

/**
 * Compute the Keccak-512 digest of arbitrary bytes.
 *
 * @returns 64-byte digest
 */
export function keccak512(data: Uint8Array): Uint8Array {
  return keccak_512(data);
}

/**
 * Keccak-256 as a 64-character lowercase hex string (no prefix).
 */
export function keccak256Hex(data: Uint8Array): string {
  return bytesToHex(keccak_256(data));
}

/**
 * Digest a message the way `sign` and `verify` do internally.
 *
 * Strings are encoded as UTF-8 first. Use the result as the `digest`
 * argument of `ecrecover`, `signDigest` or `verifyDigest`.
 *
 * @returns 32-byte digest
 */
export function hashMessage(message: string | Uint8Array): Uint8Array {
  const bytes = typeof message === 'string' ? new TextEncoder().encode(message) : message;
  return keccak_256(bytes);
}
