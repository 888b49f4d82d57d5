/**
 * @ethkey/crypto - Constants
 *
 * Curve parameters and encoded sizes.
 */

import { CURVE } from '@noble/secp256k1';

/** secp256k1 private key size in bytes */
export const SECP256K1_PRIVATE_KEY_SIZE = 32;

/** secp256k1 uncompressed public key size in bytes (04 prefix + x + y coordinates) */
export const SECP256K1_PUBLIC_KEY_SIZE = 65;

/** Leading format byte of an uncompressed SEC1 point */
export const SECP256K1_UNCOMPRESSED_PREFIX = 0x04;

/** secp256k1 group order n */
export const SECP256K1_CURVE_ORDER: bigint = CURVE.n;

/** Keccak-256 digest size in bytes */
export const KECCAK256_SIZE = 32;

/** Keccak-512 digest size in bytes */
export const KECCAK512_SIZE = 64;

/** Address size in bytes (last 20 bytes of keccak256(x || y)) */
export const ADDRESS_SIZE = 20;

/** Checksum address string length ("0x" + 40 hex chars) */
export const CHECKSUM_ADDRESS_LENGTH = 2 + ADDRESS_SIZE * 2;

/** Compact signature size in bytes (r || s) */
export const COMPACT_SIGNATURE_SIZE = 64;

/** Largest valid recovery id */
export const MAX_RECOVERY_ID = 3;

/** Upper bound on draws when generating a private key from a random source */
export const MAX_KEYGEN_ATTEMPTS = 1000;
