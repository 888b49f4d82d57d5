/**
 * @ethkey/crypto - secp256k1 Public Key
 *
 * Uncompressed SEC1 point: 0x04 || X (32 bytes) || Y (32 bytes).
 */

import { ProjectivePoint, getPublicKey } from '@noble/secp256k1';
import { CryptoError, type KeyEncoding } from '../types';
import { SECP256K1_PUBLIC_KEY_SIZE, SECP256K1_UNCOMPRESSED_PREFIX } from '../constants';
import { bytesToHex, equalBytes, hexToBytes, isHexString, stripHexPrefix } from '../utils/encoding';
import { clearBytes } from '../utils/memory';
import type { PrivateKey } from './private-key';

function isOnCurve(bytes: Uint8Array): boolean {
  try {
    ProjectivePoint.fromHex(bytes);
    return true;
  } catch {
    return false;
  }
}

/**
 * secp256k1 public key, always validated to lie on the curve.
 */
export class PublicKey implements KeyEncoding<PublicKey> {
  private readonly bytes: Uint8Array;

  private constructor(bytes: Uint8Array) {
    this.bytes = bytes;
  }

  /**
   * Derive the public key of a private key (scalar multiplication by G).
   */
  static fromPrivate(privateKey: PrivateKey): PublicKey {
    const secret = privateKey.toBytes();
    try {
      return new PublicKey(getPublicKey(secret, false));
    } finally {
      clearBytes(secret);
    }
  }

  /**
   * Create a public key from 65 uncompressed bytes.
   *
   * @throws CryptoError INVALID_LENGTH | INVALID_POINT
   */
  static fromBytes(bytes: Uint8Array): PublicKey {
    if (bytes.length !== SECP256K1_PUBLIC_KEY_SIZE) {
      throw new CryptoError('Invalid public key length', 'INVALID_LENGTH');
    }
    if (bytes[0] !== SECP256K1_UNCOMPRESSED_PREFIX || !isOnCurve(bytes)) {
      throw new CryptoError('Invalid public key', 'INVALID_POINT');
    }

    return new PublicKey(Uint8Array.from(bytes));
  }

  /**
   * Create a public key from 130 hex characters, optionally 0x-prefixed.
   *
   * @throws CryptoError INVALID_LENGTH | INVALID_ENCODING | INVALID_POINT
   */
  static fromHex(hex: string): PublicKey {
    const cleanHex = stripHexPrefix(hex);

    if (cleanHex.length !== SECP256K1_PUBLIC_KEY_SIZE * 2) {
      throw new CryptoError('Invalid public key length', 'INVALID_LENGTH');
    }
    if (!isHexString(cleanHex)) {
      throw new CryptoError('Invalid public key encoding', 'INVALID_ENCODING');
    }

    return PublicKey.fromBytes(hexToBytes(cleanHex));
  }

  toBytes(): Uint8Array {
    return Uint8Array.from(this.bytes);
  }

  toHex(): string {
    return bytesToHex(this.bytes);
  }

  /**
   * X || Y without the format byte (64 bytes).
   */
  coordinates(): Uint8Array {
    return this.bytes.slice(1);
  }

  equals(other: PublicKey): boolean {
    return equalBytes(this.bytes, other.bytes);
  }

  toString(): string {
    return this.toHex();
  }
}
