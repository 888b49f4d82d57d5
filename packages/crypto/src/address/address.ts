/**
 * @ethkey/crypto - Address
 *
 * 20-byte account address: the last 20 bytes of keccak256(X || Y).
 */

import { CryptoError } from '../types';
import { ADDRESS_SIZE, KECCAK256_SIZE } from '../constants';
import { keccak256 } from '../hash/keccak';
import { bytesToHex, equalBytes, hexToBytes, isHexString, stripHexPrefix } from '../utils/encoding';
import type { PrivateKey } from '../keys/private-key';
import type { PublicKey } from '../keys/public-key';
import { checksumEncode } from './checksum';

export class Address {
  private readonly bytes: Uint8Array;

  private constructor(bytes: Uint8Array) {
    this.bytes = bytes;
  }

  /**
   * Derive the address of a public key.
   */
  static fromPublicKey(publicKey: PublicKey): Address {
    const digest = keccak256(publicKey.coordinates());
    return new Address(digest.slice(KECCAK256_SIZE - ADDRESS_SIZE));
  }

  /**
   * Derive the address of a private key via its public key.
   */
  static fromPrivateKey(privateKey: PrivateKey): Address {
    return Address.fromPublicKey(privateKey.derivePublicKey());
  }

  /**
   * Wrap 20 raw bytes. Only the length is checked; the bytes are not
   * traced back to any key.
   *
   * @throws CryptoError INVALID_LENGTH
   */
  static fromBytes(bytes: Uint8Array): Address {
    if (bytes.length !== ADDRESS_SIZE) {
      throw new CryptoError('Invalid address length', 'INVALID_LENGTH');
    }
    return new Address(Uint8Array.from(bytes));
  }

  /**
   * Parse a hex address, optionally 0x-prefixed.
   *
   * All-lowercase and all-uppercase input carries no checksum and is
   * accepted as-is. Mixed-case input must match its own checksum.
   *
   * @throws CryptoError INVALID_LENGTH | INVALID_ENCODING | INVALID_CHECKSUM
   */
  static fromHex(text: string): Address {
    const body = stripHexPrefix(text);

    if (body.length !== ADDRESS_SIZE * 2) {
      throw new CryptoError('Invalid address length', 'INVALID_LENGTH');
    }
    if (!isHexString(body)) {
      throw new CryptoError('Invalid address encoding', 'INVALID_ENCODING');
    }

    const lower = body.toLowerCase();
    const isMixedCase = body !== lower && body !== body.toUpperCase();
    if (isMixedCase && checksumEncode(lower) !== '0x' + body) {
      throw new CryptoError('Invalid address checksum', 'INVALID_CHECKSUM');
    }

    return new Address(hexToBytes(lower));
  }

  toBytes(): Uint8Array {
    return Uint8Array.from(this.bytes);
  }

  /**
   * "0x" + 40 lowercase hex characters.
   */
  toHex(): string {
    return '0x' + bytesToHex(this.bytes);
  }

  /**
   * "0x" + 40 hex characters cased by checksum.
   */
  toChecksumString(): string {
    return checksumEncode(bytesToHex(this.bytes));
  }

  equals(other: Address): boolean {
    return equalBytes(this.bytes, other.bytes);
  }

  toString(): string {
    return this.toChecksumString();
  }
}
