/**
 * @ethkey/crypto - Checksum Address Encoding
 *
 * Mixed-case checksum rendering (EIP-55). The hash input is the ASCII
 * text of the lowercase hex address, not the 20 raw address bytes.
 */

import { ADDRESS_SIZE } from '../constants';
import { keccak256Hex } from '../hash/keccak';
import { isHexString } from '../utils/encoding';
import type { Address } from './address';

const ADDRESS_HEX_LENGTH = ADDRESS_SIZE * 2;

/**
 * Apply checksum casing to 40 lowercase hex characters.
 *
 * @param lowerHex - Address hex, lowercase, no prefix
 * @returns "0x" + 40 mixed-case hex characters
 */
export function checksumEncode(lowerHex: string): string {
  const hash = keccak256Hex(new TextEncoder().encode(lowerHex));

  let checksummed = '0x';
  for (let i = 0; i < lowerHex.length; i++) {
    // Nibble above 7 means the high bit is set
    checksummed += parseInt(hash[i], 16) > 7 ? lowerHex[i].toUpperCase() : lowerHex[i];
  }
  return checksummed;
}

/**
 * Render an address as its 42-character checksum string.
 */
export function toChecksumString(address: Address): string {
  return checksumEncode(address.toHex().slice(2));
}

/**
 * Check that a string is "0x" + 40 hex characters whose letter case
 * matches the checksum exactly.
 */
export function isValidChecksumAddress(text: string): boolean {
  if (!text.startsWith('0x')) {
    return false;
  }

  const body = text.slice(2);
  if (body.length !== ADDRESS_HEX_LENGTH || !isHexString(body)) {
    return false;
  }

  return checksumEncode(body.toLowerCase()) === text;
}
