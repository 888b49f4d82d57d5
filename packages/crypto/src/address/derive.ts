/**
 * @ethkey/crypto - Address Derivation
 */

import type { PrivateKey } from '../keys/private-key';
import type { PublicKey } from '../keys/public-key';
import { Address } from './address';

/**
 * Drop the 0x04 format byte, keccak256 the 64-byte X || Y, keep the
 * last 20 bytes.
 */
export function addressFromPublicKey(publicKey: PublicKey): Address {
  return Address.fromPublicKey(publicKey);
}

export function addressFromPrivateKey(privateKey: PrivateKey): Address {
  return Address.fromPrivateKey(privateKey);
}
