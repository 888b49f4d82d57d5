/**
 * @ethkey/crypto - Addresses
 *
 * Address derivation and checksum encoding.
 */

export { Address } from './address';
export { addressFromPublicKey, addressFromPrivateKey } from './derive';
export { toChecksumString, isValidChecksumAddress, checksumEncode } from './checksum';
