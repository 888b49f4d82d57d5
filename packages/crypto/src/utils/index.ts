/**
 * @ethkey/crypto - Utilities
 *
 * Re-exports for encoding, memory, and random utilities.
 */

export {
  hexToBytes,
  bytesToHex,
  bytesToBigInt,
  stripHexPrefix,
  isHexString,
  equalBytes,
} from './encoding';
export { clearBytes, clearAll } from './memory';
export { generateRandomBytes, drawRandomBytes } from './random';
