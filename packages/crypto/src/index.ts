/**
 * @ethkey/crypto
 *
 * secp256k1 account identity: key material, addresses with checksum
 * encoding, Keccak hashing, and recoverable ECDSA signatures.
 *
 * Security principles:
 * - All curve and hash operations use audited libraries (@noble/*)
 * - Keys are validated at construction and immutable afterwards
 * - Private keys never render their value through toString/JSON
 * - Error messages are fixed strings and never echo key material
 *
 * @example
 * ```typescript
 * import { PrivateKey, addressFromPrivateKey, sign, ecrecover, hashMessage } from '@ethkey/crypto';
 *
 * const key = PrivateKey.random();
 * const address = addressFromPrivateKey(key).toChecksumString();
 *
 * const message = new TextEncoder().encode('hello world');
 * const signature = sign(message, key);
 *
 * // ecrecover takes the digest, not the message
 * const signer = ecrecover(hashMessage(message), signature.compact, signature.recoveryId);
 * signer.equals(key.derivePublicKey()); // true
 * ```
 */

export const CRYPTO_VERSION = '0.1.0';

// Keccak hashing
export { keccak256, keccak512, keccak256Hex, hashMessage } from './hash';

// Key material
export { PrivateKey, PublicKey } from './keys';

// Addresses and checksum encoding
export {
  Address,
  addressFromPublicKey,
  addressFromPrivateKey,
  toChecksumString,
  isValidChecksumAddress,
} from './address';

// Recoverable ECDSA
export {
  sign,
  signDigest,
  verify,
  verifyDigest,
  ecrecover,
  recoverFromMessage,
  isRecoveryId,
  type RecoverableSignature,
  type RecoveryId,
  type SignOptions,
} from './signer';

// Utility functions (only safe public utilities)
export { hexToBytes, bytesToHex, clearBytes, generateRandomBytes } from './utils';

// Types
export { CryptoError, type CryptoErrorCode, type RandomSource, type KeyEncoding } from './types';

// Constants
export {
  SECP256K1_PRIVATE_KEY_SIZE,
  SECP256K1_PUBLIC_KEY_SIZE,
  SECP256K1_CURVE_ORDER,
  KECCAK256_SIZE,
  KECCAK512_SIZE,
  ADDRESS_SIZE,
  CHECKSUM_ADDRESS_LENGTH,
  COMPACT_SIGNATURE_SIZE,
  MAX_RECOVERY_ID,
} from './constants';
