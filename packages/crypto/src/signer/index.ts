/**
 * @ethkey/crypto - Signer
 *
 * Recoverable ECDSA over secp256k1.
 *
 * | Hashes its input          | Takes a 32-byte digest |
 * |---------------------------|------------------------|
 * | sign                      | signDigest             |
 * | verify                    | verifyDigest           |
 * | recoverFromMessage        | ecrecover              |
 */

export { sign, signDigest } from './sign';
export { verify, verifyDigest } from './verify';
export { ecrecover, recoverFromMessage, isRecoveryId } from './recover';
export type { RecoverableSignature, RecoveryId, SignOptions } from './types';
