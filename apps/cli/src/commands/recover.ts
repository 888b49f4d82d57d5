import { addressFromPublicKey, ecrecover, hexToBytes } from '@ethkey/crypto';
import { prefixHex } from './input';

export interface RecoverResult {
  publicKey: string;
  address: string;
}

/**
 * Recover the signer from a digest. The digest is used as given and is
 * not hashed again.
 */
export function runRecover(digest: string, signature: string, recoveryId: number): RecoverResult {
  const publicKey = ecrecover(hexToBytes(digest), hexToBytes(signature), recoveryId);

  return {
    publicKey: prefixHex(publicKey.toHex()),
    address: addressFromPublicKey(publicKey).toChecksumString(),
  };
}

export function formatRecover(result: RecoverResult): string {
  return [`Public key: ${result.publicKey}`, `Address:    ${result.address}`].join('\n');
}
