import {
  PrivateKey,
  addressFromPrivateKey,
  bytesToHex,
  generateRandomBytes,
  hashMessage,
  signDigest,
  type RandomSource,
} from '@ethkey/crypto';
import { decodeData, prefixHex } from './input';

export interface SignOptions {
  /** Private key hex */
  key: string;
  hex?: boolean;
  random?: RandomSource;
}

export interface SignResult {
  signature: string;
  recoveryId: number;
  digest: string;
  address: string;
}

/**
 * Sign keccak256 of the message. The digest is returned so it can be
 * passed straight to `recover`.
 */
export function runSign(message: string, options: SignOptions): SignResult {
  const key = PrivateKey.fromHex(options.key);
  const digest = hashMessage(decodeData(message, options.hex ?? false));
  const { compact, recoveryId } = signDigest(digest, key, {
    random: options.random ?? generateRandomBytes,
  });

  return {
    signature: prefixHex(bytesToHex(compact)),
    recoveryId,
    digest: prefixHex(bytesToHex(digest)),
    address: addressFromPrivateKey(key).toChecksumString(),
  };
}

export function formatSign(result: SignResult): string {
  return [
    `Signature:   ${result.signature}`,
    `Recovery id: ${result.recoveryId}`,
    `Digest:      ${result.digest}`,
    `Signer:      ${result.address}`,
  ].join('\n');
}
