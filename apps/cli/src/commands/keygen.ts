import { PrivateKey, addressFromPrivateKey, generateRandomBytes, type RandomSource } from '@ethkey/crypto';
import { prefixHex } from './input';

export interface KeygenResult {
  privateKey: string;
  publicKey: string;
  address: string;
}

export function runKeygen(random: RandomSource = generateRandomBytes): KeygenResult {
  const key = PrivateKey.random(random);

  return {
    privateKey: prefixHex(key.toHex()),
    publicKey: prefixHex(key.derivePublicKey().toHex()),
    address: addressFromPrivateKey(key).toChecksumString(),
  };
}

export function formatKeygen(result: KeygenResult): string {
  return [
    `Private key: ${result.privateKey}`,
    `Public key:  ${result.publicKey}`,
    `Address:     ${result.address}`,
  ].join('\n');
}
