import { PublicKey, hexToBytes, verify } from '@ethkey/crypto';
import { decodeData } from './input';

export interface VerifyOptions {
  hex?: boolean;
}

export interface VerifyResult {
  valid: boolean;
}

export function runVerify(
  message: string,
  signature: string,
  publicKey: string,
  options: VerifyOptions = {}
): VerifyResult {
  const valid = verify(
    decodeData(message, options.hex ?? false),
    hexToBytes(signature),
    PublicKey.fromHex(publicKey)
  );

  return { valid };
}

export function formatVerify(result: VerifyResult): string {
  return result.valid ? 'valid' : 'invalid';
}
