import { bytesToHex, keccak256, keccak512 } from '@ethkey/crypto';
import { decodeData, prefixHex } from './input';

export type HashBits = 256 | 512;

export interface HashOptions {
  hex?: boolean;
  bits?: HashBits;
}

export interface HashResult {
  algorithm: string;
  digest: string;
}

export function runHash(data: string, options: HashOptions = {}): HashResult {
  const bits = options.bits ?? 256;
  const input = decodeData(data, options.hex ?? false);
  const bytes = typeof input === 'string' ? new TextEncoder().encode(input) : input;
  const digest = bits === 512 ? keccak512(bytes) : keccak256(bytes);

  return { algorithm: `keccak${bits}`, digest: prefixHex(bytesToHex(digest)) };
}

export function formatHash(result: HashResult): string {
  return result.digest;
}
