import { Address } from '@ethkey/crypto';

export interface ChecksumResult {
  address: string;
}

/**
 * Normalise an address to its checksum form. Mixed-case input must
 * already carry a valid checksum.
 */
export function runChecksum(address: string): ChecksumResult {
  return { address: Address.fromHex(address).toChecksumString() };
}

export function formatChecksum(result: ChecksumResult): string {
  return result.address;
}
