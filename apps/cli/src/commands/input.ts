import { hexToBytes } from '@ethkey/crypto';

/**
 * Command input: hex when `hex` is set, otherwise the UTF-8 text itself.
 */
export function decodeData(data: string, hex: boolean): string | Uint8Array {
  return hex ? hexToBytes(data) : data;
}

export function prefixHex(hex: string): string {
  return '0x' + hex;
}
