/**
 * @ethkey/crypto - Encoding Tests
 */

import { describe, it, expect } from 'vitest';
import {
  hexToBytes,
  bytesToHex,
  bytesToBigInt,
  equalBytes,
  stripHexPrefix,
  isHexString,
} from '../utils';

describe('hexToBytes', () => {
  it('decodes with and without 0x prefix', () => {
    expect(hexToBytes('0x00ff10')).toEqual(new Uint8Array([0x00, 0xff, 0x10]));
    expect(hexToBytes('00FF10')).toEqual(new Uint8Array([0x00, 0xff, 0x10]));
  });

  it('rejects odd length', () => {
    expect(() => hexToBytes('abc')).toThrow('Invalid hex string: odd length');
  });

  it('rejects non-hex characters, including a trailing one in a pair', () => {
    expect(() => hexToBytes('0g')).toThrow('Invalid hex string: non-hex character');
    expect(() => hexToBytes('zz')).toThrow('Invalid hex string: non-hex character');
  });
});

describe('bytesToHex', () => {
  it('encodes lowercase without prefix', () => {
    expect(bytesToHex(new Uint8Array([0x0a, 0xbc, 0xff]))).toBe('0abcff');
  });
});

describe('bytesToBigInt', () => {
  it('reads big-endian', () => {
    expect(bytesToBigInt(new Uint8Array([0x01, 0x00]))).toBe(256n);
    expect(bytesToBigInt(new Uint8Array(0))).toBe(0n);
  });
});

describe('equalBytes', () => {
  it('compares content and length', () => {
    expect(equalBytes(new Uint8Array([1, 2]), new Uint8Array([1, 2]))).toBe(true);
    expect(equalBytes(new Uint8Array([1, 2]), new Uint8Array([1, 3]))).toBe(false);
    expect(equalBytes(new Uint8Array([1, 2]), new Uint8Array([1, 2, 0]))).toBe(false);
  });
});

describe('stripHexPrefix / isHexString', () => {
  it('strips only a leading 0x', () => {
    expect(stripHexPrefix('0xabc')).toBe('abc');
    expect(stripHexPrefix('abc0x')).toBe('abc0x');
  });

  it('accepts both cases and the empty string', () => {
    expect(isHexString('aBcD09')).toBe(true);
    expect(isHexString('')).toBe(true);
    expect(isHexString('0x12')).toBe(false);
  });
});
