import { describe, it, expect } from 'vitest';
import { CryptoError, PrivateKey } from '@ethkey/crypto';
import {
  runKeygen,
  formatKeygen,
  runAddress,
  runHash,
  runSign,
  runVerify,
  formatVerify,
  runRecover,
  runChecksum,
} from '../commands';

const TEST_KEY = '0x4c0883a69102937d6231471b5dbb6204fe5129617082792ae468d01a3f362318';
const TEST_ADDRESS = '0x2c7536E3605D9C16a7a3D7b1898e529396a65c23';
const TEST_PUBLIC_KEY = '0x' + PrivateKey.fromHex(TEST_KEY).derivePublicKey().toHex();
const ONES_KEY = '0x' + '01'.repeat(32);
const ONES_PUBLIC_KEY =
  '0x041b84c5567b126440995d3ed5aaba0565d71e1834604819ff9c17f5e9d5dd078f' +
  '70beaf8f588b541507fed6a642c5ab42dfdf8120a7f639de5122d47a69a8e8d1';
const ONES_ADDRESS = '0x1a642f0E3c3aF545E7AcBD38b07251B3990914F1';

const fill = (byte: number) => (length: number) => new Uint8Array(length).fill(byte);

describe('runKeygen', () => {
  it('derives public key and address from the generated key', () => {
    const result = runKeygen(fill(1));

    expect(result).toEqual({
      privateKey: ONES_KEY,
      publicKey: ONES_PUBLIC_KEY,
      address: ONES_ADDRESS,
    });
  });

  it('formats one field per line', () => {
    expect(formatKeygen(runKeygen(fill(1))).split('\n')).toEqual([
      `Private key: ${ONES_KEY}`,
      `Public key:  ${ONES_PUBLIC_KEY}`,
      `Address:     ${ONES_ADDRESS}`,
    ]);
  });
});

describe('runAddress', () => {
  it('derives from a private key', () => {
    expect(runAddress(TEST_KEY)).toEqual({ address: TEST_ADDRESS });
  });

  it('derives from a public key with --public', () => {
    expect(runAddress(ONES_PUBLIC_KEY, { public: true })).toEqual({ address: ONES_ADDRESS });
  });

  it('rejects a public key passed as a private key', () => {
    expect(() => runAddress(ONES_PUBLIC_KEY)).toThrow(CryptoError);
  });
});

describe('runHash', () => {
  it('hashes text with keccak256 by default', () => {
    expect(runHash('')).toEqual({
      algorithm: 'keccak256',
      digest: '0xc5d2460186f7233c927e7db2dcc703c0e500b653ca82273b7bfad8045d85a470',
    });
  });

  it('decodes hex input', () => {
    expect(runHash('0x616263', { hex: true }).digest).toBe(
      '0x4e03657aea45a94fc7d47ba826c8d667c0d1e6e33a64a036ec44f58fa12d6c45'
    );
    expect(runHash('abc').digest).toBe(runHash('616263', { hex: true }).digest);
  });

  it('supports keccak512', () => {
    expect(runHash('', { bits: 512 })).toEqual({
      algorithm: 'keccak512',
      digest:
        '0x0eab42de4c3ceb9235fc91acffe746b29c29a8c366b7c60e4e67c466f36a4304' +
        'c00fa9caf9d87976ba469bcbe06713b435f091ef2769fb160cdab33d3670680e',
    });
  });
});

describe('sign, verify and recover', () => {
  const message = 'pay 5 to carol';

  it('round-trips through verify and recover', () => {
    const signed = runSign(message, { key: TEST_KEY });

    expect(signed.address).toBe(TEST_ADDRESS);
    expect(runVerify(message, signed.signature, TEST_PUBLIC_KEY)).toEqual({ valid: true });
    expect(runRecover(signed.digest, signed.signature, signed.recoveryId)).toEqual({
      publicKey: TEST_PUBLIC_KEY,
      address: TEST_ADDRESS,
    });
  });

  it('reports the keccak256 digest of the message', () => {
    expect(runSign('', { key: TEST_KEY }).digest).toBe(
      '0xc5d2460186f7233c927e7db2dcc703c0e500b653ca82273b7bfad8045d85a470'
    );
  });

  it('is reproducible with a fixed random source', () => {
    const a = runSign(message, { key: TEST_KEY, random: fill(5) });
    const b = runSign(message, { key: TEST_KEY, random: fill(5) });

    expect(a).toEqual(b);
  });

  it('reports invalid for a different message', () => {
    const signed = runSign(message, { key: TEST_KEY });
    const result = runVerify('pay 50 to carol', signed.signature, TEST_PUBLIC_KEY);

    expect(result).toEqual({ valid: false });
    expect(formatVerify(result)).toBe('invalid');
  });

  it('signs hex input as raw bytes', () => {
    const fromText = runSign('abc', { key: TEST_KEY, random: fill(5) });
    const fromHex = runSign('616263', { key: TEST_KEY, hex: true, random: fill(5) });

    expect(fromHex.signature).toBe(fromText.signature);
  });

  it('rejects a malformed key', () => {
    expect(() => runSign(message, { key: '0x1234' })).toThrow(
      expect.objectContaining({ code: 'INVALID_LENGTH' })
    );
  });

  it('rejects an out-of-range recovery id', () => {
    const signed = runSign(message, { key: TEST_KEY });

    expect(() => runRecover(signed.digest, signed.signature, 7)).toThrow(
      expect.objectContaining({ code: 'INVALID_RECOVERY_ID' })
    );
  });
});

describe('runChecksum', () => {
  it('renders lowercase input in checksum form', () => {
    expect(runChecksum(TEST_ADDRESS.toLowerCase())).toEqual({ address: TEST_ADDRESS });
  });

  it('rejects mixed case with a bad checksum', () => {
    const flipped = TEST_ADDRESS.replace('E', 'e');

    expect(() => runChecksum(flipped)).toThrow(
      expect.objectContaining({ code: 'INVALID_CHECKSUM' })
    );
  });
});
