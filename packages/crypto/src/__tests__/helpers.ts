/**
 * Shared test helpers.
 */

import { expect } from 'vitest';
import { CryptoError, type CryptoErrorCode, type RandomSource } from '../types';

/**
 * Assert that fn throws a CryptoError carrying the given code.
 */
export function expectCryptoError(fn: () => unknown, code: CryptoErrorCode): void {
  try {
    fn();
    expect.unreachable('Should have thrown');
  } catch (err) {
    expect(err).toBeInstanceOf(CryptoError);
    expect(err).toMatchObject({ code });
  }
}

/**
 * Deterministic random source: every draw is filled with the same byte.
 */
export function constantRandom(fill: number): RandomSource {
  return (length) => new Uint8Array(length).fill(fill);
}

/**
 * Random source replaying the given buffers in order.
 */
export function sequenceRandom(...draws: Uint8Array[]): RandomSource & { calls: number } {
  const source = Object.assign(
    (length: number): Uint8Array => {
      const next = draws[source.calls++];
      if (!next || next.length !== length) {
        throw new Error(`unexpected draw #${source.calls} of ${length} bytes`);
      }
      return next;
    },
    { calls: 0 }
  );
  return source;
}

/** Private key from the account examples used throughout these tests */
export const TEST_PRIVATE_KEY_HEX =
  '4c0883a69102937d6231471b5dbb6204fe5129617082792ae468d01a3f362318';

/** Address of TEST_PRIVATE_KEY_HEX in checksum form */
export const TEST_CHECKSUM_ADDRESS = '0x2c7536E3605D9C16a7a3D7b1898e529396a65c23';

/** secp256k1 generator point, i.e. the public key of private key 1 */
export const GENERATOR_PUBLIC_KEY_HEX =
  '04' +
  '79be667ef9dcbbac55a06295ce870b07029bfcdb2dce28d959f2815b16f81798' +
  '483ada7726a3c4655da4fbfc0e1108a8fd17b448a68554199c47d08ffb10d4b8';

/** Curve order n as 32 bytes of hex */
export const CURVE_ORDER_HEX = 'fffffffffffffffffffffffffffffffebaaedce6af48a03bbfd25e8cd0364141';
