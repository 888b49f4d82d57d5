/**
 * @ethkey/crypto - Type Definitions
 *
 * Error type and shared capabilities.
 */

/**
 * Error codes for categorized error handling.
 */
export type CryptoErrorCode =
  | 'INVALID_LENGTH'
  | 'INVALID_ENCODING'
  | 'INVALID_SCALAR'
  | 'INVALID_POINT'
  | 'INVALID_CHECKSUM'
  | 'INVALID_SIGNATURE'
  | 'INVALID_RECOVERY_ID'
  | 'RECOVERY_FAILED'
  | 'SIGNING_FAILED'
  | 'RANDOM_GENERATION_FAILED';

/**
 * Custom error class for cryptographic operations.
 * Messages are fixed strings and never carry key material.
 */
export class CryptoError extends Error {
  readonly code: CryptoErrorCode;

  constructor(message: string, code: CryptoErrorCode) {
    super(message);
    this.name = 'CryptoError';
    this.code = code;

    // Maintain proper stack trace for V8 (Node.js-specific)
    const ErrorWithCapture = Error as typeof Error & {
      captureStackTrace?: (target: object, constructor: unknown) => void;
    };
    if (ErrorWithCapture.captureStackTrace) {
      ErrorWithCapture.captureStackTrace(this, CryptoError);
    }
  }
}

/**
 * Source of cryptographically secure random bytes.
 *
 * Passed explicitly to key generation and signing so tests can
 * substitute a deterministic source.
 */
export type RandomSource = (length: number) => Uint8Array;

/**
 * Byte and hex projections shared by the key types.
 */
export interface KeyEncoding<T> {
  /** Copy of the encoded bytes */
  toBytes(): Uint8Array;
  /** Lowercase hex, no prefix */
  toHex(): string;
  equals(other: T): boolean;
}
