/**
 * Configured secp256k1 instance.
 *
 * Import the curve from here rather than from @noble/secp256k1 directly:
 * synchronous signing needs HMAC-SHA256 wired in for RFC 6979 nonces.
 */

import * as secp256k1Module from '@noble/secp256k1';
import { hmac } from '@noble/hashes/hmac';
import { sha256 } from '@noble/hashes/sha256';

secp256k1Module.etc.hmacSha256Sync = (key: Uint8Array, ...messages: Uint8Array[]) => {
  const h = hmac.create(sha256, key);
  messages.forEach((m) => h.update(m));
  return h.digest();
};

export const secp256k1 = secp256k1Module;
