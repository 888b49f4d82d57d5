/**
 * @ethkey/crypto - Memory Utilities
 *
 * Best-effort memory clearing for sensitive data.
 *
 * JavaScript does not guarantee memory clearing: the garbage collector
 * owns deallocation and copies may survive in engine internals.
 */

/**
 * Overwrite a buffer with zeros (null-safe).
 */
export function clearBytes(data: Uint8Array | null): void {
  if (data) {
    data.fill(0);
  }
}

/**
 * Clear multiple buffers at once.
 */
export function clearAll(...buffers: (Uint8Array | null)[]): void {
  for (const buffer of buffers) {
    clearBytes(buffer);
  }
}
