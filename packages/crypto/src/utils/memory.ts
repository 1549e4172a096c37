/**
 * @journal-vault/crypto - Memory Utilities
 *
 * Zeroing of key material once it is no longer needed.
 *
 * Overwriting a buffer does not remove copies the engine may have made
 * (Web Crypto key imports, V8 internals, moved heap pages). Session keys
 * are zeroed anyway so a closed codec holds nothing usable.
 */

/**
 * Overwrite a buffer with zeros (null-safe).
 */
export function clearBytes(data: Uint8Array | null): void {
  if (data) {
    data.fill(0);
  }
}

export function clearAll(...buffers: (Uint8Array | null)[]): void {
  for (const buffer of buffers) {
    clearBytes(buffer);
  }
}
