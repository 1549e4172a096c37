/**
 * @journal-vault/crypto - Random Generation Utilities
 *
 * Cryptographically secure random number generation using Web Crypto API.
 */

import { CipherError } from '../types';

/** crypto.getRandomValues refuses requests above this size */
const MAX_RANDOM_CHUNK = 65536;

/**
 * Generate cryptographically secure random bytes.
 *
 * @param length - Number of bytes to generate
 * @returns Random bytes
 * @throws CipherError if crypto.getRandomValues is unavailable
 */
export function generateRandomBytes(length: number): Uint8Array {
  if (typeof crypto === 'undefined' || typeof crypto.getRandomValues !== 'function') {
    throw new CipherError('Secure random generation unavailable', 'RANDOM_GENERATION_FAILED');
  }

  const bytes = new Uint8Array(length);
  for (let offset = 0; offset < length; offset += MAX_RANDOM_CHUNK) {
    crypto.getRandomValues(bytes.subarray(offset, Math.min(offset + MAX_RANDOM_CHUNK, length)));
  }
  return bytes;
}

/**
 * Generate a fresh random salt for the password KDF.
 *
 * Generated once per deployment and persisted; see salt/load.ts.
 */
export function generateSalt(length: number): Uint8Array {
  return generateRandomBytes(length);
}

/**
 * Generate a random IV.
 *
 * Every encryption draws a new one. NEVER reuse an IV with the same key.
 */
export function generateIv(size: number): Uint8Array {
  return generateRandomBytes(size);
}
