/**
 * @journal-vault/crypto - PBKDF2 Key Derivation
 *
 * Password-based derivation of the session master key using Web Crypto API.
 * Deliberately expensive: the iteration count is what makes guessing
 * passwords against stolen entries costly.
 */

import { CipherError, ConfigurationError, type DigestAlgorithm } from '../types';
import { DIGEST_SIZES, parseDigest } from '../digest';

/**
 * Parameters for a one-shot master key derivation.
 */
export type DeriveMasterKeyParams = {
  password: string;
  salt: Uint8Array;
  iterations: number;
  /** PBKDF2 hash (defaults to SHA-256) */
  hash?: DigestAlgorithm;
  /** Output length in bytes (defaults to the hash digest size) */
  outputLength?: number;
};

/**
 * A configured password KDF.
 */
export interface KdfEngine {
  readonly hash: DigestAlgorithm;
  readonly iterations: number;
  /** Digest size of the hash in bytes; the default output length */
  readonly digestSize: number;
  derive(password: string, salt: Uint8Array, outputLength?: number): Promise<Uint8Array>;
}

/**
 * Derive a master key with PBKDF2.
 *
 * Identical inputs always yield identical bytes.
 *
 * @throws CipherError for an empty password or salt, or if derivation fails
 * @throws ConfigurationError for a non-positive iteration count or output length
 *
 * @example
 * ```typescript
 * const masterKey = await deriveMasterKey({
 *   password: 'correct horse',
 *   salt,
 *   iterations: 64000,
 *   hash: 'SHA-512',
 * });
 * ```
 */
export async function deriveMasterKey(params: DeriveMasterKeyParams): Promise<Uint8Array> {
  const { password, salt, iterations, hash = 'SHA-256' } = params;
  const outputLength = params.outputLength ?? DIGEST_SIZES[hash];

  if (!Number.isInteger(iterations) || iterations <= 0) {
    throw new ConfigurationError('KDF iterations must be a positive integer', 'INVALID_CONFIGURATION');
  }
  if (!Number.isInteger(outputLength) || outputLength <= 0) {
    throw new ConfigurationError('KDF output length must be a positive integer', 'INVALID_CONFIGURATION');
  }
  if (password.length === 0) {
    throw new CipherError('Key derivation failed', 'INVALID_PASSWORD');
  }
  if (salt.length === 0) {
    throw new CipherError('Key derivation failed', 'KEY_DERIVATION_FAILED');
  }

  try {
    const keyMaterial = await crypto.subtle.importKey(
      'raw',
      new TextEncoder().encode(password),
      'PBKDF2',
      false, // not extractable
      ['deriveBits']
    );

    const derivedBits = await crypto.subtle.deriveBits(
      {
        name: 'PBKDF2',
        hash,
        salt: new Uint8Array(salt),
        iterations,
      },
      keyMaterial,
      outputLength * 8 // deriveBits takes length in bits
    );

    return new Uint8Array(derivedBits);
  } catch (err) {
    throw new CipherError('Key derivation failed', 'KEY_DERIVATION_FAILED', { cause: err });
  }
}

/**
 * Configure a PBKDF2 engine.
 *
 * @param hash - Configured hash name ('SHA256', 'SHA-512', ...)
 * @throws ConfigurationError for an unsupported hash or a non-positive iteration count
 */
export function createPbkdf2Engine(hash: string, iterations: number): KdfEngine {
  const digest = parseDigest(hash);
  if (!Number.isInteger(iterations) || iterations <= 0) {
    throw new ConfigurationError('KDF iterations must be a positive integer', 'INVALID_CONFIGURATION');
  }

  return {
    hash: digest,
    iterations,
    digestSize: DIGEST_SIZES[digest],
    derive: (password, salt, outputLength) =>
      deriveMasterKey({ password, salt, iterations, hash: digest, outputLength }),
  };
}
