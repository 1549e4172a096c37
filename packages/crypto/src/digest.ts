/**
 * @journal-vault/crypto - Digest Names
 *
 * Maps configured digest names ('SHA512', 'sha-512', ...) onto the
 * canonical Web Crypto spelling.
 */

import { ConfigurationError, type DigestAlgorithm } from './types';

const DIGESTS: Record<string, DigestAlgorithm> = {
  SHA256: 'SHA-256',
  SHA384: 'SHA-384',
  SHA512: 'SHA-512',
};

/** Digest output sizes in bytes */
export const DIGEST_SIZES: Record<DigestAlgorithm, number> = {
  'SHA-256': 32,
  'SHA-384': 48,
  'SHA-512': 64,
};

/**
 * @throws ConfigurationError if the name is not a supported digest
 */
export function parseDigest(name: string): DigestAlgorithm {
  const digest = DIGESTS[name.trim().toUpperCase().replace(/[-_]/g, '')];
  if (!digest) {
    throw new ConfigurationError(`Unsupported digest: ${name}`, 'UNSUPPORTED_DIGEST');
  }
  return digest;
}
