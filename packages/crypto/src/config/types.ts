/**
 * @journal-vault/crypto - Configuration Types
 */

import type { TextEncoding } from '../types';

/**
 * Byte layout of the key-expansion input.
 * - `standard`: each block chains the previous block, counter appended
 * - `legacy`: the layout of data written by the old scheme (see keys/expand.ts)
 */
export type KeyExpansionLayout = 'standard' | 'legacy';

/**
 * Explicit configuration of an entry codec.
 * Algorithm names are kept as given and resolved when the engines are built.
 */
export type CodecConfig = {
  /** Block cipher, e.g. 'AES-256' */
  encryptionAlgorithm: string;
  /** Chaining mode, e.g. 'CBC' */
  encryptionMode: string;
  /** Padding scheme, e.g. 'PKCS7Padding' */
  encryptionPadding: string;
  /** MAC construction, e.g. 'HMAC' */
  macType: string;
  /** MAC digest, e.g. 'SHA512' */
  macDigest: string;
  /** PBKDF2 hash, e.g. 'SHA256' */
  kdfHash: string;
  kdfIterations: number;
  /** Compressor name, see compression/registry.ts */
  compression: string;
  /** Length of a newly generated salt in bytes */
  saltLength: number;
  textEncoding: TextEncoding;
  keyExpansion: KeyExpansionLayout;
};
