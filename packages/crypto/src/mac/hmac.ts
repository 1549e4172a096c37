/**
 * @journal-vault/crypto - Keyed MAC
 *
 * HMAC over a configurable SHA-2 digest using @noble/hashes.
 * Serves both as the envelope integrity tag and as the key-expansion PRF,
 * so keys of any length are accepted.
 */

import { hmac } from '@noble/hashes/hmac';
import { sha256 } from '@noble/hashes/sha256';
import { sha384, sha512 } from '@noble/hashes/sha512';
import { CipherError, ConfigurationError, type DigestAlgorithm } from '../types';
import { parseDigest } from '../digest';
import { constantTimeEqual } from '../utils/encoding';
import { clearBytes } from '../utils/memory';

export type MacType = 'HMAC';

const HASHES = {
  'SHA-256': sha256,
  'SHA-384': sha384,
  'SHA-512': sha512,
} as const satisfies Record<DigestAlgorithm, unknown>;

/**
 * A keyed MAC bound to one key for its lifetime (until cleared).
 */
export interface MacEngine {
  readonly macType: MacType;
  readonly digest: DigestAlgorithm;
  /** Key length in bytes the sub-key derivation produces for this MAC */
  readonly keyLength: number;
  /** IV length in bytes; zero for HMAC */
  readonly ivLength: number;
  /** Tag length in bytes */
  readonly outputLength: number;
  setKey(key: Uint8Array): void;
  setIv(iv: Uint8Array): void;
  calculateMac(data: Uint8Array): Uint8Array;
  /** Constant-time comparison of a provided tag against the expected one */
  verifyMac(data: Uint8Array, tag: Uint8Array): boolean;
  /** Zero the bound key; the engine must be keyed again before use */
  clear(): void;
}

function parseMacType(name: string): MacType {
  if (name.trim().toUpperCase() !== 'HMAC') {
    throw new ConfigurationError(`Unsupported MAC type: ${name}`, 'UNSUPPORTED_MAC');
  }
  return 'HMAC';
}

class HmacEngine implements MacEngine {
  readonly macType = 'HMAC';
  readonly keyLength: number;
  readonly ivLength = 0;
  readonly outputLength: number;

  private key: Uint8Array | null = null;

  constructor(readonly digest: DigestAlgorithm) {
    this.outputLength = HASHES[digest].outputLen;
    this.keyLength = this.outputLength;
  }

  setKey(key: Uint8Array): void {
    clearBytes(this.key);
    this.key = new Uint8Array(key);
  }

  /**
   * The MAC is a pure integrity tag keyed independently of the cipher, so its
   * IV is a constant all-zero buffer. HMAC takes none; only the length is checked.
   */
  setIv(iv: Uint8Array): void {
    if (iv.length !== this.ivLength) {
      throw new CipherError('Invalid MAC IV', 'INVALID_IV_SIZE');
    }
  }

  calculateMac(data: Uint8Array): Uint8Array {
    if (!this.key) {
      throw new CipherError('MAC key not set', 'KEY_NOT_SET');
    }
    return hmac(HASHES[this.digest], this.key, data);
  }

  verifyMac(data: Uint8Array, tag: Uint8Array): boolean {
    return constantTimeEqual(this.calculateMac(data), tag);
  }

  clear(): void {
    clearBytes(this.key);
    this.key = null;
  }
}

/**
 * Configure a MAC engine.
 *
 * @param macType - MAC construction name; only 'HMAC' is supported
 * @param digest - Digest name ('SHA512', 'SHA-256', ...)
 * @throws ConfigurationError for an unsupported type or digest
 *
 * @example
 * ```typescript
 * const mac = createMacEngine('HMAC', 'SHA512');
 * mac.setKey(macKey);
 * mac.setIv(new Uint8Array(mac.ivLength));
 * const tag = mac.calculateMac(data);
 * ```
 */
export function createMacEngine(macType: string, digest: string): MacEngine {
  parseMacType(macType);
  return new HmacEngine(parseDigest(digest));
}
