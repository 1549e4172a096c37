/**
 * @journal-vault/crypto
 *
 * Field-level authenticated encryption for journal entries at rest.
 * Password-based key derivation (PBKDF2), HKDF-style sub-key expansion,
 * AES encryption, HMAC authentication and a textual envelope tying them together.
 *
 * Security principles:
 * - All primitives come from Web Crypto API or audited libraries (@noble/hashes)
 * - The MAC is verified before any decryption is attempted
 * - Error messages are generic; codes and causes carry the detail
 * - Key material lives in memory only and is zeroed when the session closes
 *
 * @example
 * ```typescript
 * import { EntryCodec, FileSaltStore } from '@journal-vault/crypto';
 *
 * const codec = await EntryCodec.open({
 *   saltStore: new FileSaltStore('/var/lib/journal/kdf.salt'),
 *   config: { encryptionAlgorithm: 'AES-256', encryptionMode: 'CBC' },
 * });
 * await codec.setPassword(password);
 *
 * const stored = await codec.encryptEntry({ id: 7, subject, content, date });
 * const entry = await codec.decryptEntry(stored);
 *
 * codec.close();
 * ```
 */

export const CRYPTO_VERSION = '1.0.0';

// Entry codec and envelope format
export {
  EntryCodec,
  withEntryCodec,
  formatEnvelope,
  parseEnvelope,
  signedPortion,
  type EnvelopeParts,
  type EntryCodecOptions,
  type JournalEntryFields,
} from './codec';

// Configuration
export {
  DEFAULT_CODEC_CONFIG,
  LEGACY_PROFILE,
  CONFIG_PROPERTY_KEYS,
  resolveCodecConfig,
  codecConfigFromProperties,
  type CodecConfig,
  type KeyExpansionLayout,
} from './config';

// Password key derivation
export { deriveMasterKey, createPbkdf2Engine, type DeriveMasterKeyParams, type KdfEngine } from './kdf';

// Sub-key expansion
export { expandKey, deriveKeyPair, type ExpandKeyParams, type DeriveKeyPairParams } from './keys';

// Block cipher
export {
  configureCipher,
  parseCipherSpec,
  formatCipherSpec,
  pkcs7Pad,
  pkcs7Unpad,
  type CipherEngine,
  type CipherSpec,
  type CipherMode,
  type CipherPadding,
} from './cipher';

// Keyed MAC
export { createMacEngine, type MacEngine, type MacType } from './mac';

// Salt persistence
export { FileSaltStore, MemorySaltStore, loadOrCreateSalt, type SaltStore } from './salt';

// Compression
export {
  createCompressor,
  resolveCompressor,
  gzipCompressor,
  deflateCompressor,
  brotliCompressor,
  nullCompressor,
  type Compressor,
} from './compression';

// Logging
export { createLogger, type Logger } from './logger';

// Utility functions (only safe public utilities)
export {
  hexToBytes,
  bytesToHex,
  concatBytes,
  constantTimeEqual,
  bytesToBase64,
  base64ToBytes,
  encodeText,
  decodeText,
  clearBytes,
  clearAll,
  generateRandomBytes,
  generateSalt,
  generateIv,
} from './utils';

export { parseDigest, DIGEST_SIZES } from './digest';

// Types and errors
export {
  CryptoError,
  ConfigurationError,
  SaltIOError,
  CipherError,
  IntegrityError,
  FormatError,
  type CryptoErrorCode,
  type ConfigurationErrorCode,
  type SaltErrorCode,
  type CipherErrorCode,
  type IntegrityErrorCode,
  type FormatErrorCode,
  type DigestAlgorithm,
  type TextEncoding,
  type EncryptedData,
  type DerivedKeyPair,
} from './types';

// Constants
export {
  AES_BLOCK_SIZE,
  AES_GCM_IV_SIZE,
  AES_CTR_COUNTER_LENGTH,
  DEFAULT_KDF_ITERATIONS,
  DEFAULT_SALT_LENGTH,
  LEGACY_SALT_LENGTH,
  ENVELOPE_SEPARATOR,
  ENCRYPTION_KEY_INFO,
  MAC_KEY_INFO,
} from './constants';
