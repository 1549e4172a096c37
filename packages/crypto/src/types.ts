/**
 * @journal-vault/crypto - Type Definitions
 *
 * Shared types and the error taxonomy for the entry encryption pipeline.
 */

/**
 * Hash functions accepted by the KDF and the MAC.
 */
export type DigestAlgorithm = 'SHA-256' | 'SHA-384' | 'SHA-512';

/**
 * Text encodings used to turn entry text (and envelope text) into bytes.
 * `utf-16` is big-endian with a leading byte-order mark.
 */
export type TextEncoding = 'utf-8' | 'utf-16';

/**
 * Result of a cipher encryption. The IV is not secret and travels with the ciphertext.
 */
export type EncryptedData = {
  iv: Uint8Array;
  ciphertext: Uint8Array;
};

/**
 * Sub-keys expanded from one master key.
 */
export type DerivedKeyPair = {
  encryptionKey: Uint8Array;
  macKey: Uint8Array;
};

export type ConfigurationErrorCode =
  | 'UNSUPPORTED_ALGORITHM'
  | 'UNSUPPORTED_MODE'
  | 'UNSUPPORTED_PADDING'
  | 'UNSUPPORTED_MAC'
  | 'UNSUPPORTED_DIGEST'
  | 'UNSUPPORTED_COMPRESSION'
  | 'INVALID_CONFIGURATION';

export type SaltErrorCode = 'SALT_READ_FAILED' | 'SALT_WRITE_FAILED' | 'SALT_CORRUPTED';

export type CipherErrorCode =
  | 'ENCRYPTION_FAILED'
  | 'DECRYPTION_FAILED'
  | 'INVALID_KEY_SIZE'
  | 'INVALID_IV_SIZE'
  | 'INVALID_PADDING'
  | 'INVALID_PASSWORD'
  | 'KEY_DERIVATION_FAILED'
  | 'KEY_NOT_SET'
  | 'DECOMPRESSION_FAILED'
  | 'RANDOM_GENERATION_FAILED';

export type IntegrityErrorCode = 'MAC_MISMATCH';

export type FormatErrorCode = 'MALFORMED_ENVELOPE' | 'INVALID_ENCODING';

/**
 * Error codes for categorized error handling.
 * Messages stay generic; the code and the cause carry the detail.
 */
export type CryptoErrorCode =
  | ConfigurationErrorCode
  | SaltErrorCode
  | CipherErrorCode
  | IntegrityErrorCode
  | FormatErrorCode;

/**
 * Base class for every failure raised by this package.
 */
export class CryptoError<C extends CryptoErrorCode = CryptoErrorCode> extends Error {
  readonly code: C;

  constructor(message: string, code: C, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CryptoError';
    this.code = code;

    // Maintain proper stack trace for V8
    const ErrorWithCapture = Error as typeof Error & {
      captureStackTrace?: (target: object, constructor: unknown) => void;
    };
    if (ErrorWithCapture.captureStackTrace) {
      ErrorWithCapture.captureStackTrace(this, new.target);
    }
  }
}

/** Unresolvable algorithm, mode, padding or other setting. Fatal at setup. */
export class ConfigurationError extends CryptoError<ConfigurationErrorCode> {
  constructor(message: string, code: ConfigurationErrorCode, options?: { cause?: unknown }) {
    super(message, code, options);
    this.name = 'ConfigurationError';
  }
}

/** The KDF salt could not be read or persisted. Fatal at setup, never retried. */
export class SaltIOError extends CryptoError<SaltErrorCode> {
  constructor(message: string, code: SaltErrorCode, options?: { cause?: unknown }) {
    super(message, code, options);
    this.name = 'SaltIOError';
  }
}

/** A cryptographic primitive failed. Fatal for the operation only. */
export class CipherError extends CryptoError<CipherErrorCode> {
  constructor(message: string, code: CipherErrorCode, options?: { cause?: unknown }) {
    super(message, code, options);
    this.name = 'CipherError';
  }
}

/** The stored MAC does not match. Raised before any decryption is attempted. */
export class IntegrityError extends CryptoError<IntegrityErrorCode> {
  constructor(message: string, code: IntegrityErrorCode = 'MAC_MISMATCH') {
    super(message, code);
    this.name = 'IntegrityError';
  }
}

/** Malformed envelope structure or undecodable text. */
export class FormatError extends CryptoError<FormatErrorCode> {
  constructor(message: string, code: FormatErrorCode, options?: { cause?: unknown }) {
    super(message, code, options);
    this.name = 'FormatError';
  }
}
