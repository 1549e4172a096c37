/**
 * @journal-vault/crypto - Entry Codec
 *
 * Field-level authenticated encryption of journal text.
 *
 * encode: text -> bytes -> compress -> encrypt -> b64(iv)$b64(ct) -> MAC -> iv$ct$mac
 * decode: split -> verify MAC -> b64 decode -> decrypt -> decompress -> text
 *
 * The MAC is always verified before anything is decrypted, so crafted
 * ciphertexts never reach the cipher or the padding check.
 */

import { CipherError, CryptoError, IntegrityError, type CipherErrorCode } from '../types';
import { configureCipher, formatCipherSpec, type CipherEngine } from '../cipher';
import { createMacEngine, type MacEngine } from '../mac';
import { createPbkdf2Engine, type KdfEngine } from '../kdf';
import { deriveKeyPair } from '../keys';
import { loadOrCreateSalt } from '../salt';
import { resolveCompressor, type Compressor } from '../compression';
import { resolveCodecConfig, type CodecConfig } from '../config';
import { createLogger, type Logger } from '../logger';
import {
  base64ToBytes,
  bytesToBase64,
  constantTimeEqual,
  decodeText,
  encodeText,
} from '../utils/encoding';
import { clearBytes } from '../utils/memory';
import { formatEnvelope, parseEnvelope, signedPortion } from './envelope';
import type { EntryCodecOptions, JournalEntryFields } from './types';

/**
 * Sub-keys bound for one password. Replaced as a whole on every setPassword,
 * and captured once at the start of each operation.
 */
type SessionKeys = {
  encryptionKey: Uint8Array;
  mac: MacEngine;
};

/**
 * Surface anything that is not already typed as a CipherError carrying the cause.
 */
function toOperationError(err: unknown, code: CipherErrorCode, message: string): CryptoError {
  if (err instanceof CryptoError) {
    return err;
  }
  return new CipherError(message, code, { cause: err });
}

export class EntryCodec {
  private keys: SessionKeys | null = null;
  /** Bumped by close(); a derivation started under an older value is discarded */
  private generation = 0;

  private constructor(
    readonly config: CodecConfig,
    private readonly cipher: CipherEngine,
    private readonly kdf: KdfEngine,
    private readonly macKeyLength: number,
    private readonly compressor: Compressor,
    private readonly salt: Uint8Array,
    private readonly logger: Logger
  ) {}

  /**
   * Resolve the configuration, build the engines and load (or create) the salt.
   *
   * @throws ConfigurationError for an unresolvable setting
   * @throws SaltIOError if the salt cannot be read or persisted
   *
   * @example
   * ```typescript
   * const codec = await EntryCodec.open({ saltStore: new FileSaltStore(saltPath) });
   * await codec.setPassword(password);
   * const envelope = await codec.encode('Dear diary');
   * ```
   */
  static async open(options: EntryCodecOptions): Promise<EntryCodec> {
    const logger = options.logger ?? createLogger();
    const config = resolveCodecConfig(options.config);

    const cipher = configureCipher(
      formatCipherSpec(config.encryptionAlgorithm, config.encryptionMode, config.encryptionPadding)
    );
    const macKeyLength = createMacEngine(config.macType, config.macDigest).keyLength;
    const kdf = createPbkdf2Engine(config.kdfHash, config.kdfIterations);
    const compressor = options.compressor ?? resolveCompressor(config.compression, logger);
    const salt = await loadOrCreateSalt(options.saltStore, config.saltLength, logger);

    return new EntryCodec(config, cipher, kdf, macKeyLength, compressor, salt, logger);
  }

  /** Whether a password has been set and not yet closed */
  get hasKey(): boolean {
    return this.keys !== null;
  }

  /**
   * Derive the master key from the password, expand it into the sub-keys and
   * bind them for this session. The master key is zeroed once expanded.
   *
   * Keys of a previous password are zeroed; operations still in flight on
   * them fail with KEY_NOT_SET rather than mixing keys.
   *
   * @throws CipherError KEY_NOT_SET if the codec is closed while the key is being derived
   */
  async setPassword(password: string): Promise<void> {
    const generation = this.generation;
    const masterKey = await this.kdf.derive(password, this.salt);
    if (generation !== this.generation) {
      clearBytes(masterKey);
      throw new CipherError('Codec closed during key setup', 'KEY_NOT_SET');
    }

    let encryptionKey: Uint8Array;
    let macKey: Uint8Array;
    try {
      ({ encryptionKey, macKey } = deriveKeyPair({
        masterKey,
        encryptionKeyLength: this.cipher.keySize,
        macKeyLength: this.macKeyLength,
        textEncoding: this.config.textEncoding,
        layout: this.config.keyExpansion,
      }));
    } finally {
      clearBytes(masterKey);
    }

    const mac = createMacEngine(this.config.macType, this.config.macDigest);
    mac.setKey(macKey);
    mac.setIv(new Uint8Array(mac.ivLength));
    clearBytes(macKey);

    const previous = this.keys;
    this.keys = { encryptionKey, mac };
    if (previous) {
      this.clearKeys(previous);
    }
    this.logger.debug(
      { cipher: this.cipher.spec.mode, kdfHash: this.kdf.hash, iterations: this.kdf.iterations },
      'Session keys derived'
    );
  }

  /**
   * Encrypt one field into an envelope.
   *
   * @throws CipherError if no password is set or a primitive fails
   */
  async encode(plaintext: string): Promise<string> {
    const keys = this.requireKeys();
    const encoding = this.config.textEncoding;

    try {
      const compressed = this.compressor.compress(encodeText(plaintext, encoding));
      const { iv, ciphertext } = await this.cipher.encrypt(keys.encryptionKey, compressed);

      const ivText = bytesToBase64(iv);
      const ciphertextText = bytesToBase64(ciphertext);
      const tag = keys.mac.calculateMac(encodeText(signedPortion(ivText, ciphertextText), encoding));

      return formatEnvelope({ iv: ivText, ciphertext: ciphertextText, mac: bytesToBase64(tag) });
    } catch (err) {
      throw toOperationError(err, 'ENCRYPTION_FAILED', 'Encryption failed');
    }
  }

  /**
   * Verify and decrypt one envelope.
   *
   * @throws FormatError if the envelope is malformed
   * @throws IntegrityError if the MAC does not match (nothing is decrypted)
   * @throws CipherError if no password is set or a primitive fails
   */
  async decode(envelope: string): Promise<string> {
    const parts = parseEnvelope(envelope);
    const keys = this.requireKeys();
    const encoding = this.config.textEncoding;

    const signed = encodeText(signedPortion(parts.iv, parts.ciphertext), encoding);
    const expectedMac = encodeText(bytesToBase64(keys.mac.calculateMac(signed)), 'utf-8');
    if (!constantTimeEqual(expectedMac, encodeText(parts.mac, 'utf-8'))) {
      throw new IntegrityError('Entry failed integrity check');
    }

    try {
      const iv = base64ToBytes(parts.iv);
      const ciphertext = base64ToBytes(parts.ciphertext);
      const compressed = await this.cipher.decrypt(keys.encryptionKey, iv, ciphertext);

      let plain: Uint8Array;
      try {
        plain = this.compressor.decompress(compressed);
      } catch (err) {
        throw new CipherError('Decryption failed', 'DECOMPRESSION_FAILED', { cause: err });
      }
      return decodeText(plain, encoding);
    } catch (err) {
      throw toOperationError(err, 'DECRYPTION_FAILED', 'Decryption failed');
    }
  }

  /**
   * Encrypt the subject and content of an entry. Either both fields are
   * encrypted or the call throws; other fields are copied unchanged.
   */
  async encryptEntry<T extends JournalEntryFields>(entry: T): Promise<T> {
    const subject = await this.encode(entry.subject);
    const content = await this.encode(entry.content);
    return { ...entry, subject, content };
  }

  /**
   * Decrypt the subject and content of an entry produced by {@link encryptEntry}.
   */
  async decryptEntry<T extends JournalEntryFields>(entry: T): Promise<T> {
    const subject = await this.decode(entry.subject);
    const content = await this.decode(entry.content);
    return { ...entry, subject, content };
  }

  /**
   * Zero all session key material. The codec needs a new password before further use;
   * a setPassword still deriving when this runs fails instead of rekeying the codec.
   */
  close(): void {
    this.generation++;
    if (this.keys) {
      this.clearKeys(this.keys);
      this.keys = null;
      this.logger.debug('Session keys cleared');
    }
  }

  private requireKeys(): SessionKeys {
    if (!this.keys) {
      throw new CipherError('No password set', 'KEY_NOT_SET');
    }
    return this.keys;
  }

  private clearKeys(keys: SessionKeys): void {
    clearBytes(keys.encryptionKey);
    keys.mac.clear();
  }
}

/**
 * Run `fn` with a keyed codec and always clear the session keys afterwards.
 *
 * @example
 * ```typescript
 * const entry = await withEntryCodec({ saltStore }, password, (codec) =>
 *   codec.decryptEntry(stored)
 * );
 * ```
 */
export async function withEntryCodec<T>(
  options: EntryCodecOptions,
  password: string,
  fn: (codec: EntryCodec) => Promise<T>
): Promise<T> {
  const codec = await EntryCodec.open(options);
  try {
    await codec.setPassword(password);
    return await fn(codec);
  } finally {
    codec.close();
  }
}
