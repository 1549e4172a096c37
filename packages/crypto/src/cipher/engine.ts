/**
 * @journal-vault/crypto - Block Cipher Engine
 *
 * AES in CBC, CTR or GCM mode using Web Crypto API.
 * The IV is generated per encryption and passed explicitly to decryption,
 * so an engine holds no per-call state and may be shared between concurrent calls.
 */

import { CipherError, type EncryptedData } from '../types';
import { AES_CTR_COUNTER_LENGTH } from '../constants';
import { generateIv } from '../utils/random';
import { parseCipherSpec, type CipherSpec } from './spec';
import { pkcs7Pad, pkcs7Unpad } from './padding';

/**
 * A configured block cipher.
 */
export interface CipherEngine {
  readonly spec: CipherSpec;
  /** Key size in bytes */
  readonly keySize: number;
  readonly blockSize: number;
  readonly ivSize: number;
  /**
   * Encrypt with a fresh random IV.
   * @throws CipherError with generic message on any failure
   */
  encrypt(key: Uint8Array, plaintext: Uint8Array): Promise<EncryptedData>;
  /**
   * Decrypt with the IV that travelled with the ciphertext.
   * @throws CipherError with generic message on any failure (wrong key, bad padding, wrong IV)
   */
  decrypt(key: Uint8Array, iv: Uint8Array, ciphertext: Uint8Array): Promise<Uint8Array>;
}

const WEB_CRYPTO_NAMES = {
  CBC: 'AES-CBC',
  CTR: 'AES-CTR',
  GCM: 'AES-GCM',
} as const;

function algorithmParams(spec: CipherSpec, iv: Uint8Array): AesCbcParams | AesCtrParams | AesGcmParams {
  const ivBytes = new Uint8Array(iv);
  switch (spec.mode) {
    case 'CBC':
      return { name: WEB_CRYPTO_NAMES.CBC, iv: ivBytes };
    case 'CTR':
      return { name: WEB_CRYPTO_NAMES.CTR, counter: ivBytes, length: AES_CTR_COUNTER_LENGTH };
    case 'GCM':
      return { name: WEB_CRYPTO_NAMES.GCM, iv: ivBytes };
  }
}

async function importKey(spec: CipherSpec, key: Uint8Array, usage: KeyUsage): Promise<CryptoKey> {
  return crypto.subtle.importKey(
    'raw',
    new Uint8Array(key),
    { name: WEB_CRYPTO_NAMES[spec.mode] },
    false,
    [usage]
  );
}

/** Web Crypto pads CBC natively; other modes get PKCS#7 applied here when configured. */
function padsManually(spec: CipherSpec): boolean {
  return spec.padding === 'PKCS7' && spec.mode !== 'CBC';
}

class WebCryptoCipherEngine implements CipherEngine {
  readonly keySize: number;
  readonly blockSize: number;
  readonly ivSize: number;

  constructor(readonly spec: CipherSpec) {
    this.keySize = spec.keySize;
    this.blockSize = spec.blockSize;
    this.ivSize = spec.ivSize;
  }

  async encrypt(key: Uint8Array, plaintext: Uint8Array): Promise<EncryptedData> {
    if (key.length !== this.keySize) {
      throw new CipherError('Encryption failed', 'INVALID_KEY_SIZE');
    }

    const iv = generateIv(this.ivSize);
    const input = padsManually(this.spec) ? pkcs7Pad(plaintext, this.blockSize) : plaintext;

    try {
      const cryptoKey = await importKey(this.spec, key, 'encrypt');
      const ciphertext = await crypto.subtle.encrypt(
        algorithmParams(this.spec, iv),
        cryptoKey,
        new Uint8Array(input)
      );
      return { iv, ciphertext: new Uint8Array(ciphertext) };
    } catch (err) {
      throw new CipherError('Encryption failed', 'ENCRYPTION_FAILED', { cause: err });
    }
  }

  async decrypt(key: Uint8Array, iv: Uint8Array, ciphertext: Uint8Array): Promise<Uint8Array> {
    if (key.length !== this.keySize) {
      throw new CipherError('Decryption failed', 'INVALID_KEY_SIZE');
    }
    if (iv.length !== this.ivSize) {
      throw new CipherError('Decryption failed', 'INVALID_IV_SIZE');
    }

    let plaintext: Uint8Array;
    try {
      const cryptoKey = await importKey(this.spec, key, 'decrypt');
      const decrypted = await crypto.subtle.decrypt(
        algorithmParams(this.spec, iv),
        cryptoKey,
        new Uint8Array(ciphertext)
      );
      plaintext = new Uint8Array(decrypted);
    } catch (err) {
      // Do NOT reveal whether padding, key or IV was at fault
      throw new CipherError('Decryption failed', 'DECRYPTION_FAILED', { cause: err });
    }

    return padsManually(this.spec) ? pkcs7Unpad(plaintext, this.blockSize) : plaintext;
  }
}

/**
 * Configure a cipher engine from an `ALGORITHM/MODE/PADDING` specifier.
 *
 * @throws ConfigurationError for an unsupported specifier
 *
 * @example
 * ```typescript
 * const cipher = configureCipher('AES-256/CBC/PKCS7Padding');
 * const { iv, ciphertext } = await cipher.encrypt(encryptionKey, plaintext);
 * const decrypted = await cipher.decrypt(encryptionKey, iv, ciphertext);
 * ```
 */
export function configureCipher(modeSpec: string): CipherEngine {
  return new WebCryptoCipherEngine(parseCipherSpec(modeSpec));
}
