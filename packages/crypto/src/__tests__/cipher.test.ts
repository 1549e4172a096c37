/**
 * @journal-vault/crypto - Block Cipher Tests
 */

import { describe, it, expect } from 'vitest';
import { configureCipher, parseCipherSpec, pkcs7Pad, pkcs7Unpad } from '../cipher';
import { generateRandomBytes } from '../utils';
import { CipherError, ConfigurationError } from '../types';
import { rejectionOf, thrownBy } from './helpers';

const encoder = new TextEncoder();

describe('Block cipher', () => {
  describe('parseCipherSpec', () => {
    it('should resolve AES-256/CBC/PKCS7', () => {
      expect(parseCipherSpec('AES-256/CBC/PKCS7')).toEqual({
        algorithm: 'AES',
        mode: 'CBC',
        padding: 'PKCS7',
        keySize: 32,
        blockSize: 16,
        ivSize: 16,
      });
    });

    it('should be case-insensitive and accept padding aliases', () => {
      const spec = parseCipherSpec('aes128/ctr/NoPadding');
      expect(spec.keySize).toBe(16);
      expect(spec.mode).toBe('CTR');
      expect(spec.padding).toBe('NONE');
      expect(parseCipherSpec('AES/CBC/PKCS5Padding').padding).toBe('PKCS7');
    });

    it('should size keys from the algorithm token', () => {
      expect(parseCipherSpec('AES/CBC/PKCS7').keySize).toBe(32);
      expect(parseCipherSpec('AES-192/CBC/PKCS7').keySize).toBe(24);
    });

    it('should use a 12-byte IV for GCM', () => {
      expect(parseCipherSpec('AES-256/GCM/NoPadding').ivSize).toBe(12);
    });

    it.each([
      ['AES-256/CBC', 'INVALID_CONFIGURATION'],
      ['AES-256/CBC/PKCS7/extra', 'INVALID_CONFIGURATION'],
      ['DES/CBC/PKCS7', 'UNSUPPORTED_ALGORITHM'],
      ['Twofish/CBC/PKCS7', 'UNSUPPORTED_ALGORITHM'],
      ['AES/OFB/PKCS7', 'UNSUPPORTED_MODE'],
      ['AES/CBC/ISO10126', 'UNSUPPORTED_PADDING'],
      ['AES/CBC/NoPadding', 'UNSUPPORTED_PADDING'],
    ])('should reject %s with %s', (spec, code) => {
      const err = thrownBy(() => parseCipherSpec(spec));
      expect(err).toBeInstanceOf(ConfigurationError);
      expect(err).toMatchObject({ code });
    });
  });

  describe('encrypt / decrypt round-trip', () => {
    it.each([
      'AES-256/CBC/PKCS7',
      'AES-128/CBC/PKCS7',
      'AES-192/CBC/PKCS7',
      'AES-256/CTR/NoPadding',
      'AES-256/CTR/PKCS7',
      'AES-256/GCM/NoPadding',
      'AES-128/GCM/PKCS7',
    ])('should round-trip under %s', async (modeSpec) => {
      const cipher = configureCipher(modeSpec);
      const key = generateRandomBytes(cipher.keySize);
      const plaintext = encoder.encode('Hello, Journal!');

      const { iv, ciphertext } = await cipher.encrypt(key, plaintext);
      const decrypted = await cipher.decrypt(key, iv, ciphertext);

      expect(iv.length).toBe(cipher.ivSize);
      expect(decrypted).toEqual(plaintext);
    });

    it('should round-trip empty plaintext', async () => {
      const cipher = configureCipher('AES-256/CBC/PKCS7');
      const key = generateRandomBytes(32);

      const { iv, ciphertext } = await cipher.encrypt(key, new Uint8Array(0));

      expect(ciphertext.length).toBe(16);
      expect((await cipher.decrypt(key, iv, ciphertext)).length).toBe(0);
    });
  });

  describe('ciphertext sizes', () => {
    it('should pad CBC to the next full block', async () => {
      const cipher = configureCipher('AES-256/CBC/PKCS7');
      const key = generateRandomBytes(32);

      expect((await cipher.encrypt(key, new Uint8Array(15))).ciphertext.length).toBe(16);
      expect((await cipher.encrypt(key, new Uint8Array(16))).ciphertext.length).toBe(32);
    });

    it('should not expand CTR without padding', async () => {
      const cipher = configureCipher('AES-256/CTR/NoPadding');
      const { ciphertext } = await cipher.encrypt(generateRandomBytes(32), new Uint8Array(20));
      expect(ciphertext.length).toBe(20);
    });

    it('should pad CTR when PKCS7 is configured', async () => {
      const cipher = configureCipher('AES-256/CTR/PKCS7');
      const { ciphertext } = await cipher.encrypt(generateRandomBytes(32), new Uint8Array(20));
      expect(ciphertext.length).toBe(32);
    });

    it('should append the 16-byte GCM tag', async () => {
      const cipher = configureCipher('AES-256/GCM/NoPadding');
      const { ciphertext } = await cipher.encrypt(generateRandomBytes(32), new Uint8Array(20));
      expect(ciphertext.length).toBe(36);
    });
  });

  describe('IV generation', () => {
    it('should draw a fresh IV on every encryption', async () => {
      const cipher = configureCipher('AES-256/CBC/PKCS7');
      const key = generateRandomBytes(32);
      const plaintext = encoder.encode('same text');

      const first = await cipher.encrypt(key, plaintext);
      const second = await cipher.encrypt(key, plaintext);

      expect(first.iv).not.toEqual(second.iv);
      expect(first.ciphertext).not.toEqual(second.ciphertext);
    });
  });

  describe('failures', () => {
    it('should reject a key of the wrong size', async () => {
      const cipher = configureCipher('AES-256/CBC/PKCS7');
      const err = await rejectionOf(cipher.encrypt(generateRandomBytes(16), encoder.encode('x')));

      expect(err).toBeInstanceOf(CipherError);
      expect(err).toMatchObject({ code: 'INVALID_KEY_SIZE', message: 'Encryption failed' });
    });

    it('should reject an IV of the wrong size on decryption', async () => {
      const cipher = configureCipher('AES-256/CBC/PKCS7');
      const key = generateRandomBytes(32);
      const { ciphertext } = await cipher.encrypt(key, encoder.encode('x'));

      const err = await rejectionOf(cipher.decrypt(key, new Uint8Array(12), ciphertext));
      expect(err).toMatchObject({ code: 'INVALID_IV_SIZE', message: 'Decryption failed' });
    });

    it('should fail generically on a truncated CBC ciphertext', async () => {
      const cipher = configureCipher('AES-256/CBC/PKCS7');
      const key = generateRandomBytes(32);
      const { iv, ciphertext } = await cipher.encrypt(key, encoder.encode('some entry text'));

      const err = await rejectionOf(cipher.decrypt(key, iv, ciphertext.slice(0, 15)));
      expect(err).toBeInstanceOf(CipherError);
      expect(err).toMatchObject({ code: 'DECRYPTION_FAILED', message: 'Decryption failed' });
    });

    it('should fail on a tampered GCM ciphertext', async () => {
      const cipher = configureCipher('AES-256/GCM/NoPadding');
      const key = generateRandomBytes(32);
      const { iv, ciphertext } = await cipher.encrypt(key, encoder.encode('entry'));
      const tampered = new Uint8Array(ciphertext);
      tampered[0] ^= 0xff;

      const err = await rejectionOf(cipher.decrypt(key, iv, tampered));
      expect(err).toMatchObject({ code: 'DECRYPTION_FAILED' });
    });
  });

  describe('PKCS#7 padding', () => {
    it('should pad to a multiple of the block size', () => {
      const padded = pkcs7Pad(Uint8Array.of(1, 2, 3), 16);

      expect(padded.length).toBe(16);
      expect(Array.from(padded.slice(3))).toEqual(new Array(13).fill(13));
    });

    it('should add a full block to aligned input', () => {
      const padded = pkcs7Pad(new Uint8Array(16), 16);

      expect(padded.length).toBe(32);
      expect(padded[31]).toBe(16);
    });

    it('should strip what it adds', () => {
      const data = Uint8Array.of(9, 8, 7, 6, 5);
      expect(pkcs7Unpad(pkcs7Pad(data, 16), 16)).toEqual(data);
    });

    it.each([
      ['empty input', new Uint8Array(0)],
      ['unaligned input', new Uint8Array(15).fill(1)],
      ['zero pad byte', new Uint8Array(16)],
      ['pad byte above block size', new Uint8Array(16).fill(17)],
      ['inconsistent pad bytes', Uint8Array.from([...new Array(13).fill(0), 2, 3, 3])],
    ])('should reject %s', (_label, data) => {
      const err = thrownBy(() => pkcs7Unpad(data, 16));
      expect(err).toBeInstanceOf(CipherError);
      expect(err).toMatchObject({ code: 'INVALID_PADDING' });
    });
  });
});
