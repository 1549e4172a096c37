/**
 * @journal-vault/crypto - Cipher Module
 *
 * AES-CBC, AES-CTR and AES-GCM with configurable padding.
 */

export { configureCipher, type CipherEngine } from './engine';
export {
  parseCipherSpec,
  formatCipherSpec,
  type CipherSpec,
  type CipherMode,
  type CipherPadding,
} from './spec';
export { pkcs7Pad, pkcs7Unpad } from './padding';
