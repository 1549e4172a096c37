/**
 * @journal-vault/crypto - Utilities
 *
 * Re-exports for encoding, memory, and random utilities.
 */

export {
  hexToBytes,
  bytesToHex,
  concatBytes,
  constantTimeEqual,
  bytesToBase64,
  base64ToBytes,
  encodeText,
  decodeText,
} from './encoding';
export { clearBytes, clearAll } from './memory';
export { generateRandomBytes, generateSalt, generateIv } from './random';
