/**
 * @journal-vault/crypto - PKCS#7 Padding
 *
 * Applied by hand for the stream-like modes (CTR, GCM); Web Crypto pads CBC itself.
 */

import { CipherError } from '../types';

/**
 * Pad to a multiple of the block size. Always adds 1..blockSize bytes.
 */
export function pkcs7Pad(data: Uint8Array, blockSize: number): Uint8Array {
  const padLength = blockSize - (data.length % blockSize);
  const padded = new Uint8Array(data.length + padLength);
  padded.set(data, 0);
  padded.fill(padLength, data.length);
  return padded;
}

/**
 * Strip PKCS#7 padding.
 *
 * @throws CipherError with a generic message if the padding is malformed
 */
export function pkcs7Unpad(data: Uint8Array, blockSize: number): Uint8Array {
  if (data.length === 0 || data.length % blockSize !== 0) {
    throw new CipherError('Decryption failed', 'INVALID_PADDING');
  }

  const padLength = data[data.length - 1];
  if (padLength === 0 || padLength > blockSize) {
    throw new CipherError('Decryption failed', 'INVALID_PADDING');
  }

  let diff = 0;
  for (let i = data.length - padLength; i < data.length; i++) {
    diff |= data[i] ^ padLength;
  }
  if (diff !== 0) {
    throw new CipherError('Decryption failed', 'INVALID_PADDING');
  }

  return data.slice(0, data.length - padLength);
}
