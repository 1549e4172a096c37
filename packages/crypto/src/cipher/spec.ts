/**
 * @journal-vault/crypto - Cipher Specifier
 *
 * Parses an `ALGORITHM/MODE/PADDING` specifier, e.g. `AES-256/CBC/PKCS7Padding`.
 */

import { ConfigurationError } from '../types';
import { AES_BLOCK_SIZE, AES_GCM_IV_SIZE } from '../constants';

export type CipherMode = 'CBC' | 'CTR' | 'GCM';
export type CipherPadding = 'PKCS7' | 'NONE';

/**
 * Resolved cipher context, configured once and reused for a session.
 */
export type CipherSpec = {
  algorithm: 'AES';
  mode: CipherMode;
  padding: CipherPadding;
  /** Key size in bytes, derived from the algorithm token */
  keySize: number;
  blockSize: number;
  ivSize: number;
};

const KEY_SIZES: Record<string, number> = {
  AES: 32,
  AES128: 16,
  AES192: 24,
  AES256: 32,
};

const PADDINGS: Record<string, CipherPadding> = {
  PKCS7: 'PKCS7',
  PKCS7PADDING: 'PKCS7',
  PKCS5: 'PKCS7',
  PKCS5PADDING: 'PKCS7',
  NOPADDING: 'NONE',
  NONE: 'NONE',
};

function parseMode(token: string): CipherMode {
  const mode = token.toUpperCase();
  if (mode === 'CBC' || mode === 'CTR' || mode === 'GCM') {
    return mode;
  }
  throw new ConfigurationError(`Unsupported cipher mode: ${token}`, 'UNSUPPORTED_MODE');
}

/**
 * Join configured parts into a specifier string.
 */
export function formatCipherSpec(algorithm: string, mode: string, padding: string): string {
  return `${algorithm}/${mode}/${padding}`;
}

/**
 * Parse a cipher specifier.
 *
 * @throws ConfigurationError on a malformed specifier or an unsupported token
 */
export function parseCipherSpec(modeSpec: string): CipherSpec {
  const parts = modeSpec.split('/').map((part) => part.trim());
  if (parts.length !== 3 || parts.some((part) => part.length === 0)) {
    throw new ConfigurationError(
      `Cipher specifier must be ALGORITHM/MODE/PADDING: ${modeSpec}`,
      'INVALID_CONFIGURATION'
    );
  }
  const [algorithmToken, modeToken, paddingToken] = parts;

  const keySize = KEY_SIZES[algorithmToken.toUpperCase().replace(/[-_]/g, '')];
  if (!keySize) {
    throw new ConfigurationError(`Unsupported cipher: ${algorithmToken}`, 'UNSUPPORTED_ALGORITHM');
  }

  const mode = parseMode(modeToken);

  const padding = PADDINGS[paddingToken.toUpperCase()];
  if (!padding) {
    throw new ConfigurationError(`Unsupported padding: ${paddingToken}`, 'UNSUPPORTED_PADDING');
  }
  if (mode === 'CBC' && padding === 'NONE') {
    throw new ConfigurationError('CBC requires PKCS7 padding', 'UNSUPPORTED_PADDING');
  }

  return {
    algorithm: 'AES',
    mode,
    padding,
    keySize,
    blockSize: AES_BLOCK_SIZE,
    ivSize: mode === 'GCM' ? AES_GCM_IV_SIZE : AES_BLOCK_SIZE,
  };
}
