/**
 * @journal-vault/crypto - Sub-key Hierarchy
 *
 * Derives the encryption and MAC sub-keys from one master key.
 * The MAC key chains the encryption key into its first round, which gives
 * domain separation without a second master secret.
 */

import { CipherError, type DerivedKeyPair, type TextEncoding } from '../types';
import {
  ENCRYPTION_KEY_COUNTER,
  ENCRYPTION_KEY_INFO,
  MAC_KEY_COUNTER,
  MAC_KEY_INFO,
} from '../constants';
import { constantTimeEqual, encodeText } from '../utils/encoding';
import { clearAll } from '../utils/memory';
import { expandKey } from './expand';
import type { KeyExpansionLayout } from '../config/types';

export type DeriveKeyPairParams = {
  masterKey: Uint8Array;
  /** Cipher key size in bytes */
  encryptionKeyLength: number;
  /** MAC key size in bytes */
  macKeyLength: number;
  /** Encoding of the context strings (defaults to 'utf-8') */
  textEncoding?: TextEncoding;
  layout?: KeyExpansionLayout;
};

/**
 * Derive the session sub-keys.
 *
 * @throws CipherError if the two sub-keys come out equal
 */
export function deriveKeyPair(params: DeriveKeyPairParams): DerivedKeyPair {
  const { masterKey, encryptionKeyLength, macKeyLength, textEncoding = 'utf-8', layout } = params;

  const encryptionKey = expandKey({
    masterKey,
    previous: new Uint8Array(0),
    info: encodeText(ENCRYPTION_KEY_INFO, textEncoding),
    counter: ENCRYPTION_KEY_COUNTER,
    outputLength: encryptionKeyLength,
    layout,
  });

  const macKey = expandKey({
    masterKey,
    previous: encryptionKey,
    info: encodeText(MAC_KEY_INFO, textEncoding),
    counter: MAC_KEY_COUNTER,
    outputLength: macKeyLength,
    layout,
  });

  if (constantTimeEqual(encryptionKey, macKey)) {
    clearAll(encryptionKey, macKey);
    throw new CipherError('Key derivation failed', 'KEY_DERIVATION_FAILED');
  }

  return { encryptionKey, macKey };
}
