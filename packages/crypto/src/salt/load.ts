/**
 * @journal-vault/crypto - Salt Loading
 *
 * Loads the persisted KDF salt, creating and persisting it on first use.
 * There is no fallback to an unpersisted salt: entries encrypted under a
 * salt that was never stored could not be decrypted again.
 */

import { SaltIOError } from '../types';
import { generateSalt } from '../utils/random';
import type { Logger } from '../logger';
import type { SaltStore } from './store';

/**
 * Load the salt from the store, or generate and persist one of `length` bytes.
 *
 * A stored salt is used as-is even when its length differs from `length`;
 * only new salts take the configured length.
 *
 * @throws SaltIOError on any read or write failure, or if the stored salt is empty
 */
export async function loadOrCreateSalt(
  store: SaltStore,
  length: number,
  logger?: Logger
): Promise<Uint8Array> {
  let present: boolean;
  try {
    present = await store.exists();
  } catch (err) {
    throw new SaltIOError('Cannot load salt', 'SALT_READ_FAILED', { cause: err });
  }

  if (!present) {
    const salt = generateSalt(length);
    try {
      await store.write(salt);
    } catch (err) {
      throw new SaltIOError('Cannot write salt', 'SALT_WRITE_FAILED', { cause: err });
    }
    logger?.info({ location: store.location, length }, 'Created new KDF salt');
    return salt;
  }

  let salt: Uint8Array;
  try {
    salt = await store.read();
  } catch (err) {
    throw new SaltIOError('Cannot load salt', 'SALT_READ_FAILED', { cause: err });
  }

  if (salt.length === 0) {
    throw new SaltIOError('Stored salt is empty', 'SALT_CORRUPTED');
  }
  if (salt.length !== length) {
    logger?.warn(
      { location: store.location, storedLength: salt.length, configuredLength: length },
      'Stored salt length differs from configuration; using stored salt'
    );
  }
  return salt;
}
