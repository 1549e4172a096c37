/**
 * @journal-vault/crypto - Codec Types
 */

import type { CodecConfig } from '../config/types';
import type { Compressor } from '../compression/types';
import type { Logger } from '../logger';
import type { SaltStore } from '../salt/store';

/**
 * Options for opening an entry codec.
 */
export type EntryCodecOptions = {
  /** Where the KDF salt is loaded from, or created in on first use */
  saltStore: SaltStore;
  /** Overrides merged onto the defaults */
  config?: Partial<CodecConfig>;
  /** Replaces the compressor named in the configuration */
  compressor?: Compressor;
  logger?: Logger;
};

/**
 * The text fields of a journal entry that are encrypted at rest.
 * Any other fields (id, date, ...) pass through unchanged.
 */
export type JournalEntryFields = {
  subject: string;
  content: string;
};
