/**
 * @journal-vault/crypto - Entry Codec
 */

export { EntryCodec, withEntryCodec } from './entry-codec';
export { formatEnvelope, parseEnvelope, signedPortion, type EnvelopeParts } from './envelope';
export type { EntryCodecOptions, JournalEntryFields } from './types';
