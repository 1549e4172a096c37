/**
 * @journal-vault/crypto - Compressor Contract
 */

/**
 * Pluggable compression applied to entry bytes before encryption.
 */
export interface Compressor {
  readonly name: string;
  compress(data: Uint8Array): Uint8Array;
  decompress(data: Uint8Array): Uint8Array;
}
