/**
 * @journal-vault/crypto - Compression
 */

export type { Compressor } from './types';
export { createCompressor, resolveCompressor } from './registry';
export { gzipCompressor, deflateCompressor, brotliCompressor, nullCompressor } from './zlib';
