/**
 * @journal-vault/crypto - Built-in Compressors
 *
 * Node's zlib codecs plus a pass-through.
 */

import {
  brotliCompressSync,
  brotliDecompressSync,
  deflateSync,
  gunzipSync,
  gzipSync,
  inflateSync,
} from 'node:zlib';
import type { Compressor } from './types';

function toBytes(buffer: Buffer): Uint8Array {
  return new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength);
}

export const gzipCompressor: Compressor = {
  name: 'gzip',
  compress: (data) => toBytes(gzipSync(data)),
  decompress: (data) => toBytes(gunzipSync(data)),
};

export const deflateCompressor: Compressor = {
  name: 'deflate',
  compress: (data) => toBytes(deflateSync(data)),
  decompress: (data) => toBytes(inflateSync(data)),
};

export const brotliCompressor: Compressor = {
  name: 'brotli',
  compress: (data) => toBytes(brotliCompressSync(data)),
  decompress: (data) => toBytes(brotliDecompressSync(data)),
};

/** No compression; bytes pass through unchanged */
export const nullCompressor: Compressor = {
  name: 'none',
  compress: (data) => data,
  decompress: (data) => data,
};
