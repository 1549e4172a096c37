/**
 * @journal-vault/crypto - Compressor Registry
 *
 * Resolves a configured compression name to a {@link Compressor}.
 */

import { ConfigurationError } from '../types';
import type { Logger } from '../logger';
import type { Compressor } from './types';
import { brotliCompressor, deflateCompressor, gzipCompressor, nullCompressor } from './zlib';

const COMPRESSORS: Record<string, Compressor> = {
  gzip: gzipCompressor,
  gz: gzipCompressor,
  deflate: deflateCompressor,
  zlib: deflateCompressor,
  brotli: brotliCompressor,
  br: brotliCompressor,
  none: nullCompressor,
  null: nullCompressor,
};

/**
 * @throws ConfigurationError for an unknown compressor name
 */
export function createCompressor(name: string): Compressor {
  const key = name.trim().toLowerCase();
  if (!Object.prototype.hasOwnProperty.call(COMPRESSORS, key)) {
    throw new ConfigurationError(`Unsupported compression: ${name}`, 'UNSUPPORTED_COMPRESSION');
  }
  return COMPRESSORS[key];
}

/**
 * Like {@link createCompressor}, but an unknown name falls back to no
 * compression with a warning instead of failing setup.
 */
export function resolveCompressor(name: string, logger?: Logger): Compressor {
  try {
    return createCompressor(name);
  } catch (err) {
    logger?.warn({ compression: name, err }, 'Compressor unavailable, using no compression');
    return nullCompressor;
  }
}
