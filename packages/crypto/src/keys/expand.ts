/**
 * @journal-vault/crypto - Key Expansion
 *
 * HKDF-style expansion of the master key into fixed-length sub-keys by
 * repeated keyed-MAC applications.
 */

import { ConfigurationError } from '../types';
import { EXPANSION_DIGEST } from '../constants';
import { createMacEngine, type MacEngine } from '../mac';
import { concatBytes } from '../utils/encoding';
import type { KeyExpansionLayout } from '../config/types';

/**
 * Parameters for one key expansion.
 */
export type ExpandKeyParams = {
  masterKey: Uint8Array;
  /** Block chained into the first round (empty for the first sub-key) */
  previous: Uint8Array;
  /** Context string bytes separating the sub-keys */
  info: Uint8Array;
  /** Counter octet (0x00-0xff) */
  counter: number;
  outputLength: number;
  /** Input byte layout (defaults to 'standard') */
  layout?: KeyExpansionLayout;
  /** Keyed MAC used as PRF (defaults to HMAC-SHA-512); cleared when done */
  prf?: MacEngine;
};

/** Width of the counter in the legacy layout */
const LEGACY_COUNTER_BYTES = 4;

/**
 * Standard layout: T1 = MAC(previous || info || counter), and each later
 * block chains the one before it with the counter incremented.
 */
function expandStandard(
  prf: MacEngine,
  previous: Uint8Array,
  info: Uint8Array,
  counter: number,
  result: Uint8Array
): void {
  const blocks = Math.ceil(result.length / prf.outputLength);
  if (counter + blocks - 1 > 0xff) {
    throw new ConfigurationError('Expansion output too long for counter', 'INVALID_CONFIGURATION');
  }

  let block = previous;
  for (let i = 0, offset = 0; i < blocks; i++) {
    block = prf.calculateMac(concatBytes(block, info, Uint8Array.of(counter + i)));
    const take = Math.min(block.length, result.length - offset);
    result.set(block.subarray(0, take), offset);
    offset += take;
  }
}

/**
 * Legacy layout: the input is previous || info || four zero bytes, with its
 * first four bytes then overwritten by the big-endian counter. Every block is
 * the MAC of that same input.
 */
function expandLegacy(
  prf: MacEngine,
  previous: Uint8Array,
  info: Uint8Array,
  counter: number,
  result: Uint8Array
): void {
  const data = new Uint8Array(previous.length + info.length + LEGACY_COUNTER_BYTES);
  data.set(previous, 0);
  data.set(info, previous.length);
  new DataView(data.buffer).setUint32(0, counter);

  const block = prf.calculateMac(data);
  for (let offset = 0; offset < result.length; offset += block.length) {
    result.set(block.subarray(0, Math.min(block.length, result.length - offset)), offset);
  }
}

/**
 * Expand a master key into `outputLength` bytes.
 *
 * @throws ConfigurationError for an out-of-range counter or output length
 *
 * @example
 * ```typescript
 * const encryptionKey = expandKey({
 *   masterKey,
 *   previous: new Uint8Array(0),
 *   info: new TextEncoder().encode('Encryption Key'),
 *   counter: 0x01,
 *   outputLength: 32,
 * });
 * ```
 */
export function expandKey(params: ExpandKeyParams): Uint8Array {
  const { masterKey, previous, info, counter, outputLength, layout = 'standard' } = params;

  if (!Number.isInteger(counter) || counter < 0 || counter > 0xff) {
    throw new ConfigurationError('Expansion counter must be an octet', 'INVALID_CONFIGURATION');
  }
  if (!Number.isInteger(outputLength) || outputLength <= 0) {
    throw new ConfigurationError('Expansion output length must be positive', 'INVALID_CONFIGURATION');
  }

  const prf = params.prf ?? createMacEngine('HMAC', EXPANSION_DIGEST);
  const result = new Uint8Array(outputLength);
  try {
    prf.setKey(masterKey);
    if (layout === 'legacy') {
      expandLegacy(prf, previous, info, counter, result);
    } else {
      expandStandard(prf, previous, info, counter, result);
    }
    return result;
  } finally {
    prf.clear();
  }
}
