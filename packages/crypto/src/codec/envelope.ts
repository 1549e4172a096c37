/**
 * @journal-vault/crypto - Envelope Format
 *
 * Text serialization of one encrypted field:
 * `base64(iv) + "$" + base64(ciphertext) + "$" + base64(mac)`.
 * The MAC covers the text of the first two segments joined by the separator.
 */

import { FormatError } from '../types';
import { ENVELOPE_SEPARATOR } from '../constants';

/**
 * The three base64 segments of an envelope.
 */
export type EnvelopeParts = {
  iv: string;
  ciphertext: string;
  mac: string;
};

/**
 * The authenticated portion of an envelope: `iv$ciphertext`.
 */
export function signedPortion(iv: string, ciphertext: string): string {
  return `${iv}${ENVELOPE_SEPARATOR}${ciphertext}`;
}

export function formatEnvelope(parts: EnvelopeParts): string {
  return `${signedPortion(parts.iv, parts.ciphertext)}${ENVELOPE_SEPARATOR}${parts.mac}`;
}

/**
 * Split an envelope into its segments. Only the shape is checked here;
 * segment contents are authenticated before they are decoded.
 *
 * @throws FormatError unless there are exactly three segments with non-empty IV and MAC
 */
export function parseEnvelope(envelope: string): EnvelopeParts {
  const parts = envelope.split(ENVELOPE_SEPARATOR);
  if (parts.length !== 3) {
    throw new FormatError('Malformed envelope', 'MALFORMED_ENVELOPE');
  }

  const [iv, ciphertext, mac] = parts;
  if (iv.length === 0 || mac.length === 0) {
    throw new FormatError('Malformed envelope', 'MALFORMED_ENVELOPE');
  }

  return { iv, ciphertext, mac };
}
