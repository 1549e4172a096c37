/**
 * @journal-vault/crypto - Encoding Utilities
 *
 * Hex, base64, text and byte conversion utilities.
 */

import { FormatError, type TextEncoding } from '../types';

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

const UTF16_BOM_BE = [0xfe, 0xff] as const;
const UTF16_BOM_LE = [0xff, 0xfe] as const;

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;
const LONE_SURROGATES = new RegExp(LONE_SURROGATE.source, 'g');

/**
 * Convert hex string to Uint8Array.
 * Handles optional 0x prefix.
 *
 * @param hex - Hex string (with or without 0x prefix)
 * @returns Byte array
 */
export function hexToBytes(hex: string): Uint8Array {
  const cleanHex = hex.startsWith('0x') ? hex.slice(2) : hex;

  if (cleanHex.length % 2 !== 0) {
    throw new Error('Invalid hex string: odd length');
  }

  const bytes = new Uint8Array(cleanHex.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    const byte = parseInt(cleanHex.substring(i * 2, i * 2 + 2), 16);
    if (Number.isNaN(byte)) {
      throw new Error('Invalid hex string: non-hex character');
    }
    bytes[i] = byte;
  }

  return bytes;
}

/**
 * Convert Uint8Array to hex string (no prefix).
 */
export function bytesToHex(bytes: Uint8Array): string {
  return Array.from(bytes)
    .map((b) => b.toString(16).padStart(2, '0'))
    .join('');
}

/**
 * Concatenate multiple Uint8Arrays into one.
 */
export function concatBytes(...arrays: Uint8Array[]): Uint8Array {
  const totalLength = arrays.reduce((sum, arr) => sum + arr.length, 0);
  const result = new Uint8Array(totalLength);

  let offset = 0;
  for (const arr of arrays) {
    result.set(arr, offset);
    offset += arr.length;
  }

  return result;
}

/**
 * Compare two byte arrays in time independent of where they differ.
 * Only the length comparison short-circuits.
 */
export function constantTimeEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) {
    return false;
  }
  let diff = 0;
  for (let i = 0; i < a.length; i++) {
    diff |= a[i] ^ b[i];
  }
  return diff === 0;
}

/**
 * Standard (padded) base64. Chunked so large buffers do not overflow the
 * argument limit of String.fromCharCode.
 */
export function bytesToBase64(bytes: Uint8Array): string {
  const CHUNK_SIZE = 32768;
  let result = '';
  for (let i = 0; i < bytes.length; i += CHUNK_SIZE) {
    const chunk = bytes.subarray(i, Math.min(i + CHUNK_SIZE, bytes.length));
    result += String.fromCharCode(...chunk);
  }
  return btoa(result);
}

/**
 * Decode standard padded base64. Whitespace, URL-safe characters and
 * missing padding are rejected.
 *
 * @throws FormatError if the input is not canonical base64
 */
export function base64ToBytes(encoded: string): Uint8Array {
  if (encoded.length % 4 !== 0 || !BASE64_PATTERN.test(encoded)) {
    throw new FormatError('Invalid base64 data', 'INVALID_ENCODING');
  }
  return Uint8Array.from(atob(encoded), (c) => c.charCodeAt(0));
}

/**
 * Encode text with the given encoding.
 * `utf-16` writes a big-endian byte-order mark followed by big-endian code units;
 * the empty string encodes to no bytes at all. In both encodings an unpaired
 * surrogate is written as U+FFFD.
 */
export function encodeText(text: string, encoding: TextEncoding): Uint8Array {
  if (encoding === 'utf-8') {
    return new TextEncoder().encode(text);
  }

  if (text.length === 0) {
    return new Uint8Array(0);
  }
  text = text.replace(LONE_SURROGATES, '\uFFFD');
  const bytes = new Uint8Array(2 + text.length * 2);
  bytes.set(UTF16_BOM_BE, 0);
  for (let i = 0; i < text.length; i++) {
    const unit = text.charCodeAt(i);
    bytes[2 + i * 2] = unit >> 8;
    bytes[3 + i * 2] = unit & 0xff;
  }
  return bytes;
}

/**
 * Decode bytes produced by {@link encodeText}.
 * For `utf-16` a leading BOM selects the byte order; without one, big-endian is assumed.
 *
 * @throws FormatError if the bytes are not valid in the given encoding, including
 *   an unpaired surrogate in `utf-16`
 */
export function decodeText(bytes: Uint8Array, encoding: TextEncoding): string {
  if (encoding === 'utf-8') {
    try {
      return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
    } catch (err) {
      throw new FormatError('Invalid text encoding', 'INVALID_ENCODING', { cause: err });
    }
  }

  if (bytes.length % 2 !== 0) {
    throw new FormatError('Invalid text encoding', 'INVALID_ENCODING');
  }

  let offset = 0;
  let littleEndian = false;
  if (bytes.length >= 2 && bytes[0] === UTF16_BOM_BE[0] && bytes[1] === UTF16_BOM_BE[1]) {
    offset = 2;
  } else if (bytes.length >= 2 && bytes[0] === UTF16_BOM_LE[0] && bytes[1] === UTF16_BOM_LE[1]) {
    offset = 2;
    littleEndian = true;
  }

  const CHUNK_UNITS = 8192;
  let result = '';
  for (let start = offset; start < bytes.length; start += CHUNK_UNITS * 2) {
    const end = Math.min(start + CHUNK_UNITS * 2, bytes.length);
    const units: number[] = [];
    for (let i = start; i < end; i += 2) {
      units.push(littleEndian ? bytes[i] | (bytes[i + 1] << 8) : (bytes[i] << 8) | bytes[i + 1]);
    }
    result += String.fromCharCode(...units);
  }
  if (LONE_SURROGATE.test(result)) {
    throw new FormatError('Invalid text encoding', 'INVALID_ENCODING');
  }
  return result;
}
