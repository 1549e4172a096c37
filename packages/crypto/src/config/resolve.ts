/**
 * @journal-vault/crypto - Configuration Resolution
 *
 * Defaults, validation, and the mapping from the opaque key/value
 * configuration surface onto {@link CodecConfig}.
 */

import { ConfigurationError } from '../types';
import { DEFAULT_KDF_ITERATIONS, DEFAULT_SALT_LENGTH, LEGACY_SALT_LENGTH } from '../constants';
import type { CodecConfig } from './types';

export const DEFAULT_CODEC_CONFIG: Readonly<CodecConfig> = {
  encryptionAlgorithm: 'AES-256',
  encryptionMode: 'CBC',
  encryptionPadding: 'PKCS7Padding',
  macType: 'HMAC',
  macDigest: 'SHA-512',
  kdfHash: 'SHA-256',
  kdfIterations: DEFAULT_KDF_ITERATIONS,
  compression: 'gzip',
  saltLength: DEFAULT_SALT_LENGTH,
  textEncoding: 'utf-8',
  keyExpansion: 'standard',
};

/**
 * Overrides for reading data written by the old scheme: 10-byte salt,
 * UTF-16 text and the older expansion layout.
 */
export const LEGACY_PROFILE: Readonly<Partial<CodecConfig>> = {
  saltLength: LEGACY_SALT_LENGTH,
  textEncoding: 'utf-16',
  keyExpansion: 'legacy',
};

/** Property keys of the key/value configuration surface */
export const CONFIG_PROPERTY_KEYS = {
  encryptionAlgorithm: 'secure.encryption.algorithm',
  encryptionMode: 'secure.encryption.mode',
  encryptionPadding: 'secure.encryption.padding',
  macType: 'secure.mac.type',
  macDigest: 'secure.mac.algorithm',
  kdfHash: 'secure.kdf.algorithm',
  kdfIterations: 'secure.kdf.iterations',
  compression: 'secure.compression.algorithm',
  saltLength: 'secure.kdf.saltLength',
  textEncoding: 'secure.text.encoding',
  keyExpansion: 'secure.kdf.expansion',
} as const satisfies Record<keyof CodecConfig, string>;

function invalid(message: string): ConfigurationError {
  return new ConfigurationError(message, 'INVALID_CONFIGURATION');
}

function requireName(value: string, field: keyof CodecConfig): void {
  if (value.trim().length === 0) {
    throw invalid(`Configuration value ${field} must not be empty`);
  }
}

function requirePositiveInteger(value: number, field: keyof CodecConfig): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw invalid(`Configuration value ${field} must be a positive integer`);
  }
}

/**
 * Merge overrides onto the defaults and validate the result.
 *
 * @throws ConfigurationError on an empty name, a non-positive count, or an unknown enum value
 */
export function resolveCodecConfig(overrides: Partial<CodecConfig> = {}): CodecConfig {
  const defaults = DEFAULT_CODEC_CONFIG;
  const config: CodecConfig = {
    encryptionAlgorithm: overrides.encryptionAlgorithm ?? defaults.encryptionAlgorithm,
    encryptionMode: overrides.encryptionMode ?? defaults.encryptionMode,
    encryptionPadding: overrides.encryptionPadding ?? defaults.encryptionPadding,
    macType: overrides.macType ?? defaults.macType,
    macDigest: overrides.macDigest ?? defaults.macDigest,
    kdfHash: overrides.kdfHash ?? defaults.kdfHash,
    kdfIterations: overrides.kdfIterations ?? defaults.kdfIterations,
    compression: overrides.compression ?? defaults.compression,
    saltLength: overrides.saltLength ?? defaults.saltLength,
    textEncoding: overrides.textEncoding ?? defaults.textEncoding,
    keyExpansion: overrides.keyExpansion ?? defaults.keyExpansion,
  };

  requireName(config.encryptionAlgorithm, 'encryptionAlgorithm');
  requireName(config.encryptionMode, 'encryptionMode');
  requireName(config.encryptionPadding, 'encryptionPadding');
  requireName(config.macType, 'macType');
  requireName(config.macDigest, 'macDigest');
  requireName(config.kdfHash, 'kdfHash');
  requireName(config.compression, 'compression');
  requirePositiveInteger(config.kdfIterations, 'kdfIterations');
  requirePositiveInteger(config.saltLength, 'saltLength');

  if (config.textEncoding !== 'utf-8' && config.textEncoding !== 'utf-16') {
    throw invalid(`Unsupported text encoding: ${String(config.textEncoding)}`);
  }
  if (config.keyExpansion !== 'standard' && config.keyExpansion !== 'legacy') {
    throw invalid(`Unsupported key expansion layout: ${String(config.keyExpansion)}`);
  }

  return config;
}

function parseInteger(raw: string, key: string): number {
  if (!/^\d+$/.test(raw.trim())) {
    throw invalid(`Property ${key} must be an integer`);
  }
  return Number(raw.trim());
}

/**
 * Build a configuration from key/value properties (see {@link CONFIG_PROPERTY_KEYS}).
 * Missing or blank properties fall back to the defaults; unknown keys are ignored.
 *
 * @throws ConfigurationError if a value does not validate
 */
export function codecConfigFromProperties(
  properties: Readonly<Record<string, string | undefined>>
): CodecConfig {
  const overrides: Partial<CodecConfig> = {};
  const read = (key: string): string | undefined => {
    const value = properties[key];
    return value === undefined || value.trim() === '' ? undefined : value.trim();
  };

  const keys = CONFIG_PROPERTY_KEYS;
  const encryptionAlgorithm = read(keys.encryptionAlgorithm);
  if (encryptionAlgorithm) overrides.encryptionAlgorithm = encryptionAlgorithm;
  const encryptionMode = read(keys.encryptionMode);
  if (encryptionMode) overrides.encryptionMode = encryptionMode;
  const encryptionPadding = read(keys.encryptionPadding);
  if (encryptionPadding) overrides.encryptionPadding = encryptionPadding;
  const macType = read(keys.macType);
  if (macType) overrides.macType = macType;
  const macDigest = read(keys.macDigest);
  if (macDigest) overrides.macDigest = macDigest;
  const kdfHash = read(keys.kdfHash);
  if (kdfHash) overrides.kdfHash = kdfHash;
  const compression = read(keys.compression);
  if (compression) overrides.compression = compression;

  const kdfIterations = read(keys.kdfIterations);
  if (kdfIterations) overrides.kdfIterations = parseInteger(kdfIterations, keys.kdfIterations);
  const saltLength = read(keys.saltLength);
  if (saltLength) overrides.saltLength = parseInteger(saltLength, keys.saltLength);

  const textEncoding = read(keys.textEncoding)?.toLowerCase();
  if (textEncoding === 'utf-8' || textEncoding === 'utf-16') {
    overrides.textEncoding = textEncoding;
  } else if (textEncoding) {
    throw invalid(`Unsupported text encoding: ${textEncoding}`);
  }

  const keyExpansion = read(keys.keyExpansion)?.toLowerCase();
  if (keyExpansion === 'standard' || keyExpansion === 'legacy') {
    overrides.keyExpansion = keyExpansion;
  } else if (keyExpansion) {
    throw invalid(`Unsupported key expansion layout: ${keyExpansion}`);
  }

  return resolveCodecConfig(overrides);
}
