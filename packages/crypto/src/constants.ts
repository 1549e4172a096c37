/**
 * @journal-vault/crypto - Constants
 *
 * Cryptographic parameters, sizes and fixed context strings.
 */

/** AES block size in bytes (128 bits) */
export const AES_BLOCK_SIZE = 16;

/** AES-GCM IV size in bytes (96 bits) */
export const AES_GCM_IV_SIZE = 12;

/** Counter bits of the AES-CTR IV (low half of the block) */
export const AES_CTR_COUNTER_LENGTH = 64;

/** Reference PBKDF2 iteration count */
export const DEFAULT_KDF_ITERATIONS = 64000;

/** Salt length for new deployments */
export const DEFAULT_SALT_LENGTH = 16;

/** Salt length used by data written under the legacy profile */
export const LEGACY_SALT_LENGTH = 10;

/** Separator between the base64 segments of an envelope */
export const ENVELOPE_SEPARATOR = '$';

/** Digest of the HMAC used as the key-expansion PRF */
export const EXPANSION_DIGEST = 'SHA-512';

/** Context string and counter for the encryption sub-key */
export const ENCRYPTION_KEY_INFO = 'Encryption Key';
export const ENCRYPTION_KEY_COUNTER = 0x01;

/** Context string and counter for the MAC sub-key */
export const MAC_KEY_INFO = 'Mac Key';
export const MAC_KEY_COUNTER = 0x02;
