/**
 * @journal-vault/crypto - Key Derivation
 */

export { deriveMasterKey, createPbkdf2Engine, type DeriveMasterKeyParams, type KdfEngine } from './pbkdf2';
