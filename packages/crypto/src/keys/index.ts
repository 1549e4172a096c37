/**
 * @journal-vault/crypto - Key Management
 *
 * Sub-key expansion and derivation.
 */

export { expandKey, type ExpandKeyParams } from './expand';
export { deriveKeyPair, type DeriveKeyPairParams } from './hierarchy';
