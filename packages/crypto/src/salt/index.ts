/**
 * @journal-vault/crypto - Salt Persistence
 */

export { FileSaltStore, MemorySaltStore, type SaltStore } from './store';
export { loadOrCreateSalt } from './load';
