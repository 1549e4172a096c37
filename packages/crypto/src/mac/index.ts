/**
 * @journal-vault/crypto - MAC Module
 */

export { createMacEngine, type MacEngine, type MacType } from './hmac';
