/**
 * @clipkeep/encryption - key custody and payload encryption
 *
 * @packageDocumentation
 */

// Types
export type * from './types.js';

// Crypto utilities
export * from './crypto-utils.js';

// AES-GCM sealing
export {
  AesGcmSealer,
  KEY_LENGTH_BYTES,
  NONCE_LENGTH_BYTES,
  TAG_LENGTH_BYTES,
  createAesGcmSealer,
} from './aes-gcm.js';

// Credential stores
export {
  CREDENTIAL_ACCESS_POLICY,
  ENCRYPTION_KEY_IDENTIFIER,
  MemoryCredentialStore,
  createMemoryCredentialStore,
  type CredentialAccessPolicy,
  type CredentialStore,
  type MemoryCredentialStoreConfig,
  type StoreResult,
} from './credential-store.js';
export {
  FileCredentialStore,
  createFileCredentialStore,
  type FileCredentialStoreConfig,
} from './file-credential-store.js';

// Encryption service
export {
  EncryptionService,
  createEncryptionService,
  type EncryptionServiceConfig,
} from './encryption-service.js';

// Clipboard payload codec
export { SecureClipboardCodec, createSecureClipboardCodec } from './payload-codec.js';
