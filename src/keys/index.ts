// Key custody — backends, key files and the key store
export type {
  AddRecipientOptions,
  KeyBackend,
  KeyStore,
  RotateOptions,
  RotationReport,
  StoreOptions,
} from './types.js';

export { createKeyStore } from './key-store.js';
export type { KeyStoreDeps } from './key-store.js';
export { createScopedSecret } from './scoped-secret.js';
export type { ScopedSecretOptions } from './scoped-secret.js';
export { formatKeyFile, parseKeyFile } from './key-file.js';
export type { ParsedKeyFile } from './key-file.js';
export { createNativeKeyBackend } from './native-backend.js';
export { createAgeKeyBackend, isAgeIdentifier } from './age-backend.js';
export type { AgeKeyBackendOptions } from './age-backend.js';
