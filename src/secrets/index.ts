/**
 * Secrets module — encrypted dotenv documents.
 * @module secrets
 */
export type { DocumentMutator, DocumentSealer, DocumentStore, EditOptions, SecretCodec } from './types.js';
export { createSecretCodec } from './codec.js';
export { createDocumentStore } from './document-store.js';
export { NATIVE_FORMAT, createNativeSealer } from './native-sealer.js';
export { SOPS_FORMAT, createSopsSealer, formatSopsDotenv, parseSopsDotenv } from './sops-sealer.js';
export type { SopsSealerOptions } from './sops-sealer.js';
export { formatDotenv, isValidKey, parseDotenv } from './dotenv-format.js';
export { isNativeIdentifier } from './crypto.js';
export type { EncryptedPayload } from './crypto.js';
