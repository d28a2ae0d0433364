/**
 * Built-in key backend: X25519 identities generated in-process with node:crypto.
 */
import { GenerationError, ValidationError, toError } from '@/core/errors.js';
import {
  generateIdentity,
  identifierForPrivateKey,
  isNativeIdentifier,
  privateKeyFromSecret,
} from '@/secrets/crypto.js';
import type { KeyBackend } from './types.js';

export function createNativeKeyBackend(): KeyBackend {
  return {
    name: 'native',
    requiredTools: [],

    async generate() {
      try {
        const identity = generateIdentity();
        return {
          publicIdentifier: identity.publicIdentifier,
          secretMaterial: Buffer.from(identity.secretLine, 'utf-8'),
        };
      } catch (error: unknown) {
        throw new GenerationError('native', toError(error));
      }
    },

    async derivePublicIdentifier(secretMaterial) {
      const privateKey = privateKeyFromSecret(secretMaterial);
      if (!privateKey) {
        throw new ValidationError('Key material is not an envkeep identity');
      }
      return identifierForPrivateKey(privateKey);
    },

    isValidIdentifier: isNativeIdentifier,
  };
}
