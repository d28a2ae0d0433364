/**
 * SecretCodec — format-independent document operations built on a DocumentSealer.
 *
 * Every edit is decrypt → mutate a copy → re-encrypt into a new document.
 * The input document is never modified, so a failure at any step leaves it valid.
 */
import { ValidationError } from '@/core/errors.js';
import type { ScopedSecret, SecretDocument, SecretMapping } from '@/core/types.js';
import { createLogger } from '@/observability/logger.js';
import { assertValidKey, assertValidValue } from './dotenv-format.js';
import type { DocumentMutator, DocumentSealer, EditOptions, SecretCodec } from './types.js';

const logger = createLogger({ name: 'secret-codec' });

function toRecipientList(publicIdentifier: string | readonly string[]): readonly string[] {
  return typeof publicIdentifier === 'string' ? [publicIdentifier] : publicIdentifier;
}

function freezeMapping(variables: Map<string, string>): SecretMapping {
  const mapping: Record<string, string> = {};
  for (const [key, value] of variables) {
    assertValidKey(key);
    assertValidValue(key, value);
    mapping[key] = value;
  }
  return Object.freeze(mapping);
}

/**
 * Create a SecretCodec over the given sealer.
 */
export function createSecretCodec(sealer: DocumentSealer): SecretCodec {
  async function editInPlace(
    document: SecretDocument,
    secret: ScopedSecret,
    mutator: DocumentMutator,
    options?: EditOptions,
  ): Promise<SecretDocument> {
    const current = await sealer.open(document, secret);
    const variables = new Map(Object.entries(current));
    await mutator(variables);

    const recipients = options?.recipients ?? document.recipients;
    if (recipients.length === 0) {
      throw new ValidationError('Document has no recipients to re-encrypt for');
    }

    const next = await sealer.seal(freezeMapping(variables), recipients);
    logger.debug('Document re-encrypted', {
      component: 'secret-codec',
      format: sealer.format,
      recipients: next.recipients.length,
      variables: variables.size,
    });
    return next;
  }

  return {
    format: sealer.format,

    parse(text) {
      return sealer.parse(text);
    },

    async encryptDocument(mapping, publicIdentifier) {
      const recipients = toRecipientList(publicIdentifier);
      if (recipients.length === 0) {
        throw new ValidationError('At least one recipient identifier is required to encrypt');
      }
      return sealer.seal(freezeMapping(new Map(Object.entries(mapping))), recipients);
    },

    async decryptDocument(document, secret) {
      return Object.freeze({ ...(await sealer.open(document, secret)) });
    },

    editInPlace,

    async setField(document, secret, key, value) {
      assertValidKey(key);
      assertValidValue(key, value);
      return editInPlace(document, secret, (variables) => {
        variables.set(key, value);
      });
    },

    async removeField(document, secret, key) {
      assertValidKey(key);
      return editInPlace(document, secret, (variables) => {
        variables.delete(key);
      });
    },
  };
}
