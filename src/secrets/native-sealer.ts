/**
 * Built-in `envkeep/v1` document format.
 *
 * A random 32-byte file key seals the variables (AES-256-GCM, with the format
 * marker and every recipient stanza as associated data). For each recipient the file
 * key is wrapped with a key derived from an ephemeral X25519 agreement.
 * At rest the document is a JSON envelope; only the recipient identifiers are readable.
 */
import type { KeyObject } from 'node:crypto';
import { z } from 'zod';
import { DecryptionError, IntegrityError, ValidationError, toError } from '@/core/errors.js';
import type { ScopedSecret, SecretDocument, SecretMapping } from '@/core/types.js';
import {
  IDENTIFIER_PREFIX,
  decodeBase64,
  deriveWrapKey,
  generateEphemeral,
  identifierForPrivateKey,
  isNativeIdentifier,
  openBytes,
  privateKeyFromSecret,
  publicKeyFromIdentifier,
  publicKeyFromRaw,
  randomKey,
  rawPublicKey,
  sealBytes,
} from './crypto.js';
import { assertValidKey, assertValidValue } from './dotenv-format.js';
import type { DocumentSealer } from './types.js';

export const NATIVE_FORMAT = 'envkeep/v1';

const payloadSchema = z.object({
  iv: z.string(),
  authTag: z.string(),
  encryptedValue: z.string(),
});

const stanzaSchema = z.object({
  recipient: z.string().refine(isNativeIdentifier, 'not an envkeep public identifier'),
  ephemeralKey: z.string(),
  iv: z.string(),
  authTag: z.string(),
  wrappedKey: z.string(),
});

const envelopeSchema = z.object({
  format: z.literal(NATIVE_FORMAT),
  recipients: z.array(stanzaSchema).min(1),
  payload: payloadSchema,
});

const bodySchema = z.object({
  entries: z.array(z.tuple([z.string(), z.string()])),
});

type Envelope = z.infer<typeof envelopeSchema>;
type Stanza = z.infer<typeof stanzaSchema>;

function associatedData(stanzas: readonly Stanza[]): Buffer {
  const recipients = stanzas.map((s) => [s.recipient, s.ephemeralKey, s.iv, s.authTag, s.wrappedKey]);
  return Buffer.from(JSON.stringify({ format: NATIVE_FORMAT, recipients }), 'utf-8');
}

function parseEnvelope(text: string): Envelope {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    throw new IntegrityError('Secret document is not valid JSON (truncated or corrupted)');
  }
  const result = envelopeSchema.safeParse(raw);
  if (!result.success) {
    throw new IntegrityError('Secret document structure is invalid', {
      issues: result.error.issues.map((i) => i.path.join('.')),
    });
  }
  return result.data;
}

function wrapFileKey(fileKey: Buffer, recipient: string): Stanza {
  const publicKey = publicKeyFromIdentifier(recipient);
  if (!publicKey) {
    throw new ValidationError(`"${recipient}" is not an envkeep public identifier`, { recipient });
  }
  const ephemeral = generateEphemeral();
  const ephemeralRaw = rawPublicKey(ephemeral.publicKey);
  const wrapKey = deriveWrapKey(ephemeral.privateKey, publicKey, ephemeralRaw, rawPublicKey(publicKey));
  try {
    const wrapped = sealBytes(fileKey, wrapKey, Buffer.from(recipient, 'utf-8'));
    return {
      recipient,
      ephemeralKey: ephemeralRaw.toString('base64'),
      iv: wrapped.iv,
      authTag: wrapped.authTag,
      wrappedKey: wrapped.encryptedValue,
    };
  } finally {
    wrapKey.fill(0);
  }
}

/** Recover the file key from one stanza; throws when it does not verify under our key. */
function unwrapFileKey(stanza: Stanza, privateKey: KeyObject, ownIdentifier: string): Buffer {
  const ephemeralRaw = decodeBase64(stanza.ephemeralKey);
  if (!ephemeralRaw || ephemeralRaw.length !== 32) {
    throw new Error('Malformed ephemeral key');
  }
  const wrapKey = deriveWrapKey(
    privateKey,
    publicKeyFromRaw(ephemeralRaw),
    ephemeralRaw,
    Buffer.from(ownIdentifier.slice(IDENTIFIER_PREFIX.length), 'base64url'),
  );
  try {
    return openBytes(
      { encryptedValue: stanza.wrappedKey, iv: stanza.iv, authTag: stanza.authTag },
      wrapKey,
      Buffer.from(ownIdentifier, 'utf-8'),
    );
  } finally {
    wrapKey.fill(0);
  }
}

/**
 * Create the built-in sealer.
 */
export function createNativeSealer(): DocumentSealer {
  function parse(text: string): SecretDocument {
    const envelope = parseEnvelope(text);
    return {
      format: NATIVE_FORMAT,
      recipients: envelope.recipients.map((r) => r.recipient),
      ciphertext: text,
    };
  }

  return {
    format: NATIVE_FORMAT,

    parse,

    async seal(mapping: SecretMapping, recipients: readonly string[]): Promise<SecretDocument> {
      if (recipients.length === 0) {
        throw new ValidationError('At least one recipient identifier is required to encrypt');
      }
      const unique = [...new Set(recipients)];
      for (const recipient of unique) {
        if (!isNativeIdentifier(recipient)) {
          throw new ValidationError(`"${recipient}" is not an envkeep public identifier`, { recipient });
        }
      }

      const entries = Object.entries(mapping);
      for (const [key, value] of entries) {
        assertValidKey(key);
        assertValidValue(key, value);
      }

      const body = Buffer.from(JSON.stringify({ entries }), 'utf-8');
      const fileKey = randomKey();
      try {
        const stanzas = unique.map((recipient) => wrapFileKey(fileKey, recipient));
        const envelope: Envelope = {
          format: NATIVE_FORMAT,
          recipients: stanzas,
          payload: sealBytes(body, fileKey, associatedData(stanzas)),
        };
        return parse(`${JSON.stringify(envelope, null, 2)}\n`);
      } finally {
        fileKey.fill(0);
        body.fill(0);
      }
    },

    async open(document: SecretDocument, secret: ScopedSecret): Promise<SecretMapping> {
      const envelope = parseEnvelope(document.ciphertext);

      const privateKey = privateKeyFromSecret(secret.secretMaterial);
      if (!privateKey) {
        throw new DecryptionError('Key material is not an envkeep identity');
      }
      const ownIdentifier = identifierForPrivateKey(privateKey);
      const ownStanza = envelope.recipients.find((r) => r.recipient === ownIdentifier);

      // A stanza whose recipient text was altered still unwraps with our key;
      // the payload AAD then rejects the altered list.
      const candidates = ownStanza ? [ownStanza] : envelope.recipients;
      let fileKey: Buffer | undefined;
      let lastError: Error | undefined;
      for (const stanza of candidates) {
        try {
          fileKey = unwrapFileKey(stanza, privateKey, ownIdentifier);
          break;
        } catch (error: unknown) {
          lastError = toError(error);
        }
      }

      if (!fileKey) {
        if (ownStanza) {
          throw new IntegrityError('Recipient stanza failed verification', { recipient: ownIdentifier }, lastError);
        }
        throw new DecryptionError(`Document is not sealed for key ${ownIdentifier}`, {
          recipients: envelope.recipients.map((r) => r.recipient),
        });
      }

      let body: Buffer;
      try {
        body = openBytes(envelope.payload, fileKey, associatedData(envelope.recipients));
      } catch (error: unknown) {
        throw new IntegrityError('Document ciphertext failed verification', undefined, toError(error));
      } finally {
        fileKey.fill(0);
      }

      try {
        const parsed = bodySchema.safeParse(JSON.parse(body.toString('utf-8')));
        if (!parsed.success) {
          throw new IntegrityError('Decrypted document body is malformed');
        }
        return Object.fromEntries(parsed.data.entries);
      } catch (error: unknown) {
        if (error instanceof IntegrityError) throw error;
        throw new IntegrityError('Decrypted document body is malformed', undefined, toError(error));
      } finally {
        body.fill(0);
      }
    },
  };
}
