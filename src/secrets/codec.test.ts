/**
 * Tests for the SecretCodec over the built-in envkeep/v1 format.
 */
import { describe, it, expect, afterEach } from 'vitest';
import { z } from 'zod';
import { DecryptionError, IntegrityError, ValidationError } from '@/core/errors.js';
import type { Keypair, ScopedSecret, SecretDocument } from '@/core/types.js';
import { createScratchSpace } from '@/infrastructure/scratch-space.js';
import { createScopedSecret } from '@/keys/scoped-secret.js';
import { createTestKeypair } from '@/testing/fixtures/keys.js';
import { createSecretCodec } from './codec.js';
import { createNativeSealer } from './native-sealer.js';

const codec = createSecretCodec(createNativeSealer());
const scratch = createScratchSpace();
const scopes: ScopedSecret[] = [];

const newKeypair = createTestKeypair;

function scoped(keypair: Keypair): ScopedSecret {
  const secret = createScopedSecret(keypair, { scratch });
  scopes.push(secret);
  return secret;
}

const envelopeShape = z
  .object({
    payload: z.object({ iv: z.string(), authTag: z.string(), encryptedValue: z.string() }),
  })
  .passthrough();

/** Flip one bit in a payload field. */
function tamper(document: SecretDocument, field: 'encryptedValue' | 'authTag'): SecretDocument {
  const envelope = envelopeShape.parse(JSON.parse(document.ciphertext));
  const bytes = Buffer.from(envelope.payload[field], 'base64');
  bytes[0] = (bytes[0] ?? 0) ^ 0x01;
  envelope.payload[field] = bytes.toString('base64');
  return { ...document, ciphertext: JSON.stringify(envelope) };
}

/** Flip one bit of the stored text, as a byte-level corruption of the file would. */
function flipBit(document: SecretDocument, bit: number): SecretDocument {
  const bytes = Buffer.from(document.ciphertext, 'utf-8');
  const index = Math.floor(bit / 8);
  bytes[index] = (bytes[index] ?? 0) ^ (1 << bit % 8);
  return { ...document, ciphertext: bytes.toString('utf-8') };
}

/** Replace the first stanza's recipient text. */
function withRecipient(document: SecretDocument, recipient: string): SecretDocument {
  const envelope = z
    .object({ recipients: z.array(z.object({ recipient: z.string() }).passthrough()) })
    .passthrough()
    .parse(JSON.parse(document.ciphertext));
  const [first] = envelope.recipients;
  if (first) first.recipient = recipient;
  return { ...document, ciphertext: JSON.stringify(envelope) };
}

afterEach(async () => {
  for (const secret of scopes.splice(0)) await secret.release();
});

// ─── Round trip ─────────────────────────────────────────────────

describe('encryptDocument / decryptDocument', () => {
  it('decrypts to exactly the encrypted mapping', async () => {
    const keypair = newKeypair();
    const mapping = { API_KEY: 'test-secret', MULTI: 'a\nb', EMPTY: '', SPACES: ' x ' };

    const document = await codec.encryptDocument(mapping, keypair.publicIdentifier);

    expect(document.format).toBe('envkeep/v1');
    expect(document.recipients).toEqual([keypair.publicIdentifier]);
    expect(document.ciphertext).not.toContain('test-secret');
    expect(await codec.decryptDocument(document, scoped(keypair))).toEqual(mapping);
  });

  it('handles an empty mapping', async () => {
    const keypair = newKeypair();
    const document = await codec.encryptDocument({}, keypair.publicIdentifier);
    expect(await codec.decryptDocument(document, scoped(keypair))).toEqual({});
  });

  it('lets every recipient decrypt', async () => {
    const first = newKeypair();
    const second = newKeypair();
    const document = await codec.encryptDocument({ A: '1' }, [first.publicIdentifier, second.publicIdentifier]);

    expect(await codec.decryptDocument(document, scoped(first))).toEqual({ A: '1' });
    expect(await codec.decryptDocument(document, scoped(second))).toEqual({ A: '1' });
  });

  it('parses stored text back into the same document', async () => {
    const keypair = newKeypair();
    const document = await codec.encryptDocument({ A: '1' }, keypair.publicIdentifier);
    expect(codec.parse(document.ciphertext)).toEqual(document);
  });

  it('rejects invalid keys and empty recipient lists', async () => {
    const keypair = newKeypair();
    await expect(codec.encryptDocument({ 'BAD=KEY': '1' }, keypair.publicIdentifier)).rejects.toThrow(ValidationError);
    await expect(codec.encryptDocument({ A: '1' }, [])).rejects.toThrow(ValidationError);
    await expect(codec.encryptDocument({ A: '1' }, 'age1notours')).rejects.toThrow(ValidationError);
  });
});

// ─── Failure modes ──────────────────────────────────────────────

describe('decryptDocument failures', () => {
  it('raises DecryptionError for a key that is not a recipient', async () => {
    const owner = newKeypair();
    const stranger = newKeypair();
    const document = await codec.encryptDocument({ A: '1' }, owner.publicIdentifier);

    await expect(codec.decryptDocument(document, scoped(stranger))).rejects.toThrow(DecryptionError);
  });

  it('raises IntegrityError when the ciphertext is modified', async () => {
    const keypair = newKeypair();
    const document = await codec.encryptDocument({ A: '1' }, keypair.publicIdentifier);
    const modified = tamper(document, 'encryptedValue');

    await expect(codec.decryptDocument(modified, scoped(keypair))).rejects.toThrow(IntegrityError);
  });

  it('raises IntegrityError when the auth tag is modified', async () => {
    const keypair = newKeypair();
    const document = await codec.encryptDocument({ A: '1' }, keypair.publicIdentifier);
    const modified = tamper(document, 'authTag');

    await expect(codec.decryptDocument(modified, scoped(keypair))).rejects.toThrow(IntegrityError);
  });

  it('raises IntegrityError for every single-bit flip of the stored text', async () => {
    const keypair = newKeypair();
    const secret = scoped(keypair);
    const document = await codec.encryptDocument({ A: '1' }, keypair.publicIdentifier);
    const bits = Buffer.byteLength(document.ciphertext, 'utf-8') * 8;

    const outcomes = new Map<string, number>();
    for (let bit = 0; bit < bits; bit++) {
      const outcome = await codec.decryptDocument(flipBit(document, bit), secret).then(
        () => 'decrypted',
        (error: unknown) => (error instanceof IntegrityError ? 'integrity' : String(error)),
      );
      outcomes.set(outcome, (outcomes.get(outcome) ?? 0) + 1);
    }

    expect(Object.fromEntries(outcomes)).toEqual({ integrity: bits });
  }, 60_000);

  it('raises IntegrityError when a stanza is relabelled to another recipient', async () => {
    const owner = newKeypair();
    const other = newKeypair();
    const document = await codec.encryptDocument({ A: '1' }, owner.publicIdentifier);
    const relabelled = withRecipient(document, other.publicIdentifier);

    await expect(codec.decryptDocument(relabelled, scoped(owner))).rejects.toThrow(IntegrityError);
  });

  it('rejects a recipient that is not a canonical identifier when parsing', async () => {
    const keypair = newKeypair();
    const document = await codec.encryptDocument({ A: '1' }, keypair.publicIdentifier);

    expect(() => codec.parse(withRecipient(document, 'ekpub1short').ciphertext)).toThrow(IntegrityError);
  });

  it('raises IntegrityError for truncated text', async () => {
    const keypair = newKeypair();
    const document = await codec.encryptDocument({ A: '1' }, keypair.publicIdentifier);
    const truncated = { ...document, ciphertext: document.ciphertext.slice(0, 40) };

    await expect(codec.decryptDocument(truncated, scoped(keypair))).rejects.toThrow(IntegrityError);
    expect(() => codec.parse(truncated.ciphertext)).toThrow(IntegrityError);
  });
});

// ─── Edits ──────────────────────────────────────────────────────

describe('setField / removeField / editInPlace', () => {
  it('sets a new key and overwrites an existing one', async () => {
    const keypair = newKeypair();
    const secret = scoped(keypair);
    const document = await codec.encryptDocument({ A: '1', B: '2' }, keypair.publicIdentifier);

    const added = await codec.setField(document, secret, 'C', '3');
    expect(await codec.decryptDocument(added, secret)).toEqual({ A: '1', B: '2', C: '3' });

    const overwritten = await codec.setField(added, secret, 'A', 'changed');
    expect(await codec.decryptDocument(overwritten, secret)).toEqual({ A: 'changed', B: '2', C: '3' });
  });

  it('leaves the input document untouched', async () => {
    const keypair = newKeypair();
    const secret = scoped(keypair);
    const document = await codec.encryptDocument({ A: '1' }, keypair.publicIdentifier);
    const before = document.ciphertext;

    await codec.setField(document, secret, 'A', '2');

    expect(document.ciphertext).toBe(before);
    expect(await codec.decryptDocument(document, secret)).toEqual({ A: '1' });
  });

  it('removes a key, and removing an absent key changes nothing', async () => {
    const keypair = newKeypair();
    const secret = scoped(keypair);
    const document = await codec.encryptDocument({ A: '1', B: '2' }, keypair.publicIdentifier);

    const removed = await codec.removeField(document, secret, 'A');
    expect(await codec.decryptDocument(removed, secret)).toEqual({ B: '2' });

    const unchanged = await codec.removeField(removed, secret, 'MISSING');
    expect(await codec.decryptDocument(unchanged, secret)).toEqual({ B: '2' });
  });

  it('re-encrypts for a new recipient list when asked', async () => {
    const owner = newKeypair();
    const teammate = newKeypair();
    const secret = scoped(owner);
    const document = await codec.encryptDocument({ A: '1' }, owner.publicIdentifier);

    const shared = await codec.editInPlace(document, secret, () => undefined, {
      recipients: [owner.publicIdentifier, teammate.publicIdentifier],
    });

    expect(shared.recipients).toEqual([owner.publicIdentifier, teammate.publicIdentifier]);
    expect(await codec.decryptDocument(shared, scoped(teammate))).toEqual({ A: '1' });
  });

  it('rejects a mutator that introduces an invalid key', async () => {
    const keypair = newKeypair();
    const document = await codec.encryptDocument({ A: '1' }, keypair.publicIdentifier);

    await expect(
      codec.editInPlace(document, scoped(keypair), (variables) => {
        variables.set('NOT VALID', 'x');
      }),
    ).rejects.toThrow(ValidationError);
  });
});
