import { describe, expect, it } from 'vitest';
import { ValidationError } from '@/core/errors.js';
import { createNativeKeyBackend } from './native-backend.js';

describe('createNativeKeyBackend', () => {
  const backend = createNativeKeyBackend();

  it('needs no external tools', () => {
    expect(backend.requiredTools).toEqual([]);
  });

  it('generates distinct keypairs whose identifier derives from the secret', async () => {
    const first = await backend.generate();
    const second = await backend.generate();

    expect(first.publicIdentifier).not.toBe(second.publicIdentifier);
    expect(backend.isValidIdentifier(first.publicIdentifier)).toBe(true);
    expect(await backend.derivePublicIdentifier(first.secretMaterial)).toBe(first.publicIdentifier);
  });

  it('rejects material that is not an identity', async () => {
    await expect(backend.derivePublicIdentifier(Buffer.from('not a key'))).rejects.toBeInstanceOf(ValidationError);
  });

  it('rejects identifiers from other backends', () => {
    expect(backend.isValidIdentifier(`age1${'q'.repeat(58)}`)).toBe(false);
  });
});
