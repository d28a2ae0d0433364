import { readFile, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  AuthenticationError,
  EntryNotFoundError,
  IntegrityError,
  VaultMissingError,
} from '@/core/errors.js';
import { createSilentLogger } from '@/observability/logger.js';
import { TEST_SCRYPT_PARAMS } from '@/testing/fixtures/keys.js';
import { createTestHome, createTestPrompter } from '@/testing/helpers/index.js';
import type { TestHome, TestPrompter } from '@/testing/helpers/index.js';
import { createFileVault } from './file-vault.js';
import type { VaultAdapter } from './types.js';

const ENTRY = 'envkeep-encryption-key';
const ATTACHMENT = 'key.txt';
const PAYLOAD = Buffer.from('EK-SECRET-KEY-test-secret\n');

let home: TestHome;
let path: string;

function vaultWith(passphrase: string): { vault: VaultAdapter; prompter: TestPrompter } {
  const prompter = createTestPrompter({ passphrases: [passphrase] });
  const vault = createFileVault({ path, prompter, kdf: TEST_SCRYPT_PARAMS, logger: createSilentLogger() });
  return { vault, prompter };
}

async function createVaultWithKey(): Promise<void> {
  await vaultWith('test-passphrase').vault.importAttachment(ENTRY, ATTACHMENT, PAYLOAD, { createIfMissing: true });
}

beforeEach(async () => {
  home = await createTestHome();
  path = join(home.path, 'nested', 'vault.json');
});

afterEach(async () => {
  await home.cleanup();
});

describe('createFileVault', () => {
  it('creates the vault on request and reads the attachment back', async () => {
    const { vault, prompter } = vaultWith('test-passphrase');
    expect(await vault.exists()).toBe(false);

    await vault.importAttachment(ENTRY, ATTACHMENT, PAYLOAD, { createIfMissing: true });

    expect(await vault.exists()).toBe(true);
    expect((await stat(path)).mode & 0o777).toBe(0o600);
    expect(prompter.prompts).toEqual([
      { kind: 'passphrase', message: `New passphrase for vault ${path}`, confirm: true },
    ]);
    expect(await vault.exportAttachment(ENTRY, ATTACHMENT)).toEqual(PAYLOAD);
  });

  it('keeps the payload out of the file in plaintext', async () => {
    await createVaultWithKey();
    const text = await readFile(path, 'utf-8');

    expect(text).not.toContain('test-secret');
    expect(text).not.toContain(PAYLOAD.toString('base64'));
    expect(JSON.parse(text)).toMatchObject({ format: 'envkeep-vault/v1', kdf: { name: 'scrypt', N: 1024 } });
  });

  it('does not create a missing vault implicitly', async () => {
    const { vault, prompter } = vaultWith('test-passphrase');

    await expect(vault.importAttachment(ENTRY, ATTACHMENT, PAYLOAD)).rejects.toBeInstanceOf(VaultMissingError);
    await expect(vault.exportAttachment(ENTRY, ATTACHMENT)).rejects.toBeInstanceOf(VaultMissingError);
    expect(prompter.prompts).toEqual([]);
    expect(await vault.exists()).toBe(false);
  });

  it('authenticates before looking anything up', async () => {
    await createVaultWithKey();
    const { vault } = vaultWith('wrong-passphrase');

    await expect(vault.exportAttachment(ENTRY, ATTACHMENT)).rejects.toBeInstanceOf(AuthenticationError);
    await expect(vault.exportAttachment('no-such-entry', ATTACHMENT)).rejects.toBeInstanceOf(AuthenticationError);
  });

  it('reports a missing entry only after authentication', async () => {
    await createVaultWithKey();
    const { vault } = vaultWith('test-passphrase');

    await expect(vault.exportAttachment('no-such-entry', ATTACHMENT)).rejects.toBeInstanceOf(EntryNotFoundError);
    await expect(vault.exportAttachment(ENTRY, 'other.txt')).rejects.toBeInstanceOf(EntryNotFoundError);
  });

  it('rejects a wrong passphrase on import without changing the file', async () => {
    await createVaultWithKey();
    const before = await readFile(path, 'utf-8');

    await expect(
      vaultWith('wrong-passphrase').vault.importAttachment(ENTRY, 'key.txt.next', Buffer.from('test-secret')),
    ).rejects.toBeInstanceOf(AuthenticationError);
    expect(await readFile(path, 'utf-8')).toBe(before);
  });

  it('keeps other attachments when one is added or removed', async () => {
    await createVaultWithKey();
    const { vault } = vaultWith('test-passphrase');

    await vault.importAttachment(ENTRY, 'key.txt.next', Buffer.from('staged'));
    expect((await vault.exportAttachment(ENTRY, 'key.txt.next')).toString()).toBe('staged');

    await vault.removeAttachment(ENTRY, 'key.txt.next');
    await expect(vault.exportAttachment(ENTRY, 'key.txt.next')).rejects.toBeInstanceOf(EntryNotFoundError);
    expect(await vault.exportAttachment(ENTRY, ATTACHMENT)).toEqual(PAYLOAD);
  });

  it('treats removing an absent attachment as done', async () => {
    await createVaultWithKey();
    await expect(vaultWith('test-passphrase').vault.removeAttachment(ENTRY, 'absent.txt')).resolves.toBeUndefined();
  });

  it('rejects a file that is not a vault', async () => {
    await createVaultWithKey();
    await writeFile(path, '{"format":"something-else"}');

    await expect(vaultWith('test-passphrase').vault.exportAttachment(ENTRY, ATTACHMENT)).rejects.toBeInstanceOf(
      IntegrityError,
    );
  });
});
