import { writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  AuthenticationError,
  DecryptionError,
  DocumentNotFoundError,
  IntegrityError,
  KeyNotFoundError,
  SessionLoadError,
} from '@/core/errors.js';
import { CustodyMode } from '@/core/types.js';
import type { Keypair } from '@/core/types.js';
import { createMemoryConfigStore } from '@/config/config-store.js';
import { defaultConfig } from '@/config/paths.js';
import type { ConfigStore } from '@/config/types.js';
import { createScratchSpace } from '@/infrastructure/scratch-space.js';
import { createKeyStore } from '@/keys/key-store.js';
import { createNativeKeyBackend } from '@/keys/native-backend.js';
import type { KeyStore } from '@/keys/types.js';
import { createSilentLogger } from '@/observability/logger.js';
import { createSecretCodec } from '@/secrets/codec.js';
import { createDocumentStore } from '@/secrets/document-store.js';
import { createNativeSealer } from '@/secrets/native-sealer.js';
import { createTestKeypair } from '@/testing/fixtures/keys.js';
import { createTestHome, createTestPrompter } from '@/testing/helpers/index.js';
import type { TestHome, TestPrompter } from '@/testing/helpers/index.js';
import { createMemoryVault } from '@/vault/memory-vault.js';
import { createSessionLoader } from './session-loader.js';
import type { SessionLoader } from './types.js';

const codec = createSecretCodec(createNativeSealer());
const documents = createDocumentStore(codec);

let home: TestHome;
let configStore: ConfigStore;
let prompter: TestPrompter;
let keyStore: KeyStore;
let keypair: Keypair;

function loader(custodyOverride?: CustodyMode): SessionLoader {
  return createSessionLoader({
    keyStore,
    documents,
    codec,
    configStore,
    resolveDocument: (customPath) => customPath ?? join(home.path, 'secrets', 'secrets.env.enc'),
    ...(custodyOverride !== undefined ? { custodyOverride } : {}),
    clock: () => new Date('2026-03-04T05:06:07.000Z'),
    logger: createSilentLogger(),
  });
}

async function writeDocument(name: string, recipient: string): Promise<string> {
  const path = join(home.path, 'secrets', name);
  await documents.write(path, await codec.encryptDocument({ API_KEY: 'test-secret', PORT: '8080' }, recipient));
  return path;
}

async function loadError(session: SessionLoader, path?: string): Promise<SessionLoadError> {
  const result = await session.load(path);
  if (result.ok) throw new Error('expected the load to fail');
  return result.error;
}

beforeEach(async () => {
  home = await createTestHome();
  configStore = createMemoryConfigStore(defaultConfig(home.path));
  prompter = createTestPrompter({ passphrases: ['test-passphrase'] });
  keyStore = createKeyStore({
    backend: createNativeKeyBackend(),
    vault: createMemoryVault({ prompter, passphrase: 'test-passphrase' }),
    vaultEntry: { entryName: 'envkeep-encryption-key', attachmentName: 'key.txt' },
    keyFile: join(home.path, 'key.txt'),
    configStore,
    codec,
    documents,
    scratch: createScratchSpace({ root: home.path }),
    logger: createSilentLogger(),
  });
  keypair = createTestKeypair();
});

afterEach(async () => {
  await home.cleanup();
});

describe('createSessionLoader', () => {
  it('loads the default document with the on-disk key', async () => {
    await keyStore.store(keypair, CustodyMode.OnDisk);
    const path = await writeDocument('secrets.env.enc', keypair.publicIdentifier);

    const result = await loader().load();

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.documentPath).toBe(path);
    expect(result.value.variables).toEqual({ API_KEY: 'test-secret', PORT: '8080' });
    expect(result.value.loadedAt).toEqual(new Date('2026-03-04T05:06:07.000Z'));
    expect(result.value.id).toMatch(/^[A-Za-z0-9_-]{21}$/);
    expect(Object.isFrozen(result.value.variables)).toBe(true);
  });

  it('loads a custom document with the vault-only key named in config', async () => {
    await keyStore.store(keypair, CustodyMode.VaultOnly);
    await configStore.write({ ...(await configStore.read()), custody: 'vault-only' });
    const path = await writeDocument('other.env.enc', keypair.publicIdentifier);

    const result = await loader().load(path);

    expect(result.ok && result.value.variables).toEqual({ API_KEY: 'test-secret', PORT: '8080' });
    expect(prompter.prompts.map((p) => p.kind)).toEqual(['passphrase']);
  });

  it('follows the custody override over config', async () => {
    await keyStore.store(keypair, CustodyMode.VaultOnly);
    await writeDocument('secrets.env.enc', keypair.publicIdentifier);

    expect((await loader().load()).ok).toBe(false);
    expect((await loader(CustodyMode.VaultOnly).load()).ok).toBe(true);
  });

  it('checks the document before asking the vault for anything', async () => {
    await keyStore.store(keypair, CustodyMode.VaultOnly);
    await configStore.write({ ...(await configStore.read()), custody: 'vault-only' });

    const error = await loadError(loader());

    expect(error.cause).toBeInstanceOf(DocumentNotFoundError);
    expect(prompter.prompts).toEqual([]);
  });

  it.each([
    ['a missing key', KeyNotFoundError, async (): Promise<string | undefined> => {
      await writeDocument('secrets.env.enc', keypair.publicIdentifier);
      return undefined;
    }],
    ['a key that is not a recipient', DecryptionError, async (): Promise<string | undefined> => {
      await keyStore.store(keypair, CustodyMode.OnDisk);
      await writeDocument('secrets.env.enc', createTestKeypair().publicIdentifier);
      return undefined;
    }],
    ['a corrupted document', IntegrityError, async (): Promise<string | undefined> => {
      await keyStore.store(keypair, CustodyMode.OnDisk);
      const path = join(home.path, 'corrupted.env.enc');
      await writeFile(path, 'garbage');
      return path;
    }],
  ])('returns one SessionLoadError for %s', async (_label, causeType, arrange) => {
    const path = await arrange();

    const error = await loadError(loader(), path);

    expect(error).toBeInstanceOf(SessionLoadError);
    expect(error.cause).toBeInstanceOf(causeType);
  });

  it('passes vault authentication failures through as the cause', async () => {
    const vaultKeyStore = createKeyStore({
      backend: createNativeKeyBackend(),
      vault: createMemoryVault({ prompter: createTestPrompter({ passphrases: ['wrong'] }), passphrase: 'test-passphrase' }),
      vaultEntry: { entryName: 'envkeep-encryption-key', attachmentName: 'key.txt' },
      keyFile: join(home.path, 'key.txt'),
      configStore,
      codec,
      documents,
      scratch: createScratchSpace({ root: home.path }),
      logger: createSilentLogger(),
    });
    await writeDocument('secrets.env.enc', keypair.publicIdentifier);
    keyStore = vaultKeyStore;

    const error = await loadError(loader(CustodyMode.VaultOnly));

    expect(error.cause).toBeInstanceOf(AuthenticationError);
    expect(error.exitCode).toBe(5);
  });
});
