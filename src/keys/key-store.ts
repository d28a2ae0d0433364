/**
 * KeyStore — where the secret half of the keypair lives, per custody mode.
 *
 * On-disk custody keeps a 0600 key file; vault-only custody keeps the key
 * only in the vault and exports it into memory for each operation.
 * Rotation never discards the old key before documents are verified
 * decryptable with the new one.
 */
import { readFile, rename, rm, stat } from 'node:fs/promises';
import {
  IntegrityError,
  KeyExistsError,
  KeyNotFoundError,
  PermissionError,
  RotationIncompleteError,
  ValidationError,
  hasErrnoCode,
  toError,
} from '@/core/errors.js';
import { CustodyMode } from '@/core/types.js';
import type { Keypair, ScopedSecret, SecretDocument, SecretMapping } from '@/core/types.js';
import type { ConfigStore } from '@/config/types.js';
import { activeIdentifiers, registerIdentifier, retireIdentifiers } from '@/config/identifier-registry.js';
import { atomicWriteFile, pathExists } from '@/infrastructure/atomic-fs.js';
import type { ScratchSpace } from '@/infrastructure/scratch-space.js';
import type { Logger } from '@/observability/logger.js';
import { createLogger } from '@/observability/logger.js';
import type { DocumentStore, SecretCodec } from '@/secrets/types.js';
import type { VaultAdapter, VaultSlot } from '@/vault/types.js';
import { formatKeyFile, parseKeyFile } from './key-file.js';
import { createScopedSecret } from './scoped-secret.js';
import type { KeyBackend, KeyStore, StoreOptions } from './types.js';

const KEY_FILE_MODE = 0o600;
const STAGED_SUFFIX = '.next';

export interface KeyStoreDeps {
  backend: KeyBackend;
  vault: VaultAdapter;
  vaultEntry: VaultSlot;
  /** On-disk key location. */
  keyFile: string;
  configStore: ConfigStore;
  codec: SecretCodec;
  documents: DocumentStore;
  scratch: ScratchSpace;
  /** Reject key files readable by group or others. Default: true except on Windows. */
  enforcePermissions?: boolean;
  clock?: () => Date;
  logger?: Logger;
}

function sameMapping(a: SecretMapping, b: SecretMapping): boolean {
  const aKeys = Object.keys(a);
  if (aKeys.length !== Object.keys(b).length) return false;
  return aKeys.every((key) => Object.prototype.hasOwnProperty.call(b, key) && a[key] === b[key]);
}

/**
 * Create a KeyStore.
 */
export function createKeyStore(deps: KeyStoreDeps): KeyStore {
  const { backend, vault, vaultEntry, keyFile, configStore, codec, documents, scratch } = deps;
  const enforcePermissions = deps.enforcePermissions ?? process.platform !== 'win32';
  const clock = deps.clock ?? ((): Date => new Date());
  const logger = deps.logger ?? createLogger({ name: 'key-store' });
  const stagedKeyFile = `${keyFile}${STAGED_SUFFIX}`;
  const stagedAttachment = `${vaultEntry.attachmentName}${STAGED_SUFFIX}`;

  async function keypairFromContent(content: Buffer, location: string): Promise<Keypair> {
    const parsed = parseKeyFile(content);
    if (!parsed) {
      throw new IntegrityError(`Key material at ${location} contains no secret identity`, { location });
    }
    const publicIdentifier =
      parsed.publicIdentifier ?? (await backend.derivePublicIdentifier(parsed.secretMaterial));
    return { publicIdentifier, secretMaterial: parsed.secretMaterial };
  }

  async function readKeyFile(path: string): Promise<Keypair> {
    let mode: number;
    try {
      mode = (await stat(path)).mode;
    } catch (error: unknown) {
      if (hasErrnoCode(error, 'ENOENT')) throw new KeyNotFoundError(path);
      throw error;
    }
    if (enforcePermissions && (mode & 0o077) !== 0) {
      throw new PermissionError(path, mode);
    }

    const content = await readFile(path);
    try {
      return await keypairFromContent(content, path);
    } finally {
      content.fill(0);
    }
  }

  async function readVault(attachmentName: string): Promise<Keypair> {
    const payload = await vault.exportAttachment(vaultEntry.entryName, attachmentName);
    try {
      return await keypairFromContent(payload, `${vault.location} (${vaultEntry.entryName}/${attachmentName})`);
    } finally {
      payload.fill(0);
    }
  }

  async function writeKeyFile(path: string, keypair: Keypair): Promise<void> {
    const content = formatKeyFile(keypair, clock());
    try {
      await atomicWriteFile(path, content, { mode: KEY_FILE_MODE });
    } finally {
      content.fill(0);
    }
  }

  async function writeVault(attachmentName: string, keypair: Keypair, createIfMissing: boolean): Promise<void> {
    const content = formatKeyFile(keypair, clock());
    try {
      await vault.importAttachment(vaultEntry.entryName, attachmentName, content, { createIfMissing });
    } finally {
      content.fill(0);
    }
  }

  function scope(keypair: Keypair, keyFilePath?: string): ScopedSecret {
    return createScopedSecret(keypair, { keyFilePath, scratch });
  }

  async function resolve(mode: CustodyMode): Promise<ScopedSecret> {
    const onDisk = mode === CustodyMode.OnDisk;
    const keypair = onDisk ? await readKeyFile(keyFile) : await readVault(vaultEntry.attachmentName);
    try {
      logger.debug('Resolved key', { component: 'key-store', custody: mode, publicIdentifier: keypair.publicIdentifier });
      return scope(keypair, onDisk ? keyFile : undefined);
    } finally {
      keypair.secretMaterial.fill(0);
    }
  }

  async function withSecret<T>(mode: CustodyMode, fn: (secret: ScopedSecret) => Promise<T>): Promise<T> {
    const secret = await resolve(mode);
    try {
      return await fn(secret);
    } finally {
      await secret.release();
    }
  }

  async function store(keypair: Keypair, mode: CustodyMode, options?: StoreOptions): Promise<void> {
    if (mode === CustodyMode.OnDisk) {
      if (await pathExists(keyFile)) throw new KeyExistsError(keyFile);
      await writeKeyFile(keyFile, keypair);
    } else {
      await writeVault(vaultEntry.attachmentName, keypair, options?.createVault ?? false);
    }
    logger.info('Stored key', { component: 'key-store', custody: mode, publicIdentifier: keypair.publicIdentifier });
  }

  // ─── Rotation ─────────────────────────────────────────────────

  async function stage(keypair: Keypair, mode: CustodyMode): Promise<void> {
    if (mode === CustodyMode.OnDisk) {
      await writeKeyFile(stagedKeyFile, keypair);
    } else {
      await writeVault(stagedAttachment, keypair, false);
    }
  }

  async function unstage(mode: CustodyMode): Promise<void> {
    if (mode === CustodyMode.OnDisk) {
      await rm(stagedKeyFile, { force: true });
    } else {
      await vault.removeAttachment(vaultEntry.entryName, stagedAttachment);
    }
  }

  async function promote(keypair: Keypair, mode: CustodyMode): Promise<void> {
    if (mode === CustodyMode.OnDisk) {
      await rename(stagedKeyFile, keyFile);
    } else {
      await writeVault(vaultEntry.attachmentName, keypair, false);
      await vault.removeAttachment(vaultEntry.entryName, stagedAttachment);
    }
  }

  /** Best-effort undo; failures are logged and the original error is what surfaces. */
  async function rollback(step: string, undo: () => Promise<void>): Promise<void> {
    try {
      await undo();
    } catch (error: unknown) {
      logger.error('Rotation rollback step failed', {
        component: 'key-store',
        step,
        error: toError(error).message,
      });
    }
  }

  return {
    async generate() {
      const keypair = await backend.generate();
      logger.info('Generated keypair', {
        component: 'key-store',
        backend: backend.name,
        publicIdentifier: keypair.publicIdentifier,
      });
      return keypair;
    },

    resolve,

    withSecret,

    scope(keypair) {
      return scope(keypair);
    },

    store,

    async backup(options) {
      const keypair = await readKeyFile(keyFile);
      try {
        await writeVault(vaultEntry.attachmentName, keypair, options?.createVault ?? false);
      } finally {
        keypair.secretMaterial.fill(0);
      }
      logger.info('Backed up key to vault', {
        component: 'key-store',
        location: vault.location,
        publicIdentifier: keypair.publicIdentifier,
      });
      return keypair.publicIdentifier;
    },

    async restore() {
      if (await pathExists(keyFile)) throw new KeyExistsError(keyFile);
      const keypair = await readVault(vaultEntry.attachmentName);
      try {
        await writeKeyFile(keyFile, keypair);
      } finally {
        keypair.secretMaterial.fill(0);
      }
      logger.info('Restored key from vault', {
        component: 'key-store',
        location: vault.location,
        publicIdentifier: keypair.publicIdentifier,
      });
      return keypair.publicIdentifier;
    },

    async rotate(newKeypair, options) {
      const { mode, documentPaths } = options;
      const newIdentifier = newKeypair.publicIdentifier;
      if (!backend.isValidIdentifier(newIdentifier)) {
        throw new ValidationError(`"${newIdentifier}" is not a ${backend.name} public identifier`);
      }

      const oldSecret = await resolve(mode);
      const previousIdentifier = oldSecret.publicIdentifier;
      const newSecret = scope(newKeypair, mode === CustodyMode.OnDisk ? stagedKeyFile : undefined);
      const replaced: Array<{ path: string; original: SecretDocument }> = [];
      let staged = false;
      let configChanged = false;

      try {
        const originalConfig = await configStore.read();

        // Stage, register, re-encrypt and verify. Nothing here destroys the old key.
        try {
          await stage(newKeypair, mode);
          staged = true;

          const config = registerIdentifier(originalConfig, newIdentifier, clock());
          await configStore.write(config);
          configChanged = true;
          const recipients = activeIdentifiers(config).filter((id) => id !== previousIdentifier);

          const prepared: Array<{ path: string; original: SecretDocument; next: SecretDocument }> = [];
          for (const path of documentPaths) {
            const original = await documents.read(path);
            const mapping = await codec.decryptDocument(original, oldSecret);
            const next = await codec.encryptDocument(mapping, recipients);
            const check = await codec.decryptDocument(next, newSecret);
            if (!sameMapping(mapping, check)) {
              throw new IntegrityError(`Re-encrypted ${path} does not match the original`, { documentPath: path });
            }
            prepared.push({ path, original, next });
          }

          for (const { path, original, next } of prepared) {
            await documents.replace(path, next);
            replaced.push({ path, original });
          }
        } catch (error: unknown) {
          const cause = toError(error);
          for (const { path, original } of replaced.reverse()) {
            await rollback(`restore ${path}`, () => documents.write(path, original));
          }
          if (configChanged) await rollback('config', () => configStore.write(originalConfig));
          if (staged) await rollback('unstage', () => unstage(mode));
          throw new RotationIncompleteError('re-encrypt', `${cause.message}; the previous key is unchanged`, cause);
        }

        // Documents now open with the new key. Both identifiers stay active until the promote succeeds.
        try {
          await promote(newKeypair, mode);
        } catch (error: unknown) {
          const cause = toError(error);
          const stagedAt =
            mode === CustodyMode.OnDisk ? stagedKeyFile : `${vault.location} (${vaultEntry.entryName}/${stagedAttachment})`;
          throw new RotationIncompleteError(
            'promote',
            `documents were re-encrypted but the new key is still staged at ${stagedAt}: ${cause.message}`,
            cause,
          );
        }

        await configStore.write(retireIdentifiers(await configStore.read(), [previousIdentifier], clock()));
      } finally {
        await oldSecret.release();
        await newSecret.release();
      }

      logger.info('Rotated key', {
        component: 'key-store',
        custody: mode,
        previousIdentifier,
        newIdentifier,
        documents: documentPaths.length,
      });
      return { previousIdentifier, newIdentifier, documents: [...documentPaths] };
    },

    async addRecipient(identifier, options) {
      if (!backend.isValidIdentifier(identifier)) {
        throw new ValidationError(`"${identifier}" is not a ${backend.name} public identifier`, { identifier });
      }
      let recipients: readonly string[] = [];
      await withSecret(options.mode, async (secret) => {
        // The current key stays a recipient even if it was never registered.
        const current = registerIdentifier(await configStore.read(), secret.publicIdentifier, clock());
        const config = registerIdentifier(current, identifier, clock());
        recipients = activeIdentifiers(config);
        for (const path of options.documentPaths) {
          await documents.edit(path, secret, () => undefined, { recipients });
        }
        await configStore.write(config);
      });

      logger.info('Added recipient', {
        component: 'key-store',
        identifier,
        documents: options.documentPaths.length,
      });
      return recipients;
    },
  };
}
