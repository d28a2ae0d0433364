/**
 * File vault — a single JSON file sealed with a key derived from the master
 * passphrase (scrypt → AES-256-GCM). The built-in vault for hosts without
 * KeePassXC.
 *
 * The whole body is one authenticated ciphertext, so the passphrase is
 * verified before any entry can be looked up.
 */
import { mkdir, readFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import {
  AuthenticationError,
  EntryNotFoundError,
  IntegrityError,
  VaultMissingError,
  hasErrnoCode,
  toError,
} from '@/core/errors.js';
import { atomicWriteFile, pathExists, withFileLock } from '@/infrastructure/atomic-fs.js';
import type { Logger } from '@/observability/logger.js';
import { createLogger } from '@/observability/logger.js';
import { DEFAULT_SCRYPT_PARAMS, derivePassphraseKey, openBytes, randomKey, sealBytes } from '@/secrets/crypto.js';
import type { ScryptParams } from '@/secrets/crypto.js';
import type { PassphrasePrompter } from '@/terminal/types.js';
import type { VaultAdapter } from './types.js';

const VAULT_FORMAT = 'envkeep-vault/v1';
const SALT_LENGTH = 16;

const vaultFileSchema = z.object({
  format: z.literal(VAULT_FORMAT),
  kdf: z.object({
    name: z.literal('scrypt'),
    salt: z.string(),
    N: z.number().int().positive(),
    r: z.number().int().positive(),
    p: z.number().int().positive(),
  }),
  payload: z.object({
    iv: z.string(),
    authTag: z.string(),
    encryptedValue: z.string(),
  }),
});

/** entryName → attachmentName → base64 payload */
const vaultBodySchema = z.object({
  entries: z.record(z.string(), z.record(z.string(), z.string())),
});

type VaultFile = z.infer<typeof vaultFileSchema>;
type VaultBody = z.infer<typeof vaultBodySchema>;

interface OpenedVault {
  body: VaultBody;
  key: Buffer;
  salt: Buffer;
  params: ScryptParams;
}

export interface FileVaultOptions {
  path: string;
  prompter: PassphrasePrompter;
  /** scrypt cost for newly created vaults. Existing vaults keep their own. */
  kdf?: ScryptParams;
  logger?: Logger;
}

/**
 * Create a VaultAdapter over a passphrase-sealed JSON file.
 */
export function createFileVault(options: FileVaultOptions): VaultAdapter {
  const { path, prompter } = options;
  const kdf = options.kdf ?? DEFAULT_SCRYPT_PARAMS;
  const logger = options.logger ?? createLogger({ name: 'file-vault' });

  async function readVaultFile(): Promise<VaultFile> {
    let text: string;
    try {
      text = await readFile(path, 'utf-8');
    } catch (error: unknown) {
      if (hasErrnoCode(error, 'ENOENT')) throw new VaultMissingError(path);
      throw error;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error: unknown) {
      throw new IntegrityError(`Vault file ${path} is not valid JSON`, { location: path }, toError(error));
    }
    const parsed = vaultFileSchema.safeParse(raw);
    if (!parsed.success) {
      throw new IntegrityError(`Vault file ${path} is not an envkeep vault`, { location: path });
    }
    return parsed.data;
  }

  /** Ask for the passphrase and decrypt. Wrong passphrase → AuthenticationError. */
  async function unlock(): Promise<OpenedVault> {
    const file = await readVaultFile();
    const passphrase = await prompter.passphrase(`Passphrase for vault ${path}`);
    const salt = Buffer.from(file.kdf.salt, 'base64');
    const params: ScryptParams = { N: file.kdf.N, r: file.kdf.r, p: file.kdf.p };
    const key = derivePassphraseKey(passphrase, salt, params);

    let plaintext: Buffer;
    try {
      plaintext = openBytes(file.payload, key, Buffer.from(VAULT_FORMAT, 'utf-8'));
    } catch (error: unknown) {
      key.fill(0);
      throw new AuthenticationError(path, toError(error));
    }

    try {
      const body = vaultBodySchema.safeParse(JSON.parse(plaintext.toString('utf-8')));
      if (!body.success) {
        key.fill(0);
        throw new IntegrityError(`Vault file ${path} has a malformed body`, { location: path });
      }
      return { body: body.data, key, salt, params };
    } finally {
      plaintext.fill(0);
    }
  }

  async function seal(vault: OpenedVault): Promise<void> {
    const plaintext = Buffer.from(JSON.stringify(vault.body), 'utf-8');
    try {
      const file: VaultFile = {
        format: VAULT_FORMAT,
        kdf: { name: 'scrypt', salt: vault.salt.toString('base64'), ...vault.params },
        payload: sealBytes(plaintext, vault.key, Buffer.from(VAULT_FORMAT, 'utf-8')),
      };
      await atomicWriteFile(path, `${JSON.stringify(file, null, 2)}\n`, { mode: 0o600 });
    } finally {
      plaintext.fill(0);
    }
  }

  async function create(): Promise<OpenedVault> {
    const passphrase = await prompter.passphrase(`New passphrase for vault ${path}`, { confirm: true });
    const salt = randomKey(SALT_LENGTH);
    logger.info('Creating vault', { component: 'file-vault', location: path });
    return { body: { entries: {} }, key: derivePassphraseKey(passphrase, salt, kdf), salt, params: kdf };
  }

  return {
    location: path,

    exists() {
      return pathExists(path);
    },

    async exportAttachment(entryName, attachmentName) {
      const vault = await unlock();
      vault.key.fill(0);
      const encoded = vault.body.entries[entryName]?.[attachmentName];
      if (encoded === undefined) {
        throw new EntryNotFoundError(entryName, attachmentName);
      }
      return Buffer.from(encoded, 'base64');
    },

    async importAttachment(entryName, attachmentName, payload, importOptions) {
      const present = await pathExists(path);
      if (!present && !importOptions?.createIfMissing) {
        throw new VaultMissingError(path);
      }
      if (!present) {
        await mkdir(dirname(path), { recursive: true, mode: 0o700 });
      }

      await withFileLock(path, async () => {
        const vault = present ? await unlock() : await create();
        try {
          const entry = vault.body.entries[entryName] ?? {};
          entry[attachmentName] = payload.toString('base64');
          vault.body.entries[entryName] = entry;
          await seal(vault);
        } finally {
          vault.key.fill(0);
        }
      });
      logger.info('Stored vault attachment', { component: 'file-vault', location: path, entryName, attachmentName });
    },

    async removeAttachment(entryName, attachmentName) {
      if (!(await pathExists(path))) {
        throw new VaultMissingError(path);
      }
      await withFileLock(path, async () => {
        const vault = await unlock();
        try {
          const entry = vault.body.entries[entryName];
          if (entry?.[attachmentName] === undefined) return;
          delete entry[attachmentName];
          await seal(vault);
        } finally {
          vault.key.fill(0);
        }
      });
    },
  };
}
