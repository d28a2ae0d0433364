/**
 * In-memory vault with the same authentication and lookup rules as the real
 * adapters. Used by tests and by embedders that manage persistence themselves.
 */
import { AuthenticationError, EntryNotFoundError, VaultMissingError } from '@/core/errors.js';
import type { PassphrasePrompter } from '@/terminal/types.js';
import type { VaultAdapter, VaultEntry } from './types.js';

export interface MemoryVaultOptions {
  prompter: PassphrasePrompter;
  /** Master passphrase of an existing vault. Omit to start without a database. */
  passphrase?: string;
  location?: string;
}

export interface MemoryVault extends VaultAdapter {
  /** Copies of every stored attachment, without authentication. */
  snapshot(): VaultEntry[];
}

export function createMemoryVault(options: MemoryVaultOptions): MemoryVault {
  const location = options.location ?? 'memory://vault';
  let masterPassphrase = options.passphrase;
  const entries = new Map<string, Map<string, Buffer>>();

  async function unlock(): Promise<void> {
    if (masterPassphrase === undefined) throw new VaultMissingError(location);
    const supplied = await options.prompter.passphrase(`Passphrase for vault ${location}`);
    if (supplied !== masterPassphrase) throw new AuthenticationError(location);
  }

  return {
    location,

    async exists() {
      return masterPassphrase !== undefined;
    },

    async exportAttachment(entryName, attachmentName) {
      await unlock();
      const payload = entries.get(entryName)?.get(attachmentName);
      if (!payload) throw new EntryNotFoundError(entryName, attachmentName);
      return Buffer.from(payload);
    },

    async importAttachment(entryName, attachmentName, payload, importOptions) {
      if (masterPassphrase === undefined) {
        if (!importOptions?.createIfMissing) throw new VaultMissingError(location);
        masterPassphrase = await options.prompter.passphrase(`New passphrase for vault ${location}`, {
          confirm: true,
        });
      } else {
        await unlock();
      }
      const entry = entries.get(entryName) ?? new Map<string, Buffer>();
      entry.set(attachmentName, Buffer.from(payload));
      entries.set(entryName, entry);
    },

    async removeAttachment(entryName, attachmentName) {
      await unlock();
      entries.get(entryName)?.delete(attachmentName);
    },

    snapshot() {
      const result: VaultEntry[] = [];
      for (const [entryName, attachments] of entries) {
        for (const [attachmentName, payload] of attachments) {
          result.push({ entryName, attachmentName, payload: Buffer.from(payload) });
        }
      }
      return result;
    },
  };
}
