/**
 * KeePassXC vault — drives `keepassxc-cli` against a .kdbx database.
 * The master passphrase goes to the CLI on stdin; attachments come back on stdout.
 * Imports stage the payload in a scratch file, since `attachment-import` only reads paths.
 */
import {
  AuthenticationError,
  CommandFailedError,
  EntryNotFoundError,
  VaultMissingError,
} from '@/core/errors.js';
import { pathExists } from '@/infrastructure/atomic-fs.js';
import type { CommandResult, CommandRunner } from '@/infrastructure/command-runner.js';
import { summarizeStderr } from '@/infrastructure/command-runner.js';
import type { ScratchSpace } from '@/infrastructure/scratch-space.js';
import type { Logger } from '@/observability/logger.js';
import { createLogger } from '@/observability/logger.js';
import type { PassphrasePrompter } from '@/terminal/types.js';
import type { VaultAdapter } from './types.js';

const CLI = 'keepassxc-cli';

const AUTH_FAILURE = /invalid credentials|wrong key|hmac mismatch|error while reading the database/i;
const NOT_FOUND = /could not find entry|no attachment|not found/i;

export interface KeePassXcVaultOptions {
  path: string;
  prompter: PassphrasePrompter;
  runner: CommandRunner;
  scratch: ScratchSpace;
  logger?: Logger;
}

function isNotFound(result: CommandResult): boolean {
  return result.exitCode !== 0 && !AUTH_FAILURE.test(result.stderr) && NOT_FOUND.test(result.stderr);
}

/**
 * Create a VaultAdapter backed by a KeePassXC database.
 */
export function createKeePassXcVault(options: KeePassXcVaultOptions): VaultAdapter {
  const { path, prompter, runner, scratch } = options;
  const logger = options.logger ?? createLogger({ name: 'keepassxc-vault' });

  async function run(args: readonly string[], passphrase: string): Promise<CommandResult> {
    return runner.run(CLI, args, { input: `${passphrase}\n` });
  }

  /** Map a failed invocation; authentication is checked first so a missing entry cannot be probed. */
  function failure(result: CommandResult, entryName: string, attachmentName: string): Error {
    if (AUTH_FAILURE.test(result.stderr)) return new AuthenticationError(path);
    if (NOT_FOUND.test(result.stderr)) return new EntryNotFoundError(entryName, attachmentName);
    return new CommandFailedError(CLI, result.exitCode, summarizeStderr(result.stderr));
  }

  async function requireDatabase(): Promise<void> {
    if (!(await pathExists(path))) throw new VaultMissingError(path);
  }

  async function createDatabase(): Promise<string> {
    const passphrase = await prompter.passphrase(`New passphrase for KeePassXC database ${path}`, { confirm: true });
    const result = await runner.run(CLI, ['db-create', '--set-password', '-q', path], {
      input: `${passphrase}\n${passphrase}\n`,
    });
    if (result.exitCode !== 0) {
      throw new CommandFailedError(CLI, result.exitCode, summarizeStderr(result.stderr));
    }
    logger.info('Created KeePassXC database', { component: 'keepassxc-vault', location: path });
    return passphrase;
  }

  async function ensureEntry(entryName: string, attachmentName: string, passphrase: string): Promise<void> {
    const shown = await run(['show', '-q', path, entryName], passphrase);
    if (shown.exitCode === 0) return;
    if (!isNotFound(shown)) throw failure(shown, entryName, attachmentName);

    const added = await run(['add', '-q', path, entryName], passphrase);
    if (added.exitCode !== 0) throw failure(added, entryName, attachmentName);
  }

  return {
    location: path,

    exists() {
      return pathExists(path);
    },

    async exportAttachment(entryName, attachmentName) {
      await requireDatabase();
      const passphrase = await prompter.passphrase(`Passphrase for KeePassXC database ${path}`);
      const result = await run(['attachment-export', '--stdout', '-q', path, entryName, attachmentName], passphrase);
      if (result.exitCode !== 0) {
        result.stdout.fill(0);
        throw failure(result, entryName, attachmentName);
      }
      return result.stdout;
    },

    async importAttachment(entryName, attachmentName, payload, importOptions) {
      let passphrase: string;
      if (await pathExists(path)) {
        passphrase = await prompter.passphrase(`Passphrase for KeePassXC database ${path}`);
      } else if (importOptions?.createIfMissing) {
        passphrase = await createDatabase();
      } else {
        throw new VaultMissingError(path);
      }

      await ensureEntry(entryName, attachmentName, passphrase);

      const staging = await scratch.allocate('vault');
      try {
        const file = await staging.writeFile(attachmentName, payload);
        const result = await run(['attachment-import', '-f', '-q', path, entryName, attachmentName, file], passphrase);
        if (result.exitCode !== 0) throw failure(result, entryName, attachmentName);
      } finally {
        await staging.dispose();
      }
      logger.info('Stored vault attachment', {
        component: 'keepassxc-vault',
        location: path,
        entryName,
        attachmentName,
      });
    },

    async removeAttachment(entryName, attachmentName) {
      await requireDatabase();
      const passphrase = await prompter.passphrase(`Passphrase for KeePassXC database ${path}`);
      const result = await run(['attachment-rm', '-q', path, entryName, attachmentName], passphrase);
      if (result.exitCode === 0 || isNotFound(result)) return;
      throw failure(result, entryName, attachmentName);
    },
  };
}
