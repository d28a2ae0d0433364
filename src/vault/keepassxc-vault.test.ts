import { readFile, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  AuthenticationError,
  CommandFailedError,
  EntryNotFoundError,
  VaultMissingError,
} from '@/core/errors.js';
import { createScratchSpace } from '@/infrastructure/scratch-space.js';
import { createSilentLogger } from '@/observability/logger.js';
import { commandResult, createTestCommandRunner, createTestHome, createTestPrompter } from '@/testing/helpers/index.js';
import type { TestCommandRunner, TestHome } from '@/testing/helpers/index.js';
import { createKeePassXcVault } from './keepassxc-vault.js';
import type { VaultAdapter } from './types.js';

const ENTRY = 'envkeep-encryption-key';
const ATTACHMENT = 'key.txt';
const AUTH_STDERR = 'Error while reading the database: Invalid credentials were provided, please try again.';
const NOT_FOUND_STDERR = `Could not find entry with path ${ENTRY}.`;

let home: TestHome;
let path: string;
let runner: TestCommandRunner;

function vault(): VaultAdapter {
  return createKeePassXcVault({
    path,
    prompter: createTestPrompter({ passphrases: ['test-passphrase'] }),
    runner,
    scratch: createScratchSpace({ root: home.path }),
    logger: createSilentLogger(),
  });
}

beforeEach(async () => {
  home = await createTestHome();
  path = join(home.path, 'secrets.kdbx');
  runner = createTestCommandRunner();
});

afterEach(async () => {
  await home.cleanup();
});

describe('exportAttachment', () => {
  beforeEach(async () => {
    await writeFile(path, 'kdbx placeholder');
  });

  it('streams the attachment to stdout with the passphrase on stdin', async () => {
    runner.on('keepassxc-cli', () => commandResult('EK-SECRET-KEY-test-secret\n'));

    const payload = await vault().exportAttachment(ENTRY, ATTACHMENT);

    expect(payload.toString('utf-8')).toBe('EK-SECRET-KEY-test-secret\n');
    expect(runner.calls).toEqual([
      {
        command: 'keepassxc-cli',
        args: ['attachment-export', '--stdout', '-q', path, ENTRY, ATTACHMENT],
        input: 'test-passphrase\n',
        env: undefined,
      },
    ]);
  });

  it('maps invalid credentials to AuthenticationError', async () => {
    runner.on('keepassxc-cli', () => commandResult('', { exitCode: 1, stderr: AUTH_STDERR }));
    await expect(vault().exportAttachment(ENTRY, ATTACHMENT)).rejects.toBeInstanceOf(AuthenticationError);
  });

  it('maps a missing entry to EntryNotFoundError', async () => {
    runner.on('keepassxc-cli', () => commandResult('', { exitCode: 1, stderr: NOT_FOUND_STDERR }));
    await expect(vault().exportAttachment(ENTRY, ATTACHMENT)).rejects.toBeInstanceOf(EntryNotFoundError);
  });

  it('maps any other failure to CommandFailedError', async () => {
    runner.on('keepassxc-cli', () => commandResult('', { exitCode: 1, stderr: 'Segmentation fault' }));
    await expect(vault().exportAttachment(ENTRY, ATTACHMENT)).rejects.toBeInstanceOf(CommandFailedError);
  });
});

describe('importAttachment', () => {
  it('fails with VaultMissingError and runs nothing when the database is absent', async () => {
    runner.on('keepassxc-cli', () => commandResult(''));

    await expect(vault().importAttachment(ENTRY, ATTACHMENT, Buffer.from('x'))).rejects.toBeInstanceOf(
      VaultMissingError,
    );
    expect(runner.calls).toEqual([]);
  });

  it('creates the database and entry, then imports through a scratch file that is removed afterwards', async () => {
    let importedFrom = '';
    let importedContent = '';
    runner.on('keepassxc-cli', async (args) => {
      switch (args[0]) {
        case 'show':
          return commandResult('', { exitCode: 1, stderr: NOT_FOUND_STDERR });
        case 'attachment-import':
          importedFrom = args[args.length - 1] ?? '';
          importedContent = await readFile(importedFrom, 'utf-8');
          return commandResult('');
        default:
          return commandResult('');
      }
    });

    await vault().importAttachment(ENTRY, ATTACHMENT, Buffer.from('EK-SECRET-KEY-test-secret\n'), {
      createIfMissing: true,
    });

    expect(runner.calls.map((c) => c.args[0])).toEqual(['db-create', 'show', 'add', 'attachment-import']);
    expect(runner.calls[0]?.input).toBe('test-passphrase\ntest-passphrase\n');
    expect(runner.calls[3]?.args).toEqual(['attachment-import', '-f', '-q', path, ENTRY, ATTACHMENT, importedFrom]);
    expect(importedContent).toBe('EK-SECRET-KEY-test-secret\n');
    await expect(stat(importedFrom)).rejects.toMatchObject({ code: 'ENOENT' });
  });

  it('skips adding an entry that already exists', async () => {
    await writeFile(path, 'kdbx placeholder');
    runner.on('keepassxc-cli', () => commandResult(''));

    await vault().importAttachment(ENTRY, ATTACHMENT, Buffer.from('x'));

    expect(runner.calls.map((c) => c.args[0])).toEqual(['show', 'attachment-import']);
  });

  it('stops at authentication before creating an entry', async () => {
    await writeFile(path, 'kdbx placeholder');
    runner.on('keepassxc-cli', () => commandResult('', { exitCode: 1, stderr: AUTH_STDERR }));

    await expect(vault().importAttachment(ENTRY, ATTACHMENT, Buffer.from('x'))).rejects.toBeInstanceOf(
      AuthenticationError,
    );
    expect(runner.calls.map((c) => c.args[0])).toEqual(['show']);
  });
});

describe('removeAttachment', () => {
  it('treats an absent attachment as removed', async () => {
    await writeFile(path, 'kdbx placeholder');
    runner.on('keepassxc-cli', () => commandResult('', { exitCode: 1, stderr: 'No attachment named key.txt.next' }));

    await expect(vault().removeAttachment(ENTRY, 'key.txt.next')).resolves.toBeUndefined();
  });
});
