/**
 * DocumentStore — encrypted documents on disk.
 * Mutations take an advisory lock on the document and replace it atomically,
 * so a crash or a failed re-encrypt leaves the previous file readable.
 */
import { readFile } from 'node:fs/promises';
import { DocumentNotFoundError, hasErrnoCode } from '@/core/errors.js';
import type { SecretDocument } from '@/core/types.js';
import { atomicWriteFile, pathExists, withFileLock } from '@/infrastructure/atomic-fs.js';
import { createLogger } from '@/observability/logger.js';
import type { DocumentStore, SecretCodec } from './types.js';

const logger = createLogger({ name: 'document-store' });

/** Encrypted documents are not secret, but there is no reason to share them. */
const DOCUMENT_MODE = 0o600;

/**
 * Create a file-backed DocumentStore for the given codec.
 */
export function createDocumentStore(codec: SecretCodec): DocumentStore {
  async function read(path: string): Promise<SecretDocument> {
    let text: string;
    try {
      text = await readFile(path, 'utf-8');
    } catch (error: unknown) {
      if (hasErrnoCode(error, 'ENOENT')) {
        throw new DocumentNotFoundError(path);
      }
      throw error;
    }
    return codec.parse(text);
  }

  async function write(path: string, document: SecretDocument): Promise<void> {
    await atomicWriteFile(path, document.ciphertext, { mode: DOCUMENT_MODE });
    logger.info('Secret document written', {
      component: 'document-store',
      documentPath: path,
      recipients: document.recipients.length,
    });
  }

  return {
    exists: pathExists,

    read,

    write,

    async edit(path, secret, mutator, options) {
      if (!(await pathExists(path))) {
        throw new DocumentNotFoundError(path);
      }
      return withFileLock(path, async () => {
        const current = await read(path);
        const next = await codec.editInPlace(current, secret, mutator, options);
        await write(path, next);
        return next;
      });
    },

    async replace(path, document) {
      if (!(await pathExists(path))) {
        throw new DocumentNotFoundError(path);
      }
      await withFileLock(path, () => write(path, document));
    },
  };
}
