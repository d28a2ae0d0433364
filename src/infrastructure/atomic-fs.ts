/**
 * Atomic file writes and advisory file locks.
 * Readers never observe a partially written file: content goes to a sibling
 * temp file, is fsynced and size-checked, then renamed over the target.
 */
import { mkdir, open, rename, rm, stat } from 'node:fs/promises';
import { randomBytes } from 'node:crypto';
import { basename, dirname, join } from 'node:path';
import lockfile from 'proper-lockfile';
import { WriteError, hasErrnoCode, toError } from '@/core/errors.js';
import { createLogger } from '@/observability/logger.js';

const logger = createLogger({ name: 'atomic-fs' });

export interface AtomicWriteOptions {
  /** File mode for the written file. Default: 0o600 */
  mode?: number;
}

function tmpPathFor(targetPath: string): string {
  const suffix = randomBytes(8).toString('hex');
  return join(dirname(targetPath), `.${basename(targetPath)}.tmp-${suffix}`);
}

async function discard(path: string): Promise<void> {
  try {
    await rm(path, { force: true });
  } catch (error: unknown) {
    logger.warn('Could not remove temporary file', {
      component: 'atomic-fs',
      path,
      error: toError(error).message,
    });
  }
}

/**
 * Write content to `targetPath` atomically: temp file → fsync → size check → rename.
 * The parent directory is created (0700) when missing.
 *
 * @throws WriteError if any step fails; the previous file, if any, is left untouched.
 */
export async function atomicWriteFile(
  targetPath: string,
  content: string | Buffer,
  options?: AtomicWriteOptions,
): Promise<void> {
  const mode = options?.mode ?? 0o600;
  const bytes = typeof content === 'string' ? Buffer.from(content, 'utf-8') : content;
  const tmpPath = tmpPathFor(targetPath);

  try {
    await mkdir(dirname(targetPath), { recursive: true, mode: 0o700 });
  } catch (error: unknown) {
    throw new WriteError(targetPath, 'could not create parent directory', toError(error));
  }

  try {
    const handle = await open(tmpPath, 'wx', mode);
    try {
      await handle.writeFile(bytes);
      await handle.sync();
    } finally {
      await handle.close();
    }

    const written = await stat(tmpPath);
    if (written.size !== bytes.length) {
      throw new Error(`short write (${written.size.toString()} of ${bytes.length.toString()} bytes)`);
    }

    await rename(tmpPath, targetPath);
  } catch (error: unknown) {
    await discard(tmpPath);
    if (error instanceof WriteError) throw error;
    const cause = toError(error);
    throw new WriteError(targetPath, cause.message, cause);
  }
}

/**
 * Run `fn` while holding an advisory lock on `targetPath` (lock file `<target>.lock`).
 * Concurrent envkeep processes editing the same document serialize here.
 *
 * @throws WriteError if the lock cannot be acquired.
 */
export async function withFileLock<T>(targetPath: string, fn: () => Promise<T>): Promise<T> {
  let release: () => Promise<void>;
  try {
    release = await lockfile.lock(targetPath, {
      realpath: false,
      retries: { retries: 5, minTimeout: 100, maxTimeout: 1000 },
      lockfilePath: `${targetPath}.lock`,
    });
  } catch (error: unknown) {
    const cause = toError(error);
    throw new WriteError(targetPath, `could not acquire lock: ${cause.message}`, cause);
  }

  try {
    return await fn();
  } finally {
    try {
      await release();
    } catch (error: unknown) {
      logger.warn('Could not release file lock', {
        component: 'atomic-fs',
        path: targetPath,
        error: toError(error).message,
      });
    }
  }
}

/** True when `path` exists. Errors other than ENOENT propagate. */
export async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (error: unknown) {
    if (hasErrnoCode(error, 'ENOENT')) return false;
    throw error;
  }
}
