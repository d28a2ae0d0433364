/**
 * Scratch space — private temporary directories for key material that a
 * subprocess can only read from a path.
 *
 * Every directory is 0700, every file 0600. Directories are tracked in a
 * process-wide registry so they are removed on dispose, on normal exit, and
 * on SIGINT/SIGTERM/SIGHUP.
 */
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { toError } from '@/core/errors.js';
import { createLogger } from '@/observability/logger.js';

const logger = createLogger({ name: 'scratch-space' });

const liveDirectories = new Set<string>();

export interface ScratchDirectory {
  readonly path: string;
  readonly disposed: boolean;
  /** Write a 0600 file inside the directory and return its path. */
  writeFile(name: string, content: Buffer | string): Promise<string>;
  /** Overwrite written files with zeros, then remove the directory. Idempotent. */
  dispose(): Promise<void>;
}

export interface ScratchSpace {
  readonly root: string;
  allocate(purpose: string): Promise<ScratchDirectory>;
}

export interface ScratchSpaceOptions {
  /** Parent directory for scratch directories. Default: os.tmpdir() */
  root?: string;
}

/**
 * Create a scratch space rooted at `options.root`.
 */
export function createScratchSpace(options?: ScratchSpaceOptions): ScratchSpace {
  const root = options?.root ?? tmpdir();

  return {
    root,

    async allocate(purpose: string): Promise<ScratchDirectory> {
      const path = await mkdtemp(join(root, `envkeep-${purpose}-`));
      liveDirectories.add(path);
      const files = new Map<string, number>();
      let disposed = false;

      return {
        path,

        get disposed() {
          return disposed;
        },

        async writeFile(name: string, content: Buffer | string): Promise<string> {
          if (disposed) {
            throw new Error(`Scratch directory ${path} was already disposed`);
          }
          const filePath = join(path, name);
          const bytes = typeof content === 'string' ? Buffer.from(content, 'utf-8') : content;
          await writeFile(filePath, bytes, { mode: 0o600, flag: 'wx' });
          files.set(filePath, bytes.length);
          return filePath;
        },

        async dispose(): Promise<void> {
          if (disposed) return;
          disposed = true;
          for (const [filePath, size] of files) {
            try {
              await writeFile(filePath, Buffer.alloc(size), { flag: 'r+' });
            } catch (error: unknown) {
              logger.debug('Could not overwrite scratch file before removal', {
                component: 'scratch-space',
                path: filePath,
                error: toError(error).message,
              });
            }
          }
          await rm(path, { recursive: true, force: true });
          liveDirectories.delete(path);
        },
      };
    },
  };
}

/** Directories allocated and not yet disposed, in this process. */
export function liveScratchDirectories(): string[] {
  return [...liveDirectories];
}

/** Synchronously remove every live scratch directory. Safe inside `exit` handlers. */
export function cleanupScratchSync(): void {
  for (const path of liveDirectories) {
    try {
      rmSync(path, { recursive: true, force: true });
    } catch (error: unknown) {
      logger.error('Could not remove scratch directory', {
        component: 'scratch-space',
        path,
        error: toError(error).message,
      });
    }
    liveDirectories.delete(path);
  }
}

const CLEANUP_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM', 'SIGHUP'];

/**
 * Register exit and signal handlers that remove live scratch directories.
 * On a signal the handler cleans up, unregisters itself and re-raises the
 * signal so the default disposition (termination) still applies.
 *
 * @returns a function that unregisters the handlers
 */
export function installScratchCleanup(proc: NodeJS.Process = process): () => void {
  const onExit = (): void => {
    cleanupScratchSync();
  };

  const signalHandlers = new Map<NodeJS.Signals, () => void>();
  const uninstall = (): void => {
    proc.removeListener('exit', onExit);
    for (const [signal, handler] of signalHandlers) {
      proc.removeListener(signal, handler);
    }
  };

  for (const signal of CLEANUP_SIGNALS) {
    const handler = (): void => {
      cleanupScratchSync();
      uninstall();
      proc.kill(proc.pid, signal);
    };
    signalHandlers.set(signal, handler);
    proc.on(signal, handler);
  }
  proc.on('exit', onExit);

  return uninstall;
}
