import { EnvkeepError } from '@/core/errors.js';
import type { Keypair, ScopedSecret } from '@/core/types.js';
import type { ScratchDirectory, ScratchSpace } from '@/infrastructure/scratch-space.js';
import { formatKeyFile } from './key-file.js';

export interface ScopedSecretOptions {
  /** Key file that already holds this identity (on-disk custody). */
  keyFilePath?: string;
  /** Where a key file is materialized when a subprocess needs a path. */
  scratch: ScratchSpace;
}

function releasedError(): EnvkeepError {
  return new EnvkeepError({
    message: 'Secret was used after it was released',
    code: 'SECRET_RELEASED',
    isOperational: false,
  });
}

/**
 * Wrap a keypair for one scope. The secret bytes are copied, so the caller may
 * zero its own buffer; `release()` zeroes the copy and removes any scratch file.
 */
export function createScopedSecret(keypair: Keypair, options: ScopedSecretOptions): ScopedSecret {
  const material = Buffer.from(keypair.secretMaterial);
  let released = false;
  let scratchDirectory: ScratchDirectory | undefined;
  let materializedPath: string | undefined;

  return {
    publicIdentifier: keypair.publicIdentifier,

    get secretMaterial(): Buffer {
      if (released) throw releasedError();
      return material;
    },

    get released(): boolean {
      return released;
    },

    async filePath(): Promise<string> {
      if (released) throw releasedError();
      if (options.keyFilePath !== undefined) return options.keyFilePath;
      if (materializedPath !== undefined) return materializedPath;

      scratchDirectory = await options.scratch.allocate('key');
      const content = formatKeyFile({ publicIdentifier: keypair.publicIdentifier, secretMaterial: material });
      try {
        materializedPath = await scratchDirectory.writeFile('key.txt', content);
      } finally {
        content.fill(0);
      }
      return materializedPath;
    },

    async release(): Promise<void> {
      if (released) return;
      released = true;
      material.fill(0);
      if (scratchDirectory) {
        await scratchDirectory.dispose();
      }
    },
  };
}
