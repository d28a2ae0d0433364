/**
 * File-backed ConfigStore. A missing file reads as the default config, so the
 * first `setup` run can write it.
 */
import { atomicWriteFile } from '@/infrastructure/atomic-fs.js';
import { loadEnvkeepConfig } from './loader.js';
import { defaultConfig } from './paths.js';
import type { ConfigStore, EnvkeepConfig } from './types.js';

type Env = Readonly<Record<string, string | undefined>>;

export interface FileConfigStoreOptions {
  path: string;
  /** envkeep home used for defaults when the file does not exist yet. */
  home: string;
  env?: Env;
}

/**
 * Create a ConfigStore reading and writing the JSON config at `options.path`.
 */
export function createFileConfigStore(options: FileConfigStoreOptions): ConfigStore {
  const { path, home } = options;

  return {
    path,

    async read(): Promise<EnvkeepConfig> {
      const result = await loadEnvkeepConfig(path, options.env ?? process.env);
      if (result.ok) return result.value;
      if (result.error.context?.['errorCode'] === 'ENOENT') {
        return defaultConfig(home);
      }
      throw result.error;
    },

    async write(config: EnvkeepConfig): Promise<void> {
      await atomicWriteFile(path, `${JSON.stringify(config, null, 2)}\n`, { mode: 0o600 });
    },
  };
}

/**
 * Create an in-memory ConfigStore.
 */
export function createMemoryConfigStore(initial: EnvkeepConfig, path = '<memory>'): ConfigStore {
  let current = initial;
  return {
    path,
    read: () => Promise.resolve(current),
    write: (config) => {
      current = config;
      return Promise.resolve();
    },
  };
}
