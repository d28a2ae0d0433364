/**
 * Filesystem layout: envkeep home, config file, key file and secrets directory.
 */
import { homedir } from 'node:os';
import { isAbsolute, join, resolve } from 'node:path';
import type { EnvkeepConfig, ResolvedPaths } from './types.js';

/** Env var overriding the envkeep home directory. */
export const HOME_ENV_VAR = 'ENVKEEP_HOME';
/** Env var designating the on-disk key file location. */
export const KEY_FILE_ENV_VAR = 'ENVKEEP_KEY_FILE';

type Env = Readonly<Record<string, string | undefined>>;

/** Expand a leading `~` to the user's home directory. */
export function expandHome(path: string, home: string = homedir()): string {
  if (path === '~') return home;
  if (path.startsWith('~/')) return join(home, path.slice(2));
  return path;
}

/** Directory holding config.json, the default key file, secrets and vault. */
export function resolveEnvkeepHome(env: Env): string {
  const fromEnv = env[HOME_ENV_VAR];
  if (fromEnv !== undefined && fromEnv !== '') return resolve(expandHome(fromEnv));
  return join(homedir(), '.envkeep');
}

/** Default config file path for a home directory. */
export function configFilePath(home: string): string {
  return join(home, 'config.json');
}

/** Config used before `setup` has written one. */
export function defaultConfig(home: string): EnvkeepConfig {
  return {
    version: 1,
    backend: 'native',
    custody: 'on-disk',
    keyFile: join(home, 'key.txt'),
    secretsDir: join(home, 'secrets'),
    defaultDocument: 'secrets.env.enc',
    vault: {
      kind: 'file',
      path: join(home, 'vault.json'),
      entryName: 'envkeep-encryption-key',
      attachmentName: 'key.txt',
    },
    identifiers: [],
    promptTimeoutMs: 120_000,
  };
}

/**
 * Combine config and environment into concrete paths.
 * `ENVKEEP_KEY_FILE` wins over the configured key file.
 */
export function resolvePaths(config: EnvkeepConfig, home: string, env: Env): ResolvedPaths {
  const keyFromEnv = env[KEY_FILE_ENV_VAR];
  const keyFile =
    keyFromEnv !== undefined && keyFromEnv !== '' ? resolve(expandHome(keyFromEnv)) : resolve(expandHome(config.keyFile));
  const secretsDir = resolve(expandHome(config.secretsDir));
  return {
    home,
    configFile: configFilePath(home),
    keyFile,
    secretsDir,
    defaultDocument: join(secretsDir, config.defaultDocument),
  };
}

/** Resolve a document argument: absolute paths are kept, bare names live in the secrets dir. */
export function resolveDocumentPath(paths: ResolvedPaths, document: string | undefined, cwd: string): string {
  if (document === undefined) return paths.defaultDocument;
  const expanded = expandHome(document);
  if (isAbsolute(expanded)) return expanded;
  if (expanded.includes('/') || expanded.startsWith('.')) return resolve(cwd, expanded);
  return join(paths.secretsDir, expanded);
}
