// ─── Types ──────────────────────────────────────────────────────
export type {
  ConfigStore,
  EnvkeepConfig,
  IdentifierRecord,
  KeyBackendKind,
  ResolvedPaths,
  VaultConfig,
} from './types.js';

// ─── Schemas ────────────────────────────────────────────────────
export { envkeepConfigSchema, identifierRecordSchema, vaultConfigSchema } from './schema.js';

// ─── Loader ─────────────────────────────────────────────────────
export { ConfigError, loadEnvkeepConfig, parseEnvkeepConfig, resolveEnvVars } from './loader.js';

// ─── Paths & Store ──────────────────────────────────────────────
export {
  HOME_ENV_VAR,
  KEY_FILE_ENV_VAR,
  configFilePath,
  defaultConfig,
  expandHome,
  resolveDocumentPath,
  resolveEnvkeepHome,
  resolvePaths,
} from './paths.js';
export { createFileConfigStore, createMemoryConfigStore } from './config-store.js';
export type { FileConfigStoreOptions } from './config-store.js';

// ─── Identifier Registry ────────────────────────────────────────
export { activeIdentifiers, registerIdentifier, retireIdentifiers } from './identifier-registry.js';
